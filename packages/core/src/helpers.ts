import fs from "node:fs";
import http from "node:http";

const OBS_MAX_TEXT_CHARS = 8_000;
const OBS_REDACTED_TEXT = "[REDACTED]";
const OBS_MAX_REDACTION_DEPTH = 10;
const OBS_SENSITIVE_KEY_NAMES = new Set([
  "authorization",
  "cookie",
  "set-cookie",
  "x-api-key",
  "api-key",
  "apikey",
  "api_key",
  "password",
  "passwd",
  "secret",
  "access_token",
  "refresh_token",
  "token"
]);

function clipText(value: string, maxChars = OBS_MAX_TEXT_CHARS): string {
  if (value.length <= maxChars) {
    return value;
  }
  const dropped = value.length - maxChars;
  return `${value.slice(0, maxChars)}...[truncated ${dropped} chars]`;
}

function isSensitiveKey(key: string): boolean {
  const normalized = key.trim().toLowerCase();
  if (!normalized) {
    return false;
  }
  if (OBS_SENSITIVE_KEY_NAMES.has(normalized)) {
    return true;
  }
  return (
    normalized.includes("token") ||
    normalized.includes("secret") ||
    normalized.includes("password") ||
    normalized.includes("apikey") ||
    normalized.includes("api_key")
  );
}

function redactStringSecrets(value: string): string {
  let sanitized = value;
  sanitized = sanitized.replace(/\bBearer\s+[A-Za-z0-9._~+/=-]{4,}/gi, `Bearer ${OBS_REDACTED_TEXT}`);
  sanitized = sanitized.replace(
    /\b(token|secret|password|api[_-]?key)\s*[:=]\s*([^\s,;]+)/gi,
    (_, label: string) => `${label}=${OBS_REDACTED_TEXT}`
  );
  return sanitized;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function sanitizeValue(value: unknown, depth = 0, seen?: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return redactStringSecrets(value);
  }
  if (value === null || value === undefined || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (depth >= OBS_MAX_REDACTION_DEPTH) {
    return "[Truncated depth]";
  }
  if (Buffer.isBuffer(value)) {
    return `[${value.length} bytes]`;
  }
  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry, depth + 1, seen));
  }
  if (value instanceof Error) {
    return {
      name: value.name,
      message: redactStringSecrets(value.message)
    };
  }
  if (isPlainRecord(value)) {
    const references = seen ?? new WeakSet<object>();
    if (references.has(value)) {
      return "[Circular]";
    }
    references.add(value);
    const sanitized: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      sanitized[key] = isSensitiveKey(key) ? OBS_REDACTED_TEXT : sanitizeValue(entry, depth + 1, references);
    }
    return sanitized;
  }
  return redactStringSecrets(String(value));
}

export function summarizeForObservability(value: unknown): unknown {
  const sanitized = sanitizeValue(value);
  if (typeof sanitized === "string") {
    return clipText(sanitized);
  }
  if (sanitized === null || sanitized === undefined) {
    return sanitized;
  }
  try {
    const parsed: unknown = JSON.parse(clipText(JSON.stringify(sanitized)));
    return parsed;
  } catch {
    return clipText(String(sanitized));
  }
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function ensureDirectory(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainRecord(value);
}

export function firstHeaderValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Boolean coercion for loosely typed workflow output. Returns null when the
 * value has no boolean reading.
 */
export function parseBool(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (value === 1) {
      return true;
    }
    if (value === 0) {
      return false;
    }
    return null;
  }
  if (typeof value !== "string") {
    return null;
  }
  switch (value.trim().toLowerCase()) {
    case "1":
    case "t":
    case "true":
    case "yes":
      return true;
    case "0":
    case "f":
    case "false":
    case "no":
      return false;
    default:
      return null;
  }
}

export interface CappedBody {
  body: Buffer;
  exceeded: boolean;
}

/**
 * Buffers at most `maxBytes + 1` bytes. Anything past that is drained and
 * discarded so the caller can still answer on the same connection.
 */
export function readRequestBodyCapped(request: http.IncomingMessage, maxBytes: number): Promise<CappedBody> {
  return new Promise<CappedBody>((resolve, reject) => {
    const chunks: Buffer[] = [];
    const cap = maxBytes + 1;
    let kept = 0;
    let exceeded = false;
    request.on("data", (chunk: Buffer | string) => {
      const normalized = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
      if (kept >= cap) {
        return;
      }
      const room = cap - kept;
      const slice = normalized.length > room ? normalized.subarray(0, room) : normalized;
      chunks.push(slice);
      kept += slice.length;
      if (kept > maxBytes) {
        exceeded = true;
      }
    });
    request.on("error", reject);
    request.on("end", () => {
      resolve({
        body: Buffer.concat(chunks),
        exceeded
      });
    });
  });
}

export function writeJson(response: http.ServerResponse, statusCode: number, payload: unknown): void {
  response.statusCode = statusCode;
  response.setHeader("content-type", "application/json; charset=utf-8");
  response.end(JSON.stringify(payload));
}

export function writeText(response: http.ServerResponse, statusCode: number, text: string): void {
  response.statusCode = statusCode;
  response.setHeader("content-type", "text/plain; charset=utf-8");
  response.setHeader("x-content-type-options", "nosniff");
  response.end(`${text}\n`);
}
