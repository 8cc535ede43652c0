import fs from "node:fs";
import path from "node:path";
import { MANAGEMENT_BASE_PATH, MANAGEMENT_TOKEN_ENV, packDirectory } from "@wfgate/core";

export type PushKind = "workflow" | "package";

export interface PushParams {
  source: string;
  target: string;
  token?: string;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: typeof fetch;
}

export interface PushResult {
  kind: PushKind;
  message: string;
  workflow?: { name: string; version: string };
}

interface ManagementPayload {
  status?: string;
  message?: string;
  workflow?: { name?: unknown; version?: unknown };
}

export function normalizeTarget(target: string): string {
  const trimmed = target.trim().replace(/\/+$/, "");
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  return `http://${trimmed}`;
}

export async function preparePushBody(source: string): Promise<{ kind: PushKind; body: Buffer }> {
  const resolved = path.resolve(source);
  const stats = fs.statSync(resolved);
  if (stats.isDirectory()) {
    return { kind: "package", body: await packDirectory(resolved) };
  }
  if (resolved.endsWith(".yaml") || resolved.endsWith(".yml")) {
    return { kind: "workflow", body: fs.readFileSync(resolved) };
  }
  return { kind: "package", body: fs.readFileSync(resolved) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function parsePayload(text: string): ManagementPayload {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) {
      return {
        status: typeof parsed.status === "string" ? parsed.status : undefined,
        message: typeof parsed.message === "string" ? parsed.message : undefined,
        workflow: isRecord(parsed.workflow) ? parsed.workflow : undefined
      };
    }
  } catch {
    // plain-text bodies (auth failures) are handled by the caller
  }
  return {};
}

export function describePushFailure(status: number, body: string): string {
  const payload = parsePayload(body);
  const detail = payload.message ?? body.trim();
  switch (status) {
    case 401:
      return "unauthorized: the management token was rejected";
    case 503:
      return `management API disabled on the target: set ${MANAGEMENT_TOKEN_ENV} there`;
    case 413:
      return `payload too large: ${detail}`;
    case 422:
      return `target rejected the update: ${detail}`;
    default:
      return `push failed with status ${status}: ${detail}`;
  }
}

export async function pushToTarget(params: PushParams): Promise<PushResult> {
  const env = params.env ?? process.env;
  const token = (params.token ?? env[MANAGEMENT_TOKEN_ENV] ?? "").trim();
  const { kind, body } = await preparePushBody(params.source);
  const fetchImpl = params.fetchImpl ?? fetch;
  const headers: Record<string, string> = {
    "content-type": kind === "workflow" ? "application/yaml" : "application/gzip"
  };
  if (token) {
    headers.authorization = `Bearer ${token}`;
  }

  const response = await fetchImpl(`${normalizeTarget(params.target)}${MANAGEMENT_BASE_PATH}/${kind}`, {
    method: "PUT",
    headers,
    body
  });
  const text = await response.text();
  if (!response.ok) {
    throw new Error(describePushFailure(response.status, text));
  }

  const payload = parsePayload(text);
  const name = payload.workflow?.name;
  const version = payload.workflow?.version;
  return {
    kind,
    message: payload.message ?? "ok",
    workflow:
      typeof name === "string" ? { name, version: typeof version === "string" ? version : "" } : undefined
  };
}

export async function fetchStatus(target: string, fetchImpl: typeof fetch = fetch): Promise<unknown> {
  const response = await fetchImpl(`${normalizeTarget(target)}${MANAGEMENT_BASE_PATH}/status`);
  const text = await response.text();
  if (!response.ok) {
    throw new Error(`status request failed with status ${response.status}: ${text.trim()}`);
  }
  const parsed: unknown = JSON.parse(text);
  return parsed;
}
