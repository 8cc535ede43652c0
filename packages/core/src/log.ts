import fs from "node:fs";
import path from "node:path";
import { RUNTIME_EVENT_BUFFER_SIZE } from "./constants.js";
import { errorMessage } from "./errors.js";
import { ensureDirectory, nowIso, summarizeForObservability } from "./helpers.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface GatewayRuntimeEvent {
  type: string;
  level: LogLevel;
  timestamp: string;
  message: string;
  fields: Record<string, unknown>;
}

export type GatewayRuntimeEventHandler = (event: GatewayRuntimeEvent) => void;

export interface RuntimeLogOptions {
  /** "stderr" prints one line per event, "silent" only buffers. */
  sink?: "stderr" | "silent";
  debug?: boolean;
  observability?: {
    enabled?: boolean;
    directory?: string;
  };
}

function formatFieldValue(value: unknown): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  if (value === undefined) {
    return "undefined";
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export class RuntimeLog {
  private readonly sink: "stderr" | "silent";
  private readonly debugEnabled: boolean;
  private readonly observabilityEnabled: boolean;
  private readonly observabilityDirectory: string | null;
  private readonly events: GatewayRuntimeEvent[] = [];
  private readonly handlers = new Set<GatewayRuntimeEventHandler>();
  private observabilityWriteFailed = false;
  private readonly degradedReasons: string[] = [];

  constructor(options: RuntimeLogOptions = {}) {
    this.sink = options.sink ?? "stderr";
    this.debugEnabled = options.debug ?? false;
    this.observabilityEnabled = options.observability?.enabled ?? false;
    this.observabilityDirectory = options.observability?.directory ?? null;
  }

  debug(type: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit("debug", type, message, fields);
  }

  info(type: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit("info", type, message, fields);
  }

  warn(type: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit("warn", type, message, fields);
  }

  error(type: string, message: string, fields: Record<string, unknown> = {}): void {
    this.emit("error", type, message, fields);
  }

  onEvent(handler: GatewayRuntimeEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  listEvents(limit = 100): GatewayRuntimeEvent[] {
    const safeLimit = Math.max(1, Math.floor(limit));
    return this.events.slice(-safeLimit);
  }

  getDegradedReasons(): string[] {
    return [...this.degradedReasons];
  }

  private emit(level: LogLevel, type: string, message: string, fields: Record<string, unknown>): void {
    const event: GatewayRuntimeEvent = {
      type,
      level,
      timestamp: nowIso(),
      message,
      fields
    };
    this.events.push(event);
    if (this.events.length > RUNTIME_EVENT_BUFFER_SIZE) {
      this.events.splice(0, this.events.length - RUNTIME_EVENT_BUFFER_SIZE);
    }
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch {
        // subscriber failures never reach the caller
      }
    }
    this.writeLine(event);
    this.appendObservabilityRecord(event);
  }

  private writeLine(event: GatewayRuntimeEvent): void {
    if (this.sink === "silent") {
      return;
    }
    if (event.level === "debug" && !this.debugEnabled) {
      return;
    }
    const parts = [event.timestamp, event.level.toUpperCase(), event.message];
    const summarized = summarizeForObservability(event.fields);
    if (summarized && typeof summarized === "object" && !Array.isArray(summarized)) {
      for (const [key, value] of Object.entries(summarized)) {
        parts.push(`${key}=${formatFieldValue(value)}`);
      }
    }
    process.stderr.write(`${parts.join(" ")}\n`);
  }

  private appendObservabilityRecord(event: GatewayRuntimeEvent): void {
    if (!this.observabilityEnabled || !this.observabilityDirectory || this.observabilityWriteFailed) {
      return;
    }
    try {
      ensureDirectory(this.observabilityDirectory);
      const entry = {
        timestamp: event.timestamp,
        stream: "runtime-events",
        payload: summarizeForObservability(event)
      };
      fs.appendFileSync(
        path.join(this.observabilityDirectory, "runtime-events.jsonl"),
        `${JSON.stringify(entry)}\n`,
        "utf8"
      );
    } catch (error) {
      this.observabilityWriteFailed = true;
      this.degradedReasons.push(`Observability write failed: ${errorMessage(error)}`);
    }
  }
}

export function createRuntimeLog(options: RuntimeLogOptions = {}): RuntimeLog {
  return new RuntimeLog(options);
}
