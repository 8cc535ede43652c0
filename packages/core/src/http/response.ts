import { TLSSocket } from "node:tls";
import { SESSION_COOKIE_MAX_AGE_SECONDS, SESSION_COOKIE_NAME } from "../constants.js";
import { AppError, type AppErrorCode, errorMessage, isAppError } from "../errors.js";
import { firstHeaderValue, isRecord, nowIso } from "../helpers.js";
import type { HttpExchange } from "./router.js";

export interface ErrorDetail {
  code: AppErrorCode;
  message: string;
  resourceId?: string;
  details?: Record<string, unknown>;
  stack?: string;
}

export interface ErrorEnvelope {
  success: false;
  error: ErrorDetail;
  meta: {
    requestID: string;
    timestamp: string;
    path: string;
    method: string;
  };
}

export interface SuccessEnvelope {
  success: true;
  data: unknown;
  meta: Record<string, unknown>;
}

export interface ValidationIssue {
  field: string;
  type: string;
  message: string;
  value?: unknown;
}

function isSecureRequest(exchange: HttpExchange): boolean {
  if (exchange.request.socket instanceof TLSSocket) {
    return true;
  }
  return firstHeaderValue(exchange.request.headers["x-forwarded-proto"]) === "https";
}

export function setSessionCookie(exchange: HttpExchange, sessionId: string): void {
  const attributes = [
    `${SESSION_COOKIE_NAME}=${encodeURIComponent(sessionId)}`,
    "Path=/",
    `Max-Age=${SESSION_COOKIE_MAX_AGE_SECONDS}`,
    "HttpOnly",
    "SameSite=Lax"
  ];
  if (isSecureRequest(exchange)) {
    attributes.push("Secure");
  }
  exchange.response.setHeader("set-cookie", attributes.join("; "));
}

function propagateSession(exchange: HttpExchange): void {
  const sessionId = exchange.locals.sessionId;
  if (sessionId) {
    setSessionCookie(exchange, sessionId);
  }
}

function errorMeta(exchange: HttpExchange): ErrorEnvelope["meta"] {
  return {
    requestID: exchange.locals.requestId ?? "",
    timestamp: nowIso(),
    path: exchange.url.pathname,
    method: exchange.request.method ?? "GET"
  };
}

/**
 * Converts any thrown value to an AppError. Non-AppError values become
 * INTERNAL_ERROR and only reveal their text and stack in debug mode.
 */
export function toAppError(error: unknown, debugMode: boolean): AppError {
  if (isAppError(error)) {
    return error;
  }
  const detail = errorMessage(error);
  const message = debugMode && detail ? `Internal server error: ${detail}` : "Internal server error";
  const appError = new AppError("INTERNAL_ERROR", message, {
    cause: error,
    details: debugMode && detail ? { error: detail } : undefined
  });
  if (debugMode && error instanceof Error && error.stack) {
    appError.stackTrace = error.stack;
  }
  return appError;
}

export function buildErrorEnvelope(exchange: HttpExchange, error: unknown, debugMode: boolean): ErrorEnvelope {
  const appError = toAppError(error, debugMode);
  const detail: ErrorDetail = {
    code: appError.code,
    message: appError.message
  };
  if (appError.resourceId) {
    detail.resourceId = appError.resourceId;
  }
  if (Object.keys(appError.details).length > 0) {
    detail.details = appError.details;
  }
  if (debugMode && appError.stackTrace) {
    detail.stack = appError.stackTrace;
  }
  return {
    success: false,
    error: detail,
    meta: errorMeta(exchange)
  };
}

function validationIssues(value: unknown): ValidationIssue[] | null {
  if (!Array.isArray(value) || value.length === 0) {
    return null;
  }
  const issues: ValidationIssue[] = [];
  for (const entry of value) {
    if (!isRecord(entry)) {
      return null;
    }
    const { field, type, message } = entry;
    if (typeof field !== "string" || typeof type !== "string" || typeof message !== "string") {
      return null;
    }
    issues.push("value" in entry ? { field, type, message, value: entry.value } : { field, type, message });
  }
  return issues;
}

/**
 * A VALIDATION_ERROR carrying well-formed `details.errors` is rendered through
 * respondWithValidationErrors; everything else gets the generic envelope.
 */
export function respondWithError(exchange: HttpExchange, error: unknown, debugMode = exchange.locals.debugMode): void {
  if (isAppError(error) && error.code === "VALIDATION_ERROR") {
    const issues = validationIssues(error.details.errors);
    if (issues) {
      respondWithValidationErrors(exchange, issues);
      return;
    }
  }
  const appError = toAppError(error, debugMode);
  const envelope = buildErrorEnvelope(exchange, appError, debugMode);
  propagateSession(exchange);
  exchange.response.statusCode = appError.statusCode;
  exchange.response.setHeader("content-type", "application/json");
  exchange.response.end(`${JSON.stringify(envelope)}\n`);
}

export function respondWithSuccess(
  exchange: HttpExchange,
  data: unknown,
  meta: Record<string, unknown> = {}
): void {
  const envelope: SuccessEnvelope = {
    success: true,
    data,
    meta: {
      ...meta,
      requestID: exchange.locals.requestId ?? "",
      timestamp: nowIso()
    }
  };
  propagateSession(exchange);
  exchange.response.statusCode = 200;
  exchange.response.setHeader("content-type", "application/json");
  exchange.response.end(`${JSON.stringify(envelope)}\n`);
}

export function respondWithValidationErrors(exchange: HttpExchange, issues: ValidationIssue[]): void {
  const envelope: ErrorEnvelope = {
    success: false,
    error: {
      code: "VALIDATION_ERROR",
      message: "Validation failed",
      details: {
        errors: issues.map((issue) => {
          const entry: Record<string, unknown> = {
            field: issue.field,
            type: issue.type,
            message: issue.message
          };
          if (issue.value !== undefined) {
            entry.value = issue.value;
          }
          return entry;
        })
      }
    },
    meta: errorMeta(exchange)
  };
  exchange.response.statusCode = 400;
  exchange.response.setHeader("content-type", "application/json");
  exchange.response.end(`${JSON.stringify(envelope)}\n`);
}
