import { randomUUID } from "node:crypto";
import { DEBUG_ENV, SESSION_COOKIE_NAME } from "../constants.js";
import { AppError, errorMessage } from "../errors.js";
import { firstHeaderValue } from "../helpers.js";
import type { RuntimeLog } from "../log.js";
import type { CorsSettings } from "../workflow/types.js";
import { respondWithError } from "./response.js";
import type { Middleware } from "./router.js";

const DEFAULT_CORS_METHODS = "GET, POST, PUT, DELETE, PATCH, OPTIONS";
const DEFAULT_CORS_HEADERS = "Content-Type, Authorization";

export function isDebugEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env[DEBUG_ENV];
  return value === "true" || value === "1";
}

export function requestIdMiddleware(): Middleware {
  return (next) => async (exchange) => {
    const inbound = firstHeaderValue(exchange.request.headers["x-request-id"])?.trim();
    const requestId = inbound || randomUUID();
    exchange.locals.requestId = requestId;
    exchange.response.setHeader("x-request-id", requestId);
    await next(exchange);
  };
}

/**
 * Converts failures escaping the inner handlers into a 500 envelope. Once
 * headers are on the wire nothing can be rewritten, so the failure is only logged.
 */
export function errorHandlerMiddleware(debugMode: boolean, log?: RuntimeLog): Middleware {
  return (next) => async (exchange) => {
    exchange.locals.debugMode = debugMode;
    try {
      await next(exchange);
    } catch (error) {
      log?.error("http.handler_failed", "request handler failed", {
        path: exchange.url.pathname,
        method: exchange.request.method,
        requestId: exchange.locals.requestId,
        error: errorMessage(error)
      });
      if (exchange.response.headersSent) {
        if (!exchange.response.writableEnded) {
          exchange.response.destroy();
        }
        return;
      }
      respondWithError(exchange, error, debugMode);
    }
  };
}

export function debugModeMiddleware(env: NodeJS.ProcessEnv = process.env, log?: RuntimeLog): Middleware {
  return errorHandlerMiddleware(isDebugEnvironment(env), log);
}

export function readCookie(header: string | undefined, name: string): string | undefined {
  if (!header) {
    return undefined;
  }
  for (const part of header.split(";")) {
    const separator = part.indexOf("=");
    if (separator === -1) {
      continue;
    }
    if (part.slice(0, separator).trim() !== name) {
      continue;
    }
    const raw = part.slice(separator + 1).trim();
    try {
      return decodeURIComponent(raw);
    } catch {
      return raw;
    }
  }
  return undefined;
}

export function sessionMiddleware(): Middleware {
  return (next) => async (exchange) => {
    const sessionId = readCookie(exchange.request.headers.cookie, SESSION_COOKIE_NAME);
    if (sessionId) {
      exchange.locals.sessionId = sessionId;
    }
    await next(exchange);
  };
}

export function uploadLimitMiddleware(maxBytes: number): Middleware {
  return (next) => async (exchange) => {
    const contentType = exchange.request.headers["content-type"] ?? "";
    if (!contentType.startsWith("multipart/form-data")) {
      await next(exchange);
      return;
    }
    const declared = Number(exchange.request.headers["content-length"] ?? -1);
    if (Number.isFinite(declared) && declared > maxBytes) {
      respondWithError(
        exchange,
        new AppError("REQUEST_TOO_LARGE", `Request body too large: ${declared} bytes (max: ${maxBytes})`)
      );
      return;
    }
    await next(exchange);
  };
}

export function corsMiddleware(cors: CorsSettings): Middleware {
  return (next) => async (exchange) => {
    if (cors.enableCors === false) {
      await next(exchange);
      return;
    }

    const { response } = exchange;
    const origin = firstHeaderValue(exchange.request.headers.origin);
    if (origin) {
      const allowed = (cors.allowOrigins ?? []).some((entry) => entry === "*" || entry === origin);
      if (allowed) {
        response.setHeader("access-control-allow-origin", origin);
        response.appendHeader("vary", "Origin");
      }
    }
    response.setHeader(
      "access-control-allow-methods",
      cors.allowMethods && cors.allowMethods.length > 0 ? cors.allowMethods.join(", ") : DEFAULT_CORS_METHODS
    );
    response.setHeader(
      "access-control-allow-headers",
      cors.allowHeaders && cors.allowHeaders.length > 0 ? cors.allowHeaders.join(", ") : DEFAULT_CORS_HEADERS
    );
    if (cors.exposeHeaders && cors.exposeHeaders.length > 0) {
      response.setHeader("access-control-expose-headers", cors.exposeHeaders.join(", "));
    }
    if (cors.maxAge !== undefined && String(cors.maxAge).trim()) {
      response.setHeader("access-control-max-age", String(cors.maxAge).trim());
    }
    if (cors.allowCredentials) {
      response.setHeader("access-control-allow-credentials", "true");
    }

    if (exchange.request.method === "OPTIONS") {
      response.statusCode = 200;
      response.end();
      return;
    }
    await next(exchange);
  };
}
