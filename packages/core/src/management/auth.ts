import crypto from "node:crypto";
import http from "node:http";
import { MANAGEMENT_TOKEN_ENV } from "../constants.js";
import { firstHeaderValue, writeText } from "../helpers.js";
import type { Handler } from "../http/router.js";

const BEARER_PREFIX = "Bearer ";

export interface ManagementAuthResult {
  ok: boolean;
  statusCode?: number;
  message?: string;
}

export type ManagementTokenSource = () => string | null;

export function envManagementToken(env: NodeJS.ProcessEnv = process.env): ManagementTokenSource {
  return () => {
    const token = env[MANAGEMENT_TOKEN_ENV]?.trim();
    return token ? token : null;
  };
}

function tokensMatch(provided: string, expected: string): boolean {
  const left = Buffer.from(provided);
  const right = Buffer.from(expected);
  if (left.length !== right.length) {
    return false;
  }
  return crypto.timingSafeEqual(left, right);
}

export function managementAuthResult(request: http.IncomingMessage, expectedToken: string | null): ManagementAuthResult {
  if (!expectedToken) {
    return {
      ok: false,
      statusCode: 503,
      message: `management API disabled: set ${MANAGEMENT_TOKEN_ENV} to enable`
    };
  }

  const header = firstHeaderValue(request.headers.authorization) ?? "";
  if (!header.startsWith(BEARER_PREFIX)) {
    return { ok: false, statusCode: 401, message: "unauthorized" };
  }
  const provided = header.slice(BEARER_PREFIX.length).trim();
  if (!tokensMatch(provided, expectedToken)) {
    return { ok: false, statusCode: 401, message: "unauthorized" };
  }
  return { ok: true };
}

/**
 * Wraps a write endpoint. The expected token is read on every request, so
 * rotating the variable takes effect without a restart.
 */
export function requireManagementAuth(
  handler: Handler,
  tokenSource: ManagementTokenSource = envManagementToken()
): Handler {
  return (exchange) => {
    const auth = managementAuthResult(exchange.request, tokenSource());
    if (!auth.ok) {
      writeText(exchange.response, auth.statusCode ?? 401, auth.message ?? "unauthorized");
      return;
    }
    return handler(exchange);
  };
}
