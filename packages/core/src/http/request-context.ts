import { randomUUID } from "node:crypto";
import { DEFAULT_MAX_UPLOAD_BYTES } from "../constants.js";
import { firstHeaderValue, isRecord, readRequestBodyCapped } from "../helpers.js";
import type { FileUpload, RequestContext } from "../workflow/types.js";
import type { HttpExchange } from "./router.js";

export function isMultipart(contentType: string | undefined): boolean {
  return (contentType ?? "").startsWith("multipart/form-data");
}

export function isUrlEncodedForm(contentType: string | undefined): boolean {
  return (contentType ?? "").startsWith("application/x-www-form-urlencoded");
}

/** Drops a trailing `:port` from `host:port` and `[v6]:port`; bare IPv6 stays intact. */
export function stripPort(address: string): string {
  const trimmed = address.trim();
  if (trimmed.startsWith("[")) {
    const closing = trimmed.indexOf("]");
    return closing === -1 ? trimmed : trimmed.slice(1, closing);
  }
  const firstColon = trimmed.indexOf(":");
  if (firstColon !== -1 && firstColon === trimmed.lastIndexOf(":")) {
    return trimmed.slice(0, firstColon);
  }
  return trimmed;
}

export function clientIp(exchange: HttpExchange): string {
  const headers = exchange.request.headers;
  const forwarded = firstHeaderValue(headers["x-forwarded-for"]);
  if (forwarded) {
    const first = forwarded.split(",")[0]?.trim();
    if (first) {
      return stripPort(first);
    }
  }
  const realIp = firstHeaderValue(headers["x-real-ip"])?.trim();
  if (realIp) {
    return stripPort(realIp);
  }
  const remote = exchange.request.socket.remoteAddress ?? "";
  return remote.startsWith("::ffff:") ? remote.slice("::ffff:".length) : remote;
}

export function firstValues(params: URLSearchParams): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, value] of params) {
    if (!(key in values)) {
      values[key] = value;
    }
  }
  return values;
}

export function firstHeaderValues(exchange: HttpExchange): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(exchange.request.headers)) {
    const first = firstHeaderValue(value);
    if (first !== undefined) {
      headers[key] = first;
    }
  }
  return headers;
}

/**
 * Decodes the request body into a map. JSON is the default reading; url-encoded
 * forms are merged over it. Anything unreadable yields an empty map.
 */
export async function readBodyFields(
  exchange: HttpExchange,
  maxBytes = DEFAULT_MAX_UPLOAD_BYTES
): Promise<Record<string, unknown>> {
  const contentType = exchange.request.headers["content-type"];
  const { body, exceeded } = await readRequestBodyCapped(exchange.request, maxBytes);
  if (exceeded || body.length === 0) {
    return {};
  }
  const text = body.toString("utf8");
  if (isUrlEncodedForm(contentType)) {
    return firstValues(new URLSearchParams(text));
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export interface ParseRequestInput {
  files?: FileUpload[];
  body: Record<string, unknown>;
}

export function buildRequestContext(exchange: HttpExchange, input: ParseRequestInput): RequestContext {
  return {
    method: exchange.request.method ?? "GET",
    path: exchange.url.pathname,
    headers: firstHeaderValues(exchange),
    query: firstValues(exchange.url.searchParams),
    body: input.body,
    files: input.files ?? [],
    ip: clientIp(exchange),
    id: exchange.locals.requestId ?? randomUUID(),
    sessionId: exchange.locals.sessionId ?? ""
  };
}
