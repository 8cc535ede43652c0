import http from "node:http";
import httpProxy from "http-proxy";
import { PROXY_RESPONSE_HEADER_TIMEOUT_MS } from "../constants.js";
import { errorMessage } from "../errors.js";
import { writeText } from "../helpers.js";
import type { HttpExchange } from "../http/router.js";
import type { RuntimeLog } from "../log.js";

const LOOPBACK_HOST = "127.0.0.1";

export function appTarget(port: number, scheme: "http" | "ws" = "http"): string {
  return `${scheme}://${LOOPBACK_HOST}:${port}`;
}

/**
 * Upstream path for a proxied request: the route prefix is removed and the
 * result always starts with "/". The raw query string is carried over.
 */
export function rewriteAppPath(rawUrl: string, routePath: string): string {
  const queryIndex = rawUrl.indexOf("?");
  const pathname = queryIndex >= 0 ? rawUrl.slice(0, queryIndex) : rawUrl;
  const search = queryIndex >= 0 ? rawUrl.slice(queryIndex) : "";
  let trimmed = pathname.startsWith(routePath) ? pathname.slice(routePath.length) : pathname;
  if (!trimmed.startsWith("/")) {
    trimmed = `/${trimmed}`;
  }
  return `${trimmed}${search}`;
}

export interface AppProxyOptions {
  log: RuntimeLog;
  responseTimeoutMs?: number;
}

/**
 * Reverse proxy to a local app. The response timeout bounds the wait for the
 * app's response headers only; a body that streams slowly is not cut off.
 */
export class AppProxy {
  private readonly proxy: httpProxy;
  private readonly log: RuntimeLog;
  private readonly responseTimeoutMs: number;

  constructor(options: AppProxyOptions) {
    this.log = options.log;
    this.responseTimeoutMs = options.responseTimeoutMs ?? PROXY_RESPONSE_HEADER_TIMEOUT_MS;
    this.proxy = httpProxy.createProxyServer({ changeOrigin: true });
    this.proxy.on("proxyReq", (proxyReq) => this.limitHeaderWait(proxyReq));
    this.proxy.on("error", (error) => {
      this.log.debug("web.proxy_error", "proxy emitted an error", { error: errorMessage(error) });
    });
  }

  forward(exchange: HttpExchange, routePath: string, port: number): Promise<void> {
    const target = appTarget(port);
    const upstreamPath = rewriteAppPath(exchange.request.url ?? "/", routePath);
    exchange.request.url = upstreamPath;
    this.log.debug("web.proxy_request", "proxying request", { url: `${target}${upstreamPath}` });

    return new Promise<void>((resolve) => {
      exchange.response.once("close", () => resolve());
      this.proxy.web(exchange.request, exchange.response, { target }, (error: Error) => {
        this.log.error("web.proxy_failed", "proxy request failed", {
          url: `${target}${upstreamPath}`,
          error: errorMessage(error)
        });
        if (exchange.response.headersSent) {
          exchange.response.destroy();
        } else {
          writeText(exchange.response, 502, "Failed to reach app");
        }
        resolve();
      });
    });
  }

  close(): void {
    this.proxy.close();
  }

  private limitHeaderWait(proxyReq: http.ClientRequest): void {
    if (this.responseTimeoutMs <= 0) {
      return;
    }
    const timer = setTimeout(() => {
      proxyReq.destroy(new Error(`app sent no response headers within ${this.responseTimeoutMs}ms`));
    }, this.responseTimeoutMs);
    const clear = () => clearTimeout(timer);
    proxyReq.once("response", clear);
    proxyReq.once("close", clear);
  }
}

export function isWebSocketUpgrade(request: http.IncomingMessage): boolean {
  const upgrade = request.headers.upgrade;
  const connection = request.headers.connection;
  return (
    typeof upgrade === "string" &&
    upgrade.toLowerCase() === "websocket" &&
    typeof connection === "string" &&
    connection.toLowerCase().split(",").some((token) => token.trim() === "upgrade")
  );
}
