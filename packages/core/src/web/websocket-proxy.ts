import http from "node:http";
import type { Duplex } from "node:stream";
import WebSocket, { WebSocketServer } from "ws";
import { WEBSOCKET_HANDSHAKE_TIMEOUT_MS } from "../constants.js";
import { errorMessage } from "../errors.js";
import type { RuntimeLog } from "../log.js";

// Regenerated by the client library on the backend handshake.
const HANDSHAKE_HEADERS = new Set([
  "upgrade",
  "connection",
  "sec-websocket-key",
  "sec-websocket-version",
  "sec-websocket-protocol",
  "sec-websocket-extensions"
]);

export function forwardableHeaders(headers: http.IncomingHttpHeaders): Record<string, string | string[]> {
  const forwarded: Record<string, string | string[]> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || HANDSHAKE_HEADERS.has(key.toLowerCase())) {
      continue;
    }
    forwarded[key] = value;
  }
  return forwarded;
}

export function rejectUpgrade(socket: Duplex, statusCode: number, statusText: string, message: string): void {
  const body = `${message}\n`;
  socket.end(
    [
      `HTTP/1.1 ${statusCode} ${statusText}`,
      "Content-Type: text/plain; charset=utf-8",
      "X-Content-Type-Options: nosniff",
      `Content-Length: ${Buffer.byteLength(body)}`,
      "Connection: close",
      "",
      body
    ].join("\r\n")
  );
}

export interface WebSocketProxyOptions {
  log: RuntimeLog;
  handshakeTimeoutMs?: number;
}

/**
 * Dials the backend first and upgrades the client only after the backend
 * accepted, so a failed dial is still answered with a plain 502.
 */
export class WebSocketProxy {
  private readonly log: RuntimeLog;
  private readonly handshakeTimeoutMs: number;
  private readonly server = new WebSocketServer({ noServer: true });
  private readonly live = new Set<WebSocket>();

  constructor(options: WebSocketProxyOptions) {
    this.log = options.log;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? WEBSOCKET_HANDSHAKE_TIMEOUT_MS;
  }

  proxy(request: http.IncomingMessage, socket: Duplex, head: Buffer, targetUrl: string): Promise<void> {
    this.log.debug("web.websocket_proxy", "proxying WebSocket connection", { url: targetUrl });
    const backend = new WebSocket(targetUrl, {
      headers: forwardableHeaders(request.headers),
      handshakeTimeout: this.handshakeTimeoutMs
    });

    return new Promise<void>((resolve) => {
      let upgraded = false;
      let finished = false;
      const finish = () => {
        if (!finished) {
          finished = true;
          resolve();
        }
      };

      backend.on("unexpected-response", (clientRequest, response) => {
        this.log.error("web.websocket_handshake_failed", "WebSocket handshake failed", {
          url: targetUrl,
          statusCode: response.statusCode
        });
        response.resume();
        clientRequest.destroy();
        rejectUpgrade(socket, 502, "Bad Gateway", "WebSocket handshake failed");
        finish();
      });

      backend.on("error", (error) => {
        if (upgraded) {
          this.log.debug("web.websocket_backend_error", "target WebSocket error", { error: errorMessage(error) });
          return;
        }
        if (finished) {
          return;
        }
        this.log.error("web.websocket_dial_failed", "failed to connect to target WebSocket", {
          url: targetUrl,
          error: errorMessage(error)
        });
        rejectUpgrade(socket, 502, "Bad Gateway", "Failed to connect to WebSocket");
        finish();
      });

      backend.on("open", () => {
        this.server.handleUpgrade(request, socket, head, (client) => {
          upgraded = true;
          this.pump(client, backend, finish);
        });
      });
    });
  }

  /** Closes every proxied connection pair. */
  closeAll(): void {
    for (const connection of this.live) {
      connection.terminate();
    }
    this.live.clear();
  }

  private pump(client: WebSocket, backend: WebSocket, done: () => void): void {
    this.live.add(client);
    this.live.add(backend);
    let closed = false;
    const closeBoth = (reason: string) => {
      if (closed) {
        return;
      }
      closed = true;
      this.log.debug("web.websocket_closed", "WebSocket proxy connection closed", { reason });
      for (const connection of [client, backend]) {
        this.live.delete(connection);
        if (connection.readyState === WebSocket.OPEN || connection.readyState === WebSocket.CONNECTING) {
          connection.close();
        }
      }
      done();
    };

    backend.on("message", (data, isBinary) => {
      client.send(data, { binary: isBinary }, (error) => {
        if (error) {
          closeBoth(`client write failed: ${errorMessage(error)}`);
        }
      });
    });
    client.on("message", (data, isBinary) => {
      backend.send(data, { binary: isBinary }, (error) => {
        if (error) {
          closeBoth(`target write failed: ${errorMessage(error)}`);
        }
      });
    });
    backend.on("close", () => closeBoth("target closed"));
    client.on("close", () => closeBoth("client closed"));
    client.on("error", (error) => closeBoth(`client error: ${errorMessage(error)}`));
  }
}
