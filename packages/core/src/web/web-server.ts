import http from "node:http";
import path from "node:path";
import type { Duplex } from "node:stream";
import type { GatewayTimeoutsConfig } from "../config.js";
import { resolveEnvironment } from "../config.js";
import { DEFAULT_HOST, DEFAULT_PORT, HTTP_IDLE_TIMEOUT_MS, HTTP_READ_TIMEOUT_MS, HTTP_WRITE_TIMEOUT_MS } from "../constants.js";
import { errorMessage } from "../errors.js";
import { writeText } from "../helpers.js";
import { errorHandlerMiddleware } from "../http/middleware.js";
import { respondWithError } from "../http/response.js";
import { createExchange, createRouter, matchPattern, type Handler, type HttpExchange, type Router } from "../http/router.js";
import { createRuntimeLog, type RuntimeLog } from "../log.js";
import type { WebRoute, Workflow } from "../workflow/types.js";
import { AppProcessTable } from "./app-processes.js";
import { AppProxy, appTarget, isWebSocketUpgrade, rewriteAppPath } from "./app-proxy.js";
import { resolvePublicPath, serveStaticRoute } from "./static-files.js";
import { rejectUpgrade, WebSocketProxy } from "./websocket-proxy.js";

const WEB_ROUTE_METHODS = ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"] as const;

export interface WebServerOptions {
  workflow: Workflow;
  log?: RuntimeLog;
  /** Directory that relative public paths resolve against. Defaults to the working directory. */
  workflowDir?: string;
  env?: NodeJS.ProcessEnv;
  host?: string;
  port?: number;
  debug?: boolean;
  timeouts?: GatewayTimeoutsConfig;
}

export function webRoutePattern(routePath: string): string {
  return `${routePath.endsWith("/") ? routePath : `${routePath}/`}*`;
}

export class WebServer {
  private readonly workflow: Workflow;
  private readonly log: RuntimeLog;
  private readonly env: NodeJS.ProcessEnv;
  private readonly options: WebServerOptions;
  private readonly processes: AppProcessTable;
  private readonly appProxy: AppProxy;
  private readonly websocketProxy: WebSocketProxy;
  private readonly abort = new AbortController();
  private workflowDir: string;
  private server: http.Server | null = null;
  private url: string | undefined;

  constructor(options: WebServerOptions) {
    this.options = options;
    this.workflow = options.workflow;
    this.log = options.log ?? createRuntimeLog();
    this.env = options.env ?? process.env;
    this.workflowDir = options.workflowDir ? path.resolve(options.workflowDir) : process.cwd();
    this.processes = new AppProcessTable(this.log);
    this.appProxy = new AppProxy({
      log: this.log,
      responseTimeoutMs: options.timeouts?.proxyResponseHeaderMs
    });
    this.websocketProxy = new WebSocketProxy({
      log: this.log,
      handshakeTimeoutMs: options.timeouts?.websocketHandshakeMs
    });
  }

  setWorkflowDir(workflowPath: string): void {
    this.workflowDir = path.dirname(path.resolve(workflowPath));
  }

  getWorkflowDir(): string {
    return this.workflowDir;
  }

  getProcesses(): AppProcessTable {
    return this.processes;
  }

  getUrl(): string | undefined {
    return this.url;
  }

  routes(): WebRoute[] {
    return this.workflow.settings.webServer?.routes ?? [];
  }

  registerRoutesOn(router: Router): void {
    for (const route of this.routes()) {
      const handler = this.createWebHandler(route);
      const pattern = webRoutePattern(route.path);
      for (const method of WEB_ROUTE_METHODS) {
        router.register(method, pattern, handler);
      }
      this.log.info("web.route_configured", "web server route configured", {
        path: route.path,
        type: route.serverType
      });
    }
  }

  createWebHandler(route: WebRoute): Handler {
    if (route.serverType === "app" && route.command) {
      this.processes.start(
        {
          routePath: route.path,
          command: route.command,
          workDir: resolvePublicPath(route.publicPath, this.workflowDir)
        },
        this.abort.signal
      );
    }

    return (exchange) => {
      switch (route.serverType) {
        case "static":
          return this.handleStaticRequest(exchange, route);
        case "app":
          return this.handleAppRequest(exchange, route);
        default:
          this.log.error("web.unsupported_type", "unsupported server type", { type: route.serverType });
          writeText(exchange.response, 500, "Unsupported server type");
          return;
      }
    };
  }

  handleStaticRequest(exchange: HttpExchange, route: WebRoute): Promise<void> {
    const root = resolvePublicPath(route.publicPath, this.workflowDir);
    return serveStaticRoute(exchange, route.path, root, this.log);
  }

  async handleAppRequest(exchange: HttpExchange, route: WebRoute): Promise<void> {
    if (!route.appPort) {
      this.log.error("web.app_port_missing", "app port is required for app server type", { path: route.path });
      writeText(exchange.response, 500, "Internal Server Error");
      return;
    }
    await this.appProxy.forward(exchange, route.path, route.appPort);
  }

  /** Upgrade entry point for the owning HTTP server. Non-matching upgrades are refused. */
  handleUpgrade(request: http.IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = new URL(request.url ?? "/", "http://localhost").pathname;
    const route = this.routes().find((candidate) => matchPattern(webRoutePattern(candidate.path), pathname));
    if (!route || route.serverType !== "app" || !isWebSocketUpgrade(request)) {
      rejectUpgrade(socket, 404, "Not Found", "404 page not found");
      return;
    }
    if (!route.appPort) {
      rejectUpgrade(socket, 500, "Internal Server Error", "Internal Server Error");
      return;
    }
    const target = `${appTarget(route.appPort, "ws")}${rewriteAppPath(request.url ?? "/", route.path)}`;
    void this.websocketProxy.proxy(request, socket, head, target).catch((error: unknown) => {
      this.log.error("web.websocket_proxy_failed", "WebSocket proxy failed", { error: errorMessage(error) });
      socket.destroy();
    });
  }

  bindAddress(): { host: string; port: number } {
    const settings = this.workflow.settings;
    const envHost = resolveEnvironment(this.env).bindHost;
    const host =
      envHost ??
      (this.options.host?.trim() || settings.webServer?.hostIp?.trim() || settings.hostIp?.trim() || DEFAULT_HOST);
    if (this.options.port !== undefined) {
      return { host, port: this.options.port };
    }
    const workflowPort = settings.webServer?.portNum ?? settings.portNum;
    return { host, port: workflowPort !== undefined && workflowPort > 0 ? workflowPort : DEFAULT_PORT };
  }

  async start(): Promise<string> {
    if (!this.workflow.settings.webServer) {
      throw new Error("webServer configuration is required");
    }
    if (this.server && this.url) {
      return this.url;
    }

    const router = createRouter();
    router.use(errorHandlerMiddleware(this.options.debug ?? resolveEnvironment(this.env).debug, this.log));
    this.registerRoutesOn(router);

    const { host, port } = this.bindAddress();
    const timeouts = this.options.timeouts;
    const server = http.createServer((request, response) => {
      const exchange = createExchange(request, response);
      void router.serve(exchange).catch((error: unknown) => {
        this.log.error("http.unhandled", "unhandled request failure", {
          path: exchange.url.pathname,
          error: errorMessage(error)
        });
        if (!response.headersSent) {
          respondWithError(exchange, error);
        } else {
          response.destroy();
        }
      });
    });
    server.requestTimeout = timeouts?.readMs ?? HTTP_READ_TIMEOUT_MS;
    server.setTimeout(timeouts?.writeMs ?? HTTP_WRITE_TIMEOUT_MS);
    server.keepAliveTimeout = timeouts?.idleMs ?? HTTP_IDLE_TIMEOUT_MS;
    server.on("upgrade", (request: http.IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(request, socket, head);
    });

    this.log.info("web.starting", "starting web server", { addr: `${host}:${port}` });
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });

    const address = server.address();
    const boundPort = address && typeof address === "object" ? address.port : port;
    const displayHost = host === "0.0.0.0" || host === "::" ? "127.0.0.1" : host;
    this.server = server;
    this.url = `http://${displayHost}:${boundPort}`;
    return this.url;
  }

  /** Kills app commands only; the listener keeps running. */
  stop(): void {
    this.log.info("web.stopping", "stopping web server and cleaning up commands");
    this.processes.stop();
  }

  async shutdown(): Promise<void> {
    this.processes.stop();
    this.abort.abort();
    this.websocketProxy.closeAll();
    this.appProxy.close();
    const server = this.server;
    this.server = null;
    this.url = undefined;
    if (!server) {
      return;
    }
    this.log.info("web.shutdown", "shutting down web server");
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }
}

export function createWebServer(options: WebServerOptions): WebServer {
  return new WebServer(options);
}
