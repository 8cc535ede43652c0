import fs from "node:fs";
import http from "node:http";
import type { Duplex } from "node:stream";
import path from "node:path";
import type { GatewayConfig } from "../config.js";
import { resolveEnvironment } from "../config.js";
import {
  CONTAINER_WORKFLOW_PATH,
  DEFAULT_MAX_UPLOAD_BYTES,
  HTTP_IDLE_TIMEOUT_MS,
  HTTP_READ_TIMEOUT_MS,
  HTTP_WRITE_TIMEOUT_MS
} from "../constants.js";
import { AppError, errorMessage } from "../errors.js";
import { isRecord, parseBool, writeJson } from "../helpers.js";
import {
  corsMiddleware,
  debugModeMiddleware,
  errorHandlerMiddleware,
  requestIdMiddleware,
  sessionMiddleware,
  uploadLimitMiddleware
} from "../http/middleware.js";
import { buildRequestContext, isMultipart, readBodyFields } from "../http/request-context.js";
import { respondWithError, respondWithSuccess, setSessionCookie } from "../http/response.js";
import { createExchange, createRouter, type HttpExchange, type Router } from "../http/router.js";
import { createRuntimeLog, type RuntimeLog } from "../log.js";
import { registerManagementRoutes, type ManagementRouteOptions } from "../management/routes.js";
import { createTemporaryFileStore, type FileStore, type UploadedFile } from "../uploads/file-store.js";
import { UploadHandler } from "../uploads/upload-handler.js";
import type { FileWatcher } from "../watch/file-watcher.js";
import { createWorkflowParser } from "../workflow/parser.js";
import {
  corsSettings,
  hostIp,
  portNum,
  workflowSummary,
  type FileUpload,
  type RequestContext,
  type Workflow,
  type WorkflowExecutor,
  type WorkflowParser
} from "../workflow/types.js";

export interface ApiServerOptions {
  workflow: Workflow;
  executor: WorkflowExecutor;
  log?: RuntimeLog;
  parser?: WorkflowParser;
  watcher?: FileWatcher;
  fileStore?: FileStore;
  workflowPath?: string;
  env?: NodeJS.ProcessEnv;
  config?: GatewayConfig;
  /** Checked when no workflow path is known. Defaults to "/app". */
  containerRoot?: string;
  managementLimits?: ManagementRouteOptions;
}

export interface ReloadResult {
  ok: boolean;
  workflow?: Workflow;
  error?: string;
}

export type RouteContributor = (router: Router, workflow: Workflow) => void;
export type UpgradeHandler = (request: http.IncomingMessage, socket: Duplex, head: Buffer) => void;

interface ServingSnapshot {
  readonly workflow: Workflow;
  readonly router: Router;
}

function toFileUpload(file: UploadedFile): FileUpload {
  return {
    name: file.filename,
    path: file.path,
    mimeType: file.contentType,
    size: file.size
  };
}

export class ApiServer {
  private snapshot: ServingSnapshot;
  private readonly executor: WorkflowExecutor;
  private readonly log: RuntimeLog;
  private readonly watcher: FileWatcher | null;
  private readonly fileStore: FileStore;
  private readonly uploadHandler: UploadHandler;
  private readonly env: NodeJS.ProcessEnv;
  private readonly config: GatewayConfig;
  private readonly containerRoot: string;
  private readonly managementLimits: ManagementRouteOptions;
  private readonly routeContributors: RouteContributor[] = [];
  private readonly stopHooks: Array<() => Promise<void>> = [];
  private parser: WorkflowParser | null;
  private workflowPath: string | null;
  private reloadChain: Promise<ReloadResult> = Promise.resolve({ ok: true });
  private upgradeHandler: UpgradeHandler | null = null;
  private server: http.Server | null = null;
  private url: string | undefined;

  constructor(options: ApiServerOptions) {
    this.executor = options.executor;
    this.log = options.log ?? createRuntimeLog();
    this.watcher = options.watcher ?? null;
    this.env = options.env ?? process.env;
    this.config = options.config ?? {};
    this.containerRoot = options.containerRoot ?? "/app";
    this.managementLimits = options.managementLimits ?? {};
    this.parser = options.parser ?? null;
    this.workflowPath = options.workflowPath ? path.resolve(options.workflowPath) : null;
    this.fileStore =
      options.fileStore ??
      createTemporaryFileStore({
        baseDir: this.config.uploads?.directory,
        ttlMs: this.config.uploads?.ttlMs,
        sweepIntervalMs: this.config.uploads?.sweepIntervalMs,
        log: this.log
      });
    this.uploadHandler = new UploadHandler(this.fileStore, this.maxUploadBytes());
    this.snapshot = {
      workflow: options.workflow,
      router: this.buildRouter(options.workflow)
    };
  }

  getWorkflow(): Workflow {
    return this.snapshot.workflow;
  }

  getRouter(): Router {
    return this.snapshot.router;
  }

  getUrl(): string | undefined {
    return this.url;
  }

  getLog(): RuntimeLog {
    return this.log;
  }

  getEnv(): NodeJS.ProcessEnv {
    return this.env;
  }

  /** Configured token first, then KDEPS_MANAGEMENT_TOKEN; read on every call. */
  managementToken(): string | null {
    const configured = this.config.management?.token?.trim();
    if (configured) {
      return configured;
    }
    return resolveEnvironment(this.env).managementToken;
  }

  hasWorkflowPath(): boolean {
    return this.workflowPath !== null;
  }

  setWorkflowPath(workflowPath: string): void {
    this.workflowPath = path.resolve(workflowPath);
  }

  resolveWorkflowPath(): string {
    if (this.workflowPath) {
      return this.workflowPath;
    }
    if (fs.existsSync(this.containerRoot) && fs.statSync(this.containerRoot).isDirectory()) {
      return path.join(this.containerRoot, path.basename(CONTAINER_WORKFLOW_PATH));
    }
    return path.resolve("workflow.yaml");
  }

  /** Adds routes to every router built from now on, including the current one. */
  addRouteContributor(contributor: RouteContributor): void {
    this.routeContributors.push(contributor);
    const { workflow } = this.snapshot;
    this.snapshot = {
      workflow,
      router: this.buildRouter(workflow)
    };
  }

  setUpgradeHandler(handler: UpgradeHandler | null): void {
    this.upgradeHandler = handler;
  }

  onStop(hook: () => Promise<void>): void {
    this.stopHooks.push(hook);
  }

  async handleRequest(exchange: HttpExchange, workflow: Workflow): Promise<void> {
    let uploaded: UploadedFile[] = [];
    let fields: Record<string, unknown> | null = null;
    if (isMultipart(exchange.request.headers["content-type"])) {
      try {
        const result = await this.uploadHandler.handleUpload(exchange.request);
        uploaded = result.files;
        fields = { ...result.fields };
      } catch (error) {
        respondWithError(exchange, new AppError("BAD_REQUEST", `File upload failed: ${errorMessage(error)}`));
        return;
      }
    }

    try {
      const context = await this.parseRequest(exchange, uploaded, fields);
      let result: unknown;
      try {
        result = await this.executor.execute(workflow, context);
      } catch (error) {
        this.adoptSession(exchange, context);
        this.log.error("workflow.execution_failed", "workflow execution failed", {
          path: exchange.url.pathname,
          method: exchange.request.method,
          requestId: exchange.locals.requestId,
          error: errorMessage(error)
        });
        respondWithError(exchange, error);
        return;
      }
      this.adoptSession(exchange, context);
      this.writeResult(exchange, result);
    } finally {
      await this.releaseUploads(uploaded);
    }
  }

  async parseRequest(
    exchange: HttpExchange,
    uploaded: UploadedFile[] = [],
    multipartFields: Record<string, unknown> | null = null
  ): Promise<RequestContext> {
    const body = multipartFields ?? (await readBodyFields(exchange, this.maxUploadBytes()));
    return buildRequestContext(exchange, {
      body,
      files: uploaded.map(toFileUpload)
    });
  }

  handleHealth(exchange: HttpExchange, workflow: Workflow): void {
    writeJson(exchange.response, 200, {
      status: "ok",
      workflow: workflowSummary(workflow)
    });
  }

  /**
   * Re-parses the workflow file and swaps in a fresh router. Calls are queued;
   * a failed parse leaves the serving snapshot untouched.
   */
  reloadWorkflow(): Promise<ReloadResult> {
    const run = (): Promise<ReloadResult> => this.performReload();
    const next = this.reloadChain.then(run, run);
    this.reloadChain = next;
    return next;
  }

  async setupHotReload(): Promise<void> {
    if (!this.watcher) {
      throw new Error("no watcher configured");
    }
    const workflowPath = this.resolveWorkflowPath();
    this.workflowPath = workflowPath;

    try {
      await this.watcher.watch(workflowPath, () => this.reloadFromWatch("workflow file changed"));
    } catch (error) {
      throw new Error(`failed to watch workflow file: ${errorMessage(error)}`, { cause: error });
    }

    const resourcesPath = path.join(path.dirname(workflowPath), "resources");
    try {
      await this.watcher.watch(resourcesPath, () => this.reloadFromWatch("resources changed"));
    } catch (error) {
      this.log.warn("watcher.resources_skipped", "failed to watch resources directory", {
        path: resourcesPath,
        error: errorMessage(error)
      });
    }
  }

  async start(): Promise<string> {
    if (this.server && this.url) {
      return this.url;
    }
    const settings = this.snapshot.workflow.settings;
    const host = this.config.api?.host?.trim() || hostIp(settings);
    const port = this.config.api?.port ?? portNum(settings);
    const timeouts = this.config.timeouts;

    const server = http.createServer((request, response) => {
      const { router } = this.snapshot;
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
      if (this.upgradeHandler) {
        this.upgradeHandler(request, socket, head);
        return;
      }
      socket.destroy();
    });

    if (this.config.api?.devMode && this.watcher) {
      try {
        await this.setupHotReload();
      } catch (error) {
        this.log.warn("watcher.setup_failed", "failed to setup hot reload", {
          error: errorMessage(error)
        });
      }
    }

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
    this.log.info("api.started", "api server listening", {
      host,
      port: boundPort,
      workflow: this.snapshot.workflow.metadata.name
    });
    return this.url;
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    this.url = undefined;
    for (const hook of this.stopHooks) {
      try {
        await hook();
      } catch (error) {
        this.log.warn("api.stop_hook_failed", "stop hook failed", { error: errorMessage(error) });
      }
    }
    if (this.watcher) {
      await this.watcher.close();
    }
    await this.fileStore.close();
    if (!server) {
      return;
    }
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeIdleConnections();
    });
    this.log.info("api.stopped", "api server stopped");
  }

  private maxUploadBytes(): number {
    return this.config.api?.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  }

  private buildRouter(workflow: Workflow): Router {
    const router = createRouter();
    router.use(requestIdMiddleware());
    router.use(
      this.config.debug === undefined
        ? debugModeMiddleware(this.env, this.log)
        : errorHandlerMiddleware(this.config.debug, this.log)
    );
    router.use(sessionMiddleware());
    router.use(uploadLimitMiddleware(this.maxUploadBytes()));
    router.use(corsMiddleware(corsSettings(workflow.settings)));

    router.get("/health", (exchange) => this.handleHealth(exchange, workflow));
    for (const route of workflow.settings.apiServer?.routes ?? []) {
      for (const method of route.methods) {
        router.register(method, route.path, (exchange) => this.handleRequest(exchange, workflow));
      }
    }
    if (this.config.management?.enabled ?? true) {
      registerManagementRoutes(router, this, this.managementLimits);
    }
    for (const contributor of this.routeContributors) {
      contributor(router, workflow);
    }
    return router;
  }

  private async performReload(): Promise<ReloadResult> {
    if (!this.parser) {
      this.parser = createWorkflowParser();
    }

    let workflowPath = this.workflowPath;
    let workflow: Workflow;
    let router: Router;
    try {
      workflowPath = this.resolveWorkflowPath();
      this.workflowPath = workflowPath;
      workflow = await this.parser.parseWorkflow(workflowPath);
      router = this.buildRouter(workflow);
    } catch (error) {
      const message = `failed to parse workflow: ${errorMessage(error)}`;
      this.log.error("workflow.reload_failed", "workflow reload failed", {
        path: workflowPath,
        error: errorMessage(error)
      });
      return { ok: false, error: message };
    }

    this.snapshot = { workflow, router };
    this.log.info("workflow.reloaded", "workflow reloaded", {
      name: workflow.metadata.name,
      version: workflow.metadata.version,
      resources: workflow.resources.length
    });
    return { ok: true, workflow };
  }

  private async reloadFromWatch(reason: string): Promise<void> {
    this.log.info("workflow.change_detected", `${reason}, reloading`);
    const result = await this.reloadWorkflow();
    if (!result.ok) {
      // no retry; the next change event tries again
      this.log.error("reload.failed", "watch-triggered reload failed", {
        reason,
        error: result.error
      });
    }
  }

  private adoptSession(exchange: HttpExchange, context: RequestContext): void {
    if (context.sessionId && context.sessionId !== exchange.locals.sessionId) {
      exchange.locals.sessionId = context.sessionId;
    }
  }

  private writeResult(exchange: HttpExchange, result: unknown): void {
    if (!isRecord(result) || !("success" in result)) {
      respondWithSuccess(exchange, result);
      return;
    }

    const success = parseBool(result.success) ?? false;
    const meta: Record<string, unknown> = {};
    const rawMeta = result._meta;
    if (rawMeta instanceof Map) {
      for (const [key, value] of rawMeta) {
        if (typeof key === "string" && typeof value === "string") {
          exchange.response.setHeader(key, value);
        }
      }
    } else if (isRecord(rawMeta)) {
      for (const [key, value] of Object.entries(rawMeta)) {
        if (key !== "headers") {
          meta[key] = value;
          continue;
        }
        if (isRecord(value)) {
          for (const [headerName, headerValue] of Object.entries(value)) {
            if (typeof headerValue === "string") {
              exchange.response.setHeader(headerName, headerValue);
            }
          }
        }
      }
    }

    if (!success) {
      respondWithError(exchange, new AppError("RESOURCE_FAILED", "API response indicated failure"));
      return;
    }

    let payload: string;
    try {
      payload = JSON.stringify({
        success: true,
        data: result.data,
        meta: {
          ...meta,
          requestID: exchange.locals.requestId ?? "",
          timestamp: new Date().toISOString()
        }
      });
    } catch (error) {
      this.log.error("api.marshal_failed", "failed to marshal API response", {
        path: exchange.url.pathname,
        error: errorMessage(error)
      });
      respondWithError(
        exchange,
        new AppError("INTERNAL_ERROR", `failed to marshal API response: ${errorMessage(error)}`)
      );
      return;
    }

    if (!exchange.response.hasHeader("content-type")) {
      exchange.response.setHeader("content-type", "application/json");
    }
    if (exchange.locals.sessionId) {
      setSessionCookie(exchange, exchange.locals.sessionId);
    }
    exchange.response.statusCode = 200;
    exchange.response.end(payload);
  }

  private async releaseUploads(files: UploadedFile[]): Promise<void> {
    for (const file of files) {
      try {
        await this.fileStore.delete(file.id);
      } catch (error) {
        this.log.warn("uploads.cleanup_failed", "failed to cleanup uploaded file", {
          file: file.id,
          error: errorMessage(error)
        });
      }
    }
  }
}

export function createApiServer(options: ApiServerOptions): ApiServer {
  return new ApiServer(options);
}
