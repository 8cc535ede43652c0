export {
  CONTAINER_WORKFLOW_PATH,
  DEFAULT_HOST,
  DEFAULT_MAX_UPLOAD_BYTES,
  DEFAULT_PORT,
  MANAGEMENT_BASE_PATH,
  MANAGEMENT_TOKEN_ENV,
  MAX_PACKAGE_BYTES,
  MAX_WORKFLOW_BYTES
} from "./constants.js";
export { defineConfig, gatewayConfigSchema, parseGatewayConfig, resolveEnvironment } from "./config.js";
export { AppError, PackageExtractionError, WorkflowParseError, errorMessage, isAppError, statusForCode } from "./errors.js";
export { createRuntimeLog, RuntimeLog } from "./log.js";
export { parseBool } from "./helpers.js";

export { createRouter, createExchange, matchPattern, Router } from "./http/router.js";
export {
  corsMiddleware,
  debugModeMiddleware,
  errorHandlerMiddleware,
  isDebugEnvironment,
  requestIdMiddleware,
  sessionMiddleware,
  uploadLimitMiddleware
} from "./http/middleware.js";
export { respondWithError, respondWithSuccess, respondWithValidationErrors } from "./http/response.js";
export { buildRequestContext, clientIp } from "./http/request-context.js";

export { ApiServer, createApiServer } from "./server/api-server.js";
export { registerManagementRoutes, handleManagementStatus } from "./management/routes.js";
export { requireManagementAuth, envManagementToken } from "./management/auth.js";
export { clearResourcesDirectory, extractPackage, safeEntryPath } from "./management/package-extract.js";
export { buildPackage, packDirectory } from "./management/package-build.js";
export { createWebServer, WebServer, webRoutePattern } from "./web/web-server.js";
export { AppProcessTable } from "./web/app-processes.js";
export { createFileWatcher, FsFileWatcher } from "./watch/file-watcher.js";
export { createTemporaryFileStore, sanitizeFilename, TemporaryFileStore } from "./uploads/file-store.js";
export { detectContentType, UploadHandler } from "./uploads/upload-handler.js";
export { createWorkflowParser, YamlWorkflowParser } from "./workflow/parser.js";
export { workflowSchema } from "./workflow/schema.js";
export { corsSettings, hostIp, portNum, workflowSummary } from "./workflow/types.js";

export type {
  GatewayApiConfig,
  GatewayConfig,
  GatewayEnvironment,
  GatewayManagementConfig,
  GatewayObservabilityConfig,
  GatewayTimeoutsConfig,
  GatewayUploadsConfig,
  GatewayWebConfig
} from "./config.js";
export type { AppErrorCode, AppErrorOptions } from "./errors.js";
export type { GatewayRuntimeEvent, GatewayRuntimeEventHandler, LogLevel, RuntimeLogOptions } from "./log.js";
export type { ExchangeLocals, Handler, HttpExchange, Middleware } from "./http/router.js";
export type { ErrorDetail, ErrorEnvelope, SuccessEnvelope, ValidationIssue } from "./http/response.js";
export type { ApiServerOptions, ReloadResult, RouteContributor, UpgradeHandler } from "./server/api-server.js";
export type { ManagementRouteOptions, ManagementTarget } from "./management/routes.js";
export type { ExtractPackageOptions, ExtractPackageResult } from "./management/package-extract.js";
export type { PackageEntry } from "./management/package-build.js";
export type { WebServerOptions } from "./web/web-server.js";
export type { FileWatcher, FsFileWatcherOptions, WatchCallback } from "./watch/file-watcher.js";
export type { FileStore, TemporaryFileStoreOptions, UploadedFile } from "./uploads/file-store.js";
export type { UploadResult } from "./uploads/upload-handler.js";
export type {
  CorsSettings,
  FileUpload,
  HttpMethod,
  RequestContext,
  Resource,
  Route,
  WebRoute,
  Workflow,
  WorkflowExecutor,
  WorkflowParser,
  WorkflowSettings
} from "./workflow/types.js";
