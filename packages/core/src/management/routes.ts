import fsp from "node:fs/promises";
import path from "node:path";
import { MANAGEMENT_BASE_PATH, MAX_PACKAGE_BYTES, MAX_WORKFLOW_BYTES } from "../constants.js";
import { errorMessage } from "../errors.js";
import { readRequestBodyCapped, writeJson } from "../helpers.js";
import type { HttpExchange, Router } from "../http/router.js";
import type { RuntimeLog } from "../log.js";
import type { Workflow } from "../workflow/types.js";
import { requireManagementAuth, type ManagementTokenSource } from "./auth.js";
import { clearResourcesDirectory, extractPackage, type ExtractPackageResult } from "./package-extract.js";

export interface ManagementReloadResult {
  ok: boolean;
  workflow?: Workflow;
  error?: string;
}

/** The slice of the API server the management endpoints operate on. */
export interface ManagementTarget {
  getWorkflow(): Workflow;
  getLog(): RuntimeLog;
  hasWorkflowPath(): boolean;
  resolveWorkflowPath(): string;
  setWorkflowPath(workflowPath: string): void;
  reloadWorkflow(): Promise<ManagementReloadResult>;
  managementToken(): string | null;
}

export interface ManagementRouteOptions {
  maxWorkflowBytes?: number;
  maxPackageBytes?: number;
  maxExtractedFileBytes?: number;
}

class ManagementFailure extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = "ManagementFailure";
    this.statusCode = statusCode;
  }
}

function respondManagementError(exchange: HttpExchange, log: RuntimeLog, statusCode: number, message: string): void {
  log.error("management.error", "management API error", {
    status: statusCode,
    message,
    path: exchange.url.pathname
  });
  writeJson(exchange.response, statusCode, { status: "error", message });
}

function respondManagementOk(exchange: HttpExchange, message: string, workflow: Workflow): void {
  writeJson(exchange.response, 200, {
    status: "ok",
    message,
    workflow: {
      name: workflow.metadata.name,
      version: workflow.metadata.version
    }
  });
}

async function readManagementBody(exchange: HttpExchange, maxBytes: number, tooLargeMessage: string): Promise<Buffer> {
  let body: Buffer;
  let exceeded: boolean;
  try {
    ({ body, exceeded } = await readRequestBodyCapped(exchange.request, maxBytes));
  } catch (error) {
    throw new ManagementFailure(400, `failed to read request body: ${errorMessage(error)}`);
  }
  if (body.length === 0) {
    throw new ManagementFailure(400, "request body is empty");
  }
  if (exceeded) {
    throw new ManagementFailure(413, tooLargeMessage);
  }
  return body;
}

async function ensureWorkflowDirectory(directory: string): Promise<void> {
  try {
    await fsp.mkdir(directory, { recursive: true, mode: 0o750 });
  } catch (error) {
    throw new ManagementFailure(500, `failed to create workflow directory: ${errorMessage(error)}`);
  }
}

export function handleManagementStatus(exchange: HttpExchange, target: ManagementTarget): void {
  const workflow = target.getWorkflow();
  writeJson(exchange.response, 200, {
    status: "ok",
    workflow: {
      name: workflow.metadata.name,
      version: workflow.metadata.version,
      description: workflow.metadata.description,
      targetActionId: workflow.metadata.targetActionId,
      resources: workflow.resources.length
    }
  });
}

export async function handleManagementUpdateWorkflow(
  exchange: HttpExchange,
  target: ManagementTarget,
  maxBytes = MAX_WORKFLOW_BYTES
): Promise<void> {
  const log = target.getLog();
  try {
    const body = await readManagementBody(
      exchange,
      maxBytes,
      `workflow YAML exceeds maximum allowed size of ${maxBytes} bytes`
    );
    const workflowPath = target.resolveWorkflowPath();
    await ensureWorkflowDirectory(path.dirname(workflowPath));
    try {
      await fsp.writeFile(workflowPath, body, { mode: 0o600 });
    } catch (error) {
      throw new ManagementFailure(500, `failed to write workflow file: ${errorMessage(error)}`);
    }

    // Resources now live inline in the pushed file; stale fragments would be merged back in.
    const cleared = await clearResourcesDirectory(path.join(path.dirname(workflowPath), "resources"));
    if (!target.hasWorkflowPath()) {
      target.setWorkflowPath(workflowPath);
    }
    log.info("management.workflow.updated", "workflow file written", {
      path: workflowPath,
      bytes: body.length,
      clearedResources: cleared.length
    });

    const reload = await target.reloadWorkflow();
    if (!reload.ok || !reload.workflow) {
      throw new ManagementFailure(422, `workflow written but failed to reload: ${reload.error ?? "unknown error"}`);
    }
    respondManagementOk(exchange, "workflow updated and reloaded", reload.workflow);
  } catch (error) {
    if (error instanceof ManagementFailure) {
      respondManagementError(exchange, log, error.statusCode, error.message);
      return;
    }
    throw error;
  }
}

export async function handleManagementUpdatePackage(
  exchange: HttpExchange,
  target: ManagementTarget,
  options: ManagementRouteOptions = {}
): Promise<void> {
  const log = target.getLog();
  const maxBytes = options.maxPackageBytes ?? MAX_PACKAGE_BYTES;
  try {
    const body = await readManagementBody(exchange, maxBytes, `package exceeds maximum allowed size of ${maxBytes} bytes`);
    const workflowPath = target.resolveWorkflowPath();
    const destDir = path.dirname(workflowPath);
    await ensureWorkflowDirectory(destDir);

    let extracted: ExtractPackageResult;
    try {
      extracted = await extractPackage(body, destDir, { maxFileBytes: options.maxExtractedFileBytes });
    } catch (error) {
      throw new ManagementFailure(422, `failed to extract package: ${errorMessage(error)}`);
    }
    if (!target.hasWorkflowPath()) {
      target.setWorkflowPath(workflowPath);
    }
    log.info("management.package.extracted", "package extracted", {
      destination: destDir,
      bytes: body.length,
      files: extracted.files.length,
      directories: extracted.directories.length,
      skipped: extracted.skipped.length
    });

    const reload = await target.reloadWorkflow();
    if (!reload.ok || !reload.workflow) {
      throw new ManagementFailure(422, `package extracted but failed to reload: ${reload.error ?? "unknown error"}`);
    }
    respondManagementOk(exchange, "package extracted and workflow reloaded", reload.workflow);
  } catch (error) {
    if (error instanceof ManagementFailure) {
      respondManagementError(exchange, log, error.statusCode, error.message);
      return;
    }
    throw error;
  }
}

export async function handleManagementReload(exchange: HttpExchange, target: ManagementTarget): Promise<void> {
  const log = target.getLog();
  const reload = await target.reloadWorkflow();
  if (!reload.ok || !reload.workflow) {
    respondManagementError(exchange, log, 500, `failed to reload workflow: ${reload.error ?? "unknown error"}`);
    return;
  }
  log.info("management.reload", "workflow reloaded on request", {
    name: reload.workflow.metadata.name,
    version: reload.workflow.metadata.version
  });
  respondManagementOk(exchange, "workflow reloaded", reload.workflow);
}

export function registerManagementRoutes(
  router: Router,
  target: ManagementTarget,
  options: ManagementRouteOptions = {}
): void {
  const tokenSource: ManagementTokenSource = () => target.managementToken();
  router.get(`${MANAGEMENT_BASE_PATH}/status`, (exchange) => handleManagementStatus(exchange, target));
  router.put(
    `${MANAGEMENT_BASE_PATH}/workflow`,
    requireManagementAuth(
      (exchange) => handleManagementUpdateWorkflow(exchange, target, options.maxWorkflowBytes),
      tokenSource
    )
  );
  router.put(
    `${MANAGEMENT_BASE_PATH}/package`,
    requireManagementAuth((exchange) => handleManagementUpdatePackage(exchange, target, options), tokenSource)
  );
  router.post(
    `${MANAGEMENT_BASE_PATH}/reload`,
    requireManagementAuth((exchange) => handleManagementReload(exchange, target), tokenSource)
  );
}
