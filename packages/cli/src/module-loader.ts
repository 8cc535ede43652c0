import { pathToFileURL } from "node:url";
import type { RequestContext, Workflow, WorkflowExecutor } from "@wfgate/core";

const MAX_UNWRAP_DEPTH = 8;

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}

export function unwrapModuleDefault(value: unknown): unknown {
  let current = value;

  for (let depth = 0; depth < MAX_UNWRAP_DEPTH; depth += 1) {
    if (!isRecord(current)) {
      break;
    }
    if (!("default" in current)) {
      break;
    }

    const keys = Object.keys(current);
    const defaultOnly = keys.length === 1 && keys[0] === "default";
    const defaultWithEsModule =
      keys.length === 2 && keys.includes("default") && keys.includes("__esModule");
    if (!defaultOnly && !defaultWithEsModule) {
      break;
    }

    const next = current.default;
    if (next === undefined || next === current) {
      break;
    }
    current = next;
  }

  return current;
}

export async function importTypeScriptModule(filePath: string): Promise<unknown> {
  const { tsImport } = await import("tsx/esm/api");
  const moduleUrl = pathToFileURL(filePath).href;
  return await tsImport(moduleUrl, {
    parentURL: moduleUrl
  });
}

export async function importProjectModule(filePath: string): Promise<unknown> {
  if (/\.(c|m)?tsx?$/.test(filePath)) {
    return await importTypeScriptModule(filePath);
  }
  return await import(pathToFileURL(filePath).href);
}

function asExecutor(candidate: unknown): WorkflowExecutor | null {
  if (typeof candidate === "function") {
    return {
      execute: (workflow: Workflow, request: RequestContext): unknown => candidate(workflow, request)
    };
  }
  if (isRecord(candidate) && typeof candidate.execute === "function") {
    const execute = candidate.execute;
    return {
      execute: (workflow: Workflow, request: RequestContext): unknown => execute.call(candidate, workflow, request)
    };
  }
  return null;
}

/**
 * Loads a workflow executor from a module. Accepted exports: a default export
 * or an `executor` export, each either an object with `execute` or a plain
 * function taking `(workflow, request)`.
 */
export async function loadExecutorModule(filePath: string): Promise<WorkflowExecutor> {
  const loaded = unwrapModuleDefault(await importProjectModule(filePath));
  const candidates: unknown[] = [loaded];
  if (isRecord(loaded)) {
    candidates.unshift(loaded.executor, unwrapModuleDefault(loaded.default));
  }
  for (const candidate of candidates) {
    const executor = asExecutor(candidate);
    if (executor) {
      return executor;
    }
  }
  throw new Error(`Executor module ${filePath} must export an executor with an execute(workflow, request) function`);
}
