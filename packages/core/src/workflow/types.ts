import type { z } from "zod";
import { DEFAULT_HOST, DEFAULT_PORT } from "../constants.js";
import type {
  corsSchema,
  HTTP_METHODS,
  resourceSchema,
  routeSchema,
  settingsSchema,
  webRouteSchema,
  workflowSchema
} from "./schema.js";

export type HttpMethod = (typeof HTTP_METHODS)[number];
export type Route = z.infer<typeof routeSchema>;
export type CorsSettings = z.infer<typeof corsSchema>;
export type WebRoute = z.infer<typeof webRouteSchema>;
export type WorkflowSettings = z.infer<typeof settingsSchema>;
export type Resource = z.infer<typeof resourceSchema>;

/** Parsed workflow. Never mutated once handed to a server; reloads swap the whole object. */
export type Workflow = Readonly<z.infer<typeof workflowSchema>>;

export interface FileUpload {
  name: string;
  path: string;
  mimeType: string;
  size: number;
}

export interface RequestContext {
  method: string;
  path: string;
  headers: Record<string, string>;
  query: Record<string, string>;
  body: Record<string, unknown>;
  files: FileUpload[];
  ip: string;
  id: string;
  /** Filled from the session cookie, or by the executor when it opens a session. */
  sessionId: string;
}

export interface WorkflowParser {
  parseWorkflow(filePath: string): Promise<Workflow>;
}

export interface WorkflowExecutor {
  execute(workflow: Workflow, request: RequestContext): Promise<unknown> | unknown;
}

export function hostIp(settings: WorkflowSettings): string {
  return settings.hostIp?.trim() || DEFAULT_HOST;
}

export function portNum(settings: WorkflowSettings): number {
  const port = settings.portNum;
  return port !== undefined && port > 0 ? port : DEFAULT_PORT;
}

export function corsSettings(settings: WorkflowSettings): CorsSettings {
  return settings.apiServer?.cors ?? { enableCors: true, allowOrigins: ["*"] };
}

export function workflowSummary(workflow: Workflow): { name: string; version: string } {
  return {
    name: workflow.metadata.name,
    version: workflow.metadata.version
  };
}
