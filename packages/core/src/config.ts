import { z } from "zod";
import { BIND_HOST_ENV, DEBUG_ENV, MANAGEMENT_TOKEN_ENV } from "./constants.js";

export interface GatewayApiConfig {
  host?: string;
  port?: number;
  devMode?: boolean;
  maxUploadBytes?: number;
}

export interface GatewayWebConfig {
  enabled?: boolean;
  host?: string;
  port?: number;
}

export interface GatewayUploadsConfig {
  directory?: string;
  ttlMs?: number;
  sweepIntervalMs?: number;
}

export interface GatewayManagementConfig {
  enabled?: boolean;
  /** Falls back to KDEPS_MANAGEMENT_TOKEN when unset. */
  token?: string;
}

export interface GatewayObservabilityConfig {
  enabled?: boolean;
  directory?: string;
}

export interface GatewayTimeoutsConfig {
  readMs?: number;
  writeMs?: number;
  idleMs?: number;
  proxyResponseHeaderMs?: number;
  websocketHandshakeMs?: number;
}

export interface GatewayConfig {
  workflowPath?: string;
  executorModule?: string;
  debug?: boolean;
  api?: GatewayApiConfig;
  web?: GatewayWebConfig;
  uploads?: GatewayUploadsConfig;
  management?: GatewayManagementConfig;
  observability?: GatewayObservabilityConfig;
  timeouts?: GatewayTimeoutsConfig;
}

export function defineConfig(config: GatewayConfig): GatewayConfig {
  return config;
}

const durationMs = z.number().int().nonnegative().optional();

export const gatewayConfigSchema = z
  .object({
    workflowPath: z.string().optional(),
    executorModule: z.string().optional(),
    debug: z.boolean().optional(),
    api: z
      .object({
        host: z.string().optional(),
        port: z.number().int().nonnegative().optional(),
        devMode: z.boolean().optional(),
        maxUploadBytes: z.number().int().positive().optional()
      })
      .strict()
      .optional(),
    web: z
      .object({
        enabled: z.boolean().optional(),
        host: z.string().optional(),
        port: z.number().int().nonnegative().optional()
      })
      .strict()
      .optional(),
    uploads: z
      .object({
        directory: z.string().optional(),
        ttlMs: durationMs,
        sweepIntervalMs: durationMs
      })
      .strict()
      .optional(),
    management: z
      .object({
        enabled: z.boolean().optional(),
        token: z.string().optional()
      })
      .strict()
      .optional(),
    observability: z
      .object({
        enabled: z.boolean().optional(),
        directory: z.string().optional()
      })
      .strict()
      .optional(),
    timeouts: z
      .object({
        readMs: durationMs,
        writeMs: durationMs,
        idleMs: durationMs,
        proxyResponseHeaderMs: durationMs,
        websocketHandshakeMs: durationMs
      })
      .strict()
      .optional()
  })
  .strict();

export function parseGatewayConfig(value: unknown, source: string): GatewayConfig {
  const parsed = gatewayConfigSchema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new Error(`Invalid config in ${source}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export interface GatewayEnvironment {
  managementToken: string | null;
  bindHost: string | null;
  debug: boolean;
}

export function resolveEnvironment(env: NodeJS.ProcessEnv = process.env): GatewayEnvironment {
  const token = env[MANAGEMENT_TOKEN_ENV]?.trim();
  const bindHost = env[BIND_HOST_ENV]?.trim();
  const debug = env[DEBUG_ENV];
  return {
    managementToken: token ? token : null,
    bindHost: bindHost ? bindHost : null,
    debug: debug === "true" || debug === "1"
  };
}
