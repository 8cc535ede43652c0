import fs from "node:fs";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { parseGatewayConfig, type GatewayConfig } from "@wfgate/core";
import { parse as parseDotEnv } from "dotenv";
import { importTypeScriptModule, unwrapModuleDefault } from "./module-loader.js";

export interface LoadedCliConfig {
  projectRoot: string;
  configPath: string | null;
  gatewayConfig: GatewayConfig;
}

const CONFIG_CANDIDATES = [
  "wfgate.config.ts",
  "wfgate.config.mts",
  "wfgate.config.js",
  "wfgate.config.mjs",
  "wfgate.config.json"
];

function resolveMaybePath(projectRoot: string, filePath: string | undefined): string | undefined {
  if (!filePath) {
    return undefined;
  }
  if (path.isAbsolute(filePath)) {
    return filePath;
  }
  return path.resolve(projectRoot, filePath);
}

export function loadProjectEnvFiles(projectRoot: string, env: NodeJS.ProcessEnv = process.env): void {
  // Keep explicit shell/CI env vars authoritative over local files.
  const shellDefined = new Set(Object.keys(env));
  const merged: Record<string, string> = {};
  for (const candidate of [".env", ".env.local"]) {
    const filePath = path.join(projectRoot, candidate);
    if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
      continue;
    }
    const parsed = parseDotEnv(fs.readFileSync(filePath, "utf8"));
    for (const [key, value] of Object.entries(parsed)) {
      merged[key] = value;
    }
  }

  for (const [key, value] of Object.entries(merged)) {
    if (shellDefined.has(key)) {
      continue;
    }
    env[key] = value;
  }
}

async function readConfigFile(configPath: string): Promise<GatewayConfig> {
  if (configPath.endsWith(".json")) {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
    return parseGatewayConfig(parsed, configPath);
  }

  const loaded: unknown =
    configPath.endsWith(".ts") || configPath.endsWith(".mts")
      ? await importTypeScriptModule(configPath)
      : await import(pathToFileURL(configPath).href);
  const unwrapped = unwrapModuleDefault(loaded);
  const exported =
    unwrapped && typeof unwrapped === "object" && "config" in unwrapped
      ? unwrapped.config
      : unwrapped && typeof unwrapped === "object" && "default" in unwrapped
        ? unwrapModuleDefault(unwrapped.default)
        : unwrapped;
  if (!exported || typeof exported !== "object") {
    throw new Error(`Invalid config export from ${configPath}`);
  }
  return parseGatewayConfig(exported, configPath);
}

function normalizeConfig(projectRoot: string, config: GatewayConfig): GatewayConfig {
  return {
    ...config,
    workflowPath: resolveMaybePath(projectRoot, config.workflowPath),
    executorModule: resolveMaybePath(projectRoot, config.executorModule),
    uploads: config.uploads
      ? {
          ...config.uploads,
          directory: resolveMaybePath(projectRoot, config.uploads.directory)
        }
      : undefined,
    observability: config.observability
      ? {
          ...config.observability,
          directory:
            resolveMaybePath(projectRoot, config.observability.directory) ??
            path.join(projectRoot, ".wfgate", "observability")
        }
      : undefined
  };
}

export async function loadCliConfig(
  projectRoot = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedCliConfig> {
  const resolvedRoot = path.resolve(projectRoot);
  loadProjectEnvFiles(resolvedRoot, env);
  let configPath: string | null = null;
  for (const candidate of CONFIG_CANDIDATES) {
    const absolute = path.join(resolvedRoot, candidate);
    if (fs.existsSync(absolute) && fs.statSync(absolute).isFile()) {
      configPath = absolute;
      break;
    }
  }

  const rawConfig: GatewayConfig = configPath ? await readConfigFile(configPath) : {};
  return {
    projectRoot: resolvedRoot,
    configPath,
    gatewayConfig: normalizeConfig(resolvedRoot, rawConfig)
  };
}
