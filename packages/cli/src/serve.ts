import fs from "node:fs";
import path from "node:path";
import {
  createApiServer,
  createFileWatcher,
  createRuntimeLog,
  createWebServer,
  createWorkflowParser,
  errorMessage,
  portNum,
  resolveEnvironment,
  type ApiServer,
  type GatewayConfig,
  type RuntimeLog,
  type Workflow,
  type WebServer,
  type WorkflowExecutor
} from "@wfgate/core";
import { createEchoExecutor } from "./executor.js";
import { loadExecutorModule } from "./module-loader.js";

export interface ServeParams {
  config: GatewayConfig;
  workflowPath?: string;
  devMode?: boolean;
  port?: number;
  executorModule?: string;
  env?: NodeJS.ProcessEnv;
  log?: RuntimeLog;
  executor?: WorkflowExecutor;
}

export interface GatewayHandle {
  workflow: Workflow;
  apiServer: ApiServer | null;
  webServer: WebServer | null;
  apiUrl?: string;
  webUrl?: string;
  stop(): Promise<void>;
}

function print(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function resolveServeWorkflowPath(explicit: string | undefined, config: GatewayConfig): string {
  const candidate = explicit ?? config.workflowPath;
  if (candidate) {
    const resolved = path.resolve(candidate);
    if (fs.existsSync(resolved) && fs.statSync(resolved).isDirectory()) {
      return path.join(resolved, "workflow.yaml");
    }
    return resolved;
  }
  return path.resolve("workflow.yaml");
}

/**
 * Parses the workflow and starts the servers it asks for. When both servers
 * would share one port, the web routes are mounted on the API server.
 */
export async function startGateway(params: ServeParams): Promise<GatewayHandle> {
  const config = params.config;
  const env = params.env ?? process.env;
  const log =
    params.log ??
    createRuntimeLog({
      debug: config.debug ?? resolveEnvironment(env).debug,
      observability: config.observability
    });
  const workflowPath = resolveServeWorkflowPath(params.workflowPath, config);
  const parser = createWorkflowParser();
  const workflow = await parser.parseWorkflow(workflowPath);
  const devMode = params.devMode ?? config.api?.devMode ?? false;

  const executorModule = params.executorModule ?? config.executorModule;
  const executor = params.executor ?? (executorModule ? await loadExecutorModule(executorModule) : createEchoExecutor());

  const settings = workflow.settings;
  const webEnabled = config.web?.enabled ?? settings.webServerMode ?? false;
  const apiEnabled = settings.apiServerMode ?? !webEnabled;
  const apiPort = params.port ?? config.api?.port ?? portNum(settings);

  let apiServer: ApiServer | null = null;
  let webServer: WebServer | null = null;
  let apiUrl: string | undefined;
  let webUrl: string | undefined;

  if (webEnabled) {
    webServer = createWebServer({
      workflow,
      log,
      env,
      host: config.web?.host,
      port: config.web?.port,
      debug: config.debug,
      timeouts: config.timeouts
    });
    webServer.setWorkflowDir(workflowPath);
  }

  if (apiEnabled) {
    apiServer = createApiServer({
      workflow,
      executor,
      log,
      parser,
      watcher: devMode ? createFileWatcher({ log }) : undefined,
      workflowPath,
      env,
      config: {
        ...config,
        api: { ...config.api, port: apiPort, devMode }
      }
    });

    const sharedWeb = webServer;
    if (sharedWeb && sharedWeb.bindAddress().port === apiPort) {
      apiServer.addRouteContributor((router) => sharedWeb.registerRoutesOn(router));
      apiServer.setUpgradeHandler((request, socket, head) => sharedWeb.handleUpgrade(request, socket, head));
      apiServer.onStop(() => sharedWeb.shutdown());
      webServer = null;
      log.info("web.mounted", "web routes mounted on the API server", { port: apiPort });
    }
    apiUrl = await apiServer.start();
    if (sharedWeb && !webServer) {
      webUrl = apiUrl;
    }
  }

  if (webServer) {
    webUrl = await webServer.start();
  }

  const startedApi = apiServer;
  const startedWeb = webServer;
  return {
    workflow,
    apiServer: startedApi,
    webServer: startedWeb,
    apiUrl,
    webUrl,
    async stop() {
      if (startedWeb) {
        await startedWeb.shutdown();
      }
      if (startedApi) {
        await startedApi.stop();
      }
    }
  };
}

export async function runServe(params: ServeParams): Promise<number> {
  let handle: GatewayHandle;
  try {
    handle = await startGateway(params);
  } catch (error) {
    process.stderr.write(`Failed to start: ${errorMessage(error)}\n`);
    return 1;
  }

  const { workflow } = handle;
  print(`[wfgate] workflow: ${workflow.metadata.name} ${workflow.metadata.version}`.trimEnd());
  if (handle.apiUrl) {
    print(`[wfgate] api: ${handle.apiUrl}`);
  }
  if (handle.webUrl) {
    print(`[wfgate] web: ${handle.webUrl}`);
  }

  return await new Promise<number>((resolveExit) => {
    let settled = false;
    const settle = (code: number): void => {
      if (settled) {
        return;
      }
      settled = true;
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolveExit(code);
    };

    function onSignal(): void {
      handle.stop().then(
        () => settle(0),
        (error: unknown) => {
          process.stderr.write(`Shutdown failed: ${errorMessage(error)}\n`);
          settle(1);
        }
      );
    }

    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}
