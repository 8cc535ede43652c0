export { parseArgs, stringFlag } from "./args.js";
export { loadCliConfig, loadProjectEnvFiles } from "./config.js";
export { createEchoExecutor } from "./executor.js";
export { importProjectModule, loadExecutorModule, unwrapModuleDefault } from "./module-loader.js";
export { describePushFailure, fetchStatus, normalizeTarget, preparePushBody, pushToTarget } from "./push.js";
export { resolveServeWorkflowPath, runServe, startGateway } from "./serve.js";

export type { ParsedArgs } from "./args.js";
export type { LoadedCliConfig } from "./config.js";
export type { PushKind, PushParams, PushResult } from "./push.js";
export type { GatewayHandle, ServeParams } from "./serve.js";
