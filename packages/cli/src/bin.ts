#!/usr/bin/env node

import { errorMessage } from "@wfgate/core";
import { parseArgs, stringFlag } from "./args.js";
import { loadCliConfig } from "./config.js";
import { fetchStatus, pushToTarget } from "./push.js";
import { runServe } from "./serve.js";

function printHelp(): void {
  process.stdout.write(
    [
      "wfgate commands:",
      "  wfgate serve [workflow.yaml|dir] [--dev] [--port <n>] [--executor <module>]",
      "  wfgate push <workflow.yaml|dir|package.kdeps> <target> [--token <token>]",
      "  wfgate status <target>"
    ].join("\n") + "\n"
  );
}

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const [command, ...rest] = argv;

  if (!command || command === "help" || command === "--help" || command === "-h") {
    printHelp();
    return 0;
  }

  const parsed = parseArgs(rest);
  if ("error" in parsed) {
    process.stderr.write(`${parsed.error}\n`);
    return 1;
  }

  if (command === "serve") {
    const loaded = await loadCliConfig();
    const portValue = stringFlag(parsed, "--port");
    const port = portValue === undefined ? undefined : Number.parseInt(portValue, 10);
    if (port !== undefined && (!Number.isInteger(port) || port < 0 || port > 65535)) {
      process.stderr.write(`Invalid --port value: ${portValue ?? ""}\n`);
      return 1;
    }
    return await runServe({
      config: loaded.gatewayConfig,
      workflowPath: parsed.positionals[0],
      devMode: parsed.flags.has("--dev") ? true : undefined,
      port,
      executorModule: stringFlag(parsed, "--executor")
    });
  }

  if (command === "push") {
    const [source, target] = parsed.positionals;
    if (!source || !target) {
      process.stderr.write("Usage: wfgate push <workflow.yaml|dir|package.kdeps> <target> [--token <token>]\n");
      return 1;
    }
    await loadCliConfig();
    try {
      const result = await pushToTarget({ source, target, token: stringFlag(parsed, "--token") });
      const workflow = result.workflow;
      const summary = workflow ? ` (${[workflow.name, workflow.version].filter(Boolean).join(" ")})` : "";
      process.stdout.write(`${result.message}${summary}\n`);
      return 0;
    } catch (error) {
      process.stderr.write(`${errorMessage(error)}\n`);
      return 1;
    }
  }

  if (command === "status") {
    const [target] = parsed.positionals;
    if (!target) {
      process.stderr.write("Usage: wfgate status <target>\n");
      return 1;
    }
    try {
      const status = await fetchStatus(target);
      process.stdout.write(`${JSON.stringify(status, null, 2)}\n`);
      return 0;
    } catch (error) {
      process.stderr.write(`${errorMessage(error)}\n`);
      return 1;
    }
  }

  printHelp();
  return 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
