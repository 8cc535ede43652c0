import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ApiServer, createRuntimeLog, createWorkflowParser } from "@wfgate/core";
import { afterEach, describe, expect, it } from "vitest";
import { describePushFailure, fetchStatus, normalizeTarget, pushToTarget } from "../push.js";

const TOKEN = "test-secret";
const tempDirs: string[] = [];
const servers: ApiServer[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wfgate-cli-push-"));
  tempDirs.push(dir);
  return dir;
}

function workflowYaml(version: string): string {
  return ["metadata:", "  name: pushed", `  version: ${version}`, "  targetActionId: respond", ""].join("\n");
}

async function startTarget(env: NodeJS.ProcessEnv = { KDEPS_MANAGEMENT_TOKEN: TOKEN }): Promise<{
  dir: string;
  server: ApiServer;
  target: string;
}> {
  const dir = makeTempDir();
  const workflowPath = path.join(dir, "workflow.yaml");
  fs.writeFileSync(workflowPath, workflowYaml("1.0.0"));
  const server = new ApiServer({
    workflow: await createWorkflowParser().parseWorkflow(workflowPath),
    executor: { execute: () => null },
    workflowPath,
    env,
    log: createRuntimeLog({ sink: "silent" }),
    config: {
      api: { host: "127.0.0.1", port: 0 },
      uploads: { directory: path.join(dir, "uploads"), sweepIntervalMs: 0 }
    }
  });
  servers.push(server);
  const url = await server.start();
  return { dir, server, target: url.replace("http://", "") };
}

afterEach(async () => {
  for (const server of servers.splice(0)) {
    await server.stop();
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("push", () => {
  it("sends a workflow file and reports the new version", async () => {
    const { target, server } = await startTarget();
    const source = path.join(makeTempDir(), "workflow.yaml");
    fs.writeFileSync(source, workflowYaml("2.0.0"));

    const result = await pushToTarget({ source, target, token: TOKEN, env: {} });
    expect(result).toEqual({
      kind: "workflow",
      message: "workflow updated and reloaded",
      workflow: { name: "pushed", version: "2.0.0" }
    });
    expect(server.getWorkflow().metadata.version).toBe("2.0.0");
  });

  it("packs a directory and takes the token from the environment", async () => {
    const { dir, target, server } = await startTarget();
    const source = makeTempDir();
    fs.writeFileSync(path.join(source, "workflow.yaml"), workflowYaml("3.0.0"));
    fs.mkdirSync(path.join(source, "data"));
    fs.writeFileSync(path.join(source, "data", "faq.txt"), "Q&A");

    const result = await pushToTarget({ source, target, env: { KDEPS_MANAGEMENT_TOKEN: ` ${TOKEN} ` } });
    expect(result.kind).toBe("package");
    expect(result.message).toBe("package extracted and workflow reloaded");
    expect(server.getWorkflow().metadata.version).toBe("3.0.0");
    expect(fs.readFileSync(path.join(dir, "data", "faq.txt"), "utf8")).toBe("Q&A");
  });

  it("explains rejected tokens and disabled targets", async () => {
    const source = path.join(makeTempDir(), "workflow.yaml");
    fs.writeFileSync(source, workflowYaml("2.0.0"));

    const secured = await startTarget();
    await expect(pushToTarget({ source, target: secured.target, token: "wrong", env: {} })).rejects.toThrow(
      "unauthorized: the management token was rejected"
    );

    const disabled = await startTarget({});
    await expect(pushToTarget({ source, target: disabled.target, token: TOKEN, env: {} })).rejects.toThrow(
      "management API disabled on the target: set KDEPS_MANAGEMENT_TOKEN there"
    );
  });

  it("reads the status endpoint", async () => {
    const { target } = await startTarget();
    expect(await fetchStatus(target)).toEqual({
      status: "ok",
      workflow: { name: "pushed", version: "1.0.0", description: "", targetActionId: "respond", resources: 0 }
    });
  });
});

describe("push helpers", () => {
  it("normalizes targets", () => {
    expect(normalizeTarget("localhost:16395/")).toBe("http://localhost:16395");
    expect(normalizeTarget("https://agents.example.test")).toBe("https://agents.example.test");
  });

  it("describes failures from the management payload", () => {
    expect(describePushFailure(413, JSON.stringify({ status: "error", message: "too big" }))).toBe(
      "payload too large: too big"
    );
    expect(describePushFailure(422, JSON.stringify({ status: "error", message: "bad yaml" }))).toBe(
      "target rejected the update: bad yaml"
    );
    expect(describePushFailure(500, "boom\n")).toBe("push failed with status 500: boom");
  });
});
