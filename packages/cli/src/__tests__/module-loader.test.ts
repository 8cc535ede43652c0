import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { loadExecutorModule, unwrapModuleDefault } from "../module-loader.js";

const tempDirs: string[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wfgate-cli-loader-"));
  tempDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("unwrapModuleDefault", () => {
  it("unwraps nested default-only namespaces", () => {
    const executor = { execute: () => null };
    expect(unwrapModuleDefault({ default: { default: executor } })).toBe(executor);
    expect(unwrapModuleDefault({ __esModule: true, default: executor })).toBe(executor);
  });

  it("stops at namespaces with other exports", () => {
    const namespace = { default: { execute: () => null }, executor: { execute: () => null } };
    expect(unwrapModuleDefault(namespace)).toBe(namespace);
    expect(unwrapModuleDefault("plain")).toBe("plain");
  });
});

describe("loadExecutorModule", () => {
  it("accepts a default-exported function", async () => {
    const modulePath = path.join(makeTempDir(), "executor.mjs");
    fs.writeFileSync(
      modulePath,
      "export default function run(workflow, request) { return `${workflow.metadata.name}:${request.path}`; }\n"
    );

    const executor = await loadExecutorModule(modulePath);
    const workflow = {
      apiVersion: "",
      kind: "Workflow",
      metadata: { name: "demo", version: "1", description: "", targetActionId: "respond" },
      settings: {},
      resources: []
    };
    const request = {
      method: "GET",
      path: "/hello",
      headers: {},
      query: {},
      body: {},
      files: [],
      ip: "127.0.0.1",
      id: "req-1",
      sessionId: ""
    };
    expect(await executor.execute(workflow, request)).toBe("demo:/hello");
  });

  it("rejects modules without an executor", async () => {
    const modulePath = path.join(makeTempDir(), "empty.mjs");
    fs.writeFileSync(modulePath, "export const answer = 42;\n");

    await expect(loadExecutorModule(modulePath)).rejects.toThrow(
      `Executor module ${modulePath} must export an executor with an execute(workflow, request) function`
    );
  });
});
