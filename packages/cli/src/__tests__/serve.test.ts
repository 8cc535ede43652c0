import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createRuntimeLog } from "@wfgate/core";
import { afterEach, describe, expect, it } from "vitest";
import { resolveServeWorkflowPath, startGateway, type GatewayHandle } from "../serve.js";

const tempDirs: string[] = [];
const handles: GatewayHandle[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wfgate-cli-serve-"));
  tempDirs.push(dir);
  return dir;
}

function writeWorkflow(dir: string, settings: string[]): string {
  const workflowPath = path.join(dir, "workflow.yaml");
  fs.writeFileSync(
    workflowPath,
    ["metadata:", "  name: served", "  version: 1.0.0", "  targetActionId: respond", "settings:", ...settings, ""].join(
      "\n"
    )
  );
  return workflowPath;
}

afterEach(async () => {
  for (const handle of handles.splice(0)) {
    await handle.stop();
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("startGateway", () => {
  it("serves API routes through the echo executor", async () => {
    const dir = makeTempDir();
    writeWorkflow(dir, ["  apiServer:", "    routes:", "      - path: /api/v1/ask", "        methods: [POST]"]);

    const handle = await startGateway({
      config: { api: { host: "127.0.0.1", port: 0 }, uploads: { directory: path.join(dir, "uploads") } },
      workflowPath: dir,
      env: {},
      log: createRuntimeLog({ sink: "silent" })
    });
    handles.push(handle);
    expect(handle.webServer).toBeNull();
    expect(handle.apiUrl).toBeDefined();

    const response = await fetch(`${handle.apiUrl ?? ""}/api/v1/ask?lang=en`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ question: "ping" })
    });
    const payload = (await response.json()) as { success: boolean; data: Record<string, unknown> };
    expect(payload.success).toBe(true);
    expect(payload.data).toEqual({
      actionId: "respond",
      workflow: "served",
      request: {
        method: "POST",
        path: "/api/v1/ask",
        query: { lang: "en" },
        body: { question: "ping" },
        files: []
      }
    });
  });

  it("mounts web routes on the API server when both share a port", async () => {
    const dir = makeTempDir();
    fs.mkdirSync(path.join(dir, "public"));
    fs.writeFileSync(path.join(dir, "public", "index.html"), "welcome");
    writeWorkflow(dir, [
      "  apiServerMode: true",
      "  webServerMode: true",
      "  webServer:",
      "    routes:",
      "      - path: /ui",
      "        serverType: static",
      "        publicPath: public"
    ]);

    const handle = await startGateway({
      config: {
        api: { host: "127.0.0.1", port: 0 },
        web: { port: 0 },
        uploads: { directory: path.join(dir, "uploads") }
      },
      workflowPath: path.join(dir, "workflow.yaml"),
      env: {},
      log: createRuntimeLog({ sink: "silent" })
    });
    handles.push(handle);
    expect(handle.webServer).toBeNull();
    expect(handle.webUrl).toBe(handle.apiUrl);

    const page = await fetch(`${handle.webUrl ?? ""}/ui/`);
    expect(await page.text()).toBe("welcome");
    const health = await fetch(`${handle.apiUrl ?? ""}/health`);
    expect(health.status).toBe(200);
  });

  it("runs only the web server when the API is switched off", async () => {
    const dir = makeTempDir();
    fs.mkdirSync(path.join(dir, "public"));
    fs.writeFileSync(path.join(dir, "public", "index.html"), "web only");
    writeWorkflow(dir, [
      "  apiServerMode: false",
      "  webServerMode: true",
      "  webServer:",
      "    routes:",
      "      - path: /",
      "        serverType: static",
      "        publicPath: public"
    ]);

    const handle = await startGateway({
      config: { web: { host: "127.0.0.1", port: 0 } },
      workflowPath: dir,
      env: {},
      log: createRuntimeLog({ sink: "silent" })
    });
    handles.push(handle);
    expect(handle.apiServer).toBeNull();
    expect(handle.apiUrl).toBeUndefined();

    const page = await fetch(`${handle.webUrl ?? ""}/`);
    expect(await page.text()).toBe("web only");
  });

  it("fails on an invalid workflow", async () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "workflow.yaml"), "metadata:\n  name: incomplete\n");

    await expect(
      startGateway({ config: {}, workflowPath: dir, env: {}, log: createRuntimeLog({ sink: "silent" }) })
    ).rejects.toThrow("metadata.targetActionId: Required");
  });
});

describe("resolveServeWorkflowPath", () => {
  it("prefers the explicit path and expands directories", () => {
    const dir = makeTempDir();
    expect(resolveServeWorkflowPath(dir, {})).toBe(path.join(dir, "workflow.yaml"));
    expect(resolveServeWorkflowPath(undefined, { workflowPath: path.join(dir, "agent.yaml") })).toBe(
      path.join(dir, "agent.yaml")
    );
    expect(resolveServeWorkflowPath(undefined, {})).toBe(path.resolve("workflow.yaml"));
  });
});
