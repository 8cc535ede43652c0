import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import type { GatewayConfig } from "../config.js";
import { AppError } from "../errors.js";
import { createRuntimeLog } from "../log.js";
import { ApiServer } from "../server/api-server.js";
import { createWorkflowParser } from "../workflow/parser.js";
import type { RequestContext, Workflow, WorkflowExecutor } from "../workflow/types.js";

const tempDirs: string[] = [];
const servers: ApiServer[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wfgate-api-"));
  tempDirs.push(dir);
  return dir;
}

function workflowYaml(name: string, version: string, routes: string[]): string {
  return [
    "metadata:",
    `  name: ${name}`,
    `  version: ${version}`,
    "  targetActionId: respond",
    "settings:",
    "  apiServer:",
    "    routes:",
    ...routes.flatMap((route) => [`      - path: ${route}`, "        methods: [GET, POST]"]),
    ""
  ].join("\n");
}

async function loadWorkflow(dir: string, yaml: string): Promise<{ workflow: Workflow; workflowPath: string }> {
  const workflowPath = path.join(dir, "workflow.yaml");
  fs.writeFileSync(workflowPath, yaml);
  return { workflow: await createWorkflowParser().parseWorkflow(workflowPath), workflowPath };
}

function testConfig(dir: string, overrides: GatewayConfig = {}): GatewayConfig {
  return {
    ...overrides,
    api: { host: "127.0.0.1", port: 0, ...overrides.api },
    uploads: { directory: path.join(dir, "uploads"), sweepIntervalMs: 0 }
  };
}

async function startServer(
  dir: string,
  executor: WorkflowExecutor,
  overrides: GatewayConfig = {},
  env: NodeJS.ProcessEnv = {}
): Promise<{ server: ApiServer; baseUrl: string }> {
  const { workflow, workflowPath } = await loadWorkflow(dir, workflowYaml("echo", "1.0.0", ["/api/v1/echo"]));
  const server = new ApiServer({
    workflow,
    executor,
    workflowPath,
    log: createRuntimeLog({ sink: "silent" }),
    env,
    config: testConfig(dir, overrides)
  });
  servers.push(server);
  return { server, baseUrl: await server.start() };
}

afterEach(async () => {
  for (const server of servers.splice(0)) {
    await server.stop();
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("api server requests", () => {
  it("serves health with the workflow summary", async () => {
    const { baseUrl } = await startServer(makeTempDir(), { execute: () => null });

    const response = await fetch(`${baseUrl}/health`);
    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "ok", workflow: { name: "echo", version: "1.0.0" } });
  });

  it("builds the request context and wraps plain results", async () => {
    const seen: RequestContext[] = [];
    const { baseUrl } = await startServer(makeTempDir(), {
      execute: (_workflow, request) => {
        seen.push(request);
        return { answer: 42 };
      }
    });

    const response = await fetch(`${baseUrl}/api/v1/echo?q=hi&q=ignored`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "x-request-id": "req-7",
        "x-forwarded-for": "203.0.113.9, 10.0.0.1"
      },
      body: JSON.stringify({ message: "hello" })
    });
    expect(response.status).toBe(200);
    const payload = (await response.json()) as { success: boolean; data: unknown; meta: { requestID: string } };
    expect(payload.success).toBe(true);
    expect(payload.data).toEqual({ answer: 42 });
    expect(payload.meta.requestID).toBe("req-7");

    const context = seen[0];
    expect(context?.method).toBe("POST");
    expect(context?.path).toBe("/api/v1/echo");
    expect(context?.query).toEqual({ q: "hi" });
    expect(context?.body).toEqual({ message: "hello" });
    expect(context?.ip).toBe("203.0.113.9");
    expect(context?.id).toBe("req-7");
    expect(context?.files).toEqual([]);
  });

  it("reads url-encoded forms", async () => {
    const seen: RequestContext[] = [];
    const { baseUrl } = await startServer(makeTempDir(), {
      execute: (_workflow, request) => {
        seen.push(request);
        return "ok";
      }
    });

    await fetch(`${baseUrl}/api/v1/echo`, {
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded" },
      body: "name=Ada&name=Grace&lang=en"
    });
    expect(seen[0]?.body).toEqual({ name: "Ada", lang: "en" });
  });

  it("unwraps success envelopes and applies response headers from _meta", async () => {
    const { baseUrl } = await startServer(makeTempDir(), {
      execute: () => ({
        success: "true",
        data: { reply: "hi" },
        _meta: { model: "test-model", headers: { "x-workflow": "echo", "cache-control": "no-store" } }
      })
    });

    const response = await fetch(`${baseUrl}/api/v1/echo`);
    expect(response.status).toBe(200);
    expect(response.headers.get("x-workflow")).toBe("echo");
    expect(response.headers.get("cache-control")).toBe("no-store");
    const payload = (await response.json()) as { success: boolean; data: unknown; meta: Record<string, unknown> };
    expect(payload.data).toEqual({ reply: "hi" });
    expect(payload.meta.model).toBe("test-model");
    expect(payload.meta.headers).toBeUndefined();
  });

  it("turns an unsuccessful result into a resource failure", async () => {
    const { baseUrl } = await startServer(makeTempDir(), {
      execute: () => ({ success: false, data: { reason: "upstream" } })
    });

    const response = await fetch(`${baseUrl}/api/v1/echo`);
    expect(response.status).toBe(500);
    const payload = (await response.json()) as { success: boolean; error: { code: string; message: string } };
    expect(payload.success).toBe(false);
    expect(payload.error).toEqual({ code: "RESOURCE_FAILED", message: "API response indicated failure" });
  });

  it("hides executor failures unless debug is on", async () => {
    const failing: WorkflowExecutor = {
      execute: () => {
        throw new Error("model offline");
      }
    };
    const quiet = await startServer(makeTempDir(), failing);
    const hidden = await fetch(`${quiet.baseUrl}/api/v1/echo`);
    expect(hidden.status).toBe(500);
    const hiddenPayload = (await hidden.json()) as { error: { message: string } };
    expect(hiddenPayload.error.message).toBe("Internal server error");
    expect(quiet.server.getLog().listEvents().some((event) => event.type === "workflow.execution_failed")).toBe(true);

    const verbose = await startServer(makeTempDir(), failing, { debug: true });
    const shown = await fetch(`${verbose.baseUrl}/api/v1/echo`);
    const shownPayload = (await shown.json()) as { error: { message: string } };
    expect(shownPayload.error.message).toBe("Internal server error: model offline");
  });

  it("takes debug mode from the DEBUG variable when the config leaves it unset", async () => {
    const failing: WorkflowExecutor = {
      execute: () => {
        throw new Error("model offline");
      }
    };
    const { baseUrl } = await startServer(makeTempDir(), failing, {}, { DEBUG: "1" });
    const response = await fetch(`${baseUrl}/api/v1/echo`);
    const payload = (await response.json()) as { error: { message: string; details: unknown } };
    expect(payload.error.message).toBe("Internal server error: model offline");
    expect(payload.error.details).toEqual({ error: "model offline" });

    const overridden = await startServer(makeTempDir(), failing, { debug: false }, { DEBUG: "1" });
    const hidden = await fetch(`${overridden.baseUrl}/api/v1/echo`);
    const hiddenPayload = (await hidden.json()) as { error: { message: string } };
    expect(hiddenPayload.error.message).toBe("Internal server error");
  });

  it("renders executor validation failures field by field", async () => {
    const { baseUrl } = await startServer(makeTempDir(), {
      execute: (_workflow, request) => {
        const rejected = new AppError("VALIDATION_ERROR", "input rejected");
        if (request.query.plain === "1") {
          throw rejected;
        }
        throw rejected.withDetails({
          errors: [
            { field: "q", type: "required", message: "q is required" },
            { field: "limit", type: "max", message: "limit must be at most 10", value: 50 }
          ]
        });
      }
    });

    const response = await fetch(`${baseUrl}/api/v1/echo`);
    expect(response.status).toBe(400);
    const payload = (await response.json()) as { success: boolean; error: unknown; meta: { path: string } };
    expect(payload.success).toBe(false);
    expect(payload.error).toEqual({
      code: "VALIDATION_ERROR",
      message: "Validation failed",
      details: {
        errors: [
          { field: "q", type: "required", message: "q is required" },
          { field: "limit", type: "max", message: "limit must be at most 10", value: 50 }
        ]
      }
    });
    expect(payload.meta.path).toBe("/api/v1/echo");

    const plain = await fetch(`${baseUrl}/api/v1/echo?plain=1`);
    expect(plain.status).toBe(400);
    const plainPayload = (await plain.json()) as { error: unknown };
    expect(plainPayload.error).toEqual({ code: "VALIDATION_ERROR", message: "input rejected" });
  });

  it("passes uploads to the executor and removes them afterwards", async () => {
    const dir = makeTempDir();
    let uploadedPath = "";
    let existedDuringExecution = false;
    const { baseUrl } = await startServer(dir, {
      execute: (_workflow, request) => {
        const file = request.files[0];
        uploadedPath = file?.path ?? "";
        existedDuringExecution = fs.existsSync(uploadedPath);
        return { files: request.files.map((entry) => [entry.name, entry.size, entry.mimeType]), body: request.body };
      }
    });

    const form = new FormData();
    form.append("file", new Blob(["report body"], { type: "text/markdown" }), "report.md");
    form.append("title", "Quarterly");
    const response = await fetch(`${baseUrl}/api/v1/echo`, { method: "POST", body: form });
    expect(response.status).toBe(200);
    const payload = (await response.json()) as { data: { files: unknown[]; body: unknown } };
    expect(payload.data.files).toEqual([["report.md", 11, "text/markdown"]]);
    expect(payload.data.body).toEqual({ title: "Quarterly" });
    expect(existedDuringExecution).toBe(true);
    expect(path.dirname(uploadedPath)).toBe(path.join(dir, "uploads"));
    expect(fs.existsSync(uploadedPath)).toBe(false);
  });

  it("propagates a session opened by the executor as a cookie", async () => {
    const { baseUrl } = await startServer(makeTempDir(), {
      execute: (_workflow, request) => {
        request.sessionId = "sess-1";
        return { success: true, data: "ok" };
      }
    });

    const response = await fetch(`${baseUrl}/api/v1/echo`);
    expect(response.headers.get("set-cookie")).toBe(
      "kdeps_session_id=sess-1; Path=/; Max-Age=3600; HttpOnly; SameSite=Lax"
    );
  });

  it("answers 405 and 404 outside the declared routes", async () => {
    const { baseUrl } = await startServer(makeTempDir(), { execute: () => null });

    const wrongMethod = await fetch(`${baseUrl}/api/v1/echo`, { method: "DELETE" });
    expect(wrongMethod.status).toBe(405);
    expect(wrongMethod.headers.get("allow")).toBe("GET, POST");

    const missing = await fetch(`${baseUrl}/api/v1/other`);
    expect(missing.status).toBe(404);
  });
});
