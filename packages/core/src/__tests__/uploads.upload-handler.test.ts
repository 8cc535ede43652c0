import fs from "node:fs";
import http from "node:http";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { AppError, errorMessage } from "../errors.js";
import { writeJson } from "../helpers.js";
import { TemporaryFileStore } from "../uploads/file-store.js";
import { detectContentType, selectUploadParts, UploadHandler } from "../uploads/upload-handler.js";

const tempDirs: string[] = [];
const servers: http.Server[] = [];

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "wfgate-upload-"));
  tempDirs.push(dir);
  return dir;
}

interface UploadSummary {
  files?: Array<{ filename: string; contentType: string; size: number; content: string }>;
  fields?: Record<string, string>;
  error?: string;
  code?: string;
}

async function startUploadServer(handler: UploadHandler): Promise<string> {
  const server = http.createServer((request, response) => {
    handler.handleUpload(request).then(
      (result) => {
        writeJson(response, 200, {
          files: result.files.map((file) => ({
            filename: file.filename,
            contentType: file.contentType,
            size: file.size,
            content: fs.readFileSync(file.path, "utf8")
          })),
          fields: result.fields
        });
      },
      (error: unknown) => {
        writeJson(response, 400, {
          error: errorMessage(error),
          code: error instanceof AppError ? error.code : undefined
        });
      }
    );
  });
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });
  servers.push(server);
  const address = server.address();
  if (!address || typeof address !== "object") {
    throw new Error("Failed to bind test server");
  }
  return `http://127.0.0.1:${address.port}/upload`;
}

afterEach(async () => {
  for (const server of servers.splice(0)) {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
  for (const dir of tempDirs.splice(0)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

describe("upload handler", () => {
  it("prefers file[] parts over a single file part", async () => {
    const store = new TemporaryFileStore({ baseDir: makeTempDir(), sweepIntervalMs: 0 });
    const url = await startUploadServer(new UploadHandler(store));

    const form = new FormData();
    form.append("file", new Blob(["single"], { type: "text/plain" }), "single.txt");
    form.append("file[]", new Blob(["first"], { type: "text/plain" }), "first.txt");
    form.append("file[]", new Blob(["second"], { type: "text/plain" }), "second.txt");
    form.append("note", "hello");
    form.append("note", "ignored");

    const response = await fetch(url, { method: "POST", body: form });
    expect(response.status).toBe(200);
    const payload = (await response.json()) as UploadSummary;
    expect(payload.files?.map((file) => file.filename)).toEqual(["first.txt", "second.txt"]);
    expect(payload.files?.map((file) => file.content)).toEqual(["first", "second"]);
    expect(payload.fields).toEqual({ note: "hello" });
    expect(store.size()).toBe(2);
    await store.close();
  });

  it("falls back to every file part when no known field is used", async () => {
    const store = new TemporaryFileStore({ baseDir: makeTempDir(), sweepIntervalMs: 0 });
    const url = await startUploadServer(new UploadHandler(store));

    const form = new FormData();
    form.append("avatar", new Blob(["a"], { type: "text/plain" }), "a.txt");
    form.append("resume", new Blob(["b"], { type: "text/plain" }), "b.txt");

    const response = await fetch(url, { method: "POST", body: form });
    const payload = (await response.json()) as UploadSummary;
    expect(payload.files?.map((file) => file.filename).sort()).toEqual(["a.txt", "b.txt"]);
    await store.close();
  });

  it("rejects files over the size limit without storing anything", async () => {
    const store = new TemporaryFileStore({ baseDir: makeTempDir(), sweepIntervalMs: 0 });
    const url = await startUploadServer(new UploadHandler(store, 8));

    const form = new FormData();
    form.append("file", new Blob(["123456789"], { type: "text/plain" }), "big.txt");

    const response = await fetch(url, { method: "POST", body: form });
    expect(response.status).toBe(400);
    const payload = (await response.json()) as UploadSummary;
    expect(payload.code).toBe("REQUEST_TOO_LARGE");
    expect(payload.error).toBe("File too large: 9 bytes (max: 8)");
    expect(store.size()).toBe(0);
    await store.close();
  });

  it("sniffs the content type when the client sends none", async () => {
    const store = new TemporaryFileStore({ baseDir: makeTempDir(), sweepIntervalMs: 0 });
    const url = await startUploadServer(new UploadHandler(store));

    const form = new FormData();
    form.append("file", new Blob(["plain words"]), "notes");

    const response = await fetch(url, { method: "POST", body: form });
    const payload = (await response.json()) as UploadSummary;
    expect(payload.files?.[0]?.contentType).toBe("text/plain; charset=utf-8");
    await store.close();
  });

  it("reports malformed multipart requests", async () => {
    const store = new TemporaryFileStore({ baseDir: makeTempDir(), sweepIntervalMs: 0 });
    const url = await startUploadServer(new UploadHandler(store));

    const response = await fetch(url, {
      method: "POST",
      headers: { "content-type": "multipart/form-data" },
      body: "no boundary here"
    });
    expect(response.status).toBe(400);
    const payload = (await response.json()) as UploadSummary;
    expect(payload.error).toBe("failed to parse multipart form: Multipart: Boundary not found");
    await store.close();
  });
});

describe("detectContentType", () => {
  it("recognizes common signatures", () => {
    expect(detectContentType(Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]))).toBe("image/png");
    expect(detectContentType(Buffer.from("%PDF-1.7"))).toBe("application/pdf");
    expect(detectContentType(Buffer.from("hello\n"))).toBe("text/plain; charset=utf-8");
    expect(detectContentType(Buffer.from([0x00, 0x01, 0x02]))).toBe("application/octet-stream");
    expect(detectContentType(Buffer.alloc(0))).toBe("application/octet-stream");
  });
});

describe("selectUploadParts", () => {
  it("picks files over file when file[] is absent", () => {
    const parts = [{ field: "file" }, { field: "files" }, { field: "files" }];
    expect(selectUploadParts(parts)).toEqual([{ field: "files" }, { field: "files" }]);
    expect(selectUploadParts([{ field: "other" }, { field: "file" }])).toEqual([{ field: "file" }]);
  });
});
