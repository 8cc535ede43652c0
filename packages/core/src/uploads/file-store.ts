import crypto from "node:crypto";
import fs from "node:fs";
import fsp from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { UPLOAD_DIRECTORY_NAME, UPLOAD_SWEEP_INTERVAL_MS, UPLOAD_TTL_MS } from "../constants.js";
import { errorMessage } from "../errors.js";
import type { RuntimeLog } from "../log.js";

export interface UploadedFile {
  id: string;
  filename: string;
  contentType: string;
  size: number;
  path: string;
  uploadedAt: Date;
  metadata: Record<string, string>;
}

export interface FileStore {
  store(filename: string, content: Buffer, contentType: string): Promise<UploadedFile>;
  get(id: string): UploadedFile;
  getPath(id: string): string;
  delete(id: string): Promise<void>;
  cleanup(ttlMs: number): Promise<void>;
  close(): Promise<void>;
}

export interface TemporaryFileStoreOptions {
  baseDir?: string;
  ttlMs?: number;
  sweepIntervalMs?: number;
  log?: RuntimeLog;
}

export function defaultUploadDirectory(): string {
  return path.join(os.tmpdir(), UPLOAD_DIRECTORY_NAME);
}

/** Base name only, with either separator style removed. */
export function sanitizeFilename(filename: string): string {
  const base = path.posix.basename(filename.replace(/\\/g, "/")).trim();
  if (!base || base === "." || base === "..") {
    return "file";
  }
  return base;
}

let idSequence = 0;

function uploadId(content: Buffer): string {
  idSequence = (idSequence + 1) % Number.MAX_SAFE_INTEGER;
  return crypto
    .createHash("sha256")
    .update(content)
    .update(`${Date.now()}:${process.hrtime.bigint()}:${idSequence}`)
    .digest("hex")
    .slice(0, 16);
}

export class TemporaryFileStore implements FileStore {
  private readonly baseDir: string;
  private readonly files = new Map<string, UploadedFile>();
  private readonly log?: RuntimeLog;
  private sweepTimer: NodeJS.Timeout | null = null;
  private closed = false;

  constructor(options: TemporaryFileStoreOptions = {}) {
    this.baseDir = path.resolve(options.baseDir ?? defaultUploadDirectory());
    this.log = options.log;
    fs.mkdirSync(this.baseDir, { recursive: true, mode: 0o750 });

    const ttlMs = options.ttlMs ?? UPLOAD_TTL_MS;
    const intervalMs = options.sweepIntervalMs ?? UPLOAD_SWEEP_INTERVAL_MS;
    if (intervalMs > 0) {
      this.sweepTimer = setInterval(() => {
        this.cleanup(ttlMs).catch((error: unknown) => {
          this.log?.warn("uploads.sweep_failed", "upload sweep failed", {
            error: errorMessage(error)
          });
        });
      }, intervalMs);
      this.sweepTimer.unref();
    }
  }

  size(): number {
    return this.files.size;
  }

  async store(filename: string, content: Buffer, contentType: string): Promise<UploadedFile> {
    if (this.closed) {
      throw new Error("file store is closed");
    }
    const id = uploadId(content);
    const safeFilename = sanitizeFilename(filename);
    const filePath = path.join(this.baseDir, `${id}_${safeFilename}`);
    try {
      await fsp.writeFile(filePath, content, { mode: 0o600 });
    } catch (error) {
      throw new Error(`failed to write file: ${errorMessage(error)}`, { cause: error });
    }

    const file: UploadedFile = {
      id,
      filename: safeFilename,
      contentType,
      size: content.length,
      path: filePath,
      uploadedAt: new Date(),
      metadata: {}
    };
    this.files.set(id, file);
    return file;
  }

  get(id: string): UploadedFile {
    const file = this.files.get(id);
    if (!file) {
      throw new Error(`file not found: ${id}`);
    }
    return file;
  }

  getPath(id: string): string {
    return this.get(id).path;
  }

  async delete(id: string): Promise<void> {
    const file = this.get(id);
    this.files.delete(id);
    try {
      await fsp.rm(file.path, { force: true });
    } catch (error) {
      throw new Error(`failed to delete file: ${errorMessage(error)}`, { cause: error });
    }
  }

  async cleanup(ttlMs: number): Promise<void> {
    const cutoff = Date.now() - ttlMs;
    const expired: UploadedFile[] = [];
    for (const [id, file] of this.files) {
      if (file.uploadedAt.getTime() <= cutoff) {
        expired.push(file);
        this.files.delete(id);
      }
    }
    await Promise.all(expired.map((file) => this.removeQuietly(file.path)));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const remaining = Array.from(this.files.values());
    this.files.clear();
    await Promise.all(remaining.map((file) => this.removeQuietly(file.path)));
  }

  private async removeQuietly(filePath: string): Promise<void> {
    try {
      await fsp.rm(filePath, { force: true });
    } catch (error) {
      this.log?.debug("uploads.remove_failed", "failed to remove upload", {
        path: filePath,
        error: errorMessage(error)
      });
    }
  }
}

export function createTemporaryFileStore(options: TemporaryFileStoreOptions = {}): TemporaryFileStore {
  return new TemporaryFileStore(options);
}
