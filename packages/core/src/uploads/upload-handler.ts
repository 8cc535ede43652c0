import http from "node:http";
import busboy from "busboy";
import { DEFAULT_MAX_UPLOAD_BYTES } from "../constants.js";
import { AppError, errorMessage } from "../errors.js";
import type { FileStore, UploadedFile } from "./file-store.js";

interface BufferedPart {
  field: string;
  filename: string;
  declaredType: string;
  content: Buffer;
  size: number;
}

export interface UploadResult {
  files: UploadedFile[];
  fields: Record<string, string>;
}

const SIGNATURES: Array<{ type: string; bytes: number[]; offset?: number }> = [
  { type: "image/png", bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a] },
  { type: "image/jpeg", bytes: [0xff, 0xd8, 0xff] },
  { type: "image/gif", bytes: [0x47, 0x49, 0x46, 0x38] },
  { type: "application/pdf", bytes: [0x25, 0x50, 0x44, 0x46, 0x2d] },
  { type: "application/zip", bytes: [0x50, 0x4b, 0x03, 0x04] },
  { type: "application/x-gzip", bytes: [0x1f, 0x8b, 0x08] },
  { type: "image/webp", bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 }
];

function looksLikeText(content: Buffer): boolean {
  const sample = content.subarray(0, 512);
  for (const byte of sample) {
    const control = byte < 0x20 && byte !== 0x09 && byte !== 0x0a && byte !== 0x0d && byte !== 0x0c && byte !== 0x1b;
    if (control || byte === 0x7f) {
      return false;
    }
  }
  return true;
}

export function detectContentType(content: Buffer): string {
  for (const signature of SIGNATURES) {
    const offset = signature.offset ?? 0;
    if (content.length < offset + signature.bytes.length) {
      continue;
    }
    if (signature.bytes.every((byte, index) => content[offset + index] === byte)) {
      return signature.type;
    }
  }
  if (content.length > 0 && looksLikeText(content)) {
    return "text/plain; charset=utf-8";
  }
  return "application/octet-stream";
}

/**
 * Picks the parts that count as uploads. `file[]` wins, then `files`, then the
 * first `file`; otherwise every file part in arrival order.
 */
export function selectUploadParts<T extends { field: string }>(parts: T[]): T[] {
  for (const field of ["file[]", "files"]) {
    const matching = parts.filter((part) => part.field === field);
    if (matching.length > 0) {
      return matching;
    }
  }
  const single = parts.find((part) => part.field === "file");
  if (single) {
    return [single];
  }
  return parts;
}

export class UploadHandler {
  private readonly store: FileStore;
  private readonly maxFileBytes: number;

  constructor(store: FileStore, maxFileBytes = DEFAULT_MAX_UPLOAD_BYTES) {
    this.store = store;
    this.maxFileBytes = maxFileBytes > 0 ? maxFileBytes : DEFAULT_MAX_UPLOAD_BYTES;
  }

  async handleUpload(request: http.IncomingMessage): Promise<UploadResult> {
    const { parts, fields } = await this.readParts(request);
    const selected = selectUploadParts(parts);

    for (const part of selected) {
      if (part.size > this.maxFileBytes) {
        throw new AppError("REQUEST_TOO_LARGE", `File too large: ${part.size} bytes (max: ${this.maxFileBytes})`, {
          details: {
            filename: part.filename,
            size: part.size,
            maxSize: this.maxFileBytes
          }
        });
      }
    }

    const files: UploadedFile[] = [];
    for (const part of selected) {
      let contentType = detectContentType(part.content);
      if (part.declaredType && part.declaredType !== "application/octet-stream") {
        contentType = part.declaredType;
      }
      try {
        files.push(await this.store.store(part.filename, part.content, contentType));
      } catch (error) {
        await this.discard(files);
        throw new Error(`failed to store file ${part.filename}: ${errorMessage(error)}`, { cause: error });
      }
    }
    return { files, fields };
  }

  private async discard(files: UploadedFile[]): Promise<void> {
    for (const file of files) {
      try {
        await this.store.delete(file.id);
      } catch {
        // best effort, the store sweep removes leftovers
      }
    }
  }

  private readParts(request: http.IncomingMessage): Promise<{ parts: BufferedPart[]; fields: Record<string, string> }> {
    return new Promise((resolve, reject) => {
      const parts: BufferedPart[] = [];
      const fields: Record<string, string> = {};
      const keepLimit = this.maxFileBytes + 1;
      let pendingStreams = 0;
      let parserClosed = false;
      const settleIfDone = () => {
        if (parserClosed && pendingStreams === 0) {
          resolve({ parts, fields });
        }
      };

      let parser: busboy.Busboy;
      try {
        parser = busboy({ headers: request.headers });
      } catch (error) {
        reject(new Error(`failed to parse multipart form: ${errorMessage(error)}`));
        return;
      }

      parser.on("file", (field, stream, info) => {
        pendingStreams += 1;
        const chunks: Buffer[] = [];
        let kept = 0;
        let size = 0;
        stream.on("data", (chunk: Buffer) => {
          size += chunk.length;
          if (kept < keepLimit) {
            const slice = chunk.subarray(0, keepLimit - kept);
            chunks.push(slice);
            kept += slice.length;
          }
        });
        stream.on("end", () => {
          parts.push({
            field,
            filename: info.filename,
            declaredType: info.mimeType,
            content: Buffer.concat(chunks),
            size
          });
          pendingStreams -= 1;
          settleIfDone();
        });
      });
      parser.on("field", (name, value) => {
        if (!(name in fields)) {
          fields[name] = value;
        }
      });
      parser.on("error", (error: unknown) => {
        reject(new Error(`failed to parse multipart form: ${errorMessage(error)}`));
      });
      parser.on("close", () => {
        parserClosed = true;
        settleIfDone();
      });
      request.pipe(parser);
    });
  }
}
