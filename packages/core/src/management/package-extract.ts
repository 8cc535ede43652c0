import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { Readable, Transform } from "node:stream";
import { pipeline } from "node:stream/promises";
import zlib from "node:zlib";
import tar from "tar-stream";
import { MAX_EXTRACTED_FILE_BYTES } from "../constants.js";
import { PackageExtractionError, errorMessage } from "../errors.js";

export interface ExtractPackageOptions {
  maxFileBytes?: number;
}

export interface ExtractPackageResult {
  files: string[];
  directories: string[];
  skipped: string[];
}

const GZIP_MAGIC = [0x1f, 0x8b];

/** Cleaned, archive-relative path, or null when the entry escapes the destination. */
export function safeEntryPath(name: string): string | null {
  let cleaned = path.posix.normalize(name);
  if (cleaned.length > 1 && cleaned.endsWith("/")) {
    cleaned = cleaned.slice(0, -1);
  }
  if (path.posix.isAbsolute(cleaned) || cleaned.startsWith("..")) {
    return null;
  }
  return cleaned;
}

// Content past the limit is dropped; the entry is still consumed to the end.
function capBytes(limit: number): Transform {
  let written = 0;
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      const room = limit - written;
      if (room <= 0) {
        callback();
        return;
      }
      const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
      written += slice.length;
      callback(null, slice);
    }
  });
}

async function writeEntry(targetPath: string, source: Readable, limit: number): Promise<void> {
  const handle = await fsp.open(targetPath, fs.constants.O_CREAT | fs.constants.O_WRONLY | fs.constants.O_TRUNC, 0o600);
  await pipeline(source, capBytes(limit), handle.createWriteStream());
}

/**
 * Extracts a gzip-compressed tar archive over `destDir`. Directories and
 * regular files are written; links and device entries are skipped. The first
 * failing entry aborts the extraction.
 */
export function extractPackage(
  data: Buffer,
  destDir: string,
  options: ExtractPackageOptions = {}
): Promise<ExtractPackageResult> {
  const limit = options.maxFileBytes ?? MAX_EXTRACTED_FILE_BYTES;
  if (data.length < 10 || GZIP_MAGIC.some((byte, index) => data[index] !== byte)) {
    return Promise.reject(new PackageExtractionError("invalid package: not a valid gzip archive: invalid header"));
  }

  const result: ExtractPackageResult = { files: [], directories: [], skipped: [] };
  const extract = tar.extract();
  const gunzip = zlib.createGunzip();

  return new Promise<ExtractPackageResult>((resolve, reject) => {
    let settled = false;
    const fail = (error: PackageExtractionError) => {
      if (settled) {
        return;
      }
      settled = true;
      gunzip.destroy();
      extract.destroy();
      reject(error);
    };

    extract.on("entry", (header, stream, next) => {
      const relPath = safeEntryPath(header.name);
      if (relPath === null) {
        stream.resume();
        fail(new PackageExtractionError(`invalid path in package: ${header.name}`));
        return;
      }
      const targetPath = path.join(destDir, relPath);

      void (async () => {
        if (header.type === "directory") {
          stream.resume();
          try {
            await fsp.mkdir(targetPath, { recursive: true, mode: 0o750 });
          } catch (error) {
            throw new PackageExtractionError(`failed to create directory ${relPath}: ${errorMessage(error)}`, {
              cause: error
            });
          }
          result.directories.push(relPath);
          return;
        }
        if (header.type !== "file" && header.type !== "contiguous-file") {
          stream.resume();
          result.skipped.push(relPath);
          return;
        }
        try {
          await fsp.mkdir(path.dirname(targetPath), { recursive: true, mode: 0o750 });
        } catch (error) {
          stream.resume();
          throw new PackageExtractionError(
            `failed to create parent directory for ${relPath}: ${errorMessage(error)}`,
            { cause: error }
          );
        }
        try {
          await writeEntry(targetPath, stream, limit);
        } catch (error) {
          throw new PackageExtractionError(`failed to extract ${relPath}: ${errorMessage(error)}`, { cause: error });
        }
        result.files.push(relPath);
      })().then(
        () => {
          if (!settled) {
            next();
          }
        },
        (error: unknown) => {
          fail(
            error instanceof PackageExtractionError
              ? error
              : new PackageExtractionError(errorMessage(error), { cause: error })
          );
        }
      );
    });

    const onStreamError = (error: unknown) => {
      fail(new PackageExtractionError(`failed to read archive entry: ${errorMessage(error)}`, { cause: error }));
    };
    gunzip.on("error", onStreamError);
    extract.on("error", onStreamError);
    extract.on("finish", () => {
      if (!settled) {
        settled = true;
        resolve(result);
      }
    });

    Readable.from([data]).pipe(gunzip).pipe(extract);
  });
}

/** Removes `*.yaml` and `*.yml` files directly inside `dir`. A missing directory is fine. */
export async function clearResourcesDirectory(dir: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fsp.readdir(dir, { withFileTypes: true });
  } catch {
    return [];
  }
  const removed: string[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    if (!entry.name.endsWith(".yaml") && !entry.name.endsWith(".yml")) {
      continue;
    }
    try {
      await fsp.rm(path.join(dir, entry.name), { force: true });
      removed.push(entry.name);
    } catch {
      // best effort, the parser still reads the pushed workflow first
    }
  }
  return removed;
}
