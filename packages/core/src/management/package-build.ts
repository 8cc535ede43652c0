import fsp from "node:fs/promises";
import path from "node:path";
import zlib from "node:zlib";
import tar from "tar-stream";

export interface PackageEntry {
  name: string;
  content?: Buffer | string;
  type?: "file" | "directory";
}

const SKIPPED_DIRECTORIES = new Set([".git", "node_modules"]);

/** Packs entries into a gzip-compressed tar archive, in the given order. */
export async function buildPackage(entries: PackageEntry[]): Promise<Buffer> {
  const pack = tar.pack();
  const chunks: Buffer[] = [];
  const collected = new Promise<Buffer>((resolve, reject) => {
    pack.on("data", (chunk: Buffer) => chunks.push(chunk));
    pack.on("end", () => resolve(Buffer.concat(chunks)));
    pack.on("error", reject);
  });

  for (const entry of entries) {
    if (entry.type === "directory") {
      pack.entry({ name: entry.name, type: "directory", mode: 0o755 });
      continue;
    }
    const content = typeof entry.content === "string" ? Buffer.from(entry.content) : entry.content ?? Buffer.alloc(0);
    pack.entry({ name: entry.name, size: content.length, mode: 0o644 }, content);
  }
  pack.finalize();

  return zlib.gzipSync(await collected);
}

async function collectEntries(root: string, relative: string, entries: PackageEntry[]): Promise<void> {
  const directory = path.join(root, relative);
  const children = await fsp.readdir(directory, { withFileTypes: true });
  children.sort((left, right) => left.name.localeCompare(right.name));
  for (const child of children) {
    const name = relative ? `${relative}/${child.name}` : child.name;
    if (child.isDirectory()) {
      if (SKIPPED_DIRECTORIES.has(child.name)) {
        continue;
      }
      entries.push({ name, type: "directory" });
      await collectEntries(root, name, entries);
      continue;
    }
    if (child.isFile()) {
      entries.push({ name, content: await fsp.readFile(path.join(root, name)) });
    }
  }
}

/** Archives a workflow directory (workflow file, resources, data trees). */
export async function packDirectory(directory: string): Promise<Buffer> {
  const entries: PackageEntry[] = [];
  await collectEntries(path.resolve(directory), "", entries);
  return buildPackage(entries);
}
