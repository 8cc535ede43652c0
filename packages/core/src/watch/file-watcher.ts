import fs from "node:fs";
import fsp from "node:fs/promises";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { RuntimeLog } from "../log.js";

export type WatchCallback = () => void | Promise<void>;

export interface FileWatcher {
  watch(targetPath: string, callback: WatchCallback): Promise<void>;
  close(): Promise<void>;
}

export interface FsFileWatcherOptions {
  debounceMs?: number;
  log?: RuntimeLog;
}

interface Registration {
  path: string;
  isDirectory: boolean;
  callbacks: WatchCallback[];
}

const DEFAULT_DEBOUNCE_MS = 50;

/**
 * fs.watch based watcher. Files are observed through their parent directory so
 * editors that save by rename keep triggering callbacks.
 */
export class FsFileWatcher implements FileWatcher {
  private readonly debounceMs: number;
  private readonly log?: RuntimeLog;
  private readonly registry = new Map<string, Registration>();
  private readonly directoryWatchers = new Map<string, fs.FSWatcher>();
  private readonly pending = new Map<string, NodeJS.Timeout>();
  private closed = false;

  constructor(options: FsFileWatcherOptions = {}) {
    this.debounceMs = Math.max(0, options.debounceMs ?? DEFAULT_DEBOUNCE_MS);
    this.log = options.log;
  }

  async watch(targetPath: string, callback: WatchCallback): Promise<void> {
    if (this.closed) {
      throw new Error("watcher is closed");
    }
    const absolutePath = path.resolve(targetPath);
    let stats: fs.Stats;
    try {
      stats = await fsp.stat(absolutePath);
    } catch (error) {
      throw new Error(`failed to watch ${absolutePath}: ${errorMessage(error)}`, { cause: error });
    }
    if (this.closed) {
      throw new Error("watcher is closed");
    }

    const isDirectory = stats.isDirectory();
    const directory = isDirectory ? absolutePath : path.dirname(absolutePath);
    if (!this.directoryWatchers.has(directory)) {
      const watcher = fs.watch(directory, { persistent: false }, (_eventType, filename) => {
        this.handleEvent(directory, typeof filename === "string" ? filename : null);
      });
      watcher.on("error", (error) => {
        this.log?.warn("watcher.error", "file watcher error", {
          path: directory,
          error: errorMessage(error)
        });
      });
      this.directoryWatchers.set(directory, watcher);
    }

    const existing = this.registry.get(absolutePath);
    if (existing) {
      existing.callbacks.push(callback);
      return;
    }
    this.registry.set(absolutePath, {
      path: absolutePath,
      isDirectory,
      callbacks: [callback]
    });
  }

  watchedPaths(): string[] {
    return Array.from(this.registry.keys());
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
    for (const watcher of this.directoryWatchers.values()) {
      watcher.close();
    }
    this.directoryWatchers.clear();
    this.registry.clear();
  }

  private handleEvent(directory: string, filename: string | null): void {
    if (this.closed) {
      return;
    }
    for (const registration of this.registry.values()) {
      if (registration.isDirectory) {
        if (registration.path === directory) {
          this.schedule(registration.path);
        }
        continue;
      }
      if (path.dirname(registration.path) !== directory) {
        continue;
      }
      if (filename === null || filename === path.basename(registration.path)) {
        this.schedule(registration.path);
      }
    }
  }

  private schedule(watchedPath: string): void {
    const existing = this.pending.get(watchedPath);
    if (existing) {
      clearTimeout(existing);
    }
    const timer = setTimeout(() => {
      this.pending.delete(watchedPath);
      const callbacks = [...(this.registry.get(watchedPath)?.callbacks ?? [])];
      void this.invoke(watchedPath, callbacks);
    }, this.debounceMs);
    this.pending.set(watchedPath, timer);
  }

  // Runs outside the registry; one failing callback never blocks the others.
  private async invoke(watchedPath: string, callbacks: WatchCallback[]): Promise<void> {
    await Promise.all(
      callbacks.map(async (callback) => {
        try {
          await callback();
        } catch (error) {
          this.log?.error("watcher.callback_failed", "watch callback failed", {
            path: watchedPath,
            error: errorMessage(error)
          });
        }
      })
    );
  }
}

export function createFileWatcher(options: FsFileWatcherOptions = {}): FsFileWatcher {
  return new FsFileWatcher(options);
}
