import { spawn, type ChildProcess } from "node:child_process";
import { errorMessage } from "../errors.js";
import type { RuntimeLog } from "../log.js";

export interface AppCommand {
  routePath: string;
  command: string;
  workDir: string;
}

function isRunning(child: ChildProcess): boolean {
  return child.pid !== undefined && child.exitCode === null && child.signalCode === null;
}

/**
 * Child processes started for app routes, keyed by route path. Each command
 * runs under `sh -c` in its own process group.
 */
export class AppProcessTable {
  private readonly log: RuntimeLog;
  private readonly children = new Map<string, ChildProcess>();

  constructor(log: RuntimeLog) {
    this.log = log;
  }

  has(routePath: string): boolean {
    return this.children.has(routePath);
  }

  get(routePath: string): ChildProcess | undefined {
    return this.children.get(routePath);
  }

  start(app: AppCommand, signal?: AbortSignal): ChildProcess | null {
    if (!app.command.trim()) {
      return null;
    }
    const existing = this.children.get(app.routePath);
    if (existing) {
      return existing;
    }

    this.log.info("web.app_command_starting", "starting app command", {
      command: app.command,
      workDir: app.workDir
    });
    const child = spawn("sh", ["-c", app.command], {
      cwd: app.workDir,
      detached: true,
      stdio: "inherit",
      signal
    });
    this.children.set(app.routePath, child);

    child.on("spawn", () => {
      this.log.info("web.app_command_started", "app command started", {
        command: app.command,
        pid: child.pid
      });
    });
    child.on("error", (error) => {
      if (signal?.aborted) {
        this.log.info("web.app_command_cancelled", "app command cancelled", { command: app.command });
        return;
      }
      this.log.error("web.app_command_failed", "failed to start app command", {
        command: app.command,
        error: errorMessage(error)
      });
    });
    child.on("exit", (code, exitSignal) => {
      if (code === 0) {
        this.log.info("web.app_command_exited", "app command exited", { command: app.command });
        return;
      }
      this.log.warn("web.app_command_exited", "app command exited with error", {
        command: app.command,
        code,
        signal: exitSignal
      });
    });
    return child;
  }

  /** Kills every tracked command that is still running. Commands that never started are skipped. */
  stop(): void {
    for (const [routePath, child] of this.children) {
      if (!isRunning(child) || child.pid === undefined) {
        continue;
      }
      this.log.info("web.app_command_stopping", "stopping command", { path: routePath, pid: child.pid });
      try {
        process.kill(-child.pid, "SIGKILL");
      } catch (error) {
        // group may already be gone; fall back to the shell itself
        this.log.debug("web.app_group_kill_failed", "process group kill failed", {
          path: routePath,
          error: errorMessage(error)
        });
        child.kill("SIGKILL");
      }
    }
  }

  size(): number {
    return this.children.size;
  }
}
