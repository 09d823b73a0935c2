// src/services/upload/upload.launcher.ts

import { spawn } from "child_process";
import fsSync from "fs";
import fs from "fs/promises";
import path from "path";
import { fileURLToPath } from "url";
import type { BaseLogger } from "pino";

import { sessionLogPath } from "../../store/disk.session.store.js";
import { WorkerLaunchError, errnoCode, errorMessage } from "../../utils/errors.js";

const KILL_GRACE_MS = 2_000;

/**
 * Starts and stops the background unit that runs one transfer. A pid is
 * only trusted together with the session it was launched for.
 */
export interface WorkerLauncher {
  launch(sessionId: string): Promise<number>;
  terminate(pid: number, sessionId: string): void;
  isAlive(pid: number, sessionId: string): boolean;
}

export interface ProcessWorkerLauncherOptions {
  // Runtime binary; the current node by default.
  execPath?: string;
  entryPath?: string;
  // Defaults to the parent's flags minus debugger ones.
  execArgv?: string[];
  killGraceMs?: number;
}

// Sibling entry point with the same extension as this module, so the
// launcher works both from sources (tsx) and from the compiled tree.
export function defaultWorkerEntry(): string {
  const self = fileURLToPath(import.meta.url);
  return path.join(path.dirname(self), `transfer.main${path.extname(self)}`);
}

function inheritedExecArgv(): string[] {
  // Loader flags (tsx) carry over; debugger flags would clash on the port.
  return process.execArgv.filter((arg) => !arg.startsWith("--inspect"));
}

// null when the platform has no procfs.
function readCmdline(pid: number): string | null {
  try {
    return fsSync.readFileSync(`/proc/${pid}/cmdline`, "utf8").split("\0").join(" ");
  } catch (err) {
    if (errnoCode(err) === "ENOENT" && fsSync.existsSync("/proc/self")) return "";
    return null;
  }
}

function processExists(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: it exists, we just may not signal it.
    return errnoCode(err) === "EPERM";
  }
}

export class ProcessWorkerLauncher implements WorkerLauncher {
  private readonly execPath: string;
  private readonly entryPath: string;
  private readonly execArgv: string[];
  private readonly killGraceMs: number;

  constructor(
    private readonly stateDir: string,
    private readonly log: BaseLogger,
    options?: ProcessWorkerLauncherOptions
  ) {
    this.execPath = options?.execPath ?? process.execPath;
    this.entryPath = options?.entryPath ?? defaultWorkerEntry();
    this.execArgv = options?.execArgv ?? inheritedExecArgv();
    this.killGraceMs = options?.killGraceMs ?? KILL_GRACE_MS;
  }

  async launch(sessionId: string): Promise<number> {
    const logPath = sessionLogPath(this.stateDir, sessionId);
    await fs.mkdir(path.dirname(logPath), { recursive: true });

    const out = await fs.open(logPath, "a");
    try {
      const child = spawn(
        this.execPath,
        [...this.execArgv, this.entryPath, "--session-id", sessionId, "--state-dir", this.stateDir],
        {
          detached: true,
          stdio: ["ignore", out.fd, out.fd],
          env: process.env,
        }
      );

      await new Promise<void>((resolve, reject) => {
        child.once("spawn", resolve);
        child.once("error", reject);
      });

      // The API process must not wait on the worker, nor take it down on exit.
      child.unref();

      if (!child.pid) {
        throw new WorkerLaunchError(`Worker for ${sessionId} started without a pid`);
      }

      this.log.info({ sessionId, pid: child.pid, logPath }, "Transfer worker launched");
      return child.pid;
    } catch (err) {
      if (err instanceof WorkerLaunchError) throw err;
      throw new WorkerLaunchError(`Failed to start upload process: ${errorMessage(err)}`);
    } finally {
      await out.close();
    }
  }

  terminate(pid: number, sessionId: string): void {
    if (!this.isAlive(pid, sessionId)) {
      this.log.debug({ pid, sessionId }, "No transfer worker behind pid; not signalling");
      return;
    }

    try {
      process.kill(pid, "SIGTERM");
    } catch (err) {
      if (errnoCode(err) === "ESRCH") return;
      this.log.warn({ pid, err: errorMessage(err) }, "Failed to signal transfer worker");
      return;
    }

    const timer = setTimeout(() => {
      if (!this.isAlive(pid, sessionId)) return;
      try {
        process.kill(pid, "SIGKILL");
        this.log.warn({ pid, sessionId }, "Transfer worker killed after grace period");
      } catch (err) {
        this.log.debug({ pid, err: errorMessage(err) }, "Worker exited before SIGKILL");
      }
    }, this.killGraceMs);
    timer.unref();
  }

  /**
   * True only when `pid` is running this launcher's entry point for
   * `sessionId`. Pids get reused; without procfs the pid alone is trusted.
   */
  isAlive(pid: number, sessionId: string): boolean {
    if (!processExists(pid)) return false;

    const cmdline = readCmdline(pid);
    if (cmdline === null) return true;

    return (
      cmdline.includes(path.basename(this.entryPath)) &&
      cmdline.includes(`--session-id ${sessionId}`)
    );
  }
}
