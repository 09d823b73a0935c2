// src/store/disk.session.store.ts

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import PQueue from "p-queue";
import { z } from "zod";

import {
  canTransition,
  isTerminal,
  ACTIVE_STATUSES,
  type UploadSession,
  type UploadSource,
} from "../types/upload.js";
import {
  CorruptSessionError,
  InvalidStateTransitionError,
  SessionNotFoundError,
  StoreWriteError,
  errnoCode,
  errorMessage,
} from "../utils/errors.js";
import { isUuid } from "../utils/validators.js";
import type { SessionPatch, SessionStore, UpdateResult } from "./session.store.js";

const LOCK_STALE_MS = 30_000;
const LOCK_RETRY_MS = 10;
const LOCK_TIMEOUT_MS = 5_000;
const READ_CONCURRENCY = 16;

const sourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("file"), path: z.string().min(1) }),
  z.object({ kind: z.literal("url"), url: z.string().min(1) }),
]);

const sessionSchema: z.ZodType<UploadSession> = z.object({
  sessionId: z.string(),
  source: sourceSchema,
  status: z.enum(["starting", "uploading", "completed", "failed", "cancelled"]),
  progress: z.number().min(0).max(1),
  fileSize: z.number().int().nonnegative().nullable(),
  resultUrl: z.string().nullable(),
  error: z.string().nullable(),
  errorType: z.string().nullable(),
  retryCount: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
  workerPid: z.number().int().positive().nullable(),
});

export function sessionLogPath(stateDir: string, sessionId: string): string {
  return path.join(stateDir, "logs", `${sessionId}.log`);
}

const sleep = (ms: number) => new Promise((r) => setTimeout(r, ms));

/**
 * One JSON file per session under `dir`. Writes go to a temp file that is
 * renamed over the record, so a reader sees either the old or the new
 * version. Writers serialize on `<id>.lock`, created with O_EXCL, which
 * works across processes without a shared lock primitive.
 */
export class DiskSessionStore implements SessionStore {
  private readonly clock: () => number;

  constructor(
    private readonly dir: string,
    options?: { clock?: () => number }
  ) {
    this.clock = options?.clock ?? Date.now;
  }

  private recordPath(sessionId: string) {
    return path.join(this.dir, `${sessionId}.json`);
  }

  private lockPath(sessionId: string) {
    return path.join(this.dir, `${sessionId}.lock`);
  }

  private nowIso() {
    return new Date(this.clock()).toISOString();
  }

  async create(
    source: UploadSource,
    options?: { fileSize?: number | null }
  ): Promise<UploadSession> {
    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw new StoreWriteError(
        `Cannot create state dir ${this.dir}: ${errorMessage(err)}`,
        { cause: err }
      );
    }

    const now = this.nowIso();
    const session: UploadSession = {
      sessionId: crypto.randomUUID(),
      source,
      status: "starting",
      progress: 0,
      fileSize: options?.fileSize ?? null,
      resultUrl: null,
      error: null,
      errorType: null,
      retryCount: 0,
      createdAt: now,
      updatedAt: now,
      workerPid: null,
    };

    await this.writeRecord(session);
    return session;
  }

  async read(sessionId: string): Promise<UploadSession> {
    if (!isUuid(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(sessionId), "utf8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        throw new SessionNotFoundError(sessionId);
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      throw new CorruptSessionError(sessionId);
    }

    const parsed = sessionSchema.safeParse(json);
    if (!parsed.success || parsed.data.sessionId !== sessionId) {
      throw new CorruptSessionError(sessionId);
    }

    return parsed.data;
  }

  async update(
    sessionId: string,
    mutator: (current: UploadSession) => SessionPatch
  ): Promise<UpdateResult> {
    // Fail fast on unknown ids before creating a lock file for them.
    await this.read(sessionId);

    return this.withLock(sessionId, async () => {
      const current = await this.read(sessionId);

      if (isTerminal(current.status)) {
        return { applied: false, session: current };
      }

      const patch = mutator(current);
      const nextStatus = patch.status ?? current.status;

      if (!canTransition(current.status, nextStatus)) {
        throw new InvalidStateTransitionError(current.status, nextStatus);
      }

      const next: UploadSession = {
        ...current,
        ...patch,
        sessionId: current.sessionId,
        source: current.source,
        createdAt: current.createdAt,
        status: nextStatus,
        updatedAt: this.nowIso(),
      };

      const requested = Math.min(1, Math.max(0, patch.progress ?? current.progress));
      next.progress = nextStatus === "completed" ? 1 : Math.max(current.progress, requested);

      await this.writeRecord(next);
      return { applied: true, session: next };
    });
  }

  async list(filter?: { activeOnly?: boolean }): Promise<UploadSession[]> {
    const ids = await this.listIds();
    const queue = new PQueue({ concurrency: READ_CONCURRENCY });

    const results = await queue.addAll(
      ids.map((id) => async () => {
        try {
          return await this.read(id);
        } catch {
          // Removed concurrently or unreadable; listing skips it.
          return null;
        }
      })
    );

    return results
      .filter((s): s is UploadSession => Boolean(s))
      .filter((s) => !filter?.activeOnly || ACTIVE_STATUSES.has(s.status))
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
  }

  async delete(sessionId: string): Promise<void> {
    if (!isUuid(sessionId)) return;

    await Promise.all([
      fs.rm(this.recordPath(sessionId), { force: true }),
      fs.rm(this.lockPath(sessionId), { force: true }),
      fs.rm(sessionLogPath(this.dir, sessionId), { force: true }),
    ]);
  }

  async purgeOlderThan(maxAgeMs: number): Promise<number> {
    const cutoff = this.clock() - maxAgeMs;
    let removed = 0;

    for (const id of await this.listIds()) {
      let session: UploadSession;
      try {
        session = await this.read(id);
      } catch (err) {
        if (err instanceof CorruptSessionError) {
          await this.delete(id);
          removed++;
        }
        continue;
      }

      if (!isTerminal(session.status)) continue;

      const updatedAt = Date.parse(session.updatedAt);
      if (Number.isFinite(updatedAt) && updatedAt > cutoff) continue;

      await this.delete(id);
      removed++;
    }

    return removed;
  }

  private async listIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }

    return entries
      .filter((name) => name.endsWith(".json"))
      .map((name) => name.slice(0, -".json".length))
      .filter((id) => isUuid(id));
  }

  private async writeRecord(session: UploadSession): Promise<void> {
    const finalPath = this.recordPath(session.sessionId);
    const tempPath = `${finalPath}.${process.pid}.${crypto.randomUUID()}.tmp`;

    try {
      await fs.writeFile(tempPath, JSON.stringify(session, null, 2), { flag: "wx" });
      await fs.rename(tempPath, finalPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch(() => {});
      throw new StoreWriteError(
        `Failed to persist upload session ${session.sessionId}: ${errorMessage(err)}`,
        { cause: err }
      );
    }
  }

  private async withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const lockPath = this.lockPath(sessionId);
    const token = `${process.pid}:${crypto.randomUUID()}`;
    const deadline = Date.now() + LOCK_TIMEOUT_MS;

    for (;;) {
      try {
        const handle = await fs.open(lockPath, "wx");
        await handle.writeFile(token).finally(() => handle.close());
        break;
      } catch (err) {
        if (errnoCode(err) !== "EEXIST") {
          throw new StoreWriteError(
            `Cannot lock upload session ${sessionId}: ${errorMessage(err)}`,
            { cause: err }
          );
        }

        // A writer that crashed mid-update leaves its lock behind.
        if (await this.breakStaleLock(lockPath)) continue;

        if (Date.now() > deadline) {
          throw new StoreWriteError(`Timed out waiting for lock on upload session ${sessionId}`);
        }
        await sleep(LOCK_RETRY_MS);
      }
    }

    try {
      return await fn();
    } finally {
      await this.releaseLock(lockPath, token);
    }
  }

  /**
   * Moves a stale lock aside with a rename, so of several waiters that saw
   * it only one gets it. If what was moved turns out to be a fresh lock
   * taken in between, it is put back.
   */
  private async breakStaleLock(lockPath: string): Promise<boolean> {
    let staleToken: string;
    try {
      // Age and token must come from the same file.
      const handle = await fs.open(lockPath, "r");
      try {
        const st = await handle.stat();
        if (Date.now() - st.mtimeMs <= LOCK_STALE_MS) return false;
        staleToken = await handle.readFile("utf8");
      } finally {
        await handle.close();
      }
    } catch (err) {
      // Released between our attempt and the stat.
      if (errnoCode(err) === "ENOENT") return true;
      throw err;
    }

    const asidePath = `${lockPath}.${crypto.randomUUID()}.stale`;
    try {
      await fs.rename(lockPath, asidePath);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return true;
      throw err;
    }

    const moved = await fs.readFile(asidePath, "utf8");
    if (moved !== staleToken) {
      await fs.link(asidePath, lockPath).catch((err: unknown) => {
        if (errnoCode(err) !== "EEXIST") throw err;
      });
    }
    await fs.rm(asidePath, { force: true });
    return true;
  }

  private async releaseLock(lockPath: string, token: string): Promise<void> {
    const current = await fs.readFile(lockPath, "utf8").catch((err: unknown) => {
      if (errnoCode(err) === "ENOENT") return null;
      throw err;
    });
    if (current === token) {
      await fs.rm(lockPath, { force: true });
    }
  }
}
