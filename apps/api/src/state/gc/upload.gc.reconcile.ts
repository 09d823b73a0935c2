// src/state/gc/upload.gc.reconcile.ts

import type { BaseLogger } from "pino";

import type { SessionStore } from "../../store/session.store.js";
import type { WorkerLauncher } from "../../services/upload/upload.launcher.js";
import { isTerminal, type UploadSession } from "../../types/upload.js";

export const ORPHAN_ERROR = "Upload process died unexpectedly";

/**
 * An active session is orphaned when its worker is gone, or when it never
 * got a worker pid within `graceMs` of being created.
 */
export function isOrphaned(
  session: UploadSession,
  launcher: WorkerLauncher,
  now: number,
  graceMs: number
): boolean {
  if (isTerminal(session.status)) return false;

  if (session.workerPid !== null) {
    return !launcher.isAlive(session.workerPid, session.sessionId);
  }

  const createdAt = Date.parse(session.createdAt);
  return !Number.isFinite(createdAt) || now - createdAt >= graceMs;
}

/**
 * Marks an orphaned session failed through the terminal-guarded update, so
 * a worker that finished in the meantime wins. Returns the stored record.
 */
export async function failOrphan(
  store: SessionStore,
  session: UploadSession,
  log: BaseLogger
): Promise<{ applied: boolean; session: UploadSession }> {
  const res = await store.update(session.sessionId, () => ({
    status: "failed",
    error: ORPHAN_ERROR,
    errorType: "unknown_error",
  }));

  if (res.applied) {
    log.warn(
      { sessionId: session.sessionId, pid: session.workerPid },
      "Recovered orphan upload; marked failed"
    );
  }
  return res;
}

/**
 * Fail active sessions whose worker is gone. A worker that crashes (or a
 * host that reboots) leaves its record in `starting`/`uploading` forever
 * otherwise.
 */
export async function reconcileOrphanUploads(params: {
  store: SessionStore;
  launcher: WorkerLauncher;
  log: BaseLogger;
  // Sessions without a pid yet are still being launched for this long.
  graceMs: number;
  clock?: () => number;
}): Promise<number> {
  const { store, launcher, log, graceMs } = params;
  const now = (params.clock ?? Date.now)();

  const active = await store.list({ activeOnly: true });
  let reconciled = 0;

  for (const session of active) {
    if (!isOrphaned(session, launcher, now, graceMs)) continue;

    const res = await failOrphan(store, session, log);
    if (res.applied) reconciled++;
  }

  return reconciled;
}
