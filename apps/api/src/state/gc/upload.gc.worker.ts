// src/state/gc/upload.gc.worker.ts

import type { BaseLogger } from "pino";

import type { GcConfig } from "../../config/uploads.config.js";
import type { SessionStore } from "../../store/session.store.js";
import type { WorkerLauncher } from "../../services/upload/upload.launcher.js";
import { reconcileOrphanUploads } from "./upload.gc.reconcile.js";

export interface UploadGcDeps {
  store: SessionStore;
  launcher: WorkerLauncher;
  log: BaseLogger;
  config: GcConfig;
}

/**
 * One GC pass: fail orphaned sessions, then drop terminal records past
 * retention. Only terminal records are ever deleted.
 */
export async function runUploadGc(deps: UploadGcDeps) {
  const { store, launcher, log, config } = deps;

  const reconciled = await reconcileOrphanUploads({
    store,
    launcher,
    log,
    graceMs: config.orphanGraceMs,
  });

  let purged = 0;
  if (config.retentionHours > 0) {
    purged = await store.purgeOlderThan(config.retentionHours * 60 * 60 * 1000);
  }

  if (reconciled > 0 || purged > 0) {
    log.info({ reconciled, purged }, "Upload GC pass finished");
  }
}
