// src/services/upload/upload.orchestrator.ts

import PQueue from "p-queue";
import type { BaseLogger } from "pino";

import type { SessionStore } from "../../store/session.store.js";
import { failOrphan, isOrphaned } from "../../state/gc/upload.gc.reconcile.js";
import {
  isTerminal,
  toSnapshot,
  toSummary,
  type CancelOutcome,
  type StartUploadResult,
  type UploadSnapshot,
  type UploadSource,
  type UploadResult,
  type UploadSession,
  type UploadSummary,
} from "../../types/upload.js";
import {
  CapacityReachedError,
  NotReadyError,
  ValidationError,
  errorMessage,
} from "../../utils/errors.js";
import { parseHttpUrl, resolveLocalFile } from "../../utils/validators.js";
import type { WorkerLauncher } from "./upload.launcher.js";

const ASSUMED_BYTES_PER_SECOND = 512 * 1024;
const MIN_ESTIMATE_SECONDS = 10;
const DEFAULT_ORPHAN_GRACE_MS = 60 * 1000;

export interface UploadOrchestratorOptions {
  store: SessionStore;
  launcher: WorkerLauncher;
  log: BaseLogger;
  maxActiveUploads: number;
  // How long a session may sit without a worker pid before it counts as dead.
  orphanGraceMs?: number;
}

export function estimateUploadSeconds(fileSize: number | null): number | null {
  if (fileSize === null) return null;
  return Math.max(MIN_ESTIMATE_SECONDS, Math.floor(fileSize / ASSUMED_BYTES_PER_SECOND));
}

/**
 * Request-side half of the upload subsystem. Everything here is short:
 * validation, one record write, one spawn. Transfers themselves run in
 * the launched worker and are only observed through the store.
 */
export class UploadOrchestrator {
  private readonly store: SessionStore;
  private readonly launcher: WorkerLauncher;
  private readonly log: BaseLogger;
  private readonly maxActiveUploads: number;
  private readonly orphanGraceMs: number;

  // Capacity check and record creation run one at a time in this process.
  private readonly admission = new PQueue({ concurrency: 1 });

  constructor(options: UploadOrchestratorOptions) {
    this.store = options.store;
    this.launcher = options.launcher;
    this.log = options.log;
    this.maxActiveUploads = options.maxActiveUploads;
    this.orphanGraceMs = options.orphanGraceMs ?? DEFAULT_ORPHAN_GRACE_MS;
  }

  async startUpload(filePath: string): Promise<StartUploadResult> {
    const file = await resolveLocalFile(filePath);
    return this.start({ kind: "file", path: file.path }, file.sizeBytes);
  }

  async startUploadFromUrl(rawUrl: string): Promise<StartUploadResult> {
    const url = parseHttpUrl(rawUrl);
    return this.start({ kind: "url", url: url.toString() }, null);
  }

  async checkStatus(sessionId: string): Promise<UploadSnapshot> {
    return toSnapshot(await this.readLive(sessionId));
  }

  async getResult(sessionId: string): Promise<UploadResult> {
    const session = await this.readLive(sessionId);

    if (session.status !== "completed" || !session.resultUrl) {
      throw new NotReadyError(session.status, session.error);
    }

    return {
      sessionId,
      url: session.resultUrl,
      fileSize: session.fileSize,
    };
  }

  async cancel(sessionId: string): Promise<{ sessionId: string; status: CancelOutcome }> {
    const res = await this.store.update(sessionId, () => ({
      status: "cancelled",
      error: "Upload cancelled by user",
      errorType: "cancelled",
    }));

    if (!res.applied) {
      return { sessionId, status: "already_finished" };
    }

    // The record is already terminal; stopping the process is best-effort.
    if (res.session.workerPid !== null) {
      this.launcher.terminate(res.session.workerPid, sessionId);
    }

    this.log.info({ sessionId, pid: res.session.workerPid }, "Upload cancelled");
    return { sessionId, status: "cancelled" };
  }

  async listUploads(activeOnly = false): Promise<{
    uploads: UploadSummary[];
    totalCount: number;
    activeOnly: boolean;
  }> {
    const listed = await this.store.list({ activeOnly });
    const sessions = (await Promise.all(listed.map((s) => this.refresh(s)))).filter(
      (s) => !activeOnly || !isTerminal(s.status)
    );
    return {
      uploads: sessions.map(toSummary),
      totalCount: sessions.length,
      activeOnly,
    };
  }

  async cleanup(maxAgeHours = 24): Promise<{ cleanedCount: number; maxAgeHours: number }> {
    if (!Number.isFinite(maxAgeHours) || maxAgeHours < 0) {
      throw new ValidationError("maxAgeHours must be a non-negative number");
    }

    const cleanedCount = await this.store.purgeOlderThan(maxAgeHours * 60 * 60 * 1000);
    if (cleanedCount > 0) {
      this.log.info({ cleanedCount, maxAgeHours }, "Old upload sessions removed");
    }

    return { cleanedCount, maxAgeHours };
  }

  private async start(
    source: UploadSource,
    fileSize: number | null
  ): Promise<StartUploadResult> {
    const session = await this.admission.add(
      async () => {
        const active = await this.countActive();
        if (active >= this.maxActiveUploads) {
          throw new CapacityReachedError(this.maxActiveUploads);
        }
        return this.store.create(source, { fileSize });
      },
      { throwOnTimeout: true }
    );
    const { sessionId } = session;

    let pid: number;
    try {
      pid = await this.launcher.launch(sessionId);
    } catch (err) {
      this.log.error({ sessionId, err: errorMessage(err) }, "Failed to launch transfer worker");
      await this.store.update(sessionId, () => ({
        status: "failed",
        error: errorMessage(err),
        errorType: "unknown_error",
      }));
      throw err;
    }

    const recorded = await this.store.update(sessionId, () => ({ workerPid: pid }));
    if (!recorded.applied && recorded.session.status === "cancelled") {
      // Cancelled while launching: nobody else knows this pid.
      this.launcher.terminate(pid, sessionId);
    }

    this.log.info({ sessionId, source: source.kind, fileSize, pid }, "Upload session started");

    return {
      sessionId,
      status: "starting",
      fileSize,
      estimatedDurationSeconds: estimateUploadSeconds(fileSize),
    };
  }

  private async readLive(sessionId: string): Promise<UploadSession> {
    return this.refresh(await this.store.read(sessionId));
  }

  // Fails the session if its worker died, the same way the GC pass does.
  private async refresh(session: UploadSession): Promise<UploadSession> {
    if (!isOrphaned(session, this.launcher, Date.now(), this.orphanGraceMs)) {
      return session;
    }
    return (await failOrphan(this.store, session, this.log)).session;
  }

  private async countActive(): Promise<number> {
    const active = await this.store.list({ activeOnly: true });
    const live = await Promise.all(active.map((s) => this.refresh(s)));
    return live.filter((s) => !isTerminal(s.status)).length;
  }
}
