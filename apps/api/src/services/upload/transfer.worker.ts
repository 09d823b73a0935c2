// src/services/upload/transfer.worker.ts

import type { BaseLogger } from "pino";

import type { RetryConfig } from "../../config/uploads.config.js";
import type { SessionPatch, SessionStore } from "../../store/session.store.js";
import type { UploadSession, UploadStatus } from "../../types/upload.js";
import {
  classifyTransferError,
  recordTransferMetric,
} from "../../types/transfer.metrics.js";
import {
  PermanentTransferError,
  TransferAbortedError,
  TransferError,
  TransientTransferError,
  errorMessage,
} from "../../utils/errors.js";
import type { StorageClient } from "./storage.upload.js";
import type { SourceResolver } from "./transfer.source.js";
import { computeBackoffMs, type Sleep } from "./transfer.retry.js";

// Progress milestones. Byte progress of the PUT fills the gap up to the ceiling.
const PROGRESS_FILE_READY = 0.1;
const PROGRESS_URL_DOWNLOADED = 0.5;
const PROGRESS_UPLOAD_CEILING = 0.95;
const PROGRESS_PERSIST_STEP = 0.1;

export interface TransferDeps {
  store: SessionStore;
  storage: StorageClient;
  resolveSource: SourceResolver;
  sleep: Sleep;
  log: BaseLogger;
  retry: RetryConfig;
  maxFileSizeBytes: number;
  // Aborted when the process is asked to stop.
  signal?: AbortSignal;
}

/**
 * Thrown internally when the record turned terminal under us, which only
 * happens when someone else (a cancel) wrote it. The worker stops writing.
 */
class SessionFinalized extends Error {
  constructor(public readonly status: UploadStatus) {
    super(`Session already ${status}`);
  }
}

function httpStatusOf(err: unknown): number | undefined {
  if (err instanceof TransientTransferError || err instanceof PermanentTransferError) {
    return err.httpStatus;
  }
  return undefined;
}

/**
 * Drives one session from `starting` to a terminal status. Every
 * transition goes through the store first; the returned status is the
 * one persisted last.
 */
export async function runTransfer(
  sessionId: string,
  deps: TransferDeps
): Promise<UploadStatus> {
  const { store, log, retry } = deps;
  const cancelSignal = deps.signal ?? new AbortController().signal;

  const write = async (patch: SessionPatch): Promise<UploadSession> => {
    const res = await store.update(sessionId, () => patch);
    if (!res.applied) throw new SessionFinalized(res.session.status);
    return res.session;
  };

  try {
    for (let attempt = 1; attempt <= retry.maxAttempts; attempt++) {
      const started = Date.now();
      let session = await store.read(sessionId);

      try {
        if (session.status !== "starting" && session.status !== "uploading") {
          throw new SessionFinalized(session.status);
        }
        if (cancelSignal.aborted) throw new TransferAbortedError();

        session = await runAttempt(session, attempt, write, deps, cancelSignal);

        recordTransferMetric(log, {
          sessionId,
          sourceKind: session.source.kind,
          sizeBytes: session.fileSize,
          attempt,
          durationMs: Date.now() - started,
          outcome: "success",
          retryable: false,
          timestamp: Date.now(),
        });

        log.info({ sessionId, resultUrl: session.resultUrl }, "Upload completed");
        return session.status;
      } catch (err) {
        if (err instanceof SessionFinalized) throw err;

        const retryable = err instanceof TransferError && err.retryable;
        const outcome = classifyTransferError(err);

        recordTransferMetric(log, {
          sessionId,
          sourceKind: session.source.kind,
          sizeBytes: session.fileSize,
          attempt,
          durationMs: Date.now() - started,
          outcome,
          retryable,
          error: errorMessage(err),
          httpStatus: httpStatusOf(err),
          timestamp: Date.now(),
        });

        if (err instanceof TransferAbortedError) {
          await write({ status: "cancelled", error: "Upload interrupted", errorType: "cancelled" });
          log.info({ sessionId }, "Upload cancelled");
          return "cancelled";
        }

        if (retryable && attempt < retry.maxAttempts) {
          const delayMs = computeBackoffMs(attempt, retry);
          await write({ retryCount: attempt });

          log.warn(
            { sessionId, attempt, delayMs, err: errorMessage(err) },
            "Upload attempt failed; retrying"
          );

          try {
            await deps.sleep(delayMs, cancelSignal);
          } catch {
            await write({ status: "cancelled", error: "Upload interrupted", errorType: "cancelled" });
            log.info({ sessionId }, "Upload cancelled during backoff");
            return "cancelled";
          }
          continue;
        }

        await write({ status: "failed", error: errorMessage(err), errorType: outcome });
        log.error({ sessionId, attempt, outcome, err: errorMessage(err) }, "Upload failed");
        return "failed";
      }
    }
  } catch (err) {
    if (err instanceof SessionFinalized) {
      log.info({ sessionId, status: err.status }, "Session finalized externally; stopping");
      return err.status;
    }
    throw err;
  }

  // maxAttempts < 1: nothing was tried.
  await write({ status: "failed", error: "No upload attempts configured", errorType: "unknown_error" });
  return "failed";
}

async function runAttempt(
  session: UploadSession,
  attempt: number,
  write: (patch: SessionPatch) => Promise<UploadSession>,
  deps: TransferDeps,
  cancelSignal: AbortSignal
): Promise<UploadSession> {
  const controller = new AbortController();
  let timedOut = false;
  let finalized: SessionFinalized | null = null;

  const timeout = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, deps.retry.attemptTimeoutMs);
  const onCancel = () => controller.abort();
  cancelSignal.addEventListener("abort", onCancel, { once: true });

  try {
    const resolved = await deps.resolveSource(session.source, {
      maxBytes: deps.maxFileSizeBytes,
      signal: controller.signal,
    });

    const total = resolved.data.length;
    const base =
      session.source.kind === "url" ? PROGRESS_URL_DOWNLOADED : PROGRESS_FILE_READY;

    session = await write({ status: "uploading", fileSize: total, progress: base });
    deps.log.debug({ sessionId: session.sessionId, attempt, total }, "Upload attempt started");

    let persisted = session.progress;
    const floor = session.progress;

    const resultUrl = await deps.storage.upload({
      data: resolved.data,
      fileName: resolved.fileName,
      contentType: resolved.contentType,
      signal: controller.signal,
      onProgress: async (sent) => {
        if (total === 0 || finalized) return;
        const progress =
          floor + (PROGRESS_UPLOAD_CEILING - floor) * Math.min(1, sent / total);
        if (progress - persisted < PROGRESS_PERSIST_STEP) return;

        persisted = progress;
        try {
          await write({ progress });
        } catch (err) {
          if (!(err instanceof SessionFinalized)) throw err;
          finalized = err;
          controller.abort();
        }
      },
    });

    if (finalized) throw finalized;

    return await write({
      status: "completed",
      progress: 1,
      resultUrl,
      error: null,
      errorType: null,
    });
  } catch (err) {
    if (finalized) throw finalized;
    if (err instanceof SessionFinalized) throw err;
    if (cancelSignal.aborted) throw new TransferAbortedError();
    if (timedOut) {
      throw new TransientTransferError(
        `Upload attempt timed out after ${deps.retry.attemptTimeoutMs} ms`
      );
    }
    throw err;
  } finally {
    clearTimeout(timeout);
    cancelSignal.removeEventListener("abort", onCancel);
  }
}
