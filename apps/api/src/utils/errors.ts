// src/utils/errors.ts

import type { UploadStatus } from "../types/upload.js";

/**
 * Base class for every error the upload subsystem raises on purpose.
 * `code` is what ends up in API error envelopes and session records.
 */
export abstract class DomainError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
  }
}

export class SessionNotFoundError extends DomainError {
  constructor(sessionId: string) {
    super(`Upload session not found: ${sessionId}`, "UPLOAD_NOT_FOUND");
  }
}

export class NotReadyError extends DomainError {
  constructor(
    public readonly status: UploadStatus,
    detail?: string | null
  ) {
    super(
      detail
        ? `Upload not completed (status: ${status}): ${detail}`
        : `Upload not completed yet. Status: ${status}`,
      "UPLOAD_NOT_READY"
    );
  }
}

export class InvalidStateTransitionError extends DomainError {
  constructor(from: UploadStatus, to: UploadStatus) {
    super(`Invalid status transition ${from} -> ${to}`, "INVALID_STATE_TRANSITION");
  }
}

export class CapacityReachedError extends DomainError {
  constructor(limit: number) {
    super(`Too many active uploads (limit ${limit})`, "UPLOAD_CAPACITY_REACHED");
  }
}

/**
 * Storage medium refused a write. Fatal to the operation in progress.
 */
export class StoreWriteError extends DomainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "STORE_WRITE_FAILED");
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class CorruptSessionError extends DomainError {
  constructor(sessionId: string) {
    super(`Upload session record is corrupt: ${sessionId}`, "CORRUPT_UPLOAD_SESSION");
  }
}

export class WorkerLaunchError extends DomainError {
  constructor(message: string) {
    super(message, "WORKER_LAUNCH_FAILED");
  }
}

/**
 * Transfer failures. `retryable` drives the worker's retry loop.
 */
export abstract class TransferError extends DomainError {
  abstract readonly retryable: boolean;
}

export class FileNotFoundError extends TransferError {
  readonly retryable = false;
  constructor(path: string) {
    super(`File not found: ${path}`, "FILE_NOT_FOUND");
  }
}

export class FileTooLargeError extends TransferError {
  readonly retryable = false;
  constructor(sizeBytes: number, maxBytes: number) {
    super(
      `File too large: ${sizeBytes.toLocaleString("en-US")} bytes (max ${maxBytes.toLocaleString("en-US")})`,
      "FILE_TOO_LARGE"
    );
  }
}

export class TransientTransferError extends TransferError {
  readonly retryable = true;
  constructor(
    message: string,
    public readonly httpStatus?: number
  ) {
    super(message, "TRANSIENT_TRANSFER_ERROR");
  }
}

export class PermanentTransferError extends TransferError {
  readonly retryable = false;
  constructor(
    message: string,
    public readonly httpStatus?: number
  ) {
    super(message, "PERMANENT_TRANSFER_ERROR");
  }
}

export class TransferAbortedError extends TransferError {
  readonly retryable = false;
  constructor() {
    super("Upload interrupted", "TRANSFER_ABORTED");
  }
}

/**
 * Download helper failures.
 */
export class NetworkError extends DomainError {
  constructor(
    message: string,
    public readonly httpStatus?: number
  ) {
    super(message, "NETWORK_ERROR");
  }
}

export class DestinationNotWritableError extends DomainError {
  constructor(dir: string, reason: string) {
    super(`Download directory is not writable: ${dir} (${reason})`, "DESTINATION_NOT_WRITABLE");
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
