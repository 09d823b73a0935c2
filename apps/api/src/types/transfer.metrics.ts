// src/types/transfer.metrics.ts

import type { BaseLogger } from "pino";

import {
  FileNotFoundError,
  FileTooLargeError,
  PermanentTransferError,
  TransferAbortedError,
  TransientTransferError,
} from "../utils/errors.js";

export type TransferOutcome =
  | "success"
  | "auth_failed"
  | "file_not_found"
  | "file_too_large"
  | "rate_limited"
  | "network_error"
  | "timeout"
  | "client_error"
  | "server_error"
  | "invalid_response"
  | "cancelled"
  | "unknown_error";

export interface TransferMetric {
  sessionId: string;
  sourceKind: "file" | "url";
  sizeBytes: number | null;
  attempt: number;
  durationMs: number;
  outcome: TransferOutcome;
  retryable: boolean;
  error?: string;
  httpStatus?: number;
  timestamp: number;
}

export function recordTransferMetric(log: BaseLogger, metric: TransferMetric) {
  log.info({ metric }, "[transfer.metric]");
}

/**
 * Statuses worth another attempt: request timeout, throttling, and
 * anything the server blames on itself.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || (status >= 500 && status <= 599);
}

export function transferErrorFromStatus(
  what: string,
  status: number,
  body: string
): TransientTransferError | PermanentTransferError {
  const detail = body.trim().slice(0, 300);
  const message = `${what} failed with HTTP ${status}${detail ? `: ${detail}` : ""}`;

  return isRetryableStatus(status)
    ? new TransientTransferError(message, status)
    : new PermanentTransferError(message, status);
}

export function classifyTransferError(err: unknown): TransferOutcome {
  if (err instanceof TransferAbortedError) return "cancelled";
  if (err instanceof FileNotFoundError) return "file_not_found";
  if (err instanceof FileTooLargeError) return "file_too_large";

  if (err instanceof TransientTransferError || err instanceof PermanentTransferError) {
    const status = err.httpStatus;
    if (status !== undefined) {
      if (status === 401 || status === 403) return "auth_failed";
      if (status === 413) return "file_too_large";
      if (status === 408) return "timeout";
      if (status === 429) return "rate_limited";
      if (status >= 400 && status <= 499) return "client_error";
      if (status >= 500 && status <= 599) return "server_error";
    }
  }

  const msg = (err instanceof Error ? err.message : String(err)).toUpperCase();

  if (msg.includes("TIMED OUT") || msg.includes("TIMEOUT")) return "timeout";
  if (
    msg.includes("ECONN") ||
    msg.includes("ENOTFOUND") ||
    msg.includes("EAI_AGAIN") ||
    msg.includes("ETIMEDOUT") ||
    msg.includes("NETWORK") ||
    msg.includes("FETCH FAILED")
  )
    return "network_error";
  if (msg.includes("INVALID_RESPONSE")) return "invalid_response";

  return "unknown_error";
}
