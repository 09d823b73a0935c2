// src/utils/apiError.ts

import type { FastifyReply } from "fastify";

import {
  CapacityReachedError,
  CorruptSessionError,
  DestinationNotWritableError,
  DomainError,
  InvalidStateTransitionError,
  NetworkError,
  NotReadyError,
  SessionNotFoundError,
  StoreWriteError,
  ValidationError,
  WorkerLaunchError,
} from "./errors.js";

/**
 * Canonical API error codes.
 * MUST stay in sync with routes and services.
 */
export type ApiErrorCode =
  | "INVALID_REQUEST_BODY"
  | "INVALID_SESSION_ID"
  | "VALIDATION_ERROR"
  | "UPLOAD_NOT_FOUND"
  | "UPLOAD_NOT_READY"
  | "UPLOAD_CAPACITY_REACHED"
  | "INVALID_STATE_TRANSITION"
  | "STORE_WRITE_FAILED"
  | "CORRUPT_UPLOAD_SESSION"
  | "WORKER_LAUNCH_FAILED"
  | "NETWORK_ERROR"
  | "DESTINATION_NOT_WRITABLE"
  | "INTERNAL_ERROR";

export interface ApiErrorResponse {
  error: {
    code: ApiErrorCode;
    message: string;
    retryable: boolean;
    details?: Record<string, unknown>;
  };
}

export function sendApiError(
  reply: FastifyReply,
  statusCode: number,
  code: ApiErrorCode,
  message: string,
  options?: {
    retryable?: boolean;
    details?: Record<string, unknown>;
  }
) {
  const safeStatus =
    Number.isInteger(statusCode) &&
    statusCode >= 400 &&
    statusCode <= 599
      ? statusCode
      : 500;

  const response: ApiErrorResponse = {
    error: {
      code,
      message,
      retryable: options?.retryable ?? false,
      ...(options?.details && { details: options.details }),
    },
  };

  return reply.code(safeStatus).send(response);
}

/**
 * Maps domain errors raised by the orchestrator and download helper onto
 * the envelope. Anything else is a 500 with a generic message.
 */
export function sendDomainError(reply: FastifyReply, err: unknown) {
  if (err instanceof ValidationError) {
    return sendApiError(reply, 400, "VALIDATION_ERROR", err.message);
  }
  if (err instanceof SessionNotFoundError) {
    return sendApiError(reply, 404, "UPLOAD_NOT_FOUND", err.message);
  }
  if (err instanceof NotReadyError) {
    return sendApiError(reply, 409, "UPLOAD_NOT_READY", err.message, {
      retryable: err.status === "starting" || err.status === "uploading",
      details: { status: err.status },
    });
  }
  if (err instanceof CapacityReachedError) {
    return sendApiError(reply, 429, "UPLOAD_CAPACITY_REACHED", err.message, {
      retryable: true,
    });
  }
  if (err instanceof InvalidStateTransitionError) {
    return sendApiError(reply, 409, "INVALID_STATE_TRANSITION", err.message);
  }
  if (err instanceof DestinationNotWritableError) {
    return sendApiError(reply, 400, "DESTINATION_NOT_WRITABLE", err.message);
  }
  if (err instanceof NetworkError) {
    return sendApiError(reply, 502, "NETWORK_ERROR", err.message, {
      retryable: true,
      ...(err.httpStatus !== undefined && { details: { httpStatus: err.httpStatus } }),
    });
  }
  if (err instanceof StoreWriteError) {
    return sendApiError(reply, 500, "STORE_WRITE_FAILED", err.message, { retryable: true });
  }
  if (err instanceof CorruptSessionError) {
    return sendApiError(reply, 500, "CORRUPT_UPLOAD_SESSION", err.message);
  }
  if (err instanceof WorkerLaunchError) {
    return sendApiError(reply, 500, "WORKER_LAUNCH_FAILED", err.message, { retryable: true });
  }
  if (err instanceof DomainError) {
    return sendApiError(reply, 500, "INTERNAL_ERROR", err.message);
  }

  return sendApiError(reply, 500, "INTERNAL_ERROR", "Unexpected server error");
}
