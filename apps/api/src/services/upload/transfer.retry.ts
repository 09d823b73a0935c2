// src/services/upload/transfer.retry.ts

import type { RetryConfig } from "../../config/uploads.config.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Delay before re-running attempt `attempt + 1`, where `attempt` is the
 * 1-based number of the attempt that just failed.
 */
export function computeBackoffMs(
  attempt: number,
  limits: Pick<RetryConfig, "baseDelayMs" | "maxDelayMs">
): number {
  if (!Number.isInteger(attempt) || attempt < 1) return 0;
  return Math.min(limits.maxDelayMs, limits.baseDelayMs * 2 ** (attempt - 1));
}

export function abortError(): Error {
  return Object.assign(new Error("AbortError"), { name: "AbortError" });
}

export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) throw abortError();
  if (!ms || ms <= 0) return;
  if (!signal) {
    await new Promise((r) => setTimeout(r, ms));
    return;
  }

  await new Promise<void>((resolve, reject) => {
    const t = setTimeout(() => {
      cleanup();
      resolve();
    }, ms);

    const onAbort = () => {
      cleanup();
      reject(abortError());
    };

    const cleanup = () => {
      clearTimeout(t);
      signal.removeEventListener("abort", onAbort);
    };

    signal.addEventListener("abort", onAbort, { once: true });
  });
};
