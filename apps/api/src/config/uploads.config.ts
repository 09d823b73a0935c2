// src/config/uploads.config.ts

import os from "os";
import path from "path";

import { parseIntEnv, type Env } from "./env.js";

export interface UploadConfig {
  stateDir: string;
  downloadDir: string;

  maxFileSizeBytes: number;
  maxActiveUploads: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  attemptTimeoutMs: number;
}

export interface GcConfig {
  // 0 disables scheduled cleanup.
  retentionHours: number;
  intervalMs: number;
  // Non-terminal sessions without a worker pid are left alone this long.
  orphanGraceMs: number;
}

// The storage endpoint rejects anything bigger.
export const MAX_FILE_SIZE_BYTES = 10 * 1024 * 1024; // 10 MB

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function loadUploadConfig(env: Env = process.env): UploadConfig {
  const stateDir = env.UPLOAD_STATE_DIR?.trim() || "~/.assetlift/uploads";
  const downloadDir = env.DOWNLOAD_DIR?.trim() || process.cwd();

  return {
    stateDir: path.resolve(expandHome(stateDir)),
    downloadDir: path.resolve(expandHome(downloadDir)),
    maxFileSizeBytes: MAX_FILE_SIZE_BYTES,
    maxActiveUploads: parseIntEnv(env, "UPLOAD_MAX_ACTIVE", 20),
  };
}

export function loadRetryConfig(env: Env = process.env): RetryConfig {
  const baseDelayMs = parseIntEnv(env, "UPLOAD_RETRY_BASE_MS", 1000, 0);
  const maxDelayMs = parseIntEnv(env, "UPLOAD_RETRY_MAX_MS", 8000, 0);

  if (maxDelayMs < baseDelayMs) {
    throw new Error("UPLOAD_RETRY_MAX_MS must be >= UPLOAD_RETRY_BASE_MS");
  }

  return {
    maxAttempts: parseIntEnv(env, "UPLOAD_MAX_ATTEMPTS", 3),
    baseDelayMs,
    maxDelayMs,
    attemptTimeoutMs: parseIntEnv(env, "UPLOAD_ATTEMPT_TIMEOUT_MS", 2 * 60_000),
  };
}

export function loadGcConfig(env: Env = process.env): GcConfig {
  return {
    retentionHours: parseIntEnv(env, "UPLOAD_RETENTION_HOURS", 0, 0),
    intervalMs: parseIntEnv(env, "UPLOAD_GC_INTERVAL_MS", 5 * 60 * 1000), // 5 minutes
    orphanGraceMs: 60 * 1000,
  };
}
