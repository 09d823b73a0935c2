// src/config/storage.config.ts

import { assertHttpUrl, type Env } from "./env.js";

export interface StorageEnv {
  baseUrl: string;
  apiKey: string;
}

const DEFAULT_STORAGE_URL = "https://rest.alpha.fal.ai";

/**
 * Only the transfer worker talks to storage, so only it calls this.
 * The API server starts without a key.
 */
export function loadStorageEnv(env: Env = process.env): StorageEnv {
  const apiKey = env.FAL_KEY?.trim();
  if (!apiKey) {
    throw new Error("Missing required env: FAL_KEY");
  }

  const baseUrl = env.FAL_STORAGE_URL?.trim() || DEFAULT_STORAGE_URL;
  assertHttpUrl("FAL_STORAGE_URL", baseUrl);

  return {
    baseUrl: baseUrl.replace(/\/$/, ""),
    apiKey,
  };
}
