// src/utils/validators.ts

import fs from "fs/promises";
import type { Stats } from "fs";
import path from "path";

import { expandHome } from "../config/uploads.config.js";
import { ValidationError, errnoCode } from "./errors.js";

export function isUuid(value: unknown): value is string {
  return (
    typeof value === "string" &&
    /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i.test(
      value
    )
  );
}

export function parseHttpUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new ValidationError(`Invalid URL: ${raw}`);
  }

  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(`URL must use http or https: ${raw}`);
  }
  if (!url.hostname) {
    throw new ValidationError(`URL has no host: ${raw}`);
  }

  return url;
}

/**
 * Resolves `~` and relative segments, and requires a regular file.
 */
export async function resolveLocalFile(
  filePath: string
): Promise<{ path: string; sizeBytes: number }> {
  if (!filePath.trim()) {
    throw new ValidationError("File path must not be empty");
  }

  const resolved = path.resolve(expandHome(filePath.trim()));

  let stat: Stats;
  try {
    stat = await fs.stat(resolved);
  } catch (err) {
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
      throw new ValidationError(`File not found: ${filePath}`);
    }
    throw new ValidationError(`Invalid file path: ${filePath}`);
  }

  if (!stat.isFile()) {
    throw new ValidationError(`Path is not a file: ${filePath}`);
  }

  return { path: resolved, sizeBytes: stat.size };
}

export function sanitizeFilename(name: string): string {
  const sanitized = name
    .replace(/[<>:"/\\|?*\x00-\x1f]/g, "_")
    .replace(/^\.+$/, "_");

  return sanitized.slice(0, 255);
}

export function filenameFromUrl(url: URL, fallback = "downloaded_file"): string {
  const last = url.pathname.split("/").filter(Boolean).pop() ?? "";

  let decoded = last;
  try {
    decoded = decodeURIComponent(last);
  } catch {
    // keep the raw segment
  }

  if (!decoded || !decoded.includes(".")) return fallback;
  return sanitizeFilename(decoded);
}
