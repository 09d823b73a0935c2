// src/services/download/download.service.ts

import fs from "fs/promises";
import path from "path";

import { expandHome } from "../../config/uploads.config.js";
import {
  DestinationNotWritableError,
  NetworkError,
  ValidationError,
  errorMessage,
} from "../../utils/errors.js";
import {
  filenameFromUrl,
  parseHttpUrl,
  sanitizeFilename,
} from "../../utils/validators.js";

const FETCH_TIMEOUT_MS = 5 * 60 * 1000; // 5 min

export interface DownloadRequest {
  url: string;
  filename?: string;
  downloadDir?: string;
}

export interface DownloadResult {
  filename: string;
  filePath: string;
  sizeBytes: number;
  downloadDir: string;
  url: string;
}

export interface DownloadOptions {
  defaultDir: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

async function ensureWritableDir(dir: string) {
  try {
    await fs.mkdir(dir, { recursive: true });
    const testFile = path.join(dir, `.assetlift_write_test_${process.pid}_${Date.now()}`);
    await fs.writeFile(testFile, "ok");
    await fs.unlink(testFile);
  } catch (err) {
    throw new DestinationNotWritableError(dir, errorMessage(err));
  }
}

/**
 * Fetches `url` into a local directory within the calling request. Not
 * retried: a failed download surfaces as NetworkError and the caller
 * decides.
 */
export async function downloadFile(
  req: DownloadRequest,
  options: DownloadOptions
): Promise<DownloadResult> {
  const url = parseHttpUrl(req.url);
  const downloadDir = path.resolve(expandHome(req.downloadDir?.trim() || options.defaultDir));

  const filename = req.filename?.trim()
    ? sanitizeFilename(path.basename(req.filename.trim()))
    : filenameFromUrl(url);

  if (!filename) {
    throw new ValidationError("filename must not be empty");
  }

  await ensureWritableDir(downloadDir);

  const filePath = path.join(downloadDir, filename);
  const partPath = `${filePath}.part`;
  const fetchImpl = options.fetchImpl ?? fetch;

  const controller = new AbortController();
  const timeout = setTimeout(
    () => controller.abort(),
    options.timeoutMs ?? FETCH_TIMEOUT_MS
  );

  try {
    let res: Response;
    try {
      res = await fetchImpl(url, { method: "GET", signal: controller.signal });
    } catch (err) {
      throw new NetworkError(`Download failed: ${errorMessage(err)}`);
    }

    if (!res.ok) {
      await res.body?.cancel().catch(() => {});
      throw new NetworkError(`Download failed with HTTP ${res.status}`, res.status);
    }

    let sizeBytes = 0;
    const handle = await fs.open(partPath, "w");

    try {
      if (res.body) {
        const reader = res.body.getReader();
        for (;;) {
          const chunk = await reader.read().catch((err: unknown) => {
            throw new NetworkError(`Download interrupted: ${errorMessage(err)}`);
          });
          if (chunk.done) break;

          await handle.write(chunk.value);
          sizeBytes += chunk.value.byteLength;
        }
      }
    } catch (err) {
      await handle.close();
      await fs.rm(partPath, { force: true });
      throw err;
    }

    await handle.close();
    await fs.rename(partPath, filePath);

    return {
      filename,
      filePath,
      sizeBytes,
      downloadDir,
      url: req.url,
    };
  } finally {
    clearTimeout(timeout);
  }
}
