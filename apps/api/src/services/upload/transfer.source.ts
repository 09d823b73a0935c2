// src/services/upload/transfer.source.ts

import fs from "fs/promises";
import path from "path";

import type { UploadSource } from "../../types/upload.js";
import { transferErrorFromStatus } from "../../types/transfer.metrics.js";
import {
  FileNotFoundError,
  FileTooLargeError,
  TransientTransferError,
  errnoCode,
  errorMessage,
} from "../../utils/errors.js";
import { filenameFromUrl } from "../../utils/validators.js";

export interface ResolvedSource {
  data: Buffer;
  fileName: string;
  contentType: string;
}

export interface ResolveSourceOptions {
  maxBytes: number;
  signal: AbortSignal;
  fetchImpl?: typeof fetch;
}

export type SourceResolver = (
  source: UploadSource,
  options: ResolveSourceOptions
) => Promise<ResolvedSource>;

const CONTENT_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".svg": "image/svg+xml",
  ".mp3": "audio/mpeg",
  ".wav": "audio/wav",
  ".m4a": "audio/mp4",
  ".ogg": "audio/ogg",
  ".mp4": "video/mp4",
  ".webm": "video/webm",
  ".mov": "video/quicktime",
  ".pdf": "application/pdf",
  ".json": "application/json",
  ".txt": "text/plain",
  ".zip": "application/zip",
};

export function contentTypeFor(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream";
}

async function readLocalFile(filePath: string, maxBytes: number): Promise<ResolvedSource> {
  let sizeBytes: number;
  try {
    const stat = await fs.stat(filePath);
    if (!stat.isFile()) throw new FileNotFoundError(filePath);
    sizeBytes = stat.size;
  } catch (err) {
    if (err instanceof FileNotFoundError) throw err;
    if (errnoCode(err) === "ENOENT" || errnoCode(err) === "ENOTDIR") {
      throw new FileNotFoundError(filePath);
    }
    throw err;
  }

  if (sizeBytes > maxBytes) {
    throw new FileTooLargeError(sizeBytes, maxBytes);
  }

  const fileName = path.basename(filePath);
  return {
    data: await fs.readFile(filePath),
    fileName,
    contentType: contentTypeFor(fileName),
  };
}

async function downloadRemote(
  rawUrl: string,
  options: ResolveSourceOptions
): Promise<ResolvedSource> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const url = new URL(rawUrl);

  let res: Response;
  try {
    res = await fetchImpl(url, { method: "GET", signal: options.signal });
  } catch (err) {
    if (options.signal.aborted) throw err;
    throw new TransientTransferError(`Network error downloading source: ${errorMessage(err)}`);
  }

  if (!res.ok) {
    const text = await res.text().catch(() => "");
    throw transferErrorFromStatus("Source download", res.status, text);
  }

  const declared = Number(res.headers.get("content-length"));
  if (Number.isFinite(declared) && declared > options.maxBytes) {
    await res.body?.cancel().catch(() => {});
    throw new FileTooLargeError(declared, options.maxBytes);
  }

  const chunks: Uint8Array[] = [];
  let received = 0;

  if (res.body) {
    const reader = res.body.getReader();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;

        received += value.byteLength;
        if (received > options.maxBytes) {
          await reader.cancel().catch(() => {});
          throw new FileTooLargeError(received, options.maxBytes);
        }
        chunks.push(value);
      }
    } catch (err) {
      if (err instanceof FileTooLargeError || options.signal.aborted) throw err;
      throw new TransientTransferError(`Source download interrupted: ${errorMessage(err)}`);
    }
  }

  const headerType = res.headers.get("content-type")?.split(";")[0]?.trim();
  const fileName = filenameFromUrl(url, "download.tmp");

  return {
    data: Buffer.concat(chunks),
    fileName,
    contentType: headerType || contentTypeFor(fileName),
  };
}

/**
 * Turns a session source into bytes ready for storage. Local files are
 * checked against the ceiling before they are read; remote bodies are
 * cut off as soon as they exceed it.
 */
export const resolveSource: SourceResolver = async (source, options) => {
  if (source.kind === "file") {
    return readLocalFile(source.path, options.maxBytes);
  }
  return downloadRemote(source.url, options);
};
