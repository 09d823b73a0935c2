// src/services/upload/storage.upload.ts

import { Readable } from "stream";
import { z } from "zod";

import type { StorageEnv } from "../../config/storage.config.js";
import { nodeToWeb } from "../../utils/nodeToWeb.js";
import { transferErrorFromStatus } from "../../types/transfer.metrics.js";
import {
  PermanentTransferError,
  TransientTransferError,
  errorMessage,
} from "../../utils/errors.js";

const PUT_CHUNK_BYTES = 256 * 1024;

export interface StorageUploadInput {
  data: Buffer;
  fileName: string;
  contentType: string;
  signal: AbortSignal;
  // Cumulative bytes the HTTP client has pulled from the request body.
  onProgress?: (sentBytes: number) => Promise<void> | void;
}

/**
 * The remote storage endpoint: takes bytes, hands back a public URL.
 */
export interface StorageClient {
  upload(input: StorageUploadInput): Promise<string>;
}

const initiateResponseSchema = z.object({
  upload_url: z.string().url(),
  file_url: z.string().url(),
});

function* sliceBuffer(data: Buffer) {
  for (let offset = 0; offset < data.length; offset += PUT_CHUNK_BYTES) {
    yield data.subarray(offset, offset + PUT_CHUNK_BYTES);
  }
}

async function safeReadText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

/**
 * Two-step upload against the fal storage REST API: reserve an object
 * (`/storage/upload/initiate`), then PUT the bytes to the signed URL.
 */
export class FalStorageClient implements StorageClient {
  constructor(
    private readonly env: StorageEnv,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  async upload(input: StorageUploadInput): Promise<string> {
    const { uploadUrl, fileUrl } = await this.initiate(input);

    let sent = 0;
    const body = nodeToWeb(Readable.from(sliceBuffer(input.data)), async (chunk) => {
      sent += chunk.byteLength;
      await input.onProgress?.(sent);
    });

    const res = await this.send(uploadUrl, {
      method: "PUT",
      headers: {
        "Content-Type": input.contentType,
      },
      body,
      duplex: "half",
      signal: input.signal,
    });

    if (!res.ok) {
      throw transferErrorFromStatus("Storage upload", res.status, await safeReadText(res));
    }

    return fileUrl;
  }

  private async initiate(input: StorageUploadInput) {
    const params = new URLSearchParams({ storage_type: "fal-cdn-v3" });

    const res = await this.send(
      `${this.env.baseUrl}/storage/upload/initiate?${params.toString()}`,
      {
        method: "POST",
        headers: {
          Authorization: `Key ${this.env.apiKey}`,
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify({
          content_type: input.contentType,
          file_name: input.fileName,
        }),
        signal: input.signal,
      }
    );

    if (!res.ok) {
      throw transferErrorFromStatus("Storage initiate", res.status, await safeReadText(res));
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch {
      throw new PermanentTransferError("STORAGE_INVALID_RESPONSE: initiate body is not JSON");
    }

    const parsed = initiateResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentTransferError("STORAGE_INVALID_RESPONSE: missing upload_url/file_url");
    }

    return { uploadUrl: parsed.data.upload_url, fileUrl: parsed.data.file_url };
  }

  private async send(url: string, init: RequestInit): Promise<Response> {
    try {
      return await this.fetchImpl(url, init);
    } catch (err) {
      // Aborts belong to the caller (timeout or cancel); let it decide.
      if (init.signal?.aborted) throw err;
      throw new TransientTransferError(`Network error: ${errorMessage(err)}`);
    }
  }
}
