import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import {
  DestinationNotWritableError,
  NetworkError,
  ValidationError,
} from "../../utils/errors.js";
import { downloadFile } from "./download.service.js";

describe("downloadFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "assetlift-download-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("saves the body under the url's file name", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("hello"));

    const result = await downloadFile(
      { url: "https://cdn.example/files/result.png" },
      { defaultDir: dir, fetchImpl }
    );

    expect(result).toEqual({
      filename: "result.png",
      filePath: path.join(dir, "result.png"),
      sizeBytes: 5,
      downloadDir: dir,
      url: "https://cdn.example/files/result.png",
    });
    expect(await fs.readFile(result.filePath, "utf8")).toBe("hello");
    expect(await fs.readdir(dir)).toEqual(["result.png"]);
  });

  it("keeps only the base name of a requested file name", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("x"));

    const result = await downloadFile(
      { url: "https://cdn.example/files/result.png", filename: "../../evil.txt" },
      { defaultDir: dir, fetchImpl }
    );

    expect(result.filePath).toBe(path.join(dir, "evil.txt"));
  });

  it("uses a generic name when the url has none", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("x"));

    const result = await downloadFile({ url: "https://cdn.example/" }, { defaultDir: dir, fetchImpl });

    expect(result.filename).toBe("downloaded_file");
  });

  it("creates a requested directory", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("x"));
    const target = path.join(dir, "nested", "out");

    const result = await downloadFile(
      { url: "https://cdn.example/a.png", downloadDir: target },
      { defaultDir: dir, fetchImpl }
    );

    expect(result.downloadDir).toBe(target);
    expect(await fs.readFile(path.join(target, "a.png"), "utf8")).toBe("x");
  });

  it("surfaces HTTP errors and leaves nothing behind", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("gone", { status: 404 }));

    const err = await downloadFile({ url: "https://cdn.example/a.png" }, { defaultDir: dir, fetchImpl }).catch(
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(NetworkError);
    expect(err).toMatchObject({ message: "Download failed with HTTP 404", httpStatus: 404 });
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it("surfaces connection failures", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(
      downloadFile({ url: "https://cdn.example/a.png" }, { defaultDir: dir, fetchImpl })
    ).rejects.toThrow(new NetworkError("Download failed: fetch failed"));
  });

  it("rejects non-http urls before fetching", async () => {
    const fetchImpl = vi.fn<typeof fetch>();

    await expect(
      downloadFile({ url: "file:///etc/passwd" }, { defaultDir: dir, fetchImpl })
    ).rejects.toBeInstanceOf(ValidationError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("rejects a directory it cannot write to", async () => {
    const blocker = path.join(dir, "blocker");
    await fs.writeFile(blocker, "");
    const fetchImpl = vi.fn<typeof fetch>();

    await expect(
      downloadFile(
        { url: "https://cdn.example/a.png", downloadDir: path.join(blocker, "sub") },
        { defaultDir: dir, fetchImpl }
      )
    ).rejects.toBeInstanceOf(DestinationNotWritableError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
