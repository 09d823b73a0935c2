import fs from "fs/promises";
import os from "os";
import path from "path";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import { DiskSessionStore } from "../../store/disk.session.store.js";
import {
  CapacityReachedError,
  NotReadyError,
  SessionNotFoundError,
  ValidationError,
  WorkerLaunchError,
} from "../../utils/errors.js";
import type { WorkerLauncher } from "./upload.launcher.js";
import { UploadOrchestrator, estimateUploadSeconds } from "./upload.orchestrator.js";

const WORKER_PID = 4242;
const MISSING_ID = "6f1c2b9e-3f4a-4d5b-8c6d-7e8f9a0b1c2d";

describe("estimateUploadSeconds", () => {
  it("assumes 512 KiB/s with a 10 second floor", () => {
    expect(estimateUploadSeconds(0)).toBe(10);
    expect(estimateUploadSeconds(10 * 1024 * 1024)).toBe(20);
    expect(estimateUploadSeconds(null)).toBeNull();
  });
});

describe("UploadOrchestrator", () => {
  let dir: string;
  let filePath: string;
  let store: DiskSessionStore;
  let launcher: {
    launch: Mock<WorkerLauncher["launch"]>;
    terminate: Mock<WorkerLauncher["terminate"]>;
    isAlive: Mock<WorkerLauncher["isAlive"]>;
  };

  const log = pino({ level: "silent" });

  function orchestrator(maxActiveUploads = 20) {
    return new UploadOrchestrator({ store, launcher, log, maxActiveUploads });
  }

  async function complete(sessionId: string) {
    await store.update(sessionId, () => ({ status: "uploading", fileSize: 1000 }));
    await store.update(sessionId, () => ({
      status: "completed",
      resultUrl: "https://cdn.example/files/a.png",
    }));
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "assetlift-orch-"));
    filePath = path.join(dir, "asset.png");
    await fs.writeFile(filePath, Buffer.alloc(1000, 7));
    store = new DiskSessionStore(path.join(dir, "state"));
    launcher = {
      launch: vi.fn<WorkerLauncher["launch"]>(async () => WORKER_PID),
      terminate: vi.fn<WorkerLauncher["terminate"]>(),
      isAlive: vi.fn<WorkerLauncher["isAlive"]>(() => true),
    };
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("startUpload", () => {
    it("creates a session and launches its worker", async () => {
      const started = await orchestrator().startUpload(filePath);

      expect(started).toEqual({
        sessionId: started.sessionId,
        status: "starting",
        fileSize: 1000,
        estimatedDurationSeconds: 10,
      });
      expect(launcher.launch).toHaveBeenCalledWith(started.sessionId);

      const record = await store.read(started.sessionId);
      expect(record.source).toEqual({ kind: "file", path: filePath });
      expect(record.workerPid).toBe(WORKER_PID);
    });

    it("rejects a missing file without creating a session", async () => {
      await expect(orchestrator().startUpload(path.join(dir, "nope.png"))).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(await store.list()).toEqual([]);
      expect(launcher.launch).not.toHaveBeenCalled();
    });

    it("rejects a directory", async () => {
      await expect(orchestrator().startUpload(dir)).rejects.toThrow("Path is not a file");
    });

    it("marks the session failed when the worker cannot start", async () => {
      launcher.launch.mockRejectedValueOnce(
        new WorkerLaunchError("Failed to start upload process: spawn EACCES")
      );

      await expect(orchestrator().startUpload(filePath)).rejects.toBeInstanceOf(WorkerLaunchError);

      const [session] = await store.list();
      expect(session?.status).toBe("failed");
      expect(session?.error).toBe("Failed to start upload process: spawn EACCES");
    });

    it("refuses new uploads at capacity", async () => {
      const orch = orchestrator(1);
      await orch.startUpload(filePath);

      await expect(orch.startUpload(filePath)).rejects.toBeInstanceOf(CapacityReachedError);
      expect(launcher.launch).toHaveBeenCalledTimes(1);
    });

    it("admits one of two concurrent starts at a limit of one", async () => {
      const orch = orchestrator(1);

      const results = await Promise.allSettled([
        orch.startUpload(filePath),
        orch.startUpload(filePath),
      ]);

      expect(results.map((r) => r.status).sort()).toEqual(["fulfilled", "rejected"]);
      const reasons = results.flatMap((r) => (r.status === "rejected" ? [r.reason] : []));
      expect(reasons[0]).toBeInstanceOf(CapacityReachedError);
      expect(await store.list()).toHaveLength(1);
    });

    it("does not count sessions whose worker died toward capacity", async () => {
      const orch = orchestrator(1);
      const first = await orch.startUpload(filePath);
      launcher.isAlive.mockReturnValue(false);

      const second = await orch.startUpload(filePath);

      expect(second.status).toBe("starting");
      expect((await store.read(first.sessionId)).status).toBe("failed");
    });

    it("stops the worker when the session was cancelled while launching", async () => {
      launcher.launch.mockImplementationOnce(async (sessionId) => {
        await store.update(sessionId, () => ({ status: "cancelled" }));
        return WORKER_PID;
      });

      const { sessionId } = await orchestrator().startUpload(filePath);

      expect(launcher.terminate).toHaveBeenCalledWith(WORKER_PID, sessionId);
      const record = await store.read(sessionId);
      expect(record.status).toBe("cancelled");
      expect(record.workerPid).toBeNull();
    });
  });

  describe("startUploadFromUrl", () => {
    it("accepts http(s) urls with an unknown size", async () => {
      const started = await orchestrator().startUploadFromUrl("https://example.com/a.png");

      expect(started.fileSize).toBeNull();
      expect(started.estimatedDurationSeconds).toBeNull();
      const record = await store.read(started.sessionId);
      expect(record.source).toEqual({ kind: "url", url: "https://example.com/a.png" });
    });

    it("rejects other schemes", async () => {
      await expect(orchestrator().startUploadFromUrl("ftp://example.com/a.png")).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(orchestrator().startUploadFromUrl("not a url")).rejects.toBeInstanceOf(
        ValidationError
      );
    });
  });

  it("hides the worker pid from status snapshots", async () => {
    const orch = orchestrator();
    const { sessionId } = await orch.startUpload(filePath);

    const snapshot = await orch.checkStatus(sessionId);

    expect(snapshot.status).toBe("starting");
    expect(snapshot).not.toHaveProperty("workerPid");
  });

  describe("dead workers", () => {
    it("shows the session as failed on the next status check", async () => {
      const orch = orchestrator();
      const { sessionId } = await orch.startUpload(filePath);
      launcher.isAlive.mockReturnValue(false);

      const snapshot = await orch.checkStatus(sessionId);

      expect(snapshot.status).toBe("failed");
      expect(snapshot.error).toBe("Upload process died unexpectedly");
      expect(snapshot.errorType).toBe("unknown_error");
      expect(launcher.isAlive).toHaveBeenCalledWith(WORKER_PID, sessionId);
      await expect(orch.getResult(sessionId)).rejects.toMatchObject({ status: "failed" });
    });

    it("drops them from the active list", async () => {
      const orch = orchestrator();
      await orch.startUpload(filePath);
      launcher.isAlive.mockReturnValue(false);

      expect((await orch.listUploads(true)).totalCount).toBe(0);
      expect((await orch.listUploads()).uploads[0]?.status).toBe("failed");
    });

    it("leaves finished sessions alone", async () => {
      const orch = orchestrator();
      const { sessionId } = await orch.startUpload(filePath);
      await complete(sessionId);
      launcher.isAlive.mockReturnValue(false);

      expect((await orch.checkStatus(sessionId)).status).toBe("completed");
    });
  });

  it("reports unknown sessions", async () => {
    await expect(orchestrator().checkStatus(MISSING_ID)).rejects.toBeInstanceOf(SessionNotFoundError);
    await expect(orchestrator().cancel(MISSING_ID)).rejects.toBeInstanceOf(SessionNotFoundError);
  });

  describe("getResult", () => {
    it("is not ready while the upload runs", async () => {
      const orch = orchestrator();
      const { sessionId } = await orch.startUpload(filePath);

      const err = await orch.getResult(sessionId).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(NotReadyError);
      expect(err).toMatchObject({ status: "starting" });

      await store.update(sessionId, () => ({ status: "uploading", progress: 0.4 }));
      await expect(orch.getResult(sessionId)).rejects.toMatchObject({ status: "uploading" });
    });

    it("carries the failure reason for failed uploads", async () => {
      const orch = orchestrator();
      const { sessionId } = await orch.startUpload(filePath);
      await store.update(sessionId, () => ({ status: "failed", error: "Storage upload failed with HTTP 400" }));

      await expect(orch.getResult(sessionId)).rejects.toThrow(
        "Upload not completed (status: failed): Storage upload failed with HTTP 400"
      );
    });

    it("returns the same url on every call once completed", async () => {
      const orch = orchestrator();
      const { sessionId } = await orch.startUpload(filePath);
      await complete(sessionId);

      const first = await orch.getResult(sessionId);
      const second = await orch.getResult(sessionId);

      expect(first).toEqual({
        sessionId,
        url: "https://cdn.example/files/a.png",
        fileSize: 1000,
      });
      expect(second).toEqual(first);
    });
  });

  describe("cancel", () => {
    it("cancels once and reports already_finished afterwards", async () => {
      const orch = orchestrator();
      const { sessionId } = await orch.startUpload(filePath);

      expect(await orch.cancel(sessionId)).toEqual({ sessionId, status: "cancelled" });
      expect(await orch.cancel(sessionId)).toEqual({ sessionId, status: "already_finished" });

      expect(launcher.terminate).toHaveBeenCalledTimes(1);
      expect(launcher.terminate).toHaveBeenCalledWith(WORKER_PID, sessionId);

      const record = await store.read(sessionId);
      expect(record.status).toBe("cancelled");
      expect(record.error).toBe("Upload cancelled by user");
    });

    it("does not touch completed sessions", async () => {
      const orch = orchestrator();
      const { sessionId } = await orch.startUpload(filePath);
      await complete(sessionId);

      expect(await orch.cancel(sessionId)).toEqual({ sessionId, status: "already_finished" });
      expect((await store.read(sessionId)).status).toBe("completed");
      expect(launcher.terminate).not.toHaveBeenCalled();
    });
  });

  describe("listUploads", () => {
    it("filters to active sessions on request", async () => {
      const orch = orchestrator();
      const a = await orch.startUpload(filePath);
      const b = await orch.startUpload(filePath);
      await orch.cancel(a.sessionId);

      const all = await orch.listUploads();
      expect(all.totalCount).toBe(2);
      expect(all.activeOnly).toBe(false);

      const active = await orch.listUploads(true);
      expect(active.totalCount).toBe(1);
      expect(active.activeOnly).toBe(true);
      expect(active.uploads[0]?.sessionId).toBe(b.sessionId);
      expect(active.uploads[0]).not.toHaveProperty("source");
    });
  });

  describe("cleanup", () => {
    it("removes every finished session at age zero", async () => {
      const orch = orchestrator();
      const a = await orch.startUpload(filePath);
      const b = await orch.startUpload(filePath);
      await complete(a.sessionId);

      expect(await orch.cleanup(0)).toEqual({ cleanedCount: 1, maxAgeHours: 0 });

      const left = await orch.listUploads();
      expect(left.uploads.map((u) => u.sessionId)).toEqual([b.sessionId]);
    });

    it("keeps recent finished sessions under the default age", async () => {
      const orch = orchestrator();
      const a = await orch.startUpload(filePath);
      await complete(a.sessionId);

      expect(await orch.cleanup()).toEqual({ cleanedCount: 0, maxAgeHours: 24 });
    });

    it("rejects a negative age", async () => {
      await expect(orchestrator().cleanup(-1)).rejects.toBeInstanceOf(ValidationError);
    });
  });
});
