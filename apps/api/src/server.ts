// src/server.ts

import "dotenv/config";
import fs from "fs/promises";
import os from "os";
import path from "path";

import { createApp, registerRoutes } from "./app.js";
import { DiskSessionStore } from "./store/disk.session.store.js";
import { ProcessWorkerLauncher } from "./services/upload/upload.launcher.js";
import { UploadOrchestrator } from "./services/upload/upload.orchestrator.js";
import { startUploadGc, stopUploadGc } from "./state/gc/upload.gc.scheduler.js";
import { reconcileOrphanUploads } from "./state/gc/upload.gc.reconcile.js";
import { loadGcConfig, loadUploadConfig } from "./config/uploads.config.js";
import { parseIntEnv } from "./config/env.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const app = createApp({
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "production" ? "info" : "debug"),
  redact: {
    paths: ["req.headers.authorization"],
    remove: true,
  },
});

const uploadConfig = loadUploadConfig();
const gcConfig = loadGcConfig();

async function validateStateDir() {
  const dir = uploadConfig.stateDir;
  const home = os.homedir();

  if (!path.isAbsolute(dir)) {
    throw new Error("UPLOAD_STATE_DIR must resolve to an absolute path");
  }
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`UPLOAD_STATE_DIR is unsafe: ${dir}`);
  }

  await fs.mkdir(path.join(dir, "logs"), { recursive: true });

  // Refuse to start on a state dir that later writes would fail on.
  const testFile = path.join(dir, `.write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(testFile, "ok");
  await fs.unlink(testFile);
}

try {
  await validateStateDir();
  app.log.info({ stateDir: uploadConfig.stateDir }, "Session store ready");
} catch (err) {
  app.log.error(err, "Failed to initialize session store");
  process.exit(1);
}

const store = new DiskSessionStore(uploadConfig.stateDir);
const launcher = new ProcessWorkerLauncher(uploadConfig.stateDir, app.log);
const orchestrator = new UploadOrchestrator({
  store,
  launcher,
  log: app.log,
  maxActiveUploads: uploadConfig.maxActiveUploads,
  orphanGraceMs: gcConfig.orphanGraceMs,
});

const recovered = await reconcileOrphanUploads({
  store,
  launcher,
  log: app.log,
  graceMs: gcConfig.orphanGraceMs,
});
if (recovered > 0) {
  app.log.warn({ recovered }, "Orphan uploads recovered at startup");
}

// Reconcile runs on every pass; purge only when retention is set.
startUploadGc({ store, launcher, log: app.log, config: gcConfig });

await registerRoutes(app, {
  orchestrator,
  download: { defaultDir: uploadConfig.downloadDir },
  stateDir: uploadConfig.stateDir,
});

const PORT = parseIntEnv(process.env, "PORT", 3000);
const HOST = process.env.HOST?.trim() || "127.0.0.1";

try {
  await app.listen({
    port: PORT,
    host: HOST,
  });

  app.log.info(
    { port: PORT, host: HOST, env: process.env.NODE_ENV ?? "development" },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadGc();
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

// In-flight transfers run in their own processes and outlive the server.
process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
