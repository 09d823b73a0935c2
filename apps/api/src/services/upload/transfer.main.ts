// src/services/upload/transfer.main.ts
//
// Entry point of the detached transfer process:
//   node transfer.main.js --session-id <uuid> --state-dir <dir>
// Output goes to the session's log file; the session record is the only
// channel back to the API process.

import "dotenv/config";
import { parseArgs } from "util";
import { pino } from "pino";

import { loadRetryConfig, MAX_FILE_SIZE_BYTES } from "../../config/uploads.config.js";
import { loadStorageEnv, type StorageEnv } from "../../config/storage.config.js";
import { DiskSessionStore } from "../../store/disk.session.store.js";
import { errorMessage } from "../../utils/errors.js";
import { isUuid } from "../../utils/validators.js";
import { FalStorageClient } from "./storage.upload.js";
import { resolveSource } from "./transfer.source.js";
import { sleep } from "./transfer.retry.js";
import { runTransfer } from "./transfer.worker.js";

const FORCE_EXIT_MS = 10_000;

const { values } = parseArgs({
  options: {
    "session-id": { type: "string" },
    "state-dir": { type: "string" },
  },
});

const sessionId = values["session-id"];
const stateDir = values["state-dir"];

const log = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { pid: process.pid, sessionId },
});

if (!isUuid(sessionId) || !stateDir) {
  log.fatal({ argv: process.argv.slice(2) }, "Usage: transfer.main --session-id <uuid> --state-dir <dir>");
  process.exit(2);
}

const store = new DiskSessionStore(stateDir);
const controller = new AbortController();

function onSignal(signal: NodeJS.Signals) {
  log.warn({ signal }, "Termination requested");
  controller.abort();
  setTimeout(() => process.exit(1), FORCE_EXIT_MS).unref();
}

process.on("SIGTERM", () => onSignal("SIGTERM"));
process.on("SIGINT", () => onSignal("SIGINT"));

async function main(id: string): Promise<void> {
  let storageEnv: StorageEnv;
  try {
    storageEnv = loadStorageEnv();
  } catch (err) {
    // Config problems are terminal for this session.
    await store.update(id, () => ({
      status: "failed",
      error: errorMessage(err),
      errorType: "auth_failed",
    }));
    throw err;
  }

  const status = await runTransfer(id, {
    store,
    storage: new FalStorageClient(storageEnv),
    resolveSource,
    sleep,
    log,
    retry: loadRetryConfig(),
    maxFileSizeBytes: MAX_FILE_SIZE_BYTES,
    signal: controller.signal,
  });

  log.info({ status }, "Transfer process finished");
}

main(sessionId).catch((err) => {
  log.fatal({ err }, "Transfer process crashed");
  process.exitCode = 1;
});
