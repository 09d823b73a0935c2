// src/state/gc/upload.gc.scheduler.ts

import { runUploadGc, type UploadGcDeps } from "./upload.gc.worker.js";

let timer: NodeJS.Timeout | null = null;
let running: Promise<void> | null = null;

export function startUploadGc(deps: UploadGcDeps) {
  if (timer) return;

  deps.log.info(
    { intervalMs: deps.config.intervalMs, retentionHours: deps.config.retentionHours },
    "Upload GC started"
  );

  timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadGc(deps).catch(err => {
      deps.log.error(err, "Upload GC failed");
    }).finally(() => {
      running = null;
    });
  }, deps.config.intervalMs);

  timer.unref();
}

export async function stopUploadGc(): Promise<void> {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }

  if (running) {
    await running;
    running = null;
  }
}
