// src/routes/health.ts

import fs from "fs/promises";
import { constants } from "fs";
import type { FastifyInstance } from "fastify";

export default async function healthRoute(
  app: FastifyInstance,
  opts: { stateDir: string }
) {
  app.get("/health", async (req, reply) => {
    const start = Date.now();
    const timestamp = new Date().toISOString();

    let storeOk = false;
    let latencyMs: number | null = null;

    try {
      await fs.access(opts.stateDir, constants.R_OK | constants.W_OK);
      storeOk = true;
      latencyMs = Date.now() - start;
    } catch (err) {
      req.log.error({ err }, "Session store health check failed");
    }

    return reply.status(storeOk ? 200 : 503).send({
      status: storeOk ? "UP" : "DOWN",
      service: "assetlift-api-v1",
      ready: storeOk,
      timestamp,
      checks: {
        sessionStore: {
          ok: storeOk,
          latencyMs,
          timestamp,
        },
      },
    });
  });
}
