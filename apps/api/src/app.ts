// src/app.ts

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import uploadRoutes from "./routes/uploads.routes.js";
import downloadRoutes from "./routes/downloads.routes.js";
import healthRoute from "./routes/health.js";
import type { UploadOrchestrator } from "./services/upload/upload.orchestrator.js";
import type { DownloadOptions } from "./services/download/download.service.js";

export interface AppRoutesDeps {
  orchestrator: UploadOrchestrator;
  download: DownloadOptions;
  stateDir: string;
}

export function createApp(logger: FastifyServerOptions["logger"]): FastifyInstance {
  const app = Fastify({
    logger,
    // Every endpoint takes small JSON; file bytes never go through HTTP.
    bodyLimit: 1024 * 1024,
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode =
      err.statusCode && Number.isInteger(err.statusCode) ? err.statusCode : 500;

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return reply.code(statusCode).send({
      error: {
        code: statusCode < 500 ? "REQUEST_ERROR" : "INTERNAL_ERROR",
        message: statusCode < 500 ? err.message : "Unexpected server error",
        retryable: false,
      },
    });
  });

  return app;
}

export async function registerRoutes(app: FastifyInstance, deps: AppRoutesDeps) {
  await app.register(uploadRoutes, { orchestrator: deps.orchestrator });
  await app.register(downloadRoutes, { download: deps.download });
  await app.register(healthRoute, { stateDir: deps.stateDir });
}
