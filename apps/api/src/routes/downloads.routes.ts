// src/routes/downloads.routes.ts

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { sendApiError, sendDomainError } from "../utils/apiError.js";
import { DomainError } from "../utils/errors.js";
import { downloadFile, type DownloadOptions } from "../services/download/download.service.js";

const downloadBody = z.object({
  url: z.string().min(1),
  filename: z.string().min(1).optional(),
  downloadDir: z.string().min(1).optional(),
});

// download_file
export default async function downloadRoutes(
  app: FastifyInstance,
  opts: { download: DownloadOptions }
) {
  app.post("/v1/downloads", async (req, reply) => {
    const body = downloadBody.safeParse(req.body ?? {});
    if (!body.success) {
      return sendApiError(reply, 400, "INVALID_REQUEST_BODY", "Invalid request", {
        details: { issues: body.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })) },
      });
    }

    try {
      const result = await downloadFile(body.data, opts.download);
      req.log.info({ url: result.url, filePath: result.filePath, sizeBytes: result.sizeBytes }, "File downloaded");
      return result;
    } catch (err) {
      if (!(err instanceof DomainError)) {
        req.log.error({ err }, "Download failed");
      }
      return sendDomainError(reply, err);
    }
  });
}
