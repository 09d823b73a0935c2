// src/routes/uploads.routes.ts

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";

import { sendApiError, sendDomainError } from "../utils/apiError.js";
import { DomainError } from "../utils/errors.js";
import { isUuid } from "../utils/validators.js";
import type { UploadOrchestrator } from "../services/upload/upload.orchestrator.js";

// Agents sometimes send booleans and numbers as strings.
const boolParam = z.preprocess(
  (v) => (typeof v === "string" ? v.toLowerCase() === "true" : v),
  z.boolean()
);

const startFileBody = z.object({ filePath: z.string().min(1) });
const startUrlBody = z.object({ url: z.string().min(1) });
const listQuery = z.object({ activeOnly: boolParam.default(false) });
const cleanupBody = z.object({
  maxAgeHours: z.coerce.number().finite().nonnegative().default(24),
});
const sessionParams = z.object({ sessionId: z.string() });

function parseSessionId(req: FastifyRequest, reply: FastifyReply): string | null {
  const parsed = sessionParams.safeParse(req.params);
  if (!parsed.success || !isUuid(parsed.data.sessionId)) {
    sendApiError(reply, 400, "INVALID_SESSION_ID", "sessionId must be a UUID");
    return null;
  }
  return parsed.data.sessionId;
}

function invalidBody(reply: FastifyReply, error: z.ZodError) {
  return sendApiError(reply, 400, "INVALID_REQUEST_BODY", "Invalid request", {
    details: { issues: error.issues.map((i) => ({ path: i.path.join("."), message: i.message })) },
  });
}

export default async function uploadRoutes(
  app: FastifyInstance,
  opts: { orchestrator: UploadOrchestrator }
) {
  const { orchestrator } = opts;

  const fail = (req: FastifyRequest, reply: FastifyReply, err: unknown) => {
    if (!(err instanceof DomainError)) {
      req.log.error({ err }, "Upload request failed");
    }
    return sendDomainError(reply, err);
  };

  // upload_file
  app.post("/v1/uploads", async (req, reply) => {
    const body = startFileBody.safeParse(req.body ?? {});
    if (!body.success) return invalidBody(reply, body.error);

    try {
      const started = await orchestrator.startUpload(body.data.filePath);
      return reply.code(202).send(started);
    } catch (err) {
      return fail(req, reply, err);
    }
  });

  // upload_from_url
  app.post("/v1/uploads/url", async (req, reply) => {
    const body = startUrlBody.safeParse(req.body ?? {});
    if (!body.success) return invalidBody(reply, body.error);

    try {
      const started = await orchestrator.startUploadFromUrl(body.data.url);
      return reply.code(202).send(started);
    } catch (err) {
      return fail(req, reply, err);
    }
  });

  // list_uploads
  app.get("/v1/uploads", async (req, reply) => {
    const query = listQuery.safeParse(req.query ?? {});
    if (!query.success) return invalidBody(reply, query.error);

    try {
      return await orchestrator.listUploads(query.data.activeOnly);
    } catch (err) {
      return fail(req, reply, err);
    }
  });

  // cleanup_old_uploads
  app.post("/v1/uploads/cleanup", async (req, reply) => {
    const body = cleanupBody.safeParse(req.body ?? {});
    if (!body.success) return invalidBody(reply, body.error);

    try {
      return await orchestrator.cleanup(body.data.maxAgeHours);
    } catch (err) {
      return fail(req, reply, err);
    }
  });

  // check_upload_status
  app.get("/v1/uploads/:sessionId/status", async (req, reply) => {
    const sessionId = parseSessionId(req, reply);
    if (!sessionId) return reply;

    try {
      return await orchestrator.checkStatus(sessionId);
    } catch (err) {
      return fail(req, reply, err);
    }
  });

  // get_upload_result
  app.get("/v1/uploads/:sessionId/result", async (req, reply) => {
    const sessionId = parseSessionId(req, reply);
    if (!sessionId) return reply;

    try {
      return await orchestrator.getResult(sessionId);
    } catch (err) {
      return fail(req, reply, err);
    }
  });

  // cancel_upload. Idempotent: a finished session answers `already_finished`.
  app.delete("/v1/uploads/:sessionId", async (req, reply) => {
    const sessionId = parseSessionId(req, reply);
    if (!sessionId) return reply;

    try {
      return await orchestrator.cancel(sessionId);
    } catch (err) {
      return fail(req, reply, err);
    }
  });
}
