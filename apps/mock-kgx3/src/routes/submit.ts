/**
 * Mock KGX3 submit endpoint
 * Mimics the WordPress REST route, including its error body shape
 */

import { setTimeout as delay } from "node:timers/promises";
import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";
import type { MockSettings } from "../config.js";
import type { SubmissionStore } from "../store.js";

export const SUBMIT_PATH = "/wp-json/pw-kgx3/v1/submit";

export const submitSchema = z.object({
  title: z.string().trim().min(1, "title is required"),
  pdf_url: z
    .string()
    .url("pdf_url must be a URL")
    .refine((url) => /^https?:\/\//i.test(url), "pdf_url must be an http(s) URL"),
  email: z.union([z.literal(""), z.string().email("email must be a valid address")]).optional(),
});

/**
 * WordPress REST error body: { code, message, data: { status } }
 */
function sendError(
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  details?: unknown
): FastifyReply {
  return reply.status(status).send({
    code,
    message,
    data: details === undefined ? { status } : { status, details },
  });
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export async function registerSubmitRoutes(
  app: FastifyInstance,
  settings: MockSettings,
  store: SubmissionStore
): Promise<void> {
  app.post(SUBMIT_PATH, async (request, reply) => {
    const config = settings.get();

    if (config.latencyMs > 0) {
      await delay(config.latencyMs);
    }

    if (!config.enabled) {
      store.add({ status: 503 });
      return sendError(reply, 503, "service_unavailable", "KGX3 submissions are temporarily disabled");
    }

    if (config.forcedStatus !== null) {
      store.add({ status: config.forcedStatus });
      return sendError(reply, config.forcedStatus, "forced_status", `Forced status ${config.forcedStatus}`);
    }

    const apiKey = headerValue(request.headers["x-api-key"]);
    if (!apiKey) {
      store.add({ status: 401 });
      return sendError(reply, 401, "missing_api_key", "X-API-Key header is required");
    }
    if (!config.apiKeys.includes(apiKey)) {
      store.add({ status: 403, apiKey });
      return sendError(reply, 403, "invalid_api_key", "API key is not valid");
    }

    const result = submitSchema.safeParse(request.body);
    if (!result.success) {
      store.add({ status: 400, apiKey });
      return sendError(reply, 400, "invalid_payload", "Request body failed validation", result.error.flatten().fieldErrors);
    }

    const { title, pdf_url, email } = result.data;
    const submissionId = store.generateSubmissionId();
    store.add({ status: 200, submissionId, apiKey, title, pdfUrl: pdf_url, email });

    request.log.info({ submissionId, title }, "submission accepted");

    return reply.status(200).send({
      success: true,
      submission_id: submissionId,
      message: "Submission received",
    });
  });
}
