/**
 * Configuration and stats routes
 * Allows runtime configuration changes for testing
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { MockSettings } from "../config.js";
import type { SubmissionStore } from "../store.js";

const configUpdateSchema = z.object({
  apiKeys: z.array(z.string().min(1)).optional(),
  latencyMs: z.number().int().min(0).max(600_000).optional(),
  forcedStatus: z.number().int().min(100).max(599).nullable().optional(),
  enabled: z.boolean().optional(),
});

export async function registerAdminRoutes(
  app: FastifyInstance,
  settings: MockSettings,
  store: SubmissionStore
): Promise<void> {
  app.get("/config", async (request, reply) => {
    return reply.send(settings.get());
  });

  app.post("/config", async (request, reply) => {
    const result = configUpdateSchema.safeParse(request.body);
    if (!result.success) {
      return reply.status(400).send({
        error: "Invalid configuration",
        details: result.error.format(),
      });
    }

    const updated = settings.update(result.data);
    request.log.info({ updates: result.data }, "config updated");
    return reply.send(updated);
  });

  /**
   * POST /reset - Reset everything (config + stored submissions)
   */
  app.post("/reset", async (request, reply) => {
    store.reset();
    settings.reset();
    return reply.send({ success: true, message: "Store and config reset" });
  });

  app.get("/submissions", async (request, reply) => {
    const submissions = store.getAll();
    return reply.send({ count: submissions.length, submissions });
  });

  app.get("/stats", async (request, reply) => {
    return reply.send(store.getStats());
  });

  app.get("/health", async (request, reply) => {
    return reply.send({ status: "ok" });
  });
}
