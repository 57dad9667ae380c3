import { fastify, type FastifyInstance, type FastifyServerOptions } from "fastify";
import { MockSettings, type MockConfig } from "./config.js";
import { SubmissionStore } from "./store.js";
import { registerSubmitRoutes, SUBMIT_PATH } from "./routes/submit.js";
import { registerAdminRoutes } from "./routes/admin.js";

export interface MockAppOptions {
  config?: Partial<MockConfig>;
  logger?: FastifyServerOptions["logger"];
}

export interface MockApp {
  app: FastifyInstance;
  settings: MockSettings;
  store: SubmissionStore;
}

/**
 * Build (but do not start) a mock endpoint. Each call gets its own settings
 * and store, so tests can run several side by side.
 */
export async function buildApp(options: MockAppOptions = {}): Promise<MockApp> {
  const app = fastify({ logger: options.logger ?? false });
  const settings = new MockSettings(options.config);
  const store = new SubmissionStore();

  await registerSubmitRoutes(app, settings, store);
  await registerAdminRoutes(app, settings, store);
  await app.ready();

  return { app, settings, store };
}

export { SUBMIT_PATH, submitSchema } from "./routes/submit.js";
export { MockSettings, defaultMockConfig, type MockConfig } from "./config.js";
export { SubmissionStore, type StoredSubmission, type StoreStats } from "./store.js";
