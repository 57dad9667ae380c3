/**
 * Mock KGX3 Server
 *
 * Stand-in for the KGX3 submit endpoint, for local runs of the regression
 * runner without touching the shared endpoint.
 *
 * Endpoints:
 *   POST /wp-json/pw-kgx3/v1/submit  - Submit (401/403/400/200)
 *   GET  /submissions                - List received submissions
 *   GET  /config                     - Get current config
 *   POST /config                     - Update config (keys, latency, forced status)
 *   POST /reset                      - Reset store and config
 *   GET  /stats                      - Counts by status
 *   GET  /health                     - Health check
 */

import { loadConfig } from "@kgx3-regression/config";
import { buildApp, SUBMIT_PATH } from "./app.js";

async function main() {
  const config = loadConfig();
  const isDev = config.NODE_ENV !== "production";

  const { app } = await buildApp({
    config: {
      apiKeys: config.MOCK_API_KEYS,
      latencyMs: config.MOCK_LATENCY_MS,
    },
    logger: isDev
      ? {
          level: config.LOG_LEVEL ?? "info",
          transport: {
            target: "pino-pretty",
            options: { colorize: true },
          },
        }
      : { level: config.LOG_LEVEL ?? "info" },
  });

  const shutdown = () => {
    app.log.info("shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("Error while closing mock KGX3 server:", err);
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await app.listen({ port: config.MOCK_PORT, host: "0.0.0.0" });

  console.log(`
========================================
  Mock KGX3 Server
========================================
  Submit URL: http://localhost:${config.MOCK_PORT}${SUBMIT_PATH}

  Config:
    Accepted keys: ${config.MOCK_API_KEYS.length}
    Latency: ${config.MOCK_LATENCY_MS}ms
========================================
`);
}

main().catch((err) => {
  console.error("Failed to start mock KGX3 server:", err);
  process.exit(1);
});
