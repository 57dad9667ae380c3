import { z } from "zod";

// =============================================================================
// Helpers
// =============================================================================

/**
 * Parse string booleans from environment variables.
 * z.coerce.boolean() treats any non-empty string as true, including "false"
 */
const stringBoolean = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return val.toLowerCase() === "true";
  });

/** Comma-separated list, blank entries dropped */
const stringList = z
  .union([z.array(z.string()), z.string()])
  .transform((val) => {
    const items = Array.isArray(val) ? val : val.split(",");
    return items.map((item) => item.trim()).filter((item) => item.length > 0);
  });

/** Optional number where an empty string counts as unset */
const optionalNumber = z.preprocess(
  (val) => (val === "" ? undefined : val),
  z.coerce.number().positive().optional()
);

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

export const DEFAULT_KGX3_API_URL = "https://preprintwatch.com/wp-json/pw-kgx3/v1/submit";

// =============================================================================
// Config Schema - Grouped by Domain
// =============================================================================

export const configSchema = z.object({
  // ===========================================================================
  // Environment
  // ===========================================================================
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  /** Defaults to debug in development, info elsewhere */
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),

  // ===========================================================================
  // Endpoint under test
  // ===========================================================================
  KGX3_API_URL: z.string().url().default(DEFAULT_KGX3_API_URL),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().max(MAX_TIMER_MS).default(200_000),
  /** Pause after every request, including the last */
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(1000),

  // ===========================================================================
  // Inputs & Outputs
  // ===========================================================================
  CASES_FILE: z.string().min(1).default("test_data.csv"),
  OUTPUT_LOG_FILE: z.string().min(1).default("test_results.log"),
  REPORT_DIR: z.string().min(1).default("."),
  /** JSON run records are written to <dir>/test-reports */
  TEST_REPORTS_DIR: z.string().min(1).default("."),
  /** Raw (non-JSON) response bodies are cut to this many characters in the log */
  RESPONSE_BODY_LOG_LIMIT: z.coerce.number().int().positive().default(500),
  OPEN_REPORT: stringBoolean.default(false),

  // ===========================================================================
  // Pass/Fail Thresholds
  // ===========================================================================
  MIN_SUCCESS_RATE: z.coerce.number().min(0).max(100).default(100),
  MAX_AVG_LATENCY_MS: optionalNumber,

  // ===========================================================================
  // Mock endpoint (local runs and tests)
  // ===========================================================================
  MOCK_PORT: z.coerce.number().int().min(0).max(65535).default(4580),
  MOCK_API_KEYS: stringList.default("test-key"),
  MOCK_LATENCY_MS: z.coerce.number().int().min(0).max(MAX_TIMER_MS).default(0),
});

// =============================================================================
// Config Loading
// =============================================================================

export type Config = z.infer<typeof configSchema>;

/** Exit code used when the process cannot start because of bad configuration */
export const CONFIG_ERROR_EXIT_CODE = 2;

let cachedConfig: Config | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const result = configSchema.safeParse(env);

  if (!result.success) {
    console.error("Missing or invalid environment variables:");
    console.error(result.error.format());
    process.exit(CONFIG_ERROR_EXIT_CODE);
  }

  const config = result.data;
  cachedConfig = config;
  return config;
}

/** For testing: reset cached config */
export function resetConfig(): void {
  cachedConfig = null;
}
