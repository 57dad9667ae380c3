import { pino, type LoggerOptions } from "pino";
import { AsyncLocalStorage } from "node:async_hooks";
import { config } from "./config.js";

const isDev = config.NODE_ENV === "development";

// =============================================================================
// Run Context
// =============================================================================
// Every log line emitted while a regression run is in progress carries the
// run's id, so console output can be matched to the JSON run record.
//
// Usage:
//   await withRunAsync(runId, async () => {
//     log.runner.info({ row: 1 }, "sending"); // runId added automatically
//   });
// =============================================================================

interface RunContext {
  runId: string;
}

const runStorage = new AsyncLocalStorage<RunContext>();

export async function withRunAsync<T>(runId: string, fn: () => Promise<T>): Promise<T> {
  return runStorage.run({ runId }, fn);
}

// =============================================================================
// Structured Logger
// =============================================================================

const baseConfig: LoggerOptions = {
  level: config.LOG_LEVEL ?? (isDev ? "debug" : "info"),

  formatters: {
    level: (label) => ({ level: label }),
  },

  timestamp: pino.stdTimeFunctions.isoTime,

  mixin() {
    const runId = runStorage.getStore()?.runId;
    return runId ? { runId } : {};
  },
};

export const logger = isDev
  ? pino({
      ...baseConfig,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
          messageFormat: "{component} | {msg}",
          singleLine: true,
        },
      },
    })
  : pino(baseConfig);

// =============================================================================
// Component Loggers
// =============================================================================

export const log = {
  // Case file loading
  cases: logger.child({ component: "cases" }),

  // Per-case request loop
  runner: logger.child({ component: "runner" }),

  // Outgoing requests to the endpoint
  http: logger.child({ component: "http" }),

  // HTML report and JSON run record
  report: logger.child({ component: "report" }),

  // Startup, shutdown, configuration
  system: logger.child({ component: "system" }),
};

export type LogComponent = keyof typeof log;

// =============================================================================
// Convenience Functions
// =============================================================================

/**
 * Log a failure with full context for debugging
 */
export function logFailure(
  component: LogComponent,
  event: string,
  error: Error | unknown,
  context: Record<string, unknown> = {}
): void {
  const err = error instanceof Error ? error : new Error(String(error));

  log[component].error({
    ...context,
    error: err.message,
    errorName: err.name,
    ...(isDev && { stack: err.stack }),
  }, event);
}

/**
 * Log a warning for unexpected but non-critical issues
 */
export function logWarning(
  component: LogComponent,
  event: string,
  context: Record<string, unknown> = {}
): void {
  log[component].warn(context, event);
}
