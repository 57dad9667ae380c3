/**
 * Machine-readable run records.
 *
 * Usage:
 *   const written = createRunRecord({ name, endpoint, casesFile })
 *     .setRun(run, summary)
 *     .addThreshold("summary.passRate", ">=", 100, summary.successRate)
 *     .write();
 */

export * from "./run-record-schema.js";
export * from "./run-record-writer.js";
