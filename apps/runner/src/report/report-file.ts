import { mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { formatFileStamp } from "../domain/time.js";

export class ReportWriteError extends Error {
  constructor(readonly filePath: string, options?: { cause?: unknown }) {
    const detail = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(`Could not write ${filePath}: ${detail}`, options);
    this.name = "ReportWriteError";
  }
}

/** `API_Performance_Report_2024-03-09_14-05-00.html` */
export function reportFileName(at: Date | number): string {
  return `API_Performance_Report_${formatFileStamp(at)}.html`;
}

/**
 * Write the rendered report into `dir` (created if missing) and return the
 * absolute path.
 */
export function writeHtmlReport(html: string, dir: string, at: Date | number): string {
  const filePath = resolve(join(dir, reportFileName(at)));
  try {
    mkdirSync(dir, { recursive: true });
    writeFileSync(filePath, html);
  } catch (error) {
    throw new ReportWriteError(filePath, { cause: error });
  }
  return filePath;
}
