/**
 * Case Loader
 *
 * Reads the case CSV into TestCase records, in file order. Missing optional
 * columns fall back the same way an empty cell does.
 */

import { existsSync, readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { log } from "../logger.js";
import { CASE_COLUMNS, type TestCase } from "./types.js";
import { CaseFileNotFoundError, CaseFileParseError } from "./errors.js";

const cell = z.string().optional().transform((val) => val ?? "");

/** Plain digits, optionally with a zero fraction (`200.0` from spreadsheet exports) */
const STATUS_PATTERN = /^\d+(\.0+)?$/;

/**
 * Integer status or null.
 */
const expectedStatusCell = z
  .string()
  .optional()
  .transform((val, ctx) => {
    if (val === undefined || val === "") return null;
    if (!STATUS_PATTERN.test(val)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${CASE_COLUMNS.expectedStatus} must be an integer status code, got "${val}"`,
      });
      return z.NEVER;
    }
    return Number(val);
  });

const caseRowSchema = z.object({
  [CASE_COLUMNS.name]: cell,
  [CASE_COLUMNS.apiKey]: cell,
  [CASE_COLUMNS.title]: cell,
  [CASE_COLUMNS.pdfUrl]: cell,
  [CASE_COLUMNS.email]: cell,
  [CASE_COLUMNS.expectedStatus]: expectedStatusCell,
});

/**
 * Parse CSV text. `source` only labels errors.
 */
export function parseCases(content: string, source: string): TestCase[] {
  let records: Record<string, string>[];
  try {
    records = parse(content, {
      columns: true,
      bom: true,
      trim: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CaseFileParseError(source, detail, undefined, { cause: error });
  }

  return records
    .filter((record) => Object.values(record).some((value) => value !== ""))
    .map((record, index) => {
      const row = index + 1;
      const result = caseRowSchema.safeParse(record);
      if (!result.success) {
        const detail = result.error.issues.map((issue) => issue.message).join("; ");
        throw new CaseFileParseError(source, detail, row);
      }

      const data = result.data;
      return {
        row,
        name: data[CASE_COLUMNS.name] || `Test Case ${row}`,
        apiKey: data[CASE_COLUMNS.apiKey],
        title: data[CASE_COLUMNS.title],
        pdfUrl: data[CASE_COLUMNS.pdfUrl],
        email: data[CASE_COLUMNS.email],
        expectedStatus: data[CASE_COLUMNS.expectedStatus],
      };
    });
}

export function loadCases(filePath: string): TestCase[] {
  if (!existsSync(filePath)) {
    throw new CaseFileNotFoundError(filePath);
  }

  const cases = parseCases(readFileSync(filePath, "utf-8"), filePath);
  log.cases.debug({ filePath, count: cases.length }, "loaded");
  return cases;
}
