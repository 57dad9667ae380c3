/**
 * One row of the case file: the request fields to send and the status the
 * endpoint is expected to answer with.
 */
export interface TestCase {
  /** 1-based row number, header excluded */
  row: number;
  name: string;
  /** Empty string means the X-API-Key header is left out */
  apiKey: string;
  title: string;
  pdfUrl: string;
  email: string;
  /** null when the cell is empty; such a case can never pass */
  expectedStatus: number | null;
}

/** Column names as they appear in the CSV header */
export const CASE_COLUMNS = {
  name: "test_case_name",
  apiKey: "api_key",
  title: "title",
  pdfUrl: "pdf_url",
  email: "email",
  expectedStatus: "expected_status",
} as const;
