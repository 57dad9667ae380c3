import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  parseCases,
  loadCases,
  CaseFileNotFoundError,
  CaseFileParseError,
  CaseLoadError,
} from "../../../cases/index.js";

const FIXTURE = fileURLToPath(new URL("../../../../test/fixtures/cases.csv", import.meta.url));

const HEADER = "test_case_name,api_key,title,pdf_url,email,expected_status";

describe("parseCases", () => {
  it("should map every column onto the case record", () => {
    const cases = parseCases(
      `${HEADER}\nValid,test-key,A Title,https://example.org/a.pdf,a@example.org,200\n`,
      "inline.csv"
    );

    expect(cases).toEqual([
      {
        row: 1,
        name: "Valid",
        apiKey: "test-key",
        title: "A Title",
        pdfUrl: "https://example.org/a.pdf",
        email: "a@example.org",
        expectedStatus: 200,
      },
    ]);
  });

  it("should keep file order and number rows from 1", () => {
    const cases = parseCases(
      `${HEADER}\nfirst,k,t,u,,200\nsecond,k,t,u,,401\nthird,k,t,u,,403\n`,
      "inline.csv"
    );

    expect(cases.map((c) => [c.row, c.name])).toEqual([
      [1, "first"],
      [2, "second"],
      [3, "third"],
    ]);
  });

  it("should name unnamed cases after their row", () => {
    const cases = parseCases(`${HEADER}\n,k,t,u,,200\nnamed,k,t,u,,200\n,k,t,u,,200\n`, "inline.csv");

    expect(cases.map((c) => c.name)).toEqual(["Test Case 1", "named", "Test Case 3"]);
  });

  it("should name cases after their row when the name column is absent", () => {
    const cases = parseCases("api_key,title,pdf_url,email,expected_status\nk,t,u,,200\n", "inline.csv");

    expect(cases[0].name).toBe("Test Case 1");
  });

  it("should default email to an empty string", () => {
    const cases = parseCases("api_key,title,pdf_url,expected_status\nk,t,u,200\n", "inline.csv");

    expect(cases[0].email).toBe("");
  });

  it("should keep an empty api key as an empty string", () => {
    const cases = parseCases(`${HEADER}\nno key,,t,u,,401\n`, "inline.csv");

    expect(cases[0].apiKey).toBe("");
  });

  it("should read an empty expected status as null", () => {
    const cases = parseCases(`${HEADER}\nno expectation,k,t,u,,\n`, "inline.csv");

    expect(cases[0].expectedStatus).toBeNull();
  });

  it("should accept spreadsheet-style float statuses", () => {
    const cases = parseCases(`${HEADER}\nfloat,k,t,u,,200.0\n`, "inline.csv");

    expect(cases[0].expectedStatus).toBe(200);
  });

  it("should reject a non-numeric expected status and name the row", () => {
    expect(() => parseCases(`${HEADER}\nok,k,t,u,,200\nbad,k,t,u,,OK\n`, "inline.csv")).toThrow(
      'Could not parse inline.csv (row 2): expected_status must be an integer status code, got "OK"'
    );
  });

  it.each(["0xC8", "1e2", "0b11", "200 OK", "-200"])("should reject %s as an expected status", (value) => {
    expect(() => parseCases(`${HEADER}\nbad,k,t,u,,${value}\n`, "inline.csv")).toThrow(
      `Could not parse inline.csv (row 1): expected_status must be an integer status code, got "${value}"`
    );
  });

  it("should reject a fractional expected status", () => {
    expect(() => parseCases(`${HEADER}\nbad,k,t,u,,200.5\n`, "inline.csv")).toThrow(CaseFileParseError);
  });

  it("should keep commas inside quoted cells", () => {
    const cases = parseCases(`${HEADER}\nquoted,k,"Graphs, Trees and Paths",u,,200\n`, "inline.csv");

    expect(cases[0].title).toBe("Graphs, Trees and Paths");
  });

  it("should skip rows where every cell is empty", () => {
    const cases = parseCases(`${HEADER}\nfirst,k,t,u,,200\n,,,,,\n\nsecond,k,t,u,,200\n`, "inline.csv");

    expect(cases.map((c) => c.name)).toEqual(["first", "second"]);
    expect(cases[1].row).toBe(2);
  });

  it("should strip a UTF-8 byte order mark", () => {
    const cases = parseCases(`\uFEFF${HEADER}\nbom,k,t,u,,200\n`, "inline.csv");

    expect(cases[0].name).toBe("bom");
  });

  it("should return no cases for a header-only file", () => {
    expect(parseCases(`${HEADER}\n`, "inline.csv")).toEqual([]);
  });

  it("should raise a parse error for an unterminated quote", () => {
    expect(() => parseCases(`${HEADER}\n"broken,k,t,u,,200\n`, "inline.csv")).toThrow(CaseFileParseError);
  });
});

describe("loadCases", () => {
  it("should load the fixture file", () => {
    const cases = loadCases(FIXTURE);

    expect(cases).toHaveLength(5);
    expect(cases.map((c) => c.expectedStatus)).toEqual([200, 401, 403, 400, 400]);
    expect(cases[1]).toMatchObject({ name: "Missing API key", apiKey: "", email: "" });
  });

  it("should raise CaseFileNotFoundError for a missing file", () => {
    const missing = join(tmpdir(), "kgx3-regression-does-not-exist.csv");

    let caught: unknown;
    try {
      loadCases(missing);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CaseFileNotFoundError);
    expect(caught).toBeInstanceOf(CaseLoadError);
    expect(caught).toMatchObject({ filePath: missing, message: `CSV file not found at ${missing}` });
  });
});
