export class CaseLoadError extends Error {
  constructor(message: string, readonly filePath: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CaseLoadError";
  }
}

export class CaseFileNotFoundError extends CaseLoadError {
  constructor(filePath: string) {
    super(`CSV file not found at ${filePath}`, filePath);
    this.name = "CaseFileNotFoundError";
  }
}

export class CaseFileParseError extends CaseLoadError {
  constructor(filePath: string, detail: string, readonly row?: number, options?: { cause?: unknown }) {
    super(
      row === undefined
        ? `Could not parse ${filePath}: ${detail}`
        : `Could not parse ${filePath} (row ${row}): ${detail}`,
      filePath,
      options
    );
    this.name = "CaseFileParseError";
  }
}
