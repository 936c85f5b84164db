import type { ParseWarning, ParseWarningCode, SectionLine } from "./types.js";

/** Base class for failures that abort processing of a single document. */
export class DocumentError extends Error {
  readonly source: string;

  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DocumentError";
    this.source = source;
  }
}

/** Input is missing, empty or could not be read. */
export class ReadError extends DocumentError {
  constructor(message: string, source: string, options?: { cause?: unknown }) {
    super(message, source, options);
    this.name = "ReadError";
  }
}

/** Content was read but no meeting date could be derived from it. */
export class ExtractionError extends DocumentError {
  constructor(message: string, source: string) {
    super(message, source);
    this.name = "ExtractionError";
  }
}

export function isDocumentError(err: unknown): err is DocumentError {
  return err instanceof DocumentError;
}

export function parseWarning(
  code: ParseWarningCode,
  message: string,
  line?: SectionLine,
): ParseWarning {
  if (!line) return { code, message };
  return { code, message, lineNumber: line.lineNumber, line: line.text };
}
