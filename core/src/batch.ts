import { isDocumentError } from "./errors.js";
import type { DocumentError } from "./errors.js";
import { extractMeeting } from "./extract.js";
import { readDocument } from "./loader.js";
import type { ExtractionResult } from "./types.js";

export interface DocumentFailure {
  source: string;
  error: DocumentError;
}

export interface BatchResult {
  results: ExtractionResult[];
  failures: DocumentFailure[];
}

export async function processFile(filePath: string): Promise<ExtractionResult> {
  const document = await readDocument(filePath);
  return extractMeeting(document);
}

/**
 * Extract every file independently. Read and extraction failures are
 * collected per file; any other error is rethrown.
 */
export async function processFiles(filePaths: string[]): Promise<BatchResult> {
  const settled = await Promise.allSettled(filePaths.map((filePath) => processFile(filePath)));

  const batch: BatchResult = { results: [], failures: [] };
  settled.forEach((outcome, index) => {
    if (outcome.status === "fulfilled") {
      batch.results.push(outcome.value);
      return;
    }
    if (!isDocumentError(outcome.reason)) {
      throw outcome.reason;
    }
    batch.failures.push({ source: filePaths[index], error: outcome.reason });
  });
  return batch;
}
