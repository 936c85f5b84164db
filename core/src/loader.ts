import fs from "node:fs/promises";
import path from "node:path";
import { isoDate } from "./dates.js";
import { ReadError } from "./errors.js";
import type { DocumentHints, SourceDocument } from "./types.js";

// sprint_planning_2024_03_15.txt, architecture-review-2024-03-18.md
const FILE_NAME_PATTERN = /^(.+?)[_-](\d{4})[_-](\d{1,2})[_-](\d{1,2})$/;

function titleCase(words: string[]): string {
  return words
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1).toLowerCase())
    .join(" ");
}

/** Meeting type and date encoded in a `<type>_<YYYY>_<MM>_<DD>` file name. */
export function hintsFromSource(source: string): DocumentHints {
  const base = path.basename(source, path.extname(source));
  const match = base.match(FILE_NAME_PATTERN);
  if (!match) return {};

  const [, type, year, month, day] = match;
  const hints: DocumentHints = {};
  const meetingType = titleCase(type.split(/[_\-\s]+/));
  if (meetingType) hints.meetingType = meetingType;
  const date = isoDate(Number(year), Number(month), Number(day));
  if (date) hints.date = date;
  return hints;
}

export function loadDocument(content: string, source: string): SourceDocument {
  const id = source.trim();
  if (!id) {
    throw new ReadError("Document source identifier is empty", source);
  }

  const normalized = content.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  if (!normalized.trim()) {
    throw new ReadError(`Document is empty: ${id}`, id);
  }

  return { source: id, content: normalized, hints: hintsFromSource(id) };
}

export async function readDocument(filePath: string): Promise<SourceDocument> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReadError(`Failed to read "${filePath}": ${message}`, filePath, { cause: error });
  }
  return loadDocument(content, filePath);
}
