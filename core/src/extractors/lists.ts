import { hasListMarker, isIndented, stripListMarker } from "../text.js";
import type { SectionLine } from "../types.js";

export interface ListEntry {
  lineNumber: number;
  text: string;
}

/**
 * Collapse section lines into list entries. Enumeration markers are
 * stripped; an indented line without a marker continues the previous entry.
 */
export function collectEntries(lines: SectionLine[]): ListEntry[] {
  const entries: ListEntry[] = [];
  for (const line of lines) {
    const previous = entries[entries.length - 1];
    if (previous && isIndented(line.text) && !hasListMarker(line.text)) {
      previous.text = `${previous.text} ${line.text.trim()}`;
      continue;
    }
    const text = stripListMarker(line.text);
    if (text) entries.push({ lineNumber: line.lineNumber, text });
  }
  return entries;
}

/** Ordered, trimmed list items (agenda, decisions, blockers). */
export function extractList(lines: SectionLine[]): string[] {
  return collectEntries(lines).map((entry) => entry.text);
}
