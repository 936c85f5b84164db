import vocabulary from "./headings.json" with { type: "json" };
import { parseWarning } from "./errors.js";
import { cleanHeading, hasListMarker, normalizeHeading } from "./text.js";
import type { OtherSection, ParseWarning, SectionLine, SectionMap, SectionName } from "./types.js";

type HeadingTarget = Exclude<SectionName, "Other"> | "DiscussionTopic";

export interface SplitResult {
  sections: SectionMap;
  otherSections: OtherSection[];
  warnings: ParseWarning[];
}

interface HeadingMatch {
  target: HeadingTarget;
  label: string;
  inline?: string;
}

const HEADING_TARGETS = new Set<string>([
  "Header",
  "Agenda",
  "Discussion",
  "DiscussionTopic",
  "ActionItems",
  "Decisions",
  "Blockers",
  "NextMeeting",
]);

// Header field labels are key/value lines, never section headings
const FIELD_LABELS = new Set(["date", "time", "when", "location", "where", "room", "venue", "title"]);

const RULE_LINE = /^(?:[-=*_~]\s*){3,}$/;
const MAX_HEADING_WORDS = 6;

function isHeadingTarget(value: string): value is HeadingTarget {
  return HEADING_TARGETS.has(value);
}

function buildHeadingIndex(source: Record<string, string[]>): Map<string, HeadingTarget> {
  const index = new Map<string, HeadingTarget>();
  for (const [target, synonyms] of Object.entries(source)) {
    if (!isHeadingTarget(target)) continue;
    for (const synonym of synonyms) {
      index.set(normalizeHeading(synonym), target);
    }
  }
  return index;
}

const HEADINGS = buildHeadingIndex(vocabulary);

// "Attendees (3)", "Action Items (carried over)"
const QUALIFIER = /\s*\([^()]*\)$/;

// Discussion stays open across these inline headings
const INLINE_IN_DISCUSSION = new Set<HeadingTarget>(["ActionItems", "Decisions", "Blockers"]);

function lookupHeading(label: string): HeadingTarget | undefined {
  const normalized = normalizeHeading(label);
  return HEADINGS.get(normalized) ?? HEADINGS.get(normalized.replace(QUALIFIER, ""));
}

/** Known section heading, either on its own line or as `Heading: inline text`. */
export function matchHeading(text: string): HeadingMatch | null {
  if (hasListMarker(text)) return null;

  const label = cleanHeading(text);
  const target = lookupHeading(label);
  if (target) return { target, label };

  const inline = label.match(/^([^:]{1,40}):\s*(.+)$/);
  if (!inline) return null;
  const inlineTarget = lookupHeading(inline[1]);
  if (!inlineTarget) return null;
  return { target: inlineTarget, label: inline[1].trim(), inline: inline[2].trim() };
}

/** A line that reads as a heading but is not in the vocabulary. */
export function isHeadingLike(text: string): boolean {
  const trimmed = text.trim();
  if (hasListMarker(trimmed)) return false;
  if (/^#{1,6}\s+\S/.test(trimmed)) return true;

  const unmarked = trimmed.replace(/\*\*|__/g, "").trim();
  if (unmarked.endsWith(":")) {
    const label = normalizeHeading(unmarked);
    return (
      label.length > 0 &&
      !label.includes(":") &&
      !FIELD_LABELS.has(label) &&
      label.split(" ").length <= MAX_HEADING_WORDS
    );
  }
  return /^[A-Z][A-Z0-9 &/'-]*[A-Z]$/.test(unmarked) && /[A-Z]{3}/.test(unmarked);
}

function emptySections(): SectionMap {
  return {
    Header: [],
    Agenda: [],
    Discussion: [],
    ActionItems: [],
    Decisions: [],
    Blockers: [],
    NextMeeting: [],
    Other: [],
  };
}

/**
 * Partition a document into labelled sections. Content before the first
 * heading belongs to the header, and the first non-empty line (the title)
 * is never read as a heading.
 */
export function splitSections(content: string): SplitResult {
  const sections = emptySections();
  const otherSections: OtherSection[] = [];
  const warnings: ParseWarning[] = [];
  let current: SectionName = "Header";
  let sawTitle = false;

  const lines = content.split("\n");
  for (let i = 0; i < lines.length; i++) {
    const text = lines[i].replace(/\s+$/, "");
    const trimmed = text.trim();
    if (!trimmed || RULE_LINE.test(trimmed)) continue;

    const line: SectionLine = { lineNumber: i + 1, text };

    if (!sawTitle) {
      sawTitle = true;
      sections.Header.push(line);
      continue;
    }

    const heading = matchHeading(text);
    if (heading) {
      if (heading.target === "DiscussionTopic") {
        current = "Discussion";
        sections.Discussion.push({ lineNumber: line.lineNumber, text: heading.label });
        if (heading.inline) {
          sections.Discussion.push({ lineNumber: line.lineNumber, text: `- ${heading.inline}` });
        }
        continue;
      }

      // "Decision: adopt PostgreSQL" inside a topic files one item
      if (current === "Discussion" && heading.inline && INLINE_IN_DISCUSSION.has(heading.target)) {
        sections[heading.target].push({ lineNumber: line.lineNumber, text: heading.inline });
        continue;
      }

      current = heading.target;
      if (current === "Header") {
        // attendee labels stay in the header so inline lists are seen
        sections.Header.push(line);
      } else if (heading.inline) {
        sections[current].push({ lineNumber: line.lineNumber, text: heading.inline });
      }
      continue;
    }

    if (current !== "Discussion" && isHeadingLike(text)) {
      const label = cleanHeading(text);
      current = "Other";
      otherSections.push({ heading: label, lines: [] });
      sections.Other.push(line);
      warnings.push(parseWarning("unknown-heading", `Unrecognised heading "${label}"`, line));
      continue;
    }

    sections[current].push(line);
    if (current === "Other") {
      const open = otherSections[otherSections.length - 1];
      if (open) open.lines.push(trimmed);
    }
  }

  return { sections, otherSections, warnings };
}
