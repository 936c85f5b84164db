import { ExtractionError } from "./errors.js";
import { extractActionItems } from "./extractors/action-items.js";
import { extractDiscussion } from "./extractors/discussion.js";
import { extractHeader } from "./extractors/header.js";
import { extractList } from "./extractors/lists.js";
import { extractNextMeeting } from "./extractors/next-meeting.js";
import { loadDocument } from "./loader.js";
import { splitSections } from "./sections.js";
import type { ExtractionResult, MeetingRecord, SourceDocument } from "./types.js";

function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Build the structured record for one document. The record is deeply
 * frozen; parse warnings are returned beside it in source order.
 */
export function extractMeeting(document: SourceDocument): ExtractionResult {
  const { sections, otherSections, warnings: splitWarnings } = splitSections(document.content);
  const header = extractHeader(sections.Header);
  const actions = extractActionItems(sections.ActionItems);
  const next = extractNextMeeting(sections.NextMeeting);

  const date = header.date ?? document.hints.date;
  if (!date) {
    throw new ExtractionError(`No meeting date found in ${document.source}`, document.source);
  }

  const record: MeetingRecord = {
    source: document.source,
    title: header.title ?? document.source,
    date,
    attendees: header.attendees,
    agenda: extractList(sections.Agenda),
    discussion: extractDiscussion(sections.Discussion),
    actionItems: actions.items,
    decisions: extractList(sections.Decisions),
    blockers: extractList(sections.Blockers),
    otherSections,
  };
  if (header.startTime) record.startTime = header.startTime;
  if (header.endTime) record.endTime = header.endTime;
  if (header.location) record.location = header.location;
  if (document.hints.meetingType) record.meetingType = document.hints.meetingType;
  if (next.nextMeeting) record.nextMeeting = next.nextMeeting;

  const warnings = [...splitWarnings, ...header.warnings, ...actions.warnings, ...next.warnings]
    .sort((a, b) => (a.lineNumber ?? 0) - (b.lineNumber ?? 0));

  return { record: deepFreeze(record), warnings };
}

export function extractMeetingFromText(content: string, source: string): ExtractionResult {
  return extractMeeting(loadDocument(content, source));
}
