import { parseDate, parseTimeRange } from "../dates.js";
import { parseWarning } from "../errors.js";
import { stripListMarker } from "../text.js";
import type { NextMeeting, ParseWarning, SectionLine } from "../types.js";

export interface NextMeetingResult {
  nextMeeting?: NextMeeting;
  warnings: ParseWarning[];
}

export function extractNextMeeting(lines: SectionLine[]): NextMeetingResult {
  const [first] = lines;
  if (!first) return { warnings: [] };

  const text = lines
    .map((line) => stripListMarker(line.text))
    .filter(Boolean)
    .join(" ");

  const nextMeeting: NextMeeting = { text };
  const date = parseDate(text);
  if (date) nextMeeting.date = date;
  const range = parseTimeRange(text);
  if (range.startTime) nextMeeting.startTime = range.startTime;
  if (range.endTime) nextMeeting.endTime = range.endTime;

  const warnings: ParseWarning[] = [];
  if (!date && !range.startTime) {
    warnings.push(parseWarning("next-meeting-format", "Next meeting has no recognisable date or time", first));
  }
  return { nextMeeting, warnings };
}
