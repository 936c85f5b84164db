import { parseDate, parseTimeRange } from "../dates.js";
import { parseWarning } from "../errors.js";
import { cleanHeading, stripListMarker } from "../text.js";
import type { Attendee, ParseWarning, SectionLine } from "../types.js";

export interface HeaderFields {
  title?: string;
  date?: string;
  startTime?: string;
  endTime?: string;
  location?: string;
  attendees: Attendee[];
  warnings: ParseWarning[];
}

const ATTENDEE_BULLET = /^\s*[-*•+]\s+/;
// "Attendees:", "Attendees (3): Ana, Ben", "## Participants"
const ATTENDEE_LABEL = /^(?:#{1,6}\s*)?(?:attendees?|attendance|participants?|present|people)(?:\s*\([^()]*\))?\s*(?::\s*(.*))?$/i;
const DATE_LABEL = /^(?:meeting\s+)?(?:date|when)\s*:\s*(.+)$/i;
const TIME_LABEL = /^time\s*:\s*(.+)$/i;
const LOCATION_LABEL = /^(?:location\b\s*:?|(?:where|room|venue)\s*:)\s*(.+)$/i;
const EMAIL_IN_BRACKETS = /[(<]\s*([^\s()<>@]+@[^\s()<>]+\.[^\s()<>]+)\s*[)>]/;
const ROLE_SEPARATOR = /\s+[-–—]\s+/;

/**
 * Parse one attendee entry: `Name (email) - Role`, `Name <email>`,
 * `Name - Role` or `Name (Role)`.
 */
export function parseAttendee(text: string): Attendee | null {
  let rest = stripListMarker(text);
  const details: Omit<Attendee, "name"> = {};

  const email = rest.match(EMAIL_IN_BRACKETS);
  if (email) {
    details.email = email[1];
    rest = (rest.slice(0, email.index) + rest.slice((email.index ?? 0) + email[0].length)).replace(/\s+/g, " ").trim();
  }

  const separator = rest.match(ROLE_SEPARATOR);
  if (separator && separator.index !== undefined) {
    const role = rest.slice(separator.index + separator[0].length).trim();
    if (role) details.role = role;
    rest = rest.slice(0, separator.index).trim();
  } else {
    const parenthesised = rest.match(/^(.*?)\s*\(([^)]+)\)\s*$/);
    if (parenthesised) {
      details.role = parenthesised[2].trim();
      rest = parenthesised[1];
    }
  }

  const name = rest.replace(/[,;]+$/, "").trim();
  if (!name) return null;
  return { name, ...details };
}

function splitInlineAttendees(list: string): string[] {
  return list
    .split(/[,;]|\s+and\s+/)
    .map((s) => s.trim())
    .filter((s) => s);
}

export function extractHeader(lines: SectionLine[]): HeaderFields {
  const result: HeaderFields = { attendees: [], warnings: [] };

  const [titleLine, ...rest] = lines;
  // Early return if the header is empty
  if (!titleLine) {
    return result;
  }
  result.title = cleanHeading(titleLine.text) || titleLine.text.trim();

  const addAttendee = (text: string, line: SectionLine) => {
    const attendee = parseAttendee(text);
    if (attendee) {
      result.attendees.push(attendee);
    } else {
      result.warnings.push(parseWarning("attendee-format", "Attendee line has no name", line));
    }
  };

  let inAttendeeList = false;
  for (const line of rest) {
    const bulleted = ATTENDEE_BULLET.test(line.text);
    const unmarked = line.text.trim().replace(/\*\*|__/g, "");
    // "- **Date:** March 15, 2024" is a field, not an attendee
    const text = bulleted ? stripListMarker(unmarked) : unmarked;

    const attendeeLabel = text.match(ATTENDEE_LABEL);
    if (attendeeLabel) {
      const entries = splitInlineAttendees(attendeeLabel[1] ?? "");
      for (const entry of entries) {
        addAttendee(entry, line);
      }
      inAttendeeList = entries.length === 0;
      continue;
    }

    const dateLabel = text.match(DATE_LABEL);
    if (dateLabel) {
      inAttendeeList = false;
      const date = parseDate(dateLabel[1]);
      if (date) {
        result.date = date;
      } else {
        result.warnings.push(parseWarning("header-line", `Unrecognised date "${dateLabel[1].trim()}"`, line));
      }
      const range = parseTimeRange(dateLabel[1]);
      if (range.startTime && !result.startTime) Object.assign(result, range);
      continue;
    }

    const timeLabel = text.match(TIME_LABEL);
    if (timeLabel) {
      inAttendeeList = false;
      const range = parseTimeRange(timeLabel[1]);
      if (range.startTime) {
        Object.assign(result, range);
      } else {
        result.warnings.push(parseWarning("header-line", `Unrecognised time "${timeLabel[1].trim()}"`, line));
      }
      continue;
    }

    const locationLabel = text.match(LOCATION_LABEL);
    if (locationLabel) {
      inAttendeeList = false;
      result.location = locationLabel[1].trim();
      continue;
    }

    // bulleted names, or unmarked names listed under an "Attendees:" label
    if (bulleted || inAttendeeList) {
      addAttendee(text, line);
      continue;
    }

    // A bare date line, e.g. "March 15, 2024 | 10:00 AM - 11:00 AM"
    const bareDate = result.date ? undefined : parseDate(text);
    if (bareDate) {
      result.date = bareDate;
      const range = parseTimeRange(text);
      if (range.startTime && !result.startTime) Object.assign(result, range);
      continue;
    }

    result.warnings.push(parseWarning("header-line", "Header line matched no known field", line));
  }

  // "Sprint Planning - March 15, 2024"
  if (!result.date) {
    result.date = parseDate(titleLine.text);
  }
  if (!result.date) {
    result.warnings.push(parseWarning("missing-date", "No meeting date found in the header", titleLine));
  }

  return result;
}
