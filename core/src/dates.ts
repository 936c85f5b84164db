import * as chrono from "chrono-node";
import type { ParsedComponents } from "chrono-node";
import type { TimeRange } from "./types.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYY-MM-DD`, or undefined for a day the calendar does not have. */
export function isoDate(year: number, month: number, day: number): string | undefined {
  if (month < 1 || month > 12 || day < 1) return undefined;
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  if (day > daysInMonth) return undefined;
  return `${year}-${pad(month)}-${pad(day)}`;
}

function componentsToDate(components: ParsedComponents): string | undefined {
  if (!components.isCertain("year") || !components.isCertain("month") || !components.isCertain("day")) {
    return undefined;
  }
  const year = components.get("year");
  const month = components.get("month");
  const day = components.get("day");
  if (year === null || month === null || day === null) return undefined;
  return isoDate(year, month, day);
}

function componentsToClock(components: ParsedComponents | null | undefined): string | undefined {
  if (!components || !components.isCertain("hour")) return undefined;
  const hour = components.get("hour");
  const minute = components.get("minute") ?? 0;
  if (hour === null) return undefined;
  return `${pad(hour)}:${pad(minute)}`;
}

/**
 * First fully specified calendar date in free text, as `YYYY-MM-DD`.
 * Dates without an explicit year are ignored so results never depend on
 * the day the notes are parsed. Slash dates are read month first.
 */
export function parseDate(text: string): string | undefined {
  for (const result of chrono.strict.parse(text)) {
    const date = componentsToDate(result.start);
    if (date) return date;
  }
  return undefined;
}

/**
 * Clock times of the first time expression in the text, as 24h `HH:MM`.
 * `10:00 AM - 11:30 AM` gives a start and an end; a lone time gives only a
 * start.
 */
export function parseTimeRange(text: string): TimeRange {
  for (const result of chrono.strict.parse(text)) {
    const startTime = componentsToClock(result.start);
    if (!startTime) continue;
    const endTime = componentsToClock(result.end);
    return endTime ? { startTime, endTime } : { startTime };
  }
  return {};
}

/** First clock time (`10:00`, `2pm`, `3:30 p.m.`) in the text. */
export function parseTime(text: string): string | undefined {
  return parseTimeRange(text).startTime;
}

/** Minutes between two `HH:MM` values, or undefined when the end precedes the start. */
export function durationMinutes(startTime: string, endTime: string): number | undefined {
  const [sh, sm] = startTime.split(":").map(Number);
  const [eh, em] = endTime.split(":").map(Number);
  const minutes = eh * 60 + em - (sh * 60 + sm);
  return minutes >= 0 ? minutes : undefined;
}
