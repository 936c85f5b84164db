/**
 * Reporting views over a set of extracted meeting records: outstanding
 * work, per-person load, keyword search, date ranges, attendance and
 * topic history.
 *
 * All functions are pure; records are never modified.
 */

import { durationMinutes } from "./dates.js";
import type { ActionItem, ActionItemStatus, MeetingRecord, PriorityLevel } from "./types.js";

type Records = readonly Readonly<MeetingRecord>[];

export interface MeetingActionItem extends ActionItem {
  meeting: string;
  date: string;
  source: string;
}

export interface OwnerLoad {
  owner: string;
  pendingTasks: number;
  tasks: string[];
}

export interface MeetingMatch {
  title: string;
  date: string;
  source: string;
  topics: string[];
  actions: string[];
  decisions: string[];
  attendees: string[];
}

export interface AttendanceCount {
  name: string;
  meetings: number;
}

export interface MeetingMetrics {
  totalMeetings: number;
  totalActions: number;
  totalDecisions: number;
  avgTopicsPerMeeting: number;
  /** Null when no meeting has both a start and an end time. */
  avgDurationMinutes: number | null;
}

export interface TopicMention {
  title: string;
  date: string;
  source: string;
  points: string[];
  actions: string[];
}

export interface TopicPair {
  topics: [string, string];
  meetings: number;
}

export interface ProgressActionItem {
  description: string;
  owner?: string;
  status: ActionItemStatus;
}

export interface ProgressReport {
  since: string;
  totalMeetings: number;
  topics: string[];
  decisions: string[];
  actionItems: ProgressActionItem[];
}

export const DEFAULT_BOTTLENECK_THRESHOLD = 3;

const PRIORITY_RANK: Record<PriorityLevel, number> = { high: 0, medium: 1, low: 2 };

function newestFirst(a: { date: string }, b: { date: string }): number {
  return b.date.localeCompare(a.date);
}

function withMeeting(record: Readonly<MeetingRecord>, item: ActionItem): MeetingActionItem {
  return { ...item, meeting: record.title, date: record.date, source: record.source };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function allActionItems(records: Records): MeetingActionItem[] {
  return records.flatMap((record) => record.actionItems.map((item) => withMeeting(record, item)));
}

/** Pending items, highest priority first, then newest meeting first. */
export function pendingActionItems(records: Records): MeetingActionItem[] {
  return allActionItems(records)
    .filter((item) => item.status === "pending")
    .sort((a, b) => PRIORITY_RANK[a.priorityLevel] - PRIORITY_RANK[b.priorityLevel] || newestFirst(a, b));
}

/** Items whose owner names the person, e.g. "Mike" matches "Mike and Lisa". */
export function tasksFor(records: Records, person: string): MeetingActionItem[] {
  const name = person.trim();
  if (!name) return [];
  const pattern = new RegExp(`(?:^|[^\\w])${escapeRegExp(name)}(?:$|[^\\w])`, "i");
  return allActionItems(records)
    .filter((item) => item.owner !== undefined && pattern.test(item.owner))
    .sort(newestFirst);
}

/** Owners carrying at least `threshold` pending items, most loaded first. */
export function findBottlenecks(records: Records, threshold = DEFAULT_BOTTLENECK_THRESHOLD): OwnerLoad[] {
  const byOwner = new Map<string, OwnerLoad>();
  for (const item of allActionItems(records)) {
    if (item.status !== "pending" || !item.owner) continue;
    const key = item.owner.toLowerCase();
    const load = byOwner.get(key) ?? { owner: item.owner, pendingTasks: 0, tasks: [] };
    load.pendingTasks += 1;
    load.tasks.push(item.description);
    byOwner.set(key, load);
  }
  return [...byOwner.values()]
    .filter((load) => load.pendingTasks >= threshold)
    .sort((a, b) => b.pendingTasks - a.pendingTasks || a.owner.localeCompare(b.owner));
}

export function searchMeetings(records: Records, keyword: string): MeetingMatch[] {
  const needle = keyword.trim().toLowerCase();
  if (!needle) return [];
  const contains = (text: string) => text.toLowerCase().includes(needle);

  const matches: MeetingMatch[] = [];
  for (const record of records) {
    const topics = record.discussion
      .filter((topic) => contains(topic.heading) || topic.points.some(contains))
      .map((topic) => topic.heading);
    const actions = record.actionItems.map((item) => item.description).filter(contains);
    const decisions = record.decisions.filter(contains);
    const agendaHit = record.agenda.some(contains);

    if (!topics.length && !actions.length && !decisions.length && !agendaHit) continue;
    matches.push({
      title: record.title,
      date: record.date,
      source: record.source,
      topics,
      actions,
      decisions,
      attendees: record.attendees.map((a) => a.name),
    });
  }
  return matches.sort(newestFirst);
}

/** Meetings dated within `[start, end]` (ISO dates, inclusive), newest first. */
export function meetingsInRange(records: Records, start: string, end: string): Readonly<MeetingRecord>[] {
  return records.filter((record) => record.date >= start && record.date <= end).sort(newestFirst);
}

export function attendanceCounts(records: Records): AttendanceCount[] {
  const counts = new Map<string, AttendanceCount>();
  for (const record of records) {
    const seen = new Set<string>();
    for (const attendee of record.attendees) {
      const key = attendee.name.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      const entry = counts.get(key) ?? { name: attendee.name, meetings: 0 };
      entry.meetings += 1;
      counts.set(key, entry);
    }
  }
  return [...counts.values()].sort((a, b) => b.meetings - a.meetings || a.name.localeCompare(b.name));
}

export function meetingMetrics(records: Records): MeetingMetrics {
  const totalMeetings = records.length;
  let totalActions = 0;
  let totalDecisions = 0;
  let totalTopics = 0;
  const durations: number[] = [];

  for (const record of records) {
    totalActions += record.actionItems.length;
    totalDecisions += record.decisions.length;
    totalTopics += record.discussion.length;
    if (record.startTime && record.endTime) {
      const minutes = durationMinutes(record.startTime, record.endTime);
      if (minutes !== undefined) durations.push(minutes);
    }
  }

  return {
    totalMeetings,
    totalActions,
    totalDecisions,
    avgTopicsPerMeeting: totalMeetings ? totalTopics / totalMeetings : 0,
    avgDurationMinutes: durations.length ? durations.reduce((sum, m) => sum + m, 0) / durations.length : null,
  };
}

/** Meetings whose discussion has a topic heading containing `topic`, newest first. */
export function topicHistory(records: Records, topic: string): TopicMention[] {
  const needle = topic.trim().toLowerCase();
  if (!needle) return [];

  const mentions: TopicMention[] = [];
  for (const record of records) {
    const matching = record.discussion.filter((entry) => entry.heading.toLowerCase().includes(needle));
    if (!matching.length) continue;
    mentions.push({
      title: record.title,
      date: record.date,
      source: record.source,
      points: matching.flatMap((entry) => entry.points),
      actions: record.actionItems.map((item) => item.description),
    });
  }
  return mentions.sort(newestFirst);
}

/**
 * Topic pairs discussed together in more than one meeting, most frequent
 * first. Headings compare case-insensitively and keep their first spelling.
 */
export function topicCooccurrence(records: Records): TopicPair[] {
  const spelling = new Map<string, string>();
  const counts = new Map<string, { keys: [string, string]; meetings: number }>();

  for (const record of records) {
    const keys = new Set<string>();
    for (const entry of record.discussion) {
      const key = entry.heading.toLowerCase();
      if (!spelling.has(key)) spelling.set(key, entry.heading);
      keys.add(key);
    }
    const sorted = [...keys].sort();
    for (let i = 0; i < sorted.length; i++) {
      for (let j = i + 1; j < sorted.length; j++) {
        const id = `${sorted[i]}\u0000${sorted[j]}`;
        const pair = counts.get(id) ?? { keys: [sorted[i], sorted[j]], meetings: 0 };
        pair.meetings += 1;
        counts.set(id, pair);
      }
    }
  }

  return [...counts.values()]
    .filter((pair) => pair.meetings > 1)
    .map((pair): TopicPair => ({
      topics: [spelling.get(pair.keys[0]) ?? pair.keys[0], spelling.get(pair.keys[1]) ?? pair.keys[1]],
      meetings: pair.meetings,
    }))
    .sort((a, b) => b.meetings - a.meetings || a.topics[0].localeCompare(b.topics[0]) || a.topics[1].localeCompare(b.topics[1]));
}

/** Topics, decisions and action items of the meetings on or after `since` (ISO date). */
export function progressReport(records: Records, since: string): ProgressReport {
  const meetings = records.filter((record) => record.date >= since).sort((a, b) => a.date.localeCompare(b.date));

  const topics = new Map<string, string>();
  const decisions: string[] = [];
  const actionItems: ProgressActionItem[] = [];
  for (const record of meetings) {
    for (const entry of record.discussion) {
      const key = entry.heading.toLowerCase();
      if (!topics.has(key)) topics.set(key, entry.heading);
    }
    for (const decision of record.decisions) {
      if (!decisions.includes(decision)) decisions.push(decision);
    }
    for (const item of record.actionItems) {
      const entry: ProgressActionItem = { description: item.description, status: item.status };
      if (item.owner) entry.owner = item.owner;
      actionItems.push(entry);
    }
  }

  return {
    since,
    totalMeetings: meetings.length,
    topics: [...topics.values()].sort((a, b) => a.localeCompare(b)),
    decisions,
    actionItems,
  };
}
