// Shared types for meeting-note extraction

export type SectionName =
  | "Header"
  | "Agenda"
  | "Discussion"
  | "ActionItems"
  | "Decisions"
  | "Blockers"
  | "NextMeeting"
  | "Other";

export interface SectionLine {
  /** 1-based line number in the normalised source. */
  lineNumber: number;
  text: string;
}

export type SectionMap = Record<SectionName, SectionLine[]>;

export interface OtherSection {
  heading: string;
  lines: string[];
}

export type ParseWarningCode =
  | "unknown-heading"
  | "header-line"
  | "missing-date"
  | "attendee-format"
  | "action-item-format"
  | "next-meeting-format";

export interface ParseWarning {
  code: ParseWarningCode;
  message: string;
  lineNumber?: number;
  line?: string;
}

export interface DocumentHints {
  meetingType?: string;
  date?: string;
}

export interface SourceDocument {
  source: string;
  content: string;
  hints: DocumentHints;
}

export interface Attendee {
  name: string;
  email?: string;
  role?: string;
}

export type PriorityLevel = "high" | "medium" | "low";

export type ActionItemStatus = "pending" | "in_progress" | "completed";

export interface ActionItem {
  owner?: string;
  description: string;
  priority?: string;
  priorityLevel: PriorityLevel;
  due?: string;
  status: ActionItemStatus;
  raw: string;
}

export interface DiscussionTopic {
  heading: string;
  points: string[];
}

export interface TimeRange {
  startTime?: string;
  endTime?: string;
}

export interface NextMeeting extends TimeRange {
  text: string;
  date?: string;
}

export interface MeetingRecord {
  source: string;
  title: string;
  date: string;
  startTime?: string;
  endTime?: string;
  location?: string;
  meetingType?: string;
  attendees: Attendee[];
  agenda: string[];
  discussion: DiscussionTopic[];
  actionItems: ActionItem[];
  decisions: string[];
  blockers: string[];
  otherSections: OtherSection[];
  nextMeeting?: NextMeeting;
}

export interface ExtractionResult {
  record: Readonly<MeetingRecord>;
  warnings: ParseWarning[];
}
