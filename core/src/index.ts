export * from "./types.js";
export { DocumentError, ReadError, ExtractionError, isDocumentError } from "./errors.js";
export { isoDate, parseDate, parseTime, parseTimeRange, durationMinutes } from "./dates.js";
export { loadDocument, readDocument, hintsFromSource } from "./loader.js";
export { splitSections, matchHeading, isHeadingLike } from "./sections.js";
export type { SplitResult } from "./sections.js";
export { extractHeader, parseAttendee } from "./extractors/header.js";
export type { HeaderFields } from "./extractors/header.js";
export { extractList } from "./extractors/lists.js";
export { extractActionItems, parseActionItem, priorityLevel } from "./extractors/action-items.js";
export { extractDiscussion, GENERAL_TOPIC } from "./extractors/discussion.js";
export { extractNextMeeting } from "./extractors/next-meeting.js";
export { extractMeeting, extractMeetingFromText } from "./extract.js";
export { processFile, processFiles } from "./batch.js";
export type { BatchResult, DocumentFailure } from "./batch.js";
export * from "./analytics.js";
