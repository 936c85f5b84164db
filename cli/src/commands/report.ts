import type { Command } from "commander";
import {
  attendanceCounts,
  findBottlenecks,
  meetingMetrics,
  meetingsInRange,
  parseDate,
  pendingActionItems,
  processFiles,
  progressReport,
  searchMeetings,
  tasksFor,
  topicCooccurrence,
  topicHistory,
} from "meeting-notes-core";
import type { MeetingActionItem, MeetingRecord } from "meeting-notes-core";
import { getBottleneckThreshold, getMaxFiles } from "../lib/env.js";
import { logger } from "../lib/logger.js";
import { expandInputs, parsePositiveInt } from "../lib/utils.js";

interface ReportOptions {
  person?: string;
  keyword?: string;
  topic?: string;
  progressSince?: string;
  since?: string;
  until?: string;
  threshold?: string;
  maxFiles?: string;
}

const EARLIEST = "0000-01-01";
const LATEST = "9999-12-31";

function formatItem(item: MeetingActionItem): string {
  const owner = item.owner ? `${item.owner}: ` : "";
  const due = item.due ? `, due ${item.due}` : "";
  return `  - [${item.priorityLevel.toUpperCase()}] ${owner}${item.description} (${item.meeting}, ${item.date}${due})`;
}

function printTopic(records: Readonly<MeetingRecord>[], topic: string): void {
  const mentions = topicHistory(records, topic);
  logger.info(`\n=== History of "${topic}" (${mentions.length}) ===`);
  for (const mention of mentions) {
    logger.info(`  ${mention.date} ${mention.title} (${mention.source})`);
    mention.points.forEach((point) => logger.info(`    point: ${point}`));
    mention.actions.forEach((action) => logger.info(`    action: ${action}`));
  }

  const needle = topic.trim().toLowerCase();
  for (const pair of topicCooccurrence(records)) {
    const [first, second] = pair.topics;
    const other = first.toLowerCase().includes(needle) ? second : second.toLowerCase().includes(needle) ? first : undefined;
    if (other) logger.info(`  discussed with ${other} in ${pair.meetings} meetings`);
  }
}

function printProgress(records: Readonly<MeetingRecord>[], since: string): void {
  const progress = progressReport(records, since);
  logger.info(`\n=== Progress since ${progress.since} ===`);
  logger.info(`  Meetings: ${progress.totalMeetings}`);
  logger.info(`  Topics: ${progress.topics.length ? progress.topics.join(", ") : "none"}`);
  progress.decisions.forEach((decision) => logger.info(`  decision: ${decision}`));
  for (const item of progress.actionItems) {
    const owner = item.owner ? `${item.owner}: ` : "";
    logger.info(`  - [${item.status}] ${owner}${item.description}`);
  }
}

function printReport(
  records: Readonly<MeetingRecord>[],
  options: ReportOptions,
  threshold: number,
  progressSince?: string,
): void {
  const metrics = meetingMetrics(records);
  logger.info("\n=== Meeting Metrics ===");
  logger.info(`  Meetings: ${metrics.totalMeetings}`);
  logger.info(`  Action Items: ${metrics.totalActions}`);
  logger.info(`  Decisions: ${metrics.totalDecisions}`);
  logger.info(`  Avg Topics per Meeting: ${metrics.avgTopicsPerMeeting.toFixed(1)}`);
  logger.info(
    `  Avg Duration: ${metrics.avgDurationMinutes === null ? "n/a" : `${Math.round(metrics.avgDurationMinutes)} min`}`,
  );

  const pending = pendingActionItems(records);
  logger.info(`\n=== Pending Action Items (${pending.length}) ===`);
  pending.forEach((item) => logger.info(formatItem(item)));

  const bottlenecks = findBottlenecks(records, threshold);
  logger.info(`\n=== Bottlenecks (${threshold}+ pending) ===`);
  if (!bottlenecks.length) logger.info("  None");
  for (const load of bottlenecks) {
    logger.info(`  ${load.owner}: ${load.pendingTasks} pending`);
    load.tasks.forEach((task) => logger.info(`    - ${task}`));
  }

  logger.info("\n=== Attendance ===");
  attendanceCounts(records).forEach((entry) => logger.info(`  ${entry.name}: ${entry.meetings}`));

  if (options.person) {
    const tasks = tasksFor(records, options.person);
    logger.info(`\n=== Tasks for ${options.person} (${tasks.length}) ===`);
    tasks.forEach((item) => logger.info(formatItem(item)));
  }

  if (options.keyword) {
    const matches = searchMeetings(records, options.keyword);
    logger.info(`\n=== Meetings mentioning "${options.keyword}" (${matches.length}) ===`);
    for (const match of matches) {
      logger.info(`  ${match.date} ${match.title} (${match.source})`);
      match.topics.forEach((topic) => logger.info(`    topic: ${topic}`));
      match.actions.forEach((action) => logger.info(`    action: ${action}`));
      match.decisions.forEach((decision) => logger.info(`    decision: ${decision}`));
    }
  }

  if (options.topic) printTopic(records, options.topic);
  if (progressSince) printProgress(records, progressSince);
  logger.info("");
}

export async function cmdReport(inputs: string[], options: ReportOptions): Promise<void> {
  const maxFiles = options.maxFiles !== undefined ? parsePositiveInt(options.maxFiles) : getMaxFiles();
  if (maxFiles === undefined) {
    logger.error(`Error: --maxFiles must be a positive integer, got "${options.maxFiles}"`);
    process.exit(2);
  }
  const threshold = options.threshold !== undefined ? parsePositiveInt(options.threshold) : getBottleneckThreshold();
  if (threshold === undefined) {
    logger.error(`Error: --threshold must be a positive integer, got "${options.threshold}"`);
    process.exit(2);
  }
  const since = options.since !== undefined ? parseDate(options.since) : EARLIEST;
  const until = options.until !== undefined ? parseDate(options.until) : LATEST;
  if (since === undefined || until === undefined) {
    logger.error("Error: --since and --until must be dates such as 2024-03-15");
    process.exit(2);
  }
  const progressSince = options.progressSince !== undefined ? parseDate(options.progressSince) : undefined;
  if (options.progressSince !== undefined && progressSince === undefined) {
    logger.error("Error: --progress-since must be a date such as 2024-03-15");
    process.exit(2);
  }
  if (!inputs.length) {
    logger.error("Error: at least one input file or directory is required");
    process.exit(2);
  }

  const { files, truncated } = await expandInputs(inputs, maxFiles);
  if (truncated) {
    logger.warn(`[meeting-notes] Warning: Reached file limit of ${maxFiles}, some files may be skipped (use --maxFiles to adjust)`);
  }

  const { results, failures } = await processFiles(files);
  for (const failure of failures) {
    logger.error(`✗ Failed to extract ${failure.source}: ${failure.error.message}`);
  }
  if (!results.length) {
    logger.error("Error: no meeting notes could be extracted");
    process.exit(1);
  }

  const records = meetingsInRange(
    results.map((result) => result.record),
    since,
    until,
  );
  printReport(records, options, threshold, progressSince);
}

export function registerReportCommand(program: Command): void {
  program
    .command("report")
    .description("Summarise action items, bottlenecks, attendance and topics across meetings")
    .argument("<inputs...>", "Notes files or directories")
    .option("--person <name>", "List the tasks assigned to this person")
    .option("--keyword <text>", "Find meetings that mention this keyword")
    .option("--topic <name>", "Show the meetings that discussed this topic")
    .option("--progress-since <date>", "Summarise topics, decisions and action items since this date")
    .option("--since <date>", "Only meetings on or after this date")
    .option("--until <date>", "Only meetings on or before this date")
    .option("--threshold <n>", "Pending items that make an owner a bottleneck (env MEETING_NOTES_BOTTLENECK_THRESHOLD, default 3)")
    .option("--maxFiles <n>", "Maximum files to read from directories (env MEETING_NOTES_MAX_FILES, default 4000)")
    .action(cmdReport);
}
