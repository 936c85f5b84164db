import { cleanHeading, hasListMarker, isIndented, stripListMarker } from "../text.js";
import type { DiscussionTopic, SectionLine } from "../types.js";

export const GENERAL_TOPIC = "General";

/**
 * Group discussion lines into topics. An unmarked, unindented line opens a
 * topic; bulleted or indented lines are its points.
 */
export function extractDiscussion(lines: SectionLine[]): DiscussionTopic[] {
  const topics: DiscussionTopic[] = [];
  let current: DiscussionTopic | undefined;

  for (const line of lines) {
    const isPoint = isIndented(line.text) || /^\s*[-*•+]\s+/.test(line.text);
    if (!isPoint) {
      const heading = cleanHeading(hasListMarker(line.text) ? stripListMarker(line.text) : line.text);
      if (!heading) continue;
      current = { heading, points: [] };
      topics.push(current);
      continue;
    }

    const point = stripListMarker(line.text);
    if (!point) continue;
    if (!current) {
      current = { heading: GENERAL_TOPIC, points: [] };
      topics.push(current);
    }
    current.points.push(point);
  }

  return topics;
}
