import imperativeVerbs from "../imperative-verbs.json" with { type: "json" };
import { parseWarning } from "../errors.js";
import type { ActionItem, ParseWarning, PriorityLevel, SectionLine } from "../types.js";
import { collectEntries } from "./lists.js";

export interface ActionItemsResult {
  items: ActionItem[];
  warnings: ParseWarning[];
}

const NAME_WORD = "[A-Z][\\w.'-]*";

// "Mike to ...", "Sarah Chen will ...", "Mike and Lisa to ..."
const OWNER_VERB = new RegExp(
  `^(${NAME_WORD}(?:\\s+(?:${NAME_WORD}|and|&))*?)\\s+(?:to|will|should|must|needs to)\\s+(.+)$`,
);
// "Mike: ..."
const OWNER_COLON = new RegExp(`^(${NAME_WORD}(?:\\s+${NAME_WORD}){0,3})\\s*:\\s*(.+)$`);
// "@mike ..."
const OWNER_MENTION = /^@([\w.-]+)\s+(.+)$/;
// "... (assigned to Mike)", "... - Owner: Mike"
const OWNER_SUFFIX = new RegExp(
  `^(.+?)\\s*(?:[-–—]\\s*|\\(\\s*)(?:[Aa]ssigned to|[Oo]wner)\\s*:?\\s*(${NAME_WORD}(?:\\s+${NAME_WORD})?)\\s*\\)?$`,
);

// "Ask Lisa to ...", "Update Docs to ..." start with a verb, not a name
const IMPERATIVE_VERBS = new Set(imperativeVerbs);

function isOwnerName(candidate: string): boolean {
  const [first = ""] = candidate.split(/\s+/);
  return !IMPERATIVE_VERBS.has(first.toLowerCase());
}

const TRAILING_TAG = /^(.*?)\s*[([]([^()[\]]+)[)\]]\s*$/;
const LEADING_TAG = /^\s*[([]([^()[\]]+)[)\]]\s*(.*)$/;
const PRIORITY_WORD = /\b(?:high|medium|low|urgent|critical|asap|priority|p[0-3])\b/i;
const DUE_CLAUSE = /\b(?:due(?:\s+(?:by|on))?:?|by)\s+([^,;()]+?)\s*\)?$/i;

const TAG_LEVELS: Array<[PriorityLevel, RegExp]> = [
  ["high", /\b(?:high|urgent|critical|asap|important|p[01])\b/i],
  ["medium", /\b(?:medium|moderate|normal|p2)\b/i],
  ["low", /\b(?:low|minor|p3)\b/i],
];

const TEXT_LEVELS: Array<[PriorityLevel, RegExp]> = [
  ["high", /\b(?:urgent|critical|important|asap|high priority)\b/i],
  ["medium", /\b(?:medium priority|moderate)\b/i],
  ["low", /\b(?:low priority|minor|when possible|if time permits)\b/i],
];

/**
 * Priority level of an action item. An explicit tag wins; otherwise the
 * whole line is scanned for priority phrases. Defaults to medium.
 */
export function priorityLevel(text: string, tag?: string): PriorityLevel {
  const table = tag ? TAG_LEVELS : TEXT_LEVELS;
  const subject = tag ?? text;
  for (const [level, pattern] of table) {
    if (pattern.test(subject)) return level;
  }
  return "medium";
}

function splitPriorityTag(text: string): { body: string; priority?: string } {
  const trailing = text.match(TRAILING_TAG);
  if (trailing && PRIORITY_WORD.test(trailing[2])) {
    return { body: trailing[1].trim(), priority: trailing[2].trim() };
  }
  const leading = text.match(LEADING_TAG);
  if (leading && PRIORITY_WORD.test(leading[1])) {
    return { body: leading[2].trim(), priority: leading[1].trim() };
  }
  return { body: text };
}

function splitOwner(body: string): { owner?: string; description: string } {
  for (const pattern of [OWNER_VERB, OWNER_COLON, OWNER_MENTION]) {
    const match = body.match(pattern);
    if (match && isOwnerName(match[1])) return { owner: match[1].trim(), description: match[2].trim() };
  }
  const suffix = body.match(OWNER_SUFFIX);
  if (suffix) return { owner: suffix[2].trim(), description: suffix[1].trim() };
  return { description: body };
}

/**
 * Split `Owner to description (PRIORITY)` into its parts. When no owner
 * pattern matches, the description is the whole line.
 */
export function parseActionItem(text: string): ActionItem {
  const raw = text.trim();
  const { body, priority } = splitPriorityTag(raw);
  const { owner, description } = splitOwner(body);

  const item: ActionItem = {
    description: owner ? description : raw,
    priorityLevel: priorityLevel(raw, priority),
    status: "pending",
    raw,
  };
  if (owner) item.owner = owner;
  if (priority) item.priority = priority;

  const due = description.match(DUE_CLAUSE);
  if (due) item.due = due[1].trim();

  return item;
}

export function extractActionItems(lines: SectionLine[]): ActionItemsResult {
  const items: ActionItem[] = [];
  const warnings: ParseWarning[] = [];

  for (const entry of collectEntries(lines)) {
    const item = parseActionItem(entry.text);
    if (!item.owner) {
      warnings.push(
        parseWarning("action-item-format", "Action item has no recognisable owner", {
          lineNumber: entry.lineNumber,
          text: entry.text,
        }),
      );
    }
    items.push(item);
  }

  return { items, warnings };
}
