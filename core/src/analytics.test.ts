import { describe, it, expect } from "vitest";
import {
  attendanceCounts,
  findBottlenecks,
  meetingMetrics,
  meetingsInRange,
  pendingActionItems,
  progressReport,
  searchMeetings,
  tasksFor,
  topicCooccurrence,
  topicHistory,
} from "./analytics.js";
import { extractMeetingFromText } from "./extract.js";

function record(source: string, lines: string[]) {
  return extractMeetingFromText(lines.join("\n"), source).record;
}

const planning = record("planning.txt", [
  "Sprint Planning",
  "Date: 2024-03-15",
  "Time: 10:00 - 11:30",
  "Attendees:",
  "- Sarah Chen",
  "- Mike Johnson",
  "Discussion:",
  "Database Performance",
  "- Slow queries on orders",
  "Action Items:",
  "- Mike to add database indexes (HIGH PRIORITY)",
  "- Mike to review the schema",
  "- Sarah to update the roadmap when possible",
  "Decisions:",
  "- Adopt PostgreSQL 16",
]);

const review = record("review.txt", [
  "Architecture Review",
  "Date: 2024-03-18",
  "Time: 14:00 - 14:30",
  "Attendees:",
  "- Mike Johnson",
  "- Priya Nair",
  "Discussion:",
  "Caching",
  "- Redis in front of the API",
  "Action Items:",
  "- Mike to benchmark the cache",
  "- Priya to draft the API proposal",
]);

const retro = record("retro.txt", [
  "Team Retrospective",
  "Date: 2024-03-20",
  "Attendees:",
  "- Sarah Chen",
  "Action Items:",
  "- Mike and Sarah to pair on onboarding docs",
]);

const records = [planning, review, retro];

describe("pendingActionItems", () => {
  it("should order by priority then newest meeting", () => {
    const items = pendingActionItems(records);
    expect(items.map((i) => [i.priorityLevel, i.meeting, i.description])).toEqual([
      ["high", "Sprint Planning", "add database indexes"],
      ["medium", "Team Retrospective", "pair on onboarding docs"],
      ["medium", "Architecture Review", "benchmark the cache"],
      ["medium", "Architecture Review", "draft the API proposal"],
      ["medium", "Sprint Planning", "review the schema"],
      ["low", "Sprint Planning", "update the roadmap when possible"],
    ]);
  });
});

describe("tasksFor", () => {
  it("should match the person anywhere in the owner, newest first", () => {
    expect(tasksFor(records, "mike").map((i) => i.description)).toEqual([
      "pair on onboarding docs",
      "benchmark the cache",
      "add database indexes",
      "review the schema",
    ]);
  });

  it("should not match partial names", () => {
    expect(tasksFor(records, "Mik")).toEqual([]);
  });
});

describe("findBottlenecks", () => {
  it("should list owners at or above the threshold", () => {
    expect(findBottlenecks(records)).toEqual([
      { owner: "Mike", pendingTasks: 3, tasks: ["add database indexes", "review the schema", "benchmark the cache"] },
    ]);
  });

  it("should honour a custom threshold", () => {
    expect(findBottlenecks(records, 1).map((l) => [l.owner, l.pendingTasks])).toEqual([
      ["Mike", 3],
      ["Mike and Sarah", 1],
      ["Priya", 1],
      ["Sarah", 1],
    ]);
  });
});

describe("searchMeetings", () => {
  it("should match topics, actions and decisions case-insensitively", () => {
    expect(searchMeetings(records, "DATABASE")).toEqual([
      {
        title: "Sprint Planning",
        date: "2024-03-15",
        source: "planning.txt",
        topics: ["Database Performance"],
        actions: ["add database indexes"],
        decisions: [],
        attendees: ["Sarah Chen", "Mike Johnson"],
      },
    ]);
  });

  it("should return newest meetings first", () => {
    expect(searchMeetings(records, "api").map((m) => m.title)).toEqual(["Architecture Review"]);
    expect(searchMeetings(records, "docs").map((m) => m.title)).toEqual(["Team Retrospective"]);
  });

  it("should return nothing for a blank keyword", () => {
    expect(searchMeetings(records, "  ")).toEqual([]);
  });
});

describe("meetingsInRange", () => {
  it("should include both ends of the range", () => {
    expect(meetingsInRange(records, "2024-03-15", "2024-03-18").map((r) => r.title)).toEqual([
      "Architecture Review",
      "Sprint Planning",
    ]);
  });
});

describe("attendanceCounts", () => {
  it("should count meetings per attendee, most frequent first", () => {
    expect(attendanceCounts(records)).toEqual([
      { name: "Mike Johnson", meetings: 2 },
      { name: "Sarah Chen", meetings: 2 },
      { name: "Priya Nair", meetings: 1 },
    ]);
  });
});

describe("meetingMetrics", () => {
  it("should summarise totals and averages", () => {
    expect(meetingMetrics(records)).toEqual({
      totalMeetings: 3,
      totalActions: 6,
      totalDecisions: 1,
      avgTopicsPerMeeting: 2 / 3,
      avgDurationMinutes: 60,
    });
  });

  it("should report no duration when times are missing", () => {
    expect(meetingMetrics([retro]).avgDurationMinutes).toBeNull();
    expect(meetingMetrics([]).avgTopicsPerMeeting).toBe(0);
  });
});

const ops = [
  record("ops-1.txt", [
    "Ops Weekly",
    "Date: 2024-04-01",
    "Discussion:",
    "Budget",
    "- Over by 5%",
    "Hiring",
    "- Two open roles",
    "Action Items:",
    "- Ana to draft the budget",
  ]),
  record("ops-2.txt", [
    "Ops Weekly",
    "Date: 2024-04-08",
    "Discussion:",
    "hiring",
    "- One offer out",
    "Budget",
    "- Still over",
    "Office Move",
    "- Lease draft received",
    "Action Items:",
    "- Ben to post the job ad",
  ]),
  record("ops-3.txt", [
    "Ops Weekly",
    "Date: 2024-04-15",
    "Discussion:",
    "Office Move",
    "- Lease signed",
    "Decisions:",
    "- Move in May",
  ]),
];

describe("topicHistory", () => {
  it("should list meetings that discussed the topic, newest first, with their actions", () => {
    expect(topicHistory(ops, "BUDGET")).toEqual([
      {
        title: "Ops Weekly",
        date: "2024-04-08",
        source: "ops-2.txt",
        points: ["Still over"],
        actions: ["post the job ad"],
      },
      {
        title: "Ops Weekly",
        date: "2024-04-01",
        source: "ops-1.txt",
        points: ["Over by 5%"],
        actions: ["draft the budget"],
      },
    ]);
  });

  it("should return nothing for an unknown or blank topic", () => {
    expect(topicHistory(ops, "Security")).toEqual([]);
    expect(topicHistory(ops, " ")).toEqual([]);
  });
});

describe("topicCooccurrence", () => {
  it("should keep only pairs seen in more than one meeting", () => {
    expect(topicCooccurrence(ops)).toEqual([{ topics: ["Budget", "Hiring"], meetings: 2 }]);
  });

  it("should return nothing when no pair repeats", () => {
    expect(topicCooccurrence(records)).toEqual([]);
  });
});

describe("progressReport", () => {
  it("should gather topics, decisions and actions since the date", () => {
    expect(progressReport(ops, "2024-04-08")).toEqual({
      since: "2024-04-08",
      totalMeetings: 2,
      topics: ["Budget", "hiring", "Office Move"],
      decisions: ["Move in May"],
      actionItems: [{ description: "post the job ad", owner: "Ben", status: "pending" }],
    });
  });

  it("should report an empty period", () => {
    expect(progressReport(ops, "2024-05-01")).toEqual({
      since: "2024-05-01",
      totalMeetings: 0,
      topics: [],
      decisions: [],
      actionItems: [],
    });
  });
});
