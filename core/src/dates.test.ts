import { describe, it, expect } from "vitest";
import { durationMinutes, isoDate, parseDate, parseTime, parseTimeRange } from "./dates.js";

describe("parseDate", () => {
  it("should read ISO dates", () => {
    expect(parseDate("2024-03-15")).toBe("2024-03-15");
    expect(parseDate("2024-03-15T10:00")).toBe("2024-03-15");
  });

  it("should read month-name dates with and without a weekday", () => {
    expect(parseDate("March 15, 2024")).toBe("2024-03-15");
    expect(parseDate("Friday, March 15, 2024")).toBe("2024-03-15");
    expect(parseDate("Mar 5 2024")).toBe("2024-03-05");
    expect(parseDate("Sept 3rd, 2024")).toBe("2024-09-03");
  });

  it("should read day-first month-name dates", () => {
    expect(parseDate("15 March 2024")).toBe("2024-03-15");
  });

  it("should read slash dates month first", () => {
    expect(parseDate("03/04/2024")).toBe("2024-03-04");
  });

  it("should reject impossible dates", () => {
    expect(parseDate("February 30, 2024")).toBeUndefined();
  });

  it("should ignore dates without a year", () => {
    expect(parseDate("March 22 at 10am")).toBeUndefined();
  });

  it("should return undefined when no date is present", () => {
    expect(parseDate("Sprint planning")).toBeUndefined();
  });
});

describe("parseTimeRange", () => {
  it("should parse a 12-hour range", () => {
    expect(parseTimeRange("10:00 AM - 11:30 AM")).toEqual({ startTime: "10:00", endTime: "11:30" });
  });

  it("should parse a 24-hour range", () => {
    expect(parseTimeRange("14:00-15:30")).toEqual({ startTime: "14:00", endTime: "15:30" });
  });

  it("should parse ranges joined by 'to'", () => {
    expect(parseTimeRange("2pm to 3pm")).toEqual({ startTime: "14:00", endTime: "15:00" });
  });

  it("should fall back to a single start time", () => {
    expect(parseTimeRange("March 22, 2024 at 10:00 AM")).toEqual({ startTime: "10:00" });
  });

  it("should not read ISO dates as time ranges", () => {
    expect(parseTimeRange("2024-03-15")).toEqual({});
  });
});

describe("parseTime", () => {
  it("should handle noon and midnight", () => {
    expect(parseTime("12:15 PM")).toBe("12:15");
    expect(parseTime("12 am")).toBe("00:00");
  });

  it("should read dotted meridiems", () => {
    expect(parseTime("3:30 p.m.")).toBe("15:30");
  });
});

describe("isoDate", () => {
  it("should pad month and day", () => {
    expect(isoDate(2024, 3, 5)).toBe("2024-03-05");
  });

  it("should reject days the month does not have", () => {
    expect(isoDate(2023, 2, 29)).toBeUndefined();
    expect(isoDate(2024, 2, 29)).toBe("2024-02-29");
    expect(isoDate(2024, 13, 1)).toBeUndefined();
  });
});

describe("durationMinutes", () => {
  it("should compute minutes between two clock times", () => {
    expect(durationMinutes("10:00", "11:30")).toBe(90);
  });

  it("should return undefined when the end precedes the start", () => {
    expect(durationMinutes("11:00", "10:00")).toBeUndefined();
  });
});
