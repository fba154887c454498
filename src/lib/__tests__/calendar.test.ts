import { describe, it, expect } from "vitest";
import {
  createCalendar,
  computeWeekOfYear,
  daysBetween,
  systemCalendar,
  ISO_WEEK,
  US_WEEK,
} from "../calendar";

const UTC = createCalendar({ timeZone: "UTC" });

// ─── dayKey / hour ───────────────────────────────────────

describe("dayKey and hour", () => {
  const instant = new Date("2025-03-12T23:30:00Z");

  it("reads the day and hour in UTC", () => {
    expect(UTC.dayKey(instant)).toBe("2025-03-12");
    expect(UTC.hour(instant)).toBe(23);
  });

  it("reads the day and hour in a zone behind UTC", () => {
    const newYork = createCalendar({ timeZone: "America/New_York" });
    // EDT (UTC-4) is in effect from 2025-03-09
    expect(newYork.dayKey(instant)).toBe("2025-03-12");
    expect(newYork.hour(instant)).toBe(19);
  });

  it("rolls into the next day in a zone ahead of UTC", () => {
    const tokyo = createCalendar({ timeZone: "Asia/Tokyo" });
    expect(tokyo.dayKey(instant)).toBe("2025-03-13");
    expect(tokyo.hour(instant)).toBe(8);
  });

  it("reports midnight as hour 0", () => {
    expect(UTC.hour(new Date("2025-03-12T00:15:00Z"))).toBe(0);
  });

  it("throws RangeError for an unknown time zone", () => {
    expect(() => createCalendar({ timeZone: "Not/AZone" })).toThrow(RangeError);
  });
});

// ─── Day arithmetic ──────────────────────────────────────

describe("addDays / weekday / daysBetween", () => {
  it("crosses month and year boundaries", () => {
    expect(UTC.addDays("2025-03-01", -1)).toBe("2025-02-28");
    expect(UTC.addDays("2024-02-28", 1)).toBe("2024-02-29");
    expect(UTC.addDays("2025-12-31", 1)).toBe("2026-01-01");
  });

  it("numbers weekdays Sunday = 1 through Saturday = 7", () => {
    expect(UTC.weekday("2025-03-09")).toBe(1); // Sunday
    expect(UTC.weekday("2025-03-12")).toBe(4); // Wednesday
    expect(UTC.weekday("2025-03-08")).toBe(7); // Saturday
  });

  it("counts whole days between keys", () => {
    expect(daysBetween("2025-02-28", "2025-03-01")).toBe(1);
    expect(daysBetween("2025-03-12", "2025-03-10")).toBe(-2);
    expect(daysBetween("2024-12-31", "2025-12-31")).toBe(365);
  });
});

// ─── Week-of-year ────────────────────────────────────────

describe("computeWeekOfYear", () => {
  it("uses ISO numbering by default", () => {
    expect(UTC.firstWeekday).toBe(2);
    expect(UTC.minimumDaysInFirstWeek).toBe(4);
    expect(UTC.weekOfYear("2025-03-12")).toEqual({ yearForWeekOfYear: 2025, weekOfYear: 11 });
  });

  it("puts late December into week 1 of the next ISO year", () => {
    expect(computeWeekOfYear("2024-12-31", ISO_WEEK)).toEqual({ yearForWeekOfYear: 2025, weekOfYear: 1 });
  });

  it("puts early January into week 53 of the previous ISO year", () => {
    expect(computeWeekOfYear("2021-01-01", ISO_WEEK)).toEqual({ yearForWeekOfYear: 2020, weekOfYear: 53 });
    expect(computeWeekOfYear("2027-01-02", ISO_WEEK)).toEqual({ yearForWeekOfYear: 2026, weekOfYear: 53 });
  });

  it("starts US weeks on Sunday with January 1st in week 1", () => {
    expect(computeWeekOfYear("2025-03-08", US_WEEK)).toEqual({ yearForWeekOfYear: 2025, weekOfYear: 10 });
    expect(computeWeekOfYear("2025-12-28", US_WEEK)).toEqual({ yearForWeekOfYear: 2026, weekOfYear: 1 });
    expect(computeWeekOfYear("2026-01-03", US_WEEK)).toEqual({ yearForWeekOfYear: 2026, weekOfYear: 1 });
  });
});

// ─── systemCalendar ──────────────────────────────────────

describe("systemCalendar", () => {
  it("applies the configured zone and week numbering", () => {
    const calendar = systemCalendar({ timeZone: "UTC", weekNumbering: "us", badgeLogging: false });
    expect(calendar.timeZone).toBe("UTC");
    expect(calendar.firstWeekday).toBe(1);
    expect(calendar.minimumDaysInFirstWeek).toBe(1);
  });

  it("defaults to ISO weeks", () => {
    const calendar = systemCalendar({ timeZone: "UTC", weekNumbering: "iso", badgeLogging: false });
    expect(calendar.firstWeekday).toBe(2);
    expect(calendar.minimumDaysInFirstWeek).toBe(4);
  });
});
