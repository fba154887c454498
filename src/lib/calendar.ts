// Calendar convention — the single source of day, hour, weekday and
// week-of-year numbering for every streak and weekend computation.
//
// Days are carried as "YYYY-MM-DD" keys in the convention's time zone.
// Day arithmetic runs on those keys in UTC, so DST shifts never skip or
// repeat a day.

import { loadEngineConfig } from "./config";
import type { EngineConfig } from "./config";

// ─── Types ──────────────────────────────────────────────────

/** 1 = Sunday … 7 = Saturday */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export const SUNDAY: Weekday = 1;
export const MONDAY: Weekday = 2;
export const SATURDAY: Weekday = 7;

export interface WeekOfYear {
  yearForWeekOfYear: number;
  weekOfYear: number;
}

export interface WeekRule {
  firstWeekday: Weekday;
  minimumDaysInFirstWeek: number; // 1-7
}

export interface CalendarOptions extends Partial<WeekRule> {
  timeZone?: string;
}

export interface CalendarConvention extends WeekRule {
  readonly timeZone: string;
  /** Local calendar day of an instant, as "YYYY-MM-DD" */
  dayKey(instant: Date): string;
  /** Local hour of an instant, 0-23 */
  hour(instant: Date): number;
  weekday(day: string): Weekday;
  addDays(day: string, amount: number): string;
  weekOfYear(day: string): WeekOfYear;
}

// ─── Week Rules ─────────────────────────────────────────────

/** Monday-first weeks; week 1 holds the year's first Thursday */
export const ISO_WEEK: WeekRule = { firstWeekday: MONDAY, minimumDaysInFirstWeek: 4 };

/** Sunday-first weeks; week 1 holds January 1st */
export const US_WEEK: WeekRule = { firstWeekday: SUNDAY, minimumDaysInFirstWeek: 1 };

// ─── Day Key Arithmetic ─────────────────────────────────────

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function parseDayKey(day: string): { year: number; month: number; date: number } {
  const [year, month, date] = day.split("-").map(Number);
  return { year, month, date };
}

function epochDayOf(year: number, month: number, date: number): number {
  return Math.round(Date.UTC(year, month - 1, date) / MS_PER_DAY);
}

function toEpochDay(day: string): number {
  const { year, month, date } = parseDayKey(day);
  return epochDayOf(year, month, date);
}

function fromEpochDay(epochDay: number): string {
  return new Date(epochDay * MS_PER_DAY).toISOString().slice(0, 10);
}

// 1970-01-01 was a Thursday (weekday 5)
function weekdayOfEpochDay(epochDay: number): Weekday {
  const index = (((epochDay + 4) % 7) + 7) % 7;
  return toWeekday(index + 1);
}

function toWeekday(value: number): Weekday {
  switch (value) {
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    case 6: return 6;
    default: return 7;
  }
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

// ─── Week-of-Year ───────────────────────────────────────────

function startOfWeek(epochDay: number, rule: WeekRule): number {
  const offset = (weekdayOfEpochDay(epochDay) - rule.firstWeekday + 7) % 7;
  return epochDay - offset;
}

/** First day of week 1 of the given week-numbering year */
function firstWeekStart(year: number, rule: WeekRule): number {
  const jan1 = epochDayOf(year, 1, 1);
  const weekStart = startOfWeek(jan1, rule);
  const daysInYear = 7 - (jan1 - weekStart);
  return daysInYear >= rule.minimumDaysInFirstWeek ? weekStart : weekStart + 7;
}

export function computeWeekOfYear(day: string, rule: WeekRule): WeekOfYear {
  const epochDay = toEpochDay(day);
  let year = parseDayKey(day).year;
  if (epochDay < firstWeekStart(year, rule)) {
    year -= 1;
  } else if (epochDay >= firstWeekStart(year + 1, rule)) {
    year += 1;
  }
  const weekOfYear = Math.floor((epochDay - firstWeekStart(year, rule)) / 7) + 1;
  return { yearForWeekOfYear: year, weekOfYear };
}

// ─── Factories ──────────────────────────────────────────────

export function hostTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Build a calendar convention. Throws RangeError when the time zone is not
 * a valid IANA name.
 */
export function createCalendar(options: CalendarOptions = {}): CalendarConvention {
  const timeZone = options.timeZone ?? hostTimeZone();
  const rule: WeekRule = {
    firstWeekday: options.firstWeekday ?? ISO_WEEK.firstWeekday,
    minimumDaysInFirstWeek: Math.min(7, Math.max(1, options.minimumDaysInFirstWeek ?? ISO_WEEK.minimumDaysInFirstWeek)),
  };

  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    hourCycle: "h23",
  });

  function localParts(instant: Date): { year: number; month: number; date: number; hour: number } {
    const parts = formatter.formatToParts(instant);
    const get = (type: Intl.DateTimeFormatPartTypes): number =>
      Number(parts.find((p) => p.type === type)?.value ?? 0);
    return { year: get("year"), month: get("month"), date: get("day"), hour: get("hour") % 24 };
  }

  return {
    timeZone,
    firstWeekday: rule.firstWeekday,
    minimumDaysInFirstWeek: rule.minimumDaysInFirstWeek,
    dayKey(instant) {
      const { year, month, date } = localParts(instant);
      return `${year}-${pad2(month)}-${pad2(date)}`;
    },
    hour(instant) {
      return localParts(instant).hour;
    },
    weekday(day) {
      return weekdayOfEpochDay(toEpochDay(day));
    },
    addDays(day, amount) {
      return fromEpochDay(toEpochDay(day) + amount);
    },
    weekOfYear(day) {
      return computeWeekOfYear(day, rule);
    },
  };
}

/** Default convention: configured (or host) time zone and week numbering */
export function systemCalendar(config: EngineConfig = loadEngineConfig()): CalendarConvention {
  const rule = config.weekNumbering === "us" ? US_WEEK : ISO_WEEK;
  return createCalendar({ timeZone: config.timeZone ?? hostTimeZone(), ...rule });
}

/** Whole days from `from` to `to` (both day keys); negative when `to` is earlier */
export function daysBetween(from: string, to: string): number {
  return toEpochDay(to) - toEpochDay(from);
}
