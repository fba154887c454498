// Journal stats — reduces a visit snapshot into the aggregates every badge
// rule reads. Visits arrive in any order; grouping and sorting happen here.

import type { VisitRecord } from "@/types/visit";
import { SATURDAY, SUNDAY, daysBetween, systemCalendar } from "./calendar";
import type { CalendarConvention } from "./calendar";

// ─── Types ──────────────────────────────────────────────────

export interface Aggregates {
  totalVisits: number;
  uniqueCafeCount: number;
  visitsWithNotesCount: number;
  distinctDrinkTypesCount: number;
  earlyMorningVisitsCount: number;
  currentStreakDays: number;
  longestStreakDays: number;
  consecutiveWeekendsCount: number;
}

/** Visits before this local hour count as early morning */
export const EARLY_MORNING_HOUR = 9;

// ─── Visit Helpers ──────────────────────────────────────────

export function hasNotes(visit: VisitRecord): boolean {
  return typeof visit.notes === "string" && visit.notes.trim().length > 0;
}

/** Distinct local days that contain at least one visit */
export function getVisitDays(
  visits: readonly VisitRecord[],
  calendar: CalendarConvention = systemCalendar()
): Set<string> {
  return new Set(visits.map((v) => calendar.dayKey(v.createdAt)));
}

// ─── Streaks ────────────────────────────────────────────────

/** Consecutive visit days ending today, or yesterday if today has no visit yet */
export function calculateCurrentStreak(
  visits: readonly VisitRecord[],
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): number {
  if (visits.length === 0) return 0;

  const visitDays = getVisitDays(visits, calendar);
  const today = calendar.dayKey(now);
  const yesterday = calendar.addDays(today, -1);

  let checkDay: string;
  if (visitDays.has(today)) {
    checkDay = today;
  } else if (visitDays.has(yesterday)) {
    checkDay = yesterday;
  } else {
    return 0;
  }

  let streak = 0;
  while (visitDays.has(checkDay)) {
    streak++;
    checkDay = calendar.addDays(checkDay, -1);
  }
  return streak;
}

/** Longest run of consecutive visit days anywhere in the history */
export function calculateLongestStreak(
  visits: readonly VisitRecord[],
  calendar: CalendarConvention = systemCalendar()
): number {
  const days = [...getVisitDays(visits, calendar)].sort();
  if (days.length === 0) return 0;

  let longest = 1;
  let running = 1;
  for (let i = 1; i < days.length; i++) {
    if (daysBetween(days[i - 1], days[i]) === 1) {
      running++;
      longest = Math.max(longest, running);
    } else {
      running = 1;
    }
  }
  return longest;
}

// ─── Weekend Warrior ────────────────────────────────────────

/** year * 100 + week for the weekend a visit day belongs to, or null on weekdays */
export function weekendIdForDay(day: string, calendar: CalendarConvention): number | null {
  const weekday = calendar.weekday(day);
  if (weekday !== SATURDAY && weekday !== SUNDAY) return null;

  // Sunday joins the Saturday before it
  const saturday = weekday === SUNDAY ? calendar.addDays(day, -1) : day;
  const { yearForWeekOfYear, weekOfYear } = calendar.weekOfYear(saturday);
  return yearForWeekOfYear * 100 + weekOfYear;
}

function isNextWeekend(prev: number, curr: number): boolean {
  const prevYear = Math.floor(prev / 100);
  const prevWeek = prev % 100;
  const currYear = Math.floor(curr / 100);
  const currWeek = curr % 100;

  if (currYear === prevYear && currWeek === prevWeek + 1) return true;
  // Year boundary: last week of one year into week 1 of the next
  return currYear === prevYear + 1 && currWeek === 1 && prevWeek >= 52;
}

/** Longest run of back-to-back weekends with at least one visit */
export function calculateConsecutiveWeekends(
  visits: readonly VisitRecord[],
  calendar: CalendarConvention = systemCalendar()
): number {
  const weekendIds = new Set<number>();
  for (const visit of visits) {
    const id = weekendIdForDay(calendar.dayKey(visit.createdAt), calendar);
    if (id !== null) weekendIds.add(id);
  }
  if (weekendIds.size === 0) return 0;

  const sorted = [...weekendIds].sort((a, b) => a - b);
  let longest = 1;
  let running = 1;
  for (let i = 1; i < sorted.length; i++) {
    if (isNextWeekend(sorted[i - 1], sorted[i])) {
      running++;
      longest = Math.max(longest, running);
    } else {
      running = 1;
    }
  }
  return longest;
}

// ─── Aggregates ─────────────────────────────────────────────

export function computeAggregates(
  visits: readonly VisitRecord[],
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): Aggregates {
  return {
    totalVisits: visits.length,
    uniqueCafeCount: new Set(visits.map((v) => v.cafeId)).size,
    visitsWithNotesCount: visits.filter(hasNotes).length,
    distinctDrinkTypesCount: new Set(visits.map((v) => v.drinkType)).size,
    earlyMorningVisitsCount: visits.filter((v) => calendar.hour(v.createdAt) < EARLY_MORNING_HOUR).length,
    currentStreakDays: calculateCurrentStreak(visits, now, calendar),
    longestStreakDays: calculateLongestStreak(visits, calendar),
    consecutiveWeekendsCount: calculateConsecutiveWeekends(visits, calendar),
  };
}
