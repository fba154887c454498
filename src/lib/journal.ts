// Journal screen data — visit windows, the weekly dot map, top cafes,
// notes grouping and drink breakdowns, all derived from a visit snapshot.

import type { DrinkType, VisitRecord } from "@/types/visit";
import { DRINK_TYPES } from "@/types/visit";
import { systemCalendar } from "./calendar";
import type { CalendarConvention, Weekday } from "./calendar";
import { hasNotes } from "./journalStats";

// ─── Types ──────────────────────────────────────────────────

export interface WeekdayVisitDot {
  dayLetter: string;
  date: string;       // YYYY-MM-DD
  hasVisit: boolean;
}

export interface TopCafe {
  cafeId: string;
  visitCount: number;
  avgRating: number;
}

export interface NotesMonthGroup {
  key: string;        // "2025-11"
  label: string;      // "November 2025"
  visits: VisitRecord[];
}

export interface UserStats {
  totalVisits: number;
  totalCafes: number;
  averageScore: number;
  favoriteDrinkType: DrinkType | null;
}

export interface BeverageShare {
  drinkType: DrinkType;
  count: number;
  fraction: number;   // 0-1
}

const DAY_LETTERS: Record<Weekday, string> = {
  1: "S",
  2: "M",
  3: "T",
  4: "W",
  5: "T",
  6: "F",
  7: "S",
};

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
];

function newestFirst(a: VisitRecord, b: VisitRecord): number {
  return b.createdAt.getTime() - a.createdAt.getTime();
}

function drinkTypeRank(drinkType: DrinkType): number {
  return DRINK_TYPES.indexOf(drinkType);
}

// ─── Visit Windows ──────────────────────────────────────────

/** Visits on the last `days` calendar days, today included */
export function visitsInLastNDays(
  visits: readonly VisitRecord[],
  days: number,
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): number {
  if (days <= 0) return 0;
  const today = calendar.dayKey(now);
  const windowStart = calendar.addDays(today, -(days - 1));
  return visits.filter((v) => {
    const day = calendar.dayKey(v.createdAt);
    return day >= windowStart && day <= today;
  }).length;
}

export function visitsInLast7Days(
  visits: readonly VisitRecord[],
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): number {
  return visitsInLastNDays(visits, 7, now, calendar);
}

export function visitsInLast30Days(
  visits: readonly VisitRecord[],
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): number {
  return visitsInLastNDays(visits, 30, now, calendar);
}

/** Last 7 days, six days ago first, today last */
export function weekdayVisitMap(
  visits: readonly VisitRecord[],
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): WeekdayVisitDot[] {
  const visitDays = new Set(visits.map((v) => calendar.dayKey(v.createdAt)));
  const today = calendar.dayKey(now);
  const result: WeekdayVisitDot[] = [];

  for (let daysAgo = 6; daysAgo >= 0; daysAgo--) {
    const date = calendar.addDays(today, -daysAgo);
    result.push({
      dayLetter: DAY_LETTERS[calendar.weekday(date)],
      date,
      hasVisit: visitDays.has(date),
    });
  }
  return result;
}

export function todaysVisit(
  visits: readonly VisitRecord[],
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): VisitRecord | null {
  const today = calendar.dayKey(now);
  return visits.find((v) => calendar.dayKey(v.createdAt) === today) ?? null;
}

// ─── Cafes ──────────────────────────────────────────────────

/** Most visited cafes; ties go to the higher average rating, then cafe id */
export function topCafes(visits: readonly VisitRecord[], limit: number = 3): TopCafe[] {
  const byCafe = new Map<string, { count: number; scoreSum: number }>();
  for (const visit of visits) {
    const entry = byCafe.get(visit.cafeId) ?? { count: 0, scoreSum: 0 };
    entry.count++;
    entry.scoreSum += visit.overallScore ?? 0;
    byCafe.set(visit.cafeId, entry);
  }

  return [...byCafe.entries()]
    .map(([cafeId, { count, scoreSum }]) => ({
      cafeId,
      visitCount: count,
      avgRating: scoreSum / count,
    }))
    .sort((a, b) => {
      if (a.visitCount !== b.visitCount) return b.visitCount - a.visitCount;
      if (a.avgRating !== b.avgRating) return b.avgRating - a.avgRating;
      return a.cafeId < b.cafeId ? -1 : a.cafeId > b.cafeId ? 1 : 0;
    })
    .slice(0, Math.max(0, limit));
}

// ─── Notes ──────────────────────────────────────────────────

export function allVisitsWithNotes(visits: readonly VisitRecord[]): VisitRecord[] {
  return visits.filter(hasNotes).sort(newestFirst);
}

export function recentVisitsWithNotes(visits: readonly VisitRecord[], limit: number = 3): VisitRecord[] {
  return allVisitsWithNotes(visits).slice(0, Math.max(0, limit));
}

export function notesCount(visits: readonly VisitRecord[]): number {
  return visits.filter(hasNotes).length;
}

/** Group visits by local month, newest month first */
export function groupVisitsByMonth(
  visits: readonly VisitRecord[],
  calendar: CalendarConvention = systemCalendar()
): NotesMonthGroup[] {
  const groups = new Map<string, VisitRecord[]>();
  for (const visit of visits) {
    const key = calendar.dayKey(visit.createdAt).slice(0, 7);
    const group = groups.get(key) ?? [];
    group.push(visit);
    groups.set(key, group);
  }

  return [...groups.entries()]
    .sort(([a], [b]) => b.localeCompare(a))
    .map(([key, grouped]) => {
      const [year, month] = key.split("-").map(Number);
      return {
        key,
        label: `${MONTH_NAMES[month - 1]} ${year}`,
        visits: [...grouped].sort(newestFirst),
      };
    });
}

/** Cafes that have at least one visit with notes */
export function cafeIdsWithNotes(visits: readonly VisitRecord[]): string[] {
  return [...new Set(visits.filter(hasNotes).map((v) => v.cafeId))].sort();
}

export function filterNotesByCafe(visits: readonly VisitRecord[], cafeId: string): VisitRecord[] {
  return visits.filter((v) => v.cafeId === cafeId).sort(newestFirst);
}

// ─── Profile Stats ──────────────────────────────────────────

function countByDrinkType(visits: readonly VisitRecord[]): Map<DrinkType, number> {
  const counts = new Map<DrinkType, number>();
  for (const visit of visits) {
    counts.set(visit.drinkType, (counts.get(visit.drinkType) ?? 0) + 1);
  }
  return counts;
}

export function getUserStats(visits: readonly VisitRecord[]): UserStats {
  const totalScore = visits.reduce((sum, v) => sum + (v.overallScore ?? 0), 0);
  const breakdown = getBeverageBreakdown(visits);

  return {
    totalVisits: visits.length,
    totalCafes: new Set(visits.map((v) => v.cafeId)).size,
    averageScore: visits.length > 0 ? totalScore / visits.length : 0,
    favoriteDrinkType: breakdown.length > 0 ? breakdown[0].drinkType : null,
  };
}

/** Share of visits per drink type, most common first */
export function getBeverageBreakdown(visits: readonly VisitRecord[]): BeverageShare[] {
  if (visits.length === 0) return [];
  return [...countByDrinkType(visits).entries()]
    .map(([drinkType, count]) => ({ drinkType, count, fraction: count / visits.length }))
    .sort((a, b) => b.count - a.count || drinkTypeRank(a.drinkType) - drinkTypeRank(b.drinkType));
}
