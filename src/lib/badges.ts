// Achievement Badge System — catalog + unlock evaluation
// Every call recomputes all badge states from the visit list; nothing is stored.

import type { VisitRecord } from "@/types/visit";
import { systemCalendar } from "./calendar";
import type { CalendarConvention } from "./calendar";
import { loadEngineConfig } from "./config";
import { computeAggregates } from "./journalStats";
import type { Aggregates } from "./journalStats";

// ─── Badge Types ────────────────────────────────────────────

export type BadgeCategory =
  | "Milestone"
  | "Streak"
  | "Exploration"
  | "Journal"
  | "Variety"
  | "Time of Day";

export const BADGE_CATEGORY_ORDER: Record<BadgeCategory, number> = {
  Milestone: 0,
  Streak: 1,
  Exploration: 2,
  Journal: 3,
  Variety: 4,
  "Time of Day": 5,
};

export interface BadgeDef {
  id: string;
  name: string;
  description: string;
  category: BadgeCategory;
  iconName: string;
  targetValue: number | null;
  hint: string; // shown when locked
}

export interface BadgeState {
  definition: BadgeDef;
  isUnlocked: boolean;
  currentValue: number;
  targetValue: number | null;
}

export interface BadgeEvaluation {
  currentValue: number;
  isUnlocked: boolean;
}

export type BadgeRule = (aggregates: Aggregates) => BadgeEvaluation;

// ─── Badge Definitions ──────────────────────────────────────

export const BADGES: BadgeDef[] = [
  // ─── Milestone ──────────────────────────────────────────
  {
    id: "first_pour",
    name: "First Pour",
    description: "Logged your first Mugshot visit.",
    category: "Milestone",
    iconName: "cup.and.saucer.fill",
    targetValue: 1,
    hint: "Log your first visit to any cafe.",
  },
  {
    id: "steady_sipper",
    name: "Steady Sipper",
    description: "Logged 10 visits.",
    category: "Milestone",
    iconName: "mug.fill",
    targetValue: 10,
    hint: "Log 10 visits to cafes.",
  },
  {
    id: "regular",
    name: "Regular",
    description: "Logged 25 visits.",
    category: "Milestone",
    iconName: "star.fill",
    targetValue: 25,
    hint: "Log 25 visits to cafes.",
  },

  // ─── Streak ─────────────────────────────────────────────
  {
    id: "weekend_warrior",
    name: "Weekend Warrior",
    description: "Logged visits on 2 consecutive weekends.",
    category: "Streak",
    iconName: "sun.max.fill",
    targetValue: 2,
    hint: "Log visits on 2 consecutive weekends.",
  },
  {
    id: "daily_drip_7",
    name: "Daily Drip (7)",
    description: "7-day visit streak.",
    category: "Streak",
    iconName: "flame.fill",
    targetValue: 7,
    hint: "Maintain a 7-day visit streak.",
  },

  // ─── Exploration ────────────────────────────────────────
  {
    id: "neighborhood_sipper",
    name: "Neighborhood Sipper",
    description: "Visited 3 unique cafes.",
    category: "Exploration",
    iconName: "map.fill",
    targetValue: 3,
    hint: "Visit 3 different cafes.",
  },
  {
    id: "cafe_explorer",
    name: "Cafe Explorer",
    description: "Visited 10 unique cafes.",
    category: "Exploration",
    iconName: "globe.americas.fill",
    targetValue: 10,
    hint: "Visit 10 different cafes.",
  },

  // ─── Journal ────────────────────────────────────────────
  {
    id: "thoughtful_sipper",
    name: "Thoughtful Sipper",
    description: "Added notes to 3 visits.",
    category: "Journal",
    iconName: "pencil.line",
    targetValue: 3,
    hint: "Add notes to 3 of your visits.",
  },
  {
    id: "coffee_chronicler",
    name: "Coffee Chronicler",
    description: "Added notes to 10 visits.",
    category: "Journal",
    iconName: "book.fill",
    targetValue: 10,
    hint: "Add notes to 10 of your visits.",
  },

  // ─── Variety ────────────────────────────────────────────
  {
    id: "adventurous_palate",
    name: "Adventurous Palate",
    description: "Logged 3 different drink types.",
    category: "Variety",
    iconName: "sparkles",
    targetValue: 3,
    hint: "Try 3 different drink types.",
  },

  // ─── Time of Day ────────────────────────────────────────
  {
    id: "early_bird_brew",
    name: "Early Bird Brew",
    description: "Logged 5 visits before 9am.",
    category: "Time of Day",
    iconName: "sunrise.fill",
    targetValue: 5,
    hint: "Log 5 visits before 9am.",
  },
];

export const BADGE_MAP = new Map<string, BadgeDef>(BADGES.map((b) => [b.id, b]));

export function findBadge(id: string): BadgeDef | null {
  return BADGE_MAP.get(id) ?? null;
}

// ─── Unlock Rules ───────────────────────────────────────────
// One small rule per badge id; adding a badge is a catalog entry plus a rule.

function atLeast(value: number, threshold: number): BadgeEvaluation {
  return { currentValue: value, isUnlocked: value >= threshold };
}

export const BADGE_RULES: Record<string, BadgeRule> = {
  // Progress caps at the target; unlock still reads the raw count
  first_pour: (a) => ({ currentValue: Math.min(a.totalVisits, 1), isUnlocked: a.totalVisits >= 1 }),
  steady_sipper: (a) => atLeast(a.totalVisits, 10),
  regular: (a) => atLeast(a.totalVisits, 25),
  weekend_warrior: (a) => atLeast(a.consecutiveWeekendsCount, 2),
  // Best streak ever counts, so this stays unlocked after the current streak breaks
  daily_drip_7: (a) => atLeast(Math.max(a.currentStreakDays, a.longestStreakDays), 7),
  neighborhood_sipper: (a) => atLeast(a.uniqueCafeCount, 3),
  cafe_explorer: (a) => atLeast(a.uniqueCafeCount, 10),
  thoughtful_sipper: (a) => atLeast(a.visitsWithNotesCount, 3),
  coffee_chronicler: (a) => atLeast(a.visitsWithNotesCount, 10),
  adventurous_palate: (a) => atLeast(a.distinctDrinkTypesCount, 3),
  early_bird_brew: (a) => atLeast(a.earlyMorningVisitsCount, 5),
};

const LOCKED: BadgeEvaluation = { currentValue: 0, isUnlocked: false };

export function evaluateBadge(definition: BadgeDef, aggregates: Aggregates): BadgeState {
  const rule = Object.prototype.hasOwnProperty.call(BADGE_RULES, definition.id)
    ? BADGE_RULES[definition.id]
    : undefined;
  const { currentValue, isUnlocked } = rule ? rule(aggregates) : LOCKED;

  return {
    definition,
    isUnlocked,
    currentValue,
    targetValue: definition.targetValue,
  };
}

// ─── Ordering ───────────────────────────────────────────────

/** Unlocked first, then category rank, then name */
export function compareBadgeStates(a: BadgeState, b: BadgeState): number {
  if (a.isUnlocked !== b.isUnlocked) return a.isUnlocked ? -1 : 1;

  const rankA = BADGE_CATEGORY_ORDER[a.definition.category];
  const rankB = BADGE_CATEGORY_ORDER[b.definition.category];
  if (rankA !== rankB) return rankA - rankB;

  const nameA = a.definition.name;
  const nameB = b.definition.name;
  return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
}

export function sortBadgeStates(states: readonly BadgeState[]): BadgeState[] {
  return [...states].sort(compareBadgeStates);
}

// ─── Evaluation ─────────────────────────────────────────────

export function evaluateBadges(aggregates: Aggregates, catalog: readonly BadgeDef[] = BADGES): BadgeState[] {
  return sortBadgeStates(catalog.map((def) => evaluateBadge(def, aggregates)));
}

/** Compute every badge state from the user's visits, sorted for display */
export function computeBadges(
  visits: readonly VisitRecord[],
  now: Date = new Date(),
  calendar: CalendarConvention = systemCalendar()
): BadgeState[] {
  const aggregates = computeAggregates(visits, now, calendar);
  const logging = loadEngineConfig().badgeLogging;

  if (logging) {
    console.log(
      `[badges] totalVisits=${aggregates.totalVisits}, uniqueCafes=${aggregates.uniqueCafeCount}, ` +
        `notesCount=${aggregates.visitsWithNotesCount}, drinkTypes=${aggregates.distinctDrinkTypesCount}, ` +
        `earlyMorning=${aggregates.earlyMorningVisitsCount}, currentStreak=${aggregates.currentStreakDays}, ` +
        `longestStreak=${aggregates.longestStreakDays}, weekends=${aggregates.consecutiveWeekendsCount}`
    );
  }

  const states = evaluateBadges(aggregates);

  if (logging) {
    const unlocked = states.filter((s) => s.isUnlocked).length;
    console.log(`[badges] Computed ${states.length} badges (unlocked: ${unlocked}, locked: ${states.length - unlocked})`);
  }

  return states;
}

// ─── Display Helpers ────────────────────────────────────────

/** Progress from 0 to 1 */
export function getBadgeProgress(state: BadgeState): number {
  if (state.targetValue === null || state.targetValue <= 0) {
    return state.isUnlocked ? 1 : 0;
  }
  return Math.min(1, state.currentValue / state.targetValue);
}

/** "Unlocked", "Locked", or "3/10" */
export function getBadgeProgressText(state: BadgeState): string {
  if (state.isUnlocked) return "Unlocked";
  if (state.targetValue === null) return "Locked";
  return `${state.currentValue}/${state.targetValue}`;
}

/** Get badge counts by category */
export function getBadgeCounts(states: readonly BadgeState[]): Record<BadgeCategory, { earned: number; total: number }> {
  const counts: Record<BadgeCategory, { earned: number; total: number }> = {
    Milestone: { earned: 0, total: 0 },
    Streak: { earned: 0, total: 0 },
    Exploration: { earned: 0, total: 0 },
    Journal: { earned: 0, total: 0 },
    Variety: { earned: 0, total: 0 },
    "Time of Day": { earned: 0, total: 0 },
  };

  for (const state of states) {
    counts[state.definition.category].total++;
    if (state.isUnlocked) {
      counts[state.definition.category].earned++;
    }
  }

  return counts;
}
