// Data shape transformers — converts visit rows read from the backend
// into the VisitRecord values the stats and badge engine consume.
//
// Supabase: visits { id, user_id, cafe_id, drink_type, notes, overall_score, created_at, ... }
// Engine:   VisitRecord { id, cafeId, createdAt: Date, drinkType, notes, overallScore }

import type { DrinkType, VisitRecord } from "@/types/visit";
import { DRINK_TYPES, isDrinkType } from "@/types/visit";
import type { SupabaseVisitRow } from "./types";

/** Stored drink type → DrinkType. Missing means the app default (Coffee). */
export function parseDrinkType(raw: string | null | undefined): DrinkType {
  if (raw === null || raw === undefined || raw.trim() === "") return "Coffee";
  const value = raw.trim();
  if (isDrinkType(value)) return value;
  const match = DRINK_TYPES.find((t) => t.toLowerCase() === value.toLowerCase());
  return match ?? "Other";
}

/**
 * Convert a visits row to a VisitRecord.
 * Returns `{ error: string }` if the row is missing an id, a cafe, or a valid timestamp.
 */
export function rowToVisitRecord(row: SupabaseVisitRow): VisitRecord | { error: string } {
  if (!row.id) {
    return { error: "Visit row has no id." };
  }
  if (!row.cafe_id) {
    return { error: `Visit ${row.id} has no cafe_id.` };
  }
  if (!row.created_at) {
    return { error: `Visit ${row.id} has no created_at.` };
  }

  const createdAt = new Date(row.created_at);
  if (Number.isNaN(createdAt.getTime())) {
    return { error: `Visit ${row.id} has an invalid created_at "${row.created_at}".` };
  }

  return {
    id: row.id,
    cafeId: row.cafe_id,
    createdAt,
    drinkType: parseDrinkType(row.drink_type),
    notes: row.notes,
    overallScore: row.overall_score ?? 0,
  };
}

/** Convert a batch of rows, skipping (and logging) rows that fail validation */
export function rowsToVisitRecords(rows: readonly SupabaseVisitRow[]): VisitRecord[] {
  const visits: VisitRecord[] = [];
  for (const row of rows) {
    const result = rowToVisitRecord(row);
    if ("error" in result) {
      console.warn("[transforms] Skipping visit row:", result.error);
      continue;
    }
    visits.push(result);
  }
  return visits;
}
