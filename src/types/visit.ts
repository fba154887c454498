// Visit types shared by the stats aggregator, badge evaluator and row transforms.
// Drink types use the display strings the backend stores in visits.drink_type.

export type DrinkType =
  | "Coffee"
  | "Matcha"
  | "Hojicha"
  | "Tea"
  | "Chai"
  | "Hot Chocolate"
  | "Other";

export const DRINK_TYPES: readonly DrinkType[] = [
  "Coffee",
  "Matcha",
  "Hojicha",
  "Tea",
  "Chai",
  "Hot Chocolate",
  "Other",
];

export function isDrinkType(value: string): value is DrinkType {
  return DRINK_TYPES.some((t) => t === value);
}

/** A logged cafe visit. Owned by the visit store; never mutated here. */
export interface VisitRecord {
  readonly id: string;
  readonly cafeId: string;
  readonly createdAt: Date;
  readonly drinkType: DrinkType;
  readonly notes?: string | null;
  readonly overallScore?: number; // weighted rating average, 0 when unrated
}
