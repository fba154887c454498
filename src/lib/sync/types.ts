// Row types matching the backend's visits table columns

export interface SupabaseVisitRow {
  id: string;
  user_id: string;
  cafe_id: string;
  drink_type: string | null;
  drink_type_custom: string | null;
  caption: string;
  notes: string | null;
  overall_score: number | null;
  created_at: string | null;
}
