/**
 * Season Models
 *
 * A season is a bounded (or open-ended) window grouping all activity.
 * At most one season is active at a time. A season whose end date has
 * passed is frozen: no new bets are accepted.
 */

/**
 * Season entity from database
 */
export interface Season {
  id: string;                    // UUID
  name: string;                  // Unique season name (e.g. "2025-2026")
  start_date: string;            // YYYY-MM-DD
  end_date?: string;             // Optional YYYY-MM-DD
  is_active: boolean;
  created_at: Date;
}

/**
 * Season database row (matches PostgreSQL schema)
 */
export interface SeasonRow {
  id: string;
  name: string;
  start_date: string;
  end_date: string | null;
  is_active: boolean;
  created_at: Date;
}

export interface CreateSeasonParams {
  name: string;
  start_date: string;
  end_date?: string;
}

/**
 * Convert database row to Season model
 */
export function mapSeasonRow(row: SeasonRow): Season {
  return {
    id: row.id,
    name: row.name,
    start_date: row.start_date,
    end_date: row.end_date ?? undefined,
    is_active: row.is_active,
    created_at: row.created_at,
  };
}
