/**
 * Player Models
 *
 * Players are global; participation in a season is tracked by a separate
 * membership with its own active flag. A player counts towards a season's
 * roster only when both flags are set.
 */

/**
 * Player entity from database
 */
export interface Player {
  id: string;                    // UUID
  name: string;                  // Globally unique name
  contact?: string;              // Optional contact detail
  is_active: boolean;
  created_at: Date;
}

/**
 * Player database row (matches PostgreSQL schema)
 */
export interface PlayerRow {
  id: string;
  name: string;
  contact: string | null;
  is_active: boolean;
  created_at: Date;
}

/**
 * Player-season membership
 */
export interface PlayerSeason {
  id: string;
  player_id: string;
  season_id: string;
  joined_date: string;           // YYYY-MM-DD
  is_active: boolean;
}

export type PlayerSeasonRow = PlayerSeason;

export interface CreatePlayerParams {
  name: string;
  contact?: string;
}

/**
 * Convert database row to Player model
 */
export function mapPlayerRow(row: PlayerRow): Player {
  return {
    id: row.id,
    name: row.name,
    contact: row.contact ?? undefined,
    is_active: row.is_active,
    created_at: row.created_at,
  };
}
