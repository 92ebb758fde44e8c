/**
 * Week Models
 *
 * Optional weekly rounds within a season, used for betting rotas. Each week
 * has exactly two assigned players (assignment order 1 and 2).
 */

export interface Week {
  id: string;                    // UUID
  season_id: string;
  week_number: number;           // Sequential, unique per season
  start_date: string;            // YYYY-MM-DD
  end_date: string;              // YYYY-MM-DD
  created_at: Date;
}

export type WeekRow = Week;

export type AssignmentOrder = 1 | 2;

export interface WeekAssignment {
  id: string;
  week_id: string;
  player_id: string;
  assignment_order: AssignmentOrder;
}

export type WeekAssignmentRow = WeekAssignment;
