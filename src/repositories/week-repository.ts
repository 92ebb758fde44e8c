/**
 * Week Repository
 *
 * Weekly rounds and their two-player assignments.
 */

import { db, Queryable } from '../config/database';
import {
  AssignmentOrder,
  Week,
  WeekAssignment,
  WeekAssignmentRow,
  WeekRow,
} from '../models/week';

const WEEK_COLUMNS = 'id, season_id, week_number, start_date, end_date, created_at';
const ASSIGNMENT_COLUMNS = 'id, week_id, player_id, assignment_order';

export interface NewWeek {
  season_id: string;
  week_number: number;
  start_date: string;
  end_date: string;
}

export class WeekRepository {
  async create(week: NewWeek, executor: Queryable = db): Promise<Week> {
    const result = await executor.query<WeekRow>(
      `
      INSERT INTO weeks (season_id, week_number, start_date, end_date)
      VALUES ($1, $2, $3, $4)
      RETURNING ${WEEK_COLUMNS}
      `,
      [week.season_id, week.week_number, week.start_date, week.end_date]
    );

    return result.rows[0];
  }

  async findById(weekId: string, executor: Queryable = db): Promise<Week | null> {
    const result = await executor.query<WeekRow>(
      `SELECT ${WEEK_COLUMNS} FROM weeks WHERE id = $1`,
      [weekId]
    );

    return result.rows.length > 0 ? result.rows[0] : null;
  }

  async findBySeasonAndNumber(
    seasonId: string,
    weekNumber: number,
    executor: Queryable = db
  ): Promise<Week | null> {
    const result = await executor.query<WeekRow>(
      `SELECT ${WEEK_COLUMNS} FROM weeks WHERE season_id = $1 AND week_number = $2`,
      [seasonId, weekNumber]
    );

    return result.rows.length > 0 ? result.rows[0] : null;
  }

  /**
   * Weeks of a season in week-number order
   */
  async findBySeason(seasonId: string, executor: Queryable = db): Promise<Week[]> {
    const result = await executor.query<WeekRow>(
      `SELECT ${WEEK_COLUMNS} FROM weeks WHERE season_id = $1 ORDER BY week_number ASC`,
      [seasonId]
    );

    return result.rows;
  }

  async findAssignments(weekId: string, executor: Queryable = db): Promise<WeekAssignment[]> {
    const result = await executor.query<WeekAssignmentRow>(
      `
      SELECT ${ASSIGNMENT_COLUMNS}
      FROM week_assignments
      WHERE week_id = $1
      ORDER BY assignment_order ASC
      `,
      [weekId]
    );

    return result.rows;
  }

  async createAssignment(
    weekId: string,
    playerId: string,
    order: AssignmentOrder,
    executor: Queryable = db
  ): Promise<WeekAssignment> {
    const result = await executor.query<WeekAssignmentRow>(
      `
      INSERT INTO week_assignments (week_id, player_id, assignment_order)
      VALUES ($1, $2, $3)
      RETURNING ${ASSIGNMENT_COLUMNS}
      `,
      [weekId, playerId, order]
    );

    return result.rows[0];
  }
}
