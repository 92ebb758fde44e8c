/**
 * Season Repository
 *
 * Data access layer for seasons. Activation is two statements
 * (deactivate all, activate one) that callers run in one transaction;
 * the partial unique index on is_active rejects a second active season.
 */

import { db, Queryable } from '../config/database';
import { CreateSeasonParams, Season, SeasonRow, mapSeasonRow } from '../models/season';

const SEASON_COLUMNS = 'id, name, start_date, end_date, is_active, created_at';

/**
 * Season Repository
 * Provides data access methods for seasons
 */
export class SeasonRepository {
  /**
   * Find a season by ID
   *
   * @returns Season if found, null otherwise
   */
  async findById(seasonId: string, executor: Queryable = db): Promise<Season | null> {
    const result = await executor.query<SeasonRow>(
      `SELECT ${SEASON_COLUMNS} FROM seasons WHERE id = $1`,
      [seasonId]
    );

    return result.rows.length > 0 ? mapSeasonRow(result.rows[0]) : null;
  }

  async findByName(name: string, executor: Queryable = db): Promise<Season | null> {
    const result = await executor.query<SeasonRow>(
      `SELECT ${SEASON_COLUMNS} FROM seasons WHERE name = $1`,
      [name]
    );

    return result.rows.length > 0 ? mapSeasonRow(result.rows[0]) : null;
  }

  /**
   * Find the active season, if any
   */
  async findActive(executor: Queryable = db): Promise<Season | null> {
    const result = await executor.query<SeasonRow>(
      `SELECT ${SEASON_COLUMNS} FROM seasons WHERE is_active = TRUE LIMIT 1`
    );

    return result.rows.length > 0 ? mapSeasonRow(result.rows[0]) : null;
  }

  /**
   * All seasons, most recent start first
   */
  async findAll(executor: Queryable = db): Promise<Season[]> {
    const result = await executor.query<SeasonRow>(
      `SELECT ${SEASON_COLUMNS} FROM seasons ORDER BY start_date DESC, name ASC`
    );

    return result.rows.map(mapSeasonRow);
  }

  /**
   * Insert an inactive season
   */
  async create(params: CreateSeasonParams, executor: Queryable = db): Promise<Season> {
    const result = await executor.query<SeasonRow>(
      `
      INSERT INTO seasons (name, start_date, end_date, is_active)
      VALUES ($1, $2, $3, FALSE)
      RETURNING ${SEASON_COLUMNS}
      `,
      [params.name, params.start_date, params.end_date ?? null]
    );

    return mapSeasonRow(result.rows[0]);
  }

  async deactivateAll(executor: Queryable = db): Promise<void> {
    await executor.query('UPDATE seasons SET is_active = FALSE WHERE is_active = TRUE');
  }

  /**
   * Set one season active
   *
   * @returns The updated season, or null when the id is unknown
   */
  async activate(seasonId: string, executor: Queryable = db): Promise<Season | null> {
    const result = await executor.query<SeasonRow>(
      `UPDATE seasons SET is_active = TRUE WHERE id = $1 RETURNING ${SEASON_COLUMNS}`,
      [seasonId]
    );

    return result.rows.length > 0 ? mapSeasonRow(result.rows[0]) : null;
  }
}
