/**
 * Player Repository
 *
 * Data access layer for players and their season memberships.
 * A player is on a season's active roster only when both the membership
 * and the player are active.
 */

import { db, Queryable } from '../config/database';
import {
  CreatePlayerParams,
  Player,
  PlayerRow,
  PlayerSeason,
  PlayerSeasonRow,
  mapPlayerRow,
} from '../models/player';

const PLAYER_COLUMNS = 'p.id, p.name, p.contact, p.is_active, p.created_at';
const MEMBERSHIP_COLUMNS = 'id, player_id, season_id, joined_date, is_active';

/**
 * Player Repository
 * Provides data access methods for players and memberships
 */
export class PlayerRepository {
  async findById(playerId: string, executor: Queryable = db): Promise<Player | null> {
    const result = await executor.query<PlayerRow>(
      `SELECT ${PLAYER_COLUMNS} FROM players p WHERE p.id = $1`,
      [playerId]
    );

    return result.rows.length > 0 ? mapPlayerRow(result.rows[0]) : null;
  }

  /**
   * Find a player by exact name
   */
  async findByName(name: string, executor: Queryable = db): Promise<Player | null> {
    const result = await executor.query<PlayerRow>(
      `SELECT ${PLAYER_COLUMNS} FROM players p WHERE p.name = $1`,
      [name]
    );

    return result.rows.length > 0 ? mapPlayerRow(result.rows[0]) : null;
  }

  async findAll(executor: Queryable = db): Promise<Player[]> {
    const result = await executor.query<PlayerRow>(
      `SELECT ${PLAYER_COLUMNS} FROM players p ORDER BY p.name ASC`
    );

    return result.rows.map(mapPlayerRow);
  }

  async create(params: CreatePlayerParams, executor: Queryable = db): Promise<Player> {
    const result = await executor.query<PlayerRow>(
      `
      INSERT INTO players AS p (name, contact, is_active)
      VALUES ($1, $2, TRUE)
      RETURNING ${PLAYER_COLUMNS}
      `,
      [params.name, params.contact ?? null]
    );

    return mapPlayerRow(result.rows[0]);
  }

  /**
   * Active roster of a season, ordered by name
   *
   * Joins memberships to players so both active flags are required.
   */
  async findActiveInSeason(seasonId: string, executor: Queryable = db): Promise<Player[]> {
    const sql = `
      SELECT ${PLAYER_COLUMNS}
      FROM players p
      INNER JOIN player_seasons ps ON ps.player_id = p.id
      WHERE ps.season_id = $1
        AND ps.is_active = TRUE
        AND p.is_active = TRUE
      ORDER BY p.name ASC
    `;

    const result = await executor.query<PlayerRow>(sql, [seasonId]);
    return result.rows.map(mapPlayerRow);
  }

  async countActiveInSeason(seasonId: string, executor: Queryable = db): Promise<number> {
    const sql = `
      SELECT COUNT(*) AS count
      FROM players p
      INNER JOIN player_seasons ps ON ps.player_id = p.id
      WHERE ps.season_id = $1
        AND ps.is_active = TRUE
        AND p.is_active = TRUE
    `;

    const result = await executor.query<{ count: string }>(sql, [seasonId]);
    return Number(result.rows[0].count);
  }

  async findMembership(
    playerId: string,
    seasonId: string,
    executor: Queryable = db
  ): Promise<PlayerSeason | null> {
    const result = await executor.query<PlayerSeasonRow>(
      `SELECT ${MEMBERSHIP_COLUMNS} FROM player_seasons WHERE player_id = $1 AND season_id = $2`,
      [playerId, seasonId]
    );

    return result.rows.length > 0 ? result.rows[0] : null;
  }

  /**
   * Insert an active membership
   */
  async createMembership(
    playerId: string,
    seasonId: string,
    joinedDate: string,
    executor: Queryable = db
  ): Promise<PlayerSeason> {
    const result = await executor.query<PlayerSeasonRow>(
      `
      INSERT INTO player_seasons (player_id, season_id, joined_date, is_active)
      VALUES ($1, $2, $3, TRUE)
      RETURNING ${MEMBERSHIP_COLUMNS}
      `,
      [playerId, seasonId, joinedDate]
    );

    return result.rows[0];
  }

  /**
   * @returns The updated membership, or null when there is none
   */
  async setMembershipActive(
    playerId: string,
    seasonId: string,
    isActive: boolean,
    executor: Queryable = db
  ): Promise<PlayerSeason | null> {
    const result = await executor.query<PlayerSeasonRow>(
      `
      UPDATE player_seasons
      SET is_active = $3
      WHERE player_id = $1 AND season_id = $2
      RETURNING ${MEMBERSHIP_COLUMNS}
      `,
      [playerId, seasonId, isActive]
    );

    return result.rows.length > 0 ? result.rows[0] : null;
  }
}
