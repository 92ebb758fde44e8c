/**
 * Bet Repository
 *
 * Data access layer for bet metadata. Money movements for a bet are ledger
 * entries; this table only records what was wagered and how it settled.
 */

import { db, Queryable } from '../config/database';
import { Bet, BetFilters, BetRow, BetStatus, SettledBetStatus, mapBetRow } from '../models/bet';
import { Money, formatMoney } from '../utils/money';

export const DEFAULT_BET_LIMIT = 100;

const BET_COLUMNS = `
  id,
  week_id,
  placed_by_player_id,
  stake,
  description,
  odds,
  bet_date,
  status,
  result_date,
  winnings,
  notes,
  created_at
`;

/**
 * Bet to insert; always stored as pending
 */
export interface NewBet {
  week_id?: string;
  placed_by_player_id: string;
  stake: Money;
  description: string;
  odds?: string;
  bet_date: string;
  notes?: string;
}

export interface BetSettlement {
  status: SettledBetStatus;
  result_date: string;
  winnings?: Money;
}

/**
 * Bet Repository
 * Provides data access methods for bets
 */
export class BetRepository {
  async create(bet: NewBet, executor: Queryable = db): Promise<Bet> {
    const sql = `
      INSERT INTO bets (
        week_id,
        placed_by_player_id,
        stake,
        description,
        odds,
        bet_date,
        status,
        notes
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
      RETURNING ${BET_COLUMNS}
    `;

    const result = await executor.query<BetRow>(sql, [
      bet.week_id ?? null,
      bet.placed_by_player_id,
      formatMoney(bet.stake),
      bet.description,
      bet.odds ?? null,
      bet.bet_date,
      BetStatus.PENDING,
      bet.notes ?? null,
    ]);

    return mapBetRow(result.rows[0]);
  }

  async findById(betId: string, executor: Queryable = db): Promise<Bet | null> {
    const result = await executor.query<BetRow>(
      `SELECT ${BET_COLUMNS} FROM bets WHERE id = $1`,
      [betId]
    );

    return result.rows.length > 0 ? mapBetRow(result.rows[0]) : null;
  }

  /**
   * List bets newest first
   *
   * @param filters - Optional status and placing player; limit defaults to 100
   */
  async findAll(filters: BetFilters = {}, executor: Queryable = db): Promise<Bet[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filters.status) {
      params.push(filters.status);
      conditions.push(`status = $${params.length}`);
    }

    if (filters.playerId) {
      params.push(filters.playerId);
      conditions.push(`placed_by_player_id = $${params.length}`);
    }

    params.push(filters.limit ?? DEFAULT_BET_LIMIT);

    const sql = `
      SELECT ${BET_COLUMNS}
      FROM bets
      ${conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : ''}
      ORDER BY bet_date DESC, created_at DESC
      LIMIT $${params.length}
    `;

    const result = await executor.query<BetRow>(sql, params);
    return result.rows.map(mapBetRow);
  }

  /**
   * Record the outcome of a pending bet
   *
   * Only pending bets are updated, so a concurrent settlement loses.
   *
   * @returns The settled bet, or null when it was not pending
   */
  async settle(
    betId: string,
    settlement: BetSettlement,
    executor: Queryable = db
  ): Promise<Bet | null> {
    const sql = `
      UPDATE bets
      SET status = $2,
          result_date = $3,
          winnings = $4
      WHERE id = $1 AND status = $5
      RETURNING ${BET_COLUMNS}
    `;

    const result = await executor.query<BetRow>(sql, [
      betId,
      settlement.status,
      settlement.result_date,
      settlement.winnings === undefined ? null : formatMoney(settlement.winnings),
      BetStatus.PENDING,
    ]);

    return result.rows.length > 0 ? mapBetRow(result.rows[0]) : null;
  }
}
