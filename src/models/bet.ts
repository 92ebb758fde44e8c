/**
 * Bet Models
 *
 * A bet carries metadata only. Its financial consequences live in ledger
 * entries that reference it by id; the bet itself holds no balance.
 */

import { Money, parseMoney } from '../utils/money';

/**
 * Bet status values. Every bet starts pending.
 */
export enum BetStatus {
  PENDING = 'pending',
  WON = 'won',
  LOST = 'lost',
  VOID = 'void',
}

export type SettledBetStatus = Exclude<BetStatus, BetStatus.PENDING>;

/**
 * Bet entity from database
 */
export interface Bet {
  id: string;                    // UUID
  week_id?: string;
  placed_by_player_id: string;
  stake: Money;                  // Always > 0
  description: string;
  odds?: string;                 // Free text: "5/1", "2.5", "evens"
  bet_date: string;              // YYYY-MM-DD
  status: BetStatus;
  result_date?: string;
  winnings?: Money;              // Total return when won
  notes?: string;
  created_at: Date;
}

/**
 * Bet database row (matches PostgreSQL schema)
 */
export interface BetRow {
  id: string;
  week_id: string | null;
  placed_by_player_id: string;
  stake: string;
  description: string;
  odds: string | null;
  bet_date: string;
  status: BetStatus;
  result_date: string | null;
  winnings: string | null;
  notes: string | null;
  created_at: Date;
}

export interface CreateBetParams {
  placed_by_player_id: string;
  season_id: string;
  week_id?: string;
  stake: string;
  description: string;
  odds?: string;
  bet_date: string;
  notes?: string;
  created_by?: string;
}

export interface SettleBetParams {
  status: SettledBetStatus;
  result_date: string;
  winnings?: string;             // Required when status is won
  created_by?: string;
}

export interface BetFilters {
  status?: BetStatus;
  playerId?: string;
  limit?: number;
}

/**
 * Convert database row to Bet model
 */
export function mapBetRow(row: BetRow): Bet {
  return {
    id: row.id,
    week_id: row.week_id ?? undefined,
    placed_by_player_id: row.placed_by_player_id,
    stake: parseMoney(row.stake),
    description: row.description,
    odds: row.odds ?? undefined,
    bet_date: row.bet_date,
    status: row.status,
    result_date: row.result_date ?? undefined,
    winnings: row.winnings === null ? undefined : parseMoney(row.winnings),
    notes: row.notes ?? undefined,
    created_at: row.created_at,
  };
}
