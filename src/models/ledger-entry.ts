/**
 * Ledger Entry Models
 *
 * The ledger is the single source of truth for all money in the syndicate.
 * Entries are insert-only: they are never updated or deleted, and every
 * balance, total and statistic is derived from them on demand.
 *
 * Sign convention (amount is never zero):
 * - contribution  +  player pays in
 * - bet_placed    -  stake leaves the bank
 * - winnings      +  full return credited to the player who placed the bet
 * - bet_void      +  stake returned to the player who placed the bet
 * - payout        -  withdrawal to a player
 */

import { Money, parseMoney } from '../utils/money';

/**
 * Entry kinds
 */
export enum EntryKind {
  CONTRIBUTION = 'contribution',
  BET_PLACED = 'bet_placed',
  WINNINGS = 'winnings',
  BET_VOID = 'bet_void',
  PAYOUT = 'payout',
}

/**
 * Direction of money for each kind: +1 into the bank, -1 out of it
 */
export const ENTRY_SIGN: Readonly<Record<EntryKind, 1 | -1>> = {
  [EntryKind.CONTRIBUTION]: 1,
  [EntryKind.BET_PLACED]: -1,
  [EntryKind.WINNINGS]: 1,
  [EntryKind.BET_VOID]: 1,
  [EntryKind.PAYOUT]: -1,
};

/**
 * Apply the kind's sign to a positive magnitude
 */
export function signedAmount(kind: EntryKind, magnitude: Money): Money {
  return ENTRY_SIGN[kind] === 1 ? magnitude : -magnitude;
}

/**
 * Ledger entry entity
 */
export interface LedgerEntry {
  id: string;                    // UUID
  entry_date: string;            // Calendar date of the event (YYYY-MM-DD)
  kind: EntryKind;
  player_id: string;             // UUID - Player credited or debited
  season_id: string;             // UUID - Season the entry belongs to
  week_id?: string;              // Optional weekly round
  bet_id?: string;               // Optional bet reference
  amount: Money;                 // Signed pence
  description: string;
  created_at: Date;
  created_by?: string;           // Optional creator tag (e.g. "import")
}

/**
 * Ledger entry database row (matches PostgreSQL schema)
 */
export interface LedgerEntryRow {
  id: string;
  entry_date: string;
  kind: EntryKind;
  player_id: string;
  season_id: string;
  week_id: string | null;
  bet_id: string | null;
  amount: string;                // NUMERIC(10,2) as decimal string
  description: string;
  created_at: Date;
  created_by: string | null;
}

/**
 * Convert database row to LedgerEntry model
 */
export function mapLedgerEntryRow(row: LedgerEntryRow): LedgerEntry {
  return {
    id: row.id,
    entry_date: row.entry_date,
    kind: row.kind,
    player_id: row.player_id,
    season_id: row.season_id,
    week_id: row.week_id ?? undefined,
    bet_id: row.bet_id ?? undefined,
    amount: parseMoney(row.amount),
    description: row.description,
    created_at: row.created_at,
    created_by: row.created_by ?? undefined,
  };
}

/**
 * Data required to append an entry; id and created_at are assigned by the store
 */
export interface NewLedgerEntry {
  entry_date: string;
  kind: EntryKind;
  player_id: string;
  season_id: string;
  week_id?: string;
  bet_id?: string;
  amount: Money;
  description: string;
  created_by?: string;
}

/**
 * Filter applied to ledger reads. Every field is optional; present fields
 * are combined with AND.
 */
export interface LedgerFilter {
  seasonId?: string;
  playerId?: string;
  kind?: EntryKind | readonly EntryKind[];
  betId?: string;
}

/**
 * Pagination for entry listings
 */
export interface Pagination {
  limit?: number;
  offset?: number;
}

/**
 * Sum of one kind's amounts within a filter
 */
export interface KindTotal {
  kind: EntryKind;
  total: Money;                  // Σ amount
  absolute_total: Money;         // Σ |amount|
}

/**
 * Per-player variant of KindTotal
 */
export interface PlayerKindTotal extends KindTotal {
  player_id: string;
}
