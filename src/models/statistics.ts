/**
 * Derived Statistics Models
 *
 * Shapes returned by the derivation engine. Nothing here is persisted;
 * every value is computed from ledger entries at query time.
 */

import { Money, Percentage } from '../utils/money';

/**
 * Per-kind sums within a scope (season and/or player)
 */
export interface LedgerTotals {
  paid_in: Money;                // Σ contribution
  bets_won: Money;               // Σ winnings
  bets_placed_gross: Money;      // Σ |bet_placed|
  bets_voided: Money;            // Σ bet_void
  bets_placed_net: Money;        // gross - voided
  paid_out: Money;               // Σ |payout|
}

/**
 * One row of the performance table
 */
export interface PlayerPerformance {
  player_id: string;
  player_name: string;
  balance: Money;                // Net position (contributions - payouts)
  bets_placed: Money;            // Net of voided stakes
  bet_balance: Money;            // Available betting budget
  won: Money;
  profit_loss: Money;            // won - bets_placed
}

/**
 * Everything the dashboard shows for a season
 */
export interface SeasonSummary {
  season_id: string;
  totals: LedgerTotals;
  bank_balance: Money;
  profit_loss: Money;
  profit_percentage: Percentage;
  share_per_player: Money;
  active_player_count: number;
  contribution_weeks_elapsed: number;
  expected_contributions: Money;
  expected_contribution_per_player: Money;
}
