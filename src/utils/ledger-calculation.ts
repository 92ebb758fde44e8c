/**
 * Ledger Calculation Utilities
 *
 * Pure formulas over per-kind totals. The calculation service loads the
 * totals; everything here is arithmetic on values already in memory.
 *
 * Formulas:
 * - bets_placed_net = bets_placed_gross - bets_voided
 * - bank_balance = (paid_in + bets_won) - bets_placed_gross - paid_out
 * - profit_loss = bets_won - bets_placed_net
 * - profit_percentage = profit_loss / bets_placed_net x 100 (0.00 when nothing is at risk)
 * - share_per_player = bets_won / active players (0.00 with no active players)
 * - net_position = paid_in - paid_out
 * - payout_if_cashing_out = (net_position - expected_per_player) + share_per_player
 */

import { EntryKind, KindTotal } from '../models/ledger-entry';
import { LedgerTotals, PlayerPerformance } from '../models/statistics';
import { Money, Percentage, ZERO, percentageOf, splitEvenly } from './money';

export const EMPTY_TOTALS: Readonly<LedgerTotals> = {
  paid_in: ZERO,
  bets_won: ZERO,
  bets_placed_gross: ZERO,
  bets_voided: ZERO,
  bets_placed_net: ZERO,
  paid_out: ZERO,
};

/**
 * Fold per-kind sums into the named totals
 *
 * Kinds missing from the input count as zero.
 */
export function foldTotals(kindTotals: readonly KindTotal[]): LedgerTotals {
  const byKind = new Map<EntryKind, KindTotal>();
  for (const total of kindTotals) {
    byKind.set(total.kind, total);
  }

  const absolute = (kind: EntryKind): Money => byKind.get(kind)?.absolute_total ?? ZERO;

  const betsPlacedGross = absolute(EntryKind.BET_PLACED);
  const betsVoided = absolute(EntryKind.BET_VOID);

  return {
    paid_in: absolute(EntryKind.CONTRIBUTION),
    bets_won: absolute(EntryKind.WINNINGS),
    bets_placed_gross: betsPlacedGross,
    bets_voided: betsVoided,
    bets_placed_net: betsPlacedGross - betsVoided,
    paid_out: absolute(EntryKind.PAYOUT),
  };
}

export function bankBalance(totals: LedgerTotals): Money {
  return totals.paid_in + totals.bets_won - totals.bets_placed_gross - totals.paid_out;
}

export function profitLoss(totals: LedgerTotals): Money {
  return totals.bets_won - totals.bets_placed_net;
}

export function profitPercentage(totals: LedgerTotals): Percentage {
  return percentageOf(profitLoss(totals), totals.bets_placed_net);
}

export function netPosition(totals: LedgerTotals): Money {
  return totals.paid_in - totals.paid_out;
}

/**
 * Equal share of the winnings across the current active roster
 */
export function sharePerPlayer(betsWon: Money, activePlayerCount: number): Money {
  if (activePlayerCount <= 0) {
    return ZERO;
  }
  return splitEvenly(betsWon, activePlayerCount);
}

/**
 * What a player would receive if cashing out now
 */
export function payoutIfCashingOut(
  netPositionAmount: Money,
  expectedPerPlayer: Money,
  share: Money
): Money {
  return netPositionAmount - expectedPerPlayer + share;
}

/**
 * Order performance rows by profit/loss, largest first
 *
 * Array.prototype.sort is stable, so equal rows keep their input order.
 */
export function rankByProfitLoss(stats: readonly PlayerPerformance[]): PlayerPerformance[] {
  return [...stats].sort((a, b) => {
    if (a.profit_loss === b.profit_loss) {
      return 0;
    }
    return a.profit_loss > b.profit_loss ? -1 : 1;
  });
}
