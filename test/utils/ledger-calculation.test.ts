import {
  EMPTY_TOTALS,
  bankBalance,
  foldTotals,
  netPosition,
  payoutIfCashingOut,
  profitLoss,
  profitPercentage,
  rankByProfitLoss,
  sharePerPlayer,
} from '../../src/utils/ledger-calculation';
import { EntryKind } from '../../src/models/ledger-entry';
import { PlayerPerformance } from '../../src/models/statistics';

describe('Ledger Calculation', () => {
  const totals = foldTotals([
    { kind: EntryKind.CONTRIBUTION, total: 3000n, absolute_total: 3000n },
    { kind: EntryKind.BET_PLACED, total: -2500n, absolute_total: 2500n },
    { kind: EntryKind.WINNINGS, total: 4000n, absolute_total: 4000n },
    { kind: EntryKind.BET_VOID, total: 500n, absolute_total: 500n },
    { kind: EntryKind.PAYOUT, total: -700n, absolute_total: 700n },
  ]);

  describe('foldTotals', () => {
    it('should name each kind total and net off voided stakes', () => {
      expect(totals).toEqual({
        paid_in: 3000n,
        bets_won: 4000n,
        bets_placed_gross: 2500n,
        bets_voided: 500n,
        bets_placed_net: 2000n,
        paid_out: 700n,
      });
    });

    it('should treat missing kinds as zero', () => {
      expect(foldTotals([])).toEqual(EMPTY_TOTALS);
    });
  });

  describe('derived figures', () => {
    it('should compute the bank balance from gross stakes', () => {
      // 3000 + 4000 - 2500 - 700
      expect(bankBalance(totals)).toBe(3800n);
    });

    it('should compute profit against net stakes', () => {
      expect(profitLoss(totals)).toBe(2000n);
      expect(profitPercentage(totals)).toBe(10000n);
    });

    it('should report 0.00% when nothing is at risk', () => {
      expect(profitPercentage(EMPTY_TOTALS)).toBe(0n);
    });

    it('should compute net position and cash-out value', () => {
      expect(netPosition(totals)).toBe(2300n);
      expect(payoutIfCashingOut(2300n, 1500n, 1000n)).toBe(1800n);
    });
  });

  describe('sharePerPlayer', () => {
    it('should split winnings across the roster', () => {
      expect(sharePerPlayer(4000n, 3)).toBe(1333n);
    });

    it('should return zero for an empty roster', () => {
      expect(sharePerPlayer(4000n, 0)).toBe(0n);
    });
  });

  describe('rankByProfitLoss', () => {
    const performance = (player_id: string, profit_loss: bigint): PlayerPerformance => ({
      player_id,
      player_name: player_id,
      balance: 0n,
      bets_placed: 0n,
      bet_balance: 0n,
      won: 0n,
      profit_loss,
    });

    it('should order largest first and keep ties in input order', () => {
      const ranked = rankByProfitLoss([
        performance('a', -100n),
        performance('b', 300n),
        performance('c', 0n),
        performance('d', 300n),
      ]);

      expect(ranked.map((row) => row.player_id)).toEqual(['b', 'd', 'c', 'a']);
    });
  });
});
