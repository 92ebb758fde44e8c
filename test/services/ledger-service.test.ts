/**
 * Ledger Service Tests
 */

import { createTestContext, TestContext } from '../support/in-memory-store';
import { EntryKind } from '../../src/models/ledger-entry';
import { Season } from '../../src/models/season';
import { Player } from '../../src/models/player';
import {
  BadRequestError,
  InvalidAmountError,
  UnknownBetError,
  UnknownPlayerError,
  UnknownSeasonError,
  UnknownWeekError,
} from '../../src/models/errors';

describe('LedgerService', () => {
  let ctx: TestContext;
  let season: Season;
  let player: Player;
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(async () => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    ctx = createTestContext();
    season = await ctx.seasonService.createSeason({ name: 'Spring', start_date: '2025-08-11' }, true);
    player = await ctx.playerService.createPlayer({ name: 'Dana' }, true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('sign convention', () => {
    it('should store contributions as positive amounts', async () => {
      const entry = await ctx.ledgerService.recordContribution({
        playerId: player.id,
        seasonId: season.id,
        amount: 500n,
        entryDate: '2025-08-11',
      });

      expect(entry.kind).toBe(EntryKind.CONTRIBUTION);
      expect(entry.amount).toBe(500n);
      expect(entry.description).toBe('Weekly contribution');
    });

    it('should store stakes as negative amounts against the bet', async () => {
      const bet = await ctx.repositories.betRepository.create({
        placed_by_player_id: player.id,
        stake: 1000n,
        description: 'Derby',
        bet_date: '2025-08-12',
      });

      const entry = await ctx.ledgerService.recordBetPlaced({
        playerId: player.id,
        seasonId: season.id,
        betId: bet.id,
        stake: 1000n,
        entryDate: '2025-08-12',
      });

      expect(entry.kind).toBe(EntryKind.BET_PLACED);
      expect(entry.amount).toBe(-1000n);
      expect(entry.bet_id).toBe(bet.id);
    });

    it('should store winnings and voids as positive amounts', async () => {
      const won = await ctx.ledgerService.recordBetWon({
        playerId: player.id,
        seasonId: season.id,
        winnings: 4250n,
        entryDate: '2025-08-15',
      });
      const voided = await ctx.ledgerService.recordBetVoid({
        playerId: player.id,
        seasonId: season.id,
        stake: 200n,
        entryDate: '2025-08-15',
      });

      expect(won.amount).toBe(4250n);
      expect(won.bet_id).toBeUndefined();
      expect(voided.amount).toBe(200n);
      expect(voided.description).toBe('Bet voided, stake returned');
    });

    it('should store payouts as negative amounts', async () => {
      const entry = await ctx.ledgerService.recordPayout({
        playerId: player.id,
        seasonId: season.id,
        amount: 1234n,
        entryDate: '2025-09-01',
        description: 'End of season',
        createdBy: 'treasurer',
      });

      expect(entry.amount).toBe(-1234n);
      expect(entry.description).toBe('End of season');
      expect(entry.created_by).toBe('treasurer');
    });
  });

  describe('validation', () => {
    it.each([0n, -500n])('should reject a magnitude of %s', async (amount) => {
      await expect(
        ctx.ledgerService.recordContribution({
          playerId: player.id,
          seasonId: season.id,
          amount,
          entryDate: '2025-08-11',
        })
      ).rejects.toThrow(new InvalidAmountError('Contribution amount must be positive'));

      expect(await ctx.ledgerService.countEntries()).toBe(0);
    });

    it('should reject an impossible entry date', async () => {
      await expect(
        ctx.ledgerService.recordPayout({
          playerId: player.id,
          seasonId: season.id,
          amount: 100n,
          entryDate: '2025-02-30',
        })
      ).rejects.toThrow(BadRequestError);
    });

    it('should validate before opening a transaction', async () => {
      await expect(
        ctx.ledgerService.recordBetVoid({
          playerId: player.id,
          seasonId: season.id,
          stake: 0n,
          entryDate: '2025-08-11',
        })
      ).rejects.toThrow('Stake must be positive');

      expect(ctx.store.transactions).toBe(2); // season and player creation only
    });

    it('should reject an unknown player and write nothing', async () => {
      await expect(
        ctx.ledgerService.recordContribution({
          playerId: 'player-missing',
          seasonId: season.id,
          amount: 500n,
          entryDate: '2025-08-11',
        })
      ).rejects.toThrow(UnknownPlayerError);

      expect(ctx.store.rollbacks).toBe(1);
      expect(await ctx.ledgerService.countEntries()).toBe(0);
    });

    it('should reject an unknown season', async () => {
      await expect(
        ctx.ledgerService.recordContribution({
          playerId: player.id,
          seasonId: 'season-missing',
          amount: 500n,
          entryDate: '2025-08-11',
        })
      ).rejects.toThrow(UnknownSeasonError);
    });

    it('should reject an unknown bet', async () => {
      await expect(
        ctx.ledgerService.recordBetWon({
          playerId: player.id,
          seasonId: season.id,
          betId: 'bet-missing',
          winnings: 500n,
          entryDate: '2025-08-11',
        })
      ).rejects.toThrow(UnknownBetError);
    });

    it('should reject an unknown week', async () => {
      await expect(
        ctx.ledgerService.recordContribution({
          playerId: player.id,
          seasonId: season.id,
          weekId: 'week-missing',
          amount: 500n,
          entryDate: '2025-08-11',
        })
      ).rejects.toThrow(UnknownWeekError);
    });
  });

  describe('joining an outer transaction', () => {
    it('should roll back with the caller', async () => {
      await expect(
        ctx.store.runTransaction(async (client) => {
          await ctx.ledgerService.recordContribution(
            { playerId: player.id, seasonId: season.id, amount: 500n, entryDate: '2025-08-11' },
            client
          );
          throw new Error('later step failed');
        })
      ).rejects.toThrow('later step failed');

      expect(await ctx.ledgerService.countEntries()).toBe(0);
    });
  });

  describe('listEntries', () => {
    beforeEach(async () => {
      const common = { playerId: player.id, seasonId: season.id };
      await ctx.ledgerService.recordContribution({ ...common, amount: 500n, entryDate: '2025-08-11' });
      await ctx.ledgerService.recordPayout({ ...common, amount: 100n, entryDate: '2025-08-20' });
      await ctx.ledgerService.recordContribution({ ...common, amount: 700n, entryDate: '2025-08-18' });
      await ctx.ledgerService.recordBetWon({ ...common, winnings: 900n, entryDate: '2025-08-18' });
    });

    it('should order by entry date then creation time, newest first', async () => {
      const entries = await ctx.ledgerService.listEntries({ seasonId: season.id });

      expect(entries.map((entry) => entry.amount)).toEqual([-100n, 900n, 700n, 500n]);
    });

    it('should filter by kind', async () => {
      const entries = await ctx.ledgerService.listEntries({ kind: EntryKind.CONTRIBUTION });

      expect(entries.map((entry) => entry.amount)).toEqual([700n, 500n]);
      expect(
        await ctx.ledgerService.countEntries({ kind: [EntryKind.WINNINGS, EntryKind.PAYOUT] })
      ).toBe(2);
    });

    it('should page through the listing', async () => {
      const page = await ctx.ledgerService.listEntries({}, { limit: 2, offset: 1 });

      expect(page.map((entry) => entry.amount)).toEqual([900n, 700n]);
    });
  });

  describe('logging', () => {
    it('should log each appended entry', async () => {
      const entry = await ctx.ledgerService.recordPayout({
        playerId: player.id,
        seasonId: season.id,
        amount: 1050n,
        entryDate: '2025-08-20',
      });

      const logged = consoleLogSpy.mock.calls
        .map(([line]) => JSON.parse(String(line)))
        .find((line) => line.log_type === 'LEDGER_ENTRY');

      expect(logged).toMatchObject({
        level: 'INFO',
        entry_id: entry.id,
        kind: 'payout',
        amount: '-10.50',
        season_id: season.id,
        player_id: player.id,
      });
    });

    it('should not log an entry written in a transaction that rolls back', async () => {
      consoleLogSpy.mockClear();

      await expect(
        ctx.store.runTransaction(async (client) => {
          await ctx.ledgerService.recordPayout(
            { playerId: player.id, seasonId: season.id, amount: 1050n, entryDate: '2025-08-20' },
            client
          );
          throw new Error('Batch aborted');
        })
      ).rejects.toThrow('Batch aborted');

      expect(consoleLogSpy).not.toHaveBeenCalled();
      expect(await ctx.ledgerService.countEntries()).toBe(0);
    });

    it('should leave logging to the caller that owns the transaction', async () => {
      consoleLogSpy.mockClear();

      const entry = await ctx.store.runTransaction((client) =>
        ctx.ledgerService.recordContribution(
          { playerId: player.id, seasonId: season.id, amount: 500n, entryDate: '2025-08-11' },
          client
        )
      );
      expect(consoleLogSpy).not.toHaveBeenCalled();

      await ctx.ledgerService.reportCommitted([entry]);

      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0][0]))).toMatchObject({
        log_type: 'LEDGER_ENTRY',
        entry_id: entry.id,
        kind: 'contribution',
        amount: '5.00',
      });
    });
  });
});
