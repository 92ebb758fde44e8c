/**
 * Bet Service Tests
 *
 * Placement and settlement of bets, and the ledger entries they write.
 */

import { createTestContext, TestContext } from '../support/in-memory-store';
import { BetStatus } from '../../src/models/bet';
import { EntryKind } from '../../src/models/ledger-entry';
import { Season } from '../../src/models/season';
import { Player } from '../../src/models/player';
import {
  BadRequestError,
  BetAlreadySettledError,
  InvalidAmountError,
  SeasonFrozenError,
  UnknownBetError,
  UnknownPlayerError,
  UnknownSeasonError,
  UnknownWeekError,
} from '../../src/models/errors';

describe('BetService', () => {
  let ctx: TestContext;
  let season: Season;
  let player: Player;

  function placeTenner(overrides: { bet_date?: string; season_id?: string } = {}) {
    return ctx.betService.placeBet({
      placed_by_player_id: player.id,
      season_id: overrides.season_id ?? season.id,
      stake: '10.00',
      description: 'Grand National each way',
      odds: ' evens ',
      bet_date: overrides.bet_date ?? '2025-08-12',
    });
  }

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    ctx = createTestContext('2025-08-18');
    season = await ctx.seasonService.createSeason(
      { name: 'Autumn', start_date: '2025-08-11', end_date: '2025-12-31' },
      true
    );
    player = await ctx.playerService.createPlayer({ name: 'Evan' }, true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('placeBet', () => {
    it('should create a pending bet and debit the stake', async () => {
      const { bet, entry } = await placeTenner();

      expect(bet.status).toBe(BetStatus.PENDING);
      expect(bet.stake).toBe(1000n);
      expect(bet.odds).toBe('evens');
      expect(entry).toMatchObject({
        kind: EntryKind.BET_PLACED,
        amount: -1000n,
        bet_id: bet.id,
        player_id: player.id,
        season_id: season.id,
        entry_date: '2025-08-12',
      });
    });

    it('should write the bet and its entry in one transaction', async () => {
      const before = ctx.store.transactions;
      await placeTenner();

      expect(ctx.store.transactions).toBe(before + 1);
    });

    it.each(['0', '-5.00', 'ten', '1.234'])('should reject a stake of "%s"', async (stake) => {
      await expect(
        ctx.betService.placeBet({
          placed_by_player_id: player.id,
          season_id: season.id,
          stake,
          description: 'Bad stake',
          bet_date: '2025-08-12',
        })
      ).rejects.toThrow(InvalidAmountError);

      expect(await ctx.betService.listBets()).toHaveLength(0);
    });

    it('should require a description', async () => {
      await expect(
        ctx.betService.placeBet({
          placed_by_player_id: player.id,
          season_id: season.id,
          stake: '2.00',
          description: '   ',
          bet_date: '2025-08-12',
        })
      ).rejects.toThrow(new BadRequestError('Bet description is required'));
    });

    it('should refuse bets once the season has ended', async () => {
      ctx.setToday('2026-01-01');

      await expect(placeTenner()).rejects.toThrow(SeasonFrozenError);
      await expect(placeTenner()).rejects.toThrow('Season ended on 2025-12-31');
    });

    it('should accept bets on the season end date', async () => {
      ctx.setToday('2025-12-31');

      await expect(placeTenner()).resolves.toHaveProperty('bet.status', BetStatus.PENDING);
    });

    it('should reject an unknown season', async () => {
      await expect(placeTenner({ season_id: 'season-missing' })).rejects.toThrow(
        UnknownSeasonError
      );
    });

    it('should roll back the bet when the player is unknown', async () => {
      await expect(
        ctx.betService.placeBet({
          placed_by_player_id: 'player-missing',
          season_id: season.id,
          stake: '3.00',
          description: 'Orphan',
          bet_date: '2025-08-12',
        })
      ).rejects.toThrow(UnknownPlayerError);

      expect(await ctx.betService.listBets()).toHaveLength(0);
      expect(await ctx.ledgerService.countEntries()).toBe(0);
    });

    it('should check the player before inserting the bet row', async () => {
      const createSpy = jest.spyOn(ctx.repositories.betRepository, 'create');

      await expect(
        ctx.betService.placeBet({
          placed_by_player_id: 'player-missing',
          season_id: season.id,
          stake: '3.00',
          description: 'Orphan',
          bet_date: '2025-08-12',
        })
      ).rejects.toThrow(new UnknownPlayerError('player-missing'));

      expect(createSpy).not.toHaveBeenCalled();
    });

    it('should reject an unknown week before inserting the bet row', async () => {
      const createSpy = jest.spyOn(ctx.repositories.betRepository, 'create');

      await expect(
        ctx.betService.placeBet({
          placed_by_player_id: player.id,
          season_id: season.id,
          week_id: 'week-missing',
          stake: '3.00',
          description: 'Acca',
          bet_date: '2025-08-12',
        })
      ).rejects.toThrow(UnknownWeekError);

      expect(createSpy).not.toHaveBeenCalled();
      expect(await ctx.ledgerService.countEntries()).toBe(0);
    });

    it('should attach the bet to a known week', async () => {
      const week = await ctx.weekService.createWeek(season.id, 1, '2025-08-11');

      const { bet, entry } = await ctx.betService.placeBet({
        placed_by_player_id: player.id,
        season_id: season.id,
        week_id: week.id,
        stake: '3.00',
        description: 'Acca',
        bet_date: '2025-08-12',
      });

      expect(bet.week_id).toBe(week.id);
      expect(entry.week_id).toBe(week.id);
    });
  });

  describe('settleBet', () => {
    it('should credit the full return of a won bet to the placing player', async () => {
      const { bet } = await placeTenner();

      const settled = await ctx.betService.settleBet(bet.id, {
        status: BetStatus.WON,
        result_date: '2025-08-16',
        winnings: '55.50',
      });

      expect(settled.bet.status).toBe(BetStatus.WON);
      expect(settled.bet.winnings).toBe(5550n);
      expect(settled.bet.result_date).toBe('2025-08-16');
      expect(settled.entry).toMatchObject({
        kind: EntryKind.WINNINGS,
        amount: 5550n,
        player_id: player.id,
        bet_id: bet.id,
        entry_date: '2025-08-16',
      });
    });

    it('should return the stake of a voided bet', async () => {
      const { bet } = await placeTenner();

      const settled = await ctx.betService.settleBet(bet.id, {
        status: BetStatus.VOID,
        result_date: '2025-08-13',
      });

      expect(settled.entry?.kind).toBe(EntryKind.BET_VOID);
      expect(settled.entry?.amount).toBe(1000n);
    });

    it('should write no entry for a lost bet', async () => {
      const { bet } = await placeTenner();

      const settled = await ctx.betService.settleBet(bet.id, {
        status: BetStatus.LOST,
        result_date: '2025-08-13',
      });

      expect(settled.bet.status).toBe(BetStatus.LOST);
      expect(settled.entry).toBeUndefined();
      expect(await ctx.ledgerService.countEntries({ betId: bet.id })).toBe(1);
    });

    it('should settle into the season the bet was placed in', async () => {
      const { bet } = await placeTenner();
      const next = await ctx.seasonService.createSeason({ name: 'Winter', start_date: '2026-01-05' });
      await ctx.seasonService.activateSeason(next.id);

      const settled = await ctx.betService.settleBet(bet.id, {
        status: BetStatus.VOID,
        result_date: '2026-01-06',
      });

      expect(settled.entry?.season_id).toBe(season.id);
    });

    it('should require winnings for a won bet', async () => {
      const { bet } = await placeTenner();

      await expect(
        ctx.betService.settleBet(bet.id, { status: BetStatus.WON, result_date: '2025-08-16' })
      ).rejects.toThrow('Winnings are required for a won bet');
    });

    it('should reject non-positive winnings', async () => {
      const { bet } = await placeTenner();

      await expect(
        ctx.betService.settleBet(bet.id, {
          status: BetStatus.WON,
          result_date: '2025-08-16',
          winnings: '0.00',
        })
      ).rejects.toThrow(new InvalidAmountError('Winnings must be positive'));
    });

    it('should refuse to settle a bet twice', async () => {
      const { bet } = await placeTenner();
      await ctx.betService.settleBet(bet.id, { status: BetStatus.LOST, result_date: '2025-08-13' });

      await expect(
        ctx.betService.settleBet(bet.id, { status: BetStatus.VOID, result_date: '2025-08-14' })
      ).rejects.toThrow(BetAlreadySettledError);
      expect(await ctx.ledgerService.countEntries({ betId: bet.id })).toBe(1);
    });

    it('should reject an unknown bet', async () => {
      await expect(
        ctx.betService.settleBet('bet-missing', { status: BetStatus.LOST, result_date: '2025-08-13' })
      ).rejects.toThrow(UnknownBetError);
    });
  });

  describe('getBet', () => {
    it('should return the bet with every entry that references it', async () => {
      const { bet } = await placeTenner();
      await ctx.betService.settleBet(bet.id, {
        status: BetStatus.WON,
        result_date: '2025-08-16',
        winnings: '20.00',
      });

      const detail = await ctx.betService.getBet(bet.id);

      expect(detail.bet.status).toBe(BetStatus.WON);
      expect(detail.entries.map((entry) => entry.kind)).toEqual([
        EntryKind.WINNINGS,
        EntryKind.BET_PLACED,
      ]);
    });

    it('should throw for an unknown bet', async () => {
      await expect(ctx.betService.getBet('bet-missing')).rejects.toThrow(UnknownBetError);
    });
  });

  describe('listBets', () => {
    it('should filter by status, newest first', async () => {
      const first = await placeTenner({ bet_date: '2025-08-12' });
      await placeTenner({ bet_date: '2025-08-14' });
      await placeTenner({ bet_date: '2025-08-13' });
      await ctx.betService.settleBet(first.bet.id, {
        status: BetStatus.LOST,
        result_date: '2025-08-15',
      });

      const pending = await ctx.betService.listBets({ status: BetStatus.PENDING });

      expect(pending.map((bet) => bet.bet_date)).toEqual(['2025-08-14', '2025-08-13']);
      expect(await ctx.betService.listBets({ playerId: player.id, limit: 1 })).toHaveLength(1);
    });
  });
});
