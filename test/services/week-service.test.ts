/**
 * Week Service Tests
 */

import { createTestContext, TestContext } from '../support/in-memory-store';
import { Season } from '../../src/models/season';
import { Player } from '../../src/models/player';
import {
  ConflictError,
  InvalidAssignmentError,
  UnknownPlayerError,
  UnknownSeasonError,
  UnknownWeekError,
} from '../../src/models/errors';

describe('WeekService', () => {
  let ctx: TestContext;
  let season: Season;
  let nell: Player;
  let omar: Player;

  beforeEach(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);

    ctx = createTestContext();
    season = await ctx.seasonService.createSeason({ name: 'Rota', start_date: '2025-08-11' }, true);
    nell = await ctx.playerService.createPlayer({ name: 'Nell' }, true);
    omar = await ctx.playerService.createPlayer({ name: 'Omar' }, true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createWeek', () => {
    it('should span seven days from the start date', async () => {
      const week = await ctx.weekService.createWeek(season.id, 1, '2025-08-11');

      expect(week.week_number).toBe(1);
      expect(week.start_date).toBe('2025-08-11');
      expect(week.end_date).toBe('2025-08-17');
    });

    it('should cross month ends', async () => {
      const week = await ctx.weekService.createWeek(season.id, 4, '2025-08-29');

      expect(week.end_date).toBe('2025-09-04');
    });

    it('should reject a repeated week number', async () => {
      await ctx.weekService.createWeek(season.id, 1, '2025-08-11');

      await expect(ctx.weekService.createWeek(season.id, 1, '2025-08-18')).rejects.toThrow(
        new ConflictError('Week 1 already exists')
      );
    });

    it.each([0, -1, 1.5])('should reject week number %s', async (weekNumber) => {
      await expect(ctx.weekService.createWeek(season.id, weekNumber, '2025-08-11')).rejects.toThrow(
        'Week number must be a positive integer'
      );
    });

    it('should reject an unknown season', async () => {
      await expect(ctx.weekService.createWeek('season-missing', 1, '2025-08-11')).rejects.toThrow(
        UnknownSeasonError
      );
    });
  });

  describe('assignPlayers', () => {
    it('should assign two players in order', async () => {
      const week = await ctx.weekService.createWeek(season.id, 1, '2025-08-11');

      await ctx.weekService.assignPlayers(week.id, omar.id, nell.id);
      const detail = await ctx.weekService.getWeek(week.id);

      expect(detail.assignments.map((a) => [a.assignment_order, a.player_id])).toEqual([
        [1, omar.id],
        [2, nell.id],
      ]);
    });

    it('should reject the same player twice', async () => {
      const week = await ctx.weekService.createWeek(season.id, 1, '2025-08-11');

      await expect(ctx.weekService.assignPlayers(week.id, nell.id, nell.id)).rejects.toThrow(
        InvalidAssignmentError
      );
    });

    it('should reject a week that is already assigned', async () => {
      const week = await ctx.weekService.createWeek(season.id, 1, '2025-08-11');
      await ctx.weekService.assignPlayers(week.id, nell.id, omar.id);

      await expect(ctx.weekService.assignPlayers(week.id, omar.id, nell.id)).rejects.toThrow(
        'Week already has its players assigned'
      );
    });

    it('should write no assignment when a player is unknown', async () => {
      const week = await ctx.weekService.createWeek(season.id, 1, '2025-08-11');

      await expect(
        ctx.weekService.assignPlayers(week.id, nell.id, 'player-missing')
      ).rejects.toThrow(UnknownPlayerError);
      expect((await ctx.weekService.getWeek(week.id)).assignments).toEqual([]);
    });

    it('should reject an unknown week', async () => {
      await expect(ctx.weekService.assignPlayers('week-missing', nell.id, omar.id)).rejects.toThrow(
        UnknownWeekError
      );
    });
  });

  describe('listWeeks', () => {
    it('should list weeks in number order', async () => {
      await ctx.weekService.createWeek(season.id, 2, '2025-08-18');
      await ctx.weekService.createWeek(season.id, 1, '2025-08-11');

      const weeks = await ctx.weekService.listWeeks(season.id);
      expect(weeks.map((week) => week.week_number)).toEqual([1, 2]);
    });
  });
});
