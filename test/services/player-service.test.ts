/**
 * Player Service Tests
 *
 * Unit tests for players and season membership.
 */

import { createTestContext, TestContext } from '../support/in-memory-store';
import { Season } from '../../src/models/season';
import {
  BadRequestError,
  ConflictError,
  UnknownPlayerError,
  UnknownSeasonError,
} from '../../src/models/errors';

describe('PlayerService', () => {
  let ctx: TestContext;
  let season: Season;
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(async () => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    ctx = createTestContext('2025-08-20');
    season = await ctx.seasonService.createSeason({ name: 'Current', start_date: '2025-08-11' }, true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('createPlayer', () => {
    it('should create an active player with a trimmed name', async () => {
      const player = await ctx.playerService.createPlayer({
        name: '  Frankie ',
        contact: 'frankie@example.com',
      });

      expect(player.name).toBe('Frankie');
      expect(player.contact).toBe('frankie@example.com');
      expect(player.is_active).toBe(true);
      expect(await ctx.playerService.getActiveRoster(season.id)).toEqual([]);
    });

    it('should join the active season when asked', async () => {
      const player = await ctx.playerService.createPlayer({ name: 'Gita' }, true);

      const membership = await ctx.repositories.playerRepository.findMembership(
        player.id,
        season.id
      );
      expect(membership?.joined_date).toBe('2025-08-20');
      expect(membership?.is_active).toBe(true);
    });

    it('should reject a blank or duplicate name', async () => {
      await ctx.playerService.createPlayer({ name: 'Harri' });

      await expect(ctx.playerService.createPlayer({ name: ' ' })).rejects.toThrow(BadRequestError);
      await expect(ctx.playerService.createPlayer({ name: 'Harri ' })).rejects.toThrow(
        ConflictError
      );
      expect(await ctx.playerService.listPlayers()).toHaveLength(1);
    });

    it('should keep the player name out of the logs', async () => {
      await ctx.playerService.createPlayer({ name: 'Isla' });

      const lines = consoleLogSpy.mock.calls.map(([line]) => JSON.parse(String(line)));
      const created = lines.find((line) => line.message === 'Player created');
      expect(created.player_name).toBe('[PII_REDACTED]');
    });
  });

  describe('joinSeason', () => {
    it('should be idempotent', async () => {
      const player = await ctx.playerService.createPlayer({ name: 'Jude' });

      const first = await ctx.playerService.joinSeason(player.id, season.id, '2025-08-11');
      const second = await ctx.playerService.joinSeason(player.id, season.id, '2025-08-18');

      expect(second).toEqual(first);
      expect(second.joined_date).toBe('2025-08-11');
    });

    it('should reject unknown references', async () => {
      const player = await ctx.playerService.createPlayer({ name: 'Kai' });

      await expect(ctx.playerService.joinSeason('player-missing', season.id)).rejects.toThrow(
        UnknownPlayerError
      );
      await expect(ctx.playerService.joinSeason(player.id, 'season-missing')).rejects.toThrow(
        UnknownSeasonError
      );
    });
  });

  describe('toggleSeasonMembership', () => {
    it('should flip the membership flag and the roster with it', async () => {
      const player = await ctx.playerService.createPlayer({ name: 'Lou' }, true);

      const off = await ctx.playerService.toggleSeasonMembership(player.id, season.id);
      expect(off.is_active).toBe(false);
      expect(await ctx.playerService.getActiveRoster(season.id)).toEqual([]);

      const on = await ctx.playerService.toggleSeasonMembership(player.id, season.id);
      expect(on.is_active).toBe(true);
      expect((await ctx.playerService.getActiveRoster(season.id)).map((p) => p.name)).toEqual([
        'Lou',
      ]);
    });

    it('should reject a player who never joined', async () => {
      const player = await ctx.playerService.createPlayer({ name: 'Max' });

      await expect(
        ctx.playerService.toggleSeasonMembership(player.id, season.id)
      ).rejects.toThrow('Player is not a member of this season');
    });
  });

  describe('getPlayerById', () => {
    it('should throw for an unknown player', async () => {
      await expect(ctx.playerService.getPlayerById('player-missing')).rejects.toThrow(
        UnknownPlayerError
      );
    });
  });
});
