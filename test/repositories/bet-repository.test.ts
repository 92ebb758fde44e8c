/**
 * Bet Repository Tests
 */

import { BetRepository, DEFAULT_BET_LIMIT } from '../../src/repositories/bet-repository';
import { BetRow, BetStatus } from '../../src/models/bet';
import { fakeExecutor } from '../support/fake-executor';

describe('BetRepository', () => {
  let repository: BetRepository;

  const betRow: BetRow = {
    id: 'bet-1',
    week_id: null,
    placed_by_player_id: 'player-1',
    stake: '10.00',
    description: 'Treble',
    odds: '5/1',
    bet_date: '2025-08-12',
    status: BetStatus.PENDING,
    result_date: null,
    winnings: null,
    notes: null,
    created_at: new Date('2025-08-12T09:00:00Z'),
  };

  beforeEach(() => {
    repository = new BetRepository();
  });

  describe('create', () => {
    it('should insert a pending bet with the stake as a decimal string', async () => {
      const fake = fakeExecutor([betRow]);

      const bet = await repository.create(
        {
          placed_by_player_id: 'player-1',
          stake: 1000n,
          description: 'Treble',
          odds: '5/1',
          bet_date: '2025-08-12',
        },
        fake.executor
      );

      expect(fake.params()).toEqual([
        null,
        'player-1',
        '10.00',
        'Treble',
        '5/1',
        '2025-08-12',
        'pending',
        null,
      ]);
      expect(bet.stake).toBe(1000n);
      expect(bet.winnings).toBeUndefined();
    });
  });

  describe('findAll', () => {
    it('should combine filters and append the limit', async () => {
      const fake = fakeExecutor([betRow]);

      await repository.findAll(
        { status: BetStatus.PENDING, playerId: 'player-1', limit: 5 },
        fake.executor
      );

      expect(fake.sql()).toContain(
        'WHERE status = $1 AND placed_by_player_id = $2 ORDER BY bet_date DESC, created_at DESC LIMIT $3'
      );
      expect(fake.params()).toEqual(['pending', 'player-1', 5]);
    });

    it('should omit the WHERE clause without filters', async () => {
      const fake = fakeExecutor([]);

      await repository.findAll({}, fake.executor);

      expect(fake.sql()).not.toContain('WHERE');
      expect(fake.params()).toEqual([DEFAULT_BET_LIMIT]);
    });
  });

  describe('settle', () => {
    it('should only update a pending bet', async () => {
      const fake = fakeExecutor([
        { ...betRow, status: BetStatus.WON, result_date: '2025-08-15', winnings: '60.00' },
      ]);

      const bet = await repository.settle(
        'bet-1',
        { status: BetStatus.WON, result_date: '2025-08-15', winnings: 6000n },
        fake.executor
      );

      expect(fake.sql()).toContain('WHERE id = $1 AND status = $5');
      expect(fake.params()).toEqual(['bet-1', 'won', '2025-08-15', '60.00', 'pending']);
      expect(bet?.winnings).toBe(6000n);
    });

    it('should return null when the bet was no longer pending', async () => {
      const fake = fakeExecutor([]);

      const bet = await repository.settle(
        'bet-1',
        { status: BetStatus.LOST, result_date: '2025-08-15' },
        fake.executor
      );

      expect(bet).toBeNull();
      expect(fake.params()).toEqual(['bet-1', 'lost', '2025-08-15', null, 'pending']);
    });
  });
});
