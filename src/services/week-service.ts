/**
 * Week Service
 *
 * Weekly betting rounds. A week runs seven days from its start date and
 * has exactly two assigned players.
 */

import { Queryable, TransactionRunner, transaction } from '../config/database';
import { WeekRepository } from '../repositories/week-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { Week, WeekAssignment } from '../models/week';
import {
  ConflictError,
  InvalidAssignmentError,
  UnknownPlayerError,
  UnknownSeasonError,
  UnknownWeekError,
  BadRequestError,
} from '../models/errors';
import { addDays } from '../utils/contribution-schedule';

const DAYS_PER_WEEK = 7;

export interface WeekWithAssignments {
  week: Week;
  assignments: WeekAssignment[];
}

export class WeekService {
  constructor(
    private weekRepository: WeekRepository,
    private seasonRepository: SeasonRepository,
    private playerRepository: PlayerRepository,
    private runTransaction: TransactionRunner = transaction
  ) {}

  /**
   * Create week `weekNumber` of a season, ending six days after it starts
   *
   * @throws ConflictError if the season already has that week number
   */
  async createWeek(
    seasonId: string,
    weekNumber: number,
    startDate: string,
    executor?: Queryable
  ): Promise<Week> {
    if (!Number.isInteger(weekNumber) || weekNumber < 1) {
      throw new BadRequestError('Week number must be a positive integer', {
        week_number: weekNumber,
      });
    }
    const endDate = addDays(startDate, DAYS_PER_WEEK - 1);

    return this.within(executor, async (client) => {
      const season = await this.seasonRepository.findById(seasonId, client);
      if (!season) {
        throw new UnknownSeasonError(seasonId);
      }

      const existing = await this.weekRepository.findBySeasonAndNumber(seasonId, weekNumber, client);
      if (existing) {
        throw new ConflictError(`Week ${weekNumber} already exists`, {
          season_id: seasonId,
          week_id: existing.id,
        });
      }

      return this.weekRepository.create(
        { season_id: seasonId, week_number: weekNumber, start_date: startDate, end_date: endDate },
        client
      );
    });
  }

  /**
   * Assign the week's two players, in order
   *
   * @throws InvalidAssignmentError if the players are the same or the week is already assigned
   */
  async assignPlayers(
    weekId: string,
    firstPlayerId: string,
    secondPlayerId: string,
    executor?: Queryable
  ): Promise<WeekAssignment[]> {
    if (firstPlayerId === secondPlayerId) {
      throw new InvalidAssignmentError('A week needs two different players', {
        week_id: weekId,
        player_id: firstPlayerId,
      });
    }

    return this.within(executor, async (client) => {
      const week = await this.weekRepository.findById(weekId, client);
      if (!week) {
        throw new UnknownWeekError(weekId);
      }

      for (const playerId of [firstPlayerId, secondPlayerId]) {
        const player = await this.playerRepository.findById(playerId, client);
        if (!player) {
          throw new UnknownPlayerError(playerId);
        }
      }

      const existing = await this.weekRepository.findAssignments(weekId, client);
      if (existing.length > 0) {
        throw new InvalidAssignmentError('Week already has its players assigned', {
          week_id: weekId,
        });
      }

      const first = await this.weekRepository.createAssignment(weekId, firstPlayerId, 1, client);
      const second = await this.weekRepository.createAssignment(weekId, secondPlayerId, 2, client);
      return [first, second];
    });
  }

  async getWeek(weekId: string): Promise<WeekWithAssignments> {
    const week = await this.weekRepository.findById(weekId);
    if (!week) {
      throw new UnknownWeekError(weekId);
    }
    const assignments = await this.weekRepository.findAssignments(weekId);
    return { week, assignments };
  }

  async listWeeks(seasonId: string): Promise<Week[]> {
    return this.weekRepository.findBySeason(seasonId);
  }

  private within<T>(
    executor: Queryable | undefined,
    work: (client: Queryable) => Promise<T>
  ): Promise<T> {
    return executor ? work(executor) : this.runTransaction(work);
  }
}
