/**
 * Season Service
 *
 * Business logic layer for season operations. Activation clears every
 * other season's flag and sets the chosen one inside a single transaction.
 */

import { TransactionRunner, transaction } from '../config/database';
import { SeasonRepository } from '../repositories/season-repository';
import { CreateSeasonParams, Season } from '../models/season';
import { BadRequestError, ConflictError, UnknownSeasonError } from '../models/errors';
import { toDayNumber, todayIsoDate } from '../utils/contribution-schedule';
import { log, LogLevel } from '../utils/logger';

/**
 * Whether the season's end date has passed (a season without one never freezes)
 */
export function isSeasonFrozen(season: Season, today: string = todayIsoDate()): boolean {
  if (!season.end_date) {
    return false;
  }
  return toDayNumber(today) > toDayNumber(season.end_date);
}

/**
 * Season Service
 * Provides business logic for season operations
 */
export class SeasonService {
  constructor(
    private seasonRepository: SeasonRepository,
    private runTransaction: TransactionRunner = transaction
  ) {}

  /**
   * Create a season, optionally making it the active one
   *
   * @throws BadRequestError if dates are invalid or the end precedes the start
   * @throws ConflictError if the name is taken
   */
  async createSeason(params: CreateSeasonParams, activate: boolean = false): Promise<Season> {
    const name = params.name.trim();
    if (!name) {
      throw new BadRequestError('Season name is required');
    }

    const start = toDayNumber(params.start_date);
    if (params.end_date !== undefined && toDayNumber(params.end_date) < start) {
      throw new BadRequestError('Season end date must not precede its start date', {
        start_date: params.start_date,
        end_date: params.end_date,
      });
    }

    const season = await this.runTransaction(async (client) => {
      const existing = await this.seasonRepository.findByName(name, client);
      if (existing) {
        throw new ConflictError(`Season already exists: ${name}`, { season_id: existing.id });
      }

      const created = await this.seasonRepository.create({ ...params, name }, client);
      if (!activate) {
        return created;
      }

      await this.seasonRepository.deactivateAll(client);
      return (await this.seasonRepository.activate(created.id, client)) ?? created;
    });

    log(LogLevel.INFO, 'Season created', { season_id: season.id, active: season.is_active });
    return season;
  }

  /**
   * Make one season the only active season
   *
   * @throws UnknownSeasonError if the season does not exist
   */
  async activateSeason(seasonId: string): Promise<Season> {
    const season = await this.runTransaction(async (client) => {
      const existing = await this.seasonRepository.findById(seasonId, client);
      if (!existing) {
        throw new UnknownSeasonError(seasonId);
      }

      await this.seasonRepository.deactivateAll(client);
      const activated = await this.seasonRepository.activate(seasonId, client);
      if (!activated) {
        throw new UnknownSeasonError(seasonId);
      }
      return activated;
    });

    log(LogLevel.INFO, 'Season activated', { season_id: season.id });
    return season;
  }

  async getActiveSeason(): Promise<Season | null> {
    return this.seasonRepository.findActive();
  }

  /**
   * @throws UnknownSeasonError if the season does not exist
   */
  async getSeasonById(seasonId: string): Promise<Season> {
    const season = await this.seasonRepository.findById(seasonId);
    if (!season) {
      throw new UnknownSeasonError(seasonId);
    }
    return season;
  }

  async getSeasonByName(name: string): Promise<Season | null> {
    return this.seasonRepository.findByName(name);
  }

  async listSeasons(): Promise<Season[]> {
    return this.seasonRepository.findAll();
  }
}
