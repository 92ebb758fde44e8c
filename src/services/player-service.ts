/**
 * Player Service
 *
 * Business logic layer for players and season membership.
 */

import { Queryable, TransactionRunner, transaction } from '../config/database';
import { PlayerRepository } from '../repositories/player-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { CreatePlayerParams, Player, PlayerSeason } from '../models/player';
import {
  BadRequestError,
  ConflictError,
  UnknownPlayerError,
  UnknownSeasonError,
} from '../models/errors';
import { toDayNumber, todayIsoDate } from '../utils/contribution-schedule';
import { log, LogLevel } from '../utils/logger';

/**
 * Player Service
 * Provides business logic for players and the season roster
 */
export class PlayerService {
  constructor(
    private playerRepository: PlayerRepository,
    private seasonRepository: SeasonRepository,
    private runTransaction: TransactionRunner = transaction,
    private today: () => string = () => todayIsoDate()
  ) {}

  /**
   * Create a player and, when requested, join them to the active season
   *
   * @throws BadRequestError if the name is blank
   * @throws ConflictError if the name is taken
   */
  async createPlayer(params: CreatePlayerParams, joinActiveSeason: boolean = false): Promise<Player> {
    const name = params.name.trim();
    if (!name) {
      throw new BadRequestError('Player name is required');
    }

    const player = await this.runTransaction(async (client) => {
      const existing = await this.playerRepository.findByName(name, client);
      if (existing) {
        throw new ConflictError(`Player already exists: ${name}`, { player_id: existing.id });
      }

      const created = await this.playerRepository.create(
        { name, contact: params.contact?.trim() || undefined },
        client
      );

      if (joinActiveSeason) {
        const season = await this.seasonRepository.findActive(client);
        if (season) {
          await this.playerRepository.createMembership(created.id, season.id, this.today(), client);
        }
      }

      return created;
    });

    log(LogLevel.INFO, 'Player created', { player_id: player.id, player_name: player.name });
    return player;
  }

  async getPlayerById(playerId: string): Promise<Player> {
    const player = await this.playerRepository.findById(playerId);
    if (!player) {
      throw new UnknownPlayerError(playerId);
    }
    return player;
  }

  async listPlayers(): Promise<Player[]> {
    return this.playerRepository.findAll();
  }

  /**
   * Add a player to a season
   *
   * Joining again returns the existing membership unchanged.
   */
  async joinSeason(playerId: string, seasonId: string, joinedDate?: string): Promise<PlayerSeason> {
    const date = joinedDate ?? this.today();
    toDayNumber(date);

    return this.runTransaction(async (client) => {
      await this.requireReferences(playerId, seasonId, client);

      const existing = await this.playerRepository.findMembership(playerId, seasonId, client);
      if (existing) {
        return existing;
      }
      return this.playerRepository.createMembership(playerId, seasonId, date, client);
    });
  }

  /**
   * Flip a player's active flag within one season
   *
   * @throws BadRequestError if the player never joined the season
   */
  async toggleSeasonMembership(playerId: string, seasonId: string): Promise<PlayerSeason> {
    const membership = await this.runTransaction(async (client) => {
      await this.requireReferences(playerId, seasonId, client);

      const existing = await this.playerRepository.findMembership(playerId, seasonId, client);
      if (!existing) {
        throw new BadRequestError('Player is not a member of this season', {
          player_id: playerId,
          season_id: seasonId,
        });
      }

      const updated = await this.playerRepository.setMembershipActive(
        playerId,
        seasonId,
        !existing.is_active,
        client
      );
      return updated ?? existing;
    });

    log(LogLevel.INFO, 'Season membership toggled', {
      player_id: playerId,
      season_id: seasonId,
      is_active: membership.is_active,
    });
    return membership;
  }

  /**
   * Players counted in every season-scoped calculation
   */
  async getActiveRoster(seasonId: string): Promise<Player[]> {
    return this.playerRepository.findActiveInSeason(seasonId);
  }

  private async requireReferences(
    playerId: string,
    seasonId: string,
    client: Queryable
  ): Promise<void> {
    const player = await this.playerRepository.findById(playerId, client);
    if (!player) {
      throw new UnknownPlayerError(playerId);
    }
    const season = await this.seasonRepository.findById(seasonId, client);
    if (!season) {
      throw new UnknownSeasonError(seasonId);
    }
  }
}
