/**
 * Bet Service
 *
 * Business logic layer for bets. Placing a bet writes the pending bet and
 * its bet_placed entry in one transaction; settling writes the matching
 * winnings or bet_void entry (a lost bet needs none, its stake already left
 * the bank when it was placed).
 */

import { Queryable, TransactionRunner, transaction } from '../config/database';
import { BetRepository } from '../repositories/bet-repository';
import { LedgerRepository } from '../repositories/ledger-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { WeekRepository } from '../repositories/week-repository';
import { LedgerService } from './ledger-service';
import { isSeasonFrozen } from './season-service';
import {
  Bet,
  BetFilters,
  BetStatus,
  CreateBetParams,
  SettleBetParams,
  SettledBetStatus,
} from '../models/bet';
import { EntryKind, LedgerEntry } from '../models/ledger-entry';
import {
  BadRequestError,
  BetAlreadySettledError,
  SeasonFrozenError,
  UnknownBetError,
  UnknownPlayerError,
  UnknownSeasonError,
  UnknownWeekError,
} from '../models/errors';
import { Money, parseMoney, requirePositive } from '../utils/money';
import { toDayNumber, todayIsoDate } from '../utils/contribution-schedule';

const SETTLED_STATUSES: readonly SettledBetStatus[] = [
  BetStatus.WON,
  BetStatus.LOST,
  BetStatus.VOID,
];

export interface PlacedBet {
  bet: Bet;
  entry: LedgerEntry;
}

export interface SettledBet {
  bet: Bet;
  entry?: LedgerEntry;           // Absent for lost bets
}

export interface BetDetail {
  bet: Bet;
  entries: LedgerEntry[];
}

function isSettledStatus(value: string): value is SettledBetStatus {
  return SETTLED_STATUSES.some((status) => status === value);
}

/**
 * Bet Service
 * Provides business logic for placing and settling bets
 */
export class BetService {
  constructor(
    private betRepository: BetRepository,
    private ledgerRepository: LedgerRepository,
    private seasonRepository: SeasonRepository,
    private playerRepository: PlayerRepository,
    private weekRepository: WeekRepository,
    private ledgerService: LedgerService,
    private runTransaction: TransactionRunner = transaction,
    private today: () => string = () => todayIsoDate()
  ) {}

  /**
   * Place a bet on behalf of a player
   *
   * @throws InvalidAmountError if the stake is malformed or not positive
   * @throws UnknownSeasonError / UnknownPlayerError / UnknownWeekError for missing references
   * @throws SeasonFrozenError if the season's end date has passed
   */
  async placeBet(params: CreateBetParams): Promise<PlacedBet> {
    const stake = requirePositive(parseMoney(params.stake), 'Stake');
    const description = params.description.trim();
    if (!description) {
      throw new BadRequestError('Bet description is required');
    }
    toDayNumber(params.bet_date);

    const startTime = Date.now();
    const placed = await this.runTransaction(async (client): Promise<PlacedBet> => {
      const season = await this.seasonRepository.findById(params.season_id, client);
      if (!season) {
        throw new UnknownSeasonError(params.season_id);
      }
      if (isSeasonFrozen(season, this.today())) {
        throw new SeasonFrozenError(season.id, season.end_date ?? '');
      }

      // Both are foreign keys of the bet row
      const player = await this.playerRepository.findById(params.placed_by_player_id, client);
      if (!player) {
        throw new UnknownPlayerError(params.placed_by_player_id);
      }
      if (params.week_id !== undefined) {
        const week = await this.weekRepository.findById(params.week_id, client);
        if (!week) {
          throw new UnknownWeekError(params.week_id);
        }
      }

      const bet = await this.betRepository.create(
        {
          week_id: params.week_id,
          placed_by_player_id: params.placed_by_player_id,
          stake,
          description,
          odds: params.odds?.trim() || undefined,
          bet_date: params.bet_date,
          notes: params.notes,
        },
        client
      );

      const entry = await this.ledgerService.recordBetPlaced(
        {
          betId: bet.id,
          playerId: bet.placed_by_player_id,
          seasonId: season.id,
          weekId: bet.week_id,
          stake,
          entryDate: bet.bet_date,
          createdBy: params.created_by,
        },
        client
      );

      return { bet, entry };
    });

    await this.ledgerService.reportCommitted([placed.entry], Date.now() - startTime);
    return placed;
  }

  /**
   * Settle a pending bet as won, lost or void
   *
   * The entry is written to the season the bet was placed in.
   *
   * @throws BadRequestError for an unknown status, or a win without winnings
   * @throws UnknownBetError if the bet does not exist
   * @throws BetAlreadySettledError if the bet is no longer pending
   */
  async settleBet(betId: string, params: SettleBetParams): Promise<SettledBet> {
    if (!isSettledStatus(params.status)) {
      throw new BadRequestError(`Invalid bet status: ${params.status}`, { status: params.status });
    }
    toDayNumber(params.result_date);

    let winnings: Money | undefined;
    if (params.status === BetStatus.WON) {
      if (params.winnings === undefined) {
        throw new BadRequestError('Winnings are required for a won bet', { bet_id: betId });
      }
      winnings = requirePositive(parseMoney(params.winnings), 'Winnings');
    }

    const startTime = Date.now();
    const result = await this.runTransaction(async (client): Promise<SettledBet> => {
      const bet = await this.betRepository.findById(betId, client);
      if (!bet) {
        throw new UnknownBetError(betId);
      }
      if (bet.status !== BetStatus.PENDING) {
        throw new BetAlreadySettledError(betId, bet.status);
      }

      const seasonId = await this.placementSeasonId(bet, client);

      const settled = await this.betRepository.settle(
        betId,
        { status: params.status, result_date: params.result_date, winnings },
        client
      );
      if (!settled) {
        throw new BetAlreadySettledError(betId, 'settled');
      }

      const common = {
        betId: bet.id,
        playerId: bet.placed_by_player_id,
        seasonId,
        weekId: bet.week_id,
        entryDate: params.result_date,
        createdBy: params.created_by,
      };

      if (params.status === BetStatus.WON && winnings !== undefined) {
        const entry = await this.ledgerService.recordBetWon({ ...common, winnings }, client);
        return { bet: settled, entry };
      }

      if (params.status === BetStatus.VOID) {
        const entry = await this.ledgerService.recordBetVoid({ ...common, stake: bet.stake }, client);
        return { bet: settled, entry };
      }

      return { bet: settled };
    });

    if (result.entry) {
      await this.ledgerService.reportCommitted([result.entry], Date.now() - startTime);
    }
    return result;
  }

  /**
   * A bet together with every ledger entry referencing it
   */
  async getBet(betId: string): Promise<BetDetail> {
    const bet = await this.betRepository.findById(betId);
    if (!bet) {
      throw new UnknownBetError(betId);
    }

    const entries = await this.ledgerRepository.findEntries({ betId });
    return { bet, entries };
  }

  async listBets(filters: BetFilters = {}): Promise<Bet[]> {
    return this.betRepository.findAll(filters);
  }

  private async placementSeasonId(bet: Bet, client: Queryable): Promise<string> {
    const [placement] = await this.ledgerRepository.findEntries(
      { betId: bet.id, kind: EntryKind.BET_PLACED },
      { limit: 1 },
      client
    );
    if (placement) {
      return placement.season_id;
    }

    const active = await this.seasonRepository.findActive(client);
    if (!active) {
      throw new BadRequestError('No season to settle the bet in', { bet_id: bet.id });
    }
    return active.id;
  }
}
