/**
 * Ledger Service
 *
 * Single point of entry for every money movement. Each command takes a
 * positive magnitude, applies the sign for its entry kind and appends one
 * entry. There are no running-balance checks at write time: every balance
 * is derived later from the entries themselves.
 *
 * Commands run in their own transaction, or join the caller's when an
 * executor is passed (bet placement and bulk import do this). Entries are
 * logged only once their transaction has committed; a caller that passes an
 * executor reports its entries through `reportCommitted` after its own
 * transaction resolves.
 */

import { Queryable, TransactionRunner, transaction } from '../config/database';
import { LedgerRepository } from '../repositories/ledger-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { BetRepository } from '../repositories/bet-repository';
import { WeekRepository } from '../repositories/week-repository';
import {
  EntryKind,
  LedgerEntry,
  LedgerFilter,
  NewLedgerEntry,
  Pagination,
  signedAmount,
} from '../models/ledger-entry';
import {
  UnknownBetError,
  UnknownPlayerError,
  UnknownSeasonError,
  UnknownWeekError,
} from '../models/errors';
import { Money, formatMoney, requirePositive } from '../utils/money';
import { toDayNumber } from '../utils/contribution-schedule';
import { logLedgerEntry } from '../utils/logger';
import { emitLedgerWriteLatency } from '../utils/metrics';

/**
 * Fields shared by every writer command
 */
interface EntryCommand {
  playerId: string;
  seasonId: string;
  entryDate: string;
  weekId?: string;
  description?: string;
  createdBy?: string;
}

export interface ContributionCommand extends EntryCommand {
  amount: Money;
}

export interface BetPlacedCommand extends EntryCommand {
  betId: string;
  stake: Money;
}

/**
 * Imported history may record a win or void whose bet is unknown
 */
export interface BetWonCommand extends EntryCommand {
  betId?: string;
  winnings: Money;
}

export interface BetVoidCommand extends EntryCommand {
  betId?: string;
  stake: Money;
}

export interface PayoutCommand extends EntryCommand {
  amount: Money;
}

interface EntryDraft {
  kind: EntryKind;
  magnitude: Money;
  label: string;
  defaultDescription: string;
  betId?: string;
}

/**
 * Ledger Service
 * Validates and appends signed ledger entries
 */
export class LedgerService {
  constructor(
    private ledgerRepository: LedgerRepository,
    private playerRepository: PlayerRepository,
    private seasonRepository: SeasonRepository,
    private betRepository: BetRepository,
    private weekRepository: WeekRepository,
    private runTransaction: TransactionRunner = transaction
  ) {}

  /**
   * Record a player paying in
   *
   * @throws InvalidAmountError if the amount is not positive
   * @throws UnknownPlayerError / UnknownSeasonError / UnknownWeekError
   */
  async recordContribution(
    command: ContributionCommand,
    executor?: Queryable
  ): Promise<LedgerEntry> {
    return this.write(
      command,
      {
        kind: EntryKind.CONTRIBUTION,
        magnitude: command.amount,
        label: 'Contribution amount',
        defaultDescription: 'Weekly contribution',
      },
      executor
    );
  }

  /**
   * Record a stake leaving the bank, debited against the placing player
   */
  async recordBetPlaced(command: BetPlacedCommand, executor?: Queryable): Promise<LedgerEntry> {
    return this.write(
      command,
      {
        kind: EntryKind.BET_PLACED,
        magnitude: command.stake,
        label: 'Stake',
        defaultDescription: 'Bet placed',
        betId: command.betId,
      },
      executor
    );
  }

  /**
   * Credit the full return of a winning bet to the player who placed it.
   * The equal share is derived at read time, never fanned out here.
   */
  async recordBetWon(command: BetWonCommand, executor?: Queryable): Promise<LedgerEntry> {
    return this.write(
      command,
      {
        kind: EntryKind.WINNINGS,
        magnitude: command.winnings,
        label: 'Winnings',
        defaultDescription: 'Bet won',
        betId: command.betId,
      },
      executor
    );
  }

  /**
   * Return a voided stake, offsetting the earlier bet_placed entry
   */
  async recordBetVoid(command: BetVoidCommand, executor?: Queryable): Promise<LedgerEntry> {
    return this.write(
      command,
      {
        kind: EntryKind.BET_VOID,
        magnitude: command.stake,
        label: 'Stake',
        defaultDescription: 'Bet voided, stake returned',
        betId: command.betId,
      },
      executor
    );
  }

  async recordPayout(command: PayoutCommand, executor?: Queryable): Promise<LedgerEntry> {
    return this.write(
      command,
      {
        kind: EntryKind.PAYOUT,
        magnitude: command.amount,
        label: 'Payout amount',
        defaultDescription: 'Payout to player',
      },
      executor
    );
  }

  /**
   * Raw entry listing, newest first
   */
  async listEntries(
    filter: LedgerFilter = {},
    pagination: Pagination = {}
  ): Promise<LedgerEntry[]> {
    return this.ledgerRepository.findEntries(filter, pagination);
  }

  async countEntries(filter: LedgerFilter = {}): Promise<number> {
    return this.ledgerRepository.countEntries(filter);
  }

  private async write(
    command: EntryCommand,
    draft: EntryDraft,
    executor?: Queryable
  ): Promise<LedgerEntry> {
    // Input validation precedes any database access
    const magnitude = requirePositive(draft.magnitude, draft.label);
    toDayNumber(command.entryDate);

    const entry: NewLedgerEntry = {
      entry_date: command.entryDate,
      kind: draft.kind,
      player_id: command.playerId,
      season_id: command.seasonId,
      week_id: command.weekId,
      bet_id: draft.betId,
      amount: signedAmount(draft.kind, magnitude),
      description: command.description ?? draft.defaultDescription,
      created_by: command.createdBy,
    };

    if (executor) {
      return this.append(entry, executor);
    }

    const startTime = Date.now();
    const stored = await this.runTransaction((client) => this.append(entry, client));
    await this.reportCommitted([stored], Date.now() - startTime);
    return stored;
  }

  /**
   * Log entries whose transaction has committed
   *
   * @param latencyMs - Time from validation to commit; emitted as the write
   *   latency of each entry when given
   */
  async reportCommitted(entries: readonly LedgerEntry[], latencyMs?: number): Promise<void> {
    for (const stored of entries) {
      logLedgerEntry({
        entryId: stored.id,
        kind: stored.kind,
        amount: formatMoney(stored.amount),
        seasonId: stored.season_id,
        playerId: stored.player_id,
        betId: stored.bet_id,
        createdBy: stored.created_by,
      });
      if (latencyMs !== undefined) {
        await emitLedgerWriteLatency(stored.season_id, stored.kind, latencyMs);
      }
    }
  }

  private async append(entry: NewLedgerEntry, executor: Queryable): Promise<LedgerEntry> {
    await this.assertReferences(entry, executor);
    return this.ledgerRepository.insert(entry, executor);
  }

  private async assertReferences(entry: NewLedgerEntry, executor: Queryable): Promise<void> {
    const player = await this.playerRepository.findById(entry.player_id, executor);
    if (!player) {
      throw new UnknownPlayerError(entry.player_id);
    }

    const season = await this.seasonRepository.findById(entry.season_id, executor);
    if (!season) {
      throw new UnknownSeasonError(entry.season_id);
    }

    if (entry.bet_id !== undefined) {
      const bet = await this.betRepository.findById(entry.bet_id, executor);
      if (!bet) {
        throw new UnknownBetError(entry.bet_id);
      }
    }

    if (entry.week_id !== undefined) {
      const week = await this.weekRepository.findById(entry.week_id, executor);
      if (!week) {
        throw new UnknownWeekError(entry.week_id);
      }
    }
  }
}
