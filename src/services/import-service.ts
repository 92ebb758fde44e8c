/**
 * Import Service
 *
 * Bulk ingestion of the external transaction feed and week calendar.
 *
 * A batch is all-or-nothing: rows are validated up front, then written in
 * one transaction. Any failing row (bad amount, unknown player or label)
 * rolls back every entry already written for the batch and surfaces as an
 * ImportRowError, so a corrected file can be re-imported without duplicates.
 *
 * Label mapping:
 * - paid in  → contribution
 * - placed   → new pending bet + bet_placed
 * - won      → winnings, settling the player's latest pending bet from this batch
 * - void     → bet_void, settling the player's latest pending bet from this batch
 * - paid out → payout
 */

import { v4 as uuidv4 } from 'uuid';
import { Queryable, TransactionRunner, transaction } from '../config/database';
import { BetRepository } from '../repositories/bet-repository';
import { PlayerRepository } from '../repositories/player-repository';
import { SeasonRepository } from '../repositories/season-repository';
import { WeekRepository } from '../repositories/week-repository';
import { LedgerService } from './ledger-service';
import { WeekService } from './week-service';
import { Bet, BetStatus } from '../models/bet';
import { Player } from '../models/player';
import { LedgerEntry } from '../models/ledger-entry';
import {
  ImportCounts,
  ImportLabel,
  ImportSummary,
  TransactionFeedRow,
  WeekCalendarRow,
} from '../models/import';
import { ImportRowError, UnknownSeasonError } from '../models/errors';
import { Money } from '../utils/money';
import { toDayNumber } from '../utils/contribution-schedule';
import {
  parseFeedAmount,
  parseFeedDate,
  parseImportLabel,
  validateTransactionFeedRow,
  validateWeekCalendarRow,
} from '../utils/import-validation';
import { logImportBatch } from '../utils/logger';
import { MetricName, emitImportOutcome, measureDuration } from '../utils/metrics';

export const IMPORT_CREATOR = 'import';

/**
 * A feed row after validation, in ISO dates and positive pence
 */
interface ParsedTransaction {
  rowNumber: number;
  entryDate: string;
  playerName: string;
  amount: Money;
  label: ImportLabel;
}

interface WrittenBatch {
  counts: ImportCounts;
  entries: LedgerEntry[];
}

function emptyCounts(): ImportCounts {
  return { contributions: 0, bets_placed: 0, winnings: 0, voids: 0, payouts: 0 };
}

/**
 * Re-raise anything thrown while processing a row as that row's error
 */
async function atRow<T>(rowNumber: number, work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (error) {
    if (error instanceof ImportRowError) {
      throw error;
    }
    throw new ImportRowError(
      rowNumber,
      error instanceof Error ? error.message : 'Unknown error',
      error
    );
  }
}

/**
 * Import Service
 * Translates external feeds into ledger writes
 */
export class ImportService {
  constructor(
    private ledgerService: LedgerService,
    private weekService: WeekService,
    private betRepository: BetRepository,
    private playerRepository: PlayerRepository,
    private seasonRepository: SeasonRepository,
    private weekRepository: WeekRepository,
    private runTransaction: TransactionRunner = transaction,
    private generateBatchId: () => string = () => uuidv4()
  ) {}

  /**
   * Import a transaction feed into a season
   *
   * Rows are processed in date order; rows sharing a date keep feed order.
   *
   * @param seasonId - Season every entry is written to
   * @param rows - Feed rows; row numbers in errors are 1-based positions in this array
   * @returns Per-kind counts of what was written
   * @throws ImportRowError on the first failing row, after rolling back the batch
   * @throws UnknownSeasonError if the season does not exist
   */
  async importTransactions(
    seasonId: string,
    rows: readonly TransactionFeedRow[]
  ): Promise<ImportSummary> {
    const batchId = this.generateBatchId();

    try {
      const parsed = rows
        .map((row, index) => this.parseTransaction(row, index + 1))
        .sort((a, b) => toDayNumber(a.entryDate) - toDayNumber(b.entryDate));

      const { counts, entries } = await measureDuration(
        () => this.runTransaction((client) => this.writeTransactions(seasonId, parsed, client)),
        MetricName.IMPORT_BATCH_DURATION,
        { season_id: seasonId, operation_type: 'import' }
      );
      await this.ledgerService.reportCommitted(entries);

      logImportBatch({
        batchId,
        seasonId,
        success: true,
        rowsTotal: rows.length,
        counts: { ...counts },
      });
      await emitImportOutcome(seasonId, rows.length, true);

      return { batch_id: batchId, season_id: seasonId, rows: rows.length, counts };
    } catch (error) {
      logImportBatch({
        batchId,
        seasonId,
        success: false,
        rowsTotal: rows.length,
        failedRow: error instanceof ImportRowError ? error.rowNumber : undefined,
        errorMessage: error instanceof Error ? error.message : 'Unknown error',
      });
      await emitImportOutcome(seasonId, 0, false);
      throw error;
    }
  }

  /**
   * Import a week calendar: row n becomes week n with its two assigned players
   *
   * Existing weeks are reused and weeks that already have assignments are
   * left untouched, so re-running the same calendar is harmless.
   *
   * @returns Number of weeks processed
   */
  async importWeekAssignments(
    seasonId: string,
    rows: readonly WeekCalendarRow[]
  ): Promise<number> {
    const parsed = rows.map((row, index) => {
      const rowNumber = index + 1;
      const valid = validateWeekCalendarRow(row, rowNumber);
      return {
        rowNumber,
        startDate: parseFeedDate(valid.start_date, rowNumber),
        firstPlayer: valid.first_player.trim(),
        secondPlayer: valid.second_player.trim(),
      };
    });

    return this.runTransaction(async (client) => {
      await this.requireSeason(seasonId, client);
      const players = new Map<string, Player>();

      for (const row of parsed) {
        await atRow(row.rowNumber, async () => {
          const first = await this.resolvePlayer(row.firstPlayer, row.rowNumber, players, client);
          const second = await this.resolvePlayer(row.secondPlayer, row.rowNumber, players, client);

          const week =
            (await this.weekRepository.findBySeasonAndNumber(seasonId, row.rowNumber, client)) ??
            (await this.weekService.createWeek(seasonId, row.rowNumber, row.startDate, client));

          const assignments = await this.weekRepository.findAssignments(week.id, client);
          if (assignments.length === 0) {
            await this.weekService.assignPlayers(week.id, first.id, second.id, client);
          }
        });
      }

      return parsed.length;
    });
  }

  private parseTransaction(row: TransactionFeedRow, rowNumber: number): ParsedTransaction {
    const valid = validateTransactionFeedRow(row, rowNumber);
    return {
      rowNumber,
      entryDate: parseFeedDate(valid.date, rowNumber),
      playerName: valid.player.trim(),
      amount: parseFeedAmount(valid.amount, rowNumber),
      label: parseImportLabel(valid.transaction, rowNumber),
    };
  }

  private async writeTransactions(
    seasonId: string,
    rows: readonly ParsedTransaction[],
    client: Queryable
  ): Promise<WrittenBatch> {
    await this.requireSeason(seasonId, client);

    const counts = emptyCounts();
    const entries: LedgerEntry[] = [];
    const players = new Map<string, Player>();
    const pendingBets = new Map<string, Bet[]>();

    for (const row of rows) {
      await atRow(row.rowNumber, async () => {
        const player = await this.resolvePlayer(row.playerName, row.rowNumber, players, client);
        const common = {
          playerId: player.id,
          seasonId,
          entryDate: row.entryDate,
          createdBy: IMPORT_CREATOR,
        };

        switch (row.label) {
          case ImportLabel.PAID_IN:
            entries.push(
              await this.ledgerService.recordContribution(
                { ...common, amount: row.amount, description: 'Contribution' },
                client
              )
            );
            counts.contributions++;
            break;

          case ImportLabel.PLACED: {
            const bet = await this.betRepository.create(
              {
                placed_by_player_id: player.id,
                stake: row.amount,
                description: `Bet placed on ${row.entryDate}`,
                bet_date: row.entryDate,
                notes: 'Imported from CSV',
              },
              client
            );
            entries.push(
              await this.ledgerService.recordBetPlaced(
                { ...common, betId: bet.id, stake: row.amount },
                client
              )
            );
            pendingBets.set(player.id, [...(pendingBets.get(player.id) ?? []), bet]);
            counts.bets_placed++;
            break;
          }

          case ImportLabel.WON: {
            const bet = await this.settleLatestPending(
              pendingBets.get(player.id),
              BetStatus.WON,
              row,
              client
            );
            entries.push(
              await this.ledgerService.recordBetWon(
                { ...common, betId: bet?.id, winnings: row.amount },
                client
              )
            );
            counts.winnings++;
            break;
          }

          case ImportLabel.VOID: {
            const bet = await this.settleLatestPending(
              pendingBets.get(player.id),
              BetStatus.VOID,
              row,
              client
            );
            entries.push(
              await this.ledgerService.recordBetVoid(
                { ...common, betId: bet?.id, stake: row.amount },
                client
              )
            );
            counts.voids++;
            break;
          }

          case ImportLabel.PAID_OUT:
            entries.push(
              await this.ledgerService.recordPayout({ ...common, amount: row.amount }, client)
            );
            counts.payouts++;
            break;
        }
      });
    }

    return { counts, entries };
  }

  /**
   * Settle the most recent pending bet from this batch, if there is one
   */
  private async settleLatestPending(
    pending: Bet[] | undefined,
    status: BetStatus.WON | BetStatus.VOID,
    row: ParsedTransaction,
    client: Queryable
  ): Promise<Bet | undefined> {
    const bet = pending?.pop();
    if (!bet) {
      return undefined;
    }

    await this.betRepository.settle(
      bet.id,
      {
        status,
        result_date: row.entryDate,
        winnings: status === BetStatus.WON ? row.amount : undefined,
      },
      client
    );
    return bet;
  }

  private async resolvePlayer(
    name: string,
    rowNumber: number,
    cache: Map<string, Player>,
    client: Queryable
  ): Promise<Player> {
    const cached = cache.get(name);
    if (cached) {
      return cached;
    }

    const player = await this.playerRepository.findByName(name, client);
    if (!player) {
      throw new ImportRowError(rowNumber, `Unknown player "${name}"`);
    }
    cache.set(name, player);
    return player;
  }

  private async requireSeason(seasonId: string, client: Queryable): Promise<void> {
    const season = await this.seasonRepository.findById(seasonId, client);
    if (!season) {
      throw new UnknownSeasonError(seasonId);
    }
  }
}
