/**
 * Transaction Import Runner
 *
 * Imports a transaction feed CSV into a season.
 *
 * Usage:
 *   ts-node src/scripts/run-import.ts <feed.csv> <season-name> [season-start] [options]
 *
 * Options:
 *   --register-players   Create players named in the feed and join them to the season
 *   --calendar <file>    Also import a week calendar CSV (start_date,player1,player2)
 *
 * The season is created and activated when it does not exist yet, which
 * requires season-start (YYYY-MM-DD).
 *
 * Each step commits on its own: season, player registration, the feed (one
 * all-or-nothing batch), then the calendar. On failure the steps that had
 * already committed are listed.
 */

import { readFileSync } from 'fs';
import { closePool } from '../config/database';
import { getServices } from '../services';
import { Season } from '../models/season';
import { ImportSummary } from '../models/import';
import { toErrorResponse } from '../models/errors';
import { parseTransactionCsv, parseWeekCalendarCsv } from '../utils/transaction-feed';

interface ImportArguments {
  feedPath: string;
  seasonName: string;
  seasonStart?: string;
  registerPlayers: boolean;
  calendarPath?: string;
}

interface ImportResult {
  success: boolean;
  message: string;
  summary?: ImportSummary;
  weeksImported?: number;
  error?: string;
}

export function parseArguments(argv: readonly string[]): ImportArguments {
  const positional: string[] = [];
  let registerPlayers = false;
  let calendarPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--register-players') {
      registerPlayers = true;
    } else if (arg === '--calendar') {
      calendarPath = argv[++i];
      if (!calendarPath) {
        throw new Error('--calendar needs a file path');
      }
    } else {
      positional.push(arg);
    }
  }

  const [feedPath, seasonName, seasonStart] = positional;
  if (!feedPath || !seasonName) {
    throw new Error('Usage: run-import <feed.csv> <season-name> [season-start] [--register-players] [--calendar <file>]');
  }

  return { feedPath, seasonName, seasonStart, registerPlayers, calendarPath };
}

async function resolveSeason(
  name: string,
  start?: string
): Promise<{ season: Season; created: boolean }> {
  const { seasonService } = getServices();

  const existing = await seasonService.getSeasonByName(name);
  if (existing) {
    return { season: existing, created: false };
  }
  if (!start) {
    throw new Error(`Season "${name}" does not exist; pass its start date to create it`);
  }

  console.log(`Creating season '${name}' starting ${start}...`);
  const season = await seasonService.createSeason({ name, start_date: start }, true);
  return { season, created: true };
}

async function registerPlayers(names: readonly string[], season: Season): Promise<void> {
  const { playerService } = getServices();
  const known = new Map((await playerService.listPlayers()).map((player) => [player.name, player]));

  for (const name of names) {
    const player = known.get(name) ?? (await playerService.createPlayer({ name }));
    await playerService.joinSeason(player.id, season.id, season.start_date);
  }
  console.log(`✓ Registered ${names.length} players in '${season.name}'`);
}

/**
 * Run the import described by the command line
 */
export async function runImport(argv: readonly string[]): Promise<ImportResult> {
  const committed: string[] = [];

  try {
    const args = parseArguments(argv);
    const rows = parseTransactionCsv(readFileSync(args.feedPath, 'utf-8'));
    const calendar = args.calendarPath
      ? parseWeekCalendarCsv(readFileSync(args.calendarPath, 'utf-8'))
      : undefined;
    console.log(`Read ${rows.length} transactions from ${args.feedPath}`);

    const { season, created } = await resolveSeason(args.seasonName, args.seasonStart);
    if (created) {
      committed.push(`season '${season.name}' created`);
    }

    if (args.registerPlayers) {
      const names = [...new Set(rows.map((row) => row.player.trim()))].sort();
      await registerPlayers(names, season);
      committed.push(`player registrations: ${names.length}`);
    }

    const { importService } = getServices();

    const summary = await importService.importTransactions(season.id, rows);
    committed.push(`transactions imported: ${summary.rows}`);

    console.log(`✓ Contributions imported: ${summary.counts.contributions}`);
    console.log(`✓ Bets placed imported: ${summary.counts.bets_placed}`);
    console.log(`✓ Winnings imported: ${summary.counts.winnings}`);
    console.log(`✓ Voids imported: ${summary.counts.voids}`);
    console.log(`✓ Payouts imported: ${summary.counts.payouts}`);

    let weeksImported: number | undefined;
    if (calendar) {
      weeksImported = await importService.importWeekAssignments(season.id, calendar);
      console.log(`✓ Imported ${weeksImported} weeks with assignments`);
    }

    return {
      success: true,
      message: 'Import completed successfully',
      summary,
      weeksImported,
    };
  } catch (error) {
    const { code } = toErrorResponse(error);
    const message = error instanceof Error ? error.message : 'Unknown error';
    console.error(`❌ Import failed (${code}): ${message}`);
    console.error(
      committed.length > 0
        ? `   Already committed: ${committed.join(', ')}`
        : '   Nothing was written'
    );
    return {
      success: false,
      message: 'Import failed',
      error: message,
    };
  } finally {
    await closePool();
  }
}

// Allow running directly with ts-node
if (require.main === module) {
  runImport(process.argv.slice(2))
    .then((result) => {
      process.exit(result.success ? 0 : 1);
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error);
      process.exit(1);
    });
}
