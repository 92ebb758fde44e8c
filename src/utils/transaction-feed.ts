/**
 * Transaction Feed Parsing
 *
 * Reads the two external CSV feeds into typed rows:
 * - transactions: header row "Date,Player,Amount,Transaction" (any order,
 *   any case, extra columns ignored)
 * - week calendar: "start_date,player1,player2" per line, header optional
 *
 * Row numbers count data rows from 1, skipping the header and blank lines.
 */

import { TransactionFeedRow, WeekCalendarRow } from '../models/import';
import { ImportRowError } from '../models/errors';
import { parseCsv } from './csv';
import { validateTransactionFeedRow, validateWeekCalendarRow } from './import-validation';

type FeedColumn = keyof TransactionFeedRow;

const DATE_LIKE = /^(\d{1,2}\/\d{1,2}\/\d{4}|\d{4}-\d{2}-\d{2})$/;

/**
 * Parse the transaction feed
 *
 * @throws ImportRowError for a missing column (row 0 is the header) or a
 * row that fails validation
 */
export function parseTransactionCsv(content: string): TransactionFeedRow[] {
  const [header, ...lines] = parseCsv(content);
  if (!header) {
    return [];
  }

  const normalisedHeader = header.map((name) => name.toLowerCase());
  const indexOf = (column: FeedColumn): number => {
    const index = normalisedHeader.indexOf(column);
    if (index === -1) {
      throw new ImportRowError(0, `Missing column "${column}" in header`);
    }
    return index;
  };

  const columnIndex: Record<FeedColumn, number> = {
    date: indexOf('date'),
    player: indexOf('player'),
    amount: indexOf('amount'),
    transaction: indexOf('transaction'),
  };

  return lines.map((values, index) => {
    const rowNumber = index + 1;
    if (values.length < header.length) {
      throw new ImportRowError(
        rowNumber,
        `Expected ${header.length} columns but found ${values.length}`
      );
    }

    return validateTransactionFeedRow(
      {
        date: values[columnIndex.date],
        player: values[columnIndex.player],
        amount: values[columnIndex.amount],
        transaction: values[columnIndex.transaction],
      },
      rowNumber
    );
  });
}

/**
 * Parse the week calendar; line n describes week n
 *
 * A first line whose first cell is not a date is taken as a header.
 *
 * @throws ImportRowError for a row with fewer than three columns or an invalid row
 */
export function parseWeekCalendarCsv(content: string): WeekCalendarRow[] {
  const lines = parseCsv(content);
  const dataLines = lines.length > 0 && !DATE_LIKE.test(lines[0][0]) ? lines.slice(1) : lines;

  return dataLines.map((values, index) => {
    const rowNumber = index + 1;
    if (values.length < 3) {
      throw new ImportRowError(rowNumber, `Expected 3 columns but found ${values.length}`);
    }

    return validateWeekCalendarRow(
      {
        start_date: values[0],
        first_player: values[1],
        second_player: values[2],
      },
      rowNumber
    );
  });
}
