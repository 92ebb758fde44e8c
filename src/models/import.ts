/**
 * Import Models
 *
 * Rows of the external transaction feed and the result of ingesting a batch.
 */

/**
 * One row of the transaction feed as read from CSV
 */
export interface TransactionFeedRow {
  date: string;                  // DD/MM/YYYY or YYYY-MM-DD
  player: string;                // Player name
  amount: string;                // Signed or unsigned decimal
  transaction: string;           // Label, see ImportLabel
}

/**
 * Recognised transaction labels (matched case-insensitively)
 */
export enum ImportLabel {
  PAID_IN = 'paid in',
  PLACED = 'placed',
  WON = 'won',
  VOID = 'void',
  PAID_OUT = 'paid out',
}

/**
 * One row of the week calendar feed
 */
export interface WeekCalendarRow {
  start_date: string;
  first_player: string;
  second_player: string;
}

export interface ImportCounts {
  contributions: number;
  bets_placed: number;
  winnings: number;
  voids: number;
  payouts: number;
}

export interface ImportSummary {
  batch_id: string;
  season_id: string;
  rows: number;
  counts: ImportCounts;
}
