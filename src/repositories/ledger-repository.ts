/**
 * Ledger Repository
 *
 * Data access layer for ledger entries. Entries are insert-only: this
 * repository exposes no update or delete. Reads are driven by a LedgerFilter
 * value that is composed into one deterministic WHERE predicate.
 */

import { db, Queryable } from '../config/database';
import {
  EntryKind,
  KindTotal,
  LedgerEntry,
  LedgerEntryRow,
  LedgerFilter,
  NewLedgerEntry,
  Pagination,
  PlayerKindTotal,
  mapLedgerEntryRow,
} from '../models/ledger-entry';
import { formatMoney, parseMoney } from '../utils/money';

export const DEFAULT_ENTRY_LIMIT = 100;

const ENTRY_COLUMNS = `
  id,
  entry_date,
  kind,
  player_id,
  season_id,
  week_id,
  bet_id,
  amount,
  description,
  created_at,
  created_by
`;

/**
 * Parameterized WHERE predicate
 */
export interface LedgerPredicate {
  clause: string;
  params: unknown[];
}

/**
 * Compose a filter into a WHERE predicate
 *
 * Fields are applied in a fixed order (season, player, kind, bet) so the same
 * filter always yields the same SQL text. An empty filter matches everything;
 * an empty kind list matches nothing.
 *
 * @param filter - Optional season/player/kind/bet restrictions
 * @param firstParamIndex - Placeholder number of the first parameter
 */
export function buildLedgerPredicate(
  filter: LedgerFilter,
  firstParamIndex: number = 1
): LedgerPredicate {
  const conditions: string[] = [];
  const params: unknown[] = [];

  const next = (value: unknown): string => {
    params.push(value);
    return `$${firstParamIndex + params.length - 1}`;
  };

  if (filter.seasonId !== undefined) {
    conditions.push(`season_id = ${next(filter.seasonId)}`);
  }

  if (filter.playerId !== undefined) {
    conditions.push(`player_id = ${next(filter.playerId)}`);
  }

  if (filter.kind !== undefined) {
    if (typeof filter.kind === 'string') {
      conditions.push(`kind = ${next(filter.kind)}`);
    } else if (filter.kind.length === 0) {
      conditions.push('FALSE');
    } else {
      conditions.push(`kind = ANY(${next([...filter.kind])})`);
    }
  }

  if (filter.betId !== undefined) {
    conditions.push(`bet_id = ${next(filter.betId)}`);
  }

  return {
    clause: conditions.length > 0 ? conditions.join(' AND ') : 'TRUE',
    params,
  };
}

interface KindTotalRow {
  kind: EntryKind;
  total: string;
  absolute_total: string;
}

interface PlayerKindTotalRow extends KindTotalRow {
  player_id: string;
}

/**
 * Ledger Repository
 * Append and aggregate access to ledger_entries
 */
export class LedgerRepository {
  /**
   * Append one entry
   *
   * The amount must already carry the sign for its kind; the schema rejects
   * a mismatch.
   *
   * @returns The stored entry with its generated id and timestamp
   */
  async insert(entry: NewLedgerEntry, executor: Queryable = db): Promise<LedgerEntry> {
    const sql = `
      INSERT INTO ledger_entries (
        entry_date,
        kind,
        player_id,
        season_id,
        week_id,
        bet_id,
        amount,
        description,
        created_by
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      RETURNING ${ENTRY_COLUMNS}
    `;

    const result = await executor.query<LedgerEntryRow>(sql, [
      entry.entry_date,
      entry.kind,
      entry.player_id,
      entry.season_id,
      entry.week_id ?? null,
      entry.bet_id ?? null,
      formatMoney(entry.amount),
      entry.description,
      entry.created_by ?? null,
    ]);

    return mapLedgerEntryRow(result.rows[0]);
  }

  /**
   * List entries newest first (entry date, then creation time)
   */
  async findEntries(
    filter: LedgerFilter,
    pagination: Pagination = {},
    executor: Queryable = db
  ): Promise<LedgerEntry[]> {
    const predicate = buildLedgerPredicate(filter);
    const limitIndex = predicate.params.length + 1;

    const sql = `
      SELECT ${ENTRY_COLUMNS}
      FROM ledger_entries
      WHERE ${predicate.clause}
      ORDER BY entry_date DESC, created_at DESC
      LIMIT $${limitIndex} OFFSET $${limitIndex + 1}
    `;

    const result = await executor.query<LedgerEntryRow>(sql, [
      ...predicate.params,
      pagination.limit ?? DEFAULT_ENTRY_LIMIT,
      pagination.offset ?? 0,
    ]);

    return result.rows.map(mapLedgerEntryRow);
  }

  async countEntries(filter: LedgerFilter, executor: Queryable = db): Promise<number> {
    const predicate = buildLedgerPredicate(filter);

    const result = await executor.query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM ledger_entries WHERE ${predicate.clause}`,
      predicate.params
    );

    return Number(result.rows[0].count);
  }

  /**
   * Signed and absolute sums per kind within the filter
   *
   * Kinds with no matching entries are absent from the result.
   */
  async sumByKind(filter: LedgerFilter, executor: Queryable = db): Promise<KindTotal[]> {
    const predicate = buildLedgerPredicate(filter);

    const sql = `
      SELECT
        kind,
        SUM(amount) AS total,
        SUM(ABS(amount)) AS absolute_total
      FROM ledger_entries
      WHERE ${predicate.clause}
      GROUP BY kind
      ORDER BY kind ASC
    `;

    const result = await executor.query<KindTotalRow>(sql, predicate.params);

    return result.rows.map((row) => ({
      kind: row.kind,
      total: parseMoney(row.total),
      absolute_total: parseMoney(row.absolute_total),
    }));
  }

  /**
   * Same as sumByKind, grouped by player as well
   */
  async sumByPlayerAndKind(
    filter: LedgerFilter,
    executor: Queryable = db
  ): Promise<PlayerKindTotal[]> {
    const predicate = buildLedgerPredicate(filter);

    const sql = `
      SELECT
        player_id,
        kind,
        SUM(amount) AS total,
        SUM(ABS(amount)) AS absolute_total
      FROM ledger_entries
      WHERE ${predicate.clause}
      GROUP BY player_id, kind
      ORDER BY player_id ASC, kind ASC
    `;

    const result = await executor.query<PlayerKindTotalRow>(sql, predicate.params);

    return result.rows.map((row) => ({
      player_id: row.player_id,
      kind: row.kind,
      total: parseMoney(row.total),
      absolute_total: parseMoney(row.absolute_total),
    }));
  }
}
