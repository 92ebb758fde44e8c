/**
 * Ledger Schema Migration (V001)
 *
 * Creates the syndicate schema.
 *
 * Tables created:
 * - seasons: Time windows grouping all activity (at most one active)
 * - players: Syndicate members
 * - player_seasons: Season membership with its own active flag
 * - weeks: Weekly rounds within a season
 * - week_assignments: Two players per week
 * - bets: Bet metadata (no balances)
 * - ledger_entries: Insert-only signed money movements
 */

import { MigrationBuilder, ColumnDefinitions } from 'node-pg-migrate';

export const shorthands: ColumnDefinitions | undefined = undefined;

export async function up(pgm: MigrationBuilder): Promise<void> {
  pgm.createExtension('uuid-ossp', { ifNotExists: true });

  pgm.createTable('seasons', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    name: {
      type: 'varchar(100)',
      notNull: true,
      unique: true,
    },
    start_date: {
      type: 'date',
      notNull: true,
    },
    end_date: {
      type: 'date',
    },
    is_active: {
      type: 'boolean',
      notNull: true,
      default: false,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.addConstraint('seasons', 'ck_seasons_dates', {
    check: 'end_date IS NULL OR end_date >= start_date',
  });

  // At most one active season
  pgm.createIndex('seasons', 'is_active', {
    name: 'uq_seasons_single_active',
    unique: true,
    where: 'is_active',
  });

  pgm.createTable('players', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    name: {
      type: 'varchar(100)',
      notNull: true,
      unique: true,
    },
    contact: {
      type: 'varchar(255)',
    },
    is_active: {
      type: 'boolean',
      notNull: true,
      default: true,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createTable('player_seasons', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    player_id: {
      type: 'uuid',
      notNull: true,
      references: 'players',
      onDelete: 'RESTRICT',
    },
    season_id: {
      type: 'uuid',
      notNull: true,
      references: 'seasons',
      onDelete: 'RESTRICT',
    },
    joined_date: {
      type: 'date',
      notNull: true,
    },
    is_active: {
      type: 'boolean',
      notNull: true,
      default: true,
    },
  });

  pgm.addConstraint('player_seasons', 'uq_player_season', {
    unique: ['player_id', 'season_id'],
  });

  pgm.createTable('weeks', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    season_id: {
      type: 'uuid',
      notNull: true,
      references: 'seasons',
      onDelete: 'RESTRICT',
    },
    week_number: {
      type: 'integer',
      notNull: true,
    },
    start_date: {
      type: 'date',
      notNull: true,
    },
    end_date: {
      type: 'date',
      notNull: true,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.addConstraint('weeks', 'uq_season_week', {
    unique: ['season_id', 'week_number'],
  });

  pgm.createTable('week_assignments', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    week_id: {
      type: 'uuid',
      notNull: true,
      references: 'weeks',
      onDelete: 'CASCADE',
    },
    player_id: {
      type: 'uuid',
      notNull: true,
      references: 'players',
      onDelete: 'RESTRICT',
    },
    assignment_order: {
      type: 'integer',
      notNull: true,
      check: 'assignment_order IN (1, 2)',
    },
  });

  pgm.addConstraint('week_assignments', 'uq_week_player', {
    unique: ['week_id', 'player_id'],
  });
  pgm.addConstraint('week_assignments', 'uq_week_order', {
    unique: ['week_id', 'assignment_order'],
  });

  pgm.createTable('bets', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    week_id: {
      type: 'uuid',
      references: 'weeks',
      onDelete: 'RESTRICT',
    },
    placed_by_player_id: {
      type: 'uuid',
      notNull: true,
      references: 'players',
      onDelete: 'RESTRICT',
    },
    stake: {
      type: 'numeric(10,2)',
      notNull: true,
      check: 'stake > 0',
    },
    description: {
      type: 'text',
      notNull: true,
    },
    odds: {
      type: 'varchar(50)',
    },
    bet_date: {
      type: 'date',
      notNull: true,
    },
    status: {
      type: 'varchar(20)',
      notNull: true,
      default: 'pending',
      check: "status IN ('pending', 'won', 'lost', 'void')",
    },
    result_date: {
      type: 'date',
    },
    winnings: {
      type: 'numeric(10,2)',
    },
    notes: {
      type: 'text',
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('NOW()'),
    },
  });

  pgm.createIndex('bets', ['status', 'bet_date'], { name: 'idx_bets_status_date' });

  pgm.createTable('ledger_entries', {
    id: {
      type: 'uuid',
      primaryKey: true,
      default: pgm.func('uuid_generate_v4()'),
    },
    entry_date: {
      type: 'date',
      notNull: true,
    },
    kind: {
      type: 'varchar(20)',
      notNull: true,
      check: "kind IN ('contribution', 'bet_placed', 'winnings', 'bet_void', 'payout')",
    },
    player_id: {
      type: 'uuid',
      notNull: true,
      references: 'players',
      onDelete: 'RESTRICT',
    },
    season_id: {
      type: 'uuid',
      notNull: true,
      references: 'seasons',
      onDelete: 'RESTRICT',
    },
    week_id: {
      type: 'uuid',
      references: 'weeks',
      onDelete: 'RESTRICT',
    },
    bet_id: {
      type: 'uuid',
      references: 'bets',
      onDelete: 'RESTRICT',
    },
    amount: {
      type: 'numeric(10,2)',
      notNull: true,
    },
    description: {
      type: 'text',
      notNull: true,
    },
    created_at: {
      type: 'timestamp with time zone',
      notNull: true,
      default: pgm.func('clock_timestamp()'),
    },
    created_by: {
      type: 'varchar(100)',
    },
  });

  // Sign is determined by kind; amount is never zero
  pgm.addConstraint('ledger_entries', 'ck_ledger_amount_sign', {
    check: `
      (kind IN ('contribution', 'winnings', 'bet_void') AND amount > 0)
      OR (kind IN ('bet_placed', 'payout') AND amount < 0)
    `,
  });

  pgm.createIndex('ledger_entries', ['season_id', 'kind'], { name: 'idx_ledger_season_kind' });
  pgm.createIndex('ledger_entries', ['player_id', 'season_id', 'kind'], {
    name: 'idx_ledger_player_season_kind',
  });
  pgm.createIndex('ledger_entries', 'bet_id', { name: 'idx_ledger_bet' });
  pgm.createIndex('ledger_entries', [
    { name: 'entry_date', sort: 'DESC' },
    { name: 'created_at', sort: 'DESC' },
  ], { name: 'idx_ledger_listing_order' });

  // Entries are insert-only
  pgm.createFunction(
    'reject_ledger_mutation',
    [],
    { returns: 'trigger', language: 'plpgsql', replace: true },
    `
    BEGIN
      RAISE EXCEPTION 'ledger_entries is append-only (% rejected)', TG_OP;
    END;
    `
  );

  pgm.createTrigger('ledger_entries', 'ledger_entries_append_only', {
    when: 'BEFORE',
    operation: ['UPDATE', 'DELETE'],
    level: 'ROW',
    function: 'reject_ledger_mutation',
  });
}

export async function down(pgm: MigrationBuilder): Promise<void> {
  // Drop tables in reverse order to respect foreign key constraints
  pgm.dropTrigger('ledger_entries', 'ledger_entries_append_only', { ifExists: true });
  pgm.dropFunction('reject_ledger_mutation', [], { ifExists: true });
  pgm.dropTable('ledger_entries', { cascade: true });
  pgm.dropTable('bets', { cascade: true });
  pgm.dropTable('week_assignments', { cascade: true });
  pgm.dropTable('weeks', { cascade: true });
  pgm.dropTable('player_seasons', { cascade: true });
  pgm.dropTable('players', { cascade: true });
  pgm.dropTable('seasons', { cascade: true });
}
