/**
 * Syndicate Ledger
 *
 * Append-only ledger, derivation engine and importers for a betting
 * syndicate. Presentation layers depend on this module only.
 */

export * from './config/environment';
export { closePool, isPoolHealthy, transaction } from './config/database';
export type { Queryable, TransactionRunner } from './config/database';

export * from './models/errors';
export * from './models/ledger-entry';
export * from './models/season';
export * from './models/player';
export * from './models/week';
export * from './models/bet';
export * from './models/statistics';
export * from './models/import';

export * from './utils/money';
export * from './utils/contribution-schedule';
export * from './utils/ledger-calculation';
export { parseTransactionCsv, parseWeekCalendarCsv } from './utils/transaction-feed';

export { buildLedgerPredicate } from './repositories/ledger-repository';
export { createRepositories, createServices, getServices } from './services';
export type { Repositories, Services, ServiceOptions } from './services';
export { LedgerService } from './services/ledger-service';
export { CalculationService } from './services/calculation-service';
export { SeasonService, isSeasonFrozen } from './services/season-service';
export { PlayerService } from './services/player-service';
export { BetService } from './services/bet-service';
export { WeekService } from './services/week-service';
export { ImportService } from './services/import-service';
