/**
 * Structured Logging Module
 *
 * Provides structured JSON logging functions for consistent logging across
 * the ledger. Every line carries a timestamp and level; ledger writes and
 * import batches get their own typed entries.
 * Implements PII sanitization to exclude player contact details.
 */

import { loadEnvironmentConfig } from '../config/environment';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

type LogContext = Record<string, unknown>;

/**
 * Base log entry structure
 */
interface BaseLogEntry {
  timestamp: string;
  level: LogLevel;
  batch_id?: string;
}

/**
 * Ledger write log entry
 */
interface LedgerEntryLogEntry extends BaseLogEntry {
  log_type: 'LEDGER_ENTRY';
  entry_id: string;
  kind: string;
  amount: string;
  season_id: string;
  player_id: string;
  bet_id?: string;
  created_by?: string;
}

/**
 * Import batch log entry
 */
interface ImportBatchLogEntry extends BaseLogEntry {
  log_type: 'IMPORT_BATCH';
  season_id: string;
  success: boolean;
  rows_total: number;
  counts?: Record<string, number>;
  failed_row?: number;
  error_message?: string;
}

/**
 * Database error log entry
 */
interface DatabaseLogEntry extends BaseLogEntry {
  log_type: 'DATABASE_ERROR';
  error_message: string;
  query_preview: string;
  operation: string;
}

/**
 * PII patterns to sanitize from logs
 */
const PII_PATTERNS = {
  email: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
  phone: /\b\d{3}[-.]?\d{3}[-.]?\d{4}\b/g,
};

/**
 * Fields that may contain PII and should be excluded
 */
const PII_FIELDS = [
  'player_name',
  'name',
  'contact',
  'email',
  'phone',
  'phone_number',
  'address',
];

function sanitizeString(value: string): string {
  return value
    .replace(PII_PATTERNS.email, '[EMAIL_REDACTED]')
    .replace(PII_PATTERNS.phone, '[PHONE_REDACTED]');
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function sanitizeValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return sanitizeString(value);
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(sanitizeValue);
  }
  if (isPlainObject(value)) {
    return sanitizeObject(value);
  }
  return value;
}

/**
 * Sanitize object by removing PII fields and patterns
 */
function sanitizeObject(obj: LogContext): LogContext {
  const sanitized: LogContext = {};

  for (const [key, value] of Object.entries(obj)) {
    // Skip PII fields entirely
    if (PII_FIELDS.includes(key.toLowerCase())) {
      sanitized[key] = '[PII_REDACTED]';
      continue;
    }
    sanitized[key] = sanitizeValue(value);
  }

  return sanitized;
}

function minimumLevel(): LogLevel {
  const configured = loadEnvironmentConfig().logLevel.toUpperCase();
  switch (configured) {
    case LogLevel.DEBUG:
    case LogLevel.INFO:
    case LogLevel.WARN:
    case LogLevel.ERROR:
      return configured;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Write log entry to console, dropping entries below LOG_LEVEL
 */
function writeLog(entry: BaseLogEntry): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minimumLevel()]) {
    return;
  }
  const logMethod = entry.level === LogLevel.ERROR ? console.error : console.log;
  logMethod(JSON.stringify(entry));
}

/**
 * Log a ledger entry after it has been persisted
 *
 * @example
 * ```typescript
 * logLedgerEntry({
 *   entryId: 'entry-1',
 *   kind: 'bet_placed',
 *   amount: '-10.00',
 *   seasonId: 'season-1',
 *   playerId: 'player-1',
 *   betId: 'bet-1'
 * });
 * ```
 */
export function logLedgerEntry(params: {
  entryId: string;
  kind: string;
  amount: string;
  seasonId: string;
  playerId: string;
  betId?: string | null;
  createdBy?: string | null;
}): void {
  const entry: LedgerEntryLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.INFO,
    log_type: 'LEDGER_ENTRY',
    entry_id: params.entryId,
    kind: params.kind,
    amount: params.amount,
    season_id: params.seasonId,
    player_id: params.playerId,
    bet_id: params.betId ?? undefined,
    created_by: params.createdBy ?? undefined,
  };

  writeLog(entry);
}

/**
 * Log the outcome of a bulk import batch
 *
 * Successful batches log at INFO with per-kind counts; failed batches log
 * at ERROR with the offending row number.
 */
export function logImportBatch(params: {
  batchId: string;
  seasonId: string;
  success: boolean;
  rowsTotal: number;
  counts?: Record<string, number>;
  failedRow?: number;
  errorMessage?: string;
}): void {
  const entry: ImportBatchLogEntry = {
    timestamp: new Date().toISOString(),
    level: params.success ? LogLevel.INFO : LogLevel.ERROR,
    log_type: 'IMPORT_BATCH',
    batch_id: params.batchId,
    season_id: params.seasonId,
    success: params.success,
    rows_total: params.rowsTotal,
    counts: params.counts,
    failed_row: params.failedRow,
    error_message: params.errorMessage ? sanitizeString(params.errorMessage) : undefined,
  };

  writeLog(entry);
}

/**
 * Log database error
 *
 * Logs database errors with sanitized query preview and error message.
 *
 * @example
 * ```typescript
 * logDatabase({
 *   errorMessage: 'Connection timeout',
 *   query: 'SELECT kind, SUM(amount) FROM ledger_entries WHERE season_id = $1',
 *   operation: 'SELECT'
 * });
 * ```
 */
export function logDatabase(params: {
  errorMessage: string;
  query: string;
  operation: string;
}): void {
  const sanitizedQuery = sanitizeString(params.query);

  // Truncate query for logging (first 200 characters)
  const queryPreview = sanitizedQuery.length > 200
    ? sanitizedQuery.substring(0, 200) + '...'
    : sanitizedQuery;

  const entry: DatabaseLogEntry = {
    timestamp: new Date().toISOString(),
    level: LogLevel.ERROR,
    log_type: 'DATABASE_ERROR',
    error_message: params.errorMessage,
    query_preview: queryPreview,
    operation: params.operation,
  };

  writeLog(entry);
}

/**
 * Log generic message with context
 *
 * General-purpose logging function for custom log entries.
 * Automatically sanitizes context to remove PII.
 *
 * @example
 * ```typescript
 * log(LogLevel.INFO, 'Season activated', { season_id: 'season-1' });
 * ```
 */
export function log(
  level: LogLevel,
  message: string,
  context?: LogContext
): void {
  const sanitizedContext = context ? sanitizeObject(context) : {};

  const entry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...sanitizedContext,
  };

  writeLog(entry);
}
