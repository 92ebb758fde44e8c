/**
 * Application Error Models
 *
 * Common error types used across the ledger. The base classes describe the
 * category of failure (not found, bad request, conflict); the ledger
 * subclasses carry a stable `code` the presentation layer can switch on.
 */

export type ErrorDetails = Record<string, unknown>;

/**
 * Resource not found error
 */
export class NotFoundError extends Error {
  code: string = 'NOT_FOUND';
  details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'NotFoundError';
    this.details = details;
  }
}

/**
 * Bad request error
 */
export class BadRequestError extends Error {
  code: string = 'BAD_REQUEST';
  details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'BadRequestError';
    this.details = details;
  }
}

/**
 * Conflict with current state (e.g. settling a bet twice)
 */
export class ConflictError extends Error {
  code: string = 'CONFLICT';
  details?: ErrorDetails;

  constructor(message: string, details?: ErrorDetails) {
    super(message);
    this.name = 'ConflictError';
    this.details = details;
  }
}

/**
 * A non-positive or malformed magnitude was supplied to a writer command.
 * No entry is written.
 */
export class InvalidAmountError extends BadRequestError {
  code = 'INVALID_AMOUNT';

  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'InvalidAmountError';
  }
}

export class UnknownPlayerError extends NotFoundError {
  code = 'UNKNOWN_PLAYER';

  constructor(playerRef: string) {
    super(`Unknown player: ${playerRef}`, { player: playerRef });
    this.name = 'UnknownPlayerError';
  }
}

export class UnknownSeasonError extends NotFoundError {
  code = 'UNKNOWN_SEASON';

  constructor(seasonRef: string) {
    super(`Unknown season: ${seasonRef}`, { season: seasonRef });
    this.name = 'UnknownSeasonError';
  }
}

export class UnknownBetError extends NotFoundError {
  code = 'UNKNOWN_BET';

  constructor(betId: string) {
    super(`Unknown bet: ${betId}`, { bet_id: betId });
    this.name = 'UnknownBetError';
  }
}

export class UnknownWeekError extends NotFoundError {
  code = 'UNKNOWN_WEEK';

  constructor(weekId: string) {
    super(`Unknown week: ${weekId}`, { week_id: weekId });
    this.name = 'UnknownWeekError';
  }
}

/**
 * A calculation that needs a non-empty roster found no active players
 */
export class NoActivePlayersError extends BadRequestError {
  code = 'NO_ACTIVE_PLAYERS';

  constructor(seasonId?: string) {
    super('No active players in season', seasonId ? { season_id: seasonId } : undefined);
    this.name = 'NoActivePlayersError';
  }
}

/**
 * A bulk-ingestion row failed parsing or referenced an unknown player/label.
 * The whole batch is rolled back.
 */
export class ImportRowError extends BadRequestError {
  code = 'IMPORT_ROW_ERROR';
  readonly rowNumber: number;
  readonly cause?: unknown;

  constructor(rowNumber: number, message: string, cause?: unknown) {
    super(`Import row ${rowNumber}: ${message}`, { row: rowNumber });
    this.name = 'ImportRowError';
    this.rowNumber = rowNumber;
    this.cause = cause;
  }
}

/**
 * The season's end date has passed; no new bets are accepted
 */
export class SeasonFrozenError extends BadRequestError {
  code = 'SEASON_FROZEN';

  constructor(seasonId: string, endDate: string) {
    super(`Season ended on ${endDate}`, { season_id: seasonId, end_date: endDate });
    this.name = 'SeasonFrozenError';
  }
}

export class BetAlreadySettledError extends ConflictError {
  code = 'BET_ALREADY_SETTLED';

  constructor(betId: string, status: string) {
    super(`Bet ${betId} is already ${status}`, { bet_id: betId, status });
    this.name = 'BetAlreadySettledError';
  }
}

export class InvalidAssignmentError extends BadRequestError {
  code = 'INVALID_ASSIGNMENT';

  constructor(message: string, details?: ErrorDetails) {
    super(message, details);
    this.name = 'InvalidAssignmentError';
  }
}

/**
 * Error body handed to the presentation layer
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: ErrorDetails;
}

/**
 * Map any thrown value to a response body. Unexpected errors are reported
 * generically so internal messages do not leak.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (
    error instanceof NotFoundError ||
    error instanceof BadRequestError ||
    error instanceof ConflictError
  ) {
    return { code: error.code, message: error.message, details: error.details };
  }

  return { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' };
}
