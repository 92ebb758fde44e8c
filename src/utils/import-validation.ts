/**
 * Import Validation Module
 *
 * Validates rows of the transaction feed and the week calendar against JSON
 * schemas using ajv, and normalises their dates, labels and amounts. Every
 * failure is reported as an ImportRowError carrying the 1-based row number.
 */

import Ajv, { ErrorObject, JSONSchemaType } from 'ajv';
import { format, isValid, parse } from 'date-fns';
import { ImportLabel, TransactionFeedRow, WeekCalendarRow } from '../models/import';
import { ImportRowError } from '../models/errors';
import { Money, absMoney, parseMoney } from './money';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  coerceTypes: false,
});

const DAY_FIRST_FORMAT = 'dd/MM/yyyy';
const ISO_FORMAT = 'yyyy-MM-dd';

const FEED_DATE_PATTERN = '^(\\d{1,2}/\\d{1,2}/\\d{4}|\\d{4}-\\d{2}-\\d{2})$';

const transactionFeedRowSchema: JSONSchemaType<TransactionFeedRow> = {
  type: 'object',
  properties: {
    date: { type: 'string', pattern: FEED_DATE_PATTERN },
    player: { type: 'string', minLength: 1 },
    amount: { type: 'string', minLength: 1 },
    transaction: { type: 'string', minLength: 1 },
  },
  required: ['date', 'player', 'amount', 'transaction'],
  additionalProperties: false,
};

const weekCalendarRowSchema: JSONSchemaType<WeekCalendarRow> = {
  type: 'object',
  properties: {
    start_date: { type: 'string', pattern: FEED_DATE_PATTERN },
    first_player: { type: 'string', minLength: 1 },
    second_player: { type: 'string', minLength: 1 },
  },
  required: ['start_date', 'first_player', 'second_player'],
  additionalProperties: false,
};

const validateFeedRow = ajv.compile(transactionFeedRowSchema);
const validateCalendarRow = ajv.compile(weekCalendarRowSchema);

/**
 * Turn the first ajv error into a one-line message
 */
function describeValidationError(errors: ErrorObject[] | null | undefined): string {
  const [error] = errors ?? [];
  if (!error) {
    return 'Invalid row';
  }

  const field = error.instancePath ? error.instancePath.substring(1) : 'row';

  switch (error.keyword) {
    case 'required':
      return `Missing required field: ${String(error.params.missingProperty)}`;
    case 'minLength':
      return `${field} must not be empty`;
    case 'pattern':
      return `${field} is not a date (expected DD/MM/YYYY or YYYY-MM-DD)`;
    case 'type':
      return `${field} must be a ${String(error.params.type)}`;
    case 'additionalProperties':
      return `Unknown field: ${String(error.params.additionalProperty)}`;
    default:
      return `${field} ${error.message ?? 'is invalid'}`;
  }
}

/**
 * Validate one transaction feed row
 *
 * @throws ImportRowError if the row does not match the feed schema
 */
export function validateTransactionFeedRow(row: unknown, rowNumber: number): TransactionFeedRow {
  if (!validateFeedRow(row)) {
    throw new ImportRowError(rowNumber, describeValidationError(validateFeedRow.errors));
  }
  return row;
}

/**
 * Validate one week calendar row
 *
 * @throws ImportRowError if the row does not match the calendar schema
 */
export function validateWeekCalendarRow(row: unknown, rowNumber: number): WeekCalendarRow {
  if (!validateCalendarRow(row)) {
    throw new ImportRowError(rowNumber, describeValidationError(validateCalendarRow.errors));
  }
  return row;
}

/**
 * Convert a feed date (DD/MM/YYYY or YYYY-MM-DD) to an ISO date
 *
 * @throws ImportRowError if the date is not a real calendar date
 */
export function parseFeedDate(value: string, rowNumber: number): string {
  const trimmed = value.trim();
  const date = parse(trimmed, trimmed.includes('/') ? DAY_FIRST_FORMAT : ISO_FORMAT, new Date());

  if (!isValid(date)) {
    throw new ImportRowError(rowNumber, `Invalid date "${value}"`);
  }
  return format(date, ISO_FORMAT);
}

/**
 * Match a transaction label case-insensitively
 *
 * @throws ImportRowError for an unrecognised label
 */
export function parseImportLabel(value: string, rowNumber: number): ImportLabel {
  const normalised = value.trim().toLowerCase().replace(/\s+/g, ' ');
  const label = Object.values(ImportLabel).find((candidate) => candidate === normalised);
  if (!label) {
    throw new ImportRowError(rowNumber, `Unknown transaction label "${value}"`);
  }
  return label;
}

/**
 * Magnitude of a signed or unsigned feed amount
 *
 * @throws ImportRowError if the amount is unparseable or zero
 */
export function parseFeedAmount(value: string, rowNumber: number): Money {
  let amount: Money;
  try {
    amount = parseMoney(value.replace(/[£,]/g, ''));
  } catch (error) {
    throw new ImportRowError(rowNumber, `Invalid amount "${value}"`, error);
  }

  const magnitude = absMoney(amount);
  if (magnitude === 0n) {
    throw new ImportRowError(rowNumber, 'Amount must not be zero');
  }
  return magnitude;
}
