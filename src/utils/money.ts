/**
 * Money Arithmetic
 *
 * All amounts are held as bigint pence. Parsing accepts decimal strings with
 * at most two fractional digits; division rounds half-to-even and is only
 * applied at the two-decimal boundaries (percentages, per-player shares).
 */

import { InvalidAmountError, NoActivePlayersError } from '../models/errors';

/** Amount in pence (hundredths of the currency unit) */
export type Money = bigint;

/** Percentage in hundredths of a percent (50000n is 500.00%) */
export type Percentage = bigint;

export const ZERO: Money = 0n;

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d{1,2}))?$/;

/**
 * Parse a decimal string ("12.5", "-3.00", "7") into pence.
 *
 * @throws InvalidAmountError for anything that is not a plain decimal with
 * at most two fractional digits
 */
export function parseMoney(value: string): Money {
  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidAmountError(`Invalid amount: "${value}"`, { amount: value });
  }

  const [, sign, whole, fraction = ''] = match;
  const pence = BigInt(whole) * 100n + BigInt(fraction.padEnd(2, '0'));
  return sign === '-' ? -pence : pence;
}

/**
 * Format pence as a fixed two-decimal string ("-12.50")
 */
export function formatMoney(amount: Money): string {
  const negative = amount < 0n;
  const magnitude = negative ? -amount : amount;
  const whole = magnitude / 100n;
  const fraction = (magnitude % 100n).toString().padStart(2, '0');
  return `${negative ? '-' : ''}${whole}.${fraction}`;
}

export const formatPercentage: (value: Percentage) => string = formatMoney;

export function absMoney(amount: Money): Money {
  return amount < 0n ? -amount : amount;
}

/**
 * Require a strictly positive magnitude, as every writer command does
 *
 * @param label - Name of the amount in the error message ("Stake", "Payout")
 */
export function requirePositive(amount: Money, label: string): Money {
  if (amount <= 0n) {
    throw new InvalidAmountError(`${label} must be positive`, {
      amount: formatMoney(amount),
    });
  }
  return amount;
}

/**
 * Integer division rounding half-to-even
 */
export function divideRounded(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('Division by zero');
  }

  const negative = (numerator < 0n) !== (denominator < 0n);
  const n = numerator < 0n ? -numerator : numerator;
  const d = denominator < 0n ? -denominator : denominator;

  let quotient = n / d;
  const twiceRemainder = (n % d) * 2n;

  if (twiceRemainder > d || (twiceRemainder === d && quotient % 2n === 1n)) {
    quotient += 1n;
  }

  return negative ? -quotient : quotient;
}

/**
 * Split a total evenly across `count` players, rounded to the penny.
 *
 * @throws NoActivePlayersError when there is nobody to split across
 */
export function splitEvenly(total: Money, count: number): Money {
  if (count <= 0) {
    throw new NoActivePlayersError();
  }
  return divideRounded(total, BigInt(count));
}

/**
 * `part` as a percentage of `whole`, rounded to two decimal places.
 * Zero when `whole` is zero.
 */
export function percentageOf(part: Money, whole: Money): Percentage {
  if (whole === 0n) {
    return 0n;
  }
  return divideRounded(part * 10000n, whole);
}
