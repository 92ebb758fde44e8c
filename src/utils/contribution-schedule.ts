/**
 * Contribution and Betting Budget Schedules
 *
 * Calendar arithmetic for the two schedules the syndicate runs on. Both are
 * derived from the season start date and "today" only, never from entries.
 *
 * Schedule Rules:
 * - One contribution is owed for every Monday from the season start up to
 *   and including today (a Monday start date counts)
 * - Every whole cycle of weeks since the start (6 by default) grants each
 *   player a fixed betting allowance, rounded up to the cycle in progress
 *
 * Dates are ISO calendar dates (YYYY-MM-DD) and are compared as UTC day
 * numbers so local timezone offsets never shift a day.
 */

import { BadRequestError } from '../models/errors';
import { EnvironmentConfig, loadEnvironmentConfig } from '../config/environment';
import { Money, parseMoney } from './money';

/**
 * Amounts and cycle length the schedules run on
 */
export interface ScheduleSettings {
  weeklyContribution: Money;
  bettingAllowance: Money;
  budgetCycleWeeks: number;
}

export function loadScheduleSettings(
  config: EnvironmentConfig = loadEnvironmentConfig()
): ScheduleSettings {
  return {
    weeklyContribution: parseMoney(config.weeklyContribution),
    bettingAllowance: parseMoney(config.bettingAllowance),
    budgetCycleWeeks: config.budgetCycleWeeks,
  };
}

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const MONDAY = 1;

/**
 * Convert an ISO date to days since 1970-01-01
 *
 * @throws BadRequestError if the string is not a real calendar date
 */
export function toDayNumber(isoDate: string): number {
  const match = ISO_DATE_PATTERN.exec(isoDate);
  if (!match) {
    throw new BadRequestError(`Invalid date: "${isoDate}"`, { date: isoDate });
  }

  const [, year, month, day] = match;
  const time = Date.UTC(Number(year), Number(month) - 1, Number(day));
  const parsed = new Date(time);

  // Reject rollovers such as 2025-02-30
  if (parsed.getUTCMonth() !== Number(month) - 1 || parsed.getUTCDate() !== Number(day)) {
    throw new BadRequestError(`Invalid date: "${isoDate}"`, { date: isoDate });
  }

  return Math.floor(time / MS_PER_DAY);
}

export function fromDayNumber(dayNumber: number): string {
  return new Date(dayNumber * MS_PER_DAY).toISOString().slice(0, 10);
}

export function addDays(isoDate: string, days: number): string {
  return fromDayNumber(toDayNumber(isoDate) + days);
}

/**
 * Whole days from `from` to `to` (negative when `to` is earlier)
 */
export function daysBetween(from: string, to: string): number {
  return toDayNumber(to) - toDayNumber(from);
}

/**
 * Today's calendar date in the process's local timezone
 */
export function todayIsoDate(now: Date = new Date()): string {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

function dayOfWeek(dayNumber: number): number {
  // 1970-01-01 was a Thursday (4)
  return (((dayNumber + 4) % 7) + 7) % 7;
}

/**
 * Count the Mondays from `startDate` up to and including `today`
 *
 * Each Monday is one week of contributions owed.
 *
 * Examples (season starting Monday 2025-08-11):
 * - today 2025-08-11 → 1
 * - today 2025-08-17 → 1
 * - today 2025-08-18 → 2
 */
export function countMondaysSince(startDate: string, today: string): number {
  const start = toDayNumber(startDate);
  const end = toDayNumber(today);

  if (end < start) {
    return 0;
  }

  const firstMonday = start + ((MONDAY - dayOfWeek(start) + 7) % 7);
  if (firstMonday > end) {
    return 0;
  }

  return Math.floor((end - firstMonday) / 7) + 1;
}

/**
 * Whole weeks elapsed since `startDate` (floor of days ÷ 7), zero before it
 */
export function weeksSinceStart(startDate: string, today: string): number {
  const days = daysBetween(startDate, today);
  return days < 0 ? 0 : Math.floor(days / 7);
}

/**
 * Number of betting budget cycles granted so far: ceil(weeks ÷ cycleWeeks)
 */
export function budgetCyclesElapsed(
  startDate: string,
  today: string,
  cycleWeeks: number
): number {
  return Math.ceil(weeksSinceStart(startDate, today) / cycleWeeks);
}

/**
 * Betting budget granted to each player so far
 */
export function bettingBudget(
  startDate: string,
  today: string,
  allowance: Money,
  cycleWeeks: number
): Money {
  return BigInt(budgetCyclesElapsed(startDate, today, cycleWeeks)) * allowance;
}

/**
 * Contribution owed by one player so far
 */
export function expectedContributionPerPlayer(
  startDate: string,
  today: string,
  weeklyAmount: Money
): Money {
  return BigInt(countMondaysSince(startDate, today)) * weeklyAmount;
}

/**
 * Contribution owed by the whole roster so far
 */
export function expectedContributionTotal(
  startDate: string,
  today: string,
  weeklyAmount: Money,
  activePlayerCount: number
): Money {
  return expectedContributionPerPlayer(startDate, today, weeklyAmount) * BigInt(activePlayerCount);
}
