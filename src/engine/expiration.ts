/**
 * Expiration Resolver
 *
 * Turns a dated expression into a concrete expiration date. Without a day
 * the standard monthly expiration is used: the third Friday of the month.
 * The year is always passed in so resolution never reads the clock.
 */

import type { DatedExpression, ResolvedExpiration } from '../types/index.ts';
import {
  fail,
  invalidDate,
  invalidExpressionFormat,
  invalidMonth,
  noOptionsForDate,
  ok,
  type Result,
} from '../utils/errors.ts';

const MONTHS = [
  'jan', 'feb', 'mar', 'apr', 'may', 'jun',
  'jul', 'aug', 'sep', 'oct', 'nov', 'dec',
] as const;

const FRIDAY = 5;

/**
 * Month number (1-12) for a three-letter abbreviation, or null
 */
export function parseMonth(token: string): number | null {
  const index = MONTHS.findIndex((m) => m === token.toLowerCase());
  return index === -1 ? null : index + 1;
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  if (month === 2) return isLeapYear(year) ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Day of week (0 = Sunday), Sakamoto's method
 */
export function dayOfWeek(year: number, month: number, day: number): number {
  const offsets = [0, 3, 2, 5, 0, 3, 5, 1, 4, 6, 2, 4];
  const y = month < 3 ? year - 1 : year;
  return (
    (y +
      Math.floor(y / 4) -
      Math.floor(y / 100) +
      Math.floor(y / 400) +
      (offsets[month - 1] ?? 0) +
      day) %
    7
  );
}

export function toISODate(year: number, month: number, day: number): string {
  return [
    String(year).padStart(4, '0'),
    String(month).padStart(2, '0'),
    String(day).padStart(2, '0'),
  ].join('-');
}

/**
 * Day of month of the third Friday (always between 15 and 21)
 */
export function thirdFridayDay(year: number, month: number): number {
  const firstFriday = 1 + ((FRIDAY - dayOfWeek(year, month, 1) + 7) % 7);
  return firstFriday + 14;
}

export function getThirdFriday(year: number, month: number): string {
  return toISODate(year, month, thirdFridayDay(year, month));
}

export function resolveExpiration(
  expression: DatedExpression,
  currentYear: number
): Result<ResolvedExpiration> {
  const month = parseMonth(expression.month);
  if (month === null) {
    return fail(invalidMonth(expression.month));
  }

  switch (expression.kind) {
    case 'MonthOnly':
      return ok(Object.freeze({ date: getThirdFriday(currentYear, month) }));

    case 'MonthDay':
    case 'MonthDayStrike': {
      const { day } = expression;
      if (day < 1 || day > daysInMonth(currentYear, month)) {
        return fail(invalidDate(currentYear, month, day));
      }
      const date = toISODate(currentYear, month, day);

      if (expression.kind === 'MonthDay') {
        return ok(Object.freeze({ date }));
      }

      const { strike } = expression;
      if (!Number.isFinite(strike) || strike <= 0) {
        return fail(
          invalidExpressionFormat(
            `${expression.month} ${day}, ${strike}`,
            'Strike must be a positive number.'
          )
        );
      }
      return ok(Object.freeze({ date, strike }));
    }
  }
}

/**
 * Nearest listed expiration on or after `today` (YYYY-MM-DD).
 * Used for "all", which names no month of its own.
 */
export function resolveNearestExpiration(
  symbol: string,
  expirations: readonly string[],
  today: string
): Result<ResolvedExpiration> {
  const upcoming = expirations.filter((d) => d >= today).sort();
  const nearest = upcoming[0];
  if (nearest === undefined) {
    return fail(noOptionsForDate(symbol, null));
  }
  return ok(Object.freeze({ date: nearest }));
}
