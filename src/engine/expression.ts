/**
 * Date/Strike Expression Parser
 * Parses the --date-strike argument into a tagged expression.
 *
 * Supported formats:
 * - "all"
 * - "Nov"
 * - "Nov 29"
 * - "Nov 29, 150" (comma optional, decimal strikes allowed: "Nov 29 152.5")
 */

import type { DateStrikeExpression } from '../types/index.ts';
import {
  fail,
  invalidExpressionFormat,
  ok,
  type Result,
} from '../utils/errors.ts';

// A strike is only accepted after a day: a specific contract needs a specific date
const EXPRESSION_PATTERN =
  /^([a-z]{3})(?:\s+(\d{1,2})(?:(?:\s*,\s*|\s+)(\d+(?:\.\d+)?))?)?$/i;

export function parseDateStrike(input: string): Result<DateStrikeExpression> {
  const raw = input.trim();

  if (raw.toLowerCase() === 'all') {
    return ok({ kind: 'All' });
  }

  const match = raw.match(EXPRESSION_PATTERN);
  if (!match) {
    return fail(invalidExpressionFormat(input));
  }

  const [, month, dayStr, strikeStr] = match;
  if (month === undefined) {
    return fail(invalidExpressionFormat(input));
  }

  if (dayStr === undefined) {
    return ok({ kind: 'MonthOnly', month });
  }

  const day = parseInt(dayStr, 10);

  if (strikeStr === undefined) {
    return ok({ kind: 'MonthDay', month, day });
  }

  return ok({ kind: 'MonthDayStrike', month, day, strike: parseFloat(strikeStr) });
}
