/**
 * Strike Selection
 *
 * Combines the parsed expression with the optional --lower/--upper bounds:
 * - both bounds          -> Range (a strike in the expression conflicts)
 * - one bound            -> error
 * - strike in expression -> SingleStrike
 * - "all"                -> All
 * - month (and day) only -> error, nothing to select
 */

import type {
  DateStrikeExpression,
  StrikeBounds,
  StrikeSelection,
} from '../types/index.ts';
import { fail, invalidRange, ok, type Result } from '../utils/errors.ts';

export function validateRange(lower: number, upper: number): Result<StrikeSelection> {
  if (!Number.isFinite(lower) || !Number.isFinite(upper)) {
    return fail(invalidRange(`Strike bounds must be numbers (got ${lower} and ${upper})`));
  }
  if (lower > upper) {
    return fail(
      invalidRange(`Lower bound ${lower} is greater than upper bound ${upper}`)
    );
  }
  return ok({ kind: 'Range', lower, upper });
}

export function buildSelection(
  expression: DateStrikeExpression,
  bounds: StrikeBounds = {}
): Result<StrikeSelection> {
  const { lower, upper } = bounds;

  if (lower !== undefined && upper !== undefined) {
    if (expression.kind === 'MonthDayStrike') {
      return fail(
        invalidRange(
          `Strike ${expression.strike} conflicts with the range ${lower}-${upper}; specify one or the other`
        )
      );
    }
    return validateRange(lower, upper);
  }

  if (lower !== undefined || upper !== undefined) {
    return fail(invalidRange('Both --lower and --upper are required for a strike range'));
  }

  switch (expression.kind) {
    case 'MonthDayStrike':
      return ok({ kind: 'SingleStrike', strike: expression.strike });
    case 'All':
      return ok({ kind: 'All' });
    case 'MonthOnly':
    case 'MonthDay':
      return fail(
        invalidRange(
          'Invalid configuration: specify a range with --lower and --upper or provide a single strike in --date-strike'
        )
      );
  }
}
