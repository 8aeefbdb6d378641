/**
 * Tests for strike selection (expression + --lower/--upper)
 */
import { describe, test, expect } from 'vitest';
import { buildSelection, validateRange } from '../src/engine/selection.ts';
import type { DateStrikeExpression } from '../src/types/index.ts';

const monthOnly: DateStrikeExpression = { kind: 'MonthOnly', month: 'Nov' };
const monthDay: DateStrikeExpression = { kind: 'MonthDay', month: 'Nov', day: 29 };
const withStrike: DateStrikeExpression = {
  kind: 'MonthDayStrike',
  month: 'Nov',
  day: 29,
  strike: 150,
};
const all: DateStrikeExpression = { kind: 'All' };

function errorKind(result: ReturnType<typeof buildSelection>): string | null {
  return result.ok ? null : result.error.kind;
}

describe('buildSelection', () => {
  test('both bounds give a range', () => {
    expect(buildSelection(monthOnly, { lower: 100, upper: 200 })).toEqual({
      ok: true,
      value: { kind: 'Range', lower: 100, upper: 200 },
    });
    expect(buildSelection(all, { lower: 100, upper: 100 })).toEqual({
      ok: true,
      value: { kind: 'Range', lower: 100, upper: 100 },
    });
  });

  test('strike in the expression gives a single strike', () => {
    expect(buildSelection(withStrike)).toEqual({
      ok: true,
      value: { kind: 'SingleStrike', strike: 150 },
    });
  });

  test('"all" selects every strike', () => {
    expect(buildSelection(all)).toEqual({ ok: true, value: { kind: 'All' } });
  });

  test('lower above upper is an InvalidRange', () => {
    expect(errorKind(buildSelection(monthOnly, { lower: 200, upper: 100 }))).toBe(
      'InvalidRange'
    );
  });

  test('a strike together with a range is an InvalidRange', () => {
    expect(errorKind(buildSelection(withStrike, { lower: 100, upper: 200 }))).toBe(
      'InvalidRange'
    );
  });

  test('a single bound is an InvalidRange', () => {
    expect(errorKind(buildSelection(monthOnly, { lower: 100 }))).toBe('InvalidRange');
    expect(errorKind(buildSelection(monthOnly, { upper: 100 }))).toBe('InvalidRange');
  });

  test('month without strike or range has nothing to select', () => {
    expect(errorKind(buildSelection(monthOnly))).toBe('InvalidRange');
    expect(errorKind(buildSelection(monthDay))).toBe('InvalidRange');
  });

  test('non-numeric bounds are an InvalidRange', () => {
    expect(errorKind(buildSelection(monthOnly, { lower: NaN, upper: 100 }))).toBe(
      'InvalidRange'
    );
  });
});

describe('validateRange', () => {
  test('reports both bounds', () => {
    expect(validateRange(200, 100)).toEqual({
      ok: false,
      error: {
        kind: 'InvalidRange',
        message: 'Lower bound 200 is greater than upper bound 100',
      },
    });
  });
});
