import { z } from 'zod';

// ============================================================================
// DATE / STRIKE EXPRESSION
// ============================================================================

export type DateStrikeExpression =
  | { kind: 'MonthOnly'; month: string }
  | { kind: 'MonthDay'; month: string; day: number }
  | { kind: 'MonthDayStrike'; month: string; day: number; strike: number }
  | { kind: 'All' };

/** Expressions that name a calendar month and can be resolved offline */
export type DatedExpression = Exclude<DateStrikeExpression, { kind: 'All' }>;

export interface ResolvedExpiration {
  /** Expiration date, YYYY-MM-DD */
  readonly date: string;
  /** Single target strike carried over from the expression */
  readonly strike?: number;
}

// ============================================================================
// STRIKE SELECTION
// ============================================================================

export type StrikeSelection =
  | { kind: 'SingleStrike'; strike: number }
  | { kind: 'Range'; lower: number; upper: number }
  | { kind: 'All' };

export interface StrikeBounds {
  lower?: number;
  upper?: number;
}

// ============================================================================
// OPTIONS CHAIN (zod: also validates offline snapshots)
// ============================================================================

export const OptionQuote = z.object({
  strike: z.number().positive(),
  openInterest: z.number().int().nonnegative().default(0),
});
export type OptionQuote = z.infer<typeof OptionQuote>;

export const OptionChain = z.object({
  calls: z.array(OptionQuote),
  puts: z.array(OptionQuote),
});
export type OptionChain = z.infer<typeof OptionChain>;

export const ChainSnapshot = z.object({
  symbol: z.string().min(1),
  expirations: z.record(
    z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expiration keys must be YYYY-MM-DD'),
    OptionChain
  ),
});
export type ChainSnapshot = z.infer<typeof ChainSnapshot>;

/**
 * One strike of the chain. A side with no listed contract is null,
 * which is different from a listed contract with zero open interest.
 */
export interface OptionChainRow {
  strike: number;
  callOI: number | null;
  putOI: number | null;
}

// ============================================================================
// RESULTS
// ============================================================================

export interface StrikeRatio {
  strike: number;
  putOI: number;
  callOI: number;
  /** Infinity when calls are 0 and puts are not; null when both are 0 */
  ratio: number | null;
}

export interface AggregateRatio {
  totalPutOI: number;
  totalCallOI: number;
  /** null when total call open interest is 0 */
  totalRatio: number | null;
}

export type PCRResult =
  | {
      kind: 'single';
      symbol: string;
      expiration: string;
      row: StrikeRatio;
    }
  | {
      kind: 'range';
      symbol: string;
      expiration: string;
      selection: Exclude<StrikeSelection, { kind: 'SingleStrike' }>;
      rows: StrikeRatio[];
      aggregate: AggregateRatio;
    };

export type Sentiment = 'bullish' | 'neutral' | 'bearish' | 'undefined';
