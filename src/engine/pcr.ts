/**
 * PCR Engine
 *
 * Computes put/call open-interest ratios for one expiration:
 * - SingleStrike: one row, StrikeNotFound when neither side lists the strike
 * - Range / All: one row per call-side strike (ascending) plus an aggregate
 *
 * A side with no contract counts as zero open interest. Calls at zero with
 * puts above zero give Infinity; zero over zero gives null.
 */

import type {
  AggregateRatio,
  OptionChain,
  OptionChainRow,
  PCRResult,
  ResolvedExpiration,
  StrikeRatio,
  StrikeSelection,
} from '../types/index.ts';
import type { MarketDataProvider } from '../providers/types.ts';
import {
  fail,
  invalidRange,
  noOptionsForDate,
  ok,
  providerUnavailable,
  strikeNotFound,
  type PCRError,
  type Result,
} from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';

export function putCallRatio(putOI: number, callOI: number): number | null {
  if (callOI > 0) return putOI / callOI;
  return putOI > 0 ? Infinity : null;
}

export function strikeRatio(strike: number, putOI: number, callOI: number): StrikeRatio {
  return { strike, putOI, callOI, ratio: putCallRatio(putOI, callOI) };
}

/**
 * Index the chain by strike. The first quote listed for a strike wins.
 */
export function indexChain(chain: OptionChain): Map<number, OptionChainRow> {
  const rows = new Map<number, OptionChainRow>();

  for (const call of chain.calls) {
    const row: OptionChainRow = rows.get(call.strike) ?? {
      strike: call.strike,
      callOI: null,
      putOI: null,
    };
    if (row.callOI === null) row.callOI = call.openInterest;
    rows.set(call.strike, row);
  }
  for (const put of chain.puts) {
    const row: OptionChainRow = rows.get(put.strike) ?? {
      strike: put.strike,
      callOI: null,
      putOI: null,
    };
    if (row.putOI === null) row.putOI = put.openInterest;
    rows.set(put.strike, row);
  }

  return rows;
}

export function aggregateRatios(rows: readonly StrikeRatio[]): AggregateRatio {
  let totalPutOI = 0;
  let totalCallOI = 0;
  for (const row of rows) {
    totalPutOI += row.putOI;
    totalCallOI += row.callOI;
  }
  return {
    totalPutOI,
    totalCallOI,
    totalRatio: totalCallOI > 0 ? totalPutOI / totalCallOI : null,
  };
}

function checkRange(selection: StrikeSelection): PCRError | null {
  if (selection.kind !== 'Range' || selection.lower <= selection.upper) {
    return null;
  }
  return invalidRange(
    `Lower bound ${selection.lower} is greater than upper bound ${selection.upper}`
  );
}

/**
 * Pure computation over an already fetched chain
 */
export function computeFromChain(
  symbol: string,
  expiration: string,
  chain: OptionChain,
  selection: StrikeSelection
): Result<PCRResult> {
  const index = indexChain(chain);

  if (selection.kind === 'SingleStrike') {
    const row = index.get(selection.strike);
    if (!row || (row.callOI === null && row.putOI === null)) {
      return fail(strikeNotFound(selection.strike, expiration));
    }
    return ok({
      kind: 'single',
      symbol,
      expiration,
      row: strikeRatio(selection.strike, row.putOI ?? 0, row.callOI ?? 0),
    });
  }

  const rangeError = checkRange(selection);
  if (rangeError) return fail(rangeError);

  const bounds = selection.kind === 'Range' ? selection : null;
  const strikes = [...new Set(chain.calls.map((c) => c.strike))]
    .filter((strike) => !bounds || (strike >= bounds.lower && strike <= bounds.upper))
    .sort((a, b) => a - b);

  const rows = strikes.map((strike) => {
    const row = index.get(strike);
    return strikeRatio(strike, row?.putOI ?? 0, row?.callOI ?? 0);
  });

  logger.debug(
    `${rows.length} of ${chain.calls.length} call strikes selected for ${symbol} ${expiration}`
  );

  return ok({
    kind: 'range',
    symbol,
    expiration,
    selection,
    rows,
    aggregate: aggregateRatios(rows),
  });
}

export async function computePCR(
  provider: MarketDataProvider,
  symbol: string,
  resolved: ResolvedExpiration,
  selection: StrikeSelection
): Promise<Result<PCRResult>> {
  // Malformed ranges fail before touching the network
  const rangeError = checkRange(selection);
  if (rangeError) return fail(rangeError);

  let chain: OptionChain;
  try {
    const expirations = await provider.listExpirations(symbol);
    logger.debug(`${symbol}: ${expirations.length} listed expirations`);

    if (!expirations.includes(resolved.date)) {
      return fail(noOptionsForDate(symbol, resolved.date));
    }

    chain = await provider.getOptionChain(symbol, resolved.date);
  } catch (error) {
    return fail(providerUnavailable(symbol, error));
  }

  return computeFromChain(symbol, resolved.date, chain, selection);
}
