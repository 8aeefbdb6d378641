/**
 * PCR Command
 *
 * Parses the date/strike expression, resolves the expiration, queries the
 * provider once and prints the table (and optional chart or JSON).
 * All input errors are reported before any network call.
 */

import { parseDateStrike } from '../engine/expression.ts';
import {
  resolveExpiration,
  resolveNearestExpiration,
  toISODate,
} from '../engine/expiration.ts';
import { buildSelection } from '../engine/selection.ts';
import { computePCR } from '../engine/pcr.ts';
import type { MarketDataProvider } from '../providers/types.ts';
import { YahooOptionsProvider } from '../providers/yahoo.ts';
import { SnapshotProvider } from '../providers/snapshot.ts';
import { getPcrConfig, setConfigPath } from '../config/settings.ts';
import type { PCRResult, ResolvedExpiration } from '../types/index.ts';
import {
  fail,
  invalidRange,
  providerUnavailable,
  type Result,
} from '../utils/errors.ts';
import { logger } from '../utils/logger.ts';
import { renderReport, serializeResult } from '../utils/report.ts';
import { renderRatioChart } from '../utils/terminal-chart.ts';

export interface PcrQuery {
  symbol: string;
  dateStrike: string;
  lower?: number;
  upper?: number;
  /** Year for month/day expressions; defaults to the year of `now` */
  year?: number;
}

export interface PcrCommandOptions extends PcrQuery {
  graph?: boolean;
  json?: boolean;
  snapshot?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Parse, resolve and compute. Pure apart from the provider calls.
 */
export async function runPcrQuery(
  query: PcrQuery,
  provider: MarketDataProvider,
  now: Date = new Date()
): Promise<Result<PCRResult>> {
  const symbol = query.symbol.trim().toUpperCase();

  const expression = parseDateStrike(query.dateStrike);
  if (!expression.ok) return expression;

  if (expression.value.kind === 'All' && query.year !== undefined) {
    return fail(
      invalidRange('--year does not apply to "all", which uses the nearest listed expiration')
    );
  }

  const selection = buildSelection(expression.value, {
    lower: query.lower,
    upper: query.upper,
  });
  if (!selection.ok) return selection;

  let resolved: Result<ResolvedExpiration>;
  if (expression.value.kind === 'All') {
    const today = toISODate(now.getFullYear(), now.getMonth() + 1, now.getDate());
    let expirations: string[];
    try {
      expirations = await provider.listExpirations(symbol);
    } catch (error) {
      return fail(providerUnavailable(symbol, error));
    }
    resolved = resolveNearestExpiration(symbol, expirations, today);
  } else {
    resolved = resolveExpiration(expression.value, query.year ?? now.getFullYear());
  }
  if (!resolved.ok) return resolved;

  logger.debug(
    `Resolved ${symbol} "${query.dateStrike}" to ${resolved.value.date} (${selection.value.kind})`
  );

  return computePCR(provider, symbol, resolved.value, selection.value);
}

function createProvider(options: PcrCommandOptions): MarketDataProvider {
  if (options.snapshot) {
    logger.debug(`Using chain snapshot ${options.snapshot}`);
    return SnapshotProvider.fromFile(options.snapshot);
  }
  return new YahooOptionsProvider();
}

/**
 * CLI entry for the pcr command. Returns the process exit code.
 */
export async function runPcr(options: PcrCommandOptions): Promise<number> {
  logger.setVerbose(options.verbose ?? false);
  logger.setQuiet(options.json ?? false);

  if (options.config) {
    setConfigPath(options.config);
  }
  const config = getPcrConfig();

  let provider: MarketDataProvider;
  try {
    provider = createProvider(options);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return 1;
  }

  const source = options.snapshot ?? 'Yahoo Finance';
  logger.info(`Fetching ${options.symbol.trim().toUpperCase()} options from ${source}...`);

  const result = await runPcrQuery(options, provider);
  if (!result.ok) {
    logger.error(result.error.message);
    return 1;
  }

  const pcr = result.value;

  if (options.json) {
    console.log(serializeResult(pcr));
    return 0;
  }

  console.log();
  console.log(renderReport(pcr, config));

  if (options.graph) {
    if (pcr.kind === 'range') {
      logger.header(`Put/Call Ratio (PCR) vs Strike Price for ${pcr.symbol} on ${pcr.expiration}`);
      for (const line of renderRatioChart(pcr.rows, config.chart)) {
        console.log(line);
      }
    } else {
      logger.warn('Chart needs a strike range (--lower/--upper) or "all"');
    }
  }

  logger.divider();
  logger.info(`Source: ${source}`);
  return 0;
}
