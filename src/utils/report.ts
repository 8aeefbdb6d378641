/**
 * Text report for a PCR result: formatted rows, a cli-table3 table and a
 * JSON serialisation. Nothing here computes ratios.
 */

import chalk from 'chalk';
import Table from 'cli-table3';
import type { PCRResult, Sentiment, StrikeRatio } from '../types/index.ts';
import type { PcrConfig } from '../config/schema.ts';

export interface ReportRow {
  strike: string;
  putOI: string;
  callOI: string;
  pcr: string;
  sentiment: Sentiment;
}

export interface ReportRows {
  rows: ReportRow[];
  /** Range results only */
  total: ReportRow | null;
}

export function formatRatio(ratio: number | null, decimals: number): string {
  if (ratio === null) return 'n/a';
  if (ratio === Infinity) return 'inf';
  return ratio.toFixed(decimals);
}

export function formatOI(value: number): string {
  return value.toLocaleString('en-US');
}

export function classifySentiment(
  ratio: number | null,
  thresholds: PcrConfig['sentiment']
): Sentiment {
  if (ratio === null) return 'undefined';
  if (ratio < thresholds.bullish_below) return 'bullish';
  if (ratio > thresholds.bearish_above) return 'bearish';
  return 'neutral';
}

function toReportRow(
  label: string,
  putOI: number,
  callOI: number,
  ratio: number | null,
  config: PcrConfig
): ReportRow {
  return {
    strike: label,
    putOI: formatOI(putOI),
    callOI: formatOI(callOI),
    pcr: formatRatio(ratio, config.display.decimals),
    sentiment: classifySentiment(ratio, config.sentiment),
  };
}

export function buildReportRows(result: PCRResult, config: PcrConfig): ReportRows {
  const fromStrike = (row: StrikeRatio): ReportRow =>
    toReportRow(String(row.strike), row.putOI, row.callOI, row.ratio, config);

  switch (result.kind) {
    case 'single':
      return { rows: [fromStrike(result.row)], total: null };
    case 'range': {
      const { totalPutOI, totalCallOI, totalRatio } = result.aggregate;
      return {
        rows: result.rows.map(fromStrike),
        total: toReportRow('Total', totalPutOI, totalCallOI, totalRatio, config),
      };
    }
  }
}

const SENTIMENT_COLORS: Record<Sentiment, (s: string) => string> = {
  bullish: chalk.green,
  neutral: chalk.yellow,
  bearish: chalk.red,
  undefined: chalk.gray,
};

function describeSelection(result: PCRResult): string {
  if (result.kind === 'single') {
    return `strike ${result.row.strike}`;
  }
  return result.selection.kind === 'Range'
    ? `strikes ${result.selection.lower}-${result.selection.upper}`
    : 'all strikes';
}

export function renderReport(result: PCRResult, config: PcrConfig): string {
  const { rows, total } = buildReportRows(result, config);
  const lines: string[] = [];

  lines.push(
    chalk.bold.magenta(`  Put/Call Ratios for ${result.symbol} on ${result.expiration}`) +
      chalk.gray(` (${describeSelection(result)})`)
  );

  if (rows.length === 0) {
    lines.push(chalk.yellow('  No strikes in the selected range'));
  } else {
    const table = new Table({
      head: [
        chalk.magenta('Strike'),
        chalk.magenta('Put OI'),
        chalk.magenta('Call OI'),
        chalk.magenta('PCR'),
        chalk.magenta('Sentiment'),
      ],
      colAligns: ['right', 'right', 'right', 'right', 'left'],
      style: { head: [], border: ['gray'] },
    });

    const toCells = (row: ReportRow, bold: boolean): string[] => {
      const color = SENTIMENT_COLORS[row.sentiment];
      const strike = bold ? chalk.bold(row.strike) : chalk.white(row.strike);
      return [strike, row.putOI, row.callOI, color(row.pcr), color(row.sentiment)];
    };

    for (const row of rows) {
      table.push(toCells(row, false));
    }
    if (total) {
      table.push(toCells(total, true));
    }
    lines.push(table.toString());
  }

  if (result.kind === 'range' && result.aggregate.totalRatio === null) {
    lines.push(
      chalk.yellow('  Total Call Open Interest is 0, cannot calculate total PCR.')
    );
  }

  return lines.join('\n');
}

/**
 * JSON output. Infinity has no JSON form, so it is written as "Infinity".
 */
export function serializeResult(result: PCRResult): string {
  return JSON.stringify(
    result,
    (_key, value: unknown) => (value === Infinity ? 'Infinity' : value),
    2
  );
}
