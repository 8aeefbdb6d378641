/**
 * Tests for the report and chart renderers
 */
import { describe, test, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  buildReportRows,
  classifySentiment,
  formatOI,
  formatRatio,
  renderReport,
  serializeResult,
} from '../src/utils/report.ts';
import { plotRatioGrid, renderRatioChart } from '../src/utils/terminal-chart.ts';
import { DEFAULT_CONFIG } from '../src/config/schema.ts';
import type { PCRResult, StrikeRatio } from '../src/types/index.ts';

const RANGE_ROWS: StrikeRatio[] = [
  { strike: 100, putOI: 25, callOI: 50, ratio: 0.5 },
  { strike: 110, putOI: 10, callOI: 0, ratio: Infinity },
];

const RANGE_RESULT = {
  kind: 'range',
  symbol: 'TEST',
  expiration: '2024-11-15',
  selection: { kind: 'Range', lower: 100, upper: 110 },
  rows: RANGE_ROWS,
  aggregate: { totalPutOI: 35, totalCallOI: 50, totalRatio: 0.7 },
} satisfies PCRResult;

beforeAll(() => {
  chalk.level = 0;
});

describe('formatting', () => {
  test('formatRatio', () => {
    expect(formatRatio(0.5, 2)).toBe('0.50');
    expect(formatRatio(0.7, 3)).toBe('0.700');
    expect(formatRatio(Infinity, 2)).toBe('inf');
    expect(formatRatio(null, 2)).toBe('n/a');
  });

  test('formatOI groups thousands', () => {
    expect(formatOI(12345)).toBe('12,345');
    expect(formatOI(0)).toBe('0');
  });

  test('classifySentiment with the default thresholds', () => {
    const thresholds = DEFAULT_CONFIG.sentiment;

    expect(classifySentiment(0.5, thresholds)).toBe('bullish');
    expect(classifySentiment(1, thresholds)).toBe('neutral');
    expect(classifySentiment(1.5, thresholds)).toBe('bearish');
    expect(classifySentiment(Infinity, thresholds)).toBe('bearish');
    expect(classifySentiment(null, thresholds)).toBe('undefined');
  });

  test('classifySentiment with a neutral band', () => {
    const thresholds = { bullish_below: 0.7, bearish_above: 1.2 };

    expect(classifySentiment(0.9, thresholds)).toBe('neutral');
    expect(classifySentiment(0.69, thresholds)).toBe('bullish');
  });
});

describe('buildReportRows', () => {
  test('range rows and total', () => {
    expect(buildReportRows(RANGE_RESULT, DEFAULT_CONFIG)).toEqual({
      rows: [
        { strike: '100', putOI: '25', callOI: '50', pcr: '0.50', sentiment: 'bullish' },
        { strike: '110', putOI: '10', callOI: '0', pcr: 'inf', sentiment: 'bearish' },
      ],
      total: { strike: 'Total', putOI: '35', callOI: '50', pcr: '0.70', sentiment: 'bullish' },
    });
  });

  test('single strike has no total', () => {
    const single: PCRResult = {
      kind: 'single',
      symbol: 'TEST',
      expiration: '2024-11-29',
      row: { strike: 152.5, putOI: 1500, callOI: 1200, ratio: 1.25 },
    };

    expect(buildReportRows(single, DEFAULT_CONFIG)).toEqual({
      rows: [
        { strike: '152.5', putOI: '1,500', callOI: '1,200', pcr: '1.25', sentiment: 'bearish' },
      ],
      total: null,
    });
  });
});

describe('renderReport', () => {
  test('title names symbol, expiration and selection', () => {
    const [title] = renderReport(RANGE_RESULT, DEFAULT_CONFIG).split('\n');

    expect(title).toBe('  Put/Call Ratios for TEST on 2024-11-15 (strikes 100-110)');
  });

  test('zero total call interest adds a note', () => {
    const result: PCRResult = {
      ...RANGE_RESULT,
      selection: { kind: 'All' },
      rows: [{ strike: 110, putOI: 10, callOI: 0, ratio: Infinity }],
      aggregate: { totalPutOI: 10, totalCallOI: 0, totalRatio: null },
    };

    const lines = renderReport(result, DEFAULT_CONFIG).split('\n');

    expect(lines[0]).toBe('  Put/Call Ratios for TEST on 2024-11-15 (all strikes)');
    expect(lines[lines.length - 1]).toBe(
      '  Total Call Open Interest is 0, cannot calculate total PCR.'
    );
  });

  test('empty range', () => {
    const result: PCRResult = {
      ...RANGE_RESULT,
      rows: [],
      aggregate: { totalPutOI: 0, totalCallOI: 0, totalRatio: null },
    };

    expect(renderReport(result, DEFAULT_CONFIG).split('\n')[1]).toBe(
      '  No strikes in the selected range'
    );
  });
});

describe('serializeResult', () => {
  test('writes Infinity as a string and keeps undefined ratios as null', () => {
    const result: PCRResult = {
      ...RANGE_RESULT,
      rows: [
        { strike: 110, putOI: 10, callOI: 0, ratio: Infinity },
        { strike: 120, putOI: 0, callOI: 0, ratio: null },
      ],
    };

    const parsed: unknown = JSON.parse(serializeResult(result));

    expect(parsed).toMatchObject({
      rows: [
        { strike: 110, ratio: 'Infinity' },
        { strike: 120, ratio: null },
      ],
      aggregate: { totalRatio: 0.7 },
    });
  });
});

describe('terminal chart', () => {
  test('plots finite ratios by value and pins Infinity to the top row', () => {
    const plot = plotRatioGrid(RANGE_ROWS, {
      width: 11,
      height: 5,
    });

    expect(plot).not.toBeNull();
    if (plot) {
      expect(plot.maxRatio).toBe(1);
      expect(plot.grid.map((line) => line.join(''))).toEqual([
        '··········▲',
        '           ',
        '●          ',
        '           ',
        '           ',
      ]);
    }
  });

  test('scale follows the largest finite ratio', () => {
    const plot = plotRatioGrid(
      [
        { strike: 100, putOI: 20, callOI: 10, ratio: 2 },
        { strike: 110, putOI: 10, callOI: 10, ratio: 1 },
      ],
      { width: 3, height: 3 }
    );

    expect(plot?.maxRatio).toBe(2);
    expect(plot?.grid.map((line) => line.join(''))).toEqual(['●  ', '··●', '   ']);
  });

  test('undefined ratios alone give no chart', () => {
    expect(plotRatioGrid([{ strike: 100, putOI: 0, callOI: 0, ratio: null }])).toBeNull();
    expect(renderRatioChart([{ strike: 100, putOI: 0, callOI: 0, ratio: null }])).toEqual([
      'No defined ratios to chart',
    ]);
  });

  test('axis labels and strike labels', () => {
    const lines = renderRatioChart(RANGE_ROWS, { width: 11, height: 5 });

    expect(lines.slice(0, 7)).toEqual([
      '   1.00 │··········▲',
      '        │           ',
      '   0.50 │●          ',
      '        │           ',
      '   0.00 │           ',
      '        └───────────',
      '         100     110',
    ]);
  });
});
