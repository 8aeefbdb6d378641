import chalk from 'chalk';
import type { StrikeRatio } from '../types/index.ts';
import type { PcrConfig } from '../config/schema.ts';

type ChartConfig = PcrConfig['chart'];

const DEFAULT_CONFIG: ChartConfig = {
  width: 60,
  height: 12,
};

export const MARKERS = {
  point: '●',
  infinite: '▲',
  parity: '·',
  empty: ' ',
};

const AXIS_WIDTH = 7;

export interface RatioGrid {
  grid: string[][];
  /** Ratio shown on the top row */
  maxRatio: number;
  minStrike: number;
  maxStrike: number;
}

/**
 * Place each strike's ratio on a character grid: x by strike value,
 * y from 0 (bottom row) to the largest finite ratio (top row).
 * Infinite ratios are pinned to the top row; undefined ratios are skipped.
 */
export function plotRatioGrid(
  rows: readonly StrikeRatio[],
  config: Partial<ChartConfig> = {}
): RatioGrid | null {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const plotted = rows.filter((r) => r.ratio !== null);
  if (plotted.length === 0) return null;

  const strikes = plotted.map((r) => r.strike);
  const minStrike = Math.min(...strikes);
  const maxStrike = Math.max(...strikes);
  const strikeRange = maxStrike - minStrike;

  const finite = plotted
    .map((r) => r.ratio)
    .filter((r): r is number => r !== null && Number.isFinite(r));
  const maxFinite = finite.length > 0 ? Math.max(...finite) : 0;
  // Keep parity (1.0) visible and avoid a zero-height scale
  const maxRatio = Math.max(maxFinite, 1);

  const grid: string[][] = Array.from({ length: cfg.height }, () =>
    Array.from({ length: cfg.width }, () => MARKERS.empty)
  );

  const parityRow = cfg.height - 1 - Math.round((1 / maxRatio) * (cfg.height - 1));
  const parityLine = grid[parityRow];
  if (parityLine) {
    parityLine.fill(MARKERS.parity);
  }

  for (const row of plotted) {
    const x =
      strikeRange === 0
        ? 0
        : Math.round(((row.strike - minStrike) / strikeRange) * (cfg.width - 1));

    const ratio = row.ratio ?? 0;
    const isInfinite = ratio === Infinity;
    const y = isInfinite ? cfg.height - 1 : Math.round((ratio / maxRatio) * (cfg.height - 1));
    const line = grid[cfg.height - 1 - y];

    if (line && x >= 0 && x < cfg.width) {
      line[x] = isInfinite ? MARKERS.infinite : MARKERS.point;
    }
  }

  return { grid, maxRatio, minStrike, maxStrike };
}

function axisLabel(rowIndex: number, height: number, maxRatio: number): string {
  const mid = Math.floor((height - 1) / 2);
  if (rowIndex === 0) return maxRatio.toFixed(2);
  if (rowIndex === height - 1) return (0).toFixed(2);
  if (rowIndex === mid) {
    return (((height - 1 - mid) / (height - 1)) * maxRatio).toFixed(2);
  }
  return '';
}

function strikeLabels(minStrike: number, maxStrike: number, width: number): string {
  const first = String(minStrike);
  const last = String(maxStrike);
  if (minStrike === maxStrike) return first;
  const padding = width - first.length - last.length;
  return first + ' '.repeat(Math.max(1, padding)) + last;
}

/**
 * PCR vs strike price chart for the terminal
 */
export function renderRatioChart(
  rows: readonly StrikeRatio[],
  config: Partial<ChartConfig> = {}
): string[] {
  const cfg = { ...DEFAULT_CONFIG, ...config };
  const plot = plotRatioGrid(rows, cfg);

  if (!plot) {
    return [chalk.gray('No defined ratios to chart')];
  }

  const lines: string[] = [];

  plot.grid.forEach((cells, rowIndex) => {
    const label = axisLabel(rowIndex, cfg.height, plot.maxRatio).padStart(AXIS_WIDTH);
    const body = cells
      .map((cell) => {
        if (cell === MARKERS.point) return chalk.cyan(cell);
        if (cell === MARKERS.infinite) return chalk.red(cell);
        if (cell === MARKERS.parity) return chalk.gray(cell);
        return cell;
      })
      .join('');
    lines.push(`${chalk.gray(label)} ${chalk.gray('│')}${body}`);
  });

  lines.push(`${' '.repeat(AXIS_WIDTH)} ${chalk.gray('└' + '─'.repeat(cfg.width))}`);
  lines.push(
    `${' '.repeat(AXIS_WIDTH + 2)}${chalk.gray(strikeLabels(plot.minStrike, plot.maxStrike, cfg.width))}`
  );
  lines.push(
    chalk.gray(
      `${' '.repeat(AXIS_WIDTH + 2)}${MARKERS.point} PCR  ${MARKERS.infinite} no call OI  ${MARKERS.parity} PCR = 1`
    )
  );

  return lines;
}
