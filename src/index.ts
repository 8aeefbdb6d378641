#!/usr/bin/env node
/**
 * PCR Calculator CLI
 * v1.0.2 - Put/Call Ratio from options open interest
 *
 * Usage: npm start -- --symbol AAPL --date-strike "Nov 29, 150"
 *        npm start -- -s AAPL -d Nov --lower 100 --upper 200 -g
 */

// Suppress dotenv logging noise
process.env.DOTENV_CONFIG_QUIET = 'true';

import { config } from 'dotenv';
import { join } from 'path';
import { Command, InvalidArgumentError } from 'commander';

config({ path: join(process.cwd(), '.env') });
config({ path: join(process.cwd(), '.env.local') });

import { runPcr } from './commands/pcr.ts';

const VERSION = '1.0.2';

interface CliOptions {
  symbol: string;
  dateStrike: string;
  lower?: number;
  upper?: number;
  graph: boolean;
  json: boolean;
  year?: number;
  snapshot?: string;
  config?: string;
  verbose: boolean;
}

function parseYear(value: string): number {
  const year = Number(value);
  if (!Number.isInteger(year) || year < 1900 || year > 9999) {
    throw new InvalidArgumentError('Year must be a four-digit number.');
  }
  return year;
}

const program = new Command();

program
  .name('pcr')
  .description(
    'Calculate the Put/Call Ratio (PCR) from open interest for a symbol, expiration and strike or strike range'
  )
  .version(VERSION)
  .requiredOption('-s, --symbol <symbol>', 'Security symbol (e.g. AAPL)')
  .requiredOption(
    '-d, --date-strike <expression>',
    'Expiration and optional strike: "Month Day, Strike" (e.g. "Nov 29, 150"), "Month" (e.g. "Nov"), or "all"'
  )
  .option('--lower <price>', 'Lower bound of strike price range', parseFloat)
  .option('--upper <price>', 'Upper bound of strike price range', parseFloat)
  .option('-g, --graph', 'Chart PCR vs strike price', false)
  .option('--json', 'Print the result as JSON', false)
  .option('--year <year>', 'Year for the expiration (default: current year)', parseYear)
  .option('--snapshot <file>', 'Read the options chain from a JSON snapshot instead of Yahoo')
  .option('--config <file>', 'Path to pcr.config.yaml')
  .option('-v, --verbose', 'Verbose output', false)
  .action(async (opts: CliOptions) => {
    process.exitCode = await runPcr({
      symbol: opts.symbol,
      dateStrike: opts.dateStrike,
      lower: opts.lower,
      upper: opts.upper,
      graph: opts.graph,
      json: opts.json,
      year: opts.year,
      snapshot: opts.snapshot,
      config: opts.config,
      verbose: opts.verbose,
    });
  });

await program.parseAsync(process.argv);
