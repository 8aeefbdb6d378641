import YahooFinance from 'yahoo-finance2';
import type { OptionChain, OptionQuote } from '../types/index.ts';
import type { MarketDataProvider } from './types.ts';
import { logger } from '../utils/logger.ts';

interface YahooContract {
  strike: number;
  openInterest?: number;
}

interface YahooOptionsResponse {
  expirationDates: Date[];
  options: Array<{
    calls: YahooContract[];
    puts: YahooContract[];
  }>;
}

/**
 * The slice of the yahoo-finance2 client this provider calls
 */
export interface YahooOptionsClient {
  options(symbol: string, query?: { date: Date }): Promise<YahooOptionsResponse>;
}

function createDefaultClient(): YahooOptionsClient {
  // Instantiate yahoo-finance2 (required in v3+)
  const yahooFinance = new YahooFinance({
    suppressNotices: ['yahooSurvey'],
  });

  return {
    options: (symbol, query) =>
      query ? yahooFinance.options(symbol, query) : yahooFinance.options(symbol),
  };
}

/** Yahoo returns expirations as midnight UTC timestamps */
export function toExpirationKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function toQuote(contract: YahooContract): OptionQuote {
  return {
    strike: contract.strike,
    openInterest: contract.openInterest ?? 0,
  };
}

/**
 * Yahoo Finance options data. No caching and no retries: a failed
 * request propagates to the caller.
 */
export class YahooOptionsProvider implements MarketDataProvider {
  private client: YahooOptionsClient | null;

  constructor(client?: YahooOptionsClient) {
    this.client = client ?? null;
  }

  private getClient(): YahooOptionsClient {
    if (!this.client) {
      this.client = createDefaultClient();
    }
    return this.client;
  }

  async listExpirations(symbol: string): Promise<string[]> {
    const result = await this.getClient().options(symbol);
    const dates = (result.expirationDates ?? []).map(toExpirationKey);
    logger.debug(`Yahoo lists ${dates.length} expirations for ${symbol}`);
    return [...new Set(dates)].sort();
  }

  async getOptionChain(symbol: string, date: string): Promise<OptionChain> {
    const chain = await this.getClient().options(symbol, {
      date: new Date(`${date}T00:00:00.000Z`),
    });

    const opts = chain.options?.[0];
    if (!opts) {
      logger.debug(`Yahoo returned no contracts for ${symbol} ${date}`);
      return { calls: [], puts: [] };
    }

    return {
      calls: (opts.calls ?? []).map(toQuote),
      puts: (opts.puts ?? []).map(toQuote),
    };
  }
}
