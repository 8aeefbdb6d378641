import type { OptionChain } from '../types/index.ts';

/**
 * Read-only market data source for the PCR engine.
 * Implementations throw when the data cannot be fetched.
 */
export interface MarketDataProvider {
  /** Listed expiration dates (YYYY-MM-DD), ascending */
  listExpirations(symbol: string): Promise<string[]>;
  /** Calls and puts for one expiration date (YYYY-MM-DD) */
  getOptionChain(symbol: string, date: string): Promise<OptionChain>;
}
