import type { OptionChain } from '../src/types/index.ts';
import type { MarketDataProvider } from '../src/providers/types.ts';

/**
 * In-memory provider that records every call it receives
 */
export class FakeProvider implements MarketDataProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly expirations: string[],
    private readonly chains: Record<string, OptionChain> = {},
    private readonly failure: Error | null = null
  ) {}

  async listExpirations(symbol: string): Promise<string[]> {
    this.calls.push(`listExpirations:${symbol}`);
    if (this.failure) throw this.failure;
    return [...this.expirations];
  }

  async getOptionChain(symbol: string, date: string): Promise<OptionChain> {
    this.calls.push(`getOptionChain:${symbol}:${date}`);
    if (this.failure) throw this.failure;
    const chain = this.chains[date];
    if (!chain) throw new Error(`no chain for ${date}`);
    return chain;
  }
}

export function chain(
  calls: Array<[number, number]>,
  puts: Array<[number, number]>
): OptionChain {
  return {
    calls: calls.map(([strike, openInterest]) => ({ strike, openInterest })),
    puts: puts.map(([strike, openInterest]) => ({ strike, openInterest })),
  };
}

/** calls: 100 -> 50, 110 -> 0; puts: 100 -> 25, 110 -> 10 */
export const SAMPLE_CHAIN = chain(
  [
    [100, 50],
    [110, 0],
  ],
  [
    [100, 25],
    [110, 10],
  ]
);
