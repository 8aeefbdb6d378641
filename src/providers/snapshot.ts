/**
 * Offline provider backed by a JSON chain snapshot:
 *
 * { "symbol": "AAPL",
 *   "expirations": { "2024-11-15": { "calls": [...], "puts": [...] } } }
 */

import { readFileSync } from 'fs';
import { ChainSnapshot, type OptionChain } from '../types/index.ts';
import type { MarketDataProvider } from './types.ts';

export class SnapshotProvider implements MarketDataProvider {
  constructor(private readonly snapshot: ChainSnapshot) {}

  static fromFile(path: string): SnapshotProvider {
    const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    const parsed = ChainSnapshot.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.')}: ${i.message}`)
        .join('; ');
      throw new Error(`Invalid chain snapshot ${path}: ${issues}`);
    }
    return new SnapshotProvider(parsed.data);
  }

  private assertSymbol(symbol: string): void {
    if (symbol.toUpperCase() !== this.snapshot.symbol.toUpperCase()) {
      throw new Error(
        `Snapshot holds ${this.snapshot.symbol}, not ${symbol}`
      );
    }
  }

  async listExpirations(symbol: string): Promise<string[]> {
    this.assertSymbol(symbol);
    return Object.keys(this.snapshot.expirations).sort();
  }

  async getOptionChain(symbol: string, date: string): Promise<OptionChain> {
    this.assertSymbol(symbol);
    const chain = this.snapshot.expirations[date];
    if (!chain) {
      throw new Error(`Snapshot has no chain for ${date}`);
    }
    return chain;
  }
}
