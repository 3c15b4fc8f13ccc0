import { setTimeout as sleep } from 'node:timers/promises';
import type { MarketDataSource } from '../yield/types.js';

export type Sleep = (ms: number) => Promise<unknown>;

/**
 * Spaces consecutive chain requests at least `delayMs` apart, measured between call starts.
 * Spot and expiration lookups pass straight through.
 */
export function withPacing(
  source: MarketDataSource,
  delayMs: number,
  clock: { now: () => number; sleep: Sleep } = { now: Date.now, sleep },
): MarketDataSource {
  let lastChainRequestAt: number | null = null;

  return {
    getSpotPrice: ticker => source.getSpotPrice(ticker),
    listExpirations: ticker => source.listExpirations(ticker),
    async getChain(ticker, expiration, side) {
      if (lastChainRequestAt !== null) {
        const wait = lastChainRequestAt + delayMs - clock.now();
        if (wait > 0) await clock.sleep(wait);
      }
      lastChainRequestAt = clock.now();
      return source.getChain(ticker, expiration, side);
    },
  };
}
