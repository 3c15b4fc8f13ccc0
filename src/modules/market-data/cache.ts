import { logStep } from '../utils/log.js';
import type { MarketDataSource } from '../yield/types.js';
import type { ChainCacheStore } from './types.js';

export function withChainCache(
  source: MarketDataSource,
  store: ChainCacheStore,
  ttlSeconds: number,
  now: () => Date = () => new Date(),
): MarketDataSource {
  return {
    getSpotPrice: ticker => source.getSpotPrice(ticker),
    listExpirations: ticker => source.listExpirations(ticker),
    async getChain(ticker, expiration, side) {
      const cached = await store.find(ticker, expiration, side);
      if (cached && now().getTime() - cached.fetchedAt.getTime() < ttlSeconds * 1000) {
        logStep(ticker, 'cache/hit', `${expiration} ${side}`);
        return cached.quotes;
      }

      const quotes = await source.getChain(ticker, expiration, side);
      try {
        await store.save({ ticker, expiration, side, quotes, fetchedAt: now() });
      } catch (error) {
        console.error(`[CACHE] Failed to store ${ticker} ${expiration} ${side}:`, error);
      }
      return quotes;
    },
  };
}
