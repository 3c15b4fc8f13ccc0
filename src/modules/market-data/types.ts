import type { Quote, StrategySide } from '../yield/types.js';

export type CachedChain = {
  ticker: string;
  expiration: string;
  side: StrategySide;
  quotes: Quote[];
  fetchedAt: Date;
};

export interface ChainCacheStore {
  find(ticker: string, expiration: string, side: StrategySide): Promise<CachedChain | null>;
  save(entry: CachedChain): Promise<void>;
}
