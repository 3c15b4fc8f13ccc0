import type { Database } from '../database/types.js';
import type { CachedChain, ChainCacheStore } from './types.js';

export async function findCachedChain(
  database: Database,
  ticker: string,
  expiration: string,
  side: CachedChain['side'],
): Promise<CachedChain | null> {
  try {
    return await database.chains.findOne({ ticker, expiration, side }, { projection: { _id: 0 } });
  } catch (error) {
    console.error('[CACHE] Error reading cached chain:', error);
    return null;
  }
}

export async function saveCachedChain(database: Database, entry: CachedChain): Promise<void> {
  const { ticker, expiration, side } = entry;
  await database.chains.updateOne({ ticker, expiration, side }, { $set: entry }, { upsert: true });
}

export function createMongoChainCache(database: Database): ChainCacheStore {
  return {
    find: (ticker, expiration, side) => findCachedChain(database, ticker, expiration, side),
    save: entry => saveCachedChain(database, entry),
  };
}
