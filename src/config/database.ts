import { MongoClient, MongoServerError, type Collection, type Db } from 'mongodb';

import type { Database } from '../modules/database/types.js';
import type { CachedChain } from '../modules/market-data/types.js';

const INDEX_OPTIONS_CONFLICT = 85;

export async function ensureChainIndexes(
  chains: Pick<Collection<CachedChain>, 'collectionName' | 'createIndex'>,
  mongoDb: Pick<Db, 'command'>,
  ttlSeconds: number,
) {
  await chains.createIndex({ ticker: 1, expiration: 1, side: 1 }, { unique: true });
  try {
    await chains.createIndex({ fetchedAt: 1 }, { expireAfterSeconds: ttlSeconds });
  } catch (error) {
    if (!(error instanceof MongoServerError) || error.code !== INDEX_OPTIONS_CONFLICT) throw error;
    // TTL changed since the index was created
    await mongoDb.command({
      collMod: chains.collectionName,
      index: { keyPattern: { fetchedAt: 1 }, expireAfterSeconds: ttlSeconds },
    });
    console.log(`[CACHE] chain TTL index updated to ${ttlSeconds}s`);
  }
}

export async function connectToDb(connectionString: string, ttlSeconds: number) {
  const client = new MongoClient(connectionString);
  await client.connect();
  const mongoDb = client.db();
  const chains = mongoDb.collection<CachedChain>('chains');
  await ensureChainIndexes(chains, mongoDb, ttlSeconds);
  const database: Database = { chains };
  return { client, database };
}
