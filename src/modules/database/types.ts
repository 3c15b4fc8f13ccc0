import type { Collection } from 'mongodb';
import type { CachedChain } from '../market-data/types.js';

export type Database = {
  chains: Collection<CachedChain>;
};
