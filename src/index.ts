import { startBot } from './config/bot.js';
import { connectToDb } from './config/database.js';
import { loadConfig } from './config/env.js';
import { withChainCache } from './modules/market-data/cache.js';
import { createMongoChainCache } from './modules/market-data/data.js';
import { withPacing } from './modules/market-data/pacing.js';
import { createYahooMarketData } from './modules/market-data/yahoo.js';
import type { MarketDataSource } from './modules/yield/types.js';

const config = loadConfig();

let market: MarketDataSource = withPacing(createYahooMarketData(), config.FETCH_DELAY_MS);
if (config.DB_CONNECTION_STRING) {
  const { database } = await connectToDb(config.DB_CONNECTION_STRING, config.CHAIN_CACHE_TTL_SECONDS);
  market = withChainCache(market, createMongoChainCache(database), config.CHAIN_CACHE_TTL_SECONDS);
  console.log('[CACHE] chain cache enabled');
} else {
  console.log('[CACHE] DB_CONNECTION_STRING not set, chain cache disabled');
}

await startBot(config, market);
console.log('bot started');
