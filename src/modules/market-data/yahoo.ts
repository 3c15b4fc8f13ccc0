import yahooFinance from 'yahoo-finance2';
import { FetchError, NoDataError, RateLimitedError, errorMessage } from '../yield/errors.js';
import { parseExpiration } from '../yield/normalizer.js';
import type { MarketDataSource, Quote, StrategySide } from '../yield/types.js';

yahooFinance.suppressNotices(['yahooSurvey']);

const SPOT_LOOKBACK_DAYS = 7;

type YahooContract = {
  strike: number;
  bid?: number;
  ask?: number;
  lastPrice?: number;
  impliedVolatility?: number;
};

function toYahooSymbol(symbol: string): string {
  if (symbol.endsWith('.US')) return symbol.slice(0, -3);
  return symbol.toUpperCase();
}

function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function nonNegative(value: number | undefined): number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : 0;
}

export function isRateLimitError(error: unknown): boolean {
  return /too many requests|\b429\b|rate limit/i.test(errorMessage(error));
}

function classifyProviderError(error: unknown, what: string): Error {
  if (isRateLimitError(error)) return new RateLimitedError(`rate limited while fetching ${what}`, { cause: error });
  return new FetchError(`failed to fetch ${what}: ${errorMessage(error)}`, { cause: error });
}

export function toQuote(contract: YahooContract): Quote {
  const impliedVolatility = contract.impliedVolatility;
  return {
    strike: contract.strike,
    bid: nonNegative(contract.bid),
    ask: nonNegative(contract.ask),
    lastPrice: nonNegative(contract.lastPrice),
    impliedVolatility:
      typeof impliedVolatility === 'number' && Number.isFinite(impliedVolatility) && impliedVolatility >= 0
        ? impliedVolatility
        : null,
  };
}

export async function yahooSpotPrice(tickerSymbol: string): Promise<number> {
  const yahooSymbol = toYahooSymbol(tickerSymbol);
  const periodStart = new Date(Date.now() - SPOT_LOOKBACK_DAYS * 24 * 3600 * 1000);
  let closePrices: number[];
  try {
    const chartResponse = await yahooFinance.chart(yahooSymbol, { period1: periodStart, interval: '1d' });
    closePrices = (chartResponse.quotes ?? [])
      .map(quote => quote.close)
      .filter((price): price is number => typeof price === 'number' && price > 0);
  } catch (error) {
    console.error(`[MARKET-DATA] yahoo chart failed for ${tickerSymbol}:`, error);
    if (isRateLimitError(error)) throw new RateLimitedError(`rate limited while fetching ${tickerSymbol} price`, { cause: error });
    throw new NoDataError(`no price for ${tickerSymbol}`, { cause: error });
  }
  const spotPrice = closePrices.at(-1);
  if (spotPrice === undefined) throw new NoDataError(`no price for ${tickerSymbol}`);
  return spotPrice;
}

export async function yahooExpirations(tickerSymbol: string): Promise<string[]> {
  try {
    const optionsResponse = await yahooFinance.options(toYahooSymbol(tickerSymbol), {});
    const expirations = optionsResponse.expirationDates.map(toIsoDate);
    return Array.from(new Set(expirations)).sort();
  } catch (error) {
    console.error(`[MARKET-DATA] yahoo expirations failed for ${tickerSymbol}:`, error);
    throw classifyProviderError(error, `${tickerSymbol} expirations`);
  }
}

export async function yahooChain(tickerSymbol: string, expiration: string, side: StrategySide): Promise<Quote[]> {
  const date = parseExpiration(expiration);
  let optionsResponse;
  try {
    optionsResponse = await yahooFinance.options(toYahooSymbol(tickerSymbol), { date });
  } catch (error) {
    console.error(`[MARKET-DATA] yahoo chain failed for ${tickerSymbol} ${expiration}:`, error);
    throw classifyProviderError(error, `${tickerSymbol} ${expiration} chain`);
  }
  const chain = optionsResponse.options.find(option => toIsoDate(option.expirationDate) === expiration);
  if (!chain) return [];
  const contracts = side === 'PUT' ? chain.puts : chain.calls;
  return contracts.map(toQuote);
}

export function createYahooMarketData(): MarketDataSource {
  return {
    getSpotPrice: yahooSpotPrice,
    listExpirations: yahooExpirations,
    getChain: yahooChain,
  };
}
