import { InvalidInputError } from './errors.js';
import type { DerivedMetrics, LiquidityMode, Quote, StrategySide } from './types.js';

const DAY_MS = 24 * 3600 * 1000;

export function parseExpiration(expiration: string): Date {
  const expirationDate = new Date(`${expiration}T00:00:00Z`);
  if (isNaN(expirationDate.getTime())) {
    throw new InvalidInputError(`invalid expiration date: ${expiration}`);
  }
  return expirationDate;
}

/** Whole days left, can be zero or negative for elapsed dates. */
function rawDaysToExpiry(expiration: string, now: Date): number {
  return Math.floor((parseExpiration(expiration).getTime() - now.getTime()) / DAY_MS);
}

/** Calendar days from today's UTC date, so tomorrow is always 1. */
export function calendarDaysToExpiry(expiration: string, now: Date): number {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate());
  return Math.round((parseExpiration(expiration).getTime() - today) / DAY_MS);
}

export function computeDaysToExpiry(expiration: string, now: Date): number {
  return Math.max(1, rawDaysToExpiry(expiration, now));
}

export function resolvePremium(quote: Quote): number {
  if (quote.bid > 0 && quote.ask > 0) return (quote.bid + quote.ask) / 2;
  return quote.lastPrice;
}

export function capitalFor(side: StrategySide, strike: number, spotPrice: number): number {
  return side === 'PUT' ? strike : spotPrice;
}

export function moneynessFor(side: StrategySide, strike: number, spotPrice: number): number {
  const distance = side === 'PUT' ? spotPrice - strike : strike - spotPrice;
  return (distance / spotPrice) * 100;
}

/**
 * Derives yield metrics for one expiration's quotes.
 *
 * `strict` keeps only quotes with a live bid and is what the strike search uses.
 * `lenient` keeps every quote and lets the premium fall back to the last trade,
 * which is what the fixed-strike report shows. The two modes give different rows
 * for the same chain on purpose.
 */
export function assertSpotPrice(spotPrice: number): void {
  if (!Number.isFinite(spotPrice) || spotPrice <= 0) {
    throw new InvalidInputError(`spot price must be positive, got ${spotPrice}`);
  }
}

export function normalize(
  quotes: readonly Quote[],
  side: StrategySide,
  spotPrice: number,
  daysToExpiry: number,
  liquidity: LiquidityMode,
): DerivedMetrics[] {
  assertSpotPrice(spotPrice);
  if (!Number.isInteger(daysToExpiry) || daysToExpiry < 1) {
    throw new InvalidInputError(`days to expiry must be a whole number of at least 1, got ${daysToExpiry}`);
  }

  const rows: DerivedMetrics[] = [];
  for (const quote of quotes) {
    if (liquidity === 'strict' && !(quote.bid > 0)) continue;

    const premium = resolvePremium(quote);
    if (!(premium > 0)) continue;

    const capitalRequired = capitalFor(side, quote.strike, spotPrice);
    if (!(capitalRequired > 0)) {
      throw new InvalidInputError(`capital required must be positive, got ${capitalRequired} at strike ${quote.strike}`);
    }

    const returnOnCapital = premium / capitalRequired;
    rows.push({
      strike: quote.strike,
      premium,
      capitalRequired,
      daysToExpiry,
      returnOnCapital,
      // uncapped, so a one-day expiry can show a very large figure
      annualizedReturnPct: returnOnCapital * (365 / daysToExpiry) * 100,
      moneynessPct: moneynessFor(side, quote.strike, spotPrice),
      impliedVolatility: quote.impliedVolatility,
    });
  }
  return rows;
}
