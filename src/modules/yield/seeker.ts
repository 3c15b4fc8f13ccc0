import { logStep } from '../utils/log.js';
import { RateLimitedError, errorMessage } from './errors.js';
import { computeDaysToExpiry, normalize } from './normalizer.js';
import type {
  ChainFetcher,
  DerivedMetrics,
  ExpirationOutcome,
  ProgressListener,
  SeekResult,
  SeekerResult,
  StrategySide,
} from './types.js';

export type SeekRequest = {
  ticker: string;
  expirations: readonly string[];
  fetcher: ChainFetcher;
  side: StrategySide;
  spotPrice: number;
  minAnnualReturnPct: number;
  now?: Date;
  onProgress?: ProgressListener;
};

/**
 * Picks the strike furthest out of the money among the qualifiers:
 * the lowest strike for puts and the highest for calls.
 */
export function pickSafestStrike(qualifiers: readonly DerivedMetrics[], side: StrategySide): DerivedMetrics | null {
  const ordered = [...qualifiers].sort((left, right) =>
    side === 'PUT' ? left.strike - right.strike : right.strike - left.strike,
  );
  return ordered[0] ?? null;
}

async function evaluateExpiration(request: SeekRequest, expiration: string, now: Date): Promise<ExpirationOutcome> {
  const { ticker, fetcher, side, spotPrice, minAnnualReturnPct } = request;
  const daysToExpiry = computeDaysToExpiry(expiration, now);

  let chain;
  try {
    chain = await fetcher.getChain(ticker, expiration, side);
  } catch (error) {
    if (error instanceof RateLimitedError) return { kind: 'rate_limited', expiration };
    return { kind: 'skipped_error', expiration, message: errorMessage(error) };
  }

  const candidates = normalize(chain, side, spotPrice, daysToExpiry, 'strict');
  if (candidates.length === 0) return { kind: 'skipped_no_data', expiration };

  const qualifiers = candidates.filter(row => row.annualizedReturnPct >= minAnnualReturnPct);
  const chosen = pickSafestStrike(qualifiers, side);
  if (!chosen) return { kind: 'no_qualifier', expiration, candidates: candidates.length };

  return {
    kind: 'qualified',
    expiration,
    result: { ...chosen, expiration, safetyGap: chosen.moneynessPct / 100 },
  };
}

export async function seek(request: SeekRequest): Promise<SeekResult> {
  const { ticker, expirations, onProgress } = request;
  const now = request.now ?? new Date();
  const results: SeekerResult[] = [];
  const outcomes: ExpirationOutcome[] = [];

  for (const [index, expiration] of expirations.entries()) {
    const outcome = await evaluateExpiration(request, expiration, now);
    outcomes.push(outcome);
    await onProgress?.(outcome, index, expirations.length);

    if (outcome.kind === 'rate_limited') {
      logStep(ticker, 'seek/rate_limited', `${expiration} after ${results.length} results`);
      return { status: 'rate_limited', results, outcomes };
    }
    if (outcome.kind === 'qualified') {
      results.push(outcome.result);
      logStep(ticker, 'seek/expiration', `${expiration} strike=${outcome.result.strike}`);
    } else {
      logStep(ticker, 'seek/expiration', `${expiration} ${outcome.kind}`);
    }
  }

  logStep(ticker, 'seek/done', `${results.length}/${expirations.length}`);
  return { status: 'complete', results, outcomes };
}
