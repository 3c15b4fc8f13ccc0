import { logStep } from '../utils/log.js';
import { errorMessage } from './errors.js';
import { computeDaysToExpiry, normalize } from './normalizer.js';
import type {
  ChainFetcher,
  ExpirationMetrics,
  ExpirationOutcome,
  ProgressListener,
  ReportResult,
  StrategySide,
} from './types.js';

export type ReportRequest = {
  ticker: string;
  expirations: readonly string[];
  fetcher: ChainFetcher;
  side: StrategySide;
  targetStrike: number;
  spotPrice: number;
  now?: Date;
  onProgress?: ProgressListener;
};

export function pickBestExpiration(rows: readonly ExpirationMetrics[]): ExpirationMetrics | null {
  let best: ExpirationMetrics | null = null;
  for (const row of rows) {
    // strict comparison keeps the earliest expiration on ties
    if (!best || row.annualizedReturnPct > best.annualizedReturnPct) best = row;
  }
  return best;
}

async function evaluateExpiration(request: ReportRequest, expiration: string, now: Date): Promise<ExpirationOutcome> {
  const { ticker, fetcher, side, targetStrike, spotPrice } = request;
  const daysToExpiry = computeDaysToExpiry(expiration, now);

  let chain;
  try {
    chain = await fetcher.getChain(ticker, expiration, side);
  } catch (error) {
    return { kind: 'skipped_error', expiration, message: errorMessage(error) };
  }

  // exact match only, strikes come from the same provider as the request
  const contract = chain.find(quote => quote.strike === targetStrike);
  if (!contract) return { kind: 'skipped_no_data', expiration };

  const [metrics] = normalize([contract], side, spotPrice, daysToExpiry, 'lenient');
  if (!metrics) return { kind: 'skipped_no_data', expiration };

  return { kind: 'normalized', expiration, row: { ...metrics, expiration } };
}

export async function report(request: ReportRequest): Promise<ReportResult> {
  const { ticker, expirations, onProgress } = request;
  const now = request.now ?? new Date();
  const rows: ExpirationMetrics[] = [];
  const outcomes: ExpirationOutcome[] = [];

  for (const [index, expiration] of expirations.entries()) {
    const outcome = await evaluateExpiration(request, expiration, now);
    outcomes.push(outcome);
    if (outcome.kind === 'normalized') {
      rows.push(outcome.row);
      logStep(ticker, 'report/expiration', `${expiration} apy=${outcome.row.annualizedReturnPct.toFixed(2)}`);
    } else {
      logStep(ticker, 'report/expiration', `${expiration} ${outcome.kind}`);
    }
    await onProgress?.(outcome, index, expirations.length);
  }

  const best = pickBestExpiration(rows);
  logStep(ticker, 'report/done', `${rows.length}/${expirations.length}`);
  return { rows, best, outcomes };
}
