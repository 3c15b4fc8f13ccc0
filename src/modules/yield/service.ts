import { logStep } from '../utils/log.js';
import { NoDataError, YieldError, type YieldErrorCode } from './errors.js';
import { selectExpirations } from './expirations.js';
import { assertSpotPrice } from './normalizer.js';
import { report } from './reporter.js';
import { seek } from './seeker.js';
import type { MarketDataSource, ProgressListener, ReportResult, SeekResult, StrategySide } from './types.js';

type EvaluationBase = {
  ticker: string;
  side: StrategySide;
  horizonMonths?: number;
  scanLimit: number;
  now?: Date;
  onProgress?: ProgressListener;
};

export type ReportParams = EvaluationBase & { targetStrike: number };
export type SeekParams = EvaluationBase & { minAnnualReturnPct: number };

export type EvaluationFailure = { success: false; error: YieldErrorCode; message: string };
export type Evaluation<T> =
  | { success: true; ticker: string; spotPrice: number; expirations: string[]; result: T }
  | EvaluationFailure;

async function prepare(source: MarketDataSource, params: EvaluationBase, now: Date) {
  const { ticker } = params;
  const spotPrice = await source.getSpotPrice(ticker);
  logStep(ticker, 'spot', spotPrice.toFixed(2));
  assertSpotPrice(spotPrice);

  const available = await source.listExpirations(ticker);
  if (available.length === 0) throw new NoDataError(`no option expirations for ${ticker}`);

  const expirations = selectExpirations(available, {
    now,
    horizonMonths: params.horizonMonths,
    scanLimit: params.scanLimit,
  });
  logStep(ticker, 'expirations', `${expirations.length}/${available.length}`);
  return { spotPrice, expirations };
}

async function evaluate<T>(
  params: EvaluationBase,
  run: (now: Date) => Promise<{ spotPrice: number; expirations: string[]; result: T }>,
): Promise<Evaluation<T>> {
  try {
    const { spotPrice, expirations, result } = await run(params.now ?? new Date());
    return { success: true, ticker: params.ticker, spotPrice, expirations, result };
  } catch (error) {
    if (error instanceof YieldError) {
      logStep(params.ticker, 'evaluate/failed', error.code);
      return { success: false, error: error.code, message: error.message };
    }
    throw error;
  }
}

export function evaluateReport(source: MarketDataSource, params: ReportParams): Promise<Evaluation<ReportResult>> {
  return evaluate(params, async now => {
    const { spotPrice, expirations } = await prepare(source, params, now);
    const result = await report({
      ticker: params.ticker,
      expirations,
      fetcher: source,
      side: params.side,
      targetStrike: params.targetStrike,
      spotPrice,
      now,
      onProgress: params.onProgress,
    });
    return { spotPrice, expirations, result };
  });
}

export function evaluateSeek(source: MarketDataSource, params: SeekParams): Promise<Evaluation<SeekResult>> {
  return evaluate(params, async now => {
    const { spotPrice, expirations } = await prepare(source, params, now);
    const result = await seek({
      ticker: params.ticker,
      expirations,
      fetcher: source,
      side: params.side,
      spotPrice,
      minAnnualReturnPct: params.minAnnualReturnPct,
      now,
      onProgress: params.onProgress,
    });
    return { spotPrice, expirations, result };
  });
}
