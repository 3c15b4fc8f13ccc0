export type StrategySide = 'PUT' | 'CALL';

export type LiquidityMode = 'lenient' | 'strict';

export type Quote = {
  strike: number;
  bid: number;
  ask: number;
  lastPrice: number;
  impliedVolatility: number | null;
};

export type DerivedMetrics = {
  strike: number;
  premium: number;
  capitalRequired: number;
  daysToExpiry: number;
  returnOnCapital: number;
  annualizedReturnPct: number;
  moneynessPct: number;
  impliedVolatility: number | null;
};

export type ExpirationMetrics = DerivedMetrics & {
  expiration: string;
};

export type SeekerResult = ExpirationMetrics & {
  // moneyness as a fraction of spot
  safetyGap: number;
};

export interface ChainFetcher {
  getChain(ticker: string, expiration: string, side: StrategySide): Promise<Quote[]>;
}

export interface MarketDataSource extends ChainFetcher {
  getSpotPrice(ticker: string): Promise<number>;
  listExpirations(ticker: string): Promise<string[]>;
}

export type ExpirationOutcome =
  | { kind: 'normalized'; expiration: string; row: ExpirationMetrics }
  | { kind: 'skipped_no_data'; expiration: string }
  | { kind: 'skipped_error'; expiration: string; message: string }
  | { kind: 'qualified'; expiration: string; result: SeekerResult }
  | { kind: 'no_qualifier'; expiration: string; candidates: number }
  | { kind: 'rate_limited'; expiration: string };

export type ProgressListener = (outcome: ExpirationOutcome, index: number, total: number) => void | Promise<void>;

export type ReportResult = {
  rows: ExpirationMetrics[];
  best: ExpirationMetrics | null;
  outcomes: ExpirationOutcome[];
};

export type SeekResult = {
  status: 'complete' | 'rate_limited';
  results: SeekerResult[];
  outcomes: ExpirationOutcome[];
};
