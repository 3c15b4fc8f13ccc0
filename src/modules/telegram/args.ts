import type { StrategySide } from '../yield/types.js';

const SIDE_ALIASES: Record<string, StrategySide> = {
  put: 'PUT',
  p: 'PUT',
  csp: 'PUT',
  'sell-put': 'PUT',
  call: 'CALL',
  c: 'CALL',
  cc: 'CALL',
  'covered-call': 'CALL',
};

const TICKER_PATTERN = /^[A-Z0-9][A-Z0-9.\-^=]{0,14}$/;

export type ReportArgs = {
  ticker: string;
  side: StrategySide;
  targetStrike: number;
  horizonMonths?: number;
};

export type SeekArgs = {
  ticker: string;
  side: StrategySide;
  minAnnualReturnPct: number;
  horizonMonths?: number;
};

export type ParsedArgs<T> = { success: true; args: T } | { success: false };

export function parseSide(input: string): StrategySide | null {
  return SIDE_ALIASES[input.toLowerCase()] ?? null;
}

function parseTicker(input: string | undefined): string | null {
  if (!input) return null;
  const ticker = input.toUpperCase();
  return TICKER_PATTERN.test(ticker) ? ticker : null;
}

function parseNumber(input: string, check: (value: number) => boolean): number | null {
  const value = Number(input.replace(/[%$]/g, ''));
  return Number.isFinite(value) && check(value) ? value : null;
}

/**
 * Splits `TICKER [side] [number] [months]`. The side may be left out, in which case
 * puts are assumed; numbers left out fall back to the given defaults.
 */
function parseCommon(raw: string): { ticker: string; side: StrategySide; rest: string[] } | null {
  const [tickerInput, ...tail] = raw.trim().split(/\s+/).filter(Boolean);
  const ticker = parseTicker(tickerInput);
  if (!ticker) return null;

  const sideInput = tail[0];
  const side = sideInput ? parseSide(sideInput) : null;
  const rest = side ? tail.slice(1) : tail;
  if (rest.length > 2) return null;
  return { ticker, side: side ?? 'PUT', rest };
}

function parseHorizon(input: string | undefined): number | undefined | null {
  if (input === undefined) return undefined;
  return parseNumber(input, value => value > 0);
}

export function parseReportArgs(raw: string, defaultStrike: number): ParsedArgs<ReportArgs> {
  const common = parseCommon(raw);
  if (!common) return { success: false };
  const [strikeInput, monthsInput] = common.rest;

  const targetStrike = strikeInput === undefined ? defaultStrike : parseNumber(strikeInput, value => value > 0);
  const horizonMonths = parseHorizon(monthsInput);
  if (targetStrike === null || horizonMonths === null) return { success: false };

  return { success: true, args: { ticker: common.ticker, side: common.side, targetStrike, horizonMonths } };
}

export function parseSeekArgs(raw: string, defaultMinReturn: number): ParsedArgs<SeekArgs> {
  const common = parseCommon(raw);
  if (!common) return { success: false };
  const [returnInput, monthsInput] = common.rest;

  const minAnnualReturnPct =
    returnInput === undefined ? defaultMinReturn : parseNumber(returnInput, value => value >= 0);
  const horizonMonths = parseHorizon(monthsInput);
  if (minAnnualReturnPct === null || horizonMonths === null) return { success: false };

  return { success: true, args: { ticker: common.ticker, side: common.side, minAnnualReturnPct, horizonMonths } };
}
