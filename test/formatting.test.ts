import { describe, expect, it } from 'vitest';
import { buildReportMessage, formatReportRow } from '../src/modules/report/formatting.js';
import { buildSeekMessage, buildSeekProgress, formatSeekerRow } from '../src/modules/seek/formatting.js';
import { formatPercent, formatPrice, formatSignedPercent, type Translate } from '../src/modules/utils/formatting.js';
import type { ExpirationMetrics, SeekerResult } from '../src/modules/yield/types.js';

const i18nT: Translate = (key, params) => (params ? `${key} ${JSON.stringify(params)}` : key);

const reportRow: ExpirationMetrics = {
  expiration: '2026-11-20',
  strike: 90,
  premium: 2,
  capitalRequired: 90,
  daysToExpiry: 31,
  returnOnCapital: 2 / 90,
  annualizedReturnPct: 26.125,
  moneynessPct: 10,
  impliedVolatility: 0.3,
};

const seekerRow: SeekerResult = {
  expiration: '2026-11-20',
  strike: 80,
  premium: 0.75,
  capitalRequired: 80,
  daysToExpiry: 31,
  returnOnCapital: 0.75 / 80,
  annualizedReturnPct: 11.5,
  moneynessPct: 20,
  impliedVolatility: 0.35,
  safetyGap: 0.2,
};

describe('formatting helpers', () => {
  it('formats prices and percentages', () => {
    expect(formatPrice(170)).toBe('$170');
    expect(formatPrice(1.25)).toBe('$1.25');
    expect(formatPercent(12.34)).toBe('12.3%');
    expect(formatPercent(27.037, 2)).toBe('27.04%');
    expect(formatSignedPercent(5)).toBe('+5.0%');
    expect(formatSignedPercent(-2.5)).toBe('-2.5%');
  });
});

describe('report message', () => {
  it('formats one row per expiration', () => {
    expect(formatReportRow(reportRow)).toBe('2026-11-20 · 31d · $2 · +10.0% · <b>26.13%</b>');
  });

  it('lists rows and the best expiration', () => {
    const message = buildReportMessage(i18nT, 'NVDA', 'PUT', 90, 100, {
      rows: [reportRow],
      best: reportRow,
      outcomes: [],
    });

    expect(message.split('\n')).toEqual([
      'report.header {"ticker":"NVDA","side":"side.PUT","strike":"$90","spot":"$100"}',
      '2026-11-20 · 31d · $2 · +10.0% · <b>26.13%</b>',
      '',
      'report.best {"expiration":"2026-11-20","apy":"26.13%"}',
    ]);
  });

  it('notes the capital basis for calls', () => {
    const message = buildReportMessage(i18nT, 'NVDA', 'CALL', 90, 100, {
      rows: [reportRow],
      best: reportRow,
      outcomes: [],
    });

    expect(message.split('\n').at(-1)).toBe('report.call_note {"spot":"$100"}');
  });

  it('says when no contract was found', () => {
    expect(buildReportMessage(i18nT, 'NVDA', 'PUT', 170, 100, { rows: [], best: null, outcomes: [] })).toBe(
      'report.empty {"ticker":"NVDA","strike":"$170"}',
    );
  });
});

describe('seek message', () => {
  it('formats a result row', () => {
    expect(formatSeekerRow(seekerRow)).toBe('2026-11-20 · 31d · <b>$80</b> · IV 35.0% · $0.75 · 11.50% · +20.0%');
    expect(formatSeekerRow({ ...seekerRow, impliedVolatility: null })).toContain('· IV N/A ·');
  });

  it('formats progress', () => {
    expect(buildSeekProgress(i18nT, 0, 10, '2026-11-20')).toBe(
      'seek.progress {"current":1,"total":10,"expiration":"2026-11-20"}',
    );
  });

  it('lists results with a summary line', () => {
    const message = buildSeekMessage(i18nT, 'NVDA', 'PUT', 15, 100, {
      status: 'complete',
      results: [seekerRow],
      outcomes: [],
    });

    expect(message.split('\n')).toEqual([
      'seek.header {"ticker":"NVDA","side":"side.PUT","target":"15.0%","spot":"$100"}',
      '2026-11-20 · 31d · <b>$80</b> · IV 35.0% · $0.75 · 11.50% · +20.0%',
      '',
      'seek.found {"count":1}',
    ]);
  });

  it('keeps partial results when rate limited', () => {
    const message = buildSeekMessage(i18nT, 'NVDA', 'CALL', 15, 100, {
      status: 'rate_limited',
      results: [],
      outcomes: [],
    });

    expect(message.split('\n')).toEqual([
      'seek.header {"ticker":"NVDA","side":"side.CALL","target":"15.0%","spot":"$100"}',
      '',
      'seek.rate_limited {"count":0}',
    ]);
  });

  it('suggests a lower target when nothing qualifies', () => {
    expect(buildSeekMessage(i18nT, 'NVDA', 'PUT', 40, 100, { status: 'complete', results: [], outcomes: [] })).toBe(
      'seek.empty {"ticker":"NVDA","target":"40.0%"}',
    );
  });
});
