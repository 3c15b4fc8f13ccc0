import { describe, expect, it } from 'vitest';
import { FetchError, InvalidInputError, RateLimitedError } from '../src/modules/yield/errors.js';
import { pickBestExpiration, report } from '../src/modules/yield/reporter.js';
import type { ExpirationOutcome } from '../src/modules/yield/types.js';
import { FakeChainFetcher, quote } from './fakes.js';

const now = new Date('2026-10-19T12:00:00Z');
const expirations = ['2026-10-23', '2026-11-20', '2026-12-18'];

function baseRequest(fetcher: FakeChainFetcher) {
  return { ticker: 'NVDA', expirations, fetcher, side: 'PUT' as const, targetStrike: 90, spotPrice: 100, now };
}

describe('report', () => {
  it('builds one row per expiration that lists the strike', async () => {
    const fetcher = new FakeChainFetcher()
      .set('2026-10-23', 'PUT', [quote({ strike: 85, bid: 0.25, ask: 0.5 }), quote({ strike: 90, bid: 0.5, ask: 0.75 })])
      .set('2026-11-20', 'PUT', [quote({ strike: 85, bid: 1, ask: 1.5 }), quote({ strike: 95, bid: 3, ask: 3.5 })])
      .set('2026-12-18', 'PUT', [quote({ strike: 90, bid: 0, ask: 0, lastPrice: 3 })]);

    const result = await report(baseRequest(fetcher));

    expect(result.rows.map(row => row.expiration)).toEqual(['2026-10-23', '2026-12-18']);
    expect(result.rows.map(row => row.daysToExpiry)).toEqual([3, 59]);
    expect(result.rows[0].premium).toBe(0.625);
    expect(result.rows[0].annualizedReturnPct).toBeCloseTo(84.49, 2);
    // no live quotes, so the report shows the last trade
    expect(result.rows[1].premium).toBe(3);
    expect(result.rows[1].annualizedReturnPct).toBeCloseTo(20.62, 2);
    expect(result.best?.expiration).toBe('2026-10-23');
    expect(result.outcomes.map(outcome => outcome.kind)).toEqual(['normalized', 'skipped_no_data', 'normalized']);
  });

  it('reads the call chain and uses spot as capital for calls', async () => {
    const fetcher = new FakeChainFetcher()
      .set('2026-11-20', 'PUT', [quote({ strike: 110, bid: 10, ask: 11 })])
      .set('2026-11-20', 'CALL', [quote({ strike: 110, bid: 1, ask: 2 })]);

    const result = await report({ ...baseRequest(fetcher), expirations: ['2026-11-20'], side: 'CALL', targetStrike: 110 });

    expect(result.rows).toHaveLength(1);
    expect(result.rows[0].capitalRequired).toBe(100);
    expect(result.rows[0].premium).toBe(1.5);
    expect(fetcher.calls).toEqual(['NVDA:2026-11-20:CALL']);
  });

  it('matches the strike exactly', async () => {
    const fetcher = new FakeChainFetcher().set('2026-10-23', 'PUT', [quote({ strike: 90.5, bid: 1, ask: 1 })]);

    const result = await report({ ...baseRequest(fetcher), expirations: ['2026-10-23'] });

    expect(result.rows).toEqual([]);
  });

  it('returns no rows and no recommendation when the strike is never listed', async () => {
    const fetcher = new FakeChainFetcher();

    const result = await report(baseRequest(fetcher));

    expect(result.rows).toEqual([]);
    expect(result.best).toBeNull();
    expect(result.outcomes.every(outcome => outcome.kind === 'skipped_no_data')).toBe(true);
  });

  it('skips expirations whose chain cannot be fetched', async () => {
    const fetcher = new FakeChainFetcher()
      .set('2026-10-23', 'PUT', new FetchError('boom'))
      .set('2026-11-20', 'PUT', new RateLimitedError())
      .set('2026-12-18', 'PUT', [quote({ strike: 90, bid: 1, ask: 2 })]);

    const result = await report(baseRequest(fetcher));

    expect(result.rows.map(row => row.expiration)).toEqual(['2026-12-18']);
    expect(result.outcomes[0]).toEqual({ kind: 'skipped_error', expiration: '2026-10-23', message: 'boom' });
    expect(result.outcomes[1].kind).toBe('skipped_error');
    expect(fetcher.calls).toHaveLength(3);
  });

  it('prefers the earliest expiration on equal yields', async () => {
    const fetcher = new FakeChainFetcher()
      .set('2026-10-01', 'PUT', [quote({ strike: 90, bid: 1, ask: 1 })])
      .set('2026-10-02', 'PUT', [quote({ strike: 90, bid: 1, ask: 1 })]);

    const result = await report({ ...baseRequest(fetcher), expirations: ['2026-10-01', '2026-10-02'] });

    expect(result.rows.map(row => row.daysToExpiry)).toEqual([1, 1]);
    expect(result.best?.expiration).toBe('2026-10-01');
  });

  it('reports progress for every expiration in order', async () => {
    const fetcher = new FakeChainFetcher().set('2026-11-20', 'PUT', [quote({ strike: 90, bid: 1, ask: 2 })]);
    const seen: Array<[ExpirationOutcome['kind'], number, number]> = [];

    await report({ ...baseRequest(fetcher), onProgress: (outcome, index, total) => void seen.push([outcome.kind, index, total]) });

    expect(seen).toEqual([
      ['skipped_no_data', 0, 3],
      ['normalized', 1, 3],
      ['skipped_no_data', 2, 3],
    ]);
  });

  it('rejects an invalid spot price', async () => {
    const fetcher = new FakeChainFetcher().set('2026-10-23', 'PUT', [quote({ strike: 90, bid: 1, ask: 1 })]);

    await expect(report({ ...baseRequest(fetcher), spotPrice: 0 })).rejects.toBeInstanceOf(InvalidInputError);
  });
});

describe('pickBestExpiration', () => {
  it('returns null for no rows', () => {
    expect(pickBestExpiration([])).toBeNull();
  });
});
