import { formatPercent, formatPrice, formatSignedPercent, type Translate } from '../utils/formatting.js';
import type { SeekResult, SeekerResult, StrategySide } from '../yield/types.js';

export function formatSeekerRow(result: SeekerResult): string {
  const iv = result.impliedVolatility === null ? 'N/A' : formatPercent(result.impliedVolatility * 100);
  return [
    result.expiration,
    `${result.daysToExpiry}d`,
    `<b>${formatPrice(result.strike)}</b>`,
    `IV ${iv}`,
    formatPrice(result.premium),
    formatPercent(result.annualizedReturnPct, 2),
    formatSignedPercent(result.safetyGap * 100),
  ].join(' · ');
}

export function buildSeekProgress(i18nT: Translate, index: number, total: number, expiration: string): string {
  return i18nT('seek.progress', { current: index + 1, total, expiration });
}

export function buildSeekMessage(
  i18nT: Translate,
  ticker: string,
  side: StrategySide,
  minAnnualReturnPct: number,
  spotPrice: number,
  outcome: SeekResult,
): string {
  const target = formatPercent(minAnnualReturnPct);
  const rateLimited = outcome.status === 'rate_limited';

  if (outcome.results.length === 0 && !rateLimited) {
    return i18nT('seek.empty', { ticker, target });
  }

  const lines = [
    i18nT('seek.header', { ticker, side: i18nT(`side.${side}`), target, spot: formatPrice(spotPrice) }),
    ...outcome.results.map(formatSeekerRow),
  ];
  if (rateLimited) {
    lines.push('', i18nT('seek.rate_limited', { count: outcome.results.length }));
  } else {
    lines.push('', i18nT('seek.found', { count: outcome.results.length }));
  }
  return lines.join('\n');
}
