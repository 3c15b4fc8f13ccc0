import { formatPercent, formatPrice, formatSignedPercent, type Translate } from '../utils/formatting.js';
import type { ExpirationMetrics, ReportResult, StrategySide } from '../yield/types.js';

export function formatReportRow(row: ExpirationMetrics): string {
  return [
    row.expiration,
    `${row.daysToExpiry}d`,
    formatPrice(row.premium),
    formatSignedPercent(row.moneynessPct),
    `<b>${formatPercent(row.annualizedReturnPct, 2)}</b>`,
  ].join(' · ');
}

export function buildReportMessage(
  i18nT: Translate,
  ticker: string,
  side: StrategySide,
  targetStrike: number,
  spotPrice: number,
  result: ReportResult,
): string {
  const strike = formatPrice(targetStrike);
  if (!result.best) {
    return i18nT('report.empty', { ticker, strike });
  }

  const lines = [
    i18nT('report.header', { ticker, side: i18nT(`side.${side}`), strike, spot: formatPrice(spotPrice) }),
    ...result.rows.map(formatReportRow),
    '',
    i18nT('report.best', {
      expiration: result.best.expiration,
      apy: formatPercent(result.best.annualizedReturnPct, 2),
    }),
  ];
  if (side === 'CALL') {
    lines.push(i18nT('report.call_note', { spot: formatPrice(spotPrice) }));
  }
  return lines.join('\n');
}
