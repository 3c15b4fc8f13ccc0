import { calendarDaysToExpiry } from './normalizer.js';

export const DAYS_PER_MONTH = 30;
export const DEFAULT_REPORT_SCAN_LIMIT = 8;
export const DEFAULT_SEEK_SCAN_LIMIT = 10;

export type ExpirationWindow = {
  now: Date;
  horizonMonths?: number;
  scanLimit?: number;
};

export function selectExpirations(expirations: readonly string[], window: ExpirationWindow): string[] {
  let selected = [...expirations];
  const { horizonMonths, scanLimit } = window;
  if (horizonMonths !== undefined) {
    const maxDays = horizonMonths * DAYS_PER_MONTH;
    selected = selected.filter(expiration => {
      const days = calendarDaysToExpiry(expiration, window.now);
      return days > 0 && days <= maxDays;
    });
  }
  if (scanLimit !== undefined) {
    selected = selected.slice(0, Math.max(0, scanLimit));
  }
  return selected;
}
