export type Translate = (key: string, params?: Record<string, string | number>) => string;

export function formatPrice(amount: number, places = 2): string {
  return `$${formatPlain(amount, places)}`;
}

export function formatPercent(percentage: number, places = 1): string {
  return `${percentage.toFixed(places)}%`;
}

export function formatSignedPercent(percentage: number, places = 1): string {
  const sign = percentage > 0 ? '+' : '';
  return `${sign}${percentage.toFixed(places)}%`;
}

function formatPlain(amount: number, places = 2): string {
  return amount.toFixed(places).replace(/\.00$/, '');
}
