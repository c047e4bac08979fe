// Prices are quoted to the nearest 10,000 currency units
export const PRICE_ROUNDING_UNIT = 10_000;

export function roundToUnit(value: number, unit = PRICE_ROUNDING_UNIT): number {
  return Math.round(value / unit) * unit;
}

export function roundToDecimals(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/** Element at index floor(n/2) of the ascending sort */
export function upperMedian(values: number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

export function coefficientOfVariation(values: number[]): number {
  const avg = mean(values);
  if (avg === 0) return 0;
  const variance = values.reduce((acc, v) => acc + (v - avg) ** 2, 0) / values.length;
  return Math.sqrt(variance) / avg;
}

export function formatCurrency(value: number): string {
  return `¥${Math.round(value).toLocaleString('en-US')}`;
}
