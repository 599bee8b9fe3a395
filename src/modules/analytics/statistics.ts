// ===========================================
// SERIES STATISTICS
// ===========================================

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// Population standard deviation (divides by n)
export function stdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const m = mean(values);
  return Math.sqrt(values.reduce((sum, v) => sum + (v - m) ** 2, 0) / values.length);
}

/**
 * Coefficient of variation as a percentage. 0 for an empty or zero-mean series.
 */
export function coefficientOfVariation(values: readonly number[]): number {
  const m = mean(values);
  return m > 0 ? (stdDev(values) / m) * 100 : 0;
}

export function pctChange(from: number, to: number): number {
  return from > 0 ? ((to - from) / from) * 100 : 0;
}
