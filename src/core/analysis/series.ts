interface Timestamped {
  timestamp: Date;
}

/**
 * Returns a copy ordered by timestamp. The sort is stable, so points sharing a
 * timestamp keep their input order and are not merged.
 */
export function sortByTimestamp<T extends Timestamped>(points: readonly T[]): T[] {
  return [...points].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Simple period returns `p[t] / p[t-1] - 1`. The result has one element fewer
 * than the input.
 */
export function simpleReturns(values: readonly number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < values.length; i++) {
    returns.push(values[i] / values[i - 1] - 1);
  }
  return returns;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Sample standard deviation (N-1 denominator).
 * @returns 0 if fewer than 2 values
 */
export function sampleStdDev(values: readonly number[]): number {
  const n = values.length;
  if (n < 2) return 0;

  const avg = mean(values);
  const variance = values.reduce((sum, value) => sum + Math.pow(value - avg, 2), 0) / (n - 1);
  return Math.sqrt(variance);
}

/**
 * Pearson correlation of two equally long samples.
 * @returns null when fewer than 2 pairs or either side has zero variance
 */
export function pearson(xs: readonly number[], ys: readonly number[]): number | null {
  const n = Math.min(xs.length, ys.length);
  if (n < 2) return null;

  const meanX = mean(xs.slice(0, n));
  const meanY = mean(ys.slice(0, n));
  let covariance = 0;
  let varianceX = 0;
  let varianceY = 0;

  for (let i = 0; i < n; i++) {
    const dx = xs[i] - meanX;
    const dy = ys[i] - meanY;
    covariance += dx * dy;
    varianceX += dx * dx;
    varianceY += dy * dy;
  }

  if (varianceX === 0 || varianceY === 0) return null;
  return clamp(covariance / Math.sqrt(varianceX * varianceY), -1, 1);
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function head<T>(values: readonly T[], count: number): T[] {
  return values.slice(0, Math.max(count, 0));
}

export function tail<T>(values: readonly T[], count: number): T[] {
  return count <= 0 ? [] : values.slice(-count);
}

/** Percentage change between the first and last value, or null if the first is not positive. */
export function percentChange(first: number, last: number): number | null {
  if (!(first > 0)) return null;
  return ((last - first) / first) * 100;
}

/** Every price finite and non-negative, and every price that divides a return positive. */
export function isReturnSeries(prices: readonly number[]): boolean {
  return prices.length > 0
    && prices.every(price => Number.isFinite(price) && price >= 0)
    && prices.slice(0, -1).every(price => price > 0);
}
