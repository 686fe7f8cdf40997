/**
 * Sample statistics over loss arrays. Callers guarantee a non-empty input.
 *
 * Estimators:
 * - standard deviation: sample (n - 1 denominator), 0 when n = 1
 * - skewness: adjusted Fisher–Pearson G1, null when n < 3 or spread is 0
 * - percentiles: linear interpolation at (n - 1) * p
 */

export function mean(values: readonly number[]): number {
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function sampleStdDev(values: readonly number[], mu: number = mean(values)): number {
  const n = values.length;
  if (n < 2) return 0;
  let sumSq = 0;
  for (const v of values) sumSq += (v - mu) ** 2;
  return Math.sqrt(sumSq / (n - 1));
}

export function adjustedSkewness(values: readonly number[], mu: number = mean(values)): number | null {
  const n = values.length;
  if (n < 3) return null;
  let m2 = 0;
  let m3 = 0;
  for (const v of values) {
    const d = v - mu;
    m2 += d * d;
    m3 += d * d * d;
  }
  m2 /= n;
  m3 /= n;
  if (m2 === 0) return null;
  const g1 = m3 / Math.pow(m2, 1.5);
  return (g1 * Math.sqrt(n * (n - 1))) / (n - 2);
}

/** Stable descending copy; equal values keep their input order. */
export function sortDescending(values: readonly number[]): number[] {
  return values.slice().sort((a, b) => b - a);
}

/**
 * Linear-interpolated percentile (0–100) read off a descending-sorted array.
 * Ascending rank k sits at descending index n - 1 - k.
 */
export function percentileFromDescending(sortedDesc: readonly number[], percentile: number): number {
  const n = sortedDesc.length;
  const ascending = (k: number) => sortedDesc[n - 1 - k] ?? 0;
  const h = ((n - 1) * percentile) / 100;
  const lo = Math.floor(h);
  const hi = Math.min(Math.ceil(h), n - 1);
  const a = ascending(lo);
  return a + (h - lo) * (ascending(hi) - a);
}
