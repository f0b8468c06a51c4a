export function clamp(value: number, lo: number, hi: number): number {
  if (Number.isNaN(value)) return lo;
  return Math.min(hi, Math.max(lo, value));
}

export function clamp01(value: number): number {
  return clamp(value, 0, 1);
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** Population variance (divides by n). */
export function variance(values: readonly number[]): number {
  const n = values.length;
  if (n === 0) return 0;
  const mu = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - mu) ** 2;
  return ss / n;
}

export function stdDev(values: readonly number[]): number {
  return Math.sqrt(variance(values));
}

/**
 * Biased sample autocovariance γ(0..maxLag), normalized by n as Yule-Walker
 * expects; this keeps the Toeplitz matrix positive semi-definite.
 */
export function autocovariance(values: readonly number[], maxLag: number): number[] {
  const n = values.length;
  const mu = mean(values);
  const out: number[] = [];
  for (let lag = 0; lag <= maxLag; lag++) {
    let sum = 0;
    for (let t = lag; t < n; t++) {
      sum += (values[t] - mu) * (values[t - lag] - mu);
    }
    out.push(n > 0 ? sum / n : 0);
  }
  return out;
}

/** Lag-k autocorrelation; 0 for a constant or too-short series. */
export function autocorrelation(values: readonly number[], lag: number): number {
  if (values.length <= lag) return 0;
  const gamma = autocovariance(values, lag);
  const g0 = gamma[0];
  if (!(g0 > 0)) return 0;
  return gamma[lag] / g0;
}

export function rootMeanSquare(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let ss = 0;
  for (const v of values) ss += v * v;
  return Math.sqrt(ss / values.length);
}

export function logistic(z: number): number {
  if (z > 500) return 1;
  if (z < -500) return 0;
  return 1 / (1 + Math.exp(-z));
}
