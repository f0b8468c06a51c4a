/**
 * Quantile-based cut points over an empirical sample.
 *
 * Uses the lower nearest-rank rule `sorted[floor((n - 1) * q)]`, so every
 * returned threshold is an observed sample value. Input order never matters
 * because the sample is fully sorted first.
 */
export function quantileThresholds(
  samples: readonly number[],
  quantiles: readonly number[],
): number[] {
  const sorted = samples.filter(Number.isFinite).sort((a, b) => a - b);
  if (sorted.length === 0) return quantiles.map(() => 0);

  const last = sorted.length - 1;
  return quantiles.map((q) => {
    const level = Number.isFinite(q) ? Math.min(1, Math.max(0, q)) : 0;
    return sorted[Math.floor(last * level)] ?? 0;
  });
}

export const STRENGTH_QUANTILES = [0.25, 0.75] as const;

/** Lower and upper quartile of the candidate strengths. */
export interface StrengthCutPoints {
  readonly lower: number;
  readonly upper: number;
}

export function strengthCutPoints(samples: readonly number[]): StrengthCutPoints {
  const [lower = 0, upper = 0] = quantileThresholds(samples, STRENGTH_QUANTILES);
  return { lower, upper };
}

/**
 * Index of the band `value` falls in, given ascending cut points:
 * 0 below the first cut, `cuts.length` at or above the last.
 */
export function bandOf(value: number, cuts: readonly number[]): number {
  let band = 0;
  for (const cut of cuts) {
    if (value >= cut) band++;
    else break;
  }
  return band;
}
