import type { CascadeFactors, CascadeStrengthClass, CascadeTiming, MinuteWindow } from "../types.js";
import type { CascadeWeights } from "../config/types.js";
import { clamp01 } from "../stats/descriptive.js";
import { bandOf, type StrengthCutPoints } from "../stats/thresholds.js";

export const DEFAULT_WEIGHTS: CascadeWeights = {
  temporal: 0.25,
  spatial: 0.25,
  durationCorrelation: 0.25,
  historical: 0.25,
};

export const NEUTRAL_PRIOR = 0.5;

/** 1 at the window midpoint, falling linearly to 0 at either edge. */
export function temporalFactor(delayMinutes: number, window: MinuteWindow): number {
  const half = (window.max - window.min) / 2;
  if (half <= 0) return 1;
  const mid = window.min + half;
  return clamp01(1 - Math.abs(delayMinutes - mid) / half);
}

export function spatialFactor(distanceKm: number, maxDistanceKm: number): number {
  if (maxDistanceKm <= 0) return 0;
  return clamp01(1 - distanceKm / maxDistanceKm);
}

/** Similarity of two durations; neutral when either is unknown. */
export function durationCorrelation(a: number | null, b: number | null): number {
  if (a === null || b === null) return NEUTRAL_PRIOR;
  return clamp01(1 - Math.abs(a - b) / Math.max(a, b, 1));
}

export interface PairHistory {
  seen: number;
  qualifying: number;
}

export function historicalFactor(history: PairHistory | undefined): number {
  if (!history || history.seen === 0) return NEUTRAL_PRIOR;
  return clamp01(history.qualifying / history.seen);
}

/** Weighted mean of the factors; weights need not sum to 1. */
export function combineFactors(factors: CascadeFactors, weights: CascadeWeights = DEFAULT_WEIGHTS): number {
  const total = weights.temporal + weights.spatial + weights.durationCorrelation + weights.historical;
  if (total <= 0) return 0;
  const sum =
    factors.temporal * weights.temporal +
    factors.spatial * weights.spatial +
    factors.durationCorrelation * weights.durationCorrelation +
    factors.historical * weights.historical;
  return clamp01(sum / total);
}

/** Below the lower quartile: weak; below the upper quartile: moderate; else strong. */
export function classifyStrength(strength: number, cuts: StrengthCutPoints): CascadeStrengthClass {
  const band = bandOf(strength, [cuts.lower, cuts.upper]);
  if (band === 0) return "weak";
  if (band === 1) return "moderate";
  return "strong";
}

export function classifyTiming(delayMinutes: number, immediateThresholdMinutes: number): CascadeTiming {
  return delayMinutes < immediateThresholdMinutes ? "immediate" : "delayed";
}
