import { COMPUTE_TIERS, type ComputeTier } from "../types.js";

export const DEFAULT_TIER: ComputeTier = "standard";

export function isComputeTier(value: unknown): value is ComputeTier {
  return typeof value === "string" && COMPUTE_TIERS.some((t) => t === value);
}

/** Unrecognized values behave as "standard". */
export function resolveTier(value: unknown): ComputeTier {
  return isComputeTier(value) ? value : DEFAULT_TIER;
}

/** Next cheaper tier, or null below "minimal". */
export function lowerTier(tier: ComputeTier): ComputeTier | null {
  const index = COMPUTE_TIERS.indexOf(tier);
  return index > 0 ? COMPUTE_TIERS[index - 1] : null;
}

/** `tier` followed by every cheaper tier, most expensive first. */
export function fallbackChain(tier: ComputeTier): ComputeTier[] {
  const chain: ComputeTier[] = [];
  for (let t: ComputeTier | null = tier; t !== null; t = lowerTier(t)) chain.push(t);
  return chain;
}
