import type { Logger } from "./logging/logger.js";

// ── Inputs ──

/** Epoch milliseconds. */
export type Timestamp = number;

export interface SpanEvent {
  readonly entityId: string;
  readonly entityLabel: string;
  readonly openTime: Timestamp;
  /** Absent while the entity is still open. */
  readonly closeTime?: Timestamp;
  /** Defined once closed; derived from closeTime when omitted. */
  readonly durationMinutes?: number;
  readonly latitude: number;
  readonly longitude: number;
}

export interface EntityLocation {
  readonly entityId: string;
  readonly latitude: number;
  readonly longitude: number;
}

export interface MinuteWindow {
  readonly min: number;
  readonly max: number;
}

export const COMPUTE_TIERS = ["minimal", "standard", "advanced", "expert"] as const;
export type ComputeTier = (typeof COMPUTE_TIERS)[number];

// ── Analytics ──

export interface AnalyticsRecord {
  /** "entityId-year-month-dayOfWeek-hour" */
  readonly id: string;
  readonly entityId: string;
  readonly entityLabel: string;
  readonly year: number;
  /** 1 = January */
  readonly month: number;
  /** 1 = Sunday … 7 = Saturday */
  readonly dayOfWeek: number;
  readonly hourOfDay: number;
  readonly openingCount: number;
  readonly totalMinutesOpen: number;
  readonly averageMinutesPerOpening: number;
  readonly longestMinutes: number;
  readonly shortestMinutes: number;
  readonly probabilityOfOpening: number;
  readonly expectedDuration: number;
  readonly confidence: number;
}

// ── Cascades ──

export type CascadeStrengthClass = "weak" | "moderate" | "strong";
export type CascadeTiming = "immediate" | "delayed";

export interface CascadeFactors {
  readonly temporal: number;
  readonly spatial: number;
  readonly durationCorrelation: number;
  readonly historical: number;
}

export interface CascadeRecord {
  readonly id: string;
  readonly triggerEntityId: string;
  readonly triggerEntityLabel: string;
  readonly triggerTime: Timestamp;
  readonly triggerDuration: number | null;
  readonly targetEntityId: string;
  readonly targetEntityLabel: string;
  readonly targetTime: Timestamp;
  readonly targetDuration: number | null;
  readonly delayMinutes: number;
  readonly distanceKm: number;
  readonly strength: number;
  readonly factors: CascadeFactors;
  readonly classification: CascadeStrengthClass;
  readonly timing: CascadeTiming;
  /** Calendar fields of the trigger's open time. */
  readonly dayOfWeek: number;
  readonly hourOfDay: number;
}

// ── Forecasts ──

export interface Forecast {
  readonly entityId: string;
  readonly entityLabel: string;
  readonly probability: number;
  readonly expectedDurationMinutes: number;
  readonly confidence: number;
  /** Tier whose estimation actually produced the model. */
  readonly modelTier: ComputeTier;
  readonly requestedTier: ComputeTier;
  readonly horizonMinutes: number;
  readonly fitQuality: number;
  readonly cascadeBoost: number;
  readonly triggeringEntityIds: string[];
  readonly rationale: string;
}

// ── Shared call options ──

export interface CoreCallOptions {
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}
