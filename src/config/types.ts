import type { ComputeTier, MinuteWindow } from "../types.js";

export interface SpanwiseConfig {
  readonly analytics: AnalyticsConfig;
  readonly cascade: CascadeConfig;
  readonly prediction: PredictionConfig;
  readonly sampling: SamplingConfig;
  readonly logging: LoggingConfig;
}

export interface AnalyticsConfig {
  readonly minimumSampleSize: number;
  /** IANA zone used to derive calendar buckets. */
  readonly timeZone: string;
}

export interface CascadeWeights {
  readonly temporal: number;
  readonly spatial: number;
  readonly durationCorrelation: number;
  readonly historical: number;
}

export interface CascadeConfig {
  readonly windowMinutes: MinuteWindow;
  readonly maxDistanceKm: number;
  readonly immediateThresholdMinutes: number;
  readonly weights: CascadeWeights;
}

export interface PredictionConfig {
  readonly tier: ComputeTier;
  readonly horizonMinutes: number;
  readonly cascadeBoostFactor: number;
  readonly maxBoostedProbability: number;
  readonly missingContextPenalty: number;
  readonly defaultMaCoefficient: number;
  readonly maxIterations: number;
  readonly tolerance: number;
  readonly conditionThreshold: number;
}

export interface SamplingConfig {
  readonly maxEvents: number;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
