import type { SpanwiseConfig } from "../config/types.js";
import type { AggregateOptions } from "../analytics/aggregator.js";
import type { DetectCascadesOptions } from "../cascade/detector.js";
import type { ForecastOptions } from "../prediction/engine.js";

// Config sections mapped onto the option bags of the core functions.

export function aggregateOptions(config: SpanwiseConfig): AggregateOptions {
  return {
    minimumSampleSize: config.analytics.minimumSampleSize,
    timeZone: config.analytics.timeZone,
  };
}

export function cascadeOptions(config: SpanwiseConfig): DetectCascadesOptions {
  return {
    window: config.cascade.windowMinutes,
    maxDistanceKm: config.cascade.maxDistanceKm,
    immediateThresholdMinutes: config.cascade.immediateThresholdMinutes,
    weights: config.cascade.weights,
    timeZone: config.analytics.timeZone,
  };
}

export function forecastOptions(config: SpanwiseConfig): ForecastOptions {
  const p = config.prediction;
  return {
    horizonMinutes: p.horizonMinutes,
    window: config.cascade.windowMinutes,
    cascadeBoostFactor: p.cascadeBoostFactor,
    maxBoostedProbability: p.maxBoostedProbability,
    missingContextPenalty: p.missingContextPenalty,
    defaultMaCoefficient: p.defaultMaCoefficient,
    maxIterations: p.maxIterations,
    tolerance: p.tolerance,
    conditionThreshold: p.conditionThreshold,
    timeZone: config.analytics.timeZone,
  };
}
