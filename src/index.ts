export type {
  AnalyticsRecord,
  CascadeFactors,
  CascadeRecord,
  CascadeStrengthClass,
  CascadeTiming,
  ComputeTier,
  CoreCallOptions,
  EntityLocation,
  Forecast,
  MinuteWindow,
  SpanEvent,
  Timestamp,
} from "./types.js";
export { COMPUTE_TIERS } from "./types.js";

// Core
export { quantileThresholds, strengthCutPoints, bandOf } from "./stats/thresholds.js";
export { aggregate, findMatchingRecord, type AggregateOptions } from "./analytics/aggregator.js";
export { detectCascades, type DetectCascadesOptions } from "./cascade/detector.js";
export { forecast, type ForecastOptions } from "./prediction/engine.js";
export { resolveTier, isComputeTier } from "./prediction/tiers.js";

// Derived views
export { decompose, type SeasonalComponents } from "./analytics/seasonal.js";
export { seasonalInsights, cascadeInsights } from "./analytics/insights.js";
export { assessImpacts, classifyImpact, impactCutPoints, IMPACT_LEVELS, type ImpactLevel } from "./analytics/impact.js";
export { summarizeCascades, summarizeAll, type CascadeSummary } from "./cascade/summary.js";
export { cascadeAlerts, type CascadeAlert, type CascadeAlertOptions } from "./cascade/alerts.js";
export { probabilityText, confidenceText, durationText, describeForecast } from "./prediction/format.js";

// Host
export { SpanwiseEngine, type AnalyzeOptions, type AnalysisResult } from "./engine/engine.js";
export { MemoCache } from "./engine/cache.js";
export { fingerprint } from "./engine/fingerprint.js";
export { sampleMostRecent } from "./engine/sampling.js";
export { parseSnapshot, readSnapshot, type Snapshot } from "./io/snapshot.js";
export { loadConfig } from "./config/loader.js";
export { parseConfig } from "./config/schema.js";
export type { SpanwiseConfig } from "./config/types.js";
export { createLogger, type Logger } from "./logging/logger.js";
export { ConfigError, InputError, SpanwiseError } from "./errors.js";
