import type {
  AnalyticsRecord,
  CascadeRecord,
  ComputeTier,
  CoreCallOptions,
  Forecast,
  MinuteWindow,
  SpanEvent,
  Timestamp,
} from "../types.js";
import { silentLogger } from "../logging/logger.js";
import { clamp01, logistic, stdDev } from "../stats/descriptive.js";
import { calendarFields, dayName, formatHour } from "../analytics/calendar.js";
import { knownDuration, minutesBetween, partitionEvents, sortChronologically } from "../analytics/events.js";
import { findMatchingRecord } from "../analytics/aggregator.js";
import { DEFAULT_WINDOW } from "../cascade/detector.js";
import { fitWithFallback, type ArmaModel, type FitOptions } from "./arma.js";
import { resolveTier } from "./tiers.js";

export const MIN_FORECAST_EVENTS = 3;

export interface ForecastOptions extends CoreCallOptions {
  /** Default 60. */
  readonly horizonMinutes?: number;
  /** Reference time; defaults to the entity's latest opening. */
  readonly now?: Timestamp;
  /** Cascade window; `max` bounds how recent a trigger must be. */
  readonly window?: MinuteWindow;
  /** Probability added per unit of trigger strength. Default 0.15. */
  readonly cascadeBoostFactor?: number;
  /** Ceiling for a boosted probability. Default 0.95. */
  readonly maxBoostedProbability?: number;
  /** Confidence multiplier when no analytics record matches. Default 0.7. */
  readonly missingContextPenalty?: number;
  readonly defaultMaCoefficient?: number;
  readonly maxIterations?: number;
  readonly tolerance?: number;
  readonly conditionThreshold?: number;
  readonly timeZone?: string;
}

interface ActiveTrigger {
  readonly record: CascadeRecord;
  readonly openedAt: Timestamp;
}

/**
 * Short-horizon forecast for one entity.
 *
 * Inter-opening intervals and known durations are each modelled with the
 * requested tier's ARMA estimator, degrading tier by tier when a fit is not
 * possible. Returns null with fewer than three usable events for the entity,
 * or when cancelled before any model was fitted.
 */
export function forecast(
  entityId: string,
  events: readonly SpanEvent[],
  analytics: readonly AnalyticsRecord[],
  cascades: readonly CascadeRecord[],
  tier: ComputeTier | string,
  options: ForecastOptions = {},
): Forecast | null {
  const logger = options.logger ?? silentLogger;
  if (options.signal?.aborted) return null;

  const { valid } = partitionEvents(events);
  const own = sortChronologically(valid.filter((e) => e.entityId === entityId));
  if (own.length < MIN_FORECAST_EVENTS) {
    logger.debug({ entityId, events: own.length }, "Too few events to forecast");
    return null;
  }

  const requestedTier = resolveTier(tier);
  const horizon = options.horizonMinutes ?? 60;
  const window = options.window ?? DEFAULT_WINDOW;
  const last = own[own.length - 1];
  const now = options.now ?? last.openTime;

  const fit: FitOptions = {
    defaultMaCoefficient: options.defaultMaCoefficient,
    maxIterations: options.maxIterations,
    tolerance: options.tolerance,
    conditionThreshold: options.conditionThreshold,
    signal: options.signal,
    logger,
  };

  const intervals: number[] = [];
  for (let i = 1; i < own.length; i++) intervals.push(minutesBetween(own[i - 1].openTime, own[i].openTime));
  const durations = own.map(knownDuration).filter((d): d is number => d !== null);

  const intervalModel = fitWithFallback(requestedTier, intervals, fit);
  const durationModel = fitWithFallback(requestedTier, durations, fit);

  const nextInterval = Math.max(0, intervalModel.next);
  const sinceLast = Math.max(0, minutesBetween(last.openTime, now));
  const expectedWait = Math.max(0, nextInterval - sinceLast);
  const scale = Math.max(intervalModel.rmse, 1);
  const baseProbability = logistic((horizon - expectedWait) / scale);

  const fitQuality = fitQualityOf(intervalModel, intervals);
  const { month, dayOfWeek, hour } = calendarFields(now, options.timeZone ?? "UTC");
  const context = findMatchingRecord(analytics, entityId, month, dayOfWeek, hour);
  const confidence = context
    ? clamp01((context.confidence + fitQuality) / 2)
    : clamp01(fitQuality * (options.missingContextPenalty ?? 0.7));

  const triggers = activeTriggers(entityId, cascades, valid, now, window.max);
  const strongest = triggers[0];
  const boost = strongest ? strongest.record.strength * (options.cascadeBoostFactor ?? 0.15) : 0;
  // The cap bounds the boost; it never pulls a high base probability down.
  const probability = strongest
    ? Math.max(baseProbability, Math.min(options.maxBoostedProbability ?? 0.95, baseProbability + boost))
    : baseProbability;

  const rationale = [
    `Based on ${own.length} openings; next expected in about ${Math.round(expectedWait)} min (${describeModel(intervalModel)})`,
    context
      ? `${context.openingCount} past openings on ${dayName(dayOfWeek)}s at ${formatHour(hour)}`
      : `no history for ${dayName(dayOfWeek)}s at ${formatHour(hour)}`,
    strongest
      ? `${strongest.record.triggerEntityLabel || strongest.record.triggerEntityId} opened ${Math.round(minutesBetween(strongest.openedAt, now))} min ago`
      : null,
  ]
    .filter((part): part is string => part !== null)
    .join("; ");

  if (intervalModel.tier !== requestedTier) {
    logger.debug({ entityId, requestedTier, modelTier: intervalModel.tier }, "Forecast used a lower tier");
  }

  return {
    entityId,
    entityLabel: last.entityLabel,
    probability,
    expectedDurationMinutes: Math.max(0, durationModel.next),
    confidence,
    modelTier: intervalModel.tier,
    requestedTier,
    horizonMinutes: horizon,
    fitQuality,
    cascadeBoost: boost,
    triggeringEntityIds: triggers.map((t) => t.record.triggerEntityId),
    rationale,
  };
}

/** 1 − rmse/σ, clamped. A constant series is fitted exactly. */
export function fitQualityOf(model: ArmaModel, series: readonly number[]): number {
  const sigma = stdDev(series);
  if (sigma === 0) return model.rmse === 0 ? 1 : 0;
  return clamp01(1 - model.rmse / sigma);
}

function describeModel(model: ArmaModel): string {
  return `${model.tier} ARMA(${model.ar.length},1)`;
}

/**
 * Cascades into `entityId` whose trigger entity opened in the `maxDelay`
 * minutes up to `now`, strongest first. A trigger entity appears once, with
 * its strongest record.
 */
function activeTriggers(
  entityId: string,
  cascades: readonly CascadeRecord[],
  events: readonly SpanEvent[],
  now: Timestamp,
  maxDelay: number,
): ActiveTrigger[] {
  const latestOpening = new Map<string, Timestamp>();
  for (const e of events) {
    const age = minutesBetween(e.openTime, now);
    if (age < 0 || age > maxDelay) continue;
    const seen = latestOpening.get(e.entityId);
    if (seen === undefined || e.openTime > seen) latestOpening.set(e.entityId, e.openTime);
  }

  const best = new Map<string, ActiveTrigger>();
  for (const record of cascades) {
    if (record.targetEntityId !== entityId || record.triggerEntityId === entityId) continue;
    const openedAt = latestOpening.get(record.triggerEntityId);
    if (openedAt === undefined) continue;
    const current = best.get(record.triggerEntityId);
    if (!current || record.strength > current.record.strength) {
      best.set(record.triggerEntityId, { record, openedAt });
    }
  }

  return [...best.values()].sort((a, b) => b.record.strength - a.record.strength);
}
