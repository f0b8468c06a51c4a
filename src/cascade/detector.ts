import type {
  CascadeFactors,
  CascadeRecord,
  CoreCallOptions,
  EntityLocation,
  MinuteWindow,
  SpanEvent,
} from "../types.js";
import type { CascadeWeights } from "../config/types.js";
import { silentLogger } from "../logging/logger.js";
import { strengthCutPoints } from "../stats/thresholds.js";
import { calendarFields } from "../analytics/calendar.js";
import { knownDuration, minutesBetween, partitionEvents, sortChronologically } from "../analytics/events.js";
import { ProximityGraph } from "./proximity.js";
import {
  DEFAULT_WEIGHTS,
  classifyStrength,
  classifyTiming,
  combineFactors,
  durationCorrelation,
  historicalFactor,
  spatialFactor,
  temporalFactor,
  type PairHistory,
} from "./scoring.js";

export const DEFAULT_WINDOW: MinuteWindow = { min: 30, max: 90 };
export const DEFAULT_MAX_DISTANCE_KM = 5;
export const DEFAULT_IMMEDIATE_THRESHOLD_MINUTES = 35;
const ABORT_CHECK_INTERVAL = 100;

export interface DetectCascadesOptions extends CoreCallOptions {
  readonly window?: MinuteWindow;
  readonly maxDistanceKm?: number;
  /** Delays below this are tagged "immediate". Default 35. */
  readonly immediateThresholdMinutes?: number;
  readonly weights?: CascadeWeights;
  /** Zone for the trigger's dayOfWeek/hourOfDay. Default "UTC". */
  readonly timeZone?: string;
}

type Candidate = Omit<CascadeRecord, "classification">;

function pairKey(trigger: string, target: string): string {
  return `${trigger}\u0000${target}`;
}

/**
 * Detect trigger→target cascades between nearby entities.
 *
 * Each event is a candidate trigger for every later event of an adjacent
 * entity opening `window.min`..`window.max` minutes after it. Strength
 * classes come from quartiles of all candidate strengths in this call,
 * so the same pair can be "strong" in one dataset and "weak" in another.
 *
 * On abort the candidates found so far are classified and returned.
 */
export function detectCascades(
  events: readonly SpanEvent[],
  locations: readonly EntityLocation[],
  options: DetectCascadesOptions = {},
): CascadeRecord[] {
  const logger = options.logger ?? silentLogger;
  const window = options.window ?? DEFAULT_WINDOW;
  const maxDistanceKm = options.maxDistanceKm ?? DEFAULT_MAX_DISTANCE_KM;
  const immediateThreshold = options.immediateThresholdMinutes ?? DEFAULT_IMMEDIATE_THRESHOLD_MINUTES;
  const weights = options.weights ?? DEFAULT_WEIGHTS;
  const timeZone = options.timeZone ?? "UTC";

  if (events.length < 2 || locations.length === 0) return [];
  if (!(window.min <= window.max) || window.max < 0) {
    logger.debug({ window }, "Empty cascade window");
    return [];
  }

  const { valid, dropped } = partitionEvents(events);
  if (dropped > 0) logger.debug({ dropped }, "Skipped malformed events during cascade detection");
  if (valid.length < 2) return [];

  const graph = ProximityGraph.build(locations, maxDistanceKm);
  if (graph.edgeCount === 0) return [];

  const sorted = sortChronologically(valid);
  const history = new Map<string, PairHistory>();
  const candidates: Candidate[] = [];

  for (let i = 0; i < sorted.length; i++) {
    if (i % ABORT_CHECK_INTERVAL === 0 && options.signal?.aborted) {
      logger.debug({ scanned: i, found: candidates.length }, "Cascade detection aborted");
      break;
    }

    const trigger = sorted[i];
    const adjacent = new Set(graph.neighbors(trigger.entityId));
    if (adjacent.size === 0) continue;
    const triggerDuration = knownDuration(trigger);

    for (let j = i + 1; j < sorted.length; j++) {
      const target = sorted[j];
      const delay = minutesBetween(trigger.openTime, target.openTime);
      if (delay > window.max) break;
      if (delay <= 0 || !adjacent.has(target.entityId)) continue;

      const distance = graph.distance(trigger.entityId, target.entityId);
      if (distance === null) continue;

      const key = pairKey(trigger.entityId, target.entityId);
      const prior = history.get(key);
      const historical = historicalFactor(prior);
      const qualifies = delay >= window.min;
      history.set(key, {
        seen: (prior?.seen ?? 0) + 1,
        qualifying: (prior?.qualifying ?? 0) + (qualifies ? 1 : 0),
      });
      if (!qualifies) continue;

      const targetDuration = knownDuration(target);
      const factors: CascadeFactors = {
        temporal: temporalFactor(delay, window),
        spatial: spatialFactor(distance, maxDistanceKm),
        durationCorrelation: durationCorrelation(triggerDuration, targetDuration),
        historical,
      };
      const { dayOfWeek, hour } = calendarFields(trigger.openTime, timeZone);

      candidates.push({
        id: `${trigger.entityId}-${target.entityId}-${trigger.openTime}-${target.openTime}`,
        triggerEntityId: trigger.entityId,
        triggerEntityLabel: trigger.entityLabel,
        triggerTime: trigger.openTime,
        triggerDuration,
        targetEntityId: target.entityId,
        targetEntityLabel: target.entityLabel,
        targetTime: target.openTime,
        targetDuration,
        delayMinutes: delay,
        distanceKm: distance,
        strength: combineFactors(factors, weights),
        factors,
        timing: classifyTiming(delay, immediateThreshold),
        dayOfWeek,
        hourOfDay: hour,
      });
    }
  }

  const cuts = strengthCutPoints(candidates.map((c) => c.strength));
  const records = candidates.map((c): CascadeRecord => ({ ...c, classification: classifyStrength(c.strength, cuts) }));

  logger.debug(
    { events: sorted.length, edges: graph.edgeCount, cascades: records.length },
    "Cascade detection complete",
  );
  return records;
}
