import type { SpanEvent } from "../types.js";
import { quantileThresholds } from "../stats/thresholds.js";
import { calendarFields, isRushHour } from "./calendar.js";
import { knownDuration, partitionEvents } from "./events.js";

export const IMPACT_LEVELS = ["minimal", "low", "moderate", "high", "severe"] as const;
export type ImpactLevel = (typeof IMPACT_LEVELS)[number];

const IMPACT_QUANTILES = [0.2, 0.4, 0.6, 0.8] as const;

/** Quintile cut points over the known durations of `events`. */
export function impactCutPoints(events: readonly SpanEvent[]): number[] {
  const durations = partitionEvents(events)
    .valid.map(knownDuration)
    .filter((d): d is number => d !== null);
  return quantileThresholds(durations, IMPACT_QUANTILES);
}

/**
 * Severity of a closed event: the number of cut points its duration exceeds,
 * raised one level when it opened in a weekday rush hour. Null while open.
 */
export function classifyImpact(event: SpanEvent, cuts: readonly number[], timeZone = "UTC"): ImpactLevel | null {
  const duration = knownDuration(event);
  if (duration === null) return null;

  let level = cuts.filter((cut) => duration > cut).length;
  const { dayOfWeek, hour } = calendarFields(event.openTime, timeZone);
  if (isRushHour(dayOfWeek, hour)) level++;

  return IMPACT_LEVELS[Math.min(level, IMPACT_LEVELS.length - 1)];
}

export interface ImpactAssessment {
  readonly event: SpanEvent;
  readonly level: ImpactLevel;
}

/** Classifies every closed, well-formed event against cut points drawn from the same set. */
export function assessImpacts(events: readonly SpanEvent[], timeZone = "UTC"): ImpactAssessment[] {
  const cuts = impactCutPoints(events);
  const out: ImpactAssessment[] = [];
  for (const event of partitionEvents(events).valid) {
    const level = classifyImpact(event, cuts, timeZone);
    if (level !== null) out.push({ event, level });
  }
  return out;
}
