import type { CascadeRecord, SpanEvent, Timestamp } from "../types.js";
import { mean } from "../stats/descriptive.js";
import { isWellFormed, minutesBetween } from "../analytics/events.js";

export interface CascadeAlert {
  readonly triggerEntityId: string;
  readonly triggerEntityLabel: string;
  readonly targetEntityId: string;
  readonly targetEntityLabel: string;
  readonly triggerTime: Timestamp;
  readonly expectedTime: Timestamp;
  /** Mean strength of the qualifying trigger→target records. */
  readonly probability: number;
  readonly minutesUntilExpected: number;
}

export interface CascadeAlertOptions {
  /** Closed triggers that opened at most this many minutes ago. Default 30. */
  readonly lookbackMinutes?: number;
  /** Alert only when the target is expected within this many minutes. Default 15. */
  readonly leadMinutes?: number;
  /** Records at or below this strength are ignored. Default 0.4. */
  readonly minStrength?: number;
}

interface PairPattern {
  readonly targetEntityId: string;
  readonly targetEntityLabel: string;
  readonly delays: number[];
  readonly strengths: number[];
}

/**
 * Upcoming openings expected from recent triggers, soonest first.
 *
 * Historical records are pooled per trigger→target pair and the pair's mean
 * delay projects the target opening from each recent closed trigger.
 */
export function cascadeAlerts(
  recentEvents: readonly SpanEvent[],
  cascades: readonly CascadeRecord[],
  now: Timestamp,
  options: CascadeAlertOptions = {},
): CascadeAlert[] {
  const lookback = options.lookbackMinutes ?? 30;
  const lead = options.leadMinutes ?? 15;
  const minStrength = options.minStrength ?? 0.4;

  const byTrigger = new Map<string, Map<string, PairPattern>>();
  for (const c of cascades) {
    if (c.strength <= minStrength) continue;
    let targets = byTrigger.get(c.triggerEntityId);
    if (!targets) {
      targets = new Map();
      byTrigger.set(c.triggerEntityId, targets);
    }
    let pattern = targets.get(c.targetEntityId);
    if (!pattern) {
      pattern = { targetEntityId: c.targetEntityId, targetEntityLabel: c.targetEntityLabel, delays: [], strengths: [] };
      targets.set(c.targetEntityId, pattern);
    }
    pattern.delays.push(c.delayMinutes);
    pattern.strengths.push(c.strength);
  }

  const alerts: CascadeAlert[] = [];
  for (const trigger of recentEvents) {
    if (!isWellFormed(trigger) || trigger.closeTime === undefined) continue;
    const age = minutesBetween(trigger.openTime, now);
    if (age < 0 || age >= lookback) continue;

    for (const pattern of byTrigger.get(trigger.entityId)?.values() ?? []) {
      const delay = mean(pattern.delays);
      const expectedTime = trigger.openTime + delay * 60_000;
      const until = minutesBetween(now, expectedTime);
      if (until <= 0 || until >= lead) continue;

      alerts.push({
        triggerEntityId: trigger.entityId,
        triggerEntityLabel: trigger.entityLabel,
        targetEntityId: pattern.targetEntityId,
        targetEntityLabel: pattern.targetEntityLabel,
        triggerTime: trigger.openTime,
        expectedTime,
        probability: mean(pattern.strengths),
        minutesUntilExpected: until,
      });
    }
  }

  return alerts.sort((a, b) => a.expectedTime - b.expectedTime);
}
