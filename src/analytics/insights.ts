import type { AnalyticsRecord, CascadeRecord } from "../types.js";
import { mean } from "../stats/descriptive.js";
import { summarizeCascades } from "../cascade/summary.js";
import { isRushHour, isSummer, isWeekend } from "./calendar.js";

const HIGH_CASCADE_STRENGTH = 0.5;

function meanProbability(records: readonly AnalyticsRecord[]): number {
  return mean(records.map((r) => r.probabilityOfOpening));
}

function percentAbove(value: number, reference: number): number {
  return Math.trunc((value / reference - 1) * 100);
}

export function seasonalInsights(entityId: string, records: readonly AnalyticsRecord[]): string[] {
  const own = records.filter((r) => r.entityId === entityId);
  const insights: string[] = [];

  const weekend = own.filter((r) => isWeekend(r.dayOfWeek));
  const weekday = own.filter((r) => !isWeekend(r.dayOfWeek));
  if (weekend.length > 0 && weekday.length > 0) {
    const weekendAvg = meanProbability(weekend);
    const weekdayAvg = meanProbability(weekday);
    if (weekdayAvg > 0 && weekendAvg > weekdayAvg * 1.2) {
      insights.push(`Weekend openings are ${percentAbove(weekendAvg, weekdayAvg)}% more frequent than weekdays`);
    }
  }

  const summer = own.filter((r) => isSummer(r.month));
  const rest = own.filter((r) => !isSummer(r.month));
  if (summer.length > 0 && rest.length > 0) {
    const summerAvg = meanProbability(summer);
    const restAvg = meanProbability(rest);
    if (restAvg > 0 && summerAvg > restAvg * 1.1) {
      insights.push(`Summer months show ${percentAbove(summerAvg, restAvg)}% increase in activity`);
    }
  }

  const rush = own.filter((r) => isRushHour(r.dayOfWeek, r.hourOfDay));
  if (rush.length > 0 && meanProbability(rush) < 0.1) {
    insights.push("Activity is significantly reduced during rush hours");
  }

  return insights;
}

export function cascadeInsights(entityId: string, cascades: readonly CascadeRecord[]): string[] {
  const summary = summarizeCascades(entityId, cascades);
  const insights: string[] = [];

  if (summary.triggeredCount > 0) {
    if (summary.influence > HIGH_CASCADE_STRENGTH) {
      insights.push("High cascade influence: frequently triggers openings nearby");
    }
    if (summary.primaryTarget) {
      const t = summary.primaryTarget;
      insights.push(`Most frequently triggers ${t.entityLabel || t.entityId} (${t.count} cascade events)`);
    }
  }

  if (summary.receivedCount > 0) {
    if (summary.susceptibility > HIGH_CASCADE_STRENGTH) {
      insights.push("High cascade susceptibility: often opens in response to nearby entities");
    }
    if (summary.primaryTrigger) {
      const t = summary.primaryTrigger;
      insights.push(`Most frequently triggered by ${t.entityLabel || t.entityId} (${t.count} cascade events)`);
    }
  }

  if (summary.triggeredCount > 0 && summary.immediateShare > 0.5) {
    insights.push("Tends to trigger immediate cascade responses");
  }

  return insights;
}
