import type { AnalyticsRecord } from "../types.js";
import { mean } from "../stats/descriptive.js";
import { isRushHour, isSummer, isWeekend } from "./calendar.js";

export const TREND_WINDOW = 24;

export interface SeasonalComponents {
  readonly recordId: string;
  readonly entityId: string;
  /** Centred moving average of opening counts over neighbouring buckets. */
  readonly trend: number;
  /** Mean count of the record's weekday, month and hour groups. */
  readonly weekly: number;
  readonly monthly: number;
  readonly hourly: number;
  /** Sum of the three group deviations from their overall means. */
  readonly seasonal: number;
  readonly residual: number;
  readonly isWeekend: boolean;
  readonly isRushHour: boolean;
  readonly isSummer: boolean;
}

/**
 * Trend/seasonal/residual split of each entity's bucket counts. Records are
 * ordered in time per entity before the moving average is taken.
 */
export function decompose(records: readonly AnalyticsRecord[], trendWindow = TREND_WINDOW): SeasonalComponents[] {
  const byEntity = new Map<string, AnalyticsRecord[]>();
  for (const r of records) {
    const list = byEntity.get(r.entityId);
    if (list) list.push(r);
    else byEntity.set(r.entityId, [r]);
  }

  const out: SeasonalComponents[] = [];
  for (const entityId of [...byEntity.keys()].sort()) {
    const list = byEntity.get(entityId) ?? [];
    out.push(...decomposeEntity(list, trendWindow));
  }
  return out;
}

function decomposeEntity(records: AnalyticsRecord[], trendWindow: number): SeasonalComponents[] {
  const sorted = [...records].sort(
    (a, b) => a.year - b.year || a.month - b.month || a.dayOfWeek - b.dayOfWeek || a.hourOfDay - b.hourOfDay,
  );
  const counts = sorted.map((r) => r.openingCount);
  const half = Math.floor(trendWindow / 2);

  const weekly = groupMeans(sorted, (r) => r.dayOfWeek);
  const monthly = groupMeans(sorted, (r) => r.month);
  const hourly = groupMeans(sorted, (r) => r.hourOfDay);

  return sorted.map((r, i) => {
    const from = Math.max(0, i - half);
    const to = Math.min(counts.length - 1, i + half);
    const trend = mean(counts.slice(from, to + 1));

    const w = weekly.byKey.get(r.dayOfWeek) ?? weekly.overall;
    const m = monthly.byKey.get(r.month) ?? monthly.overall;
    const h = hourly.byKey.get(r.hourOfDay) ?? hourly.overall;
    const seasonal = w - weekly.overall + (m - monthly.overall) + (h - hourly.overall);

    return {
      recordId: r.id,
      entityId: r.entityId,
      trend,
      weekly: w,
      monthly: m,
      hourly: h,
      seasonal,
      residual: r.openingCount - (trend + seasonal),
      isWeekend: isWeekend(r.dayOfWeek),
      isRushHour: isRushHour(r.dayOfWeek, r.hourOfDay),
      isSummer: isSummer(r.month),
    };
  });
}

interface GroupMeans {
  readonly byKey: Map<number, number>;
  /** Unweighted mean of the group means. */
  readonly overall: number;
}

function groupMeans(records: readonly AnalyticsRecord[], keyOf: (r: AnalyticsRecord) => number): GroupMeans {
  const groups = new Map<number, number[]>();
  for (const r of records) {
    const key = keyOf(r);
    const list = groups.get(key);
    if (list) list.push(r.openingCount);
    else groups.set(key, [r.openingCount]);
  }
  const byKey = new Map<number, number>();
  for (const [key, values] of groups) byKey.set(key, mean(values));
  return { byKey, overall: mean([...byKey.values()]) };
}
