import type { AnalyticsRecord, CoreCallOptions, SpanEvent } from "../types.js";
import { silentLogger } from "../logging/logger.js";
import { clamp01 } from "../stats/descriptive.js";
import { calendarFields } from "./calendar.js";
import { knownDuration, partitionEvents } from "./events.js";

export const DEFAULT_MINIMUM_SAMPLE_SIZE = 10;
const ABORT_CHECK_INTERVAL = 500;

export interface AggregateOptions extends CoreCallOptions {
  /** Observations needed for full confidence. Default 10. */
  readonly minimumSampleSize?: number;
  /** IANA zone for calendar buckets. Default "UTC". */
  readonly timeZone?: string;
}

interface Bucket {
  readonly entityId: string;
  readonly entityLabel: string;
  readonly year: number;
  readonly month: number;
  readonly dayOfWeek: number;
  readonly hourOfDay: number;
  count: number;
  durations: number[];
}

export function bucketId(entityId: string, year: number, month: number, dayOfWeek: number, hour: number): string {
  return `${entityId}-${year}-${month}-${dayOfWeek}-${hour}`;
}

function sliceKey(entityId: string, dayOfWeek: number, hour: number): string {
  return `${entityId}|${dayOfWeek}|${hour}`;
}

/**
 * Group events into (entity, year, month, weekday, hour) buckets and
 * summarize each observed bucket.
 *
 * Probability is the bucket's share of all the entity's openings in the same
 * weekday+hour slice across every observed month and year. Events still open
 * count as openings but contribute nothing to duration statistics. Malformed
 * events are skipped. An aborted call returns an empty list.
 */
export function aggregate(events: readonly SpanEvent[], options: AggregateOptions = {}): AnalyticsRecord[] {
  const logger = options.logger ?? silentLogger;
  const minimumSampleSize = Math.max(1, options.minimumSampleSize ?? DEFAULT_MINIMUM_SAMPLE_SIZE);
  const timeZone = options.timeZone ?? "UTC";

  const { valid, dropped } = partitionEvents(events);
  if (dropped > 0) {
    logger.debug({ dropped }, "Skipped malformed events during aggregation");
  }

  const buckets = new Map<string, Bucket>();
  const sliceTotals = new Map<string, number>();

  for (let i = 0; i < valid.length; i++) {
    if (i % ABORT_CHECK_INTERVAL === 0 && options.signal?.aborted) {
      logger.debug({ processed: i }, "Aggregation aborted");
      return [];
    }

    const event = valid[i];
    const { year, month, dayOfWeek, hour } = calendarFields(event.openTime, timeZone);
    const id = bucketId(event.entityId, year, month, dayOfWeek, hour);

    let bucket = buckets.get(id);
    if (!bucket) {
      bucket = {
        entityId: event.entityId,
        entityLabel: event.entityLabel,
        year,
        month,
        dayOfWeek,
        hourOfDay: hour,
        count: 0,
        durations: [],
      };
      buckets.set(id, bucket);
    }

    bucket.count++;
    const duration = knownDuration(event);
    if (duration !== null) bucket.durations.push(duration);

    const slice = sliceKey(event.entityId, dayOfWeek, hour);
    sliceTotals.set(slice, (sliceTotals.get(slice) ?? 0) + 1);
  }

  const records: AnalyticsRecord[] = [];
  for (const [id, bucket] of buckets) {
    const total = bucket.durations.reduce((s, d) => s + d, 0);
    const known = bucket.durations.length;
    const average = known > 0 ? total / known : 0;
    const sliceTotal = sliceTotals.get(sliceKey(bucket.entityId, bucket.dayOfWeek, bucket.hourOfDay)) ?? bucket.count;

    records.push({
      id,
      entityId: bucket.entityId,
      entityLabel: bucket.entityLabel,
      year: bucket.year,
      month: bucket.month,
      dayOfWeek: bucket.dayOfWeek,
      hourOfDay: bucket.hourOfDay,
      openingCount: bucket.count,
      totalMinutesOpen: total,
      averageMinutesPerOpening: average,
      longestMinutes: known > 0 ? bucket.durations.reduce((m, d) => Math.max(m, d), -Infinity) : 0,
      shortestMinutes: known > 0 ? bucket.durations.reduce((m, d) => Math.min(m, d), Infinity) : 0,
      probabilityOfOpening: clamp01(bucket.count / sliceTotal),
      expectedDuration: Math.max(0, average),
      confidence: clamp01(bucket.count / minimumSampleSize),
    });
  }

  records.sort(compareRecords);
  logger.debug({ events: valid.length, records: records.length }, "Aggregation complete");
  return records;
}

function compareRecords(a: AnalyticsRecord, b: AnalyticsRecord): number {
  if (a.entityId !== b.entityId) return a.entityId < b.entityId ? -1 : 1;
  return (
    a.year - b.year ||
    a.month - b.month ||
    a.dayOfWeek - b.dayOfWeek ||
    a.hourOfDay - b.hourOfDay
  );
}

/** Highest-confidence record of `entityId` for the given month, weekday and hour, any year. */
export function findMatchingRecord(
  records: readonly AnalyticsRecord[],
  entityId: string,
  month: number,
  dayOfWeek: number,
  hourOfDay: number,
): AnalyticsRecord | null {
  let best: AnalyticsRecord | null = null;
  for (const r of records) {
    if (r.entityId !== entityId || r.month !== month || r.dayOfWeek !== dayOfWeek || r.hourOfDay !== hourOfDay) {
      continue;
    }
    if (!best || r.confidence > best.confidence) best = r;
  }
  return best;
}
