import type { SpanEvent } from "../types.js";

const MS_PER_MINUTE = 60_000;

/**
 * Duration of a closed event in minutes, or null while it is still open.
 * Uses `durationMinutes` when given, otherwise close minus open.
 */
export function knownDuration(event: SpanEvent): number | null {
  if (event.closeTime === undefined) return null;
  if (event.durationMinutes !== undefined) return event.durationMinutes;
  return (event.closeTime - event.openTime) / MS_PER_MINUTE;
}

/**
 * An event the core can use: non-empty entity id, finite open time, and
 * when closed, a finite non-negative duration not closing before it opened.
 */
export function isWellFormed(event: SpanEvent): boolean {
  if (!event.entityId) return false;
  if (!Number.isFinite(event.openTime)) return false;
  if (event.durationMinutes !== undefined) {
    if (!Number.isFinite(event.durationMinutes) || event.durationMinutes < 0) return false;
  }
  if (event.closeTime !== undefined) {
    if (!Number.isFinite(event.closeTime) || event.closeTime < event.openTime) return false;
  }
  return true;
}

export interface PartitionedEvents {
  readonly valid: SpanEvent[];
  readonly dropped: number;
}

export function partitionEvents(events: readonly SpanEvent[]): PartitionedEvents {
  const valid: SpanEvent[] = [];
  let dropped = 0;
  for (const event of events) {
    if (isWellFormed(event)) valid.push(event);
    else dropped++;
  }
  return { valid, dropped };
}

/** Chronological copy; ties ordered by entity id so output is stable. */
export function sortChronologically(events: readonly SpanEvent[]): SpanEvent[] {
  return [...events].sort(
    (a, b) => a.openTime - b.openTime || (a.entityId < b.entityId ? -1 : a.entityId > b.entityId ? 1 : 0),
  );
}

export function minutesBetween(from: number, to: number): number {
  return (to - from) / MS_PER_MINUTE;
}
