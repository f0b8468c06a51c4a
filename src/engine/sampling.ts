import type { SpanEvent } from "../types.js";

/**
 * The `limit` most recently opened events, in their original relative order.
 * Returns a copy even when nothing is dropped.
 */
export function sampleMostRecent(events: readonly SpanEvent[], limit: number): SpanEvent[] {
  if (!(limit > 0)) return [];
  if (events.length <= limit) return [...events];

  const ranked = events.map((event, index) => ({ event, index }));
  ranked.sort((a, b) => b.event.openTime - a.event.openTime || a.index - b.index);
  return ranked
    .slice(0, Math.floor(limit))
    .sort((a, b) => a.index - b.index)
    .map((r) => r.event);
}
