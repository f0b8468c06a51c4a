import { vi } from "vitest";
import type { AnalyticsRecord, CascadeRecord, EntityLocation, SpanEvent } from "../../src/types.js";
import type { Logger } from "../../src/logging/logger.js";

export const MINUTE = 60_000;

/** Monday 2024-06-03 12:00 UTC. */
export const BASE_TIME = Date.UTC(2024, 5, 3, 12, 0, 0);

/** Kilometres per degree of latitude on a 6371 km sphere. */
export const KM_PER_DEGREE = (6371 * Math.PI) / 180;

export function makeEvent(overrides: Partial<SpanEvent> = {}): SpanEvent {
  const openTime = overrides.openTime ?? BASE_TIME;
  return {
    entityId: "a",
    entityLabel: "Alpha",
    openTime,
    closeTime: openTime + 10 * MINUTE,
    latitude: 47.6,
    longitude: -122.3,
    ...overrides,
  };
}

/** A closed event opening `startMinute` after BASE_TIME and lasting `duration` minutes. */
export function openAt(entityId: string, startMinute: number, duration = 10, label = entityId.toUpperCase()): SpanEvent {
  const openTime = BASE_TIME + startMinute * MINUTE;
  return makeEvent({ entityId, entityLabel: label, openTime, closeTime: openTime + duration * MINUTE });
}

/** Location `km` kilometres due north of (47.6, -122.3). */
export function locationNorth(entityId: string, km: number): EntityLocation {
  return { entityId, latitude: 47.6 + km / KM_PER_DEGREE, longitude: -122.3 };
}

export function makeRecord(overrides: Partial<AnalyticsRecord> = {}): AnalyticsRecord {
  return {
    id: "a-2024-6-2-12",
    entityId: "a",
    entityLabel: "Alpha",
    year: 2024,
    month: 6,
    dayOfWeek: 2,
    hourOfDay: 12,
    openingCount: 5,
    totalMinutesOpen: 50,
    averageMinutesPerOpening: 10,
    longestMinutes: 12,
    shortestMinutes: 8,
    probabilityOfOpening: 0.5,
    expectedDuration: 10,
    confidence: 0.5,
    ...overrides,
  };
}

export function makeCascade(overrides: Partial<CascadeRecord> = {}): CascadeRecord {
  return {
    id: "a-b-0-1",
    triggerEntityId: "a",
    triggerEntityLabel: "Alpha",
    triggerTime: BASE_TIME,
    triggerDuration: 10,
    targetEntityId: "b",
    targetEntityLabel: "Bravo",
    targetTime: BASE_TIME + 45 * MINUTE,
    targetDuration: 10,
    delayMinutes: 45,
    distanceKm: 2,
    strength: 0.6,
    factors: { temporal: 0.5, spatial: 0.6, durationCorrelation: 1, historical: 0.5 },
    classification: "moderate",
    timing: "delayed",
    dayOfWeek: 2,
    hourOfDay: 12,
    ...overrides,
  };
}

/**
 * Deterministic pseudo-random series in [0, 1) (LCG), so that "noisy"
 * fixtures are the same on every run.
 */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

export function makeFakeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn().mockReturnThis(),
    level: "debug",
  } as unknown as Logger;
}
