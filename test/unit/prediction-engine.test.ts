import { describe, it, expect } from "vitest";
import type { SpanEvent } from "../../src/types.js";
import { COMPUTE_TIERS } from "../../src/types.js";
import { forecast } from "../../src/prediction/engine.js";
import { BASE_TIME, MINUTE, makeCascade, makeRecord, openAt, seededRandom } from "../helpers/fixtures.js";

/** `count` openings of `entityId`, one every hour, each lasting 10 minutes. */
function hourly(entityId: string, count: number): SpanEvent[] {
  return Array.from({ length: count }, (_, i) => openAt(entityId, i * 60, 10));
}

function noisy(entityId: string, count: number, seed: number): SpanEvent[] {
  const random = seededRandom(seed);
  const events: SpanEvent[] = [];
  let minute = 0;
  for (let i = 0; i < count; i++) {
    minute += 20 + Math.floor(random() * 80);
    events.push(openAt(entityId, minute, 2 + Math.floor(random() * 25)));
  }
  return events;
}

const LAST_HOURLY = BASE_TIME + 9 * 60 * MINUTE;

describe("forecast", () => {
  it("returns null for an entity with exactly two events", () => {
    const events = [openAt("a", 0), openAt("a", 60), ...hourly("b", 5)];
    expect(forecast("a", events, [], [], "standard")).toBeNull();
  });

  it.each(["minimal", "expert"] as const)("forecasts a 100-event series on the %s tier", (tier) => {
    const result = forecast("a", noisy("a", 100, 11), [], [], tier);

    expect(result).not.toBeNull();
    expect(result?.requestedTier).toBe(tier);
    expect(result?.expectedDurationMinutes).toBeGreaterThanOrEqual(0);
    expect(result?.probability).toBeGreaterThanOrEqual(0);
    expect(result?.probability).toBeLessThanOrEqual(1);
    expect(result?.fitQuality).toBeGreaterThanOrEqual(0);
    expect(result?.fitQuality).toBeLessThanOrEqual(1);
    expect(COMPUTE_TIERS).toContain(result?.modelTier);
  });

  it("fits a perfectly regular series exactly", () => {
    const result = forecast("a", hourly("a", 10), [], [], "standard");

    // A constant series has no variance, so the AR tiers step down to minimal.
    expect(result).toMatchObject({
      entityId: "a",
      entityLabel: "A",
      modelTier: "minimal",
      requestedTier: "standard",
      horizonMinutes: 60,
      fitQuality: 1,
      cascadeBoost: 0,
      triggeringEntityIds: [],
      expectedDurationMinutes: 10,
    });
    // Next opening is due exactly at the horizon.
    expect(result?.probability).toBe(0.5);
    expect(result?.confidence).toBeCloseTo(0.7, 10);
  });

  it("raises the probability as the next opening becomes due", () => {
    const result = forecast("a", hourly("a", 10), [], [], "standard", { now: LAST_HOURLY + 30 * MINUTE });
    expect(result?.probability).toBeGreaterThan(0.99);
  });

  it("resolves an unknown tier to standard", () => {
    expect(forecast("a", hourly("a", 10), [], [], "turbo")?.requestedTier).toBe("standard");
  });

  it("steps down when the series is too short for the requested tier", () => {
    const events = [openAt("a", 0), openAt("a", 50), openAt("a", 120), openAt("a", 170)];
    expect(forecast("a", events, [], [], "advanced")?.modelTier).toBe("minimal");
  });

  it("averages a matching analytics record's confidence with the fit quality", () => {
    // The last hourly opening is Monday 21:00 UTC.
    const analytics = [makeRecord({ hourOfDay: 21, confidence: 0.5, openingCount: 4 })];
    const result = forecast("a", hourly("a", 10), analytics, [], "standard");

    expect(result?.confidence).toBe(0.75);
    expect(result?.rationale).toContain("4 past openings on Mondays at 9 PM");
  });

  it("boosts the probability from a trigger that opened recently", () => {
    const events = [...hourly("b", 10), openAt("a", 9 * 60 - 20)];
    const cascades = [makeCascade({ triggerEntityId: "a", triggerEntityLabel: "Alpha", targetEntityId: "b", strength: 0.6 })];
    const result = forecast("b", events, [], cascades, "standard");

    expect(result?.cascadeBoost).toBeCloseTo(0.09, 10);
    expect(result?.probability).toBeCloseTo(0.59, 10);
    expect(result?.triggeringEntityIds).toEqual(["a"]);
    expect(result?.rationale).toContain("Alpha opened 20 min ago");
  });

  it("never lets a boosted probability exceed the cap", () => {
    const events = [...hourly("b", 10), openAt("a", 9 * 60 - 20)];
    const cascades = [makeCascade({ triggerEntityId: "a", targetEntityId: "b", strength: 0.9 })];
    const result = forecast("b", events, [], cascades, "standard", { cascadeBoostFactor: 1 });
    expect(result?.probability).toBe(0.95);
  });

  it("keeps a base probability above the cap when a trigger is active", () => {
    const now = LAST_HOURLY + 30 * MINUTE;
    const unboosted = forecast("b", hourly("b", 10), [], [], "standard", { now });
    const events = [...hourly("b", 10), openAt("a", 9 * 60 + 10)];
    const cascades = [makeCascade({ triggerEntityId: "a", targetEntityId: "b", strength: 0.2 })];
    const boosted = forecast("b", events, [], cascades, "standard", { now });

    expect(unboosted?.probability).toBeGreaterThan(0.95);
    expect(boosted?.triggeringEntityIds).toEqual(["a"]);
    expect(boosted?.probability).toBe(unboosted?.probability);
  });

  it("ignores triggers that opened before the cascade window", () => {
    const events = [...hourly("b", 10), openAt("a", 9 * 60 - 140)];
    const cascades = [makeCascade({ triggerEntityId: "a", targetEntityId: "b", strength: 0.9 })];
    const result = forecast("b", events, [], cascades, "standard");
    expect(result?.cascadeBoost).toBe(0);
    expect(result?.probability).toBe(0.5);
  });

  it("returns null when cancelled before starting", () => {
    const controller = new AbortController();
    controller.abort();
    expect(forecast("a", hourly("a", 10), [], [], "expert", { signal: controller.signal })).toBeNull();
  });
});
