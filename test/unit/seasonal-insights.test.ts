import { describe, it, expect } from "vitest";
import { decompose } from "../../src/analytics/seasonal.js";
import { cascadeInsights, seasonalInsights } from "../../src/analytics/insights.js";
import { assessImpacts, classifyImpact, impactCutPoints } from "../../src/analytics/impact.js";
import { makeCascade, makeEvent, makeRecord, openAt } from "../helpers/fixtures.js";

describe("decompose", () => {
  const records = [
    makeRecord({ id: "a-tue", dayOfWeek: 3, openingCount: 4 }),
    makeRecord({ id: "b-mon", entityId: "b", openingCount: 1 }),
    makeRecord({ id: "a-mon", dayOfWeek: 2, openingCount: 2 }),
  ];

  it("splits counts into trend, weekday deviation and a zero residual", () => {
    const components = decompose(records).filter((c) => c.entityId === "a");

    expect(components.map((c) => c.recordId)).toEqual(["a-mon", "a-tue"]);
    expect(components[0]).toMatchObject({ trend: 3, weekly: 2, monthly: 3, hourly: 3, seasonal: -1, residual: 0 });
    expect(components[1]).toMatchObject({ trend: 3, weekly: 4, seasonal: 1, residual: 0 });
    expect(components[0]).toMatchObject({ isWeekend: false, isRushHour: false, isSummer: true });
  });

  it("orders entities by id", () => {
    expect(decompose(records).map((c) => c.entityId)).toEqual(["a", "a", "b"]);
  });

  it("uses each bucket's own count as the trend for a zero window", () => {
    const components = decompose(records, 0).filter((c) => c.entityId === "a");
    expect(components.map((c) => c.trend)).toEqual([2, 4]);
  });
});

describe("seasonalInsights", () => {
  it("notes more frequent weekend openings", () => {
    const records = [
      makeRecord({ dayOfWeek: 1, probabilityOfOpening: 0.5 }),
      makeRecord({ dayOfWeek: 3, probabilityOfOpening: 0.25 }),
    ];
    expect(seasonalInsights("a", records)).toEqual(["Weekend openings are 100% more frequent than weekdays"]);
  });

  it("notes a summer increase", () => {
    const records = [
      makeRecord({ dayOfWeek: 3, month: 7, probabilityOfOpening: 0.6 }),
      makeRecord({ dayOfWeek: 3, month: 1, probabilityOfOpening: 0.3 }),
    ];
    expect(seasonalInsights("a", records)).toEqual(["Summer months show 100% increase in activity"]);
  });

  it("notes reduced rush-hour activity", () => {
    const records = [makeRecord({ dayOfWeek: 2, hourOfDay: 8, probabilityOfOpening: 0.05 })];
    expect(seasonalInsights("a", records)).toEqual(["Activity is significantly reduced during rush hours"]);
  });

  it("says nothing about another entity's records", () => {
    expect(seasonalInsights("z", [makeRecord({ dayOfWeek: 1 }), makeRecord({ dayOfWeek: 3 })])).toEqual([]);
  });
});

describe("cascadeInsights", () => {
  it("describes influence and primary partners", () => {
    const cascades = [
      makeCascade({ strength: 0.8 }),
      makeCascade({ strength: 0.6 }),
      makeCascade({ targetEntityId: "c", targetEntityLabel: "Charlie", strength: 0.4 }),
      makeCascade({ triggerEntityId: "c", triggerEntityLabel: "Charlie", targetEntityId: "a", targetEntityLabel: "Alpha", strength: 0.2 }),
    ];
    expect(cascadeInsights("a", cascades)).toEqual([
      "High cascade influence: frequently triggers openings nearby",
      "Most frequently triggers Bravo (2 cascade events)",
      "Most frequently triggered by Charlie (1 cascade events)",
    ]);
  });

  it("flags a tendency toward immediate responses", () => {
    const cascades = [makeCascade({ strength: 0.3, timing: "immediate" })];
    expect(cascadeInsights("a", cascades)).toEqual([
      "Most frequently triggers Bravo (1 cascade events)",
      "Tends to trigger immediate cascade responses",
    ]);
  });
});

describe("impact", () => {
  // Monday noon, outside rush hour; durations 1 to 10 minutes.
  const events = [...Array.from({ length: 10 }, (_, i) => openAt("a", 0, i + 1)), makeEvent({ closeTime: undefined })];

  it("draws quintile cut points from known durations", () => {
    expect(impactCutPoints(events)).toEqual([2, 4, 6, 8]);
  });

  it("counts the cut points a duration exceeds", () => {
    const cuts = [2, 4, 6, 8];
    expect(classifyImpact(openAt("a", 0, 2), cuts)).toBe("minimal");
    expect(classifyImpact(openAt("a", 0, 5), cuts)).toBe("moderate");
    expect(classifyImpact(makeEvent({ closeTime: undefined }), cuts)).toBeNull();
  });

  it("raises weekday rush-hour events one level, capped at severe", () => {
    const cuts = [2, 4, 6, 8];
    const rush = Date.UTC(2024, 5, 3, 8, 0);
    expect(classifyImpact(makeEvent({ openTime: rush, closeTime: rush + 3 * 60_000 }), cuts)).toBe("moderate");
    expect(classifyImpact(makeEvent({ openTime: rush, closeTime: rush + 9 * 60_000 }), cuts)).toBe("severe");
  });

  it("assesses every closed event", () => {
    expect(assessImpacts(events).map((a) => a.level)).toEqual([
      "minimal",
      "minimal",
      "low",
      "low",
      "moderate",
      "moderate",
      "high",
      "high",
      "severe",
      "severe",
    ]);
  });
});
