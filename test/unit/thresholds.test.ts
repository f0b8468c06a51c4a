import { describe, it, expect } from "vitest";
import { bandOf, quantileThresholds, strengthCutPoints } from "../../src/stats/thresholds.js";

describe("quantileThresholds", () => {
  it("returns zero for every quantile on empty input", () => {
    expect(quantileThresholds([], [0.25, 0.5, 0.75])).toEqual([0, 0, 0]);
  });

  it("picks sorted[floor((n - 1) * q)]", () => {
    // sorted: 1 2 3 4 5 6 7 8 9 ; n - 1 = 8
    const samples = [9, 1, 8, 2, 7, 3, 6, 4, 5];
    expect(quantileThresholds(samples, [0, 0.25, 0.5, 0.75, 1])).toEqual([1, 3, 5, 7, 9]);
  });

  it("does not depend on input order", () => {
    const a = [0.4, 0.1, 0.9, 0.3, 0.7, 0.2];
    const b = [...a].reverse();
    expect(quantileThresholds(a, [0.25, 0.5, 0.75])).toEqual(quantileThresholds(b, [0.25, 0.5, 0.75]));
  });

  it("is monotone in the quantile level", () => {
    const samples = [5, 3, 8, 1, 9, 2, 7];
    const levels = [0, 0.1, 0.3, 0.5, 0.7, 0.9, 1];
    const cuts = quantileThresholds(samples, levels);
    for (let i = 1; i < cuts.length; i++) expect(cuts[i]).toBeGreaterThanOrEqual(cuts[i - 1]);
  });

  it("drops non-finite samples and clamps quantiles", () => {
    expect(quantileThresholds([Number.NaN, 2, Infinity, 4], [-1, 2])).toEqual([2, 4]);
  });

  it("does not mutate its input", () => {
    const samples = [3, 1, 2];
    quantileThresholds(samples, [0.5]);
    expect(samples).toEqual([3, 1, 2]);
  });
});

describe("strengthCutPoints", () => {
  it("returns the lower and upper quartiles", () => {
    expect(strengthCutPoints([0.1, 0.2, 0.3, 0.4, 0.5])).toEqual({ lower: 0.2, upper: 0.4 });
  });
});

describe("bandOf", () => {
  it("counts the cut points at or below the value", () => {
    const cuts = [0.2, 0.5, 0.8];
    expect(bandOf(0.1, cuts)).toBe(0);
    expect(bandOf(0.2, cuts)).toBe(1);
    expect(bandOf(0.79, cuts)).toBe(2);
    expect(bandOf(0.95, cuts)).toBe(3);
  });
});
