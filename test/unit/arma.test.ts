import { describe, it, expect } from "vitest";
import {
  fitExpert,
  fitMinimal,
  fitWithFallback,
  fitYuleWalker,
  residualsOf,
  yuleWalker,
} from "../../src/prediction/arma.js";
import { fallbackChain, lowerTier, resolveTier } from "../../src/prediction/tiers.js";
import { mean, rootMeanSquare } from "../../src/stats/descriptive.js";
import { makeFakeLogger, seededRandom } from "../helpers/fixtures.js";

/** Autoregressive series driven by uniform noise, offset to a positive level. */
function arSeries(coefficients: number[], length: number, seed: number): number[] {
  const random = seededRandom(seed);
  const x: number[] = [];
  for (let t = 0; t < length; t++) {
    let value = random() - 0.5;
    coefficients.forEach((phi, i) => {
      if (t - 1 - i >= 0) value += phi * x[t - 1 - i];
    });
    x.push(value);
  }
  return x.map((v) => v + 50);
}

describe("tiers", () => {
  it("resolves unknown values to standard", () => {
    expect(resolveTier("expert")).toBe("expert");
    expect(resolveTier("turbo")).toBe("standard");
    expect(resolveTier(undefined)).toBe("standard");
  });

  it("steps down one tier at a time", () => {
    expect(lowerTier("advanced")).toBe("standard");
    expect(lowerTier("minimal")).toBeNull();
    expect(fallbackChain("expert")).toEqual(["expert", "advanced", "standard", "minimal"]);
  });
});

describe("fitMinimal", () => {
  it("recovers an AR(1) coefficient from the lag-1 autocorrelation", () => {
    const model = fitMinimal(arSeries([0.7], 2000, 3));
    expect(model.tier).toBe("minimal");
    expect(model.ar[0]).toBeGreaterThan(0.6);
    expect(model.ar[0]).toBeLessThan(0.8);
    expect(model.ma).toBe(0.3);
    expect(model.iterations).toBe(0);
  });

  it("forecasts the mean of a single-value series", () => {
    const model = fitMinimal([5]);
    expect(model.next).toBe(5);
    expect(model.rmse).toBe(0);
  });

  it("clamps the configured MA coefficient", () => {
    expect(fitMinimal([1, 2, 3], { defaultMaCoefficient: 4 }).ma).toBe(0.99);
  });
});

describe("fitYuleWalker", () => {
  it("recovers AR(2) coefficients", () => {
    const model = fitYuleWalker("standard", arSeries([0.5, -0.3], 2000, 5));
    expect(model?.ar).toHaveLength(2);
    expect(model?.ar[0]).toBeGreaterThan(0.4);
    expect(model?.ar[0]).toBeLessThan(0.6);
    expect(model?.ar[1]).toBeGreaterThan(-0.4);
    expect(model?.ar[1]).toBeLessThan(-0.2);
    expect(Math.abs(model?.ma ?? 1)).toBeLessThanOrEqual(0.99);
  });

  it("refuses series shorter than the tier minimum", () => {
    expect(fitYuleWalker("standard", [1, 2, 3, 4])).toBeNull();
    expect(fitYuleWalker("advanced", [1, 3, 2, 5, 4, 6])).toBeNull();
  });

  it("refuses a constant series", () => {
    expect(fitYuleWalker("standard", new Array<number>(20).fill(7))).toBeNull();
  });
});

describe("fitExpert", () => {
  it("improves on its Yule-Walker starting point", () => {
    const series = arSeries([0.5, -0.3], 300, 9);
    const model = fitExpert(series);

    const mu = mean(series);
    const x = series.map((v) => v - mu);
    const start = yuleWalker(x, 4, 1e-8);
    expect(start).not.toBeNull();
    const startRmse = rootMeanSquare(residualsOf(x, { ar: start ?? [], ma: 0 }));

    expect(model?.tier).toBe("expert");
    expect(model?.ar).toHaveLength(4);
    expect(model?.iterations).toBeGreaterThanOrEqual(1);
    expect(model?.iterations).toBeLessThanOrEqual(20);
    expect(model?.rmse).toBeLessThanOrEqual(startRmse + 1e-12);
  });

  it("respects the iteration limit", () => {
    const model = fitExpert(arSeries([0.5, -0.3], 300, 9), { maxIterations: 1 });
    expect(model?.iterations).toBe(1);
  });

  it("refuses fewer than ten values", () => {
    expect(fitExpert([1, 4, 2, 6, 3, 7, 2, 5, 1])).toBeNull();
  });

  it("gives up when the first normal equations are ill-conditioned", () => {
    // The MA column of the Jacobian nearly lies in the span of the lagged AR columns.
    const series = arSeries([0.5, -0.3], 300, 9);
    const mu = mean(series);
    expect(yuleWalker(series.map((v) => v - mu), 4, 1e-2)).not.toBeNull();
    expect(fitExpert(series, { conditionThreshold: 1e-2 })).toBeNull();
  });
});

describe("fitWithFallback", () => {
  it("falls back to minimal for a constant series and logs each step", () => {
    const logger = makeFakeLogger();
    const model = fitWithFallback("expert", new Array<number>(20).fill(12), { logger });

    expect(model.tier).toBe("minimal");
    expect(model.next).toBe(12);
    expect(logger.debug).toHaveBeenCalledWith({ tier: "expert", length: 20 }, "Model fit degraded to a lower tier");
    expect(logger.debug).toHaveBeenCalledTimes(3);
  });

  it("steps down from expert to advanced when the refinement is ill-conditioned", () => {
    const logger = makeFakeLogger();
    const model = fitWithFallback("expert", arSeries([0.5, -0.3], 300, 9), { conditionThreshold: 1e-2, logger });

    expect(model.tier).toBe("advanced");
    expect(model.ar).toHaveLength(3);
    expect(logger.debug).toHaveBeenCalledTimes(1);
  });

  it("keeps the requested tier when it fits", () => {
    expect(fitWithFallback("advanced", arSeries([0.6], 200, 1)).tier).toBe("advanced");
  });
});
