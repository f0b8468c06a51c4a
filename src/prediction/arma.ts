import type { ComputeTier } from "../types.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { autocorrelation, autocovariance, clamp, mean, rootMeanSquare } from "../stats/descriptive.js";
import { gramian, solveLinearSystem, toeplitz, transposeTimes } from "../stats/linear-algebra.js";
import { fallbackChain } from "./tiers.js";

/**
 * ARMA(p, 1) on the mean-centred series x:
 *   x[t] = φ1·x[t-1] + … + φp·x[t-p] + θ·e[t-1] + e[t]
 */
export interface ArmaModel {
  readonly tier: ComputeTier;
  readonly ar: readonly number[];
  readonly ma: number;
  readonly mean: number;
  /** RMS of the in-sample one-step residuals. */
  readonly rmse: number;
  /** One-step-ahead forecast of the next value, in series units. */
  readonly next: number;
  /** LM iterations run; 0 for closed-form tiers. */
  readonly iterations: number;
}

export interface FitOptions {
  readonly defaultMaCoefficient?: number;
  readonly maxIterations?: number;
  readonly tolerance?: number;
  /** Systems with a pivot ratio below this are treated as singular. */
  readonly conditionThreshold?: number;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

const MA_BOUND = 0.99;
const EXPERT_AR_ORDER = 4;
const MAX_DAMPING = 1e10;

const AR_ORDER: Record<ComputeTier, number> = {
  minimal: 1,
  standard: 2,
  advanced: 3,
  expert: EXPERT_AR_ORDER,
};

/** Shortest series each tier will attempt. */
export const MIN_SERIES_LENGTH: Record<ComputeTier, number> = {
  minimal: 0,
  standard: 5,
  advanced: 7,
  expert: 10,
};

interface Params {
  readonly ar: readonly number[];
  readonly ma: number;
}

/** One-step residuals; the first p are not defined and stay out of the list. */
export function residualsOf(x: readonly number[], params: Params): number[] {
  const p = params.ar.length;
  const out: number[] = [];
  let prev = 0;
  for (let t = p; t < x.length; t++) {
    let predicted = params.ma * prev;
    for (let i = 0; i < p; i++) predicted += params.ar[i] * x[t - 1 - i];
    const e = x[t] - predicted;
    out.push(e);
    prev = e;
  }
  return out;
}

function sumOfSquares(values: readonly number[]): number {
  let s = 0;
  for (const v of values) s += v * v;
  return s;
}

function finish(tier: ComputeTier, series: readonly number[], mu: number, params: Params, iterations: number): ArmaModel {
  const x = series.map((v) => v - mu);
  const residuals = residualsOf(x, params);
  const lastResidual = residuals.length > 0 ? residuals[residuals.length - 1] : 0;

  let next = params.ma * lastResidual;
  for (let i = 0; i < params.ar.length; i++) {
    const past = x[x.length - 1 - i];
    if (past !== undefined) next += params.ar[i] * past;
  }

  return {
    tier,
    ar: params.ar,
    ma: params.ma,
    mean: mu,
    rmse: rootMeanSquare(residuals),
    next: mu + next,
    iterations,
  };
}

/** AR(1) from the lag-1 autocorrelation with a fixed MA term. Never fails. */
export function fitMinimal(series: readonly number[], options: FitOptions = {}): ArmaModel {
  const mu = mean(series);
  const phi = clamp(autocorrelation(series, 1), -MA_BOUND, MA_BOUND);
  const ma = clamp(options.defaultMaCoefficient ?? 0.3, -MA_BOUND, MA_BOUND);
  return finish("minimal", series, mu, { ar: series.length >= 2 ? [phi] : [0], ma }, 0);
}

/** AR(p) coefficients by Yule-Walker, or null when the system is near-singular. */
export function yuleWalker(x: readonly number[], order: number, conditionThreshold: number): number[] | null {
  const gamma = autocovariance(x, order);
  if (!(gamma[0] > 0)) return null;
  const solution = solveLinearSystem(toeplitz(gamma.slice(0, order)), gamma.slice(1, order + 1));
  if (!solution || solution.rcond < conditionThreshold) return null;
  return solution.x;
}

/** AR(p) by Yule-Walker, MA from the lag-1 autocorrelation of the AR residuals. */
export function fitYuleWalker(
  tier: ComputeTier,
  series: readonly number[],
  options: FitOptions = {},
): ArmaModel | null {
  const order = AR_ORDER[tier];
  if (series.length < MIN_SERIES_LENGTH[tier]) return null;

  const mu = mean(series);
  const x = series.map((v) => v - mu);
  const ar = yuleWalker(x, order, options.conditionThreshold ?? 1e-8);
  if (!ar) return null;

  const ma = clamp(autocorrelation(residualsOf(x, { ar, ma: 0 }), 1), -MA_BOUND, MA_BOUND);
  return finish(tier, series, mu, { ar, ma }, 0);
}

/**
 * AR(4)+MA(1) refined by Levenberg-Marquardt on the residual sum of squares,
 * starting from Yule-Walker AR estimates and a zero MA term. The Jacobian is
 * taken by forward differences. Stops after `maxIterations`, once the relative
 * improvement falls under `tolerance`, or on abort (keeping the best so far).
 */
export function fitExpert(series: readonly number[], options: FitOptions = {}): ArmaModel | null {
  if (series.length < MIN_SERIES_LENGTH.expert) return null;
  const maxIterations = options.maxIterations ?? 20;
  const tolerance = options.tolerance ?? 1e-6;
  const conditionThreshold = options.conditionThreshold ?? 1e-8;

  const mu = mean(series);
  const x = series.map((v) => v - mu);
  const initialAr = yuleWalker(x, EXPERT_AR_ORDER, conditionThreshold);
  if (!initialAr) return null;

  const toParams = (beta: readonly number[]): Params => ({
    ar: beta.slice(0, EXPERT_AR_ORDER),
    ma: clamp(beta[EXPERT_AR_ORDER], -MA_BOUND, MA_BOUND),
  });
  const residualsAt = (beta: readonly number[]): number[] => residualsOf(x, toParams(beta));

  const cols = EXPERT_AR_ORDER + 1;
  let beta = [...initialAr, 0];
  let residuals = residualsAt(beta);
  let sse = sumOfSquares(residuals);
  let damping = 1e-3;
  let iterations = 0;
  let converged = false;

  while (!converged && iterations < maxIterations) {
    if (options.signal?.aborted) break;
    iterations++;

    const jacobian = numericJacobian(residualsAt, beta, residuals);
    const jtj = gramian(jacobian, cols);
    const gradient = transposeTimes(jacobian, residuals, cols);

    if (iterations === 1) {
      const normal = solveLinearSystem(jtj, gradient);
      if (!normal || normal.rcond < conditionThreshold) return null;
    }

    let accepted = false;
    while (damping <= MAX_DAMPING) {
      const damped = jtj.map((row, i) => row.map((v, j) => (i === j ? v + damping * (v > 0 ? v : 1) : v)));
      const step = solveLinearSystem(damped, gradient.map((g) => -g));
      if (!step) {
        damping *= 10;
        continue;
      }
      const candidate = beta.map((b, i) => b + step.x[i]);
      const candidateResiduals = residualsAt(candidate);
      const candidateSse = sumOfSquares(candidateResiduals);
      if (Number.isFinite(candidateSse) && candidateSse < sse) {
        const improvement = (sse - candidateSse) / Math.max(sse, Number.EPSILON);
        beta = candidate;
        residuals = candidateResiduals;
        sse = candidateSse;
        damping = Math.max(damping / 10, 1e-12);
        accepted = true;
        converged = improvement < tolerance;
        break;
      }
      damping *= 10;
    }
    if (!accepted) break;
  }

  const params = toParams(beta);
  if (!params.ar.every(Number.isFinite) || !Number.isFinite(params.ma)) return null;
  return finish("expert", series, mu, params, iterations);
}

function numericJacobian(
  residualsAt: (beta: readonly number[]) => number[],
  beta: readonly number[],
  base: readonly number[],
): number[][] {
  const rows: number[][] = base.map(() => new Array<number>(beta.length).fill(0));
  for (let k = 0; k < beta.length; k++) {
    const h = 1e-6 * Math.max(1, Math.abs(beta[k]));
    const shifted = beta.map((b, i) => (i === k ? b + h : b));
    const r = residualsAt(shifted);
    for (let t = 0; t < base.length; t++) rows[t][k] = (r[t] - base[t]) / h;
  }
  return rows;
}

export function fitTier(tier: ComputeTier, series: readonly number[], options: FitOptions = {}): ArmaModel | null {
  switch (tier) {
    case "minimal":
      return fitMinimal(series, options);
    case "standard":
    case "advanced":
      return fitYuleWalker(tier, series, options);
    case "expert":
      return fitExpert(series, options);
  }
}

/** Fit at `tier`, stepping down one tier at a time until a fit succeeds. */
export function fitWithFallback(tier: ComputeTier, series: readonly number[], options: FitOptions = {}): ArmaModel {
  const logger = options.logger ?? silentLogger;
  for (const candidate of fallbackChain(tier)) {
    const model = fitTier(candidate, series, options);
    if (model) return model;
    logger.debug({ tier: candidate, length: series.length }, "Model fit degraded to a lower tier");
  }
  return fitMinimal(series, options);
}
