import { z } from "zod";
import { COMPUTE_TIERS } from "../types.js";
import type { SpanwiseConfig } from "./types.js";

const windowSchema = z
  .object({
    min: z.number().nonnegative().default(30),
    max: z.number().positive().default(90),
  })
  .refine((w) => w.min <= w.max, { message: "windowMinutes.min must not exceed windowMinutes.max" });

const analyticsSchema = z.object({
  minimumSampleSize: z.number().int().positive().default(10),
  timeZone: z
    .string()
    .default("UTC")
    .refine(isValidTimeZone, { message: "Unknown IANA time zone" }),
});

const weightsSchema = z.object({
  temporal: z.number().nonnegative().default(0.25),
  spatial: z.number().nonnegative().default(0.25),
  durationCorrelation: z.number().nonnegative().default(0.25),
  historical: z.number().nonnegative().default(0.25),
});

const cascadeSchema = z.object({
  windowMinutes: windowSchema.default({}),
  maxDistanceKm: z.number().positive().default(5),
  immediateThresholdMinutes: z.number().nonnegative().default(35),
  weights: weightsSchema
    .default({})
    .refine(
      (w) => w.temporal + w.spatial + w.durationCorrelation + w.historical > 0,
      { message: "At least one cascade weight must be positive" },
    ),
});

const predictionSchema = z.object({
  tier: z.enum(COMPUTE_TIERS).default("standard"),
  horizonMinutes: z.number().positive().default(60),
  cascadeBoostFactor: z.number().min(0).max(1).default(0.15),
  maxBoostedProbability: z.number().min(0).max(1).default(0.95),
  missingContextPenalty: z.number().min(0).max(1).default(0.7),
  defaultMaCoefficient: z.number().gt(-1).lt(1).default(0.3),
  maxIterations: z.number().int().positive().max(200).default(20),
  tolerance: z.number().positive().default(1e-6),
  conditionThreshold: z.number().positive().default(1e-8),
});

const samplingSchema = z.object({
  maxEvents: z.number().int().positive().default(5000),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const spanwiseConfigSchema = z.object({
  analytics: analyticsSchema.default({}),
  cascade: cascadeSchema.default({}),
  prediction: predictionSchema.default({}),
  sampling: samplingSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): SpanwiseConfig {
  return spanwiseConfigSchema.parse(raw);
}

function isValidTimeZone(zone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: zone });
    return true;
  } catch {
    return false;
  }
}
