import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { EntityLocation, SpanEvent } from "../types.js";
import { InputError, formatIssues } from "../errors.js";

/** Epoch milliseconds or any string `Date.parse` understands. */
const timeSchema = z.union([
  z.number().finite(),
  z
    .string()
    .min(1)
    .transform((value, ctx) => {
      const parsed = Date.parse(value);
      if (Number.isNaN(parsed)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unparseable time "${value}"` });
        return z.NEVER;
      }
      return parsed;
    }),
]);

const eventSchema = z.object({
  entityId: z.string().min(1),
  entityLabel: z.string().default(""),
  openTime: timeSchema,
  closeTime: timeSchema.nullish(),
  durationMinutes: z.number().nonnegative().nullish(),
  latitude: z.number().min(-90).max(90).default(0),
  longitude: z.number().min(-180).max(180).default(0),
});

const locationSchema = z.object({
  entityId: z.string().min(1),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});

export const snapshotSchema = z.object({
  events: z.array(eventSchema).default([]),
  locations: z.array(locationSchema).default([]),
});

export interface Snapshot {
  readonly events: SpanEvent[];
  readonly locations: EntityLocation[];
}

/**
 * Validate a parsed snapshot document. Null close times and durations mean
 * "still open"; entities without an explicit location inherit the first
 * coordinates their events carry.
 */
export function parseSnapshot(raw: unknown, source = "<input>"): Snapshot {
  const result = snapshotSchema.safeParse(raw);
  if (!result.success) {
    throw new InputError(`Invalid snapshot ${source}: ${formatIssues(result.error)}`, source, result.error.issues);
  }

  const events = result.data.events.map((e): SpanEvent => {
    const event: SpanEvent = {
      entityId: e.entityId,
      entityLabel: e.entityLabel,
      openTime: e.openTime,
      latitude: e.latitude,
      longitude: e.longitude,
    };
    if (e.closeTime === null || e.closeTime === undefined) return event;
    return e.durationMinutes === null || e.durationMinutes === undefined
      ? { ...event, closeTime: e.closeTime }
      : { ...event, closeTime: e.closeTime, durationMinutes: e.durationMinutes };
  });

  const locations: EntityLocation[] = [...result.data.locations];
  const located = new Set(locations.map((l) => l.entityId));
  for (const e of events) {
    if (located.has(e.entityId) || (e.latitude === 0 && e.longitude === 0)) continue;
    locations.push({ entityId: e.entityId, latitude: e.latitude, longitude: e.longitude });
    located.add(e.entityId);
  }

  return { events, locations };
}

export async function readSnapshot(path: string): Promise<Snapshot> {
  const fullPath = resolve(path);
  let content: string;
  try {
    content = await readFile(fullPath, "utf-8");
  } catch (err) {
    throw new InputError(`Cannot read ${fullPath}: ${err instanceof Error ? err.message : String(err)}`, fullPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new InputError(`Invalid JSON in ${fullPath}: ${err instanceof Error ? err.message : String(err)}`, fullPath);
  }
  return parseSnapshot(raw, fullPath);
}
