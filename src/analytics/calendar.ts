import type { Timestamp } from "../types.js";

export interface CalendarFields {
  readonly year: number;
  /** 1 = January */
  readonly month: number;
  /** 1 = Sunday … 7 = Saturday */
  readonly dayOfWeek: number;
  readonly hour: number;
}

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];
const DAY_NAMES = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      year: "numeric",
      month: "numeric",
      weekday: "short",
      hour: "numeric",
      hourCycle: "h23",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

/**
 * Calendar bucket fields of `time` in `timeZone`.
 * An unknown zone falls back to UTC.
 */
export function calendarFields(time: Timestamp, timeZone = "UTC"): CalendarFields {
  const date = new Date(time);
  if (timeZone === "UTC") return utcFields(date);

  let parts: Intl.DateTimeFormatPart[];
  try {
    parts = formatterFor(timeZone).formatToParts(date);
  } catch {
    return utcFields(date);
  }

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  const dayIndex = WEEKDAYS.indexOf(part("weekday"));
  const year = parseInt(part("year"), 10);
  const month = parseInt(part("month"), 10);
  const hour = parseInt(part("hour"), 10) % 24;
  if (dayIndex < 0 || Number.isNaN(year) || Number.isNaN(month) || Number.isNaN(hour)) {
    return utcFields(date);
  }

  return { year, month, dayOfWeek: dayIndex + 1, hour };
}

function utcFields(date: Date): CalendarFields {
  return {
    year: date.getUTCFullYear(),
    month: date.getUTCMonth() + 1,
    dayOfWeek: date.getUTCDay() + 1,
    hour: date.getUTCHours(),
  };
}

export function dayName(dayOfWeek: number): string {
  return DAY_NAMES[(dayOfWeek - 1 + 7) % 7] ?? "Unknown";
}

export function formatHour(hour: number): string {
  if (hour === 0) return "12 AM";
  if (hour < 12) return `${hour} AM`;
  if (hour === 12) return "12 PM";
  return `${hour - 12} PM`;
}

export function isWeekend(dayOfWeek: number): boolean {
  return dayOfWeek === 1 || dayOfWeek === 7;
}

/** Weekday 7–9 AM or 4–6 PM. */
export function isRushHour(dayOfWeek: number, hour: number): boolean {
  if (isWeekend(dayOfWeek)) return false;
  return (hour >= 7 && hour <= 9) || (hour >= 16 && hour <= 18);
}

/** May through September. */
export function isSummer(month: number): boolean {
  return month >= 5 && month <= 9;
}
