/**
 * UTC calendar helpers for half-open time windows.
 */

import type { TimeWindow } from "./types.js";

export const DAY_MS = 86_400_000;

/** Parse a date-ish value into a canonical ISO-8601 UTC string, or null. */
export function toIsoInstant(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value !== "string" && typeof value !== "number") return null;
  if (typeof value === "string" && value.trim() === "") return null;
  const ms = typeof value === "number" ? value : Date.parse(value);
  if (Number.isNaN(ms)) return null;
  return new Date(ms).toISOString();
}

export function toMs(iso: string): number {
  return Date.parse(iso);
}

export function dayKey(iso: string): string {
  return iso.slice(0, 10);
}

export function monthKey(iso: string): string {
  return iso.slice(0, 7);
}

export function startOfUtcDay(ms: number): number {
  const d = new Date(ms);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate());
}

export function startOfUtcMonth(ms: number): number {
  const d = new Date(ms);
  return Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), 1);
}

function daysInUtcMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month + 1, 0)).getUTCDate();
}

/** Add calendar months, clamping the day to the end of a shorter month. */
export function addUtcMonths(ms: number, months: number): number {
  const d = new Date(ms);
  const target = d.getUTCMonth() + months;
  const year = d.getUTCFullYear() + Math.floor(target / 12);
  const month = ((target % 12) + 12) % 12;
  const day = Math.min(d.getUTCDate(), daysInUtcMonth(year, month));
  return Date.UTC(
    year,
    month,
    day,
    d.getUTCHours(),
    d.getUTCMinutes(),
    d.getUTCSeconds(),
    d.getUTCMilliseconds(),
  );
}

export function windowLengthMs(window: TimeWindow): number {
  return toMs(window.end) - toMs(window.start);
}

/** The window of equal length ending where `window` starts. */
export function precedingWindow(window: TimeWindow): TimeWindow {
  const start = toMs(window.start);
  return {
    start: new Date(start - windowLengthMs(window)).toISOString(),
    end: window.start,
  };
}

export function inWindow(iso: string, window: TimeWindow): boolean {
  const ms = toMs(iso);
  return ms >= toMs(window.start) && ms < toMs(window.end);
}

export function isValidWindow(window: TimeWindow): boolean {
  const start = toMs(window.start);
  const end = toMs(window.end);
  return !Number.isNaN(start) && !Number.isNaN(end) && start < end;
}

/**
 * The period of `months` calendar months, anchored at `anchor`, that contains `at`.
 * Periods are computed from the anchor each time so clamped days never drift.
 */
export function anchoredPeriod(anchor: string, months: number, at: number): TimeWindow {
  const anchorMs = toMs(anchor);
  const a = new Date(anchorMs);
  const t = new Date(at);
  const monthDiff =
    (t.getUTCFullYear() - a.getUTCFullYear()) * 12 + (t.getUTCMonth() - a.getUTCMonth());
  let k = Math.floor(monthDiff / months);

  while (addUtcMonths(anchorMs, k * months) > at) k--;
  while (addUtcMonths(anchorMs, (k + 1) * months) <= at) k++;

  return {
    start: new Date(addUtcMonths(anchorMs, k * months)).toISOString(),
    end: new Date(addUtcMonths(anchorMs, (k + 1) * months)).toISOString(),
  };
}

/** The calendar month containing `at`. */
export function monthWindow(at: number): TimeWindow {
  const start = startOfUtcMonth(at);
  return {
    start: new Date(start).toISOString(),
    end: new Date(addUtcMonths(start, 1)).toISOString(),
  };
}
