import { SCHEDULE_INTERVALS, type ScheduleInterval } from "../tasks/types.js";
import { daysInMonth, fromWallClock, toWallClock } from "../utils/timezone.js";
import { ScheduleConfigError } from "./errors.js";

const MINUTE_MS = 60_000;

const FIXED_UNIT_MS = {
  Minutes: MINUTE_MS,
  Hours: 60 * MINUTE_MS,
  Days: 24 * 60 * MINUTE_MS,
  Weeks: 7 * 24 * 60 * MINUTE_MS,
} as const;

export function isScheduleInterval(value: string): value is ScheduleInterval {
  return SCHEDULE_INTERVALS.some((unit) => unit === value);
}

function addMonths(ms: number, months: number, timeZone: string): number {
  const w = toWallClock(ms, timeZone);
  const total = w.month - 1 + months;
  const year = w.year + Math.floor(total / 12);
  const month = (((total % 12) + 12) % 12) + 1;
  const day = Math.min(w.day, daysInMonth(year, month));
  return fromWallClock({ ...w, year, month, day }, timeZone);
}

/**
 * Adds `count` interval units to an instant. Minutes through Weeks are fixed
 * durations; Months and Years move along the calendar of `timeZone`, clamping the
 * day to the end of a shorter month.
 */
export function addInterval(ms: number, interval: ScheduleInterval, count: number, timeZone: string): number {
  switch (interval) {
    case "Minutes":
    case "Hours":
    case "Days":
    case "Weeks":
      return ms + FIXED_UNIT_MS[interval] * count;
    case "Months":
      return addMonths(ms, count, timeZone);
    case "Years":
      return addMonths(ms, count * 12, timeZone);
    default:
      throw new ScheduleConfigError(`Unsupported interval: ${String(interval)}`);
  }
}

/**
 * Smallest due time strictly after `nowMs` reachable from `dueMs` in steps of
 * `skipIntervals + 1` units. A due time already in the future comes back unchanged.
 */
export function advance(
  dueMs: number,
  interval: string,
  skipIntervals: number,
  nowMs: number,
  timeZone: string,
): number {
  if (!isScheduleInterval(interval)) throw new ScheduleConfigError(`Unsupported interval: ${interval}`);
  if (!Number.isInteger(skipIntervals) || skipIntervals < 0) {
    throw new ScheduleConfigError(`Skip intervals must be a non-negative integer, got ${skipIntervals}`);
  }
  const step = skipIntervals + 1;
  let next = dueMs;
  while (next <= nowMs) next = addInterval(next, interval, step, timeZone);
  return next;
}
