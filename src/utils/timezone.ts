/**
 * Wall-clock helpers for an explicit IANA time zone.
 *
 * Instants are epoch milliseconds everywhere in chronorun; these helpers are the
 * only place that turns an instant into calendar fields (and back) so that month
 * and year arithmetic happens on the user's local calendar.
 */

export interface WallClock {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timeZone: string): Intl.DateTimeFormat {
  let fmt = formatters.get(timeZone);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(timeZone, fmt);
  }
  return fmt;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/** Zone the host's cron and launchd read calendar fields in. */
export function hostTimeZone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/** Resolves the configured zone; "auto" means the zone of the host. */
export function resolveTimeZone(setting: string): string {
  if (!setting || setting === "auto") return hostTimeZone();
  if (!isValidTimeZone(setting)) throw new Error(`unknown timezone '${setting}'`);
  return setting;
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

export function toWallClock(ms: number, timeZone: string): WallClock {
  const parts = formatterFor(timeZone).formatToParts(new Date(ms));
  const get = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find((p) => p.type === type)?.value ?? "0");
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour"),
    minute: get("minute"),
    second: get("second"),
    millisecond: ((ms % 1000) + 1000) % 1000,
  };
}

function wallClockAsUtc(w: WallClock): number {
  return Date.UTC(w.year, w.month - 1, w.day, w.hour, w.minute, w.second, w.millisecond);
}

export function offsetMs(ms: number, timeZone: string): number {
  return wallClockAsUtc(toWallClock(ms, timeZone)) - ms;
}

/**
 * Instant whose wall clock in `timeZone` reads `w`. Ambiguous times (DST fall-back)
 * resolve to the earlier instant; times inside a DST gap move forward past it.
 */
export function fromWallClock(w: WallClock, timeZone: string): number {
  const local = wallClockAsUtc(w);
  const first = local - offsetMs(local, timeZone);
  const second = local - offsetMs(first, timeZone);
  if (first === second) return first;
  const roundTrips = (ms: number) => wallClockAsUtc(toWallClock(ms, timeZone)) === local;
  if (roundTrips(second)) return second;
  if (roundTrips(first)) return first;
  return Math.max(first, second);
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

/** `YYYY-MM-DD HH:mm` in the given zone. */
export function formatWallClock(ms: number, timeZone: string): string {
  const w = toWallClock(ms, timeZone);
  return `${pad(w.year, 4)}-${pad(w.month)}-${pad(w.day)} ${pad(w.hour)}:${pad(w.minute)}`;
}
