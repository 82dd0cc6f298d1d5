import { describe, expect, test } from "vitest";
import { daysInMonth, formatWallClock, fromWallClock, resolveTimeZone, toWallClock } from "../src/utils/timezone.js";

describe("timezone helpers", () => {
  test("reads wall-clock fields in a zone", () => {
    expect(toWallClock(Date.UTC(2024, 0, 1, 0, 0, 5, 250), "America/New_York")).toEqual({
      year: 2023,
      month: 12,
      day: 31,
      hour: 19,
      minute: 0,
      second: 5,
      millisecond: 250,
    });
  });

  test("midnight reads as hour 0", () => {
    expect(toWallClock(Date.UTC(2024, 5, 1, 0, 0), "UTC").hour).toBe(0);
  });

  test("round-trips an ordinary wall time", () => {
    const w = { year: 2024, month: 7, day: 4, hour: 18, minute: 5, second: 0, millisecond: 0 };
    expect(fromWallClock(w, "Europe/Berlin")).toBe(Date.UTC(2024, 6, 4, 16, 5));
  });

  test("a wall time inside the spring-forward gap moves past it", () => {
    const w = { year: 2024, month: 3, day: 10, hour: 2, minute: 30, second: 0, millisecond: 0 };
    expect(fromWallClock(w, "America/New_York")).toBe(Date.UTC(2024, 2, 10, 7, 30));
  });

  test("an ambiguous fall-back wall time takes the earlier instant", () => {
    const w = { year: 2024, month: 11, day: 3, hour: 1, minute: 30, second: 0, millisecond: 0 };
    expect(fromWallClock(w, "America/New_York")).toBe(Date.UTC(2024, 10, 3, 5, 30));
  });

  test("formats in the zone", () => {
    expect(formatWallClock(Date.UTC(2024, 6, 4, 16, 5), "Europe/Berlin")).toBe("2024-07-04 18:05");
  });

  test("days in month", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(2023, 12)).toBe(31);
  });

  test("resolves explicit and automatic zones", () => {
    expect(resolveTimeZone("Asia/Tokyo")).toBe("Asia/Tokyo");
    expect(resolveTimeZone("auto")).toBe(Intl.DateTimeFormat().resolvedOptions().timeZone);
    expect(() => resolveTimeZone("Mars/Olympus")).toThrow("unknown timezone 'Mars/Olympus'");
  });
});
