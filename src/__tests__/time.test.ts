import { describe, it, expect } from "vitest";
import {
  formatLocal,
  isValidTimeZone,
  localDate,
  localHour,
  nextLocalMidnight,
  parseTimestamp,
  toZonedIso,
  zoneOffsetMs,
} from "../time.js";

describe("zoned time helpers", () => {
  it("reads the local hour in Moscow", () => {
    expect(localHour(new Date("2026-10-19T06:00:00.000Z"), "Europe/Moscow")).toBe(9);
  });

  it("rolls the civil date over at local midnight", () => {
    expect(localDate(new Date("2026-10-19T20:59:59.000Z"), "Europe/Moscow")).toBe("2026-10-19");
    expect(localDate(new Date("2026-10-19T21:00:00.000Z"), "Europe/Moscow")).toBe("2026-10-20");
  });

  it("reports the zone offset", () => {
    expect(zoneOffsetMs(new Date("2026-10-19T06:00:00.000Z"), "Europe/Moscow")).toBe(3 * 60 * 60 * 1000);
    expect(zoneOffsetMs(new Date("2026-10-19T06:00:00.000Z"), "UTC")).toBe(0);
  });

  it("formats ISO timestamps with the zone offset", () => {
    const date = new Date("2026-10-19T08:00:00.250Z");
    expect(toZonedIso(date, "Europe/Moscow")).toBe("2026-10-19T11:00:00.250+03:00");
    expect(toZonedIso(date, "UTC")).toBe("2026-10-19T08:00:00.250+00:00");
    expect(toZonedIso(date, "America/New_York")).toBe("2026-10-19T04:00:00.250-04:00");
  });

  it("round-trips a zoned timestamp through parseTimestamp", () => {
    const date = new Date("2026-10-19T08:00:00.000Z");
    expect(parseTimestamp(toZonedIso(date, "Europe/Moscow"))?.getTime()).toBe(date.getTime());
  });

  it("returns null for unparsable timestamps", () => {
    expect(parseTimestamp("not a date")).toBeNull();
    expect(parseTimestamp("")).toBeNull();
  });

  it("formats wall-clock time", () => {
    expect(formatLocal(new Date("2026-10-19T08:05:09.000Z"), "Europe/Moscow")).toBe("2026-10-19 11:05:09");
  });

  it("validates zone names", () => {
    expect(isValidTimeZone("Europe/Moscow")).toBe(true);
    expect(isValidTimeZone("Mars/Olympus_Mons")).toBe(false);
  });
});

describe("nextLocalMidnight", () => {
  it("finds the coming midnight", () => {
    const next = nextLocalMidnight(new Date("2026-10-19T06:00:00.000Z"), "Europe/Moscow");
    expect(next.toISOString()).toBe("2026-10-19T21:00:00.000Z");
  });

  it("skips to the following day when called exactly at midnight", () => {
    const next = nextLocalMidnight(new Date("2026-10-19T21:00:00.000Z"), "Europe/Moscow");
    expect(next.toISOString()).toBe("2026-10-20T21:00:00.000Z");
  });

  it("uses the offset in effect at the target midnight", () => {
    // 2026-10-31 12:00 EDT; clocks go back at 02:00 on Nov 1
    const next = nextLocalMidnight(new Date("2026-10-31T16:00:00.000Z"), "America/New_York");
    expect(next.toISOString()).toBe("2026-11-01T04:00:00.000Z");
  });
});
