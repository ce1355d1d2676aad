import { describe, it, expect } from "vitest";
import { DateTime } from "luxon";
import { chooseYear, YEAR_WINDOW_DAYS } from "../year-disambiguator.js";

const at = (iso: string) => DateTime.fromISO(iso).toUTC();

describe("chooseYear", () => {
  it("uses a 180-day window", () => {
    expect(YEAR_WINDOW_DAYS).toBe(180);
  });

  it("steps back a year when the candidate is exactly 181 days after the anchor", () => {
    // 2024-06-30 00:00 CDT is 181 days after 2024-01-01T05:00Z
    const anchor = at("2024-01-01T05:00:00Z");
    expect(chooseYear(6, 30, anchor, null)?.toISO()).toBe("2023-06-30T05:00:00.000Z");
  });

  it("keeps the anchor year when the candidate is exactly 179 days after the anchor", () => {
    const anchor = at("2024-01-01T05:00:00Z");
    expect(chooseYear(6, 28, anchor, null)?.toISO()).toBe("2024-06-28T05:00:00.000Z");
  });

  it("floors partial days: 180 days 23 hours still counts as 180", () => {
    // 2024-06-30 00:00 CDT minus 2024-01-01T06:00Z = 180 days 23 hours
    const anchor = at("2024-01-01T06:00:00Z");
    expect(chooseYear(6, 30, anchor, null)?.toISO()).toBe("2024-06-30T05:00:00.000Z");
  });

  it("steps forward a year when the candidate is more than 180 days before the anchor", () => {
    const anchor = at("2024-07-04T05:00:00Z");
    expect(chooseYear(1, 4, anchor, null)?.toISO()).toBe("2025-01-04T06:00:00.000Z");
  });

  it("prefers the archived instant over the reference as anchor", () => {
    const ref = at("2025-10-01T00:00:00Z");
    const archived = at("2024-11-01T00:00:00Z");
    expect(chooseYear(9, 3, ref, archived)?.toISO()).toBe("2024-09-03T05:00:00.000Z");
    expect(chooseYear(9, 3, ref, null)?.toISO()).toBe("2025-09-03T05:00:00.000Z");
  });

  it("returns null when the date does not exist in the anchor year", () => {
    expect(chooseYear(2, 29, at("2025-03-01T00:00:00Z"), null)).toBeNull();
  });

  it("keeps the first candidate when the adjusted year has no such date", () => {
    // Feb 29 2024 is far behind Dec 2024, but Feb 29 2025 does not exist
    expect(chooseYear(2, 29, at("2024-12-01T00:00:00Z"), null)?.toISO()).toBe(
      "2024-02-29T06:00:00.000Z"
    );
  });

  it("honors another civil zone", () => {
    expect(chooseYear(9, 3, at("2025-10-01T00:00:00Z"), null, "UTC")?.toISO()).toBe(
      "2025-09-03T00:00:00.000Z"
    );
  });
});
