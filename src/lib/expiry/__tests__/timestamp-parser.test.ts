import { describe, it, expect } from "vitest";
import { DateTime } from "luxon";
import {
  DATE_RULES,
  isIndeterminateValue,
  normalizeDateString,
  numericSlashRule,
  parseExpiry,
  parseIsoToUtc,
  promoteTwoDigitYear,
  slashOrder,
  type ParsedExpiry,
} from "../timestamp-parser.js";

const REF = DateTime.fromISO("2025-10-01T00:00:00Z").toUTC();

function utcIso(parsed: ParsedExpiry): string | null {
  return parsed.kind === "instant" ? parsed.instant.toISO() : parsed.kind;
}

function parse(raw: unknown, archived?: unknown): string | null {
  return utcIso(parseExpiry(raw, REF, archived));
}

// ── Indeterminate vs unparsable ──────────────────────────────────────────────

describe("parseExpiry - indeterminate values", () => {
  it.each([null, undefined, "", "   ", "Unknown", "unknown", " UNKNOWN "])(
    "treats %j as indeterminate",
    (raw) => {
      expect(parseExpiry(raw, REF, undefined)).toEqual({ kind: "indeterminate" });
    }
  );

  it("reports non-string values as unparsable, not indeterminate", () => {
    expect(parseExpiry(42, REF, undefined)).toEqual({ kind: "unparsable" });
    expect(parseExpiry({ when: "soon" }, REF, undefined)).toEqual({ kind: "unparsable" });
  });

  it("reports free text matching no grammar as unparsable", () => {
    expect(parse("next tuesday")).toBe("unparsable");
    expect(parse("13/13/2025")).toBe("unparsable");
  });

  it("isIndeterminateValue only accepts absent, blank and unknown", () => {
    expect(isIndeterminateValue(undefined)).toBe(true);
    expect(isIndeterminateValue(" unknown")).toBe(true);
    expect(isIndeterminateValue("Sep 3")).toBe(false);
    expect(isIndeterminateValue(0)).toBe(false);
  });
});

// ── ISO-8601 ──────────────────────────────────────────────────────────────────

describe("parseExpiry - ISO input", () => {
  it("honors a trailing Z", () => {
    expect(parse("2025-10-01T00:00:00Z")).toBe("2025-10-01T00:00:00.000Z");
  });

  it("honors an explicit offset regardless of the civil zone", () => {
    expect(parse("2025-10-01T08:30:00+02:00")).toBe("2025-10-01T06:30:00.000Z");
    expect(parse("2025-01-15T08:30:00-08:00")).toBe("2025-01-15T16:30:00.000Z");
  });

  it("reads a naive timestamp as Chicago time (CDT in October)", () => {
    expect(parse("2025-10-01T00:00:00")).toBe("2025-10-01T05:00:00.000Z");
  });

  it("accepts a space between date and time (CST in January)", () => {
    expect(parse("2025-01-15 09:30:00")).toBe("2025-01-15T15:30:00.000Z");
  });

  it("treats a date-only value as Chicago midnight", () => {
    expect(parse("2024-12-25")).toBe("2024-12-25T06:00:00.000Z");
    expect(parse("2025-07-04")).toBe("2025-07-04T05:00:00.000Z");
  });

  it("rejects impossible date-only values", () => {
    expect(parse("2025-02-30")).toBe("unparsable");
  });
});

describe("parseIsoToUtc", () => {
  it("normalizes a lowercase z", () => {
    expect(parseIsoToUtc("2025-10-01T12:00:00z")?.toISO()).toBe("2025-10-01T12:00:00.000Z");
  });

  it("returns null for non-ISO and indeterminate input", () => {
    expect(parseIsoToUtc("Sep 3")).toBeNull();
    expect(parseIsoToUtc("unknown")).toBeNull();
    expect(parseIsoToUtc(undefined)).toBeNull();
    expect(parseIsoToUtc("2025")).toBeNull();
  });

  it("uses the given zone for naive values", () => {
    expect(parseIsoToUtc("2025-10-01T00:00:00", "UTC")?.toISO()).toBe("2025-10-01T00:00:00.000Z");
  });
});

// ── Normalization rules ───────────────────────────────────────────────────────

describe("normalizeDateString", () => {
  it("strips ordinals, rewrites Sept and drops the UTC label", () => {
    expect(normalizeDateString("  Sept   3rd UTC ")).toBe("Sep 3");
  });

  it("strips ordinal suffixes case-insensitively", () => {
    expect(normalizeDateString("October 21ST, 2025 10:00 AM UTC")).toBe(
      "October 21, 2025 10:00 AM"
    );
    expect(normalizeDateString("1st 2nd 3rd 4th")).toBe("1 2 3 4");
  });

  it("leaves words that merely contain a suffix alone", () => {
    expect(normalizeDateString("September 1")).toBe("September 1");
  });
});

describe("numeric slash heuristics", () => {
  it("reads day-first only when the first number exceeds 12", () => {
    expect(slashOrder(13, 5)).toEqual({ month: 5, day: 13 });
    expect(slashOrder(5, 13)).toEqual({ month: 5, day: 13 });
    expect(slashOrder(3, 4)).toEqual({ month: 3, day: 4 });
  });

  it("promotes two-digit years into the 2000s", () => {
    expect(promoteTwoDigitYear(25)).toBe(2025);
    expect(promoteTwoDigitYear(99)).toBe(2099);
    expect(promoteTwoDigitYear(2024)).toBe(2024);
  });

  it("is the first rule tried", () => {
    expect(DATE_RULES[0]).toBe(numericSlashRule);
    expect(numericSlashRule.apply("Sep 3", "America/Chicago")).toBeNull();
  });

  it("parses month-first dates at Chicago midnight", () => {
    expect(parse("09/15/2024")).toBe("2024-09-15T05:00:00.000Z");
  });

  it("parses day-first dates", () => {
    expect(parse("28/09/2025")).toBe("2025-09-28T05:00:00.000Z");
  });

  it("parses two-digit years before the DST switch as CST", () => {
    expect(parse("3/4/25")).toBe("2025-03-04T06:00:00.000Z");
  });
});

// ── Named-month grammars ──────────────────────────────────────────────────────

describe("parseExpiry - named months", () => {
  it.each([
    ["Sep 28, 2025", "2025-09-28T05:00:00.000Z"],
    ["September 28, 2025", "2025-09-28T05:00:00.000Z"],
    ["sep 28 2025", "2025-09-28T05:00:00.000Z"],
    ["September 28 2025", "2025-09-28T05:00:00.000Z"],
    ["28 Sept 2025", "2025-09-28T05:00:00.000Z"],
    ["28 September 2025", "2025-09-28T05:00:00.000Z"],
    ["November 5th, 2025", "2025-11-05T06:00:00.000Z"],
    ["2025-9-5", "2025-09-05T05:00:00.000Z"],
  ])("parses %s", (raw, expected) => {
    expect(parse(raw)).toBe(expected);
  });

  it("parses a 12-hour clock time and ignores the UTC label", () => {
    expect(parse("Oct 1, 2025 11:59 PM UTC")).toBe("2025-10-02T04:59:00.000Z");
    expect(parse("October 21st, 2025 10:00 AM")).toBe("2025-10-21T15:00:00.000Z");
  });
});

describe("parseExpiry - month/day without a year", () => {
  it("anchors on the archived timestamp when present", () => {
    // Sep 3 2024 is 59 days before Nov 1 2024: the anchor year is kept
    expect(parse("Sept 3rd", "2024-11-01T00:00:00Z")).toBe("2024-09-03T05:00:00.000Z");
  });

  it("falls back to the reference instant without an archived hint", () => {
    expect(parse("Sep 3")).toBe("2025-09-03T05:00:00.000Z");
  });

  it("ignores an archived hint that is not ISO", () => {
    expect(parse("Sep 3", "last week")).toBe("2025-09-03T05:00:00.000Z");
  });

  it("moves to the next year when the date is far behind the anchor", () => {
    const ref = DateTime.fromISO("2025-12-20T00:00:00Z").toUTC();
    expect(utcIso(parseExpiry("Jan 5", ref, undefined))).toBe("2026-01-05T06:00:00.000Z");
  });

  it("rejects February 29 without a year", () => {
    expect(parse("Feb 29")).toBe("unparsable");
  });
});
