import { DateTime } from "luxon";
import { civilMidnight, DEFAULT_CIVIL_ZONE, type Instant } from "./civil-time.js";
import { chooseYear } from "./year-disambiguator.js";

export type ParsedExpiry =
  | { kind: "instant"; instant: Instant }
  | { kind: "indeterminate" }
  | { kind: "unparsable" };

export type RuleMatch =
  | { kind: "instant"; instant: Instant }
  | { kind: "month-day"; month: number; day: number };

export type DateRule = {
  name: string;
  apply: (text: string, zone: string) => RuleMatch | null;
};

/** Month/day-only formats are parsed against this year; 1900 is not a leap year, so "Feb 29" never matches. */
export const PLACEHOLDER_YEAR = 1900;

const LOCALE = "en-US";
const DATE_ONLY_ISO = /^(\d{4})-(\d{2})-(\d{2})$/;
const ISO_DATE_PREFIX = /^\d{4}-?\d{2}-?\d{2}(?:$|[T ])/;
const NUMERIC_SLASH = /^(\d{1,2})\/(\d{1,2})\/(\d{2,4})$/;

const INDETERMINATE: ParsedExpiry = { kind: "indeterminate" };
const UNPARSABLE: ParsedExpiry = { kind: "unparsable" };

/** Absent, blank and "Unknown" expiry values carry no date on purpose. */
export function isIndeterminateValue(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value !== "string") return false;
  const trimmed = value.trim();
  return trimmed === "" || trimmed.toLowerCase() === "unknown";
}

/**
 * Strict ISO-8601 to UTC. An explicit offset (or Z) is honored; a naive value
 * is read as civil wall-clock time. A single space may stand in for the "T".
 */
export function parseIsoToUtc(
  value: unknown,
  zone: string = DEFAULT_CIVIL_ZONE
): Instant | null {
  if (typeof value !== "string" || isIndeterminateValue(value)) return null;

  let s = value.trim();
  if (!ISO_DATE_PREFIX.test(s)) return null;
  if (s.endsWith("Z") || s.endsWith("z")) {
    s = `${s.slice(0, -1)}+00:00`;
  }

  let dt = DateTime.fromISO(s, { zone });
  if (!dt.isValid) {
    dt = DateTime.fromISO(s.replace(" ", "T"), { zone });
  }
  return dt.isValid ? dt.toUTC() : null;
}

/**
 * Clean free-text dates before matching: "3rd" -> "3", "Sept" -> "Sep", drop
 * the "UTC" label, collapse whitespace.
 *
 * The "UTC" label is dropped without converting: the remaining wall-clock time
 * is still read as civil time.
 */
export function normalizeDateString(value: string): string {
  return value
    .trim()
    .replace(/\b(\d{1,2})(st|nd|rd|th)\b/gi, "$1")
    .replace(/\bSept\b/gi, "Sep")
    .replace(/\s*UTC\b/gi, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** Day-first when the first number cannot be a month, month-first otherwise. */
export function slashOrder(first: number, second: number): { month: number; day: number } {
  return first > 12 ? { month: second, day: first } : { month: first, day: second };
}

/** Two-digit years are taken as 20YY. */
export function promoteTwoDigitYear(year: number): number {
  return year < 100 ? year + 2000 : year;
}

export const numericSlashRule: DateRule = {
  name: "numeric-slash",
  apply: (text, zone) => {
    const m = NUMERIC_SLASH.exec(text);
    if (!m) return null;
    const { month, day } = slashOrder(Number(m[1]), Number(m[2]));
    const instant = civilMidnight(promoteTwoDigitYear(Number(m[3])), month, day, zone);
    return instant ? { kind: "instant", instant } : null;
  },
};

function formatRule(name: string, format: string): DateRule {
  return {
    name,
    apply: (text, zone) => {
      const dt = DateTime.fromFormat(text, format, { zone, locale: LOCALE });
      return dt.isValid ? { kind: "instant", instant: dt.toUTC() } : null;
    },
  };
}

function monthDayRule(name: string, format: string): DateRule {
  return {
    name,
    apply: (text) => {
      const dt = DateTime.fromFormat(`${text} ${PLACEHOLDER_YEAR}`, `${format} yyyy`, {
        zone: "utc",
        locale: LOCALE,
      });
      return dt.isValid ? { kind: "month-day", month: dt.month, day: dt.day } : null;
    },
  };
}

/** Tried in order after normalization; the first match wins. */
export const DATE_RULES: readonly DateRule[] = [
  numericSlashRule,
  formatRule("short-month-day-comma-year", "MMM d, yyyy"),
  formatRule("long-month-day-comma-year", "MMMM d, yyyy"),
  formatRule("short-month-day-year", "MMM d yyyy"),
  formatRule("long-month-day-year", "MMMM d yyyy"),
  formatRule("day-short-month-year", "d MMM yyyy"),
  formatRule("day-long-month-year", "d MMMM yyyy"),
  formatRule("unpadded-iso-date", "yyyy-M-d"),
  formatRule("short-month-day-year-clock", "MMM d, yyyy h:mm a"),
  formatRule("long-month-day-year-clock", "MMMM d, yyyy h:mm a"),
  monthDayRule("short-month-day", "MMM d"),
  monthDayRule("long-month-day", "MMMM d"),
];

/**
 * Turn a raw `expires` value into a UTC instant.
 *
 * Indeterminate (absent/blank/"Unknown") and unparsable (present but matching
 * no grammar) are reported apart so callers can count them separately.
 */
export function parseExpiry(
  raw: unknown,
  ref: Instant,
  archivedHint: unknown,
  zone: string = DEFAULT_CIVIL_ZONE
): ParsedExpiry {
  if (isIndeterminateValue(raw)) return INDETERMINATE;
  if (typeof raw !== "string") return UNPARSABLE;

  const s = raw.trim();

  const dateOnly = DATE_ONLY_ISO.exec(s);
  if (dateOnly) {
    const instant = civilMidnight(
      Number(dateOnly[1]),
      Number(dateOnly[2]),
      Number(dateOnly[3]),
      zone
    );
    return instant ? { kind: "instant", instant } : UNPARSABLE;
  }

  const iso = parseIsoToUtc(s, zone);
  if (iso) return { kind: "instant", instant: iso };

  const text = normalizeDateString(s);
  for (const rule of DATE_RULES) {
    const match = rule.apply(text, zone);
    if (!match) continue;
    if (match.kind === "instant") return match;

    const archived = parseIsoToUtc(archivedHint, zone);
    const resolved = chooseYear(match.month, match.day, ref, archived, zone);
    return resolved ? { kind: "instant", instant: resolved } : UNPARSABLE;
  }
  return UNPARSABLE;
}
