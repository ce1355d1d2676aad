import { DateTime } from "luxon";

/**
 * An unambiguous point in time. Every Instant handed out by this module tree
 * is valid and carries the UTC zone.
 */
export type Instant = DateTime;

/** Time zone the code source publishes its dates in (CST/CDT). */
export const DEFAULT_CIVIL_ZONE = "America/Chicago";

/** Midnight of the given civil date, in UTC. Null for impossible dates (Feb 30, Feb 29 off leap years). */
export function civilMidnight(
  year: number,
  month: number,
  day: number,
  zone: string = DEFAULT_CIVIL_ZONE
): Instant | null {
  const local = DateTime.fromObject({ year, month, day }, { zone });
  return local.isValid ? local.toUTC() : null;
}

export function nowInstant(): Instant {
  return DateTime.utc();
}

export function isBefore(a: Instant, b: Instant): boolean {
  return a.toMillis() < b.toMillis();
}
