import { civilMidnight, DEFAULT_CIVIL_ZONE, type Instant } from "./civil-time.js";

export const YEAR_WINDOW_DAYS = 180;

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Pick the year for a month/day-only expiry. Starts from the anchor's year
 * (archived timestamp when known, else the reference instant) and moves one
 * year back or forward when the candidate lands more than 180 whole days
 * after or before the anchor.
 *
 * Returns null when the month/day does not exist in the anchor year.
 */
export function chooseYear(
  month: number,
  day: number,
  ref: Instant,
  archived: Instant | null,
  zone: string = DEFAULT_CIVIL_ZONE
): Instant | null {
  const anchor = archived ?? ref;
  const year = anchor.toUTC().year;

  const candidate = civilMidnight(year, month, day, zone);
  if (!candidate) return null;

  // Whole days, floored: 179 days 23 hours counts as 179.
  const diffDays = Math.floor((candidate.toMillis() - anchor.toMillis()) / DAY_MS);

  if (diffDays > YEAR_WINDOW_DAYS) {
    return civilMidnight(year - 1, month, day, zone) ?? candidate;
  }
  if (diffDays < -YEAR_WINDOW_DAYS) {
    return civilMidnight(year + 1, month, day, zone) ?? candidate;
  }
  return candidate;
}
