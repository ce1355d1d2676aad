import { DEFAULT_CIVIL_ZONE, type Instant } from "./civil-time.js";

/**
 * Render an instant as civil wall-clock time plus its numeric UTC offset,
 * e.g. "Sep 28, 2025, 02:11 AM UTC-05:00" (CDT) or "... UTC-06:00" (CST).
 */
export function formatCivilWithOffset(
  instant: Instant,
  zone: string = DEFAULT_CIVIL_ZONE
): string {
  const local = instant.setZone(zone);
  const wallClock = local.toFormat("LLL dd, yyyy, hh:mm a", { locale: "en-US" });
  return `${wallClock} UTC${local.toFormat("ZZ")}`;
}

/** Stored form of a stamped `expires` value: "2025-10-01T00:00:00+00:00". */
export function serializeInstant(instant: Instant): string {
  const utc = instant.toUTC();
  const pattern =
    utc.millisecond === 0 ? "yyyy-MM-dd'T'HH:mm:ss" : "yyyy-MM-dd'T'HH:mm:ss.SSS";
  return `${utc.toFormat(pattern)}+00:00`;
}
