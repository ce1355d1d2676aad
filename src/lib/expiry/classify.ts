import type { CodeRecord } from "../codes/record.js";
import { DEFAULT_CIVIL_ZONE, isBefore, type Instant } from "./civil-time.js";
import { formatCivilWithOffset } from "./display-formatter.js";
import { parseExpiry } from "./timestamp-parser.js";

export type Verdict = "INDETERMINATE" | "UNPARSABLE" | "WILL_EXPIRE" | "NOT_YET";

/** Report token: YES when the record is (or would be) marked expired. */
export type WillSetToken = "YES" | "NO" | "NA";

export type Classification = {
  instant: Instant | null;
  verdict: Verdict;
  display: string;
};

export const NOT_FOUND_DISPLAY = "Not Found";
export const UNKNOWN_DISPLAY = "Unknown";

export function classifyExpiry(
  raw: unknown,
  archived: unknown,
  ref: Instant,
  zone: string = DEFAULT_CIVIL_ZONE
): Classification {
  const parsed = parseExpiry(raw, ref, archived, zone);
  switch (parsed.kind) {
    case "indeterminate": {
      const unknown = typeof raw === "string" && raw.trim().toLowerCase() === "unknown";
      return {
        instant: null,
        verdict: "INDETERMINATE",
        display: unknown ? UNKNOWN_DISPLAY : NOT_FOUND_DISPLAY,
      };
    }
    case "unparsable":
      return { instant: null, verdict: "UNPARSABLE", display: NOT_FOUND_DISPLAY };
    case "instant":
      return {
        instant: parsed.instant,
        verdict: isBefore(parsed.instant, ref) ? "WILL_EXPIRE" : "NOT_YET",
        display: formatCivilWithOffset(parsed.instant, zone),
      };
  }
}

/** Pure: reads `expires` and `archived`, never mutates the record. */
export function classifyRecord(
  record: CodeRecord,
  ref: Instant,
  zone: string = DEFAULT_CIVIL_ZONE
): Classification {
  return classifyExpiry(record.expires, record.archived, ref, zone);
}

export function willSetToken(verdict: Verdict): WillSetToken {
  if (verdict === "WILL_EXPIRE") return "YES";
  if (verdict === "NOT_YET") return "NO";
  return "NA";
}
