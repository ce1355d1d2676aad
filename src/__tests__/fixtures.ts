import { DateTime } from "luxon";
import { parseCodesDocument, type CodesDocument } from "../lib/codes/document.js";

/** 2025-10-01T00:00Z, i.e. Sep 30 2025 7 PM in Chicago. */
export const REF = DateTime.fromISO("2025-10-01T00:00:00Z").toUTC();
export const REF_STAMP = "2025-10-01T00:00:00+00:00";
export const REF_DISPLAY = "Sep 30, 2025, 07:00 PM UTC-05:00";

export function sampleRoot(): Record<string, unknown>[] {
  return [
    {
      meta: { source: "test", generated: "2025-09-01" },
      codes: [
        { code: "AAAA", title: "10% off", expires: "09/15/2024", expired: false },
        { code: "BBBB", title: "Free shipping", expires: "2025-12-31T00:00:00Z", expired: false },
        { code: "CCCC", expires: "Unknown", expired: false },
        { code: "DDDD", expired: false },
        { code: "EEEE", expires: "someday", expired: false },
        { code: "FFFF", expires: "Sep 3", expired: true },
      ],
    },
  ];
}

export function sampleDocument(): CodesDocument {
  return parseCodesDocument(sampleRoot());
}

export function findRecord(document: CodesDocument, code: string): Record<string, unknown> {
  const record = document.codes.find((r) => r.code === code);
  if (!record) throw new Error(`fixture has no record ${code}`);
  return record;
}
