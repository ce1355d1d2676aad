import { classifyRecord, willSetToken, type Verdict, type WillSetToken } from "../expiry/classify.js";
import { DEFAULT_CIVIL_ZONE, type Instant } from "../expiry/civil-time.js";
import type { CodesDocument } from "./document.js";
import { isExpired, recordCode } from "./record.js";

export type SweepStats = {
  scanned: number;
  setExpired: number;
  skippedUnknown: number;
  unparsable: number;
};

export type SweepDetail = {
  code: string;
  expiresDisplay: string;
  verdict: Verdict;
  willSet: WillSetToken;
};

export type SweepResult = {
  /** True only when a record was actually flipped; always false on a dry run. */
  changed: boolean;
  stats: SweepStats;
  details: SweepDetail[];
};

export type SweepOptions = {
  dryRun?: boolean;
  zone?: string;
};

/**
 * Bulk mode: mark every record whose expiry is before `ref` as expired.
 * `expires` values are never rewritten. Counters report what the sweep would
 * do even on a dry run.
 */
export function sweepExpired(
  document: CodesDocument,
  ref: Instant,
  options: SweepOptions = {}
): SweepResult {
  const dryRun = options.dryRun ?? false;
  const zone = options.zone ?? DEFAULT_CIVIL_ZONE;

  const stats: SweepStats = { scanned: 0, setExpired: 0, skippedUnknown: 0, unparsable: 0 };
  const details: SweepDetail[] = [];
  let changed = false;

  for (const record of document.codes) {
    stats.scanned += 1;
    const { verdict, display } = classifyRecord(record, ref, zone);

    if (verdict === "INDETERMINATE") stats.skippedUnknown += 1;
    if (verdict === "UNPARSABLE") stats.unparsable += 1;

    if (verdict === "WILL_EXPIRE" && !isExpired(record)) {
      stats.setExpired += 1;
      if (!dryRun) {
        record.expired = true;
        changed = true;
      }
    }

    details.push({
      code: recordCode(record),
      expiresDisplay: display,
      verdict,
      willSet: willSetToken(verdict),
    });
  }

  return { changed, stats, details };
}
