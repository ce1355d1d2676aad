import { classifyRecord, type Verdict, type WillSetToken } from "../expiry/classify.js";
import { DEFAULT_CIVIL_ZONE, type Instant } from "../expiry/civil-time.js";
import { formatCivilWithOffset, serializeInstant } from "../expiry/display-formatter.js";
import { InputError } from "../errors.js";
import type { CodesDocument } from "./document.js";
import { isExpired, normalizeCode, recordCode } from "./record.js";

export type TargetedStats = {
  /** Matched records only. */
  scanned: number;
  setExpired: number;
  setExpires: number;
  skippedUnknown: number;
  unparsable: number;
  updatedExpiresOnly: number;
};

export type TargetedDetail = {
  code: string;
  /** Previously stored expiry, formatted. */
  expiresDisplay: string;
  /** Stamp that is (or would be) written. */
  newExpiresDisplay: string;
  newExpires: string;
  /** Previous expiry judged against the reference instant. */
  verdict: Verdict;
  willSet: Extract<WillSetToken, "YES" | "NA">;
};

export type TargetedResult = {
  changed: boolean;
  stats: TargetedStats;
  details: TargetedDetail[];
  /** Requested codes with no record, upper-cased and sorted. */
  unmatched: string[];
};

export type TargetedOptions = {
  /**
   * True when the caller supplied the expiry explicitly: only `expires` is
   * stamped. False stamps `expires` and also sets `expired`.
   */
  forcedExpires: boolean;
  dryRun?: boolean;
  zone?: string;
};

export function updateTargets(
  document: CodesDocument,
  codes: Iterable<string>,
  ref: Instant,
  options: TargetedOptions
): TargetedResult {
  const dryRun = options.dryRun ?? false;
  const zone = options.zone ?? DEFAULT_CIVIL_ZONE;

  const targets = new Set<string>();
  for (const code of codes) {
    const normalized = normalizeCode(code);
    if (normalized) targets.add(normalized);
  }
  if (targets.size === 0) {
    throw new InputError("No code(s) provided");
  }

  const stats: TargetedStats = {
    scanned: 0,
    setExpired: 0,
    setExpires: 0,
    skippedUnknown: 0,
    unparsable: 0,
    updatedExpiresOnly: 0,
  };
  const details: TargetedDetail[] = [];
  const unmatched = new Set(targets);
  const stamp = serializeInstant(ref);
  const stampDisplay = formatCivilWithOffset(ref, zone);
  let changed = false;

  for (const record of document.codes) {
    const code = normalizeCode(recordCode(record));
    if (!targets.has(code)) continue;

    unmatched.delete(code);
    stats.scanned += 1;

    const current = classifyRecord(record, ref, zone);
    if (current.verdict === "INDETERMINATE") stats.skippedUnknown += 1;
    if (current.verdict === "UNPARSABLE") stats.unparsable += 1;

    stats.setExpires += 1;
    const expiresDiffers = record.expires !== stamp;

    if (options.forcedExpires) {
      stats.updatedExpiresOnly += 1;
      if (!dryRun && expiresDiffers) {
        record.expires = stamp;
        changed = true;
      }
    } else {
      const flips = !isExpired(record);
      if (flips) stats.setExpired += 1;
      if (!dryRun && (expiresDiffers || flips)) {
        record.expires = stamp;
        record.expired = true;
        changed = true;
      }
    }

    details.push({
      code,
      expiresDisplay: current.display,
      newExpiresDisplay: stampDisplay,
      newExpires: stamp,
      verdict: current.verdict,
      willSet: options.forcedExpires ? "NA" : "YES",
    });
  }

  return { changed, stats, details, unmatched: [...unmatched].sort() };
}
