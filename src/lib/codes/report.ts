import { DEFAULT_CIVIL_ZONE, type Instant } from "../expiry/civil-time.js";
import { formatCivilWithOffset, serializeInstant } from "../expiry/display-formatter.js";
import type { SweepResult } from "./sweep.js";
import type { TargetedResult } from "./targeted.js";

export type ReportOptions = {
  dryRun: boolean;
  zone?: string;
};

const DRY_RUN_NOTES = [
  "Notes:",
  "- 'Skipped' looks only at the 'expires' field (missing, empty, or 'Unknown').",
  "- 'Unparsable' means the 'expires' field could not be parsed as an ISO or common date format.",
];

type Sections = {
  header: string[];
  blocks: string[][];
  summary: string[];
  trailer: string[];
};

export function referenceLine(ref: Instant, zone: string = DEFAULT_CIVIL_ZONE): string {
  return `${serializeInstant(ref)} | ${formatCivilWithOffset(ref, zone)}`;
}

function headerLines(ref: Instant, options: ReportOptions): string[] {
  const header = options.dryRun ? ["DRY-RUN:"] : [];
  header.push(`Date & Time (ISO): ${referenceLine(ref, options.zone)}`);
  return header;
}

function summaryLines(stats: {
  scanned: number;
  setExpired: number;
  setExpires?: number;
  skippedUnknown: number;
  unparsable: number;
}): string[] {
  return [
    `Scanned: ${stats.scanned}`,
    `Set expired: ${stats.setExpired}`,
    `Set expires field: ${stats.setExpires ?? 0}`,
    `Skipped (expires missing/empty or 'Unknown'): ${stats.skippedUnknown}`,
    `Unparsable (invalid 'expires' timestamp): ${stats.unparsable}`,
  ];
}

/** Separator is as wide as the longest printed line, at least 8 dashes. */
function layout(sections: Sections, dryRun: boolean): string[] {
  const notes = dryRun ? DRY_RUN_NOTES : [];
  const all = [
    ...sections.header,
    ...sections.blocks.flat(),
    ...sections.summary,
    ...sections.trailer,
    ...notes,
  ];
  const sep = "-".repeat(Math.max(8, ...all.map((line) => line.length)));

  const out = [...sections.header, sep];
  if (sections.blocks.length > 0) {
    sections.blocks.forEach((block, idx) => {
      out.push(...block);
      if (idx < sections.blocks.length - 1) out.push(sep);
    });
    out.push(sep);
  }
  out.push(...sections.summary);
  if (dryRun) out.push(sep, ...notes);
  if (sections.trailer.length > 0) out.push(sep, ...sections.trailer);
  return out;
}

export function renderBulkReport(
  result: SweepResult,
  ref: Instant,
  options: ReportOptions
): string[] {
  return layout(
    {
      header: headerLines(ref, options),
      blocks: result.details.map((d) => [
        `Code: ${d.code}`,
        `Expires: ${d.expiresDisplay}`,
        `Will Set Expired: ${d.willSet}`,
      ]),
      summary: summaryLines(result.stats),
      trailer: [],
    },
    options.dryRun
  );
}

/**
 * Targeted report. With an explicit expiry the new display value is shown;
 * otherwise the ISO stamp and its civil rendering.
 */
export function renderTargetedReport(
  result: TargetedResult,
  ref: Instant,
  forcedExpires: boolean,
  options: ReportOptions
): string[] {
  const summary = summaryLines(result.stats);
  if (result.stats.updatedExpiresOnly > 0) {
    summary.push(`Updated expires only: ${result.stats.updatedExpiresOnly}`);
  }
  return layout(
    {
      header: headerLines(ref, options),
      blocks: result.details.map((d) => [
        `Code: ${d.code}`,
        `Expires: ${forcedExpires ? d.newExpiresDisplay : referenceLine(ref, options.zone)}`,
        `Will Set Expired: ${d.willSet}`,
      ]),
      summary,
      trailer: result.unmatched.map((code) => `No matches found for ${code}`),
    },
    options.dryRun
  );
}
