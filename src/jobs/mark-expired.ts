import type { CodesDocument } from "../lib/codes/document.js";
import { sweepExpired, type SweepResult } from "../lib/codes/sweep.js";
import { updateTargets, type TargetedResult } from "../lib/codes/targeted.js";
import { DEFAULT_CIVIL_ZONE, nowInstant, type Instant } from "../lib/expiry/civil-time.js";
import { serializeInstant } from "../lib/expiry/display-formatter.js";
import { parseIsoToUtc } from "../lib/expiry/timestamp-parser.js";
import { errorMessage, InputError } from "../lib/errors.js";
import {
  hasPublishTarget,
  publishCodesFile,
  type PublishResult,
  type PublishTarget,
} from "../lib/github/publish.js";
import { loadCodesFile, saveCodesFile } from "../storage/codes-file.js";

export type MarkExpiredOptions = {
  filePath: string;
  /** Parsed target codes; empty runs a bulk sweep. */
  codes?: string[];
  /** Explicit reference/stamp time (ISO-8601, naive = civil time). Defaults to now. */
  expires?: string;
  dryRun?: boolean;
  zone?: string;
  publish?: PublishTarget;
  /** Name of the reference input in error messages. */
  referenceLabel?: string;
};

export type MarkExpiredDeps = {
  load: (filePath: string) => Promise<CodesDocument>;
  save: (filePath: string, document: CodesDocument) => Promise<void>;
  publish: (filePath: string, commitMessage: string, target: PublishTarget) => Promise<PublishResult>;
  now: () => Instant;
};

/**
 * dry-run: nothing written. unchanged: nothing to write. saved: document
 * persisted. save-failed: the pass completed but the write did not.
 */
export type RunOutcome = "dry-run" | "unchanged" | "saved" | "save-failed";

type RunBase = {
  ref: Instant;
  filePath: string;
  dryRun: boolean;
  outcome: RunOutcome;
  commitMessage: string;
  publish: PublishResult | null;
  error?: string;
};

export type MarkExpiredResult =
  | (RunBase & { mode: "bulk"; result: SweepResult })
  | (RunBase & { mode: "targeted"; forcedExpires: boolean; codes: string[]; result: TargetedResult });

export class RunInProgressError extends Error {
  readonly status = 409;

  constructor() {
    super("Another expiry run is already in progress");
    this.name = "RunInProgressError";
  }
}

const defaultDeps: MarkExpiredDeps = {
  load: loadCodesFile,
  save: saveCodesFile,
  publish: publishCodesFile,
  now: nowInstant,
};

let running = false;

/** Parse `--expires` once per run; every record is judged against this instant. */
export function resolveReferenceInstant(
  expires: string | undefined,
  zone: string,
  now: () => Instant,
  label = "--expires"
): Instant {
  if (expires === undefined) return now();
  const ref = parseIsoToUtc(expires, zone);
  if (!ref) {
    throw new InputError(`Invalid ISO timestamp for ${label}: ${expires}`);
  }
  return ref;
}

export function buildCommitMessage(
  mode: "bulk" | "targeted",
  ref: Instant,
  codes: string[],
  forcedExpires: boolean
): string {
  if (mode === "bulk") {
    return `Sweep expired by timestamp (${serializeInstant(ref)})`;
  }
  const list = codes.join(", ");
  return forcedExpires
    ? `Targeted overwrite 'expires' for: ${list}`
    : `Targeted mark expired for: ${list}`;
}

export async function runMarkExpired(
  options: MarkExpiredOptions,
  deps: MarkExpiredDeps = defaultDeps
): Promise<MarkExpiredResult> {
  if (running) throw new RunInProgressError();
  running = true;
  try {
    return await executeRun(options, deps);
  } finally {
    running = false;
  }
}

async function executeRun(
  options: MarkExpiredOptions,
  deps: MarkExpiredDeps
): Promise<MarkExpiredResult> {
  const zone = options.zone ?? DEFAULT_CIVIL_ZONE;
  const dryRun = options.dryRun ?? false;
  const codes = options.codes ?? [];
  const forcedExpires = options.expires !== undefined;
  const ref = resolveReferenceInstant(options.expires, zone, deps.now, options.referenceLabel);

  const document = await deps.load(options.filePath);

  const run =
    codes.length > 0
      ? {
          mode: "targeted" as const,
          forcedExpires,
          codes,
          result: updateTargets(document, codes, ref, { forcedExpires, dryRun, zone }),
        }
      : { mode: "bulk" as const, result: sweepExpired(document, ref, { dryRun, zone }) };

  const commitMessage = buildCommitMessage(run.mode, ref, codes, forcedExpires);
  const base = { ref, filePath: options.filePath, dryRun, commitMessage };

  if (dryRun) {
    return { ...run, ...base, outcome: "dry-run", publish: null };
  }
  if (!run.result.changed) {
    return { ...run, ...base, outcome: "unchanged", publish: null };
  }

  try {
    await deps.save(options.filePath, document);
  } catch (err) {
    console.error("[MarkExpired] Failed to save codes document", {
      filePath: options.filePath,
      error: errorMessage(err),
    });
    return { ...run, ...base, outcome: "save-failed", publish: null, error: errorMessage(err) };
  }
  console.log("[MarkExpired] Saved codes document", {
    filePath: options.filePath,
    mode: run.mode,
    setExpired: run.result.stats.setExpired,
  });

  const publish =
    options.publish && hasPublishTarget(options.publish)
      ? await deps.publish(options.filePath, commitMessage, options.publish)
      : null;

  return { ...run, ...base, outcome: "saved", publish };
}
