import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import {
  resolveReferenceInstant,
  runMarkExpired,
  type MarkExpiredDeps,
  type MarkExpiredResult,
} from "../jobs/mark-expired.js";
import { classifyRecord } from "../lib/expiry/classify.js";
import { nowInstant } from "../lib/expiry/civil-time.js";
import { formatCivilWithOffset, serializeInstant } from "../lib/expiry/display-formatter.js";
import { isExpired, recordCode } from "../lib/codes/record.js";
import { publishCodesFile, type PublishTarget } from "../lib/github/publish.js";
import { loadCodesFile, saveCodesFile } from "../storage/codes-file.js";

export type CodesRouteConfig = {
  filePath: string;
  zone: string;
  publish?: PublishTarget;
  deps?: MarkExpiredDeps;
};

type Handler = (req: Request, res: Response, next: NextFunction) => Promise<void>;

const sweepSchema = z.object({
  at: z.string().trim().min(1).optional(),
  dryRun: z.boolean().optional().default(false),
});

const markSchema = z.object({
  codes: z
    .array(
      z
        .string()
        .trim()
        .min(1)
        .regex(/^[^\s,]+$/, "Codes cannot contain spaces or commas")
    )
    .min(1),
  expires: z.string().trim().min(1).optional(),
  dryRun: z.boolean().optional().default(false),
});

function resolveDeps(config: CodesRouteConfig): MarkExpiredDeps {
  return (
    config.deps ?? {
      load: loadCodesFile,
      save: saveCodesFile,
      publish: publishCodesFile,
      now: nowInstant,
    }
  );
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

export function serializeRun(run: MarkExpiredResult, zone: string) {
  return {
    mode: run.mode,
    ref: serializeInstant(run.ref),
    refDisplay: formatCivilWithOffset(run.ref, zone),
    dryRun: run.dryRun,
    outcome: run.outcome,
    changed: run.result.changed,
    stats: run.result.stats,
    details: run.result.details,
    unmatched: run.mode === "targeted" ? run.result.unmatched : [],
    commitMessage: run.commitMessage,
    publish: run.publish,
    ...(run.error ? { error: run.error } : {}),
  };
}

function sendRun(res: Response, run: MarkExpiredResult, zone: string): void {
  res.status(run.outcome === "save-failed" ? 500 : 200).json(serializeRun(run, zone));
}

/** GET /api/admin/codes?at=ISO: classify every record, read-only. */
export function listCodes(config: CodesRouteConfig): Handler {
  const deps = resolveDeps(config);
  return async (req, res, next) => {
    try {
      const ref = resolveReferenceInstant(queryString(req.query.at), config.zone, deps.now, "at");
      const document = await deps.load(config.filePath);
      const items = document.codes.map((record) => {
        const { instant, verdict, display } = classifyRecord(record, ref, config.zone);
        return {
          code: recordCode(record),
          expires: record.expires ?? null,
          expiresAt: instant ? serializeInstant(instant) : null,
          expiresDisplay: display,
          expired: isExpired(record),
          verdict,
        };
      });
      res.json({
        ref: serializeInstant(ref),
        refDisplay: formatCivilWithOffset(ref, config.zone),
        items,
        total: items.length,
      });
    } catch (err) {
      next(err);
    }
  };
}

/** POST /api/admin/codes/sweep { at?, dryRun? } */
export function sweepCodes(config: CodesRouteConfig): Handler {
  const deps = resolveDeps(config);
  return async (req, res, next) => {
    const parsed = sweepSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });
      return;
    }
    try {
      const run = await runMarkExpired(
        {
          filePath: config.filePath,
          expires: parsed.data.at,
          referenceLabel: "at",
          dryRun: parsed.data.dryRun,
          zone: config.zone,
          publish: config.publish,
        },
        deps
      );
      sendRun(res, run, config.zone);
    } catch (err) {
      next(err);
    }
  };
}

/** POST /api/admin/codes/mark { codes, expires?, dryRun? } */
export function markCodes(config: CodesRouteConfig): Handler {
  const deps = resolveDeps(config);
  return async (req, res, next) => {
    const parsed = markSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "Invalid input", details: parsed.error.flatten() });
      return;
    }
    try {
      const run = await runMarkExpired(
        {
          filePath: config.filePath,
          codes: parsed.data.codes,
          expires: parsed.data.expires,
          referenceLabel: "expires",
          dryRun: parsed.data.dryRun,
          zone: config.zone,
          publish: config.publish,
        },
        deps
      );
      sendRun(res, run, config.zone);
    } catch (err) {
      next(err);
    }
  };
}
