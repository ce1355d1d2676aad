#!/usr/bin/env node
/**
 * Mark promo codes expired in the codes document.
 * Run: npx tsx src/cli.ts [CODE1, CODE2, ...] [--expires ISO] [--dry-run]
 */
import { Command } from "commander";
import { env } from "./config/env.js";
import { runMarkExpired, type MarkExpiredResult } from "./jobs/mark-expired.js";
import { renderBulkReport, renderTargetedReport } from "./lib/codes/report.js";
import { parseTargetCodes } from "./lib/codes/target-codes.js";
import { errorMessage } from "./lib/errors.js";

type CliOptions = {
  expires?: string;
  file: string;
  dryRun?: boolean;
  user?: string;
  repo?: string;
  token?: string;
};

const program = new Command();

program
  .name("code-expiry")
  .description(
    [
      `Mark promo codes expired in ${env.CODES_JSON_PATH}.`,
      "- With CODE(s): targeted update. With --expires: overwrite only the 'expires' field.",
      `  Without --expires: set 'expires' to now (${env.CIVIL_TIMEZONE}, stored as UTC) and 'expired'=true.`,
      "- With no CODE: bulk sweep sets 'expired'=true where the stored 'expires' is before the reference time.",
    ].join("\n")
  )
  .argument("[codes...]", "One or more codes, comma-separated: CODE1, CODE2, ...")
  .option(
    "--expires <iso>",
    "ISO-8601 timestamp. Bulk: reference time. Targeted: value written to 'expires'. " +
      `Naive timestamps are read as ${env.CIVIL_TIMEZONE}. ` +
      "Examples: 2025-10-01T00:00:00Z, 2025-10-01 00:00:00, 2025-10-01"
  )
  .option("--file <path>", "Path to the codes document", env.CODES_JSON_PATH)
  .option("--dry-run", "Report intended changes without writing or uploading")
  .option("--user <user>", "GitHub user or org that owns the repo", env.GITHUB_USER)
  .option("--repo <repo>", "GitHub repository name", env.GITHUB_REPO)
  .option("--token <token>", "GitHub token with contents:write permission", env.GITHUB_TOKEN);

function printResult(run: MarkExpiredResult): void {
  const reportOptions = { dryRun: run.dryRun, zone: env.CIVIL_TIMEZONE };
  const lines =
    run.mode === "bulk"
      ? renderBulkReport(run.result, run.ref, reportOptions)
      : renderTargetedReport(run.result, run.ref, run.forcedExpires, reportOptions);
  console.log(lines.join("\n"));

  if (run.outcome === "save-failed") {
    console.error(`Failed to save ${run.filePath}: ${run.error ?? "unknown error"}`);
  }
  if (run.publish?.status === "published") {
    console.log(`Uploaded updated ${run.filePath} to GitHub.`);
  } else if (run.publish?.status === "failed") {
    console.log("Upload attempt failed.");
  }
}

async function main(): Promise<void> {
  program.parse();
  const opts = program.opts<CliOptions>();
  const codes = parseTargetCodes(program.args);

  const run = await runMarkExpired({
    filePath: opts.file,
    codes,
    expires: opts.expires,
    dryRun: opts.dryRun ?? false,
    zone: env.CIVIL_TIMEZONE,
    publish: {
      user: opts.user,
      repo: opts.repo,
      token: opts.token,
      branch: env.GITHUB_BRANCH,
      apiUrl: env.GITHUB_API_URL,
    },
  });

  printResult(run);
  process.exit(run.outcome === "save-failed" ? 1 : 0);
}

main().catch((err) => {
  console.error(errorMessage(err));
  process.exit(1);
});
