import { errorMessage } from "../lib/errors.js";
import { runMarkExpired, type MarkExpiredOptions } from "./mark-expired.js";

let timer: NodeJS.Timeout | null = null;

async function sweepOnce(options: MarkExpiredOptions): Promise<void> {
  try {
    const run = await runMarkExpired({ ...options, codes: [], expires: undefined, dryRun: false });
    console.log("[Sweep] Completed", {
      outcome: run.outcome,
      ...run.result.stats,
      publish: run.publish?.status ?? null,
    });
  } catch (err) {
    console.error("[Sweep] Run failed", { error: errorMessage(err) });
  }
}

/** Bulk sweep against "now" every `intervalMinutes`; 0 disables the schedule. */
export async function startSweepSchedule(
  intervalMinutes: number,
  options: MarkExpiredOptions
): Promise<void> {
  if (intervalMinutes <= 0 || timer) return;
  await sweepOnce(options);
  timer = setInterval(() => {
    void sweepOnce(options);
  }, intervalMinutes * 60 * 1000);
  console.log("[Sweep] Scheduled", { intervalMinutes, filePath: options.filePath });
}

export function stopSweepSchedule(): void {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }
}
