import { createApp } from "./app.js";
import { env } from "./config/env.js";
import { startSweepSchedule, stopSweepSchedule } from "./jobs/scheduler.js";

const publish = {
  user: env.GITHUB_USER,
  repo: env.GITHUB_REPO,
  token: env.GITHUB_TOKEN,
  branch: env.GITHUB_BRANCH,
  apiUrl: env.GITHUB_API_URL,
};

const app = createApp({
  filePath: env.CODES_JSON_PATH,
  zone: env.CIVIL_TIMEZONE,
  adminToken: env.ADMIN_TOKEN,
  publish,
  trustedOrigins: env.TRUSTED_ORIGINS
    ? env.TRUSTED_ORIGINS.split(",").map((o) => o.trim()).filter(Boolean)
    : [],
});

async function start(): Promise<void> {
  await startSweepSchedule(env.SWEEP_INTERVAL_MINUTES, {
    filePath: env.CODES_JSON_PATH,
    zone: env.CIVIL_TIMEZONE,
    publish,
  });
  app.listen(env.PORT, () => {
    console.log(`Server running at http://localhost:${env.PORT}`);
    console.log(`Codes document: ${env.CODES_JSON_PATH} (${env.CIVIL_TIMEZONE})`);
  });
}

const shutdown = () => {
  stopSweepSchedule();
  process.exit(0);
};

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);

start().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
