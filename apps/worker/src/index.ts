import "dotenv/config";

import { schedule as scheduleTask, validate } from "node-cron";

import { createService } from "./main";

const schedule = process.env.CHECK_SCHEDULE_CRON ?? "0 6 * * *";

async function executeDailyRun() {
  const startedAt = new Date();
  console.log(`[worker] Daily scrape started at ${startedAt.toISOString()}`);

  try {
    const service = await createService();
    const summary = await service.runDailyScrape();
    console.log(
      `[worker] Daily scrape finished at ${new Date().toISOString()} with ${summary.changes.length} change(s)`,
    );
  } catch (error) {
    console.error("[worker] Daily scrape failed", error);
  }
}

if (!validate(schedule)) {
  console.error(`[worker] Invalid CHECK_SCHEDULE_CRON: ${schedule}`);
  process.exit(1);
}

scheduleTask(
  schedule,
  () => {
    void executeDailyRun();
  },
  { timezone: "UTC" },
);

console.log(`[worker] Scheduler active with cron: ${schedule} (UTC)`);

if (process.env.WORKER_RUN_ON_BOOT === "true") {
  void executeDailyRun();
}
