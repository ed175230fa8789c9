// =============================================================================
// @weekly-digest/runner — Cron scheduler for the weekly digest
// =============================================================================
// Wraps node-cron to run the digest on a configurable schedule (Thursday
// 09:00 Asia/Tokyo by default). A failed run is logged and the schedule
// carries on. Returns a handle with stop() for graceful shutdown.
// =============================================================================

import cron, { type ScheduledTask } from "node-cron";
import type { EnvConfig, RunSummary } from "@weekly-digest/shared";
import { describeError, type Logger } from "./logger.js";

export interface SchedulerHandle {
  stop(): void;
}

export interface SchedulerDependencies {
  env: EnvConfig;
  logger: Logger;
}

export function startScheduler(
  deps: SchedulerDependencies,
  run: () => Promise<RunSummary>,
): SchedulerHandle {
  const { env, logger } = deps;

  if (!cron.validate(env.CRON_SCHEDULE)) {
    throw new Error(`Invalid CRON_SCHEDULE: "${env.CRON_SCHEDULE}"`);
  }

  // Runs never overlap: a tick that fires while one is in flight is skipped.
  let running = false;

  const task: ScheduledTask = cron.schedule(
    env.CRON_SCHEDULE,
    async () => {
      if (running) {
        logger.warn("Previous digest run still in progress, skipping tick");
        return;
      }
      running = true;
      const start = performance.now();
      logger.info("Cron job starting: weekly_digest");
      try {
        const summary = await run();
        const durationMs = Math.round(performance.now() - start);
        logger.info("Cron job completed: weekly_digest", { durationMs, summary });
      } catch (err) {
        const durationMs = Math.round(performance.now() - start);
        logger.error("Cron job failed: weekly_digest", {
          durationMs,
          error: describeError(err),
        });
      } finally {
        running = false;
      }
    },
    { timezone: env.CRON_TIMEZONE },
  );

  logger.info("Cron scheduler started", {
    schedule: env.CRON_SCHEDULE,
    timezone: env.CRON_TIMEZONE,
  });

  return {
    stop() {
      task.stop();
      logger.info("Cron scheduler stopped");
    },
  };
}
