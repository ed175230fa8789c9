#!/usr/bin/env tsx
// =============================================================================
// @weekly-digest/runner — Entry point
// =============================================================================
// Loads the environment, then either runs the digest once and prints the
// summary as JSON on stdout, or (CRON_ENABLED=true) keeps running on the
// cron schedule until SIGINT/SIGTERM.
// =============================================================================

import { loadEnvConfig, type EnvConfig } from "@weekly-digest/shared";
import { createLogger, describeError } from "./logger.js";
import { runDigest } from "./pipeline.js";
import { startScheduler } from "./scheduler.js";

let env: EnvConfig;
try {
  env = loadEnvConfig();
} catch (err) {
  console.error(describeError(err));
  process.exit(1);
}

const logger = createLogger({ level: env.LOG_LEVEL });

if (env.CRON_ENABLED) {
  const scheduler = startScheduler({ env, logger }, () => runDigest({ env, logger }));

  const handleShutdown = () => {
    scheduler.stop();
    process.exit(0);
  };
  process.once("SIGTERM", handleShutdown);
  process.once("SIGINT", handleShutdown);
} else {
  try {
    const summary = await runDigest({ env, logger });
    process.stdout.write(JSON.stringify(summary, null, 2) + "\n");
  } catch (err) {
    logger.fatal("Digest run failed", {
      error: describeError(err),
    });
    process.exitCode = 1;
  }
}
