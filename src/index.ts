import { serve } from "@hono/node-server";
import { logger } from "./logger";
import { checkDatabaseIntegrity } from "./db";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createAppContext } from "./context";
import type { AppContext } from "./context";
import { Scheduler } from "./scheduler";
import { createApp } from "./server";
import { sleep } from "./utils/concurrency";

async function main(): Promise<void> {
  logger.info("═══════════════════════════════════════════════════");
  logger.info("  Job Ingestion Pipeline");
  logger.info("═══════════════════════════════════════════════════");

  let config: AppConfig;
  let ctx: AppContext;
  try {
    config = loadConfig();
    ctx = createAppContext(config);
  } catch (error) {
    logger.error("Failed to start:", error);
    process.exit(1);
  }

  const integrity = checkDatabaseIntegrity(ctx.db);
  if (!integrity.ok) {
    logger.error(`Database integrity check failed: ${integrity.result}`);
    logger.error(
      `Please restore from backup or delete ${config.env.databasePath} to recreate.`,
    );
    await ctx.close();
    process.exit(1);
  }

  const scheduler = new Scheduler({
    pipeline: ctx.pipeline,
    statusChecker: ctx.statusChecker,
    notifier: ctx.notifier,
    queries: config.searchQueries.queries,
    countries: ctx.searchCountries,
    maxPerQuery: config.env.maxJobsPerSearch,
    timezone: config.env.timezone,
    scrapeSchedule: config.env.scrapeSchedule,
    statusCheckSchedule: config.env.statusCheckSchedule,
  });
  scheduler.start();

  const server = serve(
    { fetch: createApp(ctx).fetch, port: config.env.port },
    (info) => logger.info(`Server listening on http://localhost:${info.port}`),
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, shutting down...`);

    scheduler.stop();
    server.close();
    // Let an in-flight run observe the abort and finish its current record
    while (scheduler.running.pipeline || scheduler.running.sweep) {
      await sleep(100);
    }
    await ctx.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("Shutdown failed:", error);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  logger.error("Fatal error:", error);
  process.exit(1);
});
