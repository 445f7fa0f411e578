import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import { logger } from "../logger";
import { ConfigError } from "../config";
import type { IngestionPipeline, SearchCountry } from "../pipeline";
import type { StatusChecker } from "../status";
import type { BatchStats, Notifier, StatusCheckStats } from "../types";

export interface SchedulerDeps {
  pipeline: Pick<IngestionPipeline, "run">;
  statusChecker: Pick<StatusChecker, "checkJobs" | "expireStaleJobs">;
  notifier: Notifier;
  queries: string[];
  countries: SearchCountry[];
  maxPerQuery: number;
  timezone: string;
  scrapeSchedule: string;
  statusCheckSchedule: string;
}

export interface SweepResult {
  stats: StatusCheckStats;
  expired: number;
}

/**
 * Cron triggers for ingestion and the liveness sweep. Each job type has its
 * own in-process lock; a trigger that fires while the previous run is still
 * going is skipped.
 */
export class Scheduler {
  private tasks: ScheduledTask[] = [];
  private pipelineRunning = false;
  private sweepRunning = false;
  private controller = new AbortController();

  constructor(private readonly deps: SchedulerDeps) {}

  start(): void {
    for (const expression of [
      this.deps.scrapeSchedule,
      this.deps.statusCheckSchedule,
    ]) {
      if (!cron.validate(expression)) {
        throw new ConfigError(`Invalid cron expression: "${expression}"`);
      }
    }

    logger.info("Starting scheduler...");

    this.tasks.push(
      cron.schedule(
        this.deps.scrapeSchedule,
        () => {
          this.runIngestion().catch((error: unknown) =>
            logger.error(`[CRON] Ingestion trigger failed: ${String(error)}`),
          );
        },
        { timezone: this.deps.timezone },
      ),
    );
    logger.info(`  ✓ Ingestion: ${this.deps.scrapeSchedule}`);

    this.tasks.push(
      cron.schedule(
        this.deps.statusCheckSchedule,
        () => {
          this.runStatusSweep().catch((error: unknown) =>
            logger.error(`[CRON] Status sweep trigger failed: ${String(error)}`),
          );
        },
        { timezone: this.deps.timezone },
      ),
    );
    logger.info(`  ✓ Status check: ${this.deps.statusCheckSchedule}`);

    logger.info(`Scheduler started with ${this.tasks.length} jobs.`);
  }

  /** Stop the cron tasks and abort a run in progress. */
  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    this.controller.abort();
    this.controller = new AbortController();
  }

  get running(): { pipeline: boolean; sweep: boolean } {
    return { pipeline: this.pipelineRunning, sweep: this.sweepRunning };
  }

  async runIngestion(): Promise<BatchStats | null> {
    if (this.pipelineRunning) {
      logger.warn("[LOCK] Pipeline already running — skipping run");
      return null;
    }
    this.pipelineRunning = true;
    logger.info("[CRON] Starting ingestion run...");

    try {
      const stats = await this.deps.pipeline.run({
        queries: this.deps.queries,
        countries: this.deps.countries,
        maxPerQuery: this.deps.maxPerQuery,
        signal: this.controller.signal,
      });
      logger.info(
        `[CRON] Ingestion complete: ${stats.totalNew} new, ${stats.totalUpdated} merged, ${stats.errors} errors`,
      );
      return stats;
    } catch (error) {
      logger.error(`[CRON] Ingestion failed: ${String(error)}`);
      this.deps.notifier.notify(
        "pipeline_failure",
        `Scheduled ingestion failed: ${String(error)}`,
        undefined,
        "critical",
      );
      return null;
    } finally {
      this.pipelineRunning = false;
    }
  }

  async runStatusSweep(): Promise<SweepResult | null> {
    if (this.sweepRunning) {
      logger.warn("[LOCK] Status sweep already running — skipping run");
      return null;
    }
    this.sweepRunning = true;
    logger.info("[CRON] Starting status sweep...");

    try {
      let stats: StatusCheckStats;
      try {
        stats = await this.deps.statusChecker.checkJobs(this.controller.signal);
      } catch (error) {
        // checkJobs notifies before rethrowing
        logger.error(`[CRON] Status sweep failed: ${String(error)}`);
        return null;
      }

      try {
        return { stats, expired: this.deps.statusChecker.expireStaleJobs() };
      } catch (error) {
        logger.error(`[CRON] Expiry pass failed: ${String(error)}`);
        this.deps.notifier.notify(
          "status_check_failure",
          `Expiry pass failed: ${String(error)}`,
          undefined,
          "critical",
        );
        return { stats, expired: 0 };
      }
    } finally {
      this.sweepRunning = false;
    }
  }
}
