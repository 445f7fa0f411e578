/**
 * Liveness sweep over stored postings.
 *
 * Active ──claim──▶ Checking ──probe──▶ Active   (2xx, 3xx, 5xx, network, other)
 *                                  ├──▶ Removed  (404, 410)
 *                                  └──▶ Active, unchecked (aborted, or the write failed)
 * Active ──expiresAt passed, unconfirmed──▶ Expired
 */

import { logger } from "../logger";
import type { JobStore } from "../db/operations";
import type { CanonicalJob, JobStatus, Notifier, StatusCheckStats } from "../types";
import { mapWithConcurrency } from "../utils/concurrency";
import { abortedResult } from "./probe";
import type { LivenessProbe, ProbeResult } from "./probe";

const DAY_MS = 24 * 60 * 60 * 1000;
const STALE_CHECK_MS = 60 * 60 * 1000;

export type CheckOutcome = "active" | "removed" | "error" | "aborted";

export interface CheckResult {
  jobId: number;
  status: JobStatus;
  statusCode: number | null;
  error: string | null;
  outcome: CheckOutcome;
}

export interface StatusCheckerOptions {
  intervalDays: number;
  batchSize: number;
  maxConcurrent: number;
  now?: () => Date;
}

interface Transition {
  status: JobStatus;
  error: string | null;
  outcome: Exclude<CheckOutcome, "aborted">;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function resolveTransition(result: ProbeResult): Transition {
  const code = result.statusCode;

  if (code === null) {
    return {
      status: "Active",
      error: result.error ?? "Network error",
      outcome: "error",
    };
  }
  if (code >= 200 && code < 300) {
    return { status: "Active", error: null, outcome: "active" };
  }
  if (code === 404 || code === 410) {
    return { status: "Removed", error: null, outcome: "removed" };
  }
  if (code >= 300 && code < 400) {
    // Moved, not gone
    return { status: "Active", error: null, outcome: "active" };
  }
  if (code >= 500) {
    return { status: "Active", error: `Server error: HTTP ${code}`, outcome: "error" };
  }
  return { status: "Active", error: `Unexpected status: HTTP ${code}`, outcome: "error" };
}

export class StatusChecker {
  private readonly now: () => Date;

  constructor(
    private readonly store: JobStore,
    private readonly probe: LivenessProbe,
    private readonly notifier: Notifier,
    private readonly options: StatusCheckerOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async checkJobs(signal?: AbortSignal): Promise<StatusCheckStats> {
    const stats: StatusCheckStats = {
      totalChecked: 0,
      stillActive: 0,
      markedRemoved: 0,
      errors: 0,
    };

    try {
      this.recoverStaleChecks();

      const now = this.now();
      const cutoff = new Date(
        now.getTime() - this.options.intervalDays * DAY_MS,
      ).toISOString();
      const due = this.store.getJobsNeedingStatusCheck(
        cutoff,
        this.options.batchSize,
      );

      if (due.length === 0) {
        logger.info("Status check: no jobs due");
        return stats;
      }

      const claimed = new Set(
        this.store.claimForStatusCheck(
          due.map((job) => job.id),
          now.toISOString(),
        ),
      );
      const jobs = due.filter((job) => claimed.has(job.id));
      logger.info(
        `Status check: ${jobs.length} jobs (concurrency ${this.options.maxConcurrent})`,
      );

      const results = await mapWithConcurrency(
        jobs,
        this.options.maxConcurrent,
        (job) => this.checkClaimed(job, signal),
      );

      let aborted = 0;
      for (const result of results) {
        if (result.outcome === "aborted") {
          aborted++;
          continue;
        }
        stats.totalChecked++;
        if (result.outcome === "active") stats.stillActive++;
        else if (result.outcome === "removed") stats.markedRemoved++;
        else stats.errors++;
      }
      if (aborted > 0) {
        logger.warn(`Status check aborted: ${aborted} claimed jobs released unchecked`);
      }
    } catch (error) {
      const message = errorMessage(error);
      this.notifier.notify(
        "status_check_failure",
        `Status check sweep failed: ${message}`,
        { checkedSoFar: stats.totalChecked },
        "critical",
      );
      throw error;
    }

    logger.info(
      `Status check complete — checked: ${stats.totalChecked}, active: ${stats.stillActive}, removed: ${stats.markedRemoved}, errors: ${stats.errors}`,
    );
    return stats;
  }

  /** Check one job now, regardless of when it was last checked. */
  async checkJob(id: number, signal?: AbortSignal): Promise<CheckResult | null> {
    const job = this.store.getJobById(id);
    if (!job || job.status !== "Active" || !job.sourceURL) {
      logger.warn(`Job ${id} is not an active job with a source URL, skipping`);
      return null;
    }

    const claimed = this.store.claimForStatusCheck([id], this.now().toISOString());
    if (claimed.length === 0) return null;

    return this.checkClaimed(job, signal);
  }

  /** Jobs left in Checking by a sweep that died go back to Active. */
  recoverStaleChecks(): number {
    const now = this.now();
    const recovered = this.store.recoverStaleChecks(
      new Date(now.getTime() - STALE_CHECK_MS).toISOString(),
      now.toISOString(),
    );
    if (recovered > 0) {
      logger.warn(`Recovered ${recovered} jobs stuck in Checking`);
    }
    return recovered;
  }

  expireStaleJobs(): number {
    const expired = this.store.expireStaleJobs(this.now().toISOString());
    logger.info(`Expired ${expired} stale jobs`);
    return expired;
  }

  private async checkClaimed(
    job: CanonicalJob,
    signal?: AbortSignal,
  ): Promise<CheckResult> {
    const url = job.sourceURL ?? "";
    const probeResult: ProbeResult = signal?.aborted
      ? abortedResult(0)
      : await this.probe.probe(url, signal);

    if (probeResult.aborted) {
      this.releaseClaim(job);
      return {
        jobId: job.id,
        status: "Active",
        statusCode: null,
        error: probeResult.error,
        outcome: "aborted",
      };
    }

    const transition = resolveTransition(probeResult);

    try {
      this.store.recordStatusCheck(job.id, {
        status: transition.status,
        code: probeResult.statusCode,
        error: transition.error,
        checkedAt: this.now().toISOString(),
      });
    } catch (error) {
      const message = errorMessage(error);
      logger.error(`Failed to record status check for job ${job.id}: ${message}`);
      this.notifier.notify(
        "database_error",
        `Failed to record status check: ${message}`,
        { id: job.id, jobID: job.jobID, sourceURL: url, statusCode: probeResult.statusCode },
        "critical",
      );
      this.releaseClaim(job);
      return {
        jobId: job.id,
        status: "Active",
        statusCode: probeResult.statusCode,
        error: message,
        outcome: "error",
      };
    }

    if (transition.outcome === "removed") {
      logger.info(
        `Removed (${probeResult.statusCode}): ${job.title} at ${job.company}`,
      );
      this.notifier.notify(
        "job_removed",
        `Job removed: ${job.title} at ${job.company}`,
        { id: job.id, jobID: job.jobID, sourceURL: url, statusCode: probeResult.statusCode },
        "info",
      );
    } else if (transition.outcome === "error") {
      const level = probeResult.statusCode === null || probeResult.statusCode >= 500
        ? "transient"
        : "unexpected";
      logger.warn(
        `Status check ${level} error for job ${job.id} (${url}): ${transition.error} after ${probeResult.attempts} attempt(s)`,
      );
    }

    return {
      jobId: job.id,
      status: transition.status,
      statusCode: probeResult.statusCode,
      error: transition.error,
      outcome: transition.outcome,
    };
  }

  /** Back to Active with the previous check data; stale recovery covers a failure here. */
  private releaseClaim(job: CanonicalJob): void {
    try {
      this.store.releaseStatusCheck(job.id, this.now().toISOString());
    } catch (error) {
      logger.error(
        `Could not release job ${job.id} from Checking: ${errorMessage(error)}`,
      );
    }
  }
}
