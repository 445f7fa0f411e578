import { logger } from "./logger";
import { buildJobDraft, computeExpiresAt } from "./normalizer";
import { parseRawPosting } from "./sources";
import type { ScraperSource } from "./sources";
import type { JobStore } from "./db/operations";
import type { SkillsExtractor } from "./skills";
import type { JobClassifier } from "./classifier";
import type { JobDeduplicator } from "./dedup";
import type { JobValidator } from "./validation";
import type {
  BatchStats,
  CanonicalJob,
  Notifier,
  SanitizedJob,
  ScrapeLogEntry,
} from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PipelineDependencies {
  source: ScraperSource;
  store: JobStore;
  extractor: SkillsExtractor;
  classifier: JobClassifier;
  deduplicator: JobDeduplicator;
  validator: JobValidator;
  notifier: Notifier;
}

export interface PipelineOptions {
  dedupWindowDays: number;
  dedupCandidateLimit: number;
  jobExpiryDays: number;
  now?: () => Date;
}

export interface SearchCountry {
  code: string;
  searchLocation: string;
}

export interface RunOptions {
  queries: string[];
  countries: SearchCountry[];
  maxPerQuery: number;
  signal?: AbortSignal;
}

export type RecordOutcome = "new" | "updated" | "invalid" | "error";

type WriteResult =
  | { kind: "new"; job: CanonicalJob }
  | { kind: "updated"; job: CanonicalJob; score: number };

export function emptyBatchStats(): BatchStats {
  return {
    totalScraped: 0,
    totalValidated: 0,
    totalValidationFailed: 0,
    totalDuplicates: 0,
    totalNew: 0,
    totalUpdated: 0,
    errors: 0,
    durationSeconds: 0,
    aborted: false,
  };
}

function secondsSince(start: number, end: number): number {
  return Math.round((end - start) / 10) / 100;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raw record → draft → validate → sanitize → dedup-check-then-write.
 * Per-record failures are counted and reported, never thrown.
 */
export class IngestionPipeline {
  private readonly now: () => Date;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async run(options: RunOptions): Promise<BatchStats> {
    const stats = emptyBatchStats();
    const startTime = this.now().getTime();
    const { signal } = options;

    logger.info("═══════════════════════════════════════════════════");
    logger.info(
      `  Ingestion Run: ${options.queries.length} queries × ${options.countries.length} countries`,
    );
    logger.info("═══════════════════════════════════════════════════");

    outer: for (const query of options.queries) {
      for (const country of options.countries) {
        if (signal?.aborted) {
          stats.aborted = true;
          break outer;
        }
        await this.runSearch(query, country, options.maxPerQuery, stats, signal);
      }
    }

    stats.durationSeconds = secondsSince(startTime, this.now().getTime());
    if (signal?.aborted) stats.aborted = true;

    logger.info("Summary");
    logger.info(`  Jobs scraped: ${stats.totalScraped}`);
    logger.info(`  Jobs validated: ${stats.totalValidated}`);
    logger.info(`  Validation failures: ${stats.totalValidationFailed}`);
    logger.info(`  Jobs new: ${stats.totalNew}`);
    logger.info(`  Jobs merged into existing: ${stats.totalUpdated}`);
    logger.info(`  Errors: ${stats.errors}`);
    logger.info(`  Duration: ${stats.durationSeconds.toFixed(1)}s`);
    if (stats.aborted) logger.warn("  Run aborted before completion");
    logger.info("═══════════════════════════════════════════════════");

    return stats;
  }

  /** Build, validate and store one raw record. */
  processRecord(raw: unknown, country: string, stats: BatchStats): RecordOutcome {
    const parsed = parseRawPosting(raw);
    if (!parsed.ok) {
      this.reportInvalid(stats, {}, parsed.errors);
      return "invalid";
    }

    const draft = buildJobDraft(
      parsed.posting,
      country,
      { extractor: this.deps.extractor, classifier: this.deps.classifier },
      this.now(),
    );

    const validation = this.deps.validator.validate(draft);
    if (!validation.ok) {
      this.reportInvalid(
        stats,
        { title: draft.title, company: draft.company, sourceURL: draft.sourceURL },
        validation.errors,
      );
      return "invalid";
    }
    stats.totalValidated++;

    const job = this.deps.validator.sanitize(draft);

    let result: WriteResult;
    try {
      result = this.deps.store.runExclusive(() => this.dedupAndWrite(job));
    } catch (error) {
      stats.errors++;
      const message = errorMessage(error);
      logger.error(
        `Store write failed for "${job.title}" at ${job.company}: ${message}`,
      );
      this.deps.notifier.notify(
        "database_error",
        `Failed to store job: ${message}`,
        { title: job.title, company: job.company, sourceURL: job.sourceURL },
        "critical",
      );
      return "error";
    }

    if (result.kind === "updated") {
      stats.totalDuplicates++;
      stats.totalUpdated++;
      logger.debug(
        `Merged into job ${result.job.id} (score ${result.score}): ${job.title} at ${job.company}`,
      );
      return "updated";
    }

    stats.totalNew++;
    logger.debug(`New job ${result.job.id}: ${job.title} at ${job.company}`);
    return "new";
  }

  private async runSearch(
    query: string,
    country: SearchCountry,
    maxPerQuery: number,
    stats: BatchStats,
    signal?: AbortSignal,
  ): Promise<void> {
    const started = this.now().getTime();
    logger.info(`Searching "${query}" in ${country.code}...`);

    let records: unknown[];
    try {
      records = await this.deps.source.search(
        {
          query,
          location: country.searchLocation,
          country: country.code,
          maxCount: maxPerQuery,
        },
        signal,
      );
    } catch (error) {
      if (signal?.aborted) {
        stats.aborted = true;
        logger.warn(`Search "${query}" (${country.code}) aborted`);
        this.writeScrapeLog(
          {
            searchQuery: query,
            country: country.code,
            jobsFound: 0,
            jobsNew: 0,
            jobsUpdated: 0,
            status: "aborted",
            errorMessage: "Aborted during search",
            durationSeconds: secondsSince(started, this.now().getTime()),
          },
          stats,
        );
        return;
      }

      stats.errors++;
      const message = errorMessage(error);
      logger.error(`Scrape failed for "${query}" (${country.code}): ${message}`);
      this.deps.notifier.notify(
        "scraping_failure",
        `Scrape failed for "${query}" (${country.code})`,
        { query, country: country.code, error: message },
        "warning",
      );
      this.writeScrapeLog(
        {
          searchQuery: query,
          country: country.code,
          jobsFound: 0,
          jobsNew: 0,
          jobsUpdated: 0,
          status: "failed",
          errorMessage: message,
          durationSeconds: secondsSince(started, this.now().getTime()),
        },
        stats,
      );
      return;
    }

    stats.totalScraped += records.length;
    let jobsNew = 0;
    let jobsUpdated = 0;
    let processed = 0;

    for (const raw of records) {
      // Checked between records only: a record in flight always finishes
      if (signal?.aborted) {
        stats.aborted = true;
        break;
      }
      const outcome = this.processRecord(raw, country.code, stats);
      processed++;
      if (outcome === "new") jobsNew++;
      else if (outcome === "updated") jobsUpdated++;
    }

    const cutShort = processed < records.length;
    logger.info(
      `  "${query}" (${country.code}): ${records.length} found, ${jobsNew} new, ${jobsUpdated} merged${cutShort ? ` (aborted after ${processed})` : ""}`,
    );

    this.writeScrapeLog(
      {
        searchQuery: query,
        country: country.code,
        jobsFound: records.length,
        jobsNew,
        jobsUpdated,
        status: cutShort ? "aborted" : "success",
        errorMessage: cutShort
          ? `Aborted after ${processed} of ${records.length} records`
          : null,
        durationSeconds: secondsSince(started, this.now().getTime()),
      },
      stats,
    );
  }

  /** Runs inside the store's exclusive transaction. */
  private dedupAndWrite(job: SanitizedJob): WriteResult {
    const now = this.now();
    const nowIso = now.toISOString();
    const expiresAt = computeExpiresAt(
      job.postedDate,
      job.scrapedDate,
      this.options.jobExpiryDays,
    );

    const candidates = this.deps.store.findDedupCandidates({
      company: job.company,
      country: job.country,
      since: new Date(
        now.getTime() - this.options.dedupWindowDays * DAY_MS,
      ).toISOString(),
      limit: this.options.dedupCandidateLimit,
    });

    for (const existing of candidates) {
      const check = this.deps.deduplicator.isDuplicate(job, existing);
      if (!check.isDuplicate) continue;

      const merged = this.deps.deduplicator.merge(existing, [job]);
      const updated: CanonicalJob = {
        ...merged,
        // Seen live on a source again
        status:
          existing.status === "Removed" || existing.status === "Expired"
            ? "Active"
            : existing.status,
        expiresAt: expiresAt > existing.expiresAt ? expiresAt : existing.expiresAt,
        lastUpdated: nowIso,
      };
      this.deps.store.updateJob(updated);
      return { kind: "updated", job: updated, score: check.score };
    }

    const inserted = this.deps.store.insertJob(job, { now: nowIso, expiresAt });
    return { kind: "new", job: inserted };
  }

  private reportInvalid(
    stats: BatchStats,
    context: Record<string, unknown>,
    errors: string[],
  ): void {
    stats.totalValidationFailed++;
    logger.warn(`Validation failed: ${errors.join("; ")}`, context);
    this.deps.notifier.notify(
      "validation_error",
      "Job failed validation",
      { ...context, errors },
      "info",
    );
  }

  private writeScrapeLog(entry: ScrapeLogEntry, stats: BatchStats): void {
    try {
      this.deps.store.appendScrapeLog(entry, this.now().toISOString());
    } catch (error) {
      stats.errors++;
      const message = errorMessage(error);
      logger.error(`Failed to write scrape log: ${message}`);
      this.deps.notifier.notify(
        "database_error",
        `Failed to write scrape log: ${message}`,
        { query: entry.searchQuery, country: entry.country },
        "critical",
      );
    }
  }
}
