import Fuse from "fuse.js";
import type { DB } from "./index";
import { logger } from "../logger";
import type {
  CanonicalJob,
  ExperienceLevel,
  Industry,
  JobStatus,
  SanitizedJob,
  ScrapeLogEntry,
  ScrapeStatus,
} from "../types";

interface JobRow {
  id: number;
  job_id: string;
  title: string;
  company: string;
  location: string;
  city: string | null;
  country: string;
  remote: number;
  description: string;
  experience_level: string;
  industry: string;
  primary_category: string;
  secondary_categories: string;
  classification_confidence: number;
  skills_required: string;
  skills_preferred: string;
  all_skills: string;
  salary_min: number | null;
  salary_max: number | null;
  salary_currency: string | null;
  source_url: string | null;
  source_platform: string;
  posted_date: string | null;
  scraped_date: string;
  dedup_sources: string;
  dedup_source_urls: string;
  dedup_count: number;
  status: string;
  status_last_checked: string | null;
  status_check_code: number | null;
  status_check_error: string | null;
  created_at: string;
  last_updated: string;
  expires_at: string;
}

interface ScrapeLogRow {
  id: number;
  search_query: string;
  country: string;
  jobs_found: number;
  jobs_new: number;
  jobs_updated: number;
  status: string;
  error_message: string | null;
  duration_seconds: number;
  created_at: string;
}

export interface StoredScrapeLog extends ScrapeLogEntry {
  id: number;
  createdAt: string;
}

export interface CandidateQuery {
  company: string;
  country: string;
  since: string;
  limit: number;
}

export interface StatusCheckRecord {
  status: JobStatus;
  code: number | null;
  error: string | null;
  checkedAt: string;
}

const FUZZY_PREFIX_LENGTH = 3;
const FUZZY_POOL_FACTOR = 5;

const JOB_STATUSES: readonly JobStatus[] = [
  "Active",
  "Removed",
  "Expired",
  "Checking",
];
const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = [
  "Junior",
  "Mid",
  "Senior",
  "Lead",
  "Unknown",
];

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

function isExperienceLevel(value: string): value is ExperienceLevel {
  return EXPERIENCE_LEVELS.some((level) => level === value);
}

function toIndustry(value: string): Industry {
  return value === "Healthcare" ? "Healthcare" : "IT";
}

function toScrapeStatus(value: string): ScrapeStatus {
  return value === "success" || value === "aborted" ? value : "failed";
}

function parseStringArray(text: string): string[] {
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed)
      ? parsed.filter((v): v is string => typeof v === "string")
      : [];
  } catch (error) {
    logger.warn(`Unreadable list column, treating as empty: ${String(error)}`);
    return [];
  }
}

function rowToJob(row: JobRow): CanonicalJob {
  return {
    id: row.id,
    jobID: row.job_id,
    title: row.title,
    company: row.company,
    location: row.location,
    city: row.city,
    country: row.country,
    remote: row.remote === 1,
    description: row.description,
    experienceLevel: isExperienceLevel(row.experience_level)
      ? row.experience_level
      : "Unknown",
    industry: toIndustry(row.industry),
    primaryCategory: row.primary_category,
    secondaryCategories: parseStringArray(row.secondary_categories),
    classificationConfidence: row.classification_confidence,
    skillsRequired: parseStringArray(row.skills_required),
    skillsPreferred: parseStringArray(row.skills_preferred),
    allSkills: parseStringArray(row.all_skills),
    salaryMin: row.salary_min,
    salaryMax: row.salary_max,
    salaryCurrency: row.salary_currency,
    sourceURL: row.source_url,
    sourcePlatform: row.source_platform,
    postedDate: row.posted_date,
    scrapedDate: row.scraped_date,
    dedupSources: parseStringArray(row.dedup_sources),
    dedupSourceURLs: parseStringArray(row.dedup_source_urls),
    dedupCount: row.dedup_count,
    status: isJobStatus(row.status) ? row.status : "Active",
    statusLastChecked: row.status_last_checked,
    statusCheckCode: row.status_check_code,
    statusCheckError: row.status_check_error,
    createdAt: row.created_at,
    lastUpdated: row.last_updated,
    expiresAt: row.expires_at,
  };
}

function contentParams(job: SanitizedJob): Array<string | number | null> {
  return [
    job.jobID,
    job.title,
    job.company,
    job.location,
    job.city,
    job.country,
    job.remote ? 1 : 0,
    job.description,
    job.experienceLevel,
    job.industry,
    job.primaryCategory,
    JSON.stringify(job.secondaryCategories),
    job.classificationConfidence,
    JSON.stringify(job.skillsRequired),
    JSON.stringify(job.skillsPreferred),
    JSON.stringify(job.allSkills),
    job.salaryMin,
    job.salaryMax,
    job.salaryCurrency,
    job.sourceURL,
    job.sourcePlatform,
    job.postedDate,
    job.scrapedDate,
    JSON.stringify(job.dedupSources),
    JSON.stringify(job.dedupSourceURLs),
    job.dedupCount,
  ];
}

/**
 * Persistence for canonical jobs and the scrape log. All methods are
 * synchronous; `runExclusive` wraps a unit of work in a write-locking
 * transaction.
 */
export class JobStore {
  constructor(private readonly db: DB) {}

  /**
   * BEGIN IMMEDIATE takes the database write lock up front, so concurrent
   * runs (in this or another process) serialize their read-then-write.
   * Any throw rolls the whole unit back.
   */
  runExclusive<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  // Canonical jobs

  insertJob(
    job: SanitizedJob,
    timestamps: { now: string; expiresAt: string },
  ): CanonicalJob {
    const result = this.db
      .prepare(
        `INSERT INTO jobs (
          job_id, title, company, location, city, country, remote,
          description, experience_level, industry, primary_category,
          secondary_categories, classification_confidence,
          skills_required, skills_preferred, all_skills,
          salary_min, salary_max, salary_currency,
          source_url, source_platform, posted_date, scraped_date,
          dedup_sources, dedup_source_urls, dedup_count,
          status, created_at, last_updated, expires_at
        ) VALUES (
          ?, ?, ?, ?, ?, ?, ?,
          ?, ?, ?, ?,
          ?, ?,
          ?, ?, ?,
          ?, ?, ?,
          ?, ?, ?, ?,
          ?, ?, ?,
          'Active', ?, ?, ?
        )`,
      )
      .run(
        ...contentParams(job),
        timestamps.now,
        timestamps.now,
        timestamps.expiresAt,
      );

    const inserted = this.getJobById(Number(result.lastInsertRowid));
    if (!inserted) {
      throw new Error(`Inserted job ${String(result.lastInsertRowid)} not found`);
    }
    return inserted;
  }

  /** Rewrite every mutable column; `createdAt` is never touched. */
  updateJob(job: CanonicalJob): void {
    const result = this.db
      .prepare(
        `UPDATE jobs SET
          job_id = ?, title = ?, company = ?, location = ?, city = ?,
          country = ?, remote = ?, description = ?, experience_level = ?,
          industry = ?, primary_category = ?, secondary_categories = ?,
          classification_confidence = ?, skills_required = ?,
          skills_preferred = ?, all_skills = ?, salary_min = ?,
          salary_max = ?, salary_currency = ?, source_url = ?,
          source_platform = ?, posted_date = ?, scraped_date = ?,
          dedup_sources = ?, dedup_source_urls = ?, dedup_count = ?,
          status = ?, status_last_checked = ?, status_check_code = ?,
          status_check_error = ?, last_updated = ?, expires_at = ?
        WHERE id = ?`,
      )
      .run(
        ...contentParams(job),
        job.status,
        job.statusLastChecked,
        job.statusCheckCode,
        job.statusCheckError,
        job.lastUpdated,
        job.expiresAt,
        job.id,
      );

    if (result.changes !== 1) {
      throw new Error(`Job ${job.id} not found for update`);
    }
  }

  getJobById(id: number): CanonicalJob | null {
    const row = this.db
      .prepare<[number], JobRow>("SELECT * FROM jobs WHERE id = ?")
      .get(id);
    return row ? rowToJob(row) : null;
  }

  /**
   * Same country, created inside the window, company matching by substring
   * (either direction, case-insensitive) or by fuzzy search. Oldest first.
   * The fuzzy pass only sees rows sharing the company's leading characters.
   */
  findDedupCandidates(query: CandidateQuery): CanonicalJob[] {
    const company = query.company.trim().toLowerCase();

    const substringRows = this.db
      .prepare<[string, string, string, string, number], JobRow>(
        `SELECT * FROM jobs
         WHERE country = ? AND created_at >= ?
           AND (instr(lower(trim(company)), ?) > 0
                OR instr(?, lower(trim(company))) > 0)
         ORDER BY created_at ASC, id ASC
         LIMIT ?`,
      )
      .all(query.country, query.since, company, company, query.limit);

    const prefix = company.slice(0, FUZZY_PREFIX_LENGTH);
    const pool = this.db
      .prepare<[string, string, number, string, number], JobRow>(
        `SELECT * FROM jobs
         WHERE country = ? AND created_at >= ?
           AND substr(lower(trim(company)), 1, ?) = ?
         ORDER BY created_at ASC, id ASC
         LIMIT ?`,
      )
      .all(
        query.country,
        query.since,
        prefix.length,
        prefix,
        query.limit * FUZZY_POOL_FACTOR,
      );

    const byId = new Map<number, JobRow>();
    for (const row of substringRows) byId.set(row.id, row);
    if (pool.length > 0) {
      const fuse = new Fuse(pool, {
        keys: ["company"],
        threshold: 0.3,
        ignoreLocation: true,
      });
      for (const { item } of fuse.search(company)) byId.set(item.id, item);
    }

    return [...byId.values()]
      .sort((a, b) =>
        a.created_at === b.created_at
          ? a.id - b.id
          : a.created_at < b.created_at
            ? -1
            : 1,
      )
      .slice(0, query.limit)
      .map(rowToJob);
  }

  countJobs(): number {
    const row = this.db
      .prepare<[], { count: number }>("SELECT COUNT(*) as count FROM jobs")
      .get();
    return row?.count ?? 0;
  }

  countByStatus(): Record<JobStatus, number> {
    const counts: Record<JobStatus, number> = {
      Active: 0,
      Removed: 0,
      Expired: 0,
      Checking: 0,
    };
    const rows = this.db
      .prepare<[], { status: string; count: number }>(
        "SELECT status, COUNT(*) as count FROM jobs GROUP BY status",
      )
      .all();
    for (const row of rows) {
      if (isJobStatus(row.status)) counts[row.status] = row.count;
    }
    return counts;
  }

  // Liveness

  /** Active, with a source URL, never checked or checked before `checkedBefore`. */
  getJobsNeedingStatusCheck(checkedBefore: string, limit: number): CanonicalJob[] {
    return this.db
      .prepare<[string, number], JobRow>(
        `SELECT * FROM jobs
         WHERE status = 'Active'
           AND source_url IS NOT NULL AND source_url != ''
           AND (status_last_checked IS NULL OR status_last_checked < ?)
         ORDER BY status_last_checked IS NOT NULL, status_last_checked ASC, id ASC
         LIMIT ?`,
      )
      .all(checkedBefore, limit)
      .map(rowToJob);
  }

  /** Flip Active jobs to Checking; returns the ids actually claimed. */
  claimForStatusCheck(ids: number[], now: string): number[] {
    const claim = this.db.prepare(
      `UPDATE jobs SET status = 'Checking', last_updated = ?
       WHERE id = ? AND status = 'Active'`,
    );
    return this.runExclusive(() =>
      ids.filter((id) => claim.run(now, id).changes === 1),
    );
  }

  recordStatusCheck(id: number, check: StatusCheckRecord): void {
    const result = this.db
      .prepare(
        `UPDATE jobs SET
          status = ?, status_last_checked = ?, status_check_code = ?,
          status_check_error = ?, last_updated = ?
        WHERE id = ?`,
      )
      .run(
        check.status,
        check.checkedAt,
        check.code,
        check.error,
        check.checkedAt,
        id,
      );

    if (result.changes !== 1) {
      throw new Error(`Job ${id} not found for status update`);
    }
  }

  /**
   * Hand a claimed job back without recording a check; its
   * `statusLastChecked` stays as it was so it remains due.
   */
  releaseStatusCheck(id: number, now: string): boolean {
    return (
      this.db
        .prepare(
          `UPDATE jobs SET status = 'Active', last_updated = ?
           WHERE id = ? AND status = 'Checking'`,
        )
        .run(now, id).changes === 1
    );
  }

  /** Return jobs left in Checking (claimed before `claimedBefore`) to Active. */
  recoverStaleChecks(claimedBefore: string, now: string): number {
    return this.db
      .prepare(
        `UPDATE jobs SET status = 'Active', last_updated = ?
         WHERE status = 'Checking' AND last_updated < ?`,
      )
      .run(now, claimedBefore).changes;
  }

  /**
   * Active jobs past expiresAt become Expired, unless a 2xx/3xx check made
   * at or after expiresAt confirmed them.
   */
  expireStaleJobs(now: string): number {
    return this.db
      .prepare(
        `UPDATE jobs SET status = 'Expired', last_updated = ?
         WHERE status = 'Active'
           AND expires_at < ?
           AND NOT (
             status_last_checked IS NOT NULL
             AND status_last_checked >= expires_at
             AND status_check_code BETWEEN 200 AND 399
           )`,
      )
      .run(now, now).changes;
  }

  // Scrape log

  appendScrapeLog(entry: ScrapeLogEntry, createdAt: string): number {
    const result = this.db
      .prepare(
        `INSERT INTO scrape_log (
          search_query, country, jobs_found, jobs_new, jobs_updated,
          status, error_message, duration_seconds, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.searchQuery,
        entry.country,
        entry.jobsFound,
        entry.jobsNew,
        entry.jobsUpdated,
        entry.status,
        entry.errorMessage,
        entry.durationSeconds,
        createdAt,
      );
    return Number(result.lastInsertRowid);
  }

  getRecentScrapeLogs(limit = 20): StoredScrapeLog[] {
    return this.db
      .prepare<[number], ScrapeLogRow>(
        "SELECT * FROM scrape_log ORDER BY created_at DESC, id DESC LIMIT ?",
      )
      .all(limit)
      .map((row) => ({
        id: row.id,
        searchQuery: row.search_query,
        country: row.country,
        jobsFound: row.jobs_found,
        jobsNew: row.jobs_new,
        jobsUpdated: row.jobs_updated,
        status: toScrapeStatus(row.status),
        errorMessage: row.error_message,
        durationSeconds: row.duration_seconds,
        createdAt: row.created_at,
      }));
  }
}
