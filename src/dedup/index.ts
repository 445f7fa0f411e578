/**
 * Fuzzy duplicate detection and merging.
 * 1. Signature: exact (title | normalized company | location) key, batch only
 * 2. Token-sort similarity: mean over title, company and location
 * Merging keeps the primary record and folds provenance, skills and salary in.
 */

import { logger } from "../logger";
import { normalizeCompanyName } from "../normalizer";
import type { JobDraft } from "../types";
import { tokenSortRatio } from "./similarity";

export { normalizeCompanyName };

export type DedupFields = Pick<JobDraft, "title" | "company" | "location">;

export type MergeableJob = DedupFields &
  Pick<
    JobDraft,
    | "description"
    | "salaryMin"
    | "salaryMax"
    | "salaryCurrency"
    | "allSkills"
    | "skillsRequired"
    | "skillsPreferred"
    | "sourceURL"
    | "sourcePlatform"
    | "dedupSources"
    | "dedupSourceURLs"
    | "dedupCount"
  >;

export interface DuplicateCheck {
  isDuplicate: boolean;
  score: number;
}

export interface DuplicateMatch<T> {
  job: T;
  score: number;
}

export interface BatchDuplicate<T> {
  job: T;
  matchedWith: T;
  score: number;
}

export interface BatchDedupResult<T> {
  unique: T[];
  duplicates: BatchDuplicate<T>[];
}

export interface DeduplicatorOptions {
  threshold: number;
  enabled: boolean;
}

export interface DedupStats {
  threshold: number;
  enabled: boolean;
  comparisons: number;
  duplicatesFound: number;
}

const COMPARED_FIELDS = ["title", "company", "location"] as const;

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function mergeSkillLists(lists: string[][]): string[] {
  const merged = new Set<string>();
  for (const list of lists) {
    for (const skill of list) {
      const normalized = skill.trim().toLowerCase();
      if (normalized) merged.add(normalized);
    }
  }
  return [...merged].sort();
}

function appendDistinct(target: string[], values: Iterable<string>): void {
  for (const value of values) {
    if (value && !target.includes(value)) target.push(value);
  }
}

export class JobDeduplicator {
  readonly threshold: number;
  readonly enabled: boolean;
  private comparisons = 0;
  private duplicatesFound = 0;

  constructor(options: DeduplicatorOptions) {
    this.threshold = options.threshold;
    this.enabled = options.enabled;
  }

  isDuplicate(a: DedupFields, b: DedupFields): DuplicateCheck {
    if (!this.enabled) return { isDuplicate: false, score: 0 };

    this.comparisons++;

    const scores: number[] = [];
    for (const field of COMPARED_FIELDS) {
      const left = (a[field] ?? "").trim();
      const right = (b[field] ?? "").trim();
      if (!left || !right) continue;
      scores.push(tokenSortRatio(left, right));
    }

    if (scores.length === 0) return { isDuplicate: false, score: 0 };

    const score = round2(scores.reduce((sum, s) => sum + s, 0) / scores.length);
    const isDuplicate = score >= this.threshold;
    if (isDuplicate) this.duplicatesFound++;

    return { isDuplicate, score };
  }

  /** Every entry of `existing` that matches, in input order. */
  findDuplicates<T extends DedupFields>(
    candidate: DedupFields,
    existing: T[],
  ): DuplicateMatch<T>[] {
    const matches: DuplicateMatch<T>[] = [];
    for (const job of existing) {
      const { isDuplicate, score } = this.isDuplicate(candidate, job);
      if (isDuplicate) matches.push({ job, score });
    }
    return matches;
  }

  signature(job: DedupFields): string {
    return [
      job.title.trim().toLowerCase(),
      normalizeCompanyName(job.company).toLowerCase(),
      job.location.trim().toLowerCase(),
    ].join("|");
  }

  normalizeCompanyName(name: string): string {
    return normalizeCompanyName(name);
  }

  /**
   * Greedy, left to right: each job is compared with the unique jobs kept so
   * far and attached to the first one that matches. Not transitive.
   */
  deduplicateBatch<T extends DedupFields>(jobs: T[]): BatchDedupResult<T> {
    if (!this.enabled) return { unique: [...jobs], duplicates: [] };

    const unique: T[] = [];
    const duplicates: BatchDuplicate<T>[] = [];
    const bySignature = new Map<string, T>();

    for (const job of jobs) {
      const signature = this.signature(job);
      const exact = bySignature.get(signature);
      if (exact) {
        duplicates.push({ job, matchedWith: exact, score: 100 });
        continue;
      }

      let match: { kept: T; score: number } | null = null;
      for (const kept of unique) {
        const check = this.isDuplicate(job, kept);
        if (check.isDuplicate) {
          match = { kept, score: check.score };
          break;
        }
      }

      if (match) {
        duplicates.push({ job, matchedWith: match.kept, score: match.score });
      } else {
        unique.push(job);
        bySignature.set(signature, job);
      }
    }

    if (duplicates.length > 0) {
      logger.debug(
        `Batch dedup: ${jobs.length} jobs → ${unique.length} unique, ${duplicates.length} duplicates`,
      );
    }

    return { unique, duplicates };
  }

  /** Fold duplicates into the primary record. Inputs are not mutated. */
  merge<T extends MergeableJob>(primary: T, duplicates: MergeableJob[]): T {
    let description: string = primary.description;
    let salary: Pick<MergeableJob, "salaryMin" | "salaryMax" | "salaryCurrency"> = {
      salaryMin: primary.salaryMin,
      salaryMax: primary.salaryMax,
      salaryCurrency: primary.salaryCurrency,
    };
    const dedupSources = [...primary.dedupSources];
    const dedupSourceURLs = [...primary.dedupSourceURLs];

    for (const dup of duplicates) {
      if (dup.description.length > description.length) {
        description = dup.description;
      }

      if (
        salary.salaryMin === null &&
        salary.salaryMax === null &&
        (dup.salaryMin !== null || dup.salaryMax !== null)
      ) {
        salary = {
          salaryMin: dup.salaryMin,
          salaryMax: dup.salaryMax,
          salaryCurrency: dup.salaryCurrency,
        };
      }

      appendDistinct(dedupSources, [...dup.dedupSources, dup.sourcePlatform]);
      appendDistinct(
        dedupSourceURLs,
        dup.sourceURL
          ? [...dup.dedupSourceURLs, dup.sourceURL]
          : dup.dedupSourceURLs,
      );
    }

    const all: MergeableJob[] = [primary, ...duplicates];
    return {
      ...primary,
      ...salary,
      description,
      allSkills: mergeSkillLists(all.map((job) => job.allSkills)),
      skillsRequired: mergeSkillLists(all.map((job) => job.skillsRequired)),
      skillsPreferred: mergeSkillLists(all.map((job) => job.skillsPreferred)),
      dedupSources,
      dedupSourceURLs,
      dedupCount: primary.dedupCount + duplicates.length,
    };
  }

  getStats(): DedupStats {
    return {
      threshold: this.threshold,
      enabled: this.enabled,
      comparisons: this.comparisons,
      duplicatesFound: this.duplicatesFound,
    };
  }
}
