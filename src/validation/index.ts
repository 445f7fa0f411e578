import { normalizeCompanyName } from "../normalizer";
import type { JobDraft, SanitizedJob, ValidationResult } from "../types";

const MIN_TITLE_LENGTH = 3;
const MIN_COMPANY_LENGTH = 2;
const MAX_SALARY_MIN = 1_000_000;
const MAX_SALARY_MAX = 2_000_000;
const MAX_SKILLS = 100;

const PLACEHOLDER_COMPANIES = new Set([
  "unknown",
  "n/a",
  "na",
  "none",
  "null",
  "-",
]);

const SPAM_PHRASES = [
  "viagra",
  "cialis",
  "casino",
  "poker",
  "click here",
  "limited time offer",
  "earn $$$",
  "work from home and earn",
];

const TRUTHY_REMOTE = new Set(["true", "yes", "1"]);

export interface ValidatorOptions {
  minDescriptionLength: number;
  allowedCountries: string[];
  now?: () => Date;
}

export interface BatchValidation {
  valid: SanitizedJob[];
  invalid: Array<{ job: JobDraft; errors: string[] }>;
}

function normalizeSkills(skills: string[]): string[] {
  return [
    ...new Set(skills.map((s) => s.trim().toLowerCase()).filter(Boolean)),
  ].sort();
}

function coerceRemote(value: boolean | string | null): boolean {
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    return TRUTHY_REMOTE.has(value.trim().toLowerCase());
  }
  return false;
}

function trimOrNull(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Data-quality gates. `validate` is pure and collects every failure;
 * `sanitize` is only meant for records that passed.
 */
export class JobValidator {
  private readonly minDescriptionLength: number;
  private readonly allowedCountries: Set<string>;
  private readonly now: () => Date;

  constructor(options: ValidatorOptions) {
    this.minDescriptionLength = options.minDescriptionLength;
    this.allowedCountries = new Set(
      options.allowedCountries.map((code) => code.trim().toUpperCase()),
    );
    this.now = options.now ?? (() => new Date());
  }

  validate(job: JobDraft): ValidationResult {
    const errors: string[] = [];

    const title = (job.title ?? "").trim();
    if (!title) {
      errors.push("Title is required");
    } else if (title.length < MIN_TITLE_LENGTH) {
      errors.push(`Title too short (min ${MIN_TITLE_LENGTH} characters)`);
    }

    // Checked as stored too, since sanitize strips legal suffixes
    const company = (job.company ?? "").trim();
    const storedCompany = normalizeCompanyName(company);
    if (!company) {
      errors.push("Company is required");
    } else if (storedCompany.length < MIN_COMPANY_LENGTH) {
      errors.push(`Company too short (min ${MIN_COMPANY_LENGTH} characters)`);
    } else if (
      PLACEHOLDER_COMPANIES.has(company.toLowerCase()) ||
      PLACEHOLDER_COMPANIES.has(storedCompany.toLowerCase())
    ) {
      errors.push(`Company is a placeholder: "${company}"`);
    }

    if (!(job.location ?? "").trim()) {
      errors.push("Location is required");
    }

    const description = (job.description ?? "").trim();
    if (description.length < this.minDescriptionLength) {
      errors.push(
        `Description too short (${description.length} < ${this.minDescriptionLength} characters)`,
      );
    }

    const lowerDescription = description.toLowerCase();
    const spam = SPAM_PHRASES.find((phrase) => lowerDescription.includes(phrase));
    if (spam) {
      errors.push(`Description contains spam phrase: "${spam}"`);
    }

    const country = (job.country ?? "").trim().toUpperCase();
    if (!this.allowedCountries.has(country)) {
      errors.push(`Country not allowed: "${job.country}"`);
    }

    errors.push(...this.validateSalary(job.salaryMin, job.salaryMax));

    if (!Array.isArray(job.allSkills)) {
      errors.push("allSkills must be a list");
    } else if (job.allSkills.length > MAX_SKILLS) {
      errors.push(`Too many skills (${job.allSkills.length} > ${MAX_SKILLS})`);
    }

    const sourceURL = trimOrNull(job.sourceURL);
    if (sourceURL && !/^https?:\/\//i.test(sourceURL)) {
      errors.push(`Source URL must use http(s): "${sourceURL}"`);
    }

    const postedDate = trimOrNull(job.postedDate);
    if (postedDate) {
      const posted = new Date(postedDate);
      if (Number.isNaN(posted.getTime())) {
        errors.push(`Posted date is not a valid date: "${postedDate}"`);
      } else if (posted.getTime() > this.now().getTime()) {
        errors.push(`Posted date is in the future: "${postedDate}"`);
      }
    }

    return { ok: errors.length === 0, errors };
  }

  sanitize(job: JobDraft | SanitizedJob): SanitizedJob {
    return {
      ...job,
      title: job.title.trim(),
      company: normalizeCompanyName(job.company),
      location: job.location.trim(),
      city: trimOrNull(job.city),
      country: job.country.trim().toUpperCase(),
      remote: coerceRemote(job.remote),
      description: job.description.trim(),
      primaryCategory: job.primaryCategory.trim(),
      skillsRequired: normalizeSkills(job.skillsRequired),
      skillsPreferred: normalizeSkills(job.skillsPreferred),
      allSkills: normalizeSkills(job.allSkills),
      salaryCurrency: trimOrNull(job.salaryCurrency),
      sourceURL: trimOrNull(job.sourceURL),
      sourcePlatform: job.sourcePlatform.trim(),
      postedDate: trimOrNull(job.postedDate),
      scrapedDate: job.scrapedDate.trim(),
    };
  }

  validateBatch(jobs: JobDraft[]): BatchValidation {
    const result: BatchValidation = { valid: [], invalid: [] };
    for (const job of jobs) {
      const { ok, errors } = this.validate(job);
      if (ok) {
        result.valid.push(this.sanitize(job));
      } else {
        result.invalid.push({ job, errors });
      }
    }
    return result;
  }

  private validateSalary(min: number | null, max: number | null): string[] {
    const errors: string[] = [];

    if (min !== null) {
      if (!Number.isFinite(min) || min < 0) {
        errors.push(`Salary minimum must be a non-negative number (got ${min})`);
      } else if (min > MAX_SALARY_MIN) {
        errors.push(`Salary minimum exceeds ${MAX_SALARY_MIN} (got ${min})`);
      }
    }

    if (max !== null) {
      if (!Number.isFinite(max) || max < 0) {
        errors.push(`Salary maximum must be a non-negative number (got ${max})`);
      } else if (max > MAX_SALARY_MAX) {
        errors.push(`Salary maximum exceeds ${MAX_SALARY_MAX} (got ${max})`);
      }
    }

    if (min !== null && max !== null && min > max) {
      errors.push(`Salary range invalid: minimum ${min} exceeds maximum ${max}`);
    }

    return errors;
  }
}
