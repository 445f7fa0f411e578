export type JobStatus = "Active" | "Removed" | "Expired" | "Checking";

export type Industry = "IT" | "Healthcare";

export type ExperienceLevel = "Junior" | "Mid" | "Senior" | "Lead" | "Unknown";

export type Severity = "info" | "warning" | "critical";

export type ScrapeStatus = "success" | "failed" | "aborted";

export interface RawPosting {
  title?: string;
  company?: string;
  location?: string;
  description?: string;
  sourceURL?: string;
  sourcePlatform?: string;
  postedDate?: string;
  salaryText?: string;
  remote?: boolean | string;
  externalId?: string;
}

/** Enriched record before it is stored. */
export interface JobDraft {
  jobID: string;
  title: string;
  company: string;
  location: string;
  city: string | null;
  country: string;
  remote: boolean | string | null;
  description: string;
  experienceLevel: ExperienceLevel;

  industry: Industry;
  primaryCategory: string;
  secondaryCategories: string[];
  classificationConfidence: number;

  skillsRequired: string[];
  skillsPreferred: string[];
  allSkills: string[];

  salaryMin: number | null;
  salaryMax: number | null;
  salaryCurrency: string | null;

  sourceURL: string | null;
  sourcePlatform: string;
  postedDate: string | null;
  scrapedDate: string;

  dedupSources: string[];
  dedupSourceURLs: string[];
  dedupCount: number;
}

export interface SanitizedJob extends Omit<JobDraft, "remote"> {
  remote: boolean;
}

export interface CanonicalJob extends SanitizedJob {
  id: number;
  status: JobStatus;
  statusLastChecked: string | null;
  statusCheckCode: number | null;
  statusCheckError: string | null;
  createdAt: string;
  lastUpdated: string;
  expiresAt: string;
}

export interface ScrapeLogEntry {
  searchQuery: string;
  country: string;
  jobsFound: number;
  jobsNew: number;
  jobsUpdated: number;
  status: ScrapeStatus;
  errorMessage: string | null;
  durationSeconds: number;
}

export interface BatchStats {
  totalScraped: number;
  totalValidated: number;
  totalValidationFailed: number;
  totalDuplicates: number;
  totalNew: number;
  totalUpdated: number;
  errors: number;
  durationSeconds: number;
  aborted: boolean;
}

export interface StatusCheckStats {
  totalChecked: number;
  stillActive: number;
  markedRemoved: number;
  errors: number;
}

export interface SkillExtraction {
  allSkills: string[];
  required: string[];
  preferred: string[];
  categorized: Record<string, string[]>;
}

export interface SalaryInfo {
  min: number | null;
  max: number | null;
  currency: string | null;
}

export interface ClassificationResult {
  industry: Industry;
  primaryCategory: string;
  secondaryCategories: string[];
  classificationConfidence: number;
  primaryScore: number;
}

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

export interface Notifier {
  notify(
    errorType: string,
    message: string,
    details?: Record<string, unknown>,
    severity?: Severity,
  ): void;
  flush(): Promise<void>;
}
