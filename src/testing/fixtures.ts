import { DEFAULT_CONFIG_DIR, loadConfig } from "../config";
import type { AppConfig } from "../config";
import type { ScraperSource, SearchRequest } from "../sources";
import type { JobDraft, Notifier, SanitizedJob, Severity } from "../types";

export const FIXED_NOW = new Date("2026-01-15T12:00:00.000Z");

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ configDir: DEFAULT_CONFIG_DIR, env });
}

export function makeDraft(overrides: Partial<JobDraft> = {}): JobDraft {
  return {
    jobID: "job-1",
    title: "Backend Engineer",
    company: "Acme",
    location: "Austin, TX",
    city: "Austin",
    country: "US",
    remote: false,
    description:
      "Design and operate Python services for a growing logistics platform team.",
    experienceLevel: "Mid",
    industry: "IT",
    primaryCategory: "Backend Development",
    secondaryCategories: [],
    classificationConfidence: 0.5,
    skillsRequired: ["python"],
    skillsPreferred: [],
    allSkills: ["python"],
    salaryMin: null,
    salaryMax: null,
    salaryCurrency: null,
    sourceURL: "https://jobs.example.com/1",
    sourcePlatform: "Google Jobs",
    postedDate: "2026-01-10T00:00:00.000Z",
    scrapedDate: FIXED_NOW.toISOString(),
    dedupSources: ["Google Jobs"],
    dedupSourceURLs: ["https://jobs.example.com/1"],
    dedupCount: 1,
    ...overrides,
  };
}

export function makeJob(overrides: Partial<SanitizedJob> = {}): SanitizedJob {
  return { ...makeDraft(), remote: false, ...overrides };
}

export interface SentNotification {
  errorType: string;
  message: string;
  details?: Record<string, unknown>;
  severity?: Severity;
}

export class RecordingNotifier implements Notifier {
  readonly sent: SentNotification[] = [];

  notify(
    errorType: string,
    message: string,
    details?: Record<string, unknown>,
    severity?: Severity,
  ): void {
    this.sent.push({ errorType, message, details, severity });
  }

  async flush(): Promise<void> {}

  ofType(errorType: string): SentNotification[] {
    return this.sent.filter((n) => n.errorType === errorType);
  }
}

/** Serves canned records per query; a query mapped to an Error throws it. */
export class StaticSource implements ScraperSource {
  readonly name = "static";
  readonly requests: SearchRequest[] = [];

  constructor(private readonly results: Record<string, unknown[] | Error>) {}

  async search(request: SearchRequest): Promise<unknown[]> {
    this.requests.push(request);
    const result = this.results[request.query] ?? [];
    if (result instanceof Error) throw result;
    return result;
  }
}
