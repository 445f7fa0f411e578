import { createHash } from "crypto";
import type { SkillsExtractor } from "./skills";
import type { JobClassifier } from "./classifier";
import type { ParsedPosting } from "./sources";
import type { JobDraft } from "./types";

// Company name normalization
const LEGAL_SUFFIXES =
  /\s*,?\s*\b(inc\.?|llc\.?|l\.l\.c\.?|ltd\.?|corp\.?|co\.?|l\.p\.?|limited|incorporated|corporation|company|plc|gmbh|ag|sa)\s*$/i;

export function normalizeCompanyName(name: string): string {
  let current = name.replace(/\s+/g, " ").trim();

  // "Acme Co. Inc." needs two passes
  for (;;) {
    const stripped = current.replace(LEGAL_SUFFIXES, "").trim();
    if (stripped === current || stripped.length === 0) break;
    current = stripped;
  }

  return current;
}

// Timestamp handling
export function normalizeTimestamp(value: string | null | undefined): string | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function addDays(iso: string, days: number): string {
  return new Date(new Date(iso).getTime() + days * DAY_MS).toISOString();
}

export function computeExpiresAt(
  postedDate: string | null,
  scrapedDate: string,
  expiryDays: number,
): string {
  return addDays(normalizeTimestamp(postedDate) ?? scrapedDate, expiryDays);
}

// Job identity: content hash, not unique once postings are merged
export function computeJobId(
  title: string,
  company: string,
  location: string,
): string {
  const key = [title, company, location]
    .map((part) => part.trim().toLowerCase())
    .join("|");
  return createHash("sha256").update(key).digest("hex");
}

export function parseCity(location: string): string | null {
  if (!location.includes(",")) return null;
  const city = location.split(",")[0].trim();
  return city.length > 0 ? city : null;
}

export function detectRemote(
  remote: boolean | string | undefined,
  location: string,
): boolean | string {
  if (remote !== undefined) return remote;
  return /\bremote\b/i.test(location);
}

export interface DraftDependencies {
  extractor: SkillsExtractor;
  classifier: JobClassifier;
}

// Normalize a parsed posting into an enriched draft
export function buildJobDraft(
  posting: ParsedPosting,
  country: string,
  deps: DraftDependencies,
  now: Date,
): JobDraft {
  const title = posting.title ?? "";
  const company = posting.company ?? "";
  const location = posting.location ?? "";
  const description = posting.description ?? "";
  const sourcePlatform = posting.sourcePlatform?.trim() || "Google Jobs";

  const skills = deps.extractor.extract(`${title}\n\n${description}`);
  const classification = deps.classifier.classify(title, description);
  const experienceLevel = deps.extractor.extractExperienceLevel(
    `${title}\n${description}`,
  );
  const salary = deps.extractor.extractSalary(
    `${posting.salaryText ?? ""} ${description}`,
  );

  return {
    jobID: computeJobId(title, company, location),
    title,
    company,
    location,
    city: parseCity(location),
    country,
    remote: detectRemote(posting.remote, location),
    description,
    experienceLevel,

    industry: classification.industry,
    primaryCategory: classification.primaryCategory,
    secondaryCategories: classification.secondaryCategories,
    classificationConfidence: classification.classificationConfidence,

    skillsRequired: skills.required,
    skillsPreferred: skills.preferred,
    allSkills: skills.allSkills,

    salaryMin: salary.min,
    salaryMax: salary.max,
    salaryCurrency: salary.currency,

    sourceURL: posting.sourceURL ?? null,
    sourcePlatform,
    postedDate: posting.postedDate ?? null,
    scrapedDate: now.toISOString(),

    dedupSources: [sourcePlatform],
    dedupSourceURLs: posting.sourceURL ? [posting.sourceURL] : [],
    dedupCount: 1,
  };
}
