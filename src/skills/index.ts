/**
 * Skills, experience level and salary extraction from free-text postings.
 * Pure and stateless after construction: safe to share across runs.
 */

import type { SkillsDatabase } from "../config";
import type {
  ExperienceLevel,
  SalaryInfo,
  SkillExtraction,
} from "../types";

const CAPTURE = "([A-Za-z0-9.+#\\- ]+)";

const PHRASE_PATTERNS: RegExp[] = [
  new RegExp(`experience (?:with|in)\\s+${CAPTURE}`, "g"),
  new RegExp(`proficient (?:with|in)\\s+${CAPTURE}`, "g"),
  new RegExp(`knowledge of\\s+${CAPTURE}`, "g"),
  new RegExp(`skilled in\\s+${CAPTURE}`, "g"),
  new RegExp(`expertise in\\s+${CAPTURE}`, "g"),
  new RegExp(`familiar with\\s+${CAPTURE}`, "g"),
  new RegExp(`understanding of\\s+${CAPTURE}`, "g"),
];

// "- Python", "• Java", "* Docker"
const BULLET_PATTERN = /[•\-*]\s*([A-Za-z0-9.+#\- ]+?)(?:\n|,|;|$)/g;

const REQUIRED_MARKERS = [
  "required",
  "must have",
  "mandatory",
  "essential",
  "minimum qualification",
];

const PREFERRED_MARKERS = ["preferred", "nice to have", "bonus", "desirable"];

// Checked in order; the first tier with a hit wins
const EXPERIENCE_TIERS: Array<{ level: ExperienceLevel; keywords: string[] }> = [
  {
    level: "Lead",
    keywords: ["lead", "principal", "staff", "head of", "architect"],
  },
  {
    level: "Senior",
    keywords: ["senior", "sr.", "sr ", "5+ years", "7+ years", "10+ years"],
  },
  {
    level: "Mid",
    keywords: [
      "mid level",
      "mid-level",
      "intermediate",
      "2-5 years",
      "3-5 years",
      "3+ years",
    ],
  },
  {
    level: "Junior",
    keywords: [
      "junior",
      "jr.",
      "jr ",
      "entry level",
      "entry-level",
      "graduate",
      "associate",
      "0-2 years",
      "intern",
    ],
  },
];

const AMOUNT = "(\\d{1,3}(?:,\\d{3})*(?:\\.\\d{2})?)";

const SALARY_PATTERNS: RegExp[] = [
  // $100,000 - $150,000
  new RegExp(`\\$${AMOUNT}\\s*-\\s*\\$${AMOUNT}`),
  // 100,000 - 150,000 USD
  /(\d{1,3}(?:,\d{3})*)\s*-\s*(\d{1,3}(?:,\d{3})*)\s*(?:USD|dollars)/,
  // $100k - $150k
  /\$(\d{1,3}(?:,\d{3})*[kK])\s*-\s*\$(\d{1,3}(?:,\d{3})*[kK])/,
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function parseAmount(raw: string): number {
  const cleaned = raw.replace(/,/g, "");
  if (/[kK]$/.test(cleaned)) {
    return Number.parseFloat(cleaned.slice(0, -1)) * 1000;
  }
  return Number.parseFloat(cleaned);
}

function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

export class SkillsExtractor {
  private readonly skillPatterns: Map<string, RegExp>;
  private readonly categories: Map<string, Set<string>>;

  constructor(skillsDb: SkillsDatabase) {
    this.skillPatterns = new Map();
    this.categories = new Map();

    for (const [category, skills] of Object.entries(skillsDb)) {
      const lowered = new Set(skills.map((s) => s.trim().toLowerCase()));
      this.categories.set(category, lowered);
      for (const skill of lowered) {
        // Lookarounds instead of \b: "c++" and "c#" end in punctuation
        this.skillPatterns.set(
          skill,
          new RegExp(`(?<![a-z0-9])${escapeRegExp(skill)}(?![a-z0-9])`, "i"),
        );
      }
    }
  }

  get vocabularySize(): number {
    return this.skillPatterns.size;
  }

  extract(text: string): SkillExtraction {
    if (!text || !text.trim()) {
      return { allSkills: [], required: [], preferred: [], categorized: {} };
    }

    const lower = text.toLowerCase();
    const found = new Set<string>();

    for (const [skill, pattern] of this.skillPatterns) {
      if (pattern.test(lower)) found.add(skill);
    }

    for (const pattern of PHRASE_PATTERNS) {
      for (const match of lower.matchAll(pattern)) {
        this.addContainedSkills(match[1], found);
      }
    }

    for (const match of text.matchAll(BULLET_PATTERN)) {
      this.addContainedSkills(match[1].toLowerCase().trim(), found);
    }

    const { required, preferred } = this.splitRequiredPreferred(lower, found);

    return {
      allSkills: sortedUnique(found),
      required: sortedUnique(required),
      preferred: sortedUnique(preferred),
      categorized: this.categorize(found),
    };
  }

  extractExperienceLevel(text: string): ExperienceLevel {
    if (!text) return "Unknown";

    const lower = text.toLowerCase();
    const title = text.includes("\n")
      ? text.split("\n")[0].toLowerCase()
      : lower.slice(0, 100);

    for (const scope of [title, lower]) {
      for (const tier of EXPERIENCE_TIERS) {
        if (tier.keywords.some((kw) => scope.includes(kw))) {
          return tier.level;
        }
      }
    }

    return "Unknown";
  }

  extractSalary(text: string): SalaryInfo {
    if (!text) return { min: null, max: null, currency: null };

    for (const pattern of SALARY_PATTERNS) {
      const match = pattern.exec(text);
      if (!match) continue;

      const min = parseAmount(match[1]);
      const max = parseAmount(match[2]);
      if (Number.isFinite(min) && Number.isFinite(max)) {
        return { min, max, currency: "USD" };
      }
    }

    return { min: null, max: null, currency: null };
  }

  private addContainedSkills(captured: string, found: Set<string>): void {
    for (const skill of this.skillPatterns.keys()) {
      if (captured.includes(skill)) found.add(skill);
    }
  }

  private splitRequiredPreferred(
    lower: string,
    skills: Set<string>,
  ): { required: Set<string>; preferred: Set<string> } {
    const required = new Set<string>();
    const preferred = new Set<string>();

    for (const segment of lower.split(/\n\s*\n+/)) {
      const isRequired = REQUIRED_MARKERS.some((kw) => segment.includes(kw));
      const isPreferred =
        !isRequired && PREFERRED_MARKERS.some((kw) => segment.includes(kw));
      if (!isRequired && !isPreferred) continue;

      const bucket = isRequired ? required : preferred;
      for (const skill of skills) {
        if (this.skillPatterns.get(skill)?.test(segment)) bucket.add(skill);
      }
    }

    // Anything not placed by a marked segment defaults to required
    for (const skill of skills) {
      if (!required.has(skill) && !preferred.has(skill)) required.add(skill);
    }

    return { required, preferred };
  }

  private categorize(skills: Set<string>): Record<string, string[]> {
    const categorized: Record<string, string[]> = {};
    for (const [category, members] of this.categories) {
      const hits = [...skills].filter((skill) => members.has(skill));
      if (hits.length > 0) categorized[category] = hits.sort();
    }
    return categorized;
  }
}
