import { ConfigError } from "../config";
import type { CategoryKeywords, Taxonomy } from "../config";
import type { ClassificationResult, Industry } from "../types";

const TITLE_PHRASE_WEIGHT = 10;
const TITLE_TOKEN_WEIGHT = 1;

// Keywords found this early (title + opening lines) count extra
const EARLY_MATCH_OFFSET = 200;
const EARLY_MATCH_BOOST = 1.5;

const MAX_SECONDARY = 5;
const SECONDARY_RATIO = 0.3;
const SECONDARY_FLOOR = 5.0;
const CONFIDENCE_SCALE = 50;
const HEALTHCARE_KEYWORD_QUORUM = 3;

const FALLBACK_CATEGORY = "Full Stack Development";

const STOPWORDS = new Set([
  "developer",
  "engineer",
  "specialist",
  "analyst",
  "senior",
  "junior",
  "lead",
  "and",
  "of",
  "the",
  "for",
  "with",
  "in",
  "end",
]);

const INDUSTRIES: Industry[] = ["IT", "Healthcare"];

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function byScoreThenName(a: [string, number], b: [string, number]): number {
  if (b[1] !== a[1]) return b[1] - a[1];
  return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

/**
 * Rule-based classifier: maps a posting onto the IT/Healthcare taxonomy by
 * weighted keyword hits. The keyword database is built once per instance.
 */
export class JobClassifier {
  private readonly taxonomy: Taxonomy;
  /** keyword -> category -> weight (max wins) */
  private readonly keywords = new Map<string, Map<string, number>>();
  private readonly healthcareKeywords: Set<string>;

  constructor(taxonomy: Taxonomy, categoryKeywords: CategoryKeywords) {
    const categoryCount =
      Object.keys(taxonomy.IT).length + Object.keys(taxonomy.Healthcare).length;
    if (categoryCount === 0) {
      throw new ConfigError("Job taxonomy defines no categories");
    }

    this.taxonomy = taxonomy;
    this.healthcareKeywords = new Set(
      categoryKeywords.industryKeywords.Healthcare.map((entry) =>
        entry.keyword.toLowerCase(),
      ),
    );

    for (const industry of INDUSTRIES) {
      for (const [category, titles] of Object.entries(taxonomy[industry])) {
        for (const title of titles) {
          const phrase = title.trim().toLowerCase();
          this.register(phrase, category, TITLE_PHRASE_WEIGHT);

          for (const token of phrase.split(/\s+/)) {
            if (token.length < 2 || STOPWORDS.has(token)) continue;
            this.register(token, category, TITLE_TOKEN_WEIGHT);
          }
        }
      }
    }

    for (const entry of categoryKeywords.industryKeywords.Healthcare) {
      this.register(entry.keyword.toLowerCase(), entry.category, entry.weight);
    }

    for (const [category, weights] of Object.entries(
      categoryKeywords.categoryKeywords,
    )) {
      for (const [keyword, weight] of Object.entries(weights)) {
        this.register(keyword.toLowerCase(), category, weight);
      }
    }
  }

  get keywordCount(): number {
    return this.keywords.size;
  }

  classify(title: string, description: string): ClassificationResult {
    const text = `${title ?? ""}\n${description ?? ""}`.toLowerCase();
    const scores = new Map<string, number>();
    const healthcareHits = new Set<string>();

    for (const [keyword, categories] of this.keywords) {
      const position = text.indexOf(keyword);
      if (position === -1) continue;

      if (this.healthcareKeywords.has(keyword)) healthcareHits.add(keyword);

      const boost = position < EARLY_MATCH_OFFSET ? EARLY_MATCH_BOOST : 1;
      for (const [category, weight] of categories) {
        scores.set(category, (scores.get(category) ?? 0) + weight * boost);
      }
    }

    const ranked = [...scores.entries()]
      .filter(([, score]) => score > 0)
      .sort(byScoreThenName);

    if (ranked.length === 0) {
      return {
        industry: "IT",
        primaryCategory: FALLBACK_CATEGORY,
        secondaryCategories: [],
        classificationConfidence: 0,
        primaryScore: 0,
      };
    }

    const [primaryCategory, primaryScore] = ranked[0];
    const cutoff = Math.max(primaryScore * SECONDARY_RATIO, SECONDARY_FLOOR);
    const secondaryCategories = ranked
      .slice(1)
      .filter(([, score]) => score >= cutoff)
      .slice(0, MAX_SECONDARY)
      .map(([category]) => category);

    const industry: Industry =
      Object.hasOwn(this.taxonomy.Healthcare, primaryCategory) ||
      healthcareHits.size >= HEALTHCARE_KEYWORD_QUORUM
        ? "Healthcare"
        : "IT";

    return {
      industry,
      primaryCategory,
      secondaryCategories,
      classificationConfidence: round(
        Math.min(primaryScore / CONFIDENCE_SCALE, 1),
        3,
      ),
      primaryScore,
    };
  }

  getAllCategories(industry?: Industry): string[] {
    const industries = industry ? [industry] : INDUSTRIES;
    return industries.flatMap((name) => Object.keys(this.taxonomy[name]));
  }

  getAllJobTitles(industry?: Industry): string[] {
    const industries = industry ? [industry] : INDUSTRIES;
    return industries.flatMap((name) =>
      Object.values(this.taxonomy[name]).flat(),
    );
  }

  validateCategory(category: string, industry?: Industry): boolean {
    return this.getAllCategories(industry).includes(category);
  }

  private register(keyword: string, category: string, weight: number): void {
    if (!keyword) return;
    let categories = this.keywords.get(keyword);
    if (!categories) {
      categories = new Map();
      this.keywords.set(keyword, categories);
    }
    categories.set(category, Math.max(categories.get(category) ?? 0, weight));
  }
}
