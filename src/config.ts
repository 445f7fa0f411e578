import { readFileSync, existsSync } from "fs";
import { join } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import { logger } from "./logger";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// JSON documents

const CategoryTitlesSchema = z.record(
  z.string().min(1),
  z.array(z.string().min(1)).min(1),
);

export const TaxonomySchema = z.object({
  IT: CategoryTitlesSchema,
  Healthcare: CategoryTitlesSchema,
});

export const CategoryKeywordsSchema = z.object({
  industryKeywords: z.object({
    Healthcare: z.array(
      z.object({
        keyword: z.string().min(1),
        category: z.string().min(1),
        weight: z.number().positive().max(9),
      }),
    ),
  }),
  categoryKeywords: z.record(
    z.string().min(1),
    z.record(z.string().min(1), z.number().positive().max(10)),
  ),
});

export const SkillsDatabaseSchema = z.record(
  z.string().min(1),
  z.array(z.string().min(1)),
);

export const CountriesSchema = z.object({
  countries: z
    .array(
      z.object({
        code: z.string().length(2),
        name: z.string().min(1),
        searchLocation: z.string().min(1),
      }),
    )
    .min(1),
});

export const SearchQueriesSchema = z.object({
  queries: z.array(z.string().min(1)).min(1),
});

export type Taxonomy = z.infer<typeof TaxonomySchema>;
export type CategoryKeywords = z.infer<typeof CategoryKeywordsSchema>;
export type SkillsDatabase = z.infer<typeof SkillsDatabaseSchema>;
export type CountriesConfig = z.infer<typeof CountriesSchema>;
export type SearchQueriesConfig = z.infer<typeof SearchQueriesSchema>;

// Environment

export interface EnvConfig {
  databasePath: string;
  timezone: string;
  port: number;
  dryRun: boolean;
  telegramLogBotToken: string;
  telegramLogChatId: string;
  scraperEndpoint: string;
  maxJobsPerSearch: number;
  fuzzyMatchThreshold: number;
  enableDeduplication: boolean;
  minDescriptionLength: number;
  dedupWindowDays: number;
  dedupCandidateLimit: number;
  jobExpiryDays: number;
  statusCheckIntervalDays: number;
  statusCheckBatchSize: number;
  maxConcurrentChecks: number;
  rateLimitDelayMinMs: number;
  rateLimitDelayMaxMs: number;
  httpTimeoutMs: number;
  statusCheckMaxAttempts: number;
  statusCheckBackoffMs: number;
  scrapeSchedule: string;
  statusCheckSchedule: string;
}

export interface AppConfig {
  env: EnvConfig;
  taxonomy: Taxonomy;
  categoryKeywords: CategoryKeywords;
  skills: SkillsDatabase;
  countries: CountriesConfig;
  searchQueries: SearchQueriesConfig;
}

export const DEFAULT_CONFIG_DIR = fileURLToPath(
  new URL("../config", import.meta.url),
);

function parseEnvInt(
  value: string | undefined,
  fallback: number,
  min?: number,
  max?: number,
): number {
  const parsed = Number.parseInt(value ?? "", 10);
  if (Number.isNaN(parsed)) return fallback;

  if (typeof min === "number" && parsed < min) return min;
  if (typeof max === "number" && parsed > max) return max;
  return parsed;
}

function parseEnvBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  return value.toLowerCase() === "true";
}

export function stripJsonComments(raw: string): string {
  // Only comments outside string literals are removed
  return raw.replace(
    /\\"|"(?:\\"|[^"])*"|(\/\/.*|\/\*[\s\S]*?\*\/)/g,
    (match: string, comment: string | undefined) => (comment ? "" : match),
  );
}

export function loadJsonConfig<T>(
  configDir: string,
  filename: string,
  schema: z.ZodType<T>,
): T {
  const filepath = join(configDir, filename);

  if (!existsSync(filepath)) {
    throw new ConfigError(`Config file not found: ${filepath}`);
  }

  let parsed: unknown;
  try {
    const raw = readFileSync(filepath, "utf-8");
    parsed = JSON.parse(stripJsonComments(raw));
  } catch (error) {
    throw new ConfigError(`Failed to parse config file ${filename}: ${error}`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config file ${filename}: ${issues}`);
  }
  return result.data;
}

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const rateLimitDelayMinMs = parseEnvInt(env.RATE_LIMIT_DELAY_MIN_MS, 1000, 0);
  return {
    databasePath: env.DATABASE_PATH ?? "data/jobs.db",
    timezone: env.TZ || "UTC",
    port: parseEnvInt(env.PORT, 3000, 1, 65535),
    dryRun: parseEnvBool(env.DRY_RUN, false),
    telegramLogBotToken: env.TELEGRAM_LOG_BOT_TOKEN ?? "",
    telegramLogChatId: env.TELEGRAM_LOG_CHAT_ID ?? "",
    scraperEndpoint: env.SCRAPER_ENDPOINT ?? "",
    maxJobsPerSearch: parseEnvInt(env.MAX_JOBS_PER_SEARCH, 50, 1, 500),
    fuzzyMatchThreshold: parseEnvInt(env.FUZZY_MATCH_THRESHOLD, 85, 0, 100),
    enableDeduplication: parseEnvBool(env.ENABLE_DEDUPLICATION, true),
    minDescriptionLength: parseEnvInt(env.MIN_DESCRIPTION_LENGTH, 50, 0),
    dedupWindowDays: parseEnvInt(env.DEDUP_WINDOW_DAYS, 90, 1),
    dedupCandidateLimit: parseEnvInt(env.DEDUP_CANDIDATE_LIMIT, 100, 1),
    jobExpiryDays: parseEnvInt(env.JOB_EXPIRY_DAYS, 30, 1),
    statusCheckIntervalDays: parseEnvInt(env.STATUS_CHECK_INTERVAL_DAYS, 7, 0),
    statusCheckBatchSize: parseEnvInt(env.STATUS_CHECK_BATCH_SIZE, 50, 1),
    maxConcurrentChecks: parseEnvInt(env.MAX_CONCURRENT_CHECKS, 5, 1, 50),
    rateLimitDelayMinMs,
    rateLimitDelayMaxMs: parseEnvInt(
      env.RATE_LIMIT_DELAY_MAX_MS,
      Math.max(3000, rateLimitDelayMinMs),
      rateLimitDelayMinMs,
    ),
    httpTimeoutMs: parseEnvInt(env.HTTP_TIMEOUT_MS, 10_000, 100),
    statusCheckMaxAttempts: parseEnvInt(env.STATUS_CHECK_MAX_ATTEMPTS, 3, 1, 10),
    statusCheckBackoffMs: parseEnvInt(env.STATUS_CHECK_BACKOFF_MS, 2000, 0),
    scrapeSchedule: env.SCRAPE_SCHEDULE ?? "0 * * * *",
    statusCheckSchedule: env.STATUS_CHECK_SCHEDULE ?? "0 2 * * *",
  };
}

function assertKeywordCategories(
  taxonomy: Taxonomy,
  keywords: CategoryKeywords,
): void {
  const known = new Set([
    ...Object.keys(taxonomy.IT),
    ...Object.keys(taxonomy.Healthcare),
  ]);

  if (known.size === 0) {
    throw new ConfigError("Job taxonomy defines no categories");
  }

  for (const entry of keywords.industryKeywords.Healthcare) {
    if (!Object.hasOwn(taxonomy.Healthcare, entry.category)) {
      throw new ConfigError(
        `Industry keyword "${entry.keyword}" references unknown Healthcare category "${entry.category}"`,
      );
    }
  }
  for (const category of Object.keys(keywords.categoryKeywords)) {
    if (!known.has(category)) {
      throw new ConfigError(
        `Category keywords reference unknown category "${category}"`,
      );
    }
  }
}

export function loadConfig(
  options: { configDir?: string; env?: NodeJS.ProcessEnv } = {},
): AppConfig {
  const configDir = options.configDir ?? DEFAULT_CONFIG_DIR;
  logger.info(`Loading configuration from ${configDir}...`);

  const env = loadEnvConfig(options.env);
  const taxonomy = loadJsonConfig(configDir, "job-categories.json", TaxonomySchema);
  const categoryKeywords = loadJsonConfig(
    configDir,
    "category-keywords.json",
    CategoryKeywordsSchema,
  );
  const skills = loadJsonConfig(
    configDir,
    "skills-database.json",
    SkillsDatabaseSchema,
  );
  const countries = loadJsonConfig(configDir, "countries.json", CountriesSchema);
  const searchQueries = loadJsonConfig(
    configDir,
    "search-queries.json",
    SearchQueriesSchema,
  );

  assertKeywordCategories(taxonomy, categoryKeywords);

  if (!env.telegramLogBotToken) {
    logger.warn(
      "TELEGRAM_LOG_BOT_TOKEN not set — notifications will only be logged",
    );
  }
  if (!env.scraperEndpoint) {
    logger.warn("SCRAPER_ENDPOINT not set — ingestion runs will find no jobs");
  }
  if (env.dryRun) {
    logger.info("🧪 DRY RUN MODE — notifications will not be sent");
  }

  const skillCount = Object.values(skills).reduce(
    (sum, list) => sum + list.length,
    0,
  );

  logger.info(`Config loaded successfully:`);
  logger.info(
    `  - ${Object.keys(taxonomy.IT).length} IT / ${Object.keys(taxonomy.Healthcare).length} Healthcare categories`,
  );
  logger.info(`  - ${skillCount} skills in ${Object.keys(skills).length} groups`);
  logger.info(
    `  - ${countries.countries.length} countries: ${countries.countries.map((c) => c.code).join(", ")}`,
  );
  logger.info(`  - ${searchQueries.queries.length} search queries`);
  logger.info(`  - Dedup threshold: ${env.fuzzyMatchThreshold}`);
  logger.info(`  - Timezone: ${env.timezone}`);

  return { env, taxonomy, categoryKeywords, skills, countries, searchQueries };
}
