import type { AppConfig } from "./config";
import { openDatabase } from "./db";
import type { DB } from "./db";
import { JobStore } from "./db/operations";
import { TelegramNotifier } from "./alerts";
import { SkillsExtractor } from "./skills";
import { JobClassifier } from "./classifier";
import { JobDeduplicator } from "./dedup";
import { JobValidator } from "./validation";
import { IngestionPipeline } from "./pipeline";
import type { SearchCountry } from "./pipeline";
import { StatusChecker } from "./status";
import { HttpLivenessProbe } from "./status/probe";
import type { LivenessProbe } from "./status/probe";
import { ScraperEndpointSource } from "./connectors/scraper-endpoint";
import type { ScraperSource } from "./sources";
import { DEFAULT_BACKOFF_MAX_MS } from "./utils/retry";
import type { RetryPolicy } from "./utils/retry";
import type { Notifier } from "./types";

/** Everything a process needs, built once at startup. */
export interface AppContext {
  config: AppConfig;
  db: DB;
  store: JobStore;
  notifier: Notifier;
  extractor: SkillsExtractor;
  classifier: JobClassifier;
  deduplicator: JobDeduplicator;
  validator: JobValidator;
  pipeline: IngestionPipeline;
  statusChecker: StatusChecker;
  searchCountries: SearchCountry[];
  close(): Promise<void>;
}

export interface ContextOverrides {
  db?: DB;
  notifier?: Notifier;
  source?: ScraperSource;
  probe?: LivenessProbe;
  now?: () => Date;
}

export function retryPolicyFromConfig(config: AppConfig): RetryPolicy {
  return {
    maxAttempts: config.env.statusCheckMaxAttempts,
    backoffStartMs: config.env.statusCheckBackoffMs,
    backoffMaxMs: DEFAULT_BACKOFF_MAX_MS,
  };
}

export function createAppContext(
  config: AppConfig,
  overrides: ContextOverrides = {},
): AppContext {
  const { env } = config;
  const retry = retryPolicyFromConfig(config);

  // Throws ConfigError before anything touches the database
  const classifier = new JobClassifier(config.taxonomy, config.categoryKeywords);
  const extractor = new SkillsExtractor(config.skills);
  const deduplicator = new JobDeduplicator({
    threshold: env.fuzzyMatchThreshold,
    enabled: env.enableDeduplication,
  });
  const validator = new JobValidator({
    minDescriptionLength: env.minDescriptionLength,
    allowedCountries: config.countries.countries.map((c) => c.code),
    now: overrides.now,
  });

  const db = overrides.db ?? openDatabase(env.databasePath);
  const store = new JobStore(db);

  const notifier =
    overrides.notifier ??
    new TelegramNotifier({
      botToken: env.telegramLogBotToken,
      chatId: env.telegramLogChatId,
      dryRun: env.dryRun,
    });

  const source =
    overrides.source ??
    new ScraperEndpointSource({
      endpoint: env.scraperEndpoint,
      timeoutMs: env.httpTimeoutMs,
      retry,
    });

  const probe =
    overrides.probe ??
    new HttpLivenessProbe({
      timeoutMs: env.httpTimeoutMs,
      retry,
      jitterMinMs: env.rateLimitDelayMinMs,
      jitterMaxMs: env.rateLimitDelayMaxMs,
    });

  const pipeline = new IngestionPipeline(
    { source, store, extractor, classifier, deduplicator, validator, notifier },
    {
      dedupWindowDays: env.dedupWindowDays,
      dedupCandidateLimit: env.dedupCandidateLimit,
      jobExpiryDays: env.jobExpiryDays,
      now: overrides.now,
    },
  );

  const statusChecker = new StatusChecker(store, probe, notifier, {
    intervalDays: env.statusCheckIntervalDays,
    batchSize: env.statusCheckBatchSize,
    maxConcurrent: env.maxConcurrentChecks,
    now: overrides.now,
  });

  const searchCountries = config.countries.countries.map((c) => ({
    code: c.code,
    searchLocation: c.searchLocation,
  }));

  return {
    config,
    db,
    store,
    notifier,
    extractor,
    classifier,
    deduplicator,
    validator,
    pipeline,
    statusChecker,
    searchCountries,
    async close() {
      await notifier.flush();
      if (db.open) db.close();
    },
  };
}
