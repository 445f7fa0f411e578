import { logger } from "../logger";
import { loadConfig } from "../config";
import { createAppContext } from "../context";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Manual Ingest — All Queries × Countries");
logger.info("═══════════════════════════════════════════════════");

const config = loadConfig();
const ctx = createAppContext(config);

const controller = new AbortController();
process.once("SIGINT", () => {
  logger.warn("SIGINT received — finishing the current record, then stopping");
  controller.abort();
});

const stats = await ctx.pipeline.run({
  queries: config.searchQueries.queries,
  countries: ctx.searchCountries,
  maxPerQuery: config.env.maxJobsPerSearch,
  signal: controller.signal,
});

logger.info("═══════════════════════════════════════════════════");
logger.info("  Ingest Complete");
logger.info("═══════════════════════════════════════════════════");
logger.info(`  Jobs scraped:    ${stats.totalScraped}`);
logger.info(`  Jobs validated:  ${stats.totalValidated}`);
logger.info(`  Jobs invalid:    ${stats.totalValidationFailed}`);
logger.info(`  Jobs new:        ${stats.totalNew}`);
logger.info(`  Jobs merged:     ${stats.totalUpdated}`);
logger.info(`  Errors:          ${stats.errors}`);
logger.info(`  Duration:        ${stats.durationSeconds.toFixed(1)}s`);

await ctx.close();

// Only exit 1 if nothing came back and something failed
process.exit(stats.totalScraped === 0 && stats.errors > 0 ? 1 : 0);
