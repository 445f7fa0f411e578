import { logger } from "../logger";
import { loadConfig } from "../config";
import { createAppContext } from "../context";

logger.info("═══════════════════════════════════════════════════");
logger.info("  Manual Status Check");
logger.info("═══════════════════════════════════════════════════");

const config = loadConfig();
const ctx = createAppContext(config);

let exitCode = 0;
try {
  const stats = await ctx.statusChecker.checkJobs();
  const expired = ctx.statusChecker.expireStaleJobs();

  logger.info(`  Checked:        ${stats.totalChecked}`);
  logger.info(`  Still active:   ${stats.stillActive}`);
  logger.info(`  Removed:        ${stats.markedRemoved}`);
  logger.info(`  Errors:         ${stats.errors}`);
  logger.info(`  Expired:        ${expired}`);

  const counts = ctx.store.countByStatus();
  logger.info(
    `  Jobs by status: ${Object.entries(counts)
      .map(([status, count]) => `${status}=${count}`)
      .join(", ")}`,
  );
} catch (error) {
  logger.error("Status check failed:", error);
  exitCode = 1;
} finally {
  await ctx.close();
}

process.exit(exitCode);
