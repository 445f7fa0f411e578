import { Hono } from "hono";
import { quickHealthCheck } from "./db";
import type { AppContext } from "./context";

type ServerContext = Pick<
  AppContext,
  "config" | "db" | "store" | "deduplicator"
>;

/** Read-only operational surface: liveness and job counts. */
export function createApp(ctx: ServerContext): Hono {
  const app = new Hono();

  app.get("/health", (c) => {
    const dbOk = quickHealthCheck(ctx.db);

    return c.json(
      {
        status: dbOk ? "healthy" : "degraded",
        timestamp: new Date().toISOString(),
        version: "1.0.0",
        dryRun: ctx.config.env.dryRun,
        database: { ok: dbOk },
      },
      dbOk ? 200 : 503,
    );
  });

  app.get("/status", (c) => {
    return c.json({
      timestamp: new Date().toISOString(),
      dryRun: ctx.config.env.dryRun,
      jobs: {
        total: ctx.store.countJobs(),
        byStatus: ctx.store.countByStatus(),
      },
      dedup: ctx.deduplicator.getStats(),
      recentScrapes: ctx.store.getRecentScrapeLogs(10),
    });
  });

  return app;
}
