import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import { dirname } from "path";
import { SCHEMA_VERSION } from "./schema";
import { runMigrations } from "./migrations";
import { logger } from "../logger";

export type DB = Database.Database;

const EXPECTED_TABLES = ["jobs", "scrape_log"];

/** Open (creating if needed) the SQLite file, or ":memory:", and migrate it. */
export function openDatabase(path: string): DB {
  if (path !== ":memory:") {
    const dataDir = dirname(path);
    if (!existsSync(dataDir)) {
      mkdirSync(dataDir, { recursive: true });
      logger.info(`Created data directory: ${dataDir}`);
    }
  }

  const db = new Database(path);

  // WAL for concurrent readers while a run writes
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma("busy_timeout = 5000");

  try {
    initializeDatabase(db);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}

export function initializeDatabase(db: DB): void {
  logger.info("Initializing database...");

  try {
    runMigrations(db);

    const tableNames = db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
      )
      .all()
      .map((t) => t.name)
      .filter((n) => n !== "sqlite_sequence");
    logger.info(
      `Database initialized (schema v${SCHEMA_VERSION}) with ${tableNames.length} tables: ${tableNames.join(", ")}`,
    );

    const missing = EXPECTED_TABLES.filter((t) => !tableNames.includes(t));
    if (missing.length > 0) {
      logger.warn(`Missing tables after migration: ${missing.join(", ")}`);
    }
  } catch (error) {
    logger.error("Failed to initialize database:", error);
    throw error;
  }
}

export function checkDatabaseIntegrity(db: DB): { ok: boolean; result: string } {
  try {
    const result = db
      .prepare<[], { integrity_check: string }>("PRAGMA integrity_check")
      .get();
    const isOk = result?.integrity_check === "ok";

    if (!isOk) {
      logger.error(
        `Database integrity check FAILED: ${result?.integrity_check}`,
      );
    } else {
      logger.info("Database integrity check passed");
    }

    return { ok: isOk, result: result?.integrity_check ?? "unknown" };
  } catch (error) {
    logger.error("Database integrity check threw error:", error);
    return { ok: false, result: String(error) };
  }
}

export function quickHealthCheck(db: DB): boolean {
  try {
    const result = db.prepare<[], { ok: number }>("SELECT 1 as ok").get();
    return result?.ok === 1;
  } catch (error) {
    logger.warn(`Database health check failed: ${String(error)}`);
    return false;
  }
}

export { SCHEMA_VERSION };
