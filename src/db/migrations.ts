import type Database from "better-sqlite3";
import { CREATE_TABLES_SQL } from "./schema";
import { logger } from "../logger";

interface Migration {
  id: string;
  description: string;
  sql: string;
}

export const MIGRATIONS: Migration[] = [
  {
    id: "0001_init_schema",
    description: "Jobs and scrape log tables",
    sql: CREATE_TABLES_SQL,
  },
  {
    id: "0002_company_lookup_index",
    description: "Case-insensitive company index for dedup candidate lookups",
    sql: `
      CREATE INDEX IF NOT EXISTS idx_jobs_company_nocase
        ON jobs(country, company COLLATE NOCASE);
    `,
  },
  {
    id: "0003_scrape_log_aborted_status",
    description: "Allow 'aborted' scrape log entries",
    sql: `
      CREATE TABLE scrape_log_next (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        search_query TEXT NOT NULL,
        country TEXT NOT NULL,
        jobs_found INTEGER NOT NULL DEFAULT 0,
        jobs_new INTEGER NOT NULL DEFAULT 0,
        jobs_updated INTEGER NOT NULL DEFAULT 0,
        status TEXT NOT NULL CHECK (status IN ('success', 'failed', 'aborted')),
        error_message TEXT,
        duration_seconds REAL NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL
      );

      INSERT INTO scrape_log_next (
        id, search_query, country, jobs_found, jobs_new, jobs_updated,
        status, error_message, duration_seconds, created_at
      )
      SELECT
        id, search_query, country, jobs_found, jobs_new, jobs_updated,
        status, error_message, duration_seconds, created_at
      FROM scrape_log;

      DROP TABLE scrape_log;
      ALTER TABLE scrape_log_next RENAME TO scrape_log;
      CREATE INDEX IF NOT EXISTS idx_scrape_log_created ON scrape_log(created_at);
    `,
  },
];

function ensureMigrationTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id TEXT PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);
}

function isApplied(db: Database.Database, id: string): boolean {
  const row = db
    .prepare<[string], { id: string }>(
      "SELECT id FROM _migrations WHERE id = ? LIMIT 1",
    )
    .get(id);
  return row !== undefined;
}

export function runMigrations(db: Database.Database): number {
  ensureMigrationTable(db);
  let applied = 0;

  for (const migration of MIGRATIONS) {
    if (isApplied(db, migration.id)) {
      continue;
    }

    logger.info(`Applying migration ${migration.id}: ${migration.description}`);
    db.exec("BEGIN");
    try {
      db.exec(migration.sql);
      db.prepare("INSERT INTO _migrations (id, description) VALUES (?, ?)").run(
        migration.id,
        migration.description,
      );
      db.exec("COMMIT");
      applied++;
      logger.info(`Applied migration ${migration.id}`);
    } catch (error) {
      db.exec("ROLLBACK");
      logger.error(`Migration ${migration.id} failed:`, error);
      throw error;
    }
  }

  return applied;
}
