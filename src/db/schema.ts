export const SCHEMA_VERSION = 3;

export const CREATE_TABLES_SQL = `
  -- 1. jobs (one row per logically distinct posting; list fields are JSON arrays)
  CREATE TABLE IF NOT EXISTS jobs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    job_id TEXT NOT NULL,
    title TEXT NOT NULL,
    company TEXT NOT NULL,
    location TEXT NOT NULL,
    city TEXT,
    country TEXT NOT NULL,
    remote INTEGER NOT NULL DEFAULT 0,
    description TEXT NOT NULL DEFAULT '',
    experience_level TEXT NOT NULL DEFAULT 'Unknown',
    industry TEXT NOT NULL,
    primary_category TEXT NOT NULL,
    secondary_categories TEXT NOT NULL DEFAULT '[]',
    classification_confidence REAL NOT NULL DEFAULT 0,
    skills_required TEXT NOT NULL DEFAULT '[]',
    skills_preferred TEXT NOT NULL DEFAULT '[]',
    all_skills TEXT NOT NULL DEFAULT '[]',
    salary_min REAL,
    salary_max REAL,
    salary_currency TEXT,
    source_url TEXT,
    source_platform TEXT NOT NULL,
    posted_date TEXT,
    scraped_date TEXT NOT NULL,
    dedup_sources TEXT NOT NULL DEFAULT '[]',
    dedup_source_urls TEXT NOT NULL DEFAULT '[]',
    dedup_count INTEGER NOT NULL DEFAULT 1 CHECK (dedup_count >= 1),
    status TEXT NOT NULL DEFAULT 'Active'
      CHECK (status IN ('Active', 'Removed', 'Expired', 'Checking')),
    status_last_checked TEXT,
    status_check_code INTEGER,
    status_check_error TEXT,
    created_at TEXT NOT NULL,
    last_updated TEXT NOT NULL,
    expires_at TEXT NOT NULL,
    CHECK (salary_min IS NULL OR salary_max IS NULL OR salary_min <= salary_max)
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_country_created ON jobs(country, created_at);
  CREATE INDEX IF NOT EXISTS idx_jobs_status_checked ON jobs(status, status_last_checked);
  CREATE INDEX IF NOT EXISTS idx_jobs_job_id ON jobs(job_id);
  CREATE INDEX IF NOT EXISTS idx_jobs_expires ON jobs(status, expires_at);

  -- 2. scrape_log (append-only, one row per query x country attempt)
  CREATE TABLE IF NOT EXISTS scrape_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    search_query TEXT NOT NULL,
    country TEXT NOT NULL,
    jobs_found INTEGER NOT NULL DEFAULT 0,
    jobs_new INTEGER NOT NULL DEFAULT 0,
    jobs_updated INTEGER NOT NULL DEFAULT 0,
    status TEXT NOT NULL CHECK (status IN ('success', 'failed')),
    error_message TEXT,
    duration_seconds REAL NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_scrape_log_created ON scrape_log(created_at);
`;
