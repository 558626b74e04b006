import Database from 'better-sqlite3';
import { join } from 'path';
import { PersistenceError } from '../../../domain/errors';

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    const dbPath = process.env.DATABASE_PATH || join(process.cwd(), 'data', 'reviews.db');
    db = createDatabase(dbPath);
  }
  return db;
}

function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS repositories (
      id TEXT PRIMARY KEY,
      github_repo_id INTEGER NOT NULL UNIQUE,
      owner TEXT NOT NULL,
      name TEXT NOT NULL,
      language TEXT,
      webhook_id INTEGER,
      webhook_secret TEXT,
      auto_analyze INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS pull_requests (
      id TEXT PRIMARY KEY,
      repository_id TEXT NOT NULL,
      number INTEGER NOT NULL,
      title TEXT NOT NULL,
      author TEXT NOT NULL,
      base_branch TEXT NOT NULL,
      head_branch TEXT NOT NULL,
      state TEXT NOT NULL DEFAULT 'open',
      html_url TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (repository_id) REFERENCES repositories(id) ON DELETE CASCADE,
      UNIQUE(repository_id, number)
    );

    CREATE TABLE IF NOT EXISTS review_jobs (
      id TEXT PRIMARY KEY,
      pull_request_id TEXT NOT NULL,
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'processing', 'completed', 'failed')),
      progress_percent INTEGER NOT NULL DEFAULT 0
        CHECK (progress_percent BETWEEN 0 AND 100),
      progress_message TEXT,
      files_analyzed INTEGER,
      error_message TEXT,
      started_at TEXT,
      completed_at TEXT,
      duration_ms INTEGER,
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      FOREIGN KEY (pull_request_id) REFERENCES pull_requests(id) ON DELETE CASCADE,
      CHECK ((status IN ('completed', 'failed')) = (completed_at IS NOT NULL))
    );

    CREATE TABLE IF NOT EXISTS suggestions (
      id TEXT PRIMARY KEY,
      job_id TEXT NOT NULL,
      file_path TEXT NOT NULL,
      line_number INTEGER NOT NULL,
      line_end INTEGER,
      category TEXT NOT NULL,
      severity TEXT NOT NULL CHECK (severity IN ('critical', 'moderate', 'minor')),
      message TEXT NOT NULL,
      explanation TEXT NOT NULL,
      suggested_fix TEXT,
      confidence_score REAL NOT NULL CHECK (confidence_score BETWEEN 0 AND 100),
      status TEXT NOT NULL DEFAULT 'pending'
        CHECK (status IN ('pending', 'accepted', 'rejected', 'ignored')),
      user_feedback TEXT,
      responded_at TEXT,
      metadata TEXT NOT NULL DEFAULT '{}',
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      FOREIGN KEY (job_id) REFERENCES review_jobs(id) ON DELETE CASCADE,
      CHECK ((status = 'pending') = (responded_at IS NULL))
    );

    CREATE INDEX IF NOT EXISTS idx_pull_requests_repository ON pull_requests(repository_id);
    CREATE INDEX IF NOT EXISTS idx_review_jobs_pull_request ON review_jobs(pull_request_id, created_at);
    CREATE INDEX IF NOT EXISTS idx_review_jobs_status ON review_jobs(status);
    CREATE INDEX IF NOT EXISTS idx_suggestions_job ON suggestions(job_id);
    CREATE INDEX IF NOT EXISTS idx_suggestions_status ON suggestions(status);
  `);
}

function openDatabase(dbPath: string): Database.Database {
  const database = new Database(dbPath);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  initializeSchema(database);
  return database;
}

/**
 * Create a new database connection at the specified path
 */
export function createDatabase(dbPath: string): Database.Database {
  return openDatabase(dbPath);
}

// For testing purposes
export function createTestDatabase(): Database.Database {
  return openDatabase(':memory:');
}

/**
 * Runs a statement and rethrows driver failures as PersistenceError
 */
export function withPersistence<T>(operation: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      throw new PersistenceError(`${operation} failed: ${error.message}`, { cause: error });
    }
    throw error;
  }
}
