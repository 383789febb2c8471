/**
 * Content Search — Schema
 * Request log tables and migrations. Functions take the db as a parameter.
 */
import Database from 'better-sqlite3';
import { LOG_PREFIX } from './config.js';

// ============================================================================
// Migrations
// ============================================================================

export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      description TEXT NOT NULL,
      applied_at TEXT DEFAULT (datetime('now'))
    );
  `);

  const hasRun = (version: number): boolean =>
    db.prepare('SELECT version FROM schema_migrations WHERE version = ?').get(version) !== undefined;
  const mark = (version: number, description: string): void => {
    db.prepare('INSERT OR IGNORE INTO schema_migrations (version, description) VALUES (?, ?)').run(version, description);
  };

  // Migration 1: composite index for per-action history queries
  if (!hasRun(1)) {
    db.exec('CREATE INDEX IF NOT EXISTS idx_request_log_action_time ON request_log(action, timestamp DESC)');
    mark(1, 'Add idx_request_log_action_time');
    console.error(`${LOG_PREFIX} Migration 1: added request_log(action, timestamp) index`);
  }
}

// ============================================================================
// Core Tables
// ============================================================================

export function createRequestLogTables(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS request_log (
      id TEXT PRIMARY KEY,
      action TEXT NOT NULL,
      request_id TEXT,
      arguments TEXT,
      output TEXT,
      success INTEGER DEFAULT 1,
      error TEXT,
      error_code TEXT,
      duration_ms INTEGER,
      timestamp TEXT DEFAULT (datetime('now'))
    );
    CREATE INDEX IF NOT EXISTS idx_request_log_timestamp ON request_log(timestamp DESC);
    CREATE INDEX IF NOT EXISTS idx_request_log_action ON request_log(action);
    CREATE INDEX IF NOT EXISTS idx_request_log_success ON request_log(success);
  `);
}

/** Create tables, then apply pending migrations. Safe to call on every start. */
export function initRequestLogSchema(db: Database.Database): void {
  createRequestLogTables(db);
  runMigrations(db);
}
