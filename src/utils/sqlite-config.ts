/**
 * SQLite WAL Mode & Safe Configuration
 *
 * The request log may be opened by more than one server process at a time,
 * so every connection runs in WAL mode with a busy timeout.
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { existsSync, mkdirSync } from 'fs';
import { LOG_PREFIX } from '../config.js';

/** Default busy timeout in milliseconds */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/** SQLite configuration options */
export interface SqliteConfig {
  /** Path to database file, or ':memory:' */
  dbPath: string;
  /** Busy timeout in milliseconds (default: 5000) */
  busyTimeout?: number;
  /** Cache size in KB (default: 2000) */
  cacheSizeKb?: number;
  /** Enable WAL mode (default: true) */
  walMode?: boolean;
  /** Synchronous mode (default: 'NORMAL') */
  synchronous?: 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';
}

const DEFAULT_CONFIG: Omit<Required<SqliteConfig>, 'dbPath'> = {
  busyTimeout: DEFAULT_BUSY_TIMEOUT,
  cacheSizeKb: 2000,
  walMode: true,
  synchronous: 'NORMAL',
};

/**
 * Open a database with safe configuration, creating its directory first.
 *
 * @example
 * const db = initializeDatabase({ dbPath: DB_PATH });
 */
export function initializeDatabase(config: SqliteConfig): Database.Database {
  const opts = { ...DEFAULT_CONFIG, ...config };

  if (opts.dbPath !== ':memory:') {
    const dbDir = dirname(opts.dbPath);
    if (!existsSync(dbDir)) {
      mkdirSync(dbDir, { recursive: true });
    }
  }

  const db = new Database(opts.dbPath);
  applyPragmas(db, opts);
  return db;
}

function applyPragmas(db: Database.Database, opts: Omit<Required<SqliteConfig>, 'dbPath'>): void {
  if (opts.walMode) {
    // In-memory databases report 'memory'; WAL only applies to files
    const mode = db.pragma('journal_mode = WAL', { simple: true });
    if (mode !== 'wal' && mode !== 'memory') {
      console.error(`${LOG_PREFIX} Failed to enable WAL mode (journal_mode=${String(mode)})`);
    }
  }

  db.pragma(`busy_timeout = ${opts.busyTimeout}`);
  db.pragma(`cache_size = ${-opts.cacheSizeKb}`);
  db.pragma(`synchronous = ${opts.synchronous}`);
  db.pragma('temp_store = MEMORY');
}

/**
 * Close with a final WAL checkpoint. A failed checkpoint is logged and the
 * close still happens.
 */
export function closeDatabase(db: Database.Database): void {
  try {
    db.pragma('wal_checkpoint(TRUNCATE)');
  } catch (error) {
    console.error(`${LOG_PREFIX} WAL checkpoint failed on close:`, error);
  }
  db.close();
}
