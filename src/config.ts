/**
 * Content Search Configuration & Constants
 * Limits, defaults and environment overrides, read once at startup.
 */
import { join, delimiter } from 'path';
import { homedir } from 'os';

// ============================================================================
// Server
// ============================================================================
export const SERVER_NAME = 'content-search';
export const SERVER_VERSION = '0.1.0';
export const LOG_PREFIX = `[${SERVER_NAME}]`;

// ============================================================================
// Helpers
// ============================================================================

/** Parse a positive integer env value, falling back when absent or malformed. */
export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/** Split a PATH-style list (":" on POSIX, ";" on Windows), dropping blanks. */
export function parsePathList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw.split(delimiter).map(p => p.trim()).filter(p => p.length > 0);
}

export function safeParse<T>(json: string | null | undefined, defaultValue: T): T {
  if (!json) return defaultValue;
  try {
    return JSON.parse(json) as T;
  } catch (err) {
    console.error(`${LOG_PREFIX} JSON parse error:`, err);
    return defaultValue;
  }
}

// ============================================================================
// Worker Pool
// ============================================================================
export const DEFAULT_WORKER_COUNT = 4;
export const MAX_WORKER_COUNT = 64;
export const WORKER_COUNT = Math.min(
  parsePositiveInt(process.env.CONTENT_SEARCH_WORKERS, DEFAULT_WORKER_COUNT),
  MAX_WORKER_COUNT,
);

// ============================================================================
// Search Defaults
// ============================================================================
export const DEFAULT_SEARCH_PATH = '.';
export const DEFAULT_FILE_PATTERN = '*';
export const DEFAULT_CONTEXT_LINES = 2;
export const MAX_CONTEXT_LINES = 100;

// ============================================================================
// Limits
// ============================================================================
export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
export const MAX_FILE_SIZE = parsePositiveInt(process.env.CONTENT_SEARCH_MAX_FILE_SIZE, DEFAULT_MAX_FILE_SIZE);
export const ALLOWED_DIRECTORIES = parsePathList(process.env.CONTENT_SEARCH_ALLOWED_DIRS);

// ============================================================================
// Timeouts
// ============================================================================
export const DEFAULT_TIMEOUT_MS = 30000;
export const SEARCH_TIMEOUT_MS = parsePositiveInt(process.env.CONTENT_SEARCH_TIMEOUT_MS, DEFAULT_TIMEOUT_MS);

// ============================================================================
// Request Log
// ============================================================================
export const DATA_DIR = join(homedir(), '.content-search');
export const DB_PATH = process.env.CONTENT_SEARCH_DB || join(DATA_DIR, 'requests.db');
export const REQUEST_LOG_ENABLED = process.env.CONTENT_SEARCH_REQUEST_LOG !== 'false';
export const REQUEST_LOG_MAX_OUTPUT = 2048;
export const REQUEST_HISTORY_MAX_LIMIT = 200;

// ============================================================================
// Logging
// ============================================================================
export const VERBOSE = process.env.CONTENT_SEARCH_VERBOSE === 'true';
