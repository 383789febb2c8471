/**
 * Content Search — Request Logging
 * Request log writes, stats and history queries.
 * Pure functions with db parameter injection.
 */
import Database from 'better-sqlite3';
import { randomUUID } from 'crypto';
import { LOG_PREFIX, REQUEST_LOG_MAX_OUTPUT, REQUEST_HISTORY_MAX_LIMIT, safeParse } from './config.js';
import type {
  RequestLogEntry,
  RequestLogRow,
  RequestStatsRow,
  RequestSummaryRow,
  RequestStatsResult,
  RequestHistoryEntry,
} from './types.js';
import type { SearchHistoryParams } from './validation.js';

// ============================================================================
// Helpers
// ============================================================================

export function truncateForLog(str: string, maxLen: number = REQUEST_LOG_MAX_OUTPUT): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen) + `... [truncated, ${str.length - maxLen} chars omitted]`;
}

function percent(part: number, whole: number): string {
  return ((part / whole) * 100).toFixed(1) + '%';
}

// ============================================================================
// Log a request
// ============================================================================

/**
 * Record one dispatched call. Failures to write are logged and swallowed:
 * the log never changes the outcome of a search.
 * @returns the log row id
 */
export function logRequest(db: Database.Database, entry: RequestLogEntry): string {
  const id = randomUUID();
  try {
    db.prepare(`
      INSERT INTO request_log (id, action, request_id, arguments, output, success, error, error_code, duration_ms)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      entry.action,
      entry.requestId,
      JSON.stringify(entry.args ?? {}),
      truncateForLog(JSON.stringify(entry.output) ?? 'null'),
      entry.success ? 1 : 0,
      entry.error,
      entry.errorCode,
      Math.round(entry.durationMs)
    );
  } catch (e) {
    console.error(`${LOG_PREFIX} Failed to log request:`, e);
  }
  return id;
}

/** Delete entries older than `daysToKeep` days. Returns the number removed. */
export function pruneRequestLog(db: Database.Database, daysToKeep: number = 7): number {
  const result = db
    .prepare(`DELETE FROM request_log WHERE timestamp < datetime('now', ?)`)
    .run(`-${daysToKeep} days`);
  return result.changes;
}

// ============================================================================
// Stats
// ============================================================================

export function getRequestStats(db: Database.Database): RequestStatsResult {
  const stats = db.prepare<[], RequestStatsRow>(`
    SELECT
      action,
      COUNT(*) as total_calls,
      SUM(CASE WHEN success = 1 THEN 1 ELSE 0 END) as successful,
      SUM(CASE WHEN success = 0 THEN 1 ELSE 0 END) as failed,
      AVG(duration_ms) as avg_duration_ms,
      MAX(duration_ms) as max_duration_ms,
      MIN(timestamp) as first_call,
      MAX(timestamp) as last_call
    FROM request_log
    GROUP BY action
    ORDER BY total_calls DESC, action ASC
  `).all();

  const summary = db.prepare<[], RequestSummaryRow>(`
    SELECT
      COUNT(*) as total_calls,
      SUM(CASE WHEN success = 1 THEN 1 ELSE 0 END) as successful,
      SUM(CASE WHEN success = 0 THEN 1 ELSE 0 END) as failed,
      AVG(duration_ms) as avg_duration_ms
    FROM request_log
  `).get();

  const total = summary?.total_calls ?? 0;
  const successful = summary?.successful ?? 0;

  return {
    summary: {
      total_calls: total,
      successful,
      failed: summary?.failed ?? 0,
      success_rate: total > 0 ? percent(successful, total) : 'N/A',
      avg_duration_ms: Math.round(summary?.avg_duration_ms ?? 0),
    },
    by_action: stats.map(s => ({
      action: s.action,
      calls: s.total_calls,
      successful: s.successful,
      failed: s.failed,
      success_rate: percent(s.successful, s.total_calls),
      avg_ms: Math.round(s.avg_duration_ms ?? 0),
      max_ms: s.max_duration_ms ?? 0,
      first_call: s.first_call,
      last_call: s.last_call,
    })),
  };
}

// ============================================================================
// History
// ============================================================================

export function getRequestHistory(
  db: Database.Database,
  params: Partial<SearchHistoryParams> = {}
): RequestHistoryEntry[] {
  const { action, success, since, limit = 50 } = params;
  let query = 'SELECT * FROM request_log WHERE 1=1';
  const args: (string | number)[] = [];

  if (action) {
    query += ' AND action = ?';
    args.push(action);
  }
  if (typeof success === 'boolean') {
    query += ' AND success = ?';
    args.push(success ? 1 : 0);
  }
  if (since) {
    query += ' AND timestamp >= ?';
    args.push(since);
  }

  // rowid breaks ties between calls logged within the same second
  query += ' ORDER BY timestamp DESC, rowid DESC LIMIT ?';
  args.push(Math.min(limit, REQUEST_HISTORY_MAX_LIMIT));

  const rows = db.prepare<(string | number)[], RequestLogRow>(query).all(...args);

  return rows.map(r => ({
    id: r.id,
    action: r.action,
    request_id: r.request_id,
    args: safeParse<Record<string, unknown>>(r.arguments, {}),
    output_preview: r.output ? (r.output.length > 200 ? r.output.slice(0, 200) + '...' : r.output) : null,
    success: r.success === 1,
    error: r.error,
    error_code: r.error_code,
    duration_ms: r.duration_ms,
    timestamp: r.timestamp,
  }));
}
