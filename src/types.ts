/**
 * Content Search — Request Log Types
 * Row shapes returned by the request_log queries, and the shaped results
 * served by search_history and search_stats.
 */

// ============================================================================
// Row Types
// ============================================================================

/** SELECT * FROM request_log */
export interface RequestLogRow {
  id: string;
  action: string;
  request_id: string | null;
  arguments: string;       // JSON-encoded object
  output: string | null;
  success: number;         // SQLite INTEGER boolean (0 or 1)
  error: string | null;
  error_code: string | null;
  duration_ms: number | null;
  timestamp: string;
}

/** Per-action aggregate row */
export interface RequestStatsRow {
  action: string;
  total_calls: number;
  successful: number;
  failed: number;
  avg_duration_ms: number | null;
  max_duration_ms: number | null;
  first_call: string;
  last_call: string;
}

/** Aggregate over every action */
export interface RequestSummaryRow {
  total_calls: number;
  successful: number | null;  // SUM over no rows is NULL
  failed: number | null;
  avg_duration_ms: number | null;
}

// ============================================================================
// Shaped Results
// ============================================================================

export interface RequestLogEntry {
  action: string;
  requestId: string | null;
  args: unknown;
  output: unknown;
  success: boolean;
  error: string | null;
  errorCode: string | null;
  durationMs: number;
}

export interface RequestStatsResult {
  summary: {
    total_calls: number;
    successful: number;
    failed: number;
    success_rate: string;
    avg_duration_ms: number;
  };
  by_action: Array<{
    action: string;
    calls: number;
    successful: number;
    failed: number;
    success_rate: string;
    avg_ms: number;
    max_ms: number;
    first_call: string;
    last_call: string;
  }>;
}

export interface RequestHistoryEntry {
  id: string;
  action: string;
  request_id: string | null;
  args: Record<string, unknown>;
  output_preview: string | null;
  success: boolean;
  error: string | null;
  error_code: string | null;
  duration_ms: number | null;
  timestamp: string;
}
