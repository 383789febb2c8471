/**
 * Content Search MCP Server
 *
 * Builds the MCP server: tool listing, and tool calls routed to the search
 * dispatcher (wrapped in the search timeout), the request log queries and
 * get_config. Transport and process lifecycle live in index.ts.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import type Database from 'better-sqlite3';
import { SERVER_NAME, SERVER_VERSION, SEARCH_TIMEOUT_MS, WORKER_COUNT } from './config.js';
import { SearchEngine } from './search/engine.js';
import { SearchError } from './search/errors.js';
import { isSearchAction } from './search/types.js';
import { dispatchSearchRequest, type SearchDispatch, type SearchResponse } from './tool-handlers.js';
import { TOOLS } from './tool-definitions.js';
import { logRequest, getRequestHistory, getRequestStats } from './tool-logging.js';
import { getConfig } from './utils/config.js';
import { withTimeout } from './utils/timeout.js';
import { SearchHistorySchema, parseParams } from './validation.js';

export interface SearchServerOptions {
  /** Defaults to a SearchEngine with the configured worker count */
  engine?: SearchDispatch;
  /** Request log; null disables logging and the history/stats tools */
  db?: Database.Database | null;
  /** Per-search timeout (default: CONTENT_SEARCH_TIMEOUT_MS) */
  timeoutMs?: number;
  /** Reported by get_config */
  workers?: number;
}

interface ToolOutcome {
  text: string;
  isError: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function jsonOutcome(value: unknown): ToolOutcome {
  return { text: JSON.stringify(value, null, 2), isError: false };
}

function responseOutcome(response: SearchResponse): ToolOutcome {
  return { text: JSON.stringify(response, null, 2), isError: !response.success };
}

export function createSearchServer(options: SearchServerOptions = {}): Server {
  const workers = options.workers ?? WORKER_COUNT;
  const engine = options.engine ?? new SearchEngine({ concurrency: workers });
  const db = options.db ?? null;
  const timeoutMs = options.timeoutMs ?? SEARCH_TIMEOUT_MS;

  const requireLog = (): Database.Database => {
    if (!db) {
      throw new SearchError('INVALID_REQUEST', 'Request log is disabled (CONTENT_SEARCH_REQUEST_LOG=false)');
    }
    return db;
  };

  async function runSearch(tool: string, request: unknown, signal: AbortSignal): Promise<SearchResponse> {
    const started = Date.now();
    const response = await withTimeout(
      (searchSignal) => dispatchSearchRequest(request, engine, searchSignal),
      timeoutMs,
      tool,
      signal,
    );

    if (db) {
      const action = isRecord(request) && typeof request.action === 'string' ? request.action : tool;
      logRequest(db, {
        action,
        requestId: response.id,
        args: isRecord(request) ? request.data : undefined,
        output: response.data,
        success: response.success,
        error: response.error,
        errorCode: response.error_code,
        durationMs: Date.now() - started,
      });
    }
    return response;
  }

  async function handleToolCall(
    name: string,
    args: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<ToolOutcome> {
    if (isSearchAction(name)) {
      return responseOutcome(await runSearch(name, { action: name, data: args }, signal));
    }

    switch (name) {
      case 'search_request':
        return responseOutcome(await runSearch(name, args, signal));
      case 'search_history':
        return jsonOutcome(getRequestHistory(requireLog(), parseParams(SearchHistorySchema, args)));
      case 'search_stats':
        return jsonOutcome(getRequestStats(requireLog()));
      case 'get_config':
        return jsonOutcome(getConfig({ workers, timeoutMs, dbPath: db ? db.name : null }));
      default:
        throw new SearchError('INVALID_REQUEST', `Unknown tool: ${name}`);
    }
  }

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOLS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    try {
      const outcome = await handleToolCall(name, args ?? {}, extra.signal);
      return {
        content: [{ type: 'text', text: outcome.text }],
        isError: outcome.isError,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      return {
        content: [{ type: 'text', text: `Error: ${message}` }],
        isError: true,
      };
    }
  });

  return server;
}
