#!/usr/bin/env node
/**
 * Content Search MCP Server
 *
 * Concurrent file-name, line and whole-file regex search over a directory
 * tree, served on stdio. Tools:
 * - Search: search_files, search_content, find_pattern, search_by_extension
 * - Dispatch: search_request ({ action, data, id } envelope)
 * - Request log: search_history, search_stats
 * - Utility: get_config
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type Database from 'better-sqlite3';
import { DB_PATH, LOG_PREFIX, REQUEST_LOG_ENABLED, WORKER_COUNT } from './config.js';
import { initRequestLogSchema } from './schema.js';
import { createSearchServer } from './server.js';
import { TOOLS } from './tool-definitions.js';
import { pruneRequestLog } from './tool-logging.js';
import { initializeDatabase, closeDatabase } from './utils/sqlite-config.js';
import { getTimeoutConfig } from './utils/timeout.js';

const REQUEST_LOG_RETENTION_DAYS = 7;

function openRequestLog(): Database.Database | null {
  if (!REQUEST_LOG_ENABLED) {
    console.error(`${LOG_PREFIX} Request log disabled`);
    return null;
  }
  try {
    const db = initializeDatabase({ dbPath: DB_PATH });
    initRequestLogSchema(db);
    const pruned = pruneRequestLog(db, REQUEST_LOG_RETENTION_DAYS);
    if (pruned > 0) {
      console.error(`${LOG_PREFIX} Pruned ${pruned} request log entries older than ${REQUEST_LOG_RETENTION_DAYS} days`);
    }
    return db;
  } catch (err) {
    // Searching does not depend on the log
    console.error(`${LOG_PREFIX} Warning: request log unavailable (${DB_PATH}):`, err);
    return null;
  }
}

async function main(): Promise<void> {
  console.error(`${LOG_PREFIX} Opening request log...`);
  const db = openRequestLog();

  const { timeoutMs } = getTimeoutConfig();
  const server = createSearchServer({ db, timeoutMs, workers: WORKER_COUNT });

  console.error(`${LOG_PREFIX} Starting MCP server (${TOOLS.length} tools, ${WORKER_COUNT} workers, ${timeoutMs}ms timeout)...`);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`${LOG_PREFIX} Server running on stdio`);

  const shutdown = async (): Promise<void> => {
    console.error(`${LOG_PREFIX} Shutting down...`);
    await server.close();
    if (db) closeDatabase(db);
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown().catch((error: unknown) => {
      console.error(`${LOG_PREFIX} Shutdown failed:`, error);
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => {
      console.error(`${LOG_PREFIX} Shutdown failed:`, error);
      process.exit(1);
    });
  });
}

main().catch((error) => {
  console.error(`${LOG_PREFIX} Fatal error:`, error);
  process.exit(1);
});
