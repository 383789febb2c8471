/**
 * Content Search Server Configuration
 *
 * Returns current server configuration and state.
 */

import * as fs from 'fs';
import {
  SERVER_VERSION,
  WORKER_COUNT,
  SEARCH_TIMEOUT_MS,
  DB_PATH,
  REQUEST_LOG_ENABLED,
  VERBOSE,
} from '../config.js';
import { getSecurityConfig } from '../filesystem/security.js';
import { getEffectiveTimeout } from './timeout.js';
import { TOOLS } from '../tool-definitions.js';

/**
 * Server configuration
 */
export interface ServerConfig {
  version: string;
  workers: number;
  timeoutMs: number;
  maxFileSizeBytes: number;
  allowedDirectories: string[];
  requestLog: {
    enabled: boolean;
    path: string;
    sizeBytes: number;
  };
  verbose: boolean;
  toolCount: number;
  environment: {
    nodeVersion: string;
    platform: string;
    arch: string;
  };
}

export interface ConfigOverrides {
  workers?: number;
  timeoutMs?: number;
  /** null when the request log is disabled */
  dbPath?: string | null;
}

/**
 * Get current server configuration. A running server passes its own values,
 * which may differ from the environment defaults.
 */
export function getConfig(overrides: ConfigOverrides = {}): ServerConfig {
  const security = getSecurityConfig();
  const dbPath = overrides.dbPath === undefined ? DB_PATH : overrides.dbPath;
  const logEnabled = overrides.dbPath === undefined ? REQUEST_LOG_ENABLED : overrides.dbPath !== null;

  let dbSizeBytes = 0;
  if (dbPath && dbPath !== ':memory:') {
    try {
      if (fs.existsSync(dbPath)) {
        dbSizeBytes = fs.statSync(dbPath).size;
      }
    } catch {
      // Size is informational; an unreadable file reports 0
    }
  }

  return {
    version: SERVER_VERSION,
    workers: overrides.workers ?? WORKER_COUNT,
    timeoutMs: getEffectiveTimeout(overrides.timeoutMs ?? SEARCH_TIMEOUT_MS),
    maxFileSizeBytes: security.maxFileSize,
    allowedDirectories: security.allowedDirectories,
    requestLog: {
      enabled: logEnabled,
      path: dbPath ?? DB_PATH,
      sizeBytes: dbSizeBytes,
    },
    verbose: VERBOSE,
    toolCount: TOOLS.length,
    environment: {
      nodeVersion: process.version,
      platform: process.platform,
      arch: process.arch,
    },
  };
}
