/**
 * Filesystem Module Types
 *
 * Security policy and per-file skip reasons for the search engine.
 */

import { ALLOWED_DIRECTORIES, MAX_FILE_SIZE } from '../config.js';

// ============================================================================
// Security Configuration
// ============================================================================

export interface SecurityConfig {
  allowedDirectories: string[];  // Empty = all allowed
  maxFileSize: number;           // Larger files are skipped, not read
}

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  allowedDirectories: ALLOWED_DIRECTORIES,
  maxFileSize: MAX_FILE_SIZE,
};

// ============================================================================
// Per-file Skip Reasons
// ============================================================================

export type SkipCode =
  | 'FILE_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_A_FILE'
  | 'FILE_TOO_LARGE'
  | 'DECODE_ERROR'
  | 'READ_ERROR';

export interface SkipReason {
  code: SkipCode;
  message: string;
}

/** A candidate that contributed no records because it could not be read */
export interface SkippedFile extends SkipReason {
  file: string;
}
