/**
 * Filesystem Read Operations
 *
 * Reads one search candidate as text and classifies the ways that can fail.
 * Text is strict UTF-8: a file that does not decode is skipped, not searched
 * with replacement characters.
 */

import { getSecurityConfig, formatBytes } from './security.js';
import { nodeFileSystem, errnoCode, type SearchFileSystem } from './provider.js';
import type { SkipCode, SkipReason } from './types.js';

// ============================================================================
// Errors
// ============================================================================

/** A per-file failure that the search absorbs as a skip */
export class FileReadError extends Error {
  public readonly code: SkipCode;

  constructor(code: SkipCode, message: string) {
    super(message);
    this.name = 'FileReadError';
    this.code = code;
  }
}

const ERRNO_SKIP_CODES: Record<string, SkipCode> = {
  ENOENT: 'FILE_NOT_FOUND',
  EACCES: 'PERMISSION_DENIED',
  EPERM: 'PERMISSION_DENIED',
  EISDIR: 'NOT_A_FILE',
};

/**
 * Classify an error thrown while searching one file.
 * Returns null for anything that is not an I/O, decode or size failure;
 * those are treated as fatal by the worker pool.
 */
export function toSkipReason(error: unknown): SkipReason | null {
  if (error instanceof FileReadError) {
    return { code: error.code, message: error.message };
  }
  const code = errnoCode(error);
  if (code !== undefined && error instanceof Error) {
    return { code: ERRNO_SKIP_CODES[code] ?? 'READ_ERROR', message: error.message };
  }
  return null;
}

// ============================================================================
// read_text Implementation
// ============================================================================

export interface ReadTextOptions {
  fs?: SearchFileSystem;
  maxFileSize?: number;
}

// A leading BOM stays in the text as U+FEFF and counts toward offsets
const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/** Translate \r\n and lone \r to \n, as text-mode reads do. */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

/**
 * Read a file as UTF-8 text with newlines translated to \n.
 * Throws FileReadError (or the underlying errno error) when the file
 * cannot be searched.
 */
export async function readTextFile(filePath: string, options: ReadTextOptions = {}): Promise<string> {
  const fs = options.fs ?? nodeFileSystem;
  const maxFileSize = options.maxFileSize ?? getSecurityConfig().maxFileSize;

  const stats = await fs.stat(filePath);
  if (!stats.isFile()) {
    throw new FileReadError('NOT_A_FILE', `${filePath} is not a regular file`);
  }
  if (stats.size > maxFileSize) {
    throw new FileReadError(
      'FILE_TOO_LARGE',
      `File is ${formatBytes(stats.size)}, limit is ${formatBytes(maxFileSize)}`
    );
  }

  const buffer = await fs.readFile(filePath);

  let content: string;
  try {
    content = utf8.decode(buffer);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new FileReadError('DECODE_ERROR', `${filePath} is not valid UTF-8: ${reason}`);
  }

  return normalizeNewlines(content);
}

/**
 * Split text into lines, keeping each line's '\n'.
 * The last line has no terminator when the text does not end with one;
 * empty text has no lines.
 */
export function splitLines(text: string): string[] {
  const lines: string[] = [];
  let start = 0;
  while (start < text.length) {
    const newline = text.indexOf('\n', start);
    const end = newline === -1 ? text.length : newline + 1;
    lines.push(text.slice(start, end));
    start = end;
  }
  return lines;
}
