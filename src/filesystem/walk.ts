/**
 * Tree Walker
 *
 * Lazy sequence of candidate file paths under a search root. Each call walks
 * from scratch; nothing is cached between calls.
 */

import * as path from 'path';
import type { Dirent } from 'fs';
import { LOG_PREFIX } from '../config.js';
import { SearchError } from '../search/errors.js';
import { nodeFileSystem, errnoCode, type SearchFileSystem } from './provider.js';
import { isWithinDirectories, resolveAllowedDirectories } from './security.js';

export interface WalkOptions {
  /** Descend into subdirectories (default: true) */
  recursive?: boolean;
  fs?: SearchFileSystem;
  /** Checked before each directory is listed */
  signal?: AbortSignal;
  /**
   * Resolved allowed directories (see resolveAllowedDirectories); a symlink
   * whose target lies outside them is dropped. null allows every target.
   * Defaults to the active policy.
   */
  allowedDirectories?: readonly string[] | null;
}

interface WalkContext {
  recursive: boolean;
  fs: SearchFileSystem;
  signal: AbortSignal | undefined;
  allowedDirectories: readonly string[] | null;
}

type EntryKind = 'file' | 'directory' | 'linked-directory' | 'other';

/**
 * Map a failure on the search root itself to a request-level error.
 * Anything that is not a recognised errno failure is returned unchanged.
 */
function rootError(root: string, error: unknown): unknown {
  switch (errnoCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return new SearchError('PATH_NOT_FOUND', `Path does not exist: ${root}`, 'path');
    case 'EACCES':
    case 'EPERM':
      return new SearchError('PERMISSION_DENIED', `Permission denied: ${root}`, 'path');
    default:
      return error;
  }
}

/**
 * Classify a directory entry. Symlinks are followed for classification only:
 * a link to a file is a file, a link to a directory is never descended, and
 * a dangling link or one pointing outside the allowed directories is dropped.
 */
async function classify(entry: Dirent, fullPath: string, context: WalkContext): Promise<EntryKind> {
  if (entry.isFile()) return 'file';
  if (entry.isDirectory()) return 'directory';
  if (!entry.isSymbolicLink()) return 'other';

  const { fs, allowedDirectories } = context;
  try {
    if (allowedDirectories) {
      const resolved = await fs.realpath(fullPath);
      if (!isWithinDirectories(resolved, allowedDirectories)) return 'other';
    }
    const target = await fs.stat(fullPath);
    if (target.isFile()) return 'file';
    if (target.isDirectory()) return 'linked-directory';
    return 'other';
  } catch (error) {
    if (errnoCode(error) === undefined) throw error;
    return 'other';
  }
}

async function* walkEntries(dir: string, entries: Dirent[], context: WalkContext): AsyncGenerator<string> {
  const { recursive, fs, signal } = context;
  const subdirs: string[] = [];

  // Top-down: a directory's files come before anything below it
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    const kind = await classify(entry, fullPath, context);
    if (kind === 'file') {
      yield fullPath;
    } else if (kind === 'directory') {
      subdirs.push(fullPath);
    }
  }

  if (!recursive) return;

  for (const subdir of subdirs) {
    signal?.throwIfAborted();
    let children: Dirent[];
    try {
      children = await fs.readdir(subdir);
    } catch (error) {
      const code = errnoCode(error);
      if (code === undefined) throw error;
      console.error(`${LOG_PREFIX} Skipping unreadable directory ${subdir}: ${code}`);
      continue;
    }
    yield* walkEntries(subdir, children, context);
  }
}

/**
 * Walk the regular files under `root`.
 *
 * The root is checked on the first step: a missing root throws PATH_NOT_FOUND,
 * an unreadable one PERMISSION_DENIED, a file NOT_A_DIRECTORY. Failures below
 * the root only drop the affected subtree.
 */
export async function* walkFiles(root: string, options: WalkOptions = {}): AsyncGenerator<string> {
  const { recursive = true, fs = nodeFileSystem, signal } = options;

  signal?.throwIfAborted();
  const stats = await fs.stat(root).catch((error: unknown) => {
    throw rootError(root, error);
  });
  if (!stats.isDirectory()) {
    throw new SearchError('NOT_A_DIRECTORY', `Not a directory: ${root}`, 'path');
  }

  const entries = await fs.readdir(root).catch((error: unknown) => {
    throw rootError(root, error);
  });

  const allowedDirectories = options.allowedDirectories !== undefined
    ? options.allowedDirectories
    : await resolveAllowedDirectories((p) => fs.realpath(p));

  yield* walkEntries(root, entries, { recursive, fs, signal, allowedDirectories });
}
