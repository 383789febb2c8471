/**
 * Search Root Policy
 *
 * Which directories a search may read from, and how large a file it will
 * read. With allowed directories configured, a search root and every symlink
 * the walker meets are checked by their resolved location, so a link cannot
 * lead a search outside the allowed trees.
 */

import * as path from 'path';
import { SecurityConfig, DEFAULT_SECURITY_CONFIG } from './types.js';
import { errnoCode } from './provider.js';

let securityConfig: SecurityConfig = { ...DEFAULT_SECURITY_CONFIG };

/** Merge `config` into the active policy. */
export function updateSecurityConfig(config: Partial<SecurityConfig>): void {
  securityConfig = { ...securityConfig, ...config };
}

/** A copy of the active policy. */
export function getSecurityConfig(): SecurityConfig {
  return { ...securityConfig, allowedDirectories: [...securityConfig.allowedDirectories] };
}

/**
 * Absolute form of `inputPath`: backslashes become '/', a leading '~' is the
 * home directory, '.' and '..' segments are collapsed. Symlinks are not
 * resolved.
 */
export function normalizePath(inputPath: string): string {
  let normalized = inputPath.replace(/\\/g, '/');

  if (normalized === '~' || normalized.startsWith('~/')) {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    normalized = path.join(home, normalized.slice(1));
  }

  return path.normalize(path.resolve(normalized));
}

/**
 * True when `target` is one of `directories` or lies below one of them.
 * Whole segments only: /data/a does not admit /data/ab.
 */
export function isWithinDirectories(target: string, directories: readonly string[]): boolean {
  const normalizedTarget = normalizePath(target);
  return directories.some(dir => {
    const normalizedDir = normalizePath(dir);
    if (normalizedTarget === normalizedDir) return true;
    const prefix = normalizedDir.endsWith(path.sep) ? normalizedDir : normalizedDir + path.sep;
    return normalizedTarget.startsWith(prefix);
  });
}

export type RealPathResolver = (inputPath: string) => Promise<string>;

/**
 * `inputPath` with symlinks resolved. A path that does not exist (or cannot
 * be resolved for another errno reason) keeps its normalized name.
 */
export async function resolveRealPath(inputPath: string, realpath: RealPathResolver): Promise<string> {
  const normalized = normalizePath(inputPath);
  try {
    return await realpath(normalized);
  } catch (error) {
    if (errnoCode(error) === undefined) throw error;
    return normalized;
  }
}

/**
 * The allowed directories with symlinks resolved, or null when the policy
 * allows every path.
 */
export async function resolveAllowedDirectories(realpath: RealPathResolver): Promise<string[] | null> {
  const { allowedDirectories } = securityConfig;
  if (allowedDirectories.length === 0) return null;
  return Promise.all(allowedDirectories.map(dir => resolveRealPath(dir, realpath)));
}

/**
 * Format bytes as a short human-readable size.
 *
 * @example
 * formatBytes(1536) // '1.5 KB'
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}
