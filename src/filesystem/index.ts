/**
 * Filesystem Module Exports
 * Tree walking, text reads and the search root policy
 */

export * from './types.js';
export { nodeFileSystem, errnoCode, type SearchFileSystem } from './provider.js';
export {
  updateSecurityConfig,
  getSecurityConfig,
  normalizePath,
  isWithinDirectories,
  resolveRealPath,
  resolveAllowedDirectories,
  formatBytes,
  type RealPathResolver,
} from './security.js';
export { walkFiles, type WalkOptions } from './walk.js';
export {
  FileReadError,
  toSkipReason,
  normalizeNewlines,
  readTextFile,
  splitLines,
  type ReadTextOptions,
} from './read.js';
