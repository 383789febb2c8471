/**
 * Search Module Exports
 * Concurrent name, line and whole-file regex search over a directory tree
 */

export * from './types.js';
export * from './errors.js';
export {
  globToRegex,
  compileGlobFilter,
  compileNamePattern,
  compileContentPattern,
  normalizeExtension,
  type Predicate,
  type CompileOptions,
} from './patterns.js';
export { WorkerPool, type FileTask, type RunOptions, type PoolRunResult } from './worker-pool.js';
export { matchLines, matchAll } from './file-search.js';
export { SearchEngine, type SearchEngineOptions } from './engine.js';
