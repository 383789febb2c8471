/**
 * Search Engine
 *
 * The four search actions. Each one validates its required input, compiles
 * its patterns, checks the root against the security policy, then walks the
 * tree. Content and pattern searches fan the per-file work out on a worker
 * pool created for the call; name and extension searches only walk.
 */

import * as path from 'path';
import { WORKER_COUNT } from '../config.js';
import { isWithinDirectories, resolveAllowedDirectories, resolveRealPath } from '../filesystem/security.js';
import { nodeFileSystem, type SearchFileSystem } from '../filesystem/provider.js';
import { walkFiles } from '../filesystem/walk.js';
import { readTextFile } from '../filesystem/read.js';
import type {
  SearchFilesParams,
  SearchContentParams,
  FindPatternParams,
  SearchByExtensionParams,
} from '../validation.js';
import { SearchError, missingParameter } from './errors.js';
import {
  compileGlobFilter,
  compileNamePattern,
  compileContentPattern,
  normalizeExtension,
  type Predicate,
} from './patterns.js';
import { WorkerPool } from './worker-pool.js';
import { matchLines, matchAll } from './file-search.js';
import type {
  FileListResult,
  ContentSearchResult,
  PatternSearchResult,
  MatchListResult,
} from './types.js';

export interface SearchEngineOptions {
  /** Concurrent per-file tasks (default: CONTENT_SEARCH_WORKERS or 4) */
  concurrency?: number;
  fs?: SearchFileSystem;
  /** Overrides the security config's file size limit */
  maxFileSize?: number;
}

export class SearchEngine {
  private readonly concurrency: number;
  private readonly fs: SearchFileSystem;
  private readonly maxFileSize: number | undefined;

  constructor(options: SearchEngineOptions = {}) {
    this.concurrency = options.concurrency ?? WORKER_COUNT;
    this.fs = options.fs ?? nodeFileSystem;
    this.maxFileSize = options.maxFileSize;
  }

  // ==========================================================================
  // search_files
  // ==========================================================================

  /** File names matching a regex anywhere in the name. */
  async searchFiles(params: SearchFilesParams, signal?: AbortSignal): Promise<FileListResult> {
    if (!params.pattern) {
      throw missingParameter('pattern', 'No search pattern specified');
    }
    const matchesName = compileNamePattern(params.pattern, { ignoreCase: params.ignore_case });

    return this.filterNames(params.path, params.recursive, matchesName, signal);
  }

  // ==========================================================================
  // search_content
  // ==========================================================================

  /** Lines matching `text`, with context, in files whose name matches `file_pattern`. */
  async searchContent(params: SearchContentParams, signal?: AbortSignal): Promise<ContentSearchResult> {
    if (!params.text) {
      throw missingParameter('text', 'No search text specified');
    }
    const includeFile = compileGlobFilter(params.file_pattern);
    const regex = compileContentPattern(params.text, { ignoreCase: params.ignore_case, field: 'text' });

    return this.scanFiles(params.path, params.recursive, includeFile, signal, async (file) => {
      const text = await readTextFile(file, { fs: this.fs, maxFileSize: this.maxFileSize });
      return matchLines(file, text, regex, params.context_lines);
    });
  }

  // ==========================================================================
  // find_pattern
  // ==========================================================================

  /** Every non-overlapping match of `pattern` over whole files. */
  async findPattern(params: FindPatternParams, signal?: AbortSignal): Promise<PatternSearchResult> {
    if (!params.pattern) {
      throw missingParameter('pattern', 'No regex pattern specified');
    }
    const regex = compileContentPattern(params.pattern, { ignoreCase: params.ignore_case, global: true });
    const includeFile = compileGlobFilter(params.file_pattern);

    return this.scanFiles(params.path, params.recursive, includeFile, signal, async (file) => {
      const text = await readTextFile(file, { fs: this.fs, maxFileSize: this.maxFileSize });
      // matchAll iterates a clone, so tasks can share the compiled regex
      return matchAll(file, text, regex);
    });
  }

  // ==========================================================================
  // search_by_extension
  // ==========================================================================

  /** File names ending in `extension` ('py' and '.py' are the same). */
  async searchByExtension(params: SearchByExtensionParams, signal?: AbortSignal): Promise<FileListResult> {
    if (!params.extension) {
      throw missingParameter('extension', 'No file extension specified');
    }
    const suffix = normalizeExtension(params.extension);

    return this.filterNames(params.path, params.recursive, (name) => name.endsWith(suffix), signal);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Resolve the allowed directories and check the root by where it really
   * points. Returns the resolved directories for the walker's symlink checks.
   */
  private async checkRoot(root: string): Promise<string[] | null> {
    const realpath = (p: string) => this.fs.realpath(p);
    const allowed = await resolveAllowedDirectories(realpath);
    if (allowed && !isWithinDirectories(await resolveRealPath(root, realpath), allowed)) {
      throw new SearchError('PERMISSION_DENIED', `Path is outside allowed directories: ${root}`, 'path');
    }
    return allowed;
  }

  private async *candidates(
    root: string,
    recursive: boolean,
    includeName: Predicate<string>,
    signal: AbortSignal | undefined,
    allowedDirectories: readonly string[] | null,
  ): AsyncGenerator<string> {
    for await (const file of walkFiles(root, { recursive, fs: this.fs, signal, allowedDirectories })) {
      if (includeName(path.basename(file))) yield file;
    }
  }

  private async filterNames(
    root: string,
    recursive: boolean,
    includeName: Predicate<string>,
    signal: AbortSignal | undefined,
  ): Promise<FileListResult> {
    const allowedDirectories = await this.checkRoot(root);

    const matches: string[] = [];
    let filesScanned = 0;
    for await (const file of walkFiles(root, { recursive, fs: this.fs, signal, allowedDirectories })) {
      filesScanned++;
      if (includeName(path.basename(file))) matches.push(file);
    }

    return { matches, files_scanned: filesScanned };
  }

  private async scanFiles<T>(
    root: string,
    recursive: boolean,
    includeName: Predicate<string>,
    signal: AbortSignal | undefined,
    task: (file: string) => Promise<T[]>,
  ): Promise<MatchListResult<T>> {
    const allowedDirectories = await this.checkRoot(root);

    const pool = new WorkerPool(this.concurrency);
    const { records, skipped, filesScanned } = await pool.runAll(
      this.candidates(root, recursive, includeName, signal, allowedDirectories),
      task,
      { signal },
    );

    return { matches: records, files_scanned: filesScanned, skipped };
  }
}
