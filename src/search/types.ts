/**
 * Search Module Types
 * Match records and results for the four search actions.
 */

import type { SkippedFile } from '../filesystem/types.js';

export const SEARCH_ACTIONS = [
  'search_files',
  'search_content',
  'find_pattern',
  'search_by_extension',
] as const;

export type SearchAction = typeof SEARCH_ACTIONS[number];

export function isSearchAction(value: string): value is SearchAction {
  return (SEARCH_ACTIONS as readonly string[]).includes(value);
}

/** One matching line, with the lines around it */
export interface ContentMatch {
  file: string;
  line_number: number;   // 1-based
  content: string;       // trimmed matching line
  context: string;       // trimmed window of context_lines before and after
}

/** One whole-file regex match. Offsets are UTF-16 code units into the decoded text. */
export interface PatternMatch {
  file: string;
  start: number;
  end: number;
  match: string;
  groups: Array<string | null>;  // null = group did not participate
}

/** search_files and search_by_extension */
export interface FileListResult {
  matches: string[];
  files_scanned: number;
}

/** search_content and find_pattern */
export interface MatchListResult<T> {
  /** In completion order across files, ascending within a file */
  matches: T[];
  files_scanned: number;
  skipped: SkippedFile[];
}

export type ContentSearchResult = MatchListResult<ContentMatch>;
export type PatternSearchResult = MatchListResult<PatternMatch>;
