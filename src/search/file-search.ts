/**
 * Per-file Matching
 *
 * Each function works on one file's decoded text and returns that file's
 * records in file order. Reading (and the failures that come with it) stays
 * in filesystem/read.ts.
 */

import { splitLines } from '../filesystem/read.js';
import type { ContentMatch, PatternMatch } from './types.js';

function withoutTerminator(line: string): string {
  return line.endsWith('\n') ? line.slice(0, -1) : line;
}

/**
 * Line-by-line search. Every line whose text matches yields a record whose
 * context is `contextLines` lines either side, clamped to the file.
 *
 * @param regex - must not be global; `test` is called once per line
 */
export function matchLines(
  file: string,
  text: string,
  regex: RegExp,
  contextLines: number
): ContentMatch[] {
  const lines = splitLines(text);
  const matches: ContentMatch[] = [];

  lines.forEach((line, i) => {
    if (!regex.test(withoutTerminator(line))) return;

    const start = Math.max(0, i - contextLines);
    const end = Math.min(lines.length, i + contextLines + 1);
    matches.push({
      file,
      line_number: i + 1,
      content: line.trim(),
      context: lines.slice(start, end).join('').trim(),
    });
  });

  return matches;
}

/**
 * Whole-file search. Every non-overlapping match yields a record with its
 * offsets, the matched text and its capture groups.
 *
 * @param regex - must be global
 */
export function matchAll(file: string, text: string, regex: RegExp): PatternMatch[] {
  const matches: PatternMatch[] = [];

  for (const m of text.matchAll(regex)) {
    const start = m.index ?? 0;
    matches.push({
      file,
      start,
      end: start + m[0].length,
      match: m[0],
      groups: m.slice(1).map(group => group ?? null),
    });
  }

  return matches;
}
