/**
 * Pattern Compilation
 *
 * Glob filters for file names and user-supplied regular expressions.
 * Compile failures surface as INVALID_PATTERN before any filesystem access,
 * so a malformed pattern is never confused with a pattern that matches nothing.
 */

import { SearchError } from './errors.js';

export type Predicate<T> = (value: T) => boolean;

export interface CompileOptions {
  ignoreCase?: boolean;
}

// Metacharacters escaped before wildcard substitution. `*` and `?` are left
// alone here; they become `.*` and `.` afterwards.
const GLOB_ESCAPE = /[.+^${}()|[\]\\]/g;

/**
 * Translate a shell glob into regex source.
 *
 * @example
 * globToRegex('*.py')      // '.*\\.py'
 * globToRegex('test?.txt') // 'test.\\.txt'
 */
export function globToRegex(glob: string): string {
  return glob
    .replace(GLOB_ESCAPE, '\\$&')
    .replace(/\*/g, '.*')
    .replace(/\?/g, '.');
}

function compile(source: string, flags: string, original: string, field: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SearchError('INVALID_PATTERN', `Failed to compile pattern "${original}": ${reason}`, field);
  }
}

/**
 * Compile a glob into a basename filter.
 *
 * The match is anchored at the start of the name only: '*.py' accepts
 * 'main.py' and also 'main.py.bak'.
 */
export function compileGlobFilter(glob: string): Predicate<string> {
  const regex = compile(`^(?:${globToRegex(glob)})`, '', glob, 'file_pattern');
  return (name) => regex.test(name);
}

/** Compile a regex that is searched for anywhere in a file name. */
export function compileNamePattern(pattern: string, options: CompileOptions = {}): Predicate<string> {
  const regex = compile(pattern, options.ignoreCase ? 'i' : '', pattern, 'pattern');
  return (name) => regex.test(name);
}

/**
 * Compile a content regex. `global` is required for whole-file iteration
 * with matchAll; line tests use a non-global regex so `test` keeps no state.
 */
export function compileContentPattern(
  pattern: string,
  options: CompileOptions & { global?: boolean; field?: string } = {}
): RegExp {
  const flags = (options.global ? 'g' : '') + (options.ignoreCase ? 'i' : '');
  return compile(pattern, flags, pattern, options.field ?? 'pattern');
}

/** Normalize an extension filter to start with a dot ('py' → '.py'). */
export function normalizeExtension(extension: string): string {
  return extension.startsWith('.') ? extension : `.${extension}`;
}
