/**
 * Search Error Types
 *
 * Request-level failures carry a code so the dispatcher can report the kind
 * of error alongside the message. Per-file failures never use this class;
 * they are modelled as skip reasons (see filesystem/read.ts).
 */

export type SearchErrorCode =
  | 'MISSING_PARAMETER'
  | 'INVALID_PATTERN'
  | 'INVALID_PARAMETER'
  | 'INVALID_REQUEST'
  | 'PATH_NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_A_DIRECTORY'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

export class SearchError extends Error {
  public readonly code: SearchErrorCode;
  /** Request field the error refers to, when there is one */
  public readonly field?: string;

  constructor(code: SearchErrorCode, message: string, field?: string) {
    super(`${code}: ${message}`);
    this.name = 'SearchError';
    this.code = code;
    this.field = field;
  }
}

export function missingParameter(field: string, message: string): SearchError {
  return new SearchError('MISSING_PARAMETER', message, field);
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}
