/**
 * Content Search — Request Dispatch
 * Routes `{ action, data, id }` requests to the search operations and wraps
 * every outcome in the `{ success, data, error }` response shape.
 *
 * The operations arrive through the SearchDispatch interface, so this module
 * never touches the filesystem itself. Nothing thrown below this point
 * crosses it: every failure becomes an error response.
 */

import { LOG_PREFIX } from './config.js';
import { SearchError, isSearchError, type SearchErrorCode } from './search/errors.js';
import { isSearchAction, type SearchAction } from './search/types.js';
import type {
  FileListResult,
  ContentSearchResult,
  PatternSearchResult,
} from './search/types.js';
import { TimeoutError } from './utils/timeout.js';
import {
  RequestEnvelopeSchema,
  SearchFilesSchema,
  SearchContentSchema,
  FindPatternSchema,
  SearchByExtensionSchema,
  formatZodError,
  parseParams,
  type SearchFilesParams,
  type SearchContentParams,
  type FindPatternParams,
  type SearchByExtensionParams,
} from './validation.js';

// ============================================================================
// SearchDispatch Interface
// ============================================================================

/** One method per search action. SearchEngine implements it. */
export interface SearchDispatch {
  searchFiles(params: SearchFilesParams, signal?: AbortSignal): Promise<FileListResult>;
  searchContent(params: SearchContentParams, signal?: AbortSignal): Promise<ContentSearchResult>;
  findPattern(params: FindPatternParams, signal?: AbortSignal): Promise<PatternSearchResult>;
  searchByExtension(params: SearchByExtensionParams, signal?: AbortSignal): Promise<FileListResult>;
}

// ============================================================================
// Responses
// ============================================================================

export type ResponseErrorCode = SearchErrorCode | 'CANCELLED';

export interface SearchResponse {
  success: boolean;
  data: unknown;
  error: string | null;
  error_code: ResponseErrorCode | null;
  id: string | null;
}

export function successResponse(data: unknown, id: string | null = null): SearchResponse {
  return { success: true, data, error: null, error_code: null, id };
}

function isAbortError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'name' in error && error.name === 'AbortError';
}

export function errorResponse(error: unknown, id: string | null = null): SearchResponse {
  let code: ResponseErrorCode;
  let message: string;

  if (isSearchError(error)) {
    code = error.code;
    message = error.message;
  } else if (error instanceof TimeoutError) {
    code = 'TIMEOUT';
    message = `TIMEOUT: ${error.message}`;
  } else if (isAbortError(error)) {
    code = 'CANCELLED';
    message = 'CANCELLED: Search was cancelled';
  } else {
    code = 'INTERNAL_ERROR';
    message = `INTERNAL_ERROR: ${error instanceof Error ? error.message : String(error)}`;
    console.error(`${LOG_PREFIX} Unexpected search failure:`, error);
  }

  return { success: false, data: null, error: message, error_code: code, id };
}

// ============================================================================
// Action Table
// ============================================================================

type ActionHandler = (
  data: Record<string, unknown>,
  d: SearchDispatch,
  signal: AbortSignal | undefined,
) => Promise<unknown>;

const ACTION_HANDLERS: Record<SearchAction, ActionHandler> = {
  search_files: (data, d, signal) => d.searchFiles(parseParams(SearchFilesSchema, data), signal),
  search_content: (data, d, signal) => d.searchContent(parseParams(SearchContentSchema, data), signal),
  find_pattern: (data, d, signal) => d.findPattern(parseParams(FindPatternSchema, data), signal),
  search_by_extension: (data, d, signal) => d.searchByExtension(parseParams(SearchByExtensionSchema, data), signal),
};

// ============================================================================
// Dispatch Function
// ============================================================================

/**
 * Validate a request envelope and run its action.
 * Always resolves; failures come back as `{ success: false }`.
 */
export async function dispatchSearchRequest(
  request: unknown,
  d: SearchDispatch,
  signal?: AbortSignal,
): Promise<SearchResponse> {
  let id: string | null = null;

  try {
    const envelope = RequestEnvelopeSchema.safeParse(request);
    if (!envelope.success) {
      throw new SearchError('INVALID_REQUEST', formatZodError(envelope.error));
    }
    id = envelope.data.id ?? null;

    const { action, data } = envelope.data;
    if (!action) {
      throw new SearchError('INVALID_REQUEST', 'No action specified', 'action');
    }
    if (!isSearchAction(action)) {
      throw new SearchError('INVALID_REQUEST', `Unsupported action: ${action}`, 'action');
    }

    const result = await ACTION_HANDLERS[action](data, d, signal);
    return successResponse(result, id);
  } catch (error) {
    return errorResponse(error, id);
  }
}
