/**
 * Content Search Input Validation
 * Zod schemas for the request envelope and each action's data.
 *
 * Required search inputs (pattern, text, extension) are optional here: the
 * engine reports them as MISSING_PARAMETER with the field name, which keeps
 * "absent" distinct from "wrong type" (INVALID_PARAMETER).
 */
import { z } from 'zod';
import {
  DEFAULT_SEARCH_PATH,
  DEFAULT_FILE_PATTERN,
  DEFAULT_CONTEXT_LINES,
  MAX_CONTEXT_LINES,
  REQUEST_HISTORY_MAX_LIMIT,
} from './config.js';
import { SearchError } from './search/errors.js';

// ============================================================================
// Request Envelope
// ============================================================================

export const RequestEnvelopeSchema = z.object({
  action: z.string().optional(),
  data: z.record(z.unknown()).optional().default({}),
  // Non-string ids are dropped rather than rejected
  id: z.string().optional().catch(undefined),
});

export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;

// ============================================================================
// Action Data
// ============================================================================

const pathField = z.string().default(DEFAULT_SEARCH_PATH);
const recursiveField = z.boolean().default(true);
const ignoreCaseField = z.boolean().default(false);

export const SearchFilesSchema = z.object({
  path: pathField,
  pattern: z.string().optional(),
  recursive: recursiveField,
  ignore_case: ignoreCaseField,
});

export const SearchContentSchema = z.object({
  path: pathField,
  text: z.string().optional(),
  file_pattern: z.string().default(DEFAULT_FILE_PATTERN),
  context_lines: z.number().int().min(0).max(MAX_CONTEXT_LINES).default(DEFAULT_CONTEXT_LINES),
  recursive: recursiveField,
  ignore_case: ignoreCaseField,
});

export const FindPatternSchema = z.object({
  path: pathField,
  pattern: z.string().optional(),
  file_pattern: z.string().default(DEFAULT_FILE_PATTERN),
  recursive: recursiveField,
  ignore_case: ignoreCaseField,
});

export const SearchByExtensionSchema = z.object({
  path: pathField,
  extension: z.string().optional(),
  recursive: recursiveField,
});

export type SearchFilesParams = z.infer<typeof SearchFilesSchema>;
export type SearchContentParams = z.infer<typeof SearchContentSchema>;
export type FindPatternParams = z.infer<typeof FindPatternSchema>;
export type SearchByExtensionParams = z.infer<typeof SearchByExtensionSchema>;

// ============================================================================
// Request Log Queries
// ============================================================================

export const SearchHistorySchema = z.object({
  action: z.string().optional(),
  success: z.boolean().optional(),
  since: z.string().optional(),
  limit: z.number().int().min(1).max(REQUEST_HISTORY_MAX_LIMIT).default(50),
});

export type SearchHistoryParams = z.infer<typeof SearchHistorySchema>;

// ============================================================================
// Helpers
// ============================================================================

/** Render zod issues as one line: "context_lines: Number must be ..." */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Parse with a schema, reporting failures as INVALID_PARAMETER. */
export function parseParams<S extends z.ZodTypeAny>(schema: S, data: unknown): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new SearchError('INVALID_PARAMETER', formatZodError(result.error));
  }
  return result.data;
}
