/**
 * Content Search — Tool Definitions
 * Static MCP tool schema definitions: the four search actions plus the
 * request log and config tools. Pure data, no logic.
 */
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  DEFAULT_CONTEXT_LINES,
  DEFAULT_FILE_PATTERN,
  DEFAULT_SEARCH_PATH,
  MAX_CONTEXT_LINES,
  REQUEST_HISTORY_MAX_LIMIT,
} from './config.js';
import { SEARCH_ACTIONS } from './search/types.js';

const path = {
  type: 'string',
  description: 'Directory to search (relative paths resolve against the server working directory)',
  default: DEFAULT_SEARCH_PATH,
};
const recursive = { type: 'boolean', description: 'Descend into subdirectories', default: true };
const ignoreCase = { type: 'boolean', description: 'Case-insensitive matching', default: false };
const filePattern = {
  type: 'string',
  description: 'Glob on file names: * any run, ? one character. Matched from the start of the name.',
  default: DEFAULT_FILE_PATTERN,
};

export const SEARCH_TOOLS: Tool[] = [
  {
    name: 'search_files',
    description: 'Find files whose name matches a regular expression (searched anywhere in the name). Returns paths and the number of files scanned.',
    inputSchema: {
      type: 'object',
      properties: {
        path,
        pattern: { type: 'string', description: 'Regular expression tested against each file name' },
        recursive,
        ignore_case: ignoreCase,
      },
      required: ['pattern'],
    },
  },
  {
    name: 'search_content',
    description: 'Search file contents line by line. Each matching line is returned with its line number and surrounding context.',
    inputSchema: {
      type: 'object',
      properties: {
        path,
        text: { type: 'string', description: 'Regular expression tested against each line' },
        file_pattern: filePattern,
        context_lines: {
          type: 'integer',
          minimum: 0,
          maximum: MAX_CONTEXT_LINES,
          default: DEFAULT_CONTEXT_LINES,
          description: 'Lines of context before and after each match',
        },
        recursive,
        ignore_case: ignoreCase,
      },
      required: ['text'],
    },
  },
  {
    name: 'find_pattern',
    description: 'Find every match of a regular expression across whole files, with offsets and capture groups. Matches may span lines.',
    inputSchema: {
      type: 'object',
      properties: {
        path,
        pattern: { type: 'string', description: 'Regular expression applied to the whole file text' },
        file_pattern: filePattern,
        recursive,
        ignore_case: ignoreCase,
      },
      required: ['pattern'],
    },
  },
  {
    name: 'search_by_extension',
    description: 'List files with a given extension.',
    inputSchema: {
      type: 'object',
      properties: {
        path,
        extension: { type: 'string', description: "Extension with or without the dot ('py' or '.py')" },
        recursive,
      },
      required: ['extension'],
    },
  },
];

export const DISPATCH_TOOLS: Tool[] = [
  {
    name: 'search_request',
    description: 'Run any search action from a { action, data, id } request. The response echoes id.',
    inputSchema: {
      type: 'object',
      properties: {
        action: { type: 'string', enum: [...SEARCH_ACTIONS] },
        data: { type: 'object', description: "Arguments of the action's own tool" },
        id: { type: 'string', description: 'Caller-chosen id, returned unchanged' },
      },
      required: ['action'],
    },
  },
];

export const LOG_TOOLS: Tool[] = [
  {
    name: 'search_history',
    description: 'Recent search calls from the request log, newest first.',
    inputSchema: {
      type: 'object',
      properties: {
        action: { type: 'string', enum: [...SEARCH_ACTIONS], description: 'Only calls of this action' },
        success: { type: 'boolean', description: 'Only successful (true) or failed (false) calls' },
        since: { type: 'string', description: "Only calls at or after this UTC time ('YYYY-MM-DD HH:MM:SS')" },
        limit: { type: 'integer', minimum: 1, maximum: REQUEST_HISTORY_MAX_LIMIT, default: 50 },
      },
    },
  },
  {
    name: 'search_stats',
    description: 'Per-action call counts, success rates and durations from the request log.',
    inputSchema: { type: 'object', properties: {} },
  },
];

export const UTILITY_TOOLS: Tool[] = [
  {
    name: 'get_config',
    description: 'Get current server configuration including version, worker count, timeout and file size limit.',
    inputSchema: { type: 'object', properties: {} },
  },
];

export const TOOLS: Tool[] = [...SEARCH_TOOLS, ...DISPATCH_TOOLS, ...LOG_TOOLS, ...UTILITY_TOOLS];
