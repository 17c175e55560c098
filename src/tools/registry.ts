/**
 * Tool registry - the closed set of actions the navigation loop may take.
 *
 * Every tool is one variant of `ValidatedCall`. A raw ToolCall becomes a
 * variant only through `validateCall`, which runs the tool's zod schema;
 * `executeCall` then switches on the tag, so an unregistered tool can
 * never be dispatched.
 *
 * @module tools/registry
 */

import { createLogger } from '../utils/logger.js';
import { ToolExecutionError, formatError, isRetryable } from '../utils/errors.js';
import { retry } from '../utils/retry.js';
import { ReadLinesArgsSchema, READ_LINES_SPEC, readLines, type ReadLinesArgs } from './read-lines.js';
import { GetStructureArgsSchema, GET_STRUCTURE_SPEC, getStructure, type GetStructureArgs } from './get-structure.js';
import {
  SearchDocumentArgsSchema,
  SEARCH_DOCUMENT_SPEC,
  searchDocument,
  type SearchDocumentArgs,
} from './search-document.js';
import { ListFilesArgsSchema, LIST_FILES_SPEC, listFiles, type ListFilesArgs } from './list-files.js';
import type { ToolCall } from '../types/agent.js';
import type { ToolContext, ToolResult, ToolSpec } from './types.js';

const logger = createLogger('ToolRegistry');

export const TOOL_NAMES = ['read_lines', 'get_structure', 'search_document', 'list_files'] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const TOOL_SPECS: Readonly<Record<ToolName, ToolSpec>> = {
  read_lines: READ_LINES_SPEC,
  get_structure: GET_STRUCTURE_SPEC,
  search_document: SEARCH_DOCUMENT_SPEC,
  list_files: LIST_FILES_SPEC,
};

export type ValidatedCall =
  | { readonly tool: 'read_lines'; readonly args: ReadLinesArgs }
  | { readonly tool: 'get_structure'; readonly args: GetStructureArgs }
  | { readonly tool: 'search_document'; readonly args: SearchDocumentArgs }
  | { readonly tool: 'list_files'; readonly args: ListFilesArgs };

export type CallValidation =
  | { readonly ok: true; readonly call: ValidatedCall }
  | { readonly ok: false; readonly error: string };

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(tool => tool === name);
}

/**
 * Names of the arguments a tool cannot run without.
 */
export function requiredArguments(name: ToolName): string[] {
  return TOOL_SPECS[name].arguments.filter(a => a.required).map(a => a.name);
}

function describeIssues(issues: readonly { path: (string | number)[]; message: string }[]): string {
  return issues.map(i => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message)).join('; ');
}

/**
 * Check a parsed call against its tool's argument schema.
 */
export function validateCall(call: ToolCall): CallValidation {
  const fail = (issues: readonly { path: (string | number)[]; message: string }[]): CallValidation => ({
    ok: false,
    error: `Invalid arguments for ${call.name}: ${describeIssues(issues)}`,
  });

  switch (call.name) {
    case 'read_lines': {
      const parsed = ReadLinesArgsSchema.safeParse(call.arguments);
      return parsed.success ? { ok: true, call: { tool: 'read_lines', args: parsed.data } } : fail(parsed.error.issues);
    }
    case 'get_structure': {
      const parsed = GetStructureArgsSchema.safeParse(call.arguments);
      return parsed.success ? { ok: true, call: { tool: 'get_structure', args: parsed.data } } : fail(parsed.error.issues);
    }
    case 'search_document': {
      const parsed = SearchDocumentArgsSchema.safeParse(call.arguments);
      return parsed.success ? { ok: true, call: { tool: 'search_document', args: parsed.data } } : fail(parsed.error.issues);
    }
    case 'list_files': {
      const parsed = ListFilesArgsSchema.safeParse(call.arguments);
      return parsed.success ? { ok: true, call: { tool: 'list_files', args: parsed.data } } : fail(parsed.error.issues);
    }
    default:
      return { ok: false, error: `Unknown tool: ${call.name}` };
  }
}

/**
 * Execute a validated call.
 *
 * @throws ToolExecutionError from the tool
 */
export function executeCall(call: ValidatedCall, ctx: ToolContext): Promise<ToolResult> {
  switch (call.tool) {
    case 'read_lines':
      return readLines(call.args, ctx);
    case 'get_structure':
      return getStructure(call.args, ctx);
    case 'search_document':
      return searchDocument(call.args, ctx);
    case 'list_files':
      return listFiles(call.args, ctx);
  }
}

/**
 * Validate and execute one call, turning every failure into a result.
 *
 * A retryable ToolExecutionError gets one more attempt.
 */
export async function dispatch(call: ToolCall, ctx: ToolContext): Promise<ToolResult> {
  const validation = validateCall(call);
  if (!validation.ok) {
    return { ok: false, content: validation.error };
  }

  try {
    return await retry(() => executeCall(validation.call, ctx), {
      maxRetries: 1,
      initialDelayMs: 100,
      shouldRetry: error => error instanceof ToolExecutionError && isRetryable(error),
      onRetry: (attempt, error) => {
        logger.warn({ tool: call.name, attempt, err: formatError(error) }, 'Retrying tool');
      },
    });
  } catch (error) {
    logger.debug({ tool: call.name, err: formatError(error) }, 'Tool failed');
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, content: message };
  }
}

/**
 * Tool reference rendered into the system prompt.
 */
export function describeTools(): string {
  return TOOL_NAMES.map(name => {
    const spec = TOOL_SPECS[name];
    const args = spec.arguments.length === 0
      ? '  (no arguments)'
      : spec.arguments
        .map(a => `  - ${a.name}${a.required ? '' : ' (optional)'}: ${a.description}`)
        .join('\n');
    return `${name}: ${spec.description}\n${args}\n  Example: ${spec.example}`;
  }).join('\n\n');
}
