/**
 * Call parser - turns one model turn into tool calls.
 *
 * Model output is untrusted input. Every malformed case becomes a
 * Diagnostic value; parsing never throws and has no side effects.
 *
 * Recognized blocks:
 * - `<tool_name><arg>value</arg>...</tool_name>` for registered tools
 * - `<answer>...</answer>`, the completion marker
 * - `<thinking>` and `<reasoning>`, free text that is skipped
 * - `<tool_name/>` for tools that take no arguments
 *
 * Attributes on a tool or answer tag, and self-closing tags of tools that
 * need arguments, are reported rather than skipped.
 *
 * @module parser/call-parser
 */

import { MalformedToolCallError } from '../utils/errors.js';
import { isToolName, requiredArguments } from '../tools/registry.js';
import type { ToolCall } from '../types/agent.js';

export type DiagnosticKind = 'unknown_tool' | 'missing_argument' | 'malformed_block';

export interface Diagnostic {
  readonly kind: DiagnosticKind;
  /** Tag name of the offending block */
  readonly tool: string;
  readonly message: string;
  /** The offending text, shortened */
  readonly fragment: string;
}

export interface ParseResult {
  /** Executable calls in document order */
  readonly calls: ToolCall[];
  readonly diagnostics: Diagnostic[];
  /** Text of the first answer block, if any */
  readonly answer?: string;
}

const OPEN_TAG = /<([A-Za-z_][\w-]*)(\s[^<>]*?)?(\/)?>/g;
const ARGUMENT = /<([A-Za-z_][\w-]*)>([\s\S]*?)<\/\1>/g;
const FREE_TEXT_TAGS = new Set(['thinking', 'reasoning']);
const ANSWER_TAG = 'answer';
const MAX_FRAGMENT_CHARS = 200;

const ENTITIES: Record<string, string> = {
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
  '&amp;': '&',
};

function unescape(value: string): string {
  return value.replace(/&(?:lt|gt|quot|apos|amp);/g, entity => ENTITIES[entity] ?? entity);
}

function shorten(text: string): string {
  return text.length > MAX_FRAGMENT_CHARS ? `${text.slice(0, MAX_FRAGMENT_CHARS)}...` : text;
}

function parseArguments(body: string): Record<string, string> {
  const args: Record<string, string> = {};
  for (const match of body.matchAll(ARGUMENT)) {
    const [, name, value] = match;
    if (name !== undefined && value !== undefined) {
      args[name] = unescape(value.trim());
    }
  }
  return args;
}

/**
 * Parse one model turn.
 */
export function parseToolCalls(raw: string): ParseResult {
  const calls: ToolCall[] = [];
  const diagnostics: Diagnostic[] = [];
  let answer: string | undefined;

  const report = (kind: DiagnosticKind, tool: string, message: string, fragment: string): void => {
    diagnostics.push({ kind, tool, message, fragment: shorten(fragment) });
  };

  const selfClosing = (name: string, attributes: string, tag: string): void => {
    if (name === ANSWER_TAG) {
      report('malformed_block', name, `Empty <${name}/> block: write <${name}>...</${name}>`, tag);
      return;
    }
    if (!isToolName(name)) {
      return;
    }
    if (attributes !== '') {
      report('malformed_block', name, `<${name}> takes its arguments as child tags, not attributes`, tag);
      return;
    }
    const missing = requiredArguments(name);
    if (missing.length > 0) {
      report('missing_argument', name, `${name} is missing required argument(s): ${missing.join(', ')}`, tag);
      return;
    }
    calls.push({ name, arguments: {} });
  };

  OPEN_TAG.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = OPEN_TAG.exec(raw)) !== null) {
    const name = match[1] ?? '';
    const attributes = (match[2] ?? '').trim();
    const known = name === ANSWER_TAG || isToolName(name);

    if (match[3] === '/') {
      if (known) {
        selfClosing(name, attributes, match[0]);
      }
      continue;
    }

    const openEnd = match.index + match[0].length;
    const closeTag = `</${name}>`;
    const closeStart = raw.indexOf(closeTag, openEnd);
    const blockEnd = closeStart === -1 ? raw.length : closeStart + closeTag.length;

    if (FREE_TEXT_TAGS.has(name)) {
      OPEN_TAG.lastIndex = blockEnd;
      continue;
    }

    if (attributes !== '') {
      // `<a href="...">` in prose is not a call
      if (known) {
        report(
          'malformed_block',
          name,
          `<${name}> takes its arguments as child tags, not attributes`,
          raw.slice(match.index, blockEnd)
        );
        OPEN_TAG.lastIndex = blockEnd;
      }
      continue;
    }

    if (closeStart === -1) {
      // An unknown unclosed tag is ordinary prose
      if (known) {
        report('malformed_block', name, `Unterminated <${name}> block: missing ${closeTag}`, raw.slice(match.index));
      }
      continue;
    }

    const body = raw.slice(openEnd, closeStart);
    const block = raw.slice(match.index, blockEnd);
    OPEN_TAG.lastIndex = blockEnd;

    if (name === ANSWER_TAG) {
      answer ??= unescape(body.trim());
      continue;
    }

    if (body.includes(`<${name}>`)) {
      report('malformed_block', name, `Nested <${name}> inside <${name}> block`, block);
      continue;
    }

    if (!isToolName(name)) {
      // Only tag pairs shaped like a call count; `<b>text</b>` is prose
      if (body.trim() === '' || new RegExp(ARGUMENT.source).test(body)) {
        report('unknown_tool', name, `Unknown tool: ${name}`, block);
      } else {
        OPEN_TAG.lastIndex = openEnd;
      }
      continue;
    }

    const args = parseArguments(body);
    const missing = requiredArguments(name).filter(arg => !(arg in args));
    if (missing.length > 0) {
      report('missing_argument', name, `${name} is missing required argument(s): ${missing.join(', ')}`, block);
      continue;
    }

    calls.push({ name, arguments: args });
  }

  return answer === undefined ? { calls, diagnostics } : { calls, diagnostics, answer };
}

/**
 * Diagnostic as a typed error, for logging.
 */
export function toMalformedToolCallError(diagnostic: Diagnostic): MalformedToolCallError {
  return new MalformedToolCallError(diagnostic.message, diagnostic.kind, diagnostic.fragment);
}
