/**
 * search_document: case-insensitive literal search with surrounding context.
 */

import { z } from 'zod';
import { SEARCH_TOOL } from '../config/constants.js';
import { sectionAt } from '../document/forest.js';
import type { ToolContext, ToolResult, ToolSpec } from './types.js';

export const SearchDocumentArgsSchema = z.object({
  pattern: z.string().trim().min(1),
  context: z.coerce.number().int().min(0).max(SEARCH_TOOL.MAX_CONTEXT).default(SEARCH_TOOL.DEFAULT_CONTEXT),
});

export type SearchDocumentArgs = z.infer<typeof SearchDocumentArgsSchema>;

export const SEARCH_DOCUMENT_SPEC: ToolSpec = {
  description:
    'Find lines containing a phrase (case-insensitive, literal). ' +
    `Shows each match with surrounding lines and its section. context defaults to ${SEARCH_TOOL.DEFAULT_CONTEXT}.`,
  arguments: [
    { name: 'pattern', required: true, description: 'text to look for' },
    { name: 'context', required: false, description: `lines of context around each match (0-${SEARCH_TOOL.MAX_CONTEXT})` },
  ],
  example: '<search_document><pattern>terminate</pattern><context>2</context></search_document>',
};

export async function searchDocument(args: SearchDocumentArgs, ctx: ToolContext): Promise<ToolResult> {
  const needle = args.pattern.toLowerCase();
  const { lines } = ctx.document;

  const matches: number[] = [];
  lines.forEach((line, i) => {
    if (line.toLowerCase().includes(needle)) {
      matches.push(i + 1);
    }
  });

  if (matches.length === 0) {
    return { ok: true, content: `No matches for "${args.pattern}"` };
  }

  const blocks = matches.slice(0, SEARCH_TOOL.MAX_MATCHES).map(lineNo => {
    const section = sectionAt(ctx.forest, lineNo);
    const where = section ? ` (section: ${section.title} [lines ${section.startLine}-${section.endLine}])` : '';
    const from = Math.max(1, lineNo - args.context);
    const to = Math.min(lines.length, lineNo + args.context);

    const rows: string[] = [`Match at line ${lineNo}${where}:`];
    for (let n = from; n <= to; n++) {
      rows.push(`${n === lineNo ? '>' : ' '}${String(n).padStart(6)} | ${lines[n - 1]}`);
    }
    return rows.join('\n');
  });

  const header = `Found ${matches.length} match${matches.length === 1 ? '' : 'es'} for "${args.pattern}"`;
  const footer = matches.length > SEARCH_TOOL.MAX_MATCHES
    ? [`[Showing first ${SEARCH_TOOL.MAX_MATCHES} of ${matches.length} matches]`]
    : [];

  return { ok: true, content: [header, ...blocks, ...footer].join('\n\n') };
}
