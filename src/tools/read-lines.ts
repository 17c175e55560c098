/**
 * read_lines: return a 1-based inclusive line range of the document.
 */

import { z } from 'zod';
import { sliceLines } from '../document/document.js';
import { ToolExecutionError } from '../utils/errors.js';
import type { ToolContext, ToolResult, ToolSpec } from './types.js';

export const ReadLinesArgsSchema = z.object({
  start: z.coerce.number().int().min(1),
  end: z.coerce.number().int().min(1),
});

export type ReadLinesArgs = z.infer<typeof ReadLinesArgsSchema>;

export const READ_LINES_SPEC: ToolSpec = {
  description: 'Read a range of lines (1-based, inclusive). The end is clamped to the document length.',
  arguments: [
    { name: 'start', required: true, description: 'first line to read' },
    { name: 'end', required: true, description: 'last line to read' },
  ],
  example: '<read_lines><start>120</start><end>140</end></read_lines>',
};

/**
 * @throws ToolExecutionError when start > end or start lies past the last line
 */
export async function readLines(args: ReadLinesArgs, ctx: ToolContext): Promise<ToolResult> {
  const total = ctx.document.lines.length;

  if (args.start > args.end) {
    throw new ToolExecutionError(`Invalid range: start ${args.start} > end ${args.end}`, 'read_lines');
  }
  if (args.start > total) {
    throw new ToolExecutionError(
      `Invalid range: start ${args.start} is past the end of the document (${total} lines)`,
      'read_lines'
    );
  }

  const end = Math.min(args.end, total, args.start + ctx.maxReadLines - 1);
  const rows = sliceLines(ctx.document, args.start, end).map(
    (line, i) => `${String(args.start + i).padStart(6)} | ${line}`
  );
  rows.push(`[Read lines ${args.start}-${end} of ${total} total]`);

  return { ok: true, content: rows.join('\n'), range: [args.start, end] };
}
