/**
 * get_structure: the section outline of the document.
 */

import { z } from 'zod';
import { renderOutline } from '../document/forest.js';
import type { ToolContext, ToolResult, ToolSpec } from './types.js';

export const GetStructureArgsSchema = z.object({});

export type GetStructureArgs = z.infer<typeof GetStructureArgsSchema>;

export const GET_STRUCTURE_SPEC: ToolSpec = {
  description: 'Show the table of contents with the line range of every section.',
  arguments: [],
  example: '<get_structure></get_structure>',
};

// Never fails: the forest is the single-section fallback when segmentation did
export async function getStructure(_args: GetStructureArgs, ctx: ToolContext): Promise<ToolResult> {
  return { ok: true, content: renderOutline(ctx.forest) };
}
