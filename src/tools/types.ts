/**
 * Shared types of the tool capability set.
 *
 * @module tools/types
 */

import type { Document, SectionForest } from '../types/document.js';

/**
 * Settings of the constrained command tool.
 */
export interface ShellToolSettings {
  allowlist: readonly string[];
  timeoutMs: number;
  maxOutputChars: number;
  /** Directory commands run in */
  cwd: string;
}

/**
 * Everything a tool may touch while executing one call.
 */
export interface ToolContext {
  readonly document: Document;
  readonly forest: SectionForest;
  readonly shell: ShellToolSettings;
  /** Lines returned by one read_lines call */
  readonly maxReadLines: number;
}

export interface ToolResult {
  /** False when the call failed; the content then explains why */
  ok: boolean;
  content: string;
  /** Range actually read, set by read_lines */
  range?: [number, number];
}

/**
 * Argument as shown to the model.
 */
export interface ToolArgumentSpec {
  name: string;
  required: boolean;
  description: string;
}

export interface ToolSpec {
  description: string;
  arguments: readonly ToolArgumentSpec[];
  /** Example block rendered into the system prompt */
  example: string;
}
