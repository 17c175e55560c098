/**
 * Configuration type definitions for tocnav.
 *
 * The shapes are declared once as zod schemas so that the YAML file, which
 * arrives as untyped data, is validated and typed in one step.
 */

import { z } from 'zod';

/**
 * Workspace configuration section.
 */
export const WorkspaceConfigSchema = z.object({
  /** Working directory for relative document paths and shell tools */
  dir: z.string().optional(),
});

/**
 * Completion agent configuration section.
 */
export const AgentConfigSchema = z.object({
  /** API key (falls back to ANTHROPIC_API_KEY) */
  apiKey: z.string().optional(),
  /** Model identifier */
  model: z.string().optional(),
  /** Custom API base URL */
  apiBaseUrl: z.string().optional(),
  /** Iteration cap for the navigation loop */
  maxIterations: z.number().int().positive().optional(),
  /** Per-call timeout in milliseconds */
  timeoutMs: z.number().int().positive().optional(),
  /** Retries after the first attempt */
  maxRetries: z.number().int().min(0).optional(),
});

/**
 * Segmentation configuration section.
 */
export const SegmentationConfigSchema = z.object({
  /** Path of the persisted cache file */
  cachePath: z.string().optional(),
  /** Character budget of the document text sent for extraction */
  maxChars: z.number().int().positive().optional(),
  /** Per-call timeout in milliseconds */
  timeoutMs: z.number().int().positive().optional(),
  /** Retries after the first attempt */
  maxRetries: z.number().int().min(0).optional(),
});

/**
 * Search configuration section.
 */
export const SearchConfigSchema = z.object({
  /** Number of candidate sections read by the primary pass */
  maxCandidates: z.number().int().positive().optional(),
  /** Maximum characters of an evidence snippet */
  snippetChars: z.number().int().positive().optional(),
  /** Maximum evidence items carried into an answer */
  maxEvidence: z.number().int().positive().optional(),
});

/**
 * Constrained command tool configuration.
 */
export const ShellToolConfigSchema = z.object({
  /** Commands that may be executed */
  allowlist: z.array(z.string()).optional(),
  /** Timeout in milliseconds */
  timeoutMs: z.number().int().positive().optional(),
  /** Output truncation limit */
  maxOutputChars: z.number().int().positive().optional(),
});

export const ToolsConfigSchema = z.object({
  shell: ShellToolConfigSchema.optional(),
});

/**
 * Batch runner configuration section.
 */
export const BatchConfigSchema = z.object({
  /** Questions answered in parallel */
  concurrency: z.number().int().positive().optional(),
});

/**
 * Answer grading configuration section, used by `batch --evaluate`.
 */
export const EvaluationConfigSchema = z.object({
  /** Judge model identifier (defaults to agent.model) */
  model: z.string().optional(),
  /** Per-call timeout in milliseconds */
  timeoutMs: z.number().int().positive().optional(),
  /** Retries after the first attempt */
  maxRetries: z.number().int().min(0).optional(),
});

/**
 * Logging configuration section.
 */
export const LoggingConfigSchema = z.object({
  /** Log level (trace, debug, info, warn, error, fatal, silent) */
  level: z.string().optional(),
  /** Log file path */
  file: z.string().optional(),
  /** Enable pretty printing in console */
  pretty: z.boolean().optional(),
});

/**
 * Root configuration schema.
 */
export const TocnavConfigSchema = z.object({
  workspace: WorkspaceConfigSchema.optional(),
  agent: AgentConfigSchema.optional(),
  segmentation: SegmentationConfigSchema.optional(),
  search: SearchConfigSchema.optional(),
  tools: ToolsConfigSchema.optional(),
  batch: BatchConfigSchema.optional(),
  evaluation: EvaluationConfigSchema.optional(),
  logging: LoggingConfigSchema.optional(),
});

export type WorkspaceConfig = z.infer<typeof WorkspaceConfigSchema>;
export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type SegmentationConfig = z.infer<typeof SegmentationConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type ShellToolConfig = z.infer<typeof ShellToolConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type TocnavConfig = z.infer<typeof TocnavConfigSchema>;

/**
 * Configuration with file metadata attached.
 */
export interface LoadedConfig extends TocnavConfig {
  /** Path of the file the configuration came from */
  _source?: string;
  /** Whether a file was found and parsed */
  _fromFile: boolean;
}

/**
 * Result of searching for a configuration file.
 */
export interface ConfigFileInfo {
  path: string;
  exists: boolean;
}

export interface ConfigValidationError {
  field: string;
  message: string;
}
