/**
 * Agents module - the SDK-backed service boundaries.
 *
 * Provides:
 * - BaseAgent: shared SDK plumbing (options, message parsing, abort)
 * - CompletionAgent: one-turn completions for the navigation loop
 * - ExtractionAgent: section-list extraction for the segmenter
 */

export { BaseAgent, BUILTIN_TOOLS, type BaseAgentConfig } from './base-agent.js';
export { CompletionAgent } from './completion-agent.js';
export { ExtractionAgent, buildExtractionPrompt } from './extraction-agent.js';
