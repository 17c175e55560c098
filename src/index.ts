/**
 * Library entry point for tocnav.
 *
 * `createEngine` builds a configured Navigator from tocnav.config.yaml;
 * the classes below can also be wired by hand with custom clients.
 */

export * from './agent/index.js';
export * from './agents/index.js';
export { createEngine, type Engine } from './cli/engine.js';
export { loadDocument, createDocument } from './document/document.js';
export { buildForest, fallbackForest, renderOutline } from './document/forest.js';
export { SegmentationCache } from './segmentation/cache.js';
export { DocumentSegmenter, type ExtractionClient, type SegmenterOptions } from './segmentation/segmenter.js';
export { SearchOrchestrator, finalVerdict, type SearchOptions } from './search/orchestrator.js';
export { TOOL_NAMES, describeTools, dispatch, type ToolName } from './tools/registry.js';
export type { ShellToolSettings, ToolContext, ToolResult } from './tools/types.js';
export { parseToolCalls, type Diagnostic, type ParseResult } from './parser/call-parser.js';
export {
  DocumentReadError,
  ExternalServiceError,
  MalformedToolCallError,
  TimeoutError,
  ToolExecutionError,
  ValidationError,
} from './utils/errors.js';
export { initLogger, createLogger, type LoggerConfig } from './utils/logger.js';
export type * from './types/document.js';
export type * from './types/agent.js';
