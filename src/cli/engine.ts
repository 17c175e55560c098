/**
 * Engine - wires the configured services into a Navigator.
 *
 * This is the only place that reads Config; every component below it
 * receives its settings through its constructor.
 */

import { Config } from '../config/index.js';
import { CompletionAgent, ExtractionAgent } from '../agents/index.js';
import { SegmentationCache } from '../segmentation/cache.js';
import { DocumentSegmenter } from '../segmentation/segmenter.js';
import { SearchOrchestrator } from '../search/orchestrator.js';
import { Navigator, type ForestSource } from '../agent/navigator.js';
import { AnswerEvaluator, type AnswerGrader } from '../agent/evaluation.js';
import { createLogger } from '../utils/logger.js';
import type { QuestionAnswerer } from '../agent/batch.js';

const logger = createLogger('Engine');

/**
 * What the CLI commands need.
 */
export interface Engine {
  navigator: QuestionAnswerer;
  segmenter: ForestSource;
  /** Questions answered in parallel by `batch` */
  concurrency: number;
  /** Judge used by `batch --evaluate` */
  evaluator: AnswerGrader;
}

/**
 * Build the production engine from the loaded configuration.
 *
 * @throws Error if the agent configuration is incomplete
 */
export async function createEngine(): Promise<Engine> {
  const agent = Config.getAgentConfig();
  const segmentation = Config.getSegmentationConfig();
  const search = Config.getSearchConfig();
  const shell = Config.getShellToolConfig();
  const evaluation = Config.getEvaluationConfig();
  const workspaceDir = Config.getWorkspaceDir();

  const credentials = {
    apiKey: agent.apiKey,
    model: agent.model,
    apiBaseUrl: agent.apiBaseUrl,
    cwd: workspaceDir,
  };

  const cache = await SegmentationCache.open(segmentation.cachePath);
  const segmenter = new DocumentSegmenter(new ExtractionAgent(credentials), cache, {
    maxChars: segmentation.maxChars,
    timeoutMs: segmentation.timeoutMs,
    maxRetries: segmentation.maxRetries,
  });

  const navigator = new Navigator(
    {
      completion: new CompletionAgent(credentials),
      segmenter,
      search: new SearchOrchestrator({ maxCandidates: search.maxCandidates, snippetChars: search.snippetChars }),
    },
    {
      maxIterations: agent.maxIterations,
      timeoutMs: agent.timeoutMs,
      maxRetries: agent.maxRetries,
      maxEvidence: search.maxEvidence,
      snippetChars: search.snippetChars,
      shell: { ...shell, cwd: workspaceDir },
    }
  );

  const evaluator = new AnswerEvaluator(new CompletionAgent({ ...credentials, model: evaluation.model }), {
    timeoutMs: evaluation.timeoutMs,
    maxRetries: evaluation.maxRetries,
  });

  logger.info({
    model: agent.model,
    judgeModel: evaluation.model,
    cachePath: segmentation.cachePath,
    cachedDocuments: cache.size,
    workspaceDir,
  }, 'Engine ready');

  return { navigator, segmenter, concurrency: Config.getBatchConcurrency(), evaluator };
}
