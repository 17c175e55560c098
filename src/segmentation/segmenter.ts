/**
 * Document segmentation through the structured-extraction boundary.
 *
 * The extraction service is asked for a section list only on a cache
 * miss. Its answer is validated before it is cached; any failure yields
 * the single-section fallback, which is returned but not cached so a
 * later run can try the service again.
 *
 * @module segmentation/segmenter
 */

import { createLogger } from '../utils/logger.js';
import { ExternalServiceError, ValidationError, formatError } from '../utils/errors.js';
import { retry, withTimeout } from '../utils/retry.js';
import { SEGMENTATION } from '../config/constants.js';
import { numberLines } from '../document/document.js';
import { buildForest, fallbackForest } from '../document/forest.js';
import type { SegmentationCache, ComputedForest } from './cache.js';
import type { Document, SectionForest } from '../types/document.js';

const logger = createLogger('Segmenter');

/**
 * Target schema sent along with every extraction request.
 */
export const SECTION_SCHEMA = {
  type: 'array',
  items: {
    type: 'object',
    required: ['title', 'start_line', 'end_line', 'level'],
    properties: {
      title: { type: 'string', description: 'Section heading exactly as written' },
      start_line: { type: 'integer', description: 'First line of the section (1-based)' },
      end_line: { type: 'integer', description: 'Last line of the section, inclusive' },
      level: { type: 'integer', description: '1 for top-level sections, 2 for their subsections, ...' },
    },
  },
} as const;

export interface ExtractionRequest {
  /** Document text with "N: " line prefixes */
  numberedText: string;
  /** Total number of lines in the document */
  lineCount: number;
  /** Whether numberedText stops before the last line */
  truncated: boolean;
  schema: typeof SECTION_SCHEMA;
}

/**
 * Structured-extraction boundary. The response is untrusted and validated
 * by the segmenter.
 */
export interface ExtractionClient {
  extractSections(request: ExtractionRequest, signal: AbortSignal): Promise<unknown>;
}

export interface SegmenterOptions {
  maxChars?: number;
  timeoutMs?: number;
  maxRetries?: number;
  /** First backoff delay; tests set 0 */
  initialRetryDelayMs?: number;
}

export class DocumentSegmenter {
  private readonly maxChars: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialRetryDelayMs: number;

  constructor(
    private readonly client: ExtractionClient,
    private readonly cache: SegmentationCache,
    options: SegmenterOptions = {}
  ) {
    this.maxChars = options.maxChars ?? SEGMENTATION.MAX_CHARS;
    this.timeoutMs = options.timeoutMs ?? SEGMENTATION.TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? SEGMENTATION.MAX_RETRIES;
    this.initialRetryDelayMs = options.initialRetryDelayMs ?? 1000;
  }

  /**
   * Section forest of `document`. Never rejects.
   */
  segment(document: Document): Promise<SectionForest> {
    return this.cache.getOrCompute(document.hash, () => this.extract(document));
  }

  private async extract(document: Document): Promise<ComputedForest> {
    const lineCount = document.lines.length;
    const numberedText = numberLines(document, this.maxChars);
    const included = numberedText === '' ? 0 : numberedText.split('\n').length;
    const request: ExtractionRequest = {
      numberedText,
      lineCount,
      truncated: included < lineCount,
      schema: SECTION_SCHEMA,
    };

    let raw: unknown;
    try {
      raw = await retry(
        () => withTimeout(signal => this.client.extractSections(request, signal), this.timeoutMs, 'extraction'),
        {
          maxRetries: this.maxRetries,
          initialDelayMs: this.initialRetryDelayMs,
          onRetry: (attempt, error) => {
            logger.warn({ attempt, err: formatError(error), hash: document.hash }, 'Retrying extraction');
          },
        }
      );
    } catch (error) {
      const serviceError = new ExternalServiceError('Extraction service failed', {
        cause: error instanceof Error ? error : new Error(String(error)),
        service: 'extraction',
        recoverable: false,
      });
      logger.error({ err: formatError(serviceError), hash: document.hash }, 'Falling back to single section');
      return { forest: fallbackForest(lineCount), cacheable: false };
    }

    try {
      const forest = buildForest(raw, lineCount);
      logger.info({ hash: document.hash, sections: forest.sections.length }, 'Document segmented');
      return { forest, cacheable: true };
    } catch (error) {
      const details = error instanceof ValidationError ? formatError(error) : { message: String(error) };
      logger.warn({ err: details, hash: document.hash }, 'Extraction result failed validation, falling back to single section');
      return { forest: fallbackForest(lineCount), cacheable: false };
    }
  }
}
