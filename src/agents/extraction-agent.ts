/**
 * ExtractionAgent - structured-extraction boundary of the segmenter.
 *
 * Asks the model for the document's section list as JSON and returns the
 * parsed value unvalidated; the segmenter validates it.
 *
 * @module agents/extraction-agent
 */

import { BaseAgent } from './base-agent.js';
import { extractJson } from '../utils/sdk.js';
import { ExternalServiceError, type ExternalService } from '../utils/errors.js';
import type { ExtractionClient, ExtractionRequest } from '../segmentation/segmenter.js';

const SYSTEM_PROMPT = `You segment documents into their table of contents.
You receive a document whose lines are prefixed with their line number ("N: ").
Return ONLY a JSON array of sections in document order, each matching the given schema.
Rules:
- Use the headings exactly as written (e.g. "ARTICLE 5 - TERMINATION", "5.2 Termination for Cause").
- Top-level sections have level 1, their subsections level 2, and so on.
- end_line is inclusive; a section ends on the line before the next section at the same or a higher level starts.
- Sibling sections never overlap, and a subsection lies inside its parent.
- Include the preamble (title, parties, recitals) as a section if present, and exhibits or schedules at the end.`;

export class ExtractionAgent extends BaseAgent implements ExtractionClient {
  protected getAgentName(): string {
    return 'ExtractionAgent';
  }

  protected getService(): ExternalService {
    return 'extraction';
  }

  async extractSections(request: ExtractionRequest, signal: AbortSignal): Promise<unknown> {
    const text = await this.runPrompt(buildExtractionPrompt(request), SYSTEM_PROMPT, signal);
    const value = extractJson(text);

    if (value === undefined) {
      throw new ExternalServiceError('Extraction output contained no JSON', {
        service: 'extraction',
        recoverable: true,
      });
    }

    // Some models wrap the list in an object
    if (value && typeof value === 'object' && !Array.isArray(value) && 'sections' in value) {
      return value.sections;
    }
    return value;
  }
}

/**
 * Prompt for one extraction request.
 */
export function buildExtractionPrompt(request: ExtractionRequest): string {
  const note = request.truncated
    ? `\nThe text below is truncated; the full document has ${request.lineCount} lines. ` +
      `Let the last section end at line ${request.lineCount}.`
    : '';

  return [
    `Schema:\n${JSON.stringify(request.schema, null, 2)}`,
    `The document has ${request.lineCount} lines.${note}`,
    `Document:\n${request.numberedText}`,
  ].join('\n\n');
}
