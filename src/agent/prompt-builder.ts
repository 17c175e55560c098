/**
 * Prompt Builder - renders the navigation loop's state for the completion service.
 *
 * The system prompt is fixed per process. The user prompt is rebuilt on
 * every iteration from the pass plan and the transcript so far, so the
 * completion service itself stays stateless.
 */

import { renderOutline } from '../document/forest.js';
import { describeTools } from '../tools/registry.js';
import { SEARCH } from '../config/constants.js';
import type { Document, EvidenceItem, SearchResult, SectionForest } from '../types/document.js';
import type { ToolCall, TranscriptRecord } from '../types/agent.js';

/**
 * Everything the loop knows before its first iteration.
 */
export interface PassPlanContext {
  question: string;
  document: Document;
  forest: SectionForest;
  search: SearchResult;
}

/**
 * Build the system instructions, including the tool reference.
 */
export function buildSystemPrompt(): string {
  return `You answer questions about one long document by navigating its structure.

## How to work

- Start from the search results below; they point at the sections most likely to hold the answer.
- Read sections with read_lines before relying on them. Snippets are shortened.
- Follow cross-references ("Section 5.2", "Exhibit B") that the text you read depends on.
- Call one or more tools per turn. Results come back in the next turn.

## Tools

Call a tool by writing its name as a tag, with one tag per argument:

${describeTools()}

## Finishing

When you can answer, write the answer inside <answer></answer>. Cite section titles and
line numbers for every statement. Answer only from text you have seen in this document.
If the document does not contain the information, answer exactly:
<answer>${SEARCH.NOT_FOUND_ANSWER}</answer>`;
}

function renderEvidence(item: EvidenceItem): string {
  const [start, end] = item.lineRange;
  return `   - ${item.section.title} [lines ${start}-${end}]: ${item.snippet}`;
}

/**
 * Render the question, the outline and the three search passes.
 */
export function buildPassPlan({ question, document, forest, search }: PassPlanContext): string {
  const passes = search.passes.map((pass, index) => {
    const keywords = pass.keywords.length > 0 ? pass.keywords.join(', ') : '(none)';
    const targets = pass.targetedSections.length > 0
      ? pass.targetedSections.map(s => `${s.title} [lines ${s.startLine}-${s.endLine}]`).join('; ')
      : '(none)';
    const results = pass.results.length > 0
      ? pass.results.map(renderEvidence).join('\n')
      : '   (no matches)';
    return `${index + 1}. ${pass.kind} (keywords: ${keywords})\n   Sections: ${targets}\n${results}`;
  });

  return `## Question

${question}

## Document

${document.path} (${document.lines.length} lines)

${renderOutline(forest)}

## Search passes

${passes.join('\n\n')}

Coverage so far: ${search.verdict}`;
}

function renderCall(call: ToolCall): string {
  const args = Object.entries(call.arguments).map(([name, value]) => `${name}=${JSON.stringify(value)}`);
  return `${call.name}(${args.join(', ')})`;
}

/**
 * Shorten an observation to `maxChars`, keeping its head.
 */
export function truncateObservation(content: string, maxChars: number): string {
  if (content.length <= maxChars) {
    return content;
  }
  return `${content.slice(0, maxChars)}\n[observation truncated: ${content.length - maxChars} more characters]`;
}

export function renderRecord(record: TranscriptRecord, maxObservationChars: number): string {
  switch (record.kind) {
    case 'think':
      return `### Your turn ${record.iteration}\n\n${record.text}`;
    case 'act':
      return `### Tool call\n\n${renderCall(record.call)}`;
    case 'observe':
      return `### Observation from ${record.source} (${record.ok ? 'ok' : 'error'})\n\n` +
        truncateObservation(record.content, maxObservationChars);
  }
}

/**
 * Build the user prompt of one iteration.
 *
 * @param remaining - Iterations left, including the one being prompted
 */
export function buildTurnPrompt(
  plan: string,
  transcript: readonly TranscriptRecord[],
  remaining: number,
  maxObservationChars: number
): string {
  const history = transcript.length > 0
    ? `\n\n## Transcript\n\n${transcript.map(r => renderRecord(r, maxObservationChars)).join('\n\n')}`
    : '';
  const budget = remaining <= 1
    ? 'This is your last turn. Write your answer now.'
    : `You have ${remaining} turns left. Call tools, or write your answer.`;
  return `${plan}${history}\n\n---\n\n${budget}`;
}
