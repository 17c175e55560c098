/**
 * Answer synthesis and the answer wire format.
 *
 * @module agent/answer
 */

import { SEARCH } from '../config/constants.js';
import { finalVerdict } from '../search/orchestrator.js';
import type { EvidenceItem, SearchResult } from '../types/document.js';
import type { AbortReason, AgentState, Answer, TerminalState } from '../types/agent.js';

export interface SynthesisInput {
  question: string;
  state: Readonly<AgentState>;
  status: TerminalState;
  search: SearchResult;
  evidence: readonly EvidenceItem[];
  maxEvidence?: number;
}

const ABORT_NOTES: Record<AbortReason, string> = {
  iteration_budget: 'Navigation stopped at the iteration limit before reaching a final answer.',
  cancelled: 'Navigation was cancelled before reaching a final answer.',
  service_unavailable: 'The language model service became unavailable before a final answer was reached.',
};

/**
 * Answer assembled from evidence alone, used when the loop gave none.
 *
 * @param reason - Why the loop stopped early, if it did
 */
export function bestEvidenceText(evidence: readonly EvidenceItem[], reason?: AbortReason): string {
  const rows = evidence.map(item => {
    const [start, end] = item.lineRange;
    return `- ${item.section.title} [lines ${start}-${end}]: ${item.snippet}`;
  });
  const lead = 'The most relevant provisions found are:';
  return `${reason ? `${ABORT_NOTES[reason]} ${lead}` : lead}\n${rows.join('\n')}`;
}

/**
 * Answer of a run cancelled before segmentation. Nothing was searched, so
 * the verdict is LOW_CONFIDENCE rather than NOT_FOUND.
 */
export function cancelledAnswer(question: string): Answer {
  return {
    question,
    answerText: ABORT_NOTES.cancelled,
    coverageVerdict: 'LOW_CONFIDENCE',
    evidence: [],
    iterationsUsed: 0,
    status: 'ABORTED',
    abortReason: 'cancelled',
  };
}

/**
 * Turn a finished loop into its Answer.
 *
 * No evidence always yields the fixed not-found answer, whatever the
 * model wrote. An aborted loop is never more than LOW_CONFIDENCE.
 */
export function synthesizeAnswer(input: SynthesisInput): Answer {
  const { question, state, status, search } = input;
  const evidence = input.evidence.slice(0, input.maxEvidence ?? SEARCH.MAX_EVIDENCE);
  const verdict = finalVerdict(search, evidence);
  const base = {
    question,
    evidence,
    iterationsUsed: state.iteration,
    status,
    ...(state.abortReason ? { abortReason: state.abortReason } : {}),
  };

  if (verdict === 'NOT_FOUND') {
    return { ...base, answerText: SEARCH.NOT_FOUND_ANSWER, coverageVerdict: 'NOT_FOUND' };
  }

  if (status === 'ABORTED') {
    const answerText = state.answerText || bestEvidenceText(evidence, state.abortReason ?? 'iteration_budget');
    return { ...base, answerText, coverageVerdict: 'LOW_CONFIDENCE' };
  }

  return {
    ...base,
    answerText: state.answerText || bestEvidenceText(evidence),
    coverageVerdict: verdict,
  };
}

/**
 * Evidence item as written to JSON output.
 */
export interface WireEvidence {
  section_title: string;
  line_range: [number, number];
  snippet: string;
}

/**
 * Answer as written to JSON output.
 */
export interface WireAnswer {
  question: string;
  answer_text: string;
  coverage_verdict: Answer['coverageVerdict'];
  evidence: WireEvidence[];
  iterations_used: number;
}

export function toWire(answer: Answer): WireAnswer {
  return {
    question: answer.question,
    answer_text: answer.answerText,
    coverage_verdict: answer.coverageVerdict,
    evidence: answer.evidence.map(item => ({
      section_title: item.section.title,
      line_range: [item.lineRange[0], item.lineRange[1]],
      snippet: item.snippet,
    })),
    iterations_used: answer.iterationsUsed,
  };
}
