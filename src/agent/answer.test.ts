/**
 * Tests for answer synthesis (src/agent/answer.ts)
 */

import { describe, it, expect } from 'vitest';
import { bestEvidenceText, synthesizeAnswer, toWire } from './answer.js';
import { SearchOrchestrator } from '../search/orchestrator.js';
import { SEARCH } from '../config/constants.js';
import { contractDocument, contractForest } from '../test-utils/contract.js';
import type { AgentState } from '../types/agent.js';

const search = new SearchOrchestrator().search('What are the termination conditions?', contractDocument(), contractForest());

const state = (overrides: Partial<AgentState> = {}): AgentState => ({
  iteration: 2,
  state: 'COMPLETE',
  transcript: [],
  evidence: [],
  ...overrides,
});

describe('synthesizeAnswer', () => {
  it('should keep the model answer and the search verdict', () => {
    const answer = synthesizeAnswer({
      question: 'Q',
      state: state({ answerText: 'Sixty days notice.' }),
      status: 'COMPLETE',
      search,
      evidence: search.evidence,
    });

    expect(answer).toMatchObject({
      answerText: 'Sixty days notice.',
      coverageVerdict: 'CONFIDENT',
      iterationsUsed: 2,
      status: 'COMPLETE',
    });
    expect(answer.abortReason).toBeUndefined();
  });

  it('should fall back to the evidence when the answer block was empty', () => {
    const answer = synthesizeAnswer({
      question: 'Q',
      state: state({ answerText: '' }),
      status: 'COMPLETE',
      search,
      evidence: search.evidence.slice(0, 1),
    });

    expect(answer.answerText.split('\n')[0]).toBe('The most relevant provisions found are:');
  });

  it('should cap the evidence', () => {
    const answer = synthesizeAnswer({
      question: 'Q',
      state: state({ answerText: 'A' }),
      status: 'COMPLETE',
      search,
      evidence: search.evidence,
      maxEvidence: 2,
    });

    expect(answer.evidence.map(e => e.lineRange)).toEqual([[120, 122], [70, 70]]);
  });

  it('should ignore the model answer when there is no evidence', () => {
    const answer = synthesizeAnswer({
      question: 'Q',
      state: state({ state: 'ABORTED', abortReason: 'cancelled' }),
      status: 'ABORTED',
      search,
      evidence: [],
    });

    expect(answer).toMatchObject({
      answerText: SEARCH.NOT_FOUND_ANSWER,
      coverageVerdict: 'NOT_FOUND',
      abortReason: 'cancelled',
    });
  });
});

describe('bestEvidenceText', () => {
  it('should lead with the reason the loop stopped', () => {
    expect(bestEvidenceText(search.evidence.slice(1, 2), 'service_unavailable')).toBe(
      'The language model service became unavailable before a final answer was reached. ' +
      'The most relevant provisions found are:\n' +
      '- 2. PAYMENT [lines 70-70]: Repeated late payment allows Beta to cancel the services.'
    );
  });
});

describe('toWire', () => {
  it('should use snake_case field names', () => {
    const answer = synthesizeAnswer({
      question: 'What are the termination conditions?',
      state: state({ answerText: 'Sixty days notice.' }),
      status: 'COMPLETE',
      search,
      evidence: search.evidence.slice(1, 2),
    });

    expect(toWire(answer)).toEqual({
      question: 'What are the termination conditions?',
      answer_text: 'Sixty days notice.',
      coverage_verdict: 'CONFIDENT',
      evidence: [{
        section_title: '2. PAYMENT',
        line_range: [70, 70],
        snippet: 'Repeated late payment allows Beta to cancel the services.',
      }],
      iterations_used: 2,
    });
  });
});
