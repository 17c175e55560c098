import { describe, it, expect } from 'vitest';
import { buildSystemPrompt, buildTurnPrompt, renderRecord, truncateObservation } from './prompt-builder.js';
import { SEARCH } from '../config/constants.js';

describe('buildSystemPrompt', () => {
  it('should describe every tool and the completion marker', () => {
    const prompt = buildSystemPrompt();

    for (const tool of ['read_lines', 'get_structure', 'search_document', 'list_files']) {
      expect(prompt).toContain(`${tool}: `);
    }
    expect(prompt.endsWith(`<answer>${SEARCH.NOT_FOUND_ANSWER}</answer>`)).toBe(true);
  });
});

describe('truncateObservation', () => {
  it('should keep short observations as they are', () => {
    expect(truncateObservation('abc', 3)).toBe('abc');
  });

  it('should cut long observations and say how much was dropped', () => {
    expect(truncateObservation('abcdefgh', 3)).toBe('abc\n[observation truncated: 5 more characters]');
  });
});

describe('renderRecord', () => {
  it('should render each record kind', () => {
    expect(renderRecord({ kind: 'think', iteration: 2, text: 'Reading.' }, 100)).toBe('### Your turn 2\n\nReading.');
    expect(renderRecord({
      kind: 'act',
      iteration: 2,
      call: { name: 'search_document', arguments: { pattern: 'Exhibit A' } },
    }, 100)).toBe('### Tool call\n\nsearch_document(pattern="Exhibit A")');
    expect(renderRecord({
      kind: 'observe',
      iteration: 2,
      source: 'search_document',
      ok: false,
      content: 'No matches for "Exhibit A"',
    }, 100)).toBe('### Observation from search_document (error)\n\nNo matches for "Exhibit A"');
  });
});

describe('buildTurnPrompt', () => {
  it('should append the transcript and the remaining budget to the plan', () => {
    const prompt = buildTurnPrompt('PLAN', [{ kind: 'think', iteration: 1, text: 'Hmm.' }], 3, 100);

    expect(prompt).toBe(
      'PLAN\n\n## Transcript\n\n### Your turn 1\n\nHmm.\n\n---\n\nYou have 3 turns left. Call tools, or write your answer.'
    );
  });

  it('should leave out an empty transcript', () => {
    expect(buildTurnPrompt('PLAN', [], 1, 100)).toBe('PLAN\n\n---\n\nThis is your last turn. Write your answer now.');
  });
});
