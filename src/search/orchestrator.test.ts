/**
 * Tests for the multi-pass search (src/search/orchestrator.ts)
 */

import { describe, it, expect } from 'vitest';
import { SearchOrchestrator, finalVerdict } from './orchestrator.js';
import { extractKeywords, matchDomains } from './keywords.js';
import { fallbackForest } from '../document/forest.js';
import { contractDocument, contractForest } from '../test-utils/contract.js';
import type { EvidenceItem } from '../types/document.js';

const document = contractDocument();
const forest = contractForest();
const orchestrator = new SearchOrchestrator();

const key = (item: EvidenceItem): string => `${item.lineRange[0]}-${item.lineRange[1]}`;

describe('SearchOrchestrator', () => {
  describe('termination question against a TERMINATION section', () => {
    const result = orchestrator.search('What are the termination conditions?', document, forest);

    it('should target the TERMINATION section in the primary pass', () => {
      const [primary] = result.passes;
      expect(primary?.kind).toBe('primary');
      expect(primary?.targetedSections.map(s => s.title)).toEqual(['TERMINATION']);
      expect(primary?.results.map(key)).toEqual(['120-122']);
    });

    it('should include evidence from the TERMINATION section', () => {
      expect(result.evidence.some(e => e.section.title === 'TERMINATION')).toBe(true);
      expect(result.verdict).toBe('CONFIDENT');
      expect(result.domains).toEqual(['termination']);
    });

    it('should find differently phrased provisions through synonyms', () => {
      const expansion = result.passes[1];
      expect(expansion?.keywords).toEqual(['cancel', 'rescind', 'expire', 'expiration']);
      expect(expansion?.results.map(key)).toEqual(['70-70']);
      expect(expansion?.results[0]?.section.title).toBe('2. PAYMENT');
    });

    it('should follow the reference to Exhibit A', () => {
      const cross = result.passes[2];
      expect(cross?.keywords).toEqual(['Exhibit A', 'liability']);
      expect(cross?.results).toEqual([{
        section: expect.objectContaining({ title: 'EXHIBIT A - BREACH EVENTS' }),
        lineRange: [141, 142],
        snippet: 'EXHIBIT A - BREACH EVENTS A material breach includes failure to pay within 90 days.',
        passKind: 'cross_reference',
      }]);
    });

    it('should expose the expanded vocabulary', () => {
      expect(result.terms).toEqual(['termination', 'conditions', 'cancel', 'rescind', 'expire', 'expiration']);
    });
  });

  it('should return NOT_FOUND when no vocabulary matches anywhere', () => {
    const result = orchestrator.search('What are the cryptocurrency mining obligations?', document, forest);

    expect(result.passes.map(p => p.kind)).toEqual(['primary', 'keyword_expansion', 'cross_reference']);
    expect(result.evidence).toEqual([]);
    expect(result.verdict).toBe('NOT_FOUND');
  });

  it('should only ever add evidence from one pass to the next', () => {
    const questions = [
      'What are the termination conditions?',
      'Who are the parties?',
      'When are fees due?',
      'Can the services be cancelled?',
    ];

    for (const question of questions) {
      const result = orchestrator.search(question, document, forest);
      let previous = new Set<string>();
      const seen: EvidenceItem[] = [];

      for (const pass of result.passes) {
        seen.push(...pass.results);
        const current = new Set(seen.map(key));
        expect([...previous].every(k => current.has(k))).toBe(true);
        previous = current;
      }
      expect(result.evidence.map(key)).toEqual(seen.map(key));
    }
  });

  it('should rank the opening section first for party questions', () => {
    const keywords = extractKeywords('Who are the parties?');
    const ranked = orchestrator.rankSections(keywords, matchDomains(keywords), document, forest);

    expect(ranked.map(r => r.section.title)).toEqual(['PREAMBLE', 'TERMINATION']);
    expect(ranked[0]).toMatchObject({ titleMatched: true, titleScore: 2, hits: 1 });
  });

  it('should limit the primary pass to the configured number of candidates', () => {
    const narrow = new SearchOrchestrator({ maxCandidates: 1 });
    const result = narrow.search('Who are the parties?', document, forest);

    expect(result.passes[0]?.targetedSections.map(s => s.title)).toEqual(['PREAMBLE']);
    expect(result.passes[0]?.results.map(key)).toEqual(['2-2']);
  });

  it('should be LOW_CONFIDENCE on the single-section fallback', () => {
    const result = orchestrator.search('What are the termination conditions?', document, fallbackForest(160));

    expect(result.passes[0]?.results.map(key)).toEqual(['120-122']);
    expect(result.verdict).toBe('LOW_CONFIDENCE');
  });

  it('should shorten long snippets', () => {
    const short = new SearchOrchestrator({ snippetChars: 20 });
    const result = short.search('What are the termination conditions?', document, forest);

    expect(result.evidence[0]?.snippet).toBe('TERMINATION Eithe...');
  });
});

describe('finalVerdict', () => {
  const result = orchestrator.search('What are the termination conditions?', document, forest);

  it('should keep the search verdict when evidence exists', () => {
    expect(finalVerdict(result, result.evidence)).toBe('CONFIDENT');
  });

  it('should be NOT_FOUND without evidence', () => {
    expect(finalVerdict(result, [])).toBe('NOT_FOUND');
  });

  it('should downgrade NOT_FOUND searches to LOW_CONFIDENCE when the loop found evidence', () => {
    const empty = orchestrator.search('What are the cryptocurrency mining obligations?', document, forest);
    expect(finalVerdict(empty, result.evidence)).toBe('LOW_CONFIDENCE');
  });
});
