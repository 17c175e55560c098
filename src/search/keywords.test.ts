/**
 * Tests for keyword extraction and expansion (src/search/keywords.ts)
 */

import { describe, it, expect } from 'vitest';
import {
  TermMatcher,
  VOCABULARY,
  crossDomains,
  domainTerms,
  expandKeywords,
  extractKeywords,
  matchDomains,
  stem,
  titleMatchesDomain,
} from './keywords.js';

describe('stem', () => {
  it('should conflate inflections of one word', () => {
    expect(stem('terminate')).toBe('termin');
    expect(stem('Terminated')).toBe('termin');
    expect(stem('termination')).toBe('termin');
  });

  it('should keep short words apart from longer ones', () => {
    expect(stem('term')).toBe('term');
    expect(stem('terms')).toBe('term');
  });

  it('should singularize plurals', () => {
    expect(stem('parties')).toBe('party');
    expect(stem('fees')).toBe('fee');
    expect(stem('business')).toBe('busine');
  });
});

describe('extractKeywords', () => {
  it('should drop stopwords and question words', () => {
    expect(extractKeywords('What are the termination conditions?')).toEqual(['termination', 'conditions']);
  });

  it('should keep one word per stem', () => {
    expect(extractKeywords('Terminate or termination?')).toEqual(['terminate']);
  });

  it('should keep short numbers', () => {
    expect(extractKeywords('Is there a 30 day notice?')).toEqual(['30', 'day', 'notice']);
  });
});

describe('matchDomains', () => {
  it('should map questions to domains', () => {
    expect(matchDomains(['assignment']).map(d => d.name)).toEqual(['assignment']);
    expect(matchDomains(['weather'])).toEqual([]);
  });

  it('should order domains by hits', () => {
    const names = matchDomains(['warranty', 'damages', 'liability']).map(d => d.name);
    expect(names).toEqual(['liability', 'warranty']);
  });
});

describe('expandKeywords', () => {
  it('should add synonyms that are not keywords already', () => {
    expect(expandKeywords(['assignment'])).toEqual(['transfer', 'convey', 'delegate']);
  });

  it('should not follow synonyms of synonyms', () => {
    expect(expandKeywords(['notice'])).toEqual(['notify', 'notification']);
  });
});

describe('crossDomains', () => {
  it('should follow the domain pairs', () => {
    const assignment = VOCABULARY.domains.filter(d => d.name === 'assignment');
    expect(crossDomains(assignment).map(d => d.name)).toEqual(['termination']);
  });

  it('should skip domains that are already selected', () => {
    const domains = VOCABULARY.domains.filter(d => d.name === 'assignment' || d.name === 'termination');
    expect(crossDomains(domains).map(d => d.name)).toEqual(['liability']);
  });
});

describe('titleMatchesDomain', () => {
  it('should match title substrings case-insensitively', () => {
    const [termination] = matchDomains(['termination']);
    expect(termination).toBeDefined();
    if (!termination) return;

    expect(titleMatchesDomain('ARTICLE 9 - TERMINATION', termination)).toBe(true);
    expect(titleMatchesDomain('Payment Terms', termination)).toBe(true);
    expect(titleMatchesDomain('Confidentiality', termination)).toBe(false);
  });
});

describe('TermMatcher', () => {
  it('should count words by stem and phrases by substring', () => {
    const matcher = new TermMatcher(['hold harmless', 'notice', 'terminate']);

    expect(matcher.count('Vendor shall hold harmless and give Notice of termination.')).toBe(3);
    expect(matcher.matches('Nothing relevant here.')).toBe(false);
  });

  it('should report when it has no terms', () => {
    expect(new TermMatcher([]).isEmpty).toBe(true);
  });
});

describe('domainTerms', () => {
  it('should list the terms of the named domains', () => {
    expect(domainTerms(['warranty'])).toEqual([
      'warranty', 'warranties', 'warrant', 'warrants', 'guarantee', 'defect', 'defects', 'representation', 'representations',
    ]);
    expect(domainTerms(['unknown'])).toEqual([]);
  });
});
