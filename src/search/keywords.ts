/**
 * Question keywords, domain mapping and synonym expansion.
 *
 * Words are compared by a truncation stem: plural endings are dropped
 * and the word is cut to its first six letters, so "terminate",
 * "terminated" and "termination" all compare equal while "term" does not.
 *
 * @module search/keywords
 */

import { z } from 'zod';
import vocabularyData from './vocabulary.json' with { type: 'json' };

const DomainSchema = z.object({
  name: z.string(),
  /** Question words that select the domain */
  terms: z.array(z.string()).min(1),
  /** Lowercase substrings of section titles the domain's answers live under */
  titlePatterns: z.array(z.string()).min(1),
  /** Whether the opening section of a document is a candidate too */
  opening: z.boolean(),
});

const VocabularySchema = z.object({
  stopwords: z.array(z.string()),
  domains: z.array(DomainSchema),
  /** Domain name -> domains whose sections are checked as well */
  crossReferences: z.record(z.array(z.string())),
  synonyms: z.array(z.array(z.string()).min(2)),
});

export type Domain = z.infer<typeof DomainSchema>;
export type Vocabulary = z.infer<typeof VocabularySchema>;

export const VOCABULARY: Vocabulary = VocabularySchema.parse(vocabularyData);

const STEM_LENGTH = 6;
const WORD = /[a-z0-9]+(?:['-][a-z0-9]+)*/g;

export function stem(word: string): string {
  let w = word.toLowerCase().replace(/'s$/, '');
  if (w.length > 4 && w.endsWith('ies')) {
    w = `${w.slice(0, -3)}y`;
  } else if (w.length > 3 && w.endsWith('s') && !w.endsWith('ss')) {
    w = w.slice(0, -1);
  }
  return w.slice(0, STEM_LENGTH);
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(WORD) ?? [];
}

/**
 * Content words of a question, in order, without duplicates.
 */
export function extractKeywords(question: string, vocabulary: Vocabulary = VOCABULARY): string[] {
  const stopwords = new Set(vocabulary.stopwords);
  const seen = new Set<string>();
  const keywords: string[] = [];

  for (const token of tokenize(question)) {
    if (stopwords.has(token) || (token.length < 3 && !/\d/.test(token))) {
      continue;
    }
    const key = stem(token);
    if (!seen.has(key)) {
      seen.add(key);
      keywords.push(token);
    }
  }
  return keywords;
}

/**
 * Domains selected by the keywords, most hits first; ties keep vocabulary order.
 */
export function matchDomains(keywords: readonly string[], vocabulary: Vocabulary = VOCABULARY): Domain[] {
  const stems = new Set(keywords.map(stem));
  return vocabulary.domains
    .map((domain, index) => ({
      domain,
      index,
      hits: new Set(domain.terms.map(stem).filter(s => stems.has(s))).size,
    }))
    .filter(d => d.hits > 0)
    .sort((a, b) => b.hits - a.hits || a.index - b.index)
    .map(d => d.domain);
}

/**
 * Synonyms of the keywords that are not keywords already.
 */
export function expandKeywords(keywords: readonly string[], vocabulary: Vocabulary = VOCABULARY): string[] {
  const original = new Set(keywords.map(stem));
  const seen = new Set(original);
  const expansion: string[] = [];

  // One hop: synonyms of synonyms are not followed
  for (const group of vocabulary.synonyms) {
    if (!group.some(word => original.has(stem(word)))) {
      continue;
    }
    for (const word of group) {
      const key = word.includes(' ') ? word : stem(word);
      if (!seen.has(key)) {
        seen.add(key);
        expansion.push(word);
      }
    }
  }
  return expansion;
}

/**
 * Domains reached from `domains` through the cross-reference pairs.
 */
export function crossDomains(domains: readonly Domain[], vocabulary: Vocabulary = VOCABULARY): Domain[] {
  const selected = new Set(domains.map(d => d.name));
  const names = new Set(domains.flatMap(d => vocabulary.crossReferences[d.name] ?? []));
  return vocabulary.domains.filter(d => names.has(d.name) && !selected.has(d.name));
}

/**
 * Question words of the named domains.
 */
export function domainTerms(names: readonly string[], vocabulary: Vocabulary = VOCABULARY): string[] {
  const selected = new Set(names);
  return vocabulary.domains.filter(d => selected.has(d.name)).flatMap(d => d.terms);
}

export function titleMatchesDomain(title: string, domain: Domain): boolean {
  const lower = title.toLowerCase();
  return domain.titlePatterns.some(pattern => lower.includes(pattern));
}

/**
 * Tests text against a term list: single words by stem, phrases by substring.
 */
export class TermMatcher {
  private readonly stems: Set<string>;
  private readonly phrases: string[];

  constructor(readonly terms: readonly string[]) {
    this.stems = new Set(terms.filter(t => !t.includes(' ')).map(stem));
    this.phrases = terms.filter(t => t.includes(' ')).map(t => t.toLowerCase());
  }

  get isEmpty(): boolean {
    return this.stems.size === 0 && this.phrases.length === 0;
  }

  /**
   * Number of distinct terms found in the text.
   */
  count(text: string): number {
    const found = new Set(tokenize(text).map(stem).filter(s => this.stems.has(s)));
    const lower = text.toLowerCase();
    return found.size + this.phrases.filter(p => lower.includes(p)).length;
  }

  matches(text: string): boolean {
    return this.count(text) > 0;
  }
}
