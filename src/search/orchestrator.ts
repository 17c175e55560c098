/**
 * Multi-pass search - the pass plan the navigation loop starts from.
 *
 * Three passes always run, in order, over one EvidenceCollector:
 * 1. primary: read the top candidate sections for the question's domains
 * 2. keyword_expansion: re-scan with synonyms, beyond the candidates
 * 3. cross_reference: follow "Section X" references and domain pairs, one hop
 *
 * The verdict is categorical. Evidence from the primary pass inside a
 * section whose title matched a domain is CONFIDENT; any other evidence
 * is LOW_CONFIDENCE; no evidence at all is NOT_FOUND.
 *
 * @module search/orchestrator
 */

import { createLogger } from '../utils/logger.js';
import { SEARCH } from '../config/constants.js';
import { isWithin } from '../document/forest.js';
import {
  VOCABULARY,
  TermMatcher,
  crossDomains,
  expandKeywords,
  extractKeywords,
  matchDomains,
  stem,
  titleMatchesDomain,
  tokenize,
  type Domain,
  type Vocabulary,
} from './keywords.js';
import { findReferences, resolveReference } from './cross-reference.js';
import { EvidenceCollector, type LineRange } from './evidence.js';
import type {
  CoverageVerdict,
  Document,
  EvidenceItem,
  SearchPass,
  SearchResult,
  Section,
  SectionForest,
} from '../types/document.js';

const logger = createLogger('SearchOrchestrator');

export interface SearchOptions {
  /** Sections read by the primary pass */
  maxCandidates?: number;
  snippetChars?: number;
}

/**
 * A section with its primary-pass ranking.
 */
export interface RankedSection {
  section: Section;
  /** Whether the title matched a domain (or the opening-section rule) */
  titleMatched: boolean;
  titleScore: number;
  /** Lines of the section containing a question keyword */
  hits: number;
}

const range = (section: Section): LineRange => [section.startLine, section.endLine];

export class SearchOrchestrator {
  private readonly maxCandidates: number;
  private readonly snippetChars: number;

  constructor(
    options: SearchOptions = {},
    readonly vocabulary: Vocabulary = VOCABULARY
  ) {
    this.maxCandidates = options.maxCandidates ?? SEARCH.MAX_CANDIDATES;
    this.snippetChars = options.snippetChars ?? SEARCH.SNIPPET_CHARS;
  }

  search(question: string, document: Document, forest: SectionForest): SearchResult {
    const keywords = extractKeywords(question, this.vocabulary);
    const domains = matchDomains(keywords, this.vocabulary);
    const expansion = expandKeywords(keywords, this.vocabulary);
    const collector = new EvidenceCollector(document, forest, this.snippetChars);

    // Pass 1
    const ranked = this.rankSections(keywords, domains, document, forest);
    const candidates = ranked.slice(0, this.maxCandidates);
    const primary = collector.scan(candidates.map(c => range(c.section)), new TermMatcher(keywords), 'primary');
    const passes: SearchPass[] = [{
      kind: 'primary',
      keywords,
      targetedSections: candidates.map(c => c.section),
      results: primary,
    }];

    // Pass 2
    const candidateSections = candidates.map(c => c.section);
    const uncovered = forest.sections.filter(s =>
      !candidateSections.some(c => isWithin(forest, s, c) || isWithin(forest, c, s))
    );
    const expansionTargets = [...candidateSections, ...uncovered];
    passes.push({
      kind: 'keyword_expansion',
      keywords: expansion,
      targetedSections: expansionTargets,
      results: collector.scan(
        expansionTargets.map(range),
        new TermMatcher([...keywords, ...expansion]),
        'keyword_expansion'
      ),
    });

    // Pass 3
    passes.push(this.crossReferencePass(collector, document, forest, domains, [...keywords, ...expansion]));

    const verdict = this.verdict(primary, candidates, forest, collector.size);
    logger.debug({
      keywords,
      domains: domains.map(d => d.name),
      passes: passes.map(p => ({ kind: p.kind, results: p.results.length })),
      verdict,
    }, 'Search completed');

    return {
      passes,
      evidence: collector.all,
      verdict,
      domains: domains.map(d => d.name),
      terms: [...keywords, ...expansion],
    };
  }

  /**
   * Candidate sections for the primary pass, best first.
   *
   * Titles matching a domain pattern rank above keyword hits in the
   * body. Without a matching domain, titles are matched against the
   * keywords themselves. Sections with neither are dropped.
   */
  rankSections(
    keywords: readonly string[],
    domains: readonly Domain[],
    document: Document,
    forest: SectionForest
  ): RankedSection[] {
    const keywordStems = new Set(keywords.map(stem));
    const matcher = new TermMatcher(keywords);
    const opening = forest.sections.reduce<Section | undefined>(
      (first, s) => (first === undefined || s.startLine < first.startLine ? s : first),
      undefined
    );

    return forest.sections
      .map((section): RankedSection => {
        const domainMatches = domains.filter(d => titleMatchesDomain(section.title, d)).length;
        const openingMatch = section === opening && !forest.fallback && domains.some(d => d.opening) ? 1 : 0;
        const titleTerms = new Set(tokenize(section.title).map(stem).filter(s => keywordStems.has(s))).size;

        let hits = 0;
        for (let n = section.startLine; n <= section.endLine; n++) {
          if (matcher.matches(document.lines[n - 1] ?? '')) {
            hits++;
          }
        }

        return {
          section,
          titleMatched: domainMatches + openingMatch > 0,
          titleScore: domainMatches + openingMatch + titleTerms,
          hits,
        };
      })
      .filter(r => r.titleScore > 0 || r.hits > 0)
      .sort((a, b) =>
        b.titleScore - a.titleScore ||
        b.hits - a.hits ||
        a.section.startLine - b.section.startLine
      );
  }

  private crossReferencePass(
    collector: EvidenceCollector,
    document: Document,
    forest: SectionForest,
    domains: readonly Domain[],
    terms: readonly string[]
  ): SearchPass {
    const matcher = new TermMatcher(terms);
    const found: EvidenceItem[] = [];
    const targeted = new Map<string, Section>();
    const keywords: string[] = [];

    // Snapshot: sections reached in this pass are not followed again
    const sources = [...collector.all];
    for (const item of sources) {
      const text = document.lines.slice(item.lineRange[0] - 1, item.lineRange[1]).join(' ');
      for (const reference of findReferences(text)) {
        const section = resolveReference(reference, forest);
        if (!section || targeted.has(section.id) || isWithin(forest, item.section, section)) {
          continue;
        }
        keywords.push(reference.text);
        targeted.set(section.id, section);

        const matched = collector.scan([range(section)], matcher, 'cross_reference');
        if (matched.length > 0) {
          found.push(...matched);
        } else {
          // A referenced section is relevant even without term hits
          const opening = collector.addRange([section.startLine, Math.min(section.endLine, section.startLine + 2)], 'cross_reference');
          if (opening) {
            found.push(opening);
          }
        }
      }
    }

    for (const domain of crossDomains(domains, this.vocabulary)) {
      keywords.push(domain.name);
      for (const section of forest.sections.filter(s => titleMatchesDomain(s.title, domain))) {
        if (targeted.has(section.id)) {
          continue;
        }
        targeted.set(section.id, section);
        found.push(...collector.scan([range(section)], matcher, 'cross_reference'));
      }
    }

    return { kind: 'cross_reference', keywords, targetedSections: [...targeted.values()], results: found };
  }

  private verdict(
    primary: readonly EvidenceItem[],
    candidates: readonly RankedSection[],
    forest: SectionForest,
    total: number
  ): CoverageVerdict {
    if (total === 0) {
      return 'NOT_FOUND';
    }
    const matchedSections = candidates.filter(c => c.titleMatched).map(c => c.section);
    const confident = primary.some(item => matchedSections.some(s => isWithin(forest, item.section, s)));
    return confident ? 'CONFIDENT' : 'LOW_CONFIDENCE';
  }
}

/**
 * Verdict for a final evidence set: evidence beyond the search keeps the
 * search's verdict unless the search found nothing.
 */
export function finalVerdict(search: SearchResult, evidence: readonly EvidenceItem[]): CoverageVerdict {
  if (evidence.length === 0) {
    return 'NOT_FOUND';
  }
  return search.verdict === 'CONFIDENT' ? 'CONFIDENT' : 'LOW_CONFIDENCE';
}
