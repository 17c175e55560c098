/**
 * Domain types shared across the navigation engine.
 */

/**
 * A loaded document. Immutable once created.
 */
export interface Document {
  /** Path the document was read from */
  readonly path: string;
  /** Hex SHA-256 of the raw text; the segmentation cache key */
  readonly hash: string;
  readonly text: string;
  /** Line index; line N (1-based) is lines[N - 1] */
  readonly lines: readonly string[];
}

/**
 * One node of the section forest.
 */
export interface Section {
  /** Stable identifier within one forest, e.g. "s3" */
  readonly id: string;
  readonly title: string;
  /** Nesting depth, 1 for top-level sections */
  readonly level: number;
  /** 1-based, inclusive */
  readonly startLine: number;
  /** 1-based, inclusive */
  readonly endLine: number;
  readonly parentId: string | null;
}

/**
 * Ordered, nested set of sections of one document.
 *
 * `sections` is flat in document order (a pre-order walk of the forest);
 * nesting is expressed by `parentId`.
 */
export interface SectionForest {
  readonly sections: readonly Section[];
  /** Number of lines of the segmented document */
  readonly lineCount: number;
  /** True when produced by the single-section fallback */
  readonly fallback: boolean;
}

/**
 * Section as returned by the extraction service.
 */
export interface RawSection {
  title: string;
  start_line: number;
  end_line: number;
  level: number;
}

export type PassKind = 'primary' | 'keyword_expansion' | 'cross_reference';

/**
 * Where an evidence item came from: a search pass, or a line the loop read itself.
 */
export type EvidenceSource = PassKind | 'navigation';

export interface EvidenceItem {
  readonly section: Section;
  /** 1-based inclusive range */
  readonly lineRange: readonly [number, number];
  readonly snippet: string;
  readonly passKind: EvidenceSource;
}

export interface SearchPass {
  readonly kind: PassKind;
  readonly keywords: readonly string[];
  readonly targetedSections: readonly Section[];
  readonly results: readonly EvidenceItem[];
}

export type CoverageVerdict = 'CONFIDENT' | 'LOW_CONFIDENCE' | 'NOT_FOUND';

export interface SearchResult {
  readonly passes: readonly SearchPass[];
  readonly evidence: readonly EvidenceItem[];
  readonly verdict: CoverageVerdict;
  /** Domains the question was mapped to */
  readonly domains: readonly string[];
  /** Question keywords plus their synonyms */
  readonly terms: readonly string[];
}
