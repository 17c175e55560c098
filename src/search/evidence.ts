/**
 * Evidence collection for one question.
 *
 * The collector only grows. Each document line belongs to at most one
 * evidence item, so a later pass can add to earlier findings but never
 * replace or duplicate them.
 *
 * @module search/evidence
 */

import { sectionAt } from '../document/forest.js';
import type { TermMatcher } from './keywords.js';
import type { Document, EvidenceItem, EvidenceSource, SectionForest } from '../types/document.js';

export type LineRange = readonly [number, number];

export function makeSnippet(lines: readonly string[], maxChars: number): string {
  const text = lines.map(l => l.trim()).filter(Boolean).join(' ');
  return text.length > maxChars ? `${text.slice(0, Math.max(0, maxChars - 3)).trimEnd()}...` : text;
}

export class EvidenceCollector {
  private readonly items: EvidenceItem[] = [];
  private readonly covered = new Set<number>();

  constructor(
    private readonly document: Document,
    private readonly forest: SectionForest,
    private readonly snippetChars: number
  ) {}

  /** Items in the order they were found */
  get all(): readonly EvidenceItem[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  isCovered(line: number): boolean {
    return this.covered.has(line);
  }

  /**
   * Take over items found elsewhere, e.g. by the search before the loop ran.
   */
  seed(items: readonly EvidenceItem[]): void {
    for (const item of items) {
      this.push(item);
    }
  }

  /**
   * Add every run of consecutive uncovered lines in `ranges` that match.
   * A run never crosses from one section into another.
   *
   * @returns The items added
   */
  scan(ranges: readonly LineRange[], matcher: TermMatcher, source: EvidenceSource): EvidenceItem[] {
    if (matcher.isEmpty) {
      return [];
    }

    const added: EvidenceItem[] = [];
    let run: number[] = [];
    let runSection: string | undefined;

    const close = (): void => {
      const first = run[0];
      const last = run[run.length - 1];
      if (first !== undefined && last !== undefined) {
        const item = this.addRange([first, last], source);
        if (item) {
          added.push(item);
        }
      }
      run = [];
      runSection = undefined;
    };

    for (const line of this.linesOf(ranges)) {
      const text = this.document.lines[line - 1] ?? '';
      const section = sectionAt(this.forest, line);
      const previous = run[run.length - 1];
      if (previous !== undefined && (previous !== line - 1 || section?.id !== runSection)) {
        close();
      }
      if (section && !this.covered.has(line) && matcher.matches(text)) {
        run.push(line);
        runSection = section.id;
      } else {
        close();
      }
    }
    close();
    return added;
  }

  /**
   * Add the uncovered, non-blank lines of `range` as one item.
   *
   * @returns The item, or undefined when nothing was left to add
   */
  addRange(range: LineRange, source: EvidenceSource): EvidenceItem | undefined {
    const lines: number[] = [];
    for (let n = Math.max(1, range[0]); n <= Math.min(range[1], this.document.lines.length); n++) {
      if (!this.covered.has(n) && (this.document.lines[n - 1] ?? '').trim() !== '') {
        lines.push(n);
      }
    }
    const first = lines[0];
    const last = lines[lines.length - 1];
    if (first === undefined || last === undefined) {
      return undefined;
    }

    const section = sectionAt(this.forest, first);
    if (!section) {
      return undefined;
    }

    const item: EvidenceItem = {
      section,
      lineRange: [first, last],
      snippet: makeSnippet(this.document.lines.slice(first - 1, last), this.snippetChars),
      passKind: source,
    };
    this.push(item);
    return item;
  }

  private push(item: EvidenceItem): void {
    this.items.push(item);
    for (let n = item.lineRange[0]; n <= item.lineRange[1]; n++) {
      this.covered.add(n);
    }
  }

  private linesOf(ranges: readonly LineRange[]): number[] {
    const lines = new Set<number>();
    for (const [start, end] of ranges) {
      for (let n = Math.max(1, start); n <= Math.min(end, this.document.lines.length); n++) {
        lines.add(n);
      }
    }
    return [...lines].sort((a, b) => a - b);
  }
}
