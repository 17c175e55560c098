/**
 * Internal references ("Section 5.2", "Exhibit A") and their resolution
 * to sections of a forest.
 *
 * @module search/cross-reference
 */

import type { Section, SectionForest } from '../types/document.js';

export interface SectionReference {
  /** Lowercase kind, e.g. "section" */
  readonly kind: string;
  /** Identifier as written, e.g. "5.2" or "A" */
  readonly id: string;
  /** Matched text, e.g. "Section 5.2" */
  readonly text: string;
}

const REFERENCE =
  /\b(section|article|exhibit|schedule|appendix|annex|clause|paragraph)s?\s+(\d+(?:\.\d+)*[a-z]?|[ivxlc]+|[a-z](?:-\d+)?)\b/gi;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * References in `text`, in order, without duplicates.
 */
export function findReferences(text: string): SectionReference[] {
  const found = new Map<string, SectionReference>();
  for (const match of text.matchAll(REFERENCE)) {
    const [whole, kind, id] = match;
    if (kind === undefined || id === undefined) {
      continue;
    }
    // "this section a party may..." is prose; letter identifiers are written in capitals
    if (/^[a-z]/i.test(id) && !/^[A-Z]/.test(id)) {
      continue;
    }
    const reference = { kind: kind.toLowerCase(), id, text: whole };
    const key = `${reference.kind} ${id.toLowerCase()}`;
    if (!found.has(key)) {
      found.set(key, reference);
    }
  }
  return [...found.values()];
}

/**
 * Section a reference points to: a title naming the kind and id
 * ("ARTICLE 5 - TERMINATION", "Exhibit A"), else a title numbered with
 * the id ("5.2 Termination for Cause").
 */
export function resolveReference(reference: SectionReference, forest: SectionForest): Section | undefined {
  const id = escapeRegExp(reference.id);
  const byKind = new RegExp(`\\b${reference.kind}\\s+${id}(?![\\w]|\\.\\d)`, 'i');
  const byNumber = new RegExp(`^${id}\\.?(?:\\s|$)`, 'i');

  return forest.sections.find(s => byKind.test(s.title))
    ?? forest.sections.find(s => byNumber.test(s.title.trim()));
}
