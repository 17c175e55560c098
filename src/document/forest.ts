/**
 * Section forest construction, validation and lookup.
 *
 * Extraction output is untrusted: `buildForest` checks every structural
 * invariant and throws ValidationError on the first violation. Callers
 * turn that into the single-section fallback.
 *
 * @module document/forest
 */

import { z } from 'zod';
import { SEGMENTATION } from '../config/constants.js';
import { ValidationError } from '../utils/errors.js';
import type { RawSection, Section, SectionForest } from '../types/document.js';

export const RawSectionSchema = z.object({
  title: z.string().trim().min(1),
  start_line: z.number().int(),
  end_line: z.number().int(),
  level: z.number().int().min(1),
});

export const RawSectionListSchema = z.array(RawSectionSchema).min(1);

const SectionSchema = z.object({
  id: z.string(),
  title: z.string(),
  level: z.number().int().min(1),
  startLine: z.number().int().min(1),
  endLine: z.number().int().min(1),
  parentId: z.string().nullable(),
});

export const SectionForestSchema = z.object({
  sections: z.array(SectionSchema).min(1),
  lineCount: z.number().int().min(0),
  fallback: z.boolean(),
});

function freezeForest(sections: Section[], lineCount: number, fallback: boolean): SectionForest {
  return Object.freeze({
    sections: Object.freeze(sections.map(s => Object.freeze(s))),
    lineCount,
    fallback,
  });
}

/**
 * Single root section spanning the whole document.
 */
export function fallbackForest(lineCount: number): SectionForest {
  return freezeForest(
    [{
      id: 's1',
      title: SEGMENTATION.FALLBACK_TITLE,
      level: 1,
      startLine: 1,
      endLine: Math.max(1, lineCount),
      parentId: null,
    }],
    lineCount,
    true
  );
}

/**
 * Validate an extraction response and nest it into a forest.
 *
 * Sections must arrive in document order. Nesting follows `level`: a
 * section becomes the child of the closest preceding section with a
 * smaller level.
 *
 * @throws ValidationError on shape errors, inverted or out-of-bounds
 *   ranges, non-monotonic ordering, overlapping siblings or a child
 *   escaping its parent
 */
export function buildForest(raw: unknown, lineCount: number): SectionForest {
  const parsed = RawSectionListSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid section list: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'unknown shape'}`,
      'sections'
    );
  }

  const sections: Section[] = [];
  const stack: Section[] = [];
  const lastChildEnd = new Map<string, number>();
  let previousStart = 0;

  parsed.data.forEach((rawSection: RawSection, index) => {
    const field = `sections.${index}`;
    const { start_line: start, end_line: end } = rawSection;

    if (start > end) {
      throw new ValidationError(`Section "${rawSection.title}" has start_line ${start} > end_line ${end}`, field, rawSection);
    }
    if (start < 1 || end > lineCount) {
      throw new ValidationError(
        `Section "${rawSection.title}" range ${start}-${end} is outside 1-${lineCount}`,
        field,
        rawSection
      );
    }
    if (start < previousStart) {
      throw new ValidationError(`Section "${rawSection.title}" starts before the preceding section`, field, rawSection);
    }
    previousStart = start;

    while (stack.length > 0 && (stack[stack.length - 1]?.level ?? 0) >= rawSection.level) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];

    if (parent && (start < parent.startLine || end > parent.endLine)) {
      throw new ValidationError(
        `Section "${rawSection.title}" escapes its parent "${parent.title}"`,
        field,
        rawSection
      );
    }

    const siblingKey = parent?.id ?? '';
    const siblingEnd = lastChildEnd.get(siblingKey);
    if (siblingEnd !== undefined && start <= siblingEnd) {
      throw new ValidationError(`Section "${rawSection.title}" overlaps its preceding sibling`, field, rawSection);
    }
    lastChildEnd.set(siblingKey, end);

    const section: Section = {
      id: `s${index + 1}`,
      title: rawSection.title.trim(),
      level: rawSection.level,
      startLine: start,
      endLine: end,
      parentId: parent?.id ?? null,
    };
    sections.push(section);
    stack.push(section);
  });

  return freezeForest(sections, lineCount, false);
}

/**
 * Check a previously serialized forest, e.g. one read back from the cache file.
 */
export function parseStoredForest(value: unknown): SectionForest | null {
  const parsed = SectionForestSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  return freezeForest(parsed.data.sections, parsed.data.lineCount, parsed.data.fallback);
}

export function childrenOf(forest: SectionForest, parentId: string | null): Section[] {
  return forest.sections.filter(s => s.parentId === parentId);
}

/**
 * Deepest section containing the line, if any.
 */
export function sectionAt(forest: SectionForest, line: number): Section | undefined {
  let found: Section | undefined;
  for (const section of forest.sections) {
    if (section.startLine <= line && line <= section.endLine) {
      if (!found || section.level >= found.level) {
        found = section;
      }
    }
  }
  return found;
}

/**
 * Whether `inner` is `outer` or one of its descendants.
 */
export function isWithin(forest: SectionForest, inner: Section, outer: Section): boolean {
  let current: Section | undefined = inner;
  while (current) {
    if (current.id === outer.id) {
      return true;
    }
    const parentId: string | null = current.parentId;
    current = parentId ? forest.sections.find(s => s.id === parentId) : undefined;
  }
  return false;
}

/**
 * Indented outline with line ranges, one section per line.
 */
export function renderOutline(forest: SectionForest): string {
  const rows = forest.sections.map(
    s => `${'  '.repeat(s.level - 1)}- ${s.title} [lines ${s.startLine}-${s.endLine}]`
  );
  const header = forest.fallback
    ? `Document structure unavailable; treating all ${forest.lineCount} lines as one section:`
    : `Document structure (${forest.sections.length} sections, ${forest.lineCount} lines):`;
  return [header, ...rows].join('\n');
}
