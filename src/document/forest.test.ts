import { describe, it, expect } from 'vitest';
import {
  buildForest,
  childrenOf,
  fallbackForest,
  isWithin,
  parseStoredForest,
  renderOutline,
  sectionAt,
} from './forest.js';
import { ValidationError } from '../utils/errors.js';

const RAW = [
  { title: 'RECITALS', start_line: 1, end_line: 9, level: 1 },
  { title: '1. DEFINITIONS', start_line: 10, end_line: 29, level: 1 },
  { title: '1.1 Products', start_line: 12, end_line: 20, level: 2 },
  { title: '1.2 Territory', start_line: 21, end_line: 29, level: 2 },
  { title: '2. TERMINATION', start_line: 30, end_line: 40, level: 1 },
];

describe('buildForest', () => {
  it('should nest sections by level', () => {
    const forest = buildForest(RAW, 40);

    expect(forest.fallback).toBe(false);
    expect(forest.sections.map(s => [s.id, s.parentId])).toEqual([
      ['s1', null],
      ['s2', null],
      ['s3', 's2'],
      ['s4', 's2'],
      ['s5', null],
    ]);
  });

  it('should trim titles', () => {
    const forest = buildForest([{ title: '  PAYMENT ', start_line: 1, end_line: 2, level: 1 }], 2);
    expect(forest.sections[0]?.title).toBe('PAYMENT');
  });

  it('should reject start_line > end_line', () => {
    const raw = [{ title: 'BROKEN', start_line: 8, end_line: 3, level: 1 }];
    expect(() => buildForest(raw, 10)).toThrow(ValidationError);
    expect(() => buildForest(raw, 10)).toThrow('start_line 8 > end_line 3');
  });

  it('should reject out-of-bounds lines', () => {
    expect(() => buildForest([{ title: 'A', start_line: 1, end_line: 11, level: 1 }], 10))
      .toThrow('outside 1-10');
    expect(() => buildForest([{ title: 'A', start_line: 0, end_line: 4, level: 1 }], 10))
      .toThrow('outside 1-10');
  });

  it('should reject non-monotonic ordering', () => {
    const raw = [
      { title: 'B', start_line: 5, end_line: 9, level: 1 },
      { title: 'A', start_line: 1, end_line: 4, level: 1 },
    ];
    expect(() => buildForest(raw, 10)).toThrow('starts before the preceding section');
  });

  it('should reject overlapping siblings', () => {
    const raw = [
      { title: 'A', start_line: 1, end_line: 5, level: 1 },
      { title: 'B', start_line: 5, end_line: 9, level: 1 },
    ];
    expect(() => buildForest(raw, 10)).toThrow('overlaps its preceding sibling');
  });

  it('should reject a child escaping its parent', () => {
    const raw = [
      { title: 'A', start_line: 1, end_line: 5, level: 1 },
      { title: 'A.1', start_line: 4, end_line: 8, level: 2 },
    ];
    expect(() => buildForest(raw, 10)).toThrow('escapes its parent');
  });

  it('should reject malformed shapes', () => {
    expect(() => buildForest([], 10)).toThrow(ValidationError);
    expect(() => buildForest([{ title: '', start_line: 1, end_line: 2, level: 1 }], 10)).toThrow(ValidationError);
    expect(() => buildForest({ sections: 'nope' }, 10)).toThrow('Invalid section list');
  });
});

describe('fallbackForest', () => {
  it('should span the whole document', () => {
    const forest = fallbackForest(120);

    expect(forest.fallback).toBe(true);
    expect(forest.sections).toEqual([
      { id: 's1', title: 'Full Document', level: 1, startLine: 1, endLine: 120, parentId: null },
    ]);
  });
});

describe('lookups', () => {
  const forest = buildForest(RAW, 40);

  it('should find the deepest containing section', () => {
    expect(sectionAt(forest, 15)?.title).toBe('1.1 Products');
    expect(sectionAt(forest, 10)?.title).toBe('1. DEFINITIONS');
    expect(sectionAt(forest, 41)).toBeUndefined();
  });

  it('should list children', () => {
    expect(childrenOf(forest, 's2').map(s => s.title)).toEqual(['1.1 Products', '1.2 Territory']);
  });

  it('should test ancestry', () => {
    const [, definitions, products, , termination] = forest.sections;
    if (!definitions || !products || !termination) {
      throw new Error('fixture');
    }
    expect(isWithin(forest, products, definitions)).toBe(true);
    expect(isWithin(forest, termination, definitions)).toBe(false);
  });
});

describe('parseStoredForest', () => {
  it('should accept a serialized forest', () => {
    const forest = buildForest(RAW, 40);
    const restored = parseStoredForest(JSON.parse(JSON.stringify(forest)));

    expect(restored).toEqual(forest);
  });

  it('should reject garbage', () => {
    expect(parseStoredForest({ sections: [] })).toBeNull();
  });
});

describe('renderOutline', () => {
  it('should indent by level', () => {
    const forest = buildForest(RAW.slice(1, 3), 40);

    expect(renderOutline(forest)).toBe(
      'Document structure (2 sections, 40 lines):\n' +
      '- 1. DEFINITIONS [lines 10-29]\n' +
      '  - 1.1 Products [lines 12-20]'
    );
  });

  it('should flag the fallback', () => {
    expect(renderOutline(fallbackForest(3))).toBe(
      'Document structure unavailable; treating all 3 lines as one section:\n' +
      '- Full Document [lines 1-3]'
    );
  });
});
