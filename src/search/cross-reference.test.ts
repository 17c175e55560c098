import { describe, it, expect } from 'vitest';
import { findReferences, resolveReference } from './cross-reference.js';
import { buildForest } from '../document/forest.js';

const forest = buildForest([
  { title: 'ARTICLE 5 - TERMINATION', start_line: 1, end_line: 4, level: 1 },
  { title: '5.2 Termination for Cause', start_line: 2, end_line: 4, level: 2 },
  { title: 'Exhibit B', start_line: 5, end_line: 6, level: 1 },
], 6);

describe('findReferences', () => {
  it('should find numbered and lettered references', () => {
    expect(findReferences('as set out in Section 5.2(a) and Exhibit B; see also section 5.2.')).toEqual([
      { kind: 'section', id: '5.2', text: 'Section 5.2' },
      { kind: 'exhibit', id: 'B', text: 'Exhibit B' },
    ]);
  });

  it('should ignore lowercase letters after a kind word', () => {
    expect(findReferences('Under this section a party may object.')).toEqual([]);
  });

  it('should accept roman numerals and plural kinds', () => {
    expect(findReferences('Articles IV and Schedule 2')).toEqual([
      { kind: 'article', id: 'IV', text: 'Articles IV' },
      { kind: 'schedule', id: '2', text: 'Schedule 2' },
    ]);
  });
});

describe('resolveReference', () => {
  it('should resolve by kind and id', () => {
    expect(resolveReference({ kind: 'article', id: '5', text: 'Article 5' }, forest)?.title).toBe('ARTICLE 5 - TERMINATION');
    expect(resolveReference({ kind: 'exhibit', id: 'B', text: 'Exhibit B' }, forest)?.title).toBe('Exhibit B');
  });

  it('should resolve by section number', () => {
    expect(resolveReference({ kind: 'section', id: '5.2', text: 'Section 5.2' }, forest)?.title)
      .toBe('5.2 Termination for Cause');
  });

  it('should not match a longer number', () => {
    expect(resolveReference({ kind: 'section', id: '5', text: 'Section 5' }, forest)).toBeUndefined();
  });
});
