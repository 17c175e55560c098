/**
 * Tests for the tool registry and the document tools.
 */

import { describe, it, expect } from 'vitest';
import { createDocument } from '../document/document.js';
import { buildForest } from '../document/forest.js';
import { dispatch, validateCall, requiredArguments, describeTools, isToolName } from './registry.js';
import type { ToolContext } from './types.js';

const document = createDocument([
  'SERVICE AGREEMENT',
  'Parties: Acme and Beta.',
  '1. TERM',
  'The term is two years.',
  '2. TERMINATION',
  'Either party may terminate on notice.',
  'Termination for cause is immediate.',
].join('\n'));

const forest = buildForest([
  { title: 'SERVICE AGREEMENT', start_line: 1, end_line: 2, level: 1 },
  { title: '1. TERM', start_line: 3, end_line: 4, level: 1 },
  { title: '2. TERMINATION', start_line: 5, end_line: 7, level: 1 },
], 7);

function context(overrides: Partial<ToolContext> = {}): ToolContext {
  return {
    document,
    forest,
    shell: { allowlist: ['ls'], timeoutMs: 1000, maxOutputChars: 100, cwd: '/tmp' },
    maxReadLines: 400,
    ...overrides,
  };
}

describe('validateCall', () => {
  it('should reject unknown tools', () => {
    expect(validateCall({ name: 'delete_file', arguments: {} })).toEqual({ ok: false, error: 'Unknown tool: delete_file' });
  });

  it('should coerce numeric arguments', () => {
    expect(validateCall({ name: 'read_lines', arguments: { start: '3', end: '4' } })).toEqual({
      ok: true,
      call: { tool: 'read_lines', args: { start: 3, end: 4 } },
    });
  });

  it('should apply the default search context', () => {
    expect(validateCall({ name: 'search_document', arguments: { pattern: 'notice' } })).toEqual({
      ok: true,
      call: { tool: 'search_document', args: { pattern: 'notice', context: 2 } },
    });
  });

  it('should report schema violations', () => {
    const result = validateCall({ name: 'search_document', arguments: { pattern: 'x', context: '50' } });
    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.startsWith('Invalid arguments for search_document: context:')).toBe(true);
  });
});

describe('requiredArguments', () => {
  it('should list the required arguments of each tool', () => {
    expect(requiredArguments('read_lines')).toEqual(['start', 'end']);
    expect(requiredArguments('search_document')).toEqual(['pattern']);
    expect(requiredArguments('get_structure')).toEqual([]);
    expect(requiredArguments('list_files')).toEqual(['command']);
  });

  it('should recognize registered names only', () => {
    expect(isToolName('read_lines')).toBe(true);
    expect(isToolName('Read')).toBe(false);
  });
});

describe('read_lines', () => {
  it('should return numbered rows and a footer', async () => {
    const result = await dispatch({ name: 'read_lines', arguments: { start: '5', end: '6' } }, context());

    expect(result).toEqual({
      ok: true,
      content: '     5 | 2. TERMINATION\n     6 | Either party may terminate on notice.\n[Read lines 5-6 of 7 total]',
      range: [5, 6],
    });
  });

  it('should clamp the end to the document length', async () => {
    const result = await dispatch({ name: 'read_lines', arguments: { start: '6', end: '99' } }, context());

    expect(result.range).toEqual([6, 7]);
    expect(result.content.split('\n').pop()).toBe('[Read lines 6-7 of 7 total]');
  });

  it('should cap the number of lines per call', async () => {
    const result = await dispatch({ name: 'read_lines', arguments: { start: '1', end: '7' } }, context({ maxReadLines: 2 }));
    expect(result.range).toEqual([1, 2]);
  });

  it('should fail on an inverted range', async () => {
    const result = await dispatch({ name: 'read_lines', arguments: { start: '4', end: '2' } }, context());
    expect(result).toEqual({ ok: false, content: 'Invalid range: start 4 > end 2' });
  });

  it('should fail when start is past the last line', async () => {
    const result = await dispatch({ name: 'read_lines', arguments: { start: '9', end: '12' } }, context());
    expect(result).toEqual({ ok: false, content: 'Invalid range: start 9 is past the end of the document (7 lines)' });
  });

  it('should fail on non-numeric arguments', async () => {
    const result = await dispatch({ name: 'read_lines', arguments: { start: 'abc', end: '3' } }, context());
    expect(result.ok).toBe(false);
    expect(result.content.startsWith('Invalid arguments for read_lines: start:')).toBe(true);
  });
});

describe('get_structure', () => {
  it('should render the outline', async () => {
    const result = await dispatch({ name: 'get_structure', arguments: {} }, context());

    expect(result).toEqual({
      ok: true,
      content: [
        'Document structure (3 sections, 7 lines):',
        '- SERVICE AGREEMENT [lines 1-2]',
        '- 1. TERM [lines 3-4]',
        '- 2. TERMINATION [lines 5-7]',
      ].join('\n'),
    });
  });
});

describe('search_document', () => {
  it('should list every case-insensitive match with its section', async () => {
    const result = await dispatch(
      { name: 'search_document', arguments: { pattern: 'terminat', context: '0' } },
      context()
    );
    const blocks = result.content.split('\n\n');

    expect(result.ok).toBe(true);
    expect(blocks[0]).toBe('Found 3 matches for "terminat"');
    expect(blocks[1]).toBe('Match at line 5 (section: 2. TERMINATION [lines 5-7]):\n>     5 | 2. TERMINATION');
    expect(blocks).toHaveLength(4);
  });

  it('should show surrounding lines', async () => {
    const result = await dispatch({ name: 'search_document', arguments: { pattern: 'term is' } }, context());

    expect(result.content).toBe([
      'Found 1 match for "term is"',
      '',
      'Match at line 4 (section: 1. TERM [lines 3-4]):',
      '      2 | Parties: Acme and Beta.',
      '      3 | 1. TERM',
      '>     4 | The term is two years.',
      '      5 | 2. TERMINATION',
      '      6 | Either party may terminate on notice.',
    ].join('\n'));
  });

  it('should report when nothing matches', async () => {
    const result = await dispatch({ name: 'search_document', arguments: { pattern: 'arbitration' } }, context());
    expect(result).toEqual({ ok: true, content: 'No matches for "arbitration"' });
  });
});

describe('describeTools', () => {
  it('should document every tool with an example', () => {
    const text = describeTools();

    expect(text).toContain('get_structure: Show the table of contents with the line range of every section.\n  (no arguments)');
    expect(text).toContain('  - context (optional): lines of context around each match (0-10)');
    expect(text).toContain('  Example: <read_lines><start>120</start><end>140</end></read_lines>');
  });
});
