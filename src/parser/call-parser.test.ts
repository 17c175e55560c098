/**
 * Tests for the call parser (src/parser/call-parser.ts)
 */

import { describe, it, expect } from 'vitest';
import { parseToolCalls, toMalformedToolCallError } from './call-parser.js';
import { MalformedToolCallError } from '../utils/errors.js';

describe('parseToolCalls', () => {
  it('should parse a single well-formed call', () => {
    const result = parseToolCalls('<read_lines><start>120</start><end>140</end></read_lines>');

    expect(result).toEqual({
      calls: [{ name: 'read_lines', arguments: { start: '120', end: '140' } }],
      diagnostics: [],
    });
  });

  it('should keep document order across several blocks', () => {
    const result = parseToolCalls([
      'Let me look at the outline first.',
      '<get_structure></get_structure>',
      '<search_document><pattern>terminate</pattern></search_document>',
      '<read_lines>',
      '  <start>1</start>',
      '  <end>5</end>',
      '</read_lines>',
    ].join('\n'));

    expect(result.calls.map(c => c.name)).toEqual(['get_structure', 'search_document', 'read_lines']);
    expect(result.calls[2]?.arguments).toEqual({ start: '1', end: '5' });
  });

  it('should exclude a block missing a required argument', () => {
    const result = parseToolCalls('<read_lines><start>10</start></read_lines>');

    expect(result.calls).toEqual([]);
    expect(result.diagnostics).toEqual([{
      kind: 'missing_argument',
      tool: 'read_lines',
      message: 'read_lines is missing required argument(s): end',
      fragment: '<read_lines><start>10</start></read_lines>',
    }]);
  });

  it('should still return the valid calls next to a malformed one', () => {
    const result = parseToolCalls(
      '<read_lines><start>1</start></read_lines><search_document><pattern>fee</pattern></search_document>'
    );

    expect(result.calls).toEqual([{ name: 'search_document', arguments: { pattern: 'fee' } }]);
    expect(result.diagnostics.map(d => d.kind)).toEqual(['missing_argument']);
  });

  it('should report unknown tools', () => {
    const result = parseToolCalls('<delete_file><path>contract.txt</path></delete_file>');

    expect(result.calls).toEqual([]);
    expect(result.diagnostics[0]?.kind).toBe('unknown_tool');
    expect(result.diagnostics[0]?.message).toBe('Unknown tool: delete_file');
  });

  it('should treat inline markup as prose', () => {
    const result = parseToolCalls('The <b>notice period</b> matters. <get_structure></get_structure>');

    expect(result.diagnostics).toEqual([]);
    expect(result.calls).toEqual([{ name: 'get_structure', arguments: {} }]);
  });

  it('should reject a nested block of the same name', () => {
    const result = parseToolCalls(
      '<read_lines><read_lines><start>1</start><end>2</end></read_lines></read_lines>'
    );

    expect(result.calls).toEqual([]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.kind).toBe('malformed_block');
    expect(result.diagnostics[0]?.message).toBe('Nested <read_lines> inside <read_lines> block');
  });

  it('should reject an unterminated block', () => {
    const result = parseToolCalls('<read_lines><start>1</start><end>2</end>');

    expect(result.calls).toEqual([]);
    expect(result.diagnostics).toEqual([{
      kind: 'malformed_block',
      tool: 'read_lines',
      message: 'Unterminated <read_lines> block: missing </read_lines>',
      fragment: '<read_lines><start>1</start><end>2</end>',
    }]);
  });

  it('should accept a self-closing tag for a tool without arguments', () => {
    expect(parseToolCalls('Let me look. <get_structure/>')).toEqual({
      calls: [{ name: 'get_structure', arguments: {} }],
      diagnostics: [],
    });
    expect(parseToolCalls('<get_structure />').calls).toEqual([{ name: 'get_structure', arguments: {} }]);
  });

  it('should report a self-closing tag for a tool that needs arguments', () => {
    expect(parseToolCalls('<read_lines/>')).toEqual({
      calls: [],
      diagnostics: [{
        kind: 'missing_argument',
        tool: 'read_lines',
        message: 'read_lines is missing required argument(s): start, end',
        fragment: '<read_lines/>',
      }],
    });
  });

  it('should report arguments passed as attributes', () => {
    const result = parseToolCalls('Reading. <read_lines start="1" end="5"></read_lines> Then <get_structure depth="2"/>');

    expect(result.calls).toEqual([]);
    expect(result.diagnostics).toEqual([
      {
        kind: 'malformed_block',
        tool: 'read_lines',
        message: '<read_lines> takes its arguments as child tags, not attributes',
        fragment: '<read_lines start="1" end="5"></read_lines>',
      },
      {
        kind: 'malformed_block',
        tool: 'get_structure',
        message: '<get_structure> takes its arguments as child tags, not attributes',
        fragment: '<get_structure depth="2"/>',
      },
    ]);
  });

  it('should report an empty self-closing answer', () => {
    const result = parseToolCalls('<answer/>');

    expect(result.answer).toBeUndefined();
    expect(result.diagnostics.map(d => d.kind)).toEqual(['malformed_block']);
  });

  it('should leave tags with attributes in prose alone', () => {
    expect(parseToolCalls('See <a href="https://example.com">the filing</a> and <br/> below.'))
      .toEqual({ calls: [], diagnostics: [] });
  });

  it('should extract the answer', () => {
    const result = parseToolCalls('<thinking>Done.</thinking>\n<answer>\nEither party may terminate on 30 days notice.\n</answer>');

    expect(result.answer).toBe('Either party may terminate on 30 days notice.');
    expect(result.calls).toEqual([]);
  });

  it('should ignore calls written inside thinking blocks', () => {
    const result = parseToolCalls(
      '<thinking>Maybe <read_lines><start>1</start><end>2</end></read_lines> later.</thinking>'
    );

    expect(result).toEqual({ calls: [], diagnostics: [] });
  });

  it('should unescape entities in argument values', () => {
    const result = parseToolCalls('<search_document><pattern>Smith &amp; Sons</pattern></search_document>');
    expect(result.calls[0]?.arguments.pattern).toBe('Smith & Sons');
  });

  it('should return nothing for plain text', () => {
    expect(parseToolCalls('I need to think about this more.')).toEqual({ calls: [], diagnostics: [] });
  });

  it('should shorten long fragments', () => {
    const result = parseToolCalls(`<read_lines><start>1</start>${'x'.repeat(300)}</read_lines>`);
    expect(result.diagnostics[0]?.fragment).toHaveLength(203);
  });
});

describe('toMalformedToolCallError', () => {
  it('should carry the kind and fragment', () => {
    const [diagnostic] = parseToolCalls('<read_lines><start>1</start></read_lines>').diagnostics;
    expect(diagnostic).toBeDefined();
    if (!diagnostic) return;

    const error = toMalformedToolCallError(diagnostic);

    expect(error).toBeInstanceOf(MalformedToolCallError);
    expect(error.kind).toBe('missing_argument');
    expect(error.fragment).toBe('<read_lines><start>1</start></read_lines>');
  });
});
