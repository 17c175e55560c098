/**
 * Tests for Output Adapter (src/utils/output-adapter.ts)
 */

import { Writable } from 'stream';
import { describe, it, expect } from 'vitest';
import { ConsoleOutputAdapter, colorText } from './output-adapter.js';

function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('ConsoleOutputAdapter', () => {
  it('should write lines to stdout without color when disabled', () => {
    const out = sink();
    const err = sink();
    const adapter = new ConsoleOutputAdapter({ color: false, stdout: out.stream, stderr: err.stream });

    adapter.write('Answer', 'heading');
    adapter.write('Sixty days.');

    expect(out.text()).toBe('Answer\nSixty days.\n');
    expect(err.text()).toBe('');
  });

  it('should send errors, warnings and progress to stderr', () => {
    const out = sink();
    const err = sink();
    const adapter = new ConsoleOutputAdapter({ color: false, stdout: out.stream, stderr: err.stream });

    adapter.write('Error: missing file', 'error');
    adapter.write('Config file not found', 'warning');
    adapter.write('[1/2] Q1', 'progress');

    expect(err.text()).toBe('Error: missing file\nConfig file not found\n[1/2] Q1\n');
    expect(out.text()).toBe('');
  });

  it('should colorize by kind but never colorize data', () => {
    const out = sink();
    const adapter = new ConsoleOutputAdapter({ color: true, stdout: out.stream, stderr: sink().stream });

    adapter.write('CONFIDENT', 'success');
    adapter.write('{"a":1}', 'data');

    expect(out.text()).toBe(`${colorText('CONFIDENT', 'green')}\n{"a":1}\n`);
  });
});
