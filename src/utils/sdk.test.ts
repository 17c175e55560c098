/**
 * Tests for SDK utilities (src/utils/sdk.ts)
 */

import { describe, it, expect } from 'vitest';
import type { SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import { getNodeBinDir, parseSDKMessage, buildSdkEnv, extractJson } from './sdk.js';

/** Builds loosely-shaped SDK messages for parsing tests. */
function message(value: object): SDKMessage {
  return JSON.parse(JSON.stringify(value));
}

describe('getNodeBinDir', () => {
  it('should return the directory of the node executable', () => {
    const dir = getNodeBinDir();
    expect(process.execPath.startsWith(dir)).toBe(true);
  });
});

describe('parseSDKMessage', () => {
  it('should join the text blocks of an assistant message', () => {
    const parsed = parseSDKMessage(message({
      type: 'assistant',
      message: {
        content: [
          { type: 'text', text: 'Hello ' },
          { type: 'tool_use', id: 't1', name: 'Read', input: {} },
          { type: 'text', text: 'world' },
        ],
      },
    }));

    expect(parsed).toEqual({ type: 'text', content: 'Hello world' });
  });

  it('should return the result of a successful query', () => {
    const parsed = parseSDKMessage(message({
      type: 'result',
      subtype: 'success',
      result: 'final text',
      total_cost_usd: 0.02,
      num_turns: 1,
    }));

    expect(parsed).toEqual({
      type: 'result',
      content: 'final text',
      metadata: { subtype: 'success', costUsd: 0.02, turns: 1 },
    });
  });

  it('should report a failed query as an error', () => {
    const parsed = parseSDKMessage(message({
      type: 'result',
      subtype: 'error_max_turns',
      total_cost_usd: 0,
      num_turns: 1,
    }));

    expect(parsed.type).toBe('error');
    expect(parsed.content).toBe('Query ended with error_max_turns');
  });

  it('should ignore other message types', () => {
    expect(parseSDKMessage(message({ type: 'system', subtype: 'init' }))).toEqual({ type: 'ignored', content: '' });
  });
});

describe('buildSdkEnv', () => {
  it('should set the key and prepend the node directory to PATH', () => {
    const env = buildSdkEnv('test-secret', undefined, { PATH: '/usr/bin', HOME: '/home/test', UNSET: undefined });

    expect(env.ANTHROPIC_API_KEY).toBe('test-secret');
    expect(env.PATH).toBe(`${getNodeBinDir()}:/usr/bin`);
    expect(env.HOME).toBe('/home/test');
    expect('UNSET' in env).toBe(false);
    expect('ANTHROPIC_BASE_URL' in env).toBe(false);
  });

  it('should set the base URL when given', () => {
    const env = buildSdkEnv('test-secret', 'https://api.example.invalid', {});
    expect(env.ANTHROPIC_BASE_URL).toBe('https://api.example.invalid');
  });
});

describe('extractJson', () => {
  it('should prefer a fenced json block', () => {
    expect(extractJson('Result:\n```json\n{"a": 1}\n```\nand [2]')).toEqual({ a: 1 });
  });

  it('should find a bare array in prose', () => {
    expect(extractJson('The sections are [1, 2, 3] as requested.')).toEqual([1, 2, 3]);
  });

  it('should fall back to an object when the array slice does not parse', () => {
    expect(extractJson('{"note": "see [x"}')).toEqual({ note: 'see [x' });
  });

  it('should return undefined when nothing parses', () => {
    expect(extractJson('no json here')).toBeUndefined();
    expect(extractJson('[broken')).toBeUndefined();
  });
});
