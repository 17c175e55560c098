/**
 * Shared utilities for Claude Agent SDK integration.
 */
import type { SDKMessage } from '@anthropic-ai/claude-agent-sdk';

/**
 * Condensed view of one SDK message.
 */
export interface ParsedSDKMessage {
  type: 'text' | 'result' | 'error' | 'ignored';
  content: string;
  metadata?: {
    subtype?: string;
    costUsd?: number;
    turns?: number;
  };
}

/**
 * Get directory containing node executable.
 * This is needed for SDK subprocess spawning to find node.
 */
export function getNodeBinDir(): string {
  const { execPath } = process;
  return execPath.substring(0, execPath.lastIndexOf('/'));
}

/**
 * Parse an SDK message into its text and result metadata.
 *
 * Assistant messages contribute the concatenation of their text blocks;
 * the final `result` message carries the whole answer on success.
 */
export function parseSDKMessage(message: SDKMessage): ParsedSDKMessage {
  switch (message.type) {
    case 'assistant': {
      const content = message.message?.content;
      if (!Array.isArray(content)) {
        return { type: 'ignored', content: '' };
      }
      const text = content
        .map((block: { type: string; text?: unknown }) =>
          block.type === 'text' && typeof block.text === 'string' ? block.text : '')
        .join('');
      return { type: 'text', content: text };
    }

    case 'result': {
      const metadata = {
        subtype: message.subtype,
        costUsd: message.total_cost_usd,
        turns: message.num_turns,
      };
      if (message.subtype === 'success') {
        return { type: 'result', content: message.result, metadata };
      }
      return { type: 'error', content: `Query ended with ${message.subtype}`, metadata };
    }

    default:
      return { type: 'ignored', content: '' };
  }
}

/**
 * Build the environment for the SDK subprocess.
 *
 * Unset variables are dropped so the result is a plain string map.
 */
export function buildSdkEnv(
  apiKey: string,
  apiBaseUrl?: string,
  baseEnv: Record<string, string | undefined> = process.env
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  env.ANTHROPIC_API_KEY = apiKey;
  env.PATH = `${getNodeBinDir()}:${baseEnv.PATH || ''}`;

  if (apiBaseUrl) {
    env.ANTHROPIC_BASE_URL = apiBaseUrl;
  }

  return env;
}

/**
 * Pull a JSON value out of model text: the first ```json fenced block,
 * else the outermost array or object in the text.
 *
 * @returns The parsed value, or undefined if nothing parses
 */
export function extractJson(text: string): unknown {
  const candidates: string[] = [];
  const fenced = text.match(/```(?:json)?\s*\n([\s\S]*?)\n?```/);
  if (fenced?.[1]) {
    candidates.push(fenced[1]);
  }
  for (const [open, close] of [['[', ']'], ['{', '}']] as const) {
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start !== -1 && end > start) {
      candidates.push(text.slice(start, end + 1));
    }
  }

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return undefined;
}
