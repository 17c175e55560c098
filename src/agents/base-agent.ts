/**
 * BaseAgent - Abstract base class for the model-backed service boundaries.
 *
 * Provides common functionality:
 * - SDK configuration building
 * - Message logging
 * - Error wrapping into ExternalServiceError
 *
 * Each agent runs single-turn, tool-less queries: the navigation loop owns
 * tool dispatch, so the SDK is used purely as a completion endpoint.
 * Timeouts and retries belong to the caller, which passes an AbortSignal.
 *
 * Uses Template Method pattern - subclasses implement specific logic.
 *
 * @module agents/base-agent
 */

import { query, type Options, type SDKMessage } from '@anthropic-ai/claude-agent-sdk';
import { parseSDKMessage, buildSdkEnv, type ParsedSDKMessage } from '../utils/sdk.js';
import { createLogger } from '../utils/logger.js';
import { ExternalServiceError, isTransientMessage, type ExternalService } from '../utils/errors.js';

/**
 * Base configuration for all agents.
 */
export interface BaseAgentConfig {
  /** API key for authentication */
  apiKey: string;
  /** Model identifier */
  model: string;
  /** Optional API base URL */
  apiBaseUrl?: string;
  /** Working directory of the SDK subprocess */
  cwd?: string;
}

/**
 * Built-in SDK tools. None of them may run inside a boundary call.
 */
export const BUILTIN_TOOLS = [
  'Bash',
  'BashOutput',
  'KillShell',
  'Read',
  'Write',
  'Edit',
  'MultiEdit',
  'NotebookEdit',
  'Glob',
  'Grep',
  'WebFetch',
  'WebSearch',
  'Task',
  'TodoWrite',
  'ExitPlanMode',
  'ListMcpResources',
  'ReadMcpResource',
  'SlashCommand',
] as const;

/**
 * Result from iterator yield.
 */
export interface IteratorYieldResult {
  /** Parsed SDK message */
  parsed: ParsedSDKMessage;
  /** Raw SDK message */
  raw: SDKMessage;
}

export abstract class BaseAgent {
  readonly apiKey: string;
  readonly model: string;
  readonly apiBaseUrl?: string;
  readonly cwd?: string;

  protected readonly logger: ReturnType<typeof createLogger>;

  constructor(config: BaseAgentConfig) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.apiBaseUrl = config.apiBaseUrl;
    this.cwd = config.cwd;

    this.logger = createLogger(this.getAgentName());
  }

  /**
   * Get the agent name for logging.
   */
  protected abstract getAgentName(): string;

  /**
   * Which external service this agent stands for, used in errors.
   */
  protected abstract getService(): ExternalService;

  /**
   * Create SDK options for a single-turn, tool-less query.
   */
  protected createSdkOptions(systemPrompt: string, abortController: AbortController): Options {
    const options: Options = {
      systemPrompt,
      maxTurns: 1,
      allowedTools: [],
      disallowedTools: [...BUILTIN_TOOLS],
      permissionMode: 'default',
      abortController,
      env: buildSdkEnv(this.apiKey, this.apiBaseUrl),
    };

    if (this.cwd) {
      options.cwd = this.cwd;
    }
    if (this.model) {
      options.model = this.model;
    }

    return options;
  }

  /**
   * Execute a one-shot query, yielding parsed messages.
   */
  protected async *queryOnce(prompt: string, sdkOptions: Options): AsyncGenerator<IteratorYieldResult> {
    const queryResult = query({ prompt, options: sdkOptions });

    for await (const message of queryResult) {
      const parsed = parseSDKMessage(message);

      this.logger.debug({
        messageType: parsed.type,
        contentLength: parsed.content.length,
        subtype: parsed.metadata?.subtype,
      }, 'SDK message received');

      yield { parsed, raw: message };
    }
  }

  /**
   * Run one prompt and return the model's final text.
   *
   * @param signal - Aborts the underlying query, e.g. on timeout
   * @throws ExternalServiceError when the query fails or ends without a result
   */
  protected async runPrompt(prompt: string, systemPrompt: string, signal?: AbortSignal): Promise<string> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    let streamed = '';
    try {
      for await (const { parsed } of this.queryOnce(prompt, this.createSdkOptions(systemPrompt, controller))) {
        if (parsed.type === 'text') {
          streamed += parsed.content;
        } else if (parsed.type === 'result') {
          return parsed.content || streamed;
        } else if (parsed.type === 'error') {
          throw new ExternalServiceError(parsed.content, {
            service: this.getService(),
            recoverable: true,
          });
        }
      }
    } catch (error) {
      if (error instanceof ExternalServiceError) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ExternalServiceError(`${this.getAgentName()} query failed`, {
        cause,
        service: this.getService(),
        recoverable: isTransientMessage(cause.message),
      });
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    if (streamed) {
      return streamed;
    }
    throw new ExternalServiceError(`${this.getAgentName()} query returned no result`, {
      service: this.getService(),
      recoverable: true,
    });
  }
}
