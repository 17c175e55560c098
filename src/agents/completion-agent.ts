/**
 * CompletionAgent - completion boundary of the navigation loop.
 *
 * @module agents/completion-agent
 */

import { BaseAgent } from './base-agent.js';
import type { ExternalService } from '../utils/errors.js';
import type { CompletionClient, CompletionRequest } from '../types/agent.js';

export class CompletionAgent extends BaseAgent implements CompletionClient {
  protected getAgentName(): string {
    return 'CompletionAgent';
  }

  protected getService(): ExternalService {
    return 'completion';
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    const text = await this.runPrompt(request.prompt, request.system, signal);
    this.logger.debug({ length: text.length }, 'Completion received');
    return text;
  }
}
