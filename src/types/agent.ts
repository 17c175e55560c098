/**
 * Types of the navigation loop and its completion boundary.
 */

import type { CoverageVerdict, EvidenceItem } from './document.js';

/**
 * States of the think/act/observe machine.
 */
export type LoopState = 'THINKING' | 'ACTING' | 'OBSERVING' | 'COMPLETE' | 'ABORTED';

export type TerminalState = Extract<LoopState, 'COMPLETE' | 'ABORTED'>;

/**
 * Why an aborted loop stopped.
 */
export type AbortReason = 'iteration_budget' | 'cancelled' | 'service_unavailable';

/**
 * A structured tool invocation, consumed exactly once.
 */
export interface ToolCall {
  readonly name: string;
  readonly arguments: Readonly<Record<string, string>>;
}

export type TranscriptRecord =
  | { readonly kind: 'think'; readonly iteration: number; readonly text: string }
  | { readonly kind: 'act'; readonly iteration: number; readonly call: ToolCall }
  | {
      readonly kind: 'observe';
      readonly iteration: number;
      /** Tool name, or "parser" for diagnostics */
      readonly source: string;
      readonly ok: boolean;
      readonly content: string;
    };

/**
 * Per-question mutable loop state. Owned by exactly one run.
 */
export interface AgentState {
  iteration: number;
  state: LoopState;
  readonly transcript: TranscriptRecord[];
  readonly evidence: EvidenceItem[];
  answerText?: string;
  abortReason?: AbortReason;
}

/**
 * Final answer of one question.
 */
export interface Answer {
  readonly question: string;
  readonly answerText: string;
  readonly coverageVerdict: CoverageVerdict;
  readonly evidence: readonly EvidenceItem[];
  readonly iterationsUsed: number;
  readonly status: TerminalState;
  readonly abortReason?: AbortReason;
}

/**
 * Result of `Navigator.ask`: an answer, or the one fatal failure.
 */
export type AskResult =
  | { readonly ok: true; readonly answer: Answer }
  | { readonly ok: false; readonly error: Error };

export interface CompletionRequest {
  /** System instructions */
  system: string;
  /** Rendered transcript */
  prompt: string;
}

/**
 * Completion boundary: one request, one text block.
 */
export interface CompletionClient {
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;
}
