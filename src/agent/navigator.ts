/**
 * Navigator - the think/act/observe loop over one document.
 *
 * The loop is an explicit state machine with a bounded step counter:
 *
 * ```
 * THINKING --> ACTING --> OBSERVING --> THINKING
 *    |                        |
 *    +--> ABORTED             +--> COMPLETE
 * ```
 *
 * Only THINKING increments the counter, and it checks the cap and the
 * abort signal before doing so, so a run never uses more than
 * `maxIterations` completions and cancellation takes effect between
 * iterations.
 *
 * Before the first iteration the question goes through segmentation and
 * the multi-pass search; their evidence seeds the answer, so a run that
 * aborts in its first THINKING step still answers from it. A signal that
 * is already aborted when `run` starts skips segmentation altogether.
 *
 * @module agent/navigator
 */

import { createLogger } from '../utils/logger.js';
import { ExternalServiceError, formatError } from '../utils/errors.js';
import { retry, withTimeout } from '../utils/retry.js';
import { COMPLETION, NAVIGATION, READ_TOOL, SEARCH, SHELL_TOOL } from '../config/constants.js';
import { loadDocument } from '../document/document.js';
import { SearchOrchestrator } from '../search/orchestrator.js';
import { EvidenceCollector } from '../search/evidence.js';
import { TermMatcher, domainTerms } from '../search/keywords.js';
import { parseToolCalls, toMalformedToolCallError, type ParseResult } from '../parser/call-parser.js';
import { dispatch } from '../tools/registry.js';
import { buildPassPlan, buildSystemPrompt, buildTurnPrompt } from './prompt-builder.js';
import { cancelledAnswer, synthesizeAnswer } from './answer.js';
import type { ShellToolSettings, ToolContext } from '../tools/types.js';
import type { Document, SectionForest } from '../types/document.js';
import type {
  AbortReason,
  AgentState,
  Answer,
  AskResult,
  CompletionClient,
  LoopState,
  TranscriptRecord,
} from '../types/agent.js';

const logger = createLogger('Navigator');

/**
 * Source of section forests; `DocumentSegmenter` in production.
 */
export interface ForestSource {
  segment(document: Document): Promise<SectionForest>;
}

export interface NavigatorDeps {
  completion: CompletionClient;
  segmenter: ForestSource;
  search?: SearchOrchestrator;
}

export interface NavigatorOptions {
  /** Default iteration cap of `run` */
  maxIterations?: number;
  /** Per-call completion timeout */
  timeoutMs?: number;
  /** Completion retries after the first attempt */
  maxRetries?: number;
  /** First backoff delay; tests set 0 */
  initialRetryDelayMs?: number;
  maxObservationChars?: number;
  /** Evidence items carried into the answer */
  maxEvidence?: number;
  snippetChars?: number;
  maxReadLines?: number;
  shell?: Partial<ShellToolSettings>;
}

export interface RunOptions {
  maxIterations?: number;
  /** Checked between iterations */
  signal?: AbortSignal;
}

const NO_TURN: ParseResult = { calls: [], diagnostics: [] };

export class Navigator {
  private readonly completion: CompletionClient;
  private readonly segmenter: ForestSource;
  private readonly search: SearchOrchestrator;
  private readonly systemPrompt = buildSystemPrompt();
  private readonly maxIterations: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialRetryDelayMs: number;
  private readonly maxObservationChars: number;
  private readonly maxEvidence: number;
  private readonly snippetChars: number;
  private readonly maxReadLines: number;
  private readonly shell: ShellToolSettings;

  constructor(deps: NavigatorDeps, options: NavigatorOptions = {}) {
    this.completion = deps.completion;
    this.segmenter = deps.segmenter;
    this.search = deps.search ?? new SearchOrchestrator();
    this.maxIterations = options.maxIterations ?? NAVIGATION.MAX_ITERATIONS;
    this.timeoutMs = options.timeoutMs ?? COMPLETION.TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? COMPLETION.MAX_RETRIES;
    this.initialRetryDelayMs = options.initialRetryDelayMs ?? COMPLETION.INITIAL_RETRY_DELAY_MS;
    this.maxObservationChars = options.maxObservationChars ?? NAVIGATION.MAX_OBSERVATION_CHARS;
    this.maxEvidence = options.maxEvidence ?? SEARCH.MAX_EVIDENCE;
    this.snippetChars = options.snippetChars ?? SEARCH.SNIPPET_CHARS;
    this.maxReadLines = options.maxReadLines ?? READ_TOOL.MAX_LINES;
    this.shell = {
      allowlist: options.shell?.allowlist ?? SHELL_TOOL.ALLOWLIST,
      timeoutMs: options.shell?.timeoutMs ?? SHELL_TOOL.TIMEOUT_MS,
      maxOutputChars: options.shell?.maxOutputChars ?? SHELL_TOOL.MAX_OUTPUT_CHARS,
      cwd: options.shell?.cwd ?? process.cwd(),
    };
  }

  /**
   * Load a document and answer one question about it.
   *
   * An unreadable document is the only failure; everything else degrades
   * into the answer's verdict.
   */
  async ask(question: string, documentPath: string, options: RunOptions = {}): Promise<AskResult> {
    let document: Document;
    try {
      document = await loadDocument(documentPath);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: formatError(err), documentPath }, 'Cannot load document');
      return { ok: false, error: err };
    }

    try {
      return { ok: true, answer: await this.run(question, document, options) };
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: formatError(err), documentPath }, 'Navigation failed');
      return { ok: false, error: err };
    }
  }

  /**
   * Answer one question about a loaded document.
   */
  async run(question: string, document: Document, options: RunOptions = {}): Promise<Answer> {
    const maxIterations = options.maxIterations ?? this.maxIterations;
    if (options.signal?.aborted) {
      logger.warn({ document: document.path }, 'Navigation cancelled before segmentation');
      return cancelledAnswer(question);
    }
    const forest = await this.segmenter.segment(document);
    const search = this.search.search(question, document, forest);

    // Lines read during navigation join the search evidence when they use
    // the question's vocabulary, including its domains' wider term lists
    const collector = new EvidenceCollector(document, forest, this.snippetChars);
    collector.seed(search.evidence);
    const matcher = new TermMatcher([...search.terms, ...domainTerms(search.domains, this.search.vocabulary)]);

    const ctx: ToolContext = { document, forest, shell: this.shell, maxReadLines: this.maxReadLines };
    const plan = buildPassPlan({ question, document, forest, search });
    const state: AgentState = {
      iteration: 0,
      state: 'THINKING',
      transcript: [],
      evidence: [...search.evidence],
    };

    logger.info({
      document: document.path,
      sections: forest.sections.length,
      verdict: search.verdict,
      evidence: search.evidence.length,
      maxIterations,
    }, 'Navigation started');

    let turn = NO_TURN;
    let pending: TranscriptRecord[] = [];

    while (state.state !== 'COMPLETE' && state.state !== 'ABORTED') {
      switch (state.state) {
        case 'THINKING': {
          if (options.signal?.aborted) {
            this.abort(state, 'cancelled');
            break;
          }
          if (state.iteration >= maxIterations) {
            this.abort(state, 'iteration_budget');
            break;
          }

          state.iteration++;
          const prompt = buildTurnPrompt(plan, state.transcript, maxIterations - state.iteration + 1, this.maxObservationChars);
          let text: string;
          try {
            text = await this.think(prompt, state.iteration);
          } catch (error) {
            const serviceError = new ExternalServiceError('Completion service failed', {
              cause: error instanceof Error ? error : new Error(String(error)),
              service: 'completion',
              attempt: this.maxRetries + 1,
              recoverable: false,
            });
            logger.error({ err: formatError(serviceError), iteration: state.iteration }, 'Completion retries exhausted');
            this.abort(state, 'service_unavailable');
            break;
          }

          state.transcript.push({ kind: 'think', iteration: state.iteration, text });
          turn = parseToolCalls(text);
          this.transition(state, 'ACTING');
          break;
        }

        case 'ACTING': {
          pending = await this.act(turn, state, ctx, collector, matcher);
          this.transition(state, 'OBSERVING');
          break;
        }

        case 'OBSERVING': {
          state.transcript.push(...pending);
          pending = [];
          if (turn.answer !== undefined) {
            state.answerText = turn.answer;
            this.transition(state, 'COMPLETE');
          } else {
            this.transition(state, 'THINKING');
          }
          break;
        }
      }
    }

    const answer = synthesizeAnswer({
      question,
      state,
      status: state.state === 'COMPLETE' ? 'COMPLETE' : 'ABORTED',
      search,
      evidence: state.evidence,
      maxEvidence: this.maxEvidence,
    });

    logger.info({
      status: answer.status,
      abortReason: answer.abortReason,
      verdict: answer.coverageVerdict,
      iterations: answer.iterationsUsed,
      evidence: answer.evidence.length,
    }, 'Navigation finished');

    return answer;
  }

  private think(prompt: string, iteration: number): Promise<string> {
    return retry(
      () => withTimeout(
        signal => this.completion.complete({ system: this.systemPrompt, prompt }, signal),
        this.timeoutMs,
        'completion'
      ),
      {
        maxRetries: this.maxRetries,
        initialDelayMs: this.initialRetryDelayMs,
        onRetry: (attempt, error) => {
          logger.warn({ attempt, iteration, err: formatError(error) }, 'Retrying completion');
        },
      }
    );
  }

  /**
   * Run the calls of one turn in order and collect their observations.
   */
  private async act(
    turn: ParseResult,
    state: AgentState,
    ctx: ToolContext,
    collector: EvidenceCollector,
    matcher: TermMatcher
  ): Promise<TranscriptRecord[]> {
    const iteration = state.iteration;
    const records: TranscriptRecord[] = [];

    for (const diagnostic of turn.diagnostics) {
      logger.warn({ err: formatError(toMalformedToolCallError(diagnostic)), iteration }, 'Malformed tool call');
      records.push({
        kind: 'observe',
        iteration,
        source: 'parser',
        ok: false,
        content: `${diagnostic.message}\nIn: ${diagnostic.fragment}`,
      });
    }

    for (const call of turn.calls) {
      records.push({ kind: 'act', iteration, call });
      const result = await dispatch(call, ctx);
      records.push({ kind: 'observe', iteration, source: call.name, ok: result.ok, content: result.content });

      if (result.ok && result.range) {
        const found = collector.scan([result.range], matcher, 'navigation');
        state.evidence.push(...found);
        if (found.length > 0) {
          logger.debug({ iteration, items: found.length }, 'Navigation evidence added');
        }
      }
    }

    return records;
  }

  private transition(state: AgentState, to: LoopState): void {
    logger.debug({ from: state.state, to, iteration: state.iteration }, 'State transition');
    state.state = to;
  }

  private abort(state: AgentState, reason: AbortReason): void {
    state.abortReason = reason;
    logger.warn({ reason, iteration: state.iteration }, 'Navigation aborted');
    this.transition(state, 'ABORTED');
  }
}
