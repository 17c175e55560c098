/**
 * Answer grading - a second model judges batch answers against the
 * expected answers.
 *
 * The judge replies in a fixed three-line format:
 *
 * ```
 * EVALUATION: CORRECT | PARTIAL | INCORRECT
 * CONFIDENCE: HIGH | MEDIUM | LOW
 * REASONING: ...
 * ```
 *
 * A reply that cannot be read, or a judge that keeps failing, grades the
 * answer INCORRECT with LOW confidence; grading never fails a batch.
 *
 * @module agent/evaluation
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ExternalServiceError, formatError } from '../utils/errors.js';
import { retry, withTimeout } from '../utils/retry.js';
import { EVALUATION } from '../config/constants.js';
import type { CompletionClient } from '../types/agent.js';

const logger = createLogger('AnswerEvaluator');

export const GradeSchema = z.enum(['CORRECT', 'PARTIAL', 'INCORRECT']);
export const JudgeConfidenceSchema = z.enum(['HIGH', 'MEDIUM', 'LOW']);

export type Grade = z.infer<typeof GradeSchema>;
export type JudgeConfidence = z.infer<typeof JudgeConfidenceSchema>;

export interface Judgement {
  grade: Grade;
  confidence: JudgeConfidence;
  reasoning: string;
}

/**
 * One answered question, as the judge sees it.
 */
export interface GradingInput {
  question: string;
  expected_answers: readonly string[];
  is_impossible: boolean;
  answer_text: string;
}

/**
 * What the batch runner needs from a grader.
 */
export interface AnswerGrader {
  evaluate(input: GradingInput, signal?: AbortSignal): Promise<Judgement>;
}

export interface EvaluationSummary {
  evaluated: number;
  correct: number;
  partial: number;
  incorrect: number;
  /** (correct + 0.5 * partial) / evaluated */
  accuracy: number;
  /** correct / evaluated */
  strict_accuracy: number;
  confidence: Record<JudgeConfidence, number>;
}

export interface AnswerEvaluatorOptions {
  timeoutMs?: number;
  maxRetries?: number;
  initialRetryDelayMs?: number;
}

export const JUDGE_SYSTEM_PROMPT =
  'You are an expert evaluator of question-answering systems, particularly skilled in legal document analysis. ' +
  'You provide precise, objective evaluations.';

const REPLY_FORMAT = (grades: string, reasoning: string): string => [
  'Respond in this exact format:',
  `EVALUATION: [${grades}]`,
  'CONFIDENCE: [HIGH/MEDIUM/LOW]',
  `REASONING: [${reasoning}]`,
].join('\n');

/**
 * Judge prompt for one answer. Impossible questions are graded on
 * whether the answer abstains instead of against expected answers.
 */
export function buildJudgePrompt(input: GradingInput): string {
  if (input.is_impossible) {
    return [
      'You are evaluating a legal document QA system. This question is marked as "impossible" to answer from the document.',
      '',
      `QUESTION: ${input.question}`,
      '',
      'EXPECTED BEHAVIOR: The system should recognize that the document does not answer this question, for example by',
      'stating that the information was not found, is not specified, or cannot be determined from the text.',
      '',
      `AGENT RESPONSE: ${input.answer_text}`,
      '',
      'EVALUATION CRITERIA:',
      '- CORRECT: the response says the information is absent, and invents no provisions, quotes or details',
      '- INCORRECT: the response presents specific details or provisions as if the document contained them',
      '',
      REPLY_FORMAT('CORRECT/INCORRECT', 'Why this evaluation holds for a question the document cannot answer'),
    ].join('\n');
  }

  return [
    "You are evaluating a legal document QA system's performance. Compare the expected answers with the agent's actual response.",
    '',
    `QUESTION: ${input.question}`,
    '',
    'EXPECTED ANSWERS:',
    ...input.expected_answers.map(answer => `- ${answer}`),
    '',
    `AGENT RESPONSE: ${input.answer_text}`,
    '',
    'EVALUATION CRITERIA:',
    '1. Does the response contain all the expected information, even if paraphrased?',
    '2. Are the facts correct and complete?',
    '3. Allow variations in party names and date formats.',
    '4. The response may contain additional analysis; focus on whether the expected answers are present.',
    '',
    'EVALUATION OPTIONS:',
    '- CORRECT: all expected answers are present and accurate',
    '- PARTIAL: some expected answers are present, others are missing or unclear',
    '- INCORRECT: the expected answers are missing, wrong or significantly inaccurate',
    '',
    'CONFIDENCE LEVELS:',
    '- HIGH: very confident in the evaluation',
    '- MEDIUM: somewhat confident, minor ambiguity',
    '- LOW: uncertain, significant ambiguity',
    '',
    REPLY_FORMAT('CORRECT/PARTIAL/INCORRECT', 'Which expected answers were found and which were missing'),
  ].join('\n');
}

const UNREADABLE: Judgement = {
  grade: 'INCORRECT',
  confidence: 'LOW',
  reasoning: 'Failed to parse the evaluation reply',
};

/**
 * Read a judge reply. Fields that are missing or hold an unknown value
 * keep their INCORRECT / LOW defaults.
 */
export function parseJudgement(reply: string): Judgement {
  const judgement: Judgement = { ...UNREADABLE };

  for (const line of reply.trim().split('\n')) {
    const match = /^\s*(EVALUATION|CONFIDENCE|REASONING)\s*:\s*(.*)$/.exec(line);
    if (!match) {
      continue;
    }
    const value = (match[2] ?? '').trim();
    const token = value.replace(/^\[|\]$/g, '').toUpperCase();

    switch (match[1]) {
      case 'EVALUATION': {
        const grade = GradeSchema.safeParse(token);
        if (grade.success) {
          judgement.grade = grade.data;
        }
        break;
      }
      case 'CONFIDENCE': {
        const confidence = JudgeConfidenceSchema.safeParse(token);
        if (confidence.success) {
          judgement.confidence = confidence.data;
        }
        break;
      }
      default:
        if (value !== '') {
          judgement.reasoning = value;
        }
    }
  }

  return judgement;
}

/**
 * Grades answers with a completion client acting as judge.
 */
export class AnswerEvaluator implements AnswerGrader {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly initialRetryDelayMs: number;

  constructor(private readonly judge: CompletionClient, options: AnswerEvaluatorOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? EVALUATION.TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? EVALUATION.MAX_RETRIES;
    this.initialRetryDelayMs = options.initialRetryDelayMs ?? EVALUATION.INITIAL_RETRY_DELAY_MS;
  }

  async evaluate(input: GradingInput, signal?: AbortSignal): Promise<Judgement> {
    const request = { system: JUDGE_SYSTEM_PROMPT, prompt: buildJudgePrompt(input) };

    try {
      const reply = await retry(
        () => {
          if (signal?.aborted) {
            throw new ExternalServiceError('Evaluation cancelled', { service: 'completion', recoverable: false });
          }
          return withTimeout(timeoutSignal => this.judge.complete(request, timeoutSignal), this.timeoutMs, 'evaluation');
        },
        {
          maxRetries: this.maxRetries,
          initialDelayMs: this.initialRetryDelayMs,
          onRetry: (attempt, error) => {
            logger.warn({ attempt, err: formatError(error) }, 'Retrying evaluation');
          },
        }
      );
      return parseJudgement(reply);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ err: formatError(err), question: input.question }, 'Evaluation failed');
      return { grade: 'INCORRECT', confidence: 'LOW', reasoning: `Evaluation failed: ${err.message}` };
    }
  }
}

/**
 * Grade counts and accuracies over the graded answers; undefined when
 * nothing was graded.
 */
export function summarizeEvaluations(judgements: readonly Judgement[]): EvaluationSummary | undefined {
  if (judgements.length === 0) {
    return undefined;
  }

  const count = (grade: Grade): number => judgements.filter(j => j.grade === grade).length;
  const confidence: Record<JudgeConfidence, number> = { HIGH: 0, MEDIUM: 0, LOW: 0 };
  for (const judgement of judgements) {
    confidence[judgement.confidence]++;
  }

  const correct = count('CORRECT');
  const partial = count('PARTIAL');
  return {
    evaluated: judgements.length,
    correct,
    partial,
    incorrect: count('INCORRECT'),
    accuracy: (correct + 0.5 * partial) / judgements.length,
    strict_accuracy: correct / judgements.length,
    confidence,
  };
}
