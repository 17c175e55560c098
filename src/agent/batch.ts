/**
 * Batch runner - answers a file of questions with bounded concurrency.
 *
 * Questions are independent: each gets its own loop state, and the only
 * thing they share is the navigator's segmentation cache, so several
 * questions about one document segment it once. With an evaluator, each
 * answer is graded as soon as it is ready.
 *
 * Once the signal aborts, workers take no further items; the questions
 * never asked are reported with an error.
 *
 * @module agent/batch
 */

import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ValidationError, formatError } from '../utils/errors.js';
import { BATCH } from '../config/constants.js';
import { toWire, type WireAnswer } from './answer.js';
import { summarizeEvaluations, type AnswerGrader, type EvaluationSummary, type Judgement } from './evaluation.js';
import type { CoverageVerdict } from '../types/document.js';
import type { AskResult, TerminalState } from '../types/agent.js';
import type { RunOptions } from './navigator.js';

const logger = createLogger('BatchRunner');

export const BatchItemSchema = z.object({
  id: z.union([z.string(), z.number()]).optional(),
  /** Document path, relative to the batch file */
  document: z.string().min(1),
  question: z.string().min(1),
  answers: z.array(z.object({ text: z.string() })).optional(),
  is_impossible: z.boolean().optional(),
});

export const BatchFileSchema = z.array(BatchItemSchema);

export type BatchItem = z.infer<typeof BatchItemSchema>;

/**
 * What the runner needs from a navigator.
 */
export interface QuestionAnswerer {
  ask(question: string, documentPath: string, options?: RunOptions): Promise<AskResult>;
}

export interface BatchResult {
  id: string;
  document: string;
  question: string;
  expected_answers: string[];
  is_impossible: boolean;
  /** Set when the question produced an answer */
  answer?: WireAnswer & { status: TerminalState };
  /** Set when the document could not be read or the batch was cancelled */
  error?: string;
  /** Set when an evaluator graded the answer */
  evaluation?: Judgement;
}

export interface BatchSummary {
  total: number;
  answered: number;
  errors: number;
  impossible_questions: number;
  answerable_questions: number;
  verdicts: Record<CoverageVerdict, number>;
  /** NOT_FOUND answers to impossible questions, over the impossible questions answered */
  abstention_accuracy: number | null;
  /** Answerable questions that were answered NOT_FOUND */
  false_abstentions: number;
  /** Present when at least one answer was graded */
  evaluation?: EvaluationSummary;
}

export interface BatchReport {
  metadata: { timestamp: string; total_questions: number };
  summary: BatchSummary;
  results: BatchResult[];
}

export interface BatchOptions extends RunOptions {
  concurrency?: number;
  /** Called after each question finishes */
  onResult?: (result: BatchResult, done: number, total: number) => void;
  now?: () => Date;
  /** Grades answers to impossible questions and to questions with expected answers */
  evaluator?: AnswerGrader;
}

export const CANCELLED_ERROR = 'Batch cancelled before this question was asked';

/**
 * Read and validate a batch file. Document paths are resolved against
 * the file's directory.
 *
 * @throws ValidationError if the file is not a valid question list
 */
export async function loadBatchFile(filePath: string): Promise<BatchItem[]> {
  const text = await fs.readFile(filePath, 'utf-8');

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(
      `Batch file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const parsed = BatchFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ValidationError(`Invalid batch file ${filePath}${where}: ${issue?.message ?? 'unknown error'}`, 'batch');
  }

  const baseDir = path.dirname(path.resolve(filePath));
  return parsed.data.map(item => ({ ...item, document: path.resolve(baseDir, item.document) }));
}

/**
 * Aggregate counts over finished results.
 */
export function summarize(results: readonly BatchResult[]): BatchSummary {
  const verdicts: Record<CoverageVerdict, number> = { CONFIDENT: 0, LOW_CONFIDENCE: 0, NOT_FOUND: 0 };
  let impossibleAnswered = 0;
  let correctAbstentions = 0;
  let falseAbstentions = 0;

  for (const result of results) {
    if (!result.answer) {
      continue;
    }
    const verdict = result.answer.coverage_verdict;
    verdicts[verdict]++;
    if (result.is_impossible) {
      impossibleAnswered++;
      if (verdict === 'NOT_FOUND') {
        correctAbstentions++;
      }
    } else if (verdict === 'NOT_FOUND') {
      falseAbstentions++;
    }
  }

  const answered = results.filter(r => r.answer).length;
  const impossible = results.filter(r => r.is_impossible).length;
  const evaluation = summarizeEvaluations(results.flatMap(r => (r.evaluation ? [r.evaluation] : [])));
  return {
    total: results.length,
    answered,
    errors: results.length - answered,
    impossible_questions: impossible,
    answerable_questions: results.length - impossible,
    verdicts,
    abstention_accuracy: impossibleAnswered > 0 ? correctAbstentions / impossibleAnswered : null,
    false_abstentions: falseAbstentions,
    ...(evaluation ? { evaluation } : {}),
  };
}

/**
 * Answer every item, at most `concurrency` at a time. Results keep the
 * order of `items`.
 */
export async function runBatch(
  answerer: QuestionAnswerer,
  items: readonly BatchItem[],
  options: BatchOptions = {}
): Promise<BatchReport> {
  const concurrency = Math.max(1, options.concurrency ?? BATCH.CONCURRENCY);
  const results: BatchResult[] = new Array<BatchResult>(items.length);
  let next = 0;
  let done = 0;

  logger.info({ total: items.length, concurrency }, 'Batch started');

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (!item) {
        continue;
      }

      const result: BatchResult = options.signal?.aborted
        ? { ...baseResult(item, index), error: CANCELLED_ERROR }
        : await answerOne(answerer, item, index, options);
      results[index] = result;
      done++;
      options.onResult?.(result, done, items.length);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, () => worker()));

  const summary = summarize(results);
  logger.info({ ...summary, cancelled: options.signal?.aborted ?? false }, 'Batch finished');

  return {
    metadata: {
      timestamp: (options.now ?? (() => new Date()))().toISOString(),
      total_questions: items.length,
    },
    summary,
    results,
  };
}

function baseResult(item: BatchItem, index: number): BatchResult {
  return {
    id: item.id === undefined ? `Q${index + 1}` : String(item.id),
    document: item.document,
    question: item.question,
    expected_answers: (item.answers ?? []).map(a => a.text),
    is_impossible: item.is_impossible ?? false,
  };
}

async function answerOne(
  answerer: QuestionAnswerer,
  item: BatchItem,
  index: number,
  options: BatchOptions
): Promise<BatchResult> {
  const base = baseResult(item, index);

  const outcome = await answerer.ask(item.question, item.document, {
    maxIterations: options.maxIterations,
    signal: options.signal,
  });

  if (!outcome.ok) {
    logger.warn({ id: base.id, err: formatError(outcome.error) }, 'Question failed');
    return { ...base, error: outcome.error.message };
  }
  const result: BatchResult = { ...base, answer: { ...toWire(outcome.answer), status: outcome.answer.status } };

  // Without expected answers only an abstention can be judged
  const gradable = base.is_impossible || base.expected_answers.length > 0;
  if (!options.evaluator || !gradable || options.signal?.aborted) {
    return result;
  }

  const evaluation = await options.evaluator.evaluate({
    question: base.question,
    expected_answers: base.expected_answers,
    is_impossible: base.is_impossible,
    answer_text: outcome.answer.answerText,
  }, options.signal);
  return { ...result, evaluation };
}
