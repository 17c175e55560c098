/**
 * Navigation module exports.
 *
 * Flow: question + document -> segmentation -> multi-pass search ->
 * think/act/observe loop -> Answer.
 */

export {
  Navigator,
  type ForestSource,
  type NavigatorDeps,
  type NavigatorOptions,
  type RunOptions,
} from './navigator.js';
export { synthesizeAnswer, bestEvidenceText, cancelledAnswer, toWire, type WireAnswer, type WireEvidence } from './answer.js';
export { buildSystemPrompt, buildPassPlan, buildTurnPrompt } from './prompt-builder.js';
export {
  runBatch,
  loadBatchFile,
  summarize,
  CANCELLED_ERROR,
  type BatchItem,
  type BatchOptions,
  type BatchReport,
  type BatchResult,
  type BatchSummary,
  type QuestionAnswerer,
} from './batch.js';
export {
  AnswerEvaluator,
  buildJudgePrompt,
  parseJudgement,
  summarizeEvaluations,
  type AnswerGrader,
  type EvaluationSummary,
  type Grade,
  type GradingInput,
  type JudgeConfidence,
  type Judgement,
} from './evaluation.js';
