/**
 * Command line interface for tocnav.
 *
 * Commands:
 * - ask: answer one question about one document
 * - structure: print the section outline of a document
 * - batch: answer a file of questions and write a JSON report, optionally
 *   grading each answer against its expected answers
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { createEngine as createDefaultEngine, type Engine } from './engine.js';
import { toWire } from '../agent/answer.js';
import { loadBatchFile, runBatch, type BatchReport } from '../agent/batch.js';
import { loadDocument } from '../document/document.js';
import { renderOutline } from '../document/forest.js';
import { ConsoleOutputAdapter, type OutputAdapter, type OutputKind } from '../utils/output-adapter.js';
import { createLogger } from '../utils/logger.js';
import { handleError } from '../utils/error-handler.js';
import { ValidationError } from '../utils/errors.js';
import type { Answer } from '../types/agent.js';
import type { CoverageVerdict } from '../types/document.js';

const logger = createLogger('CLI');

export type CliCommand =
  | { name: 'help' }
  | { name: 'version' }
  | { name: 'ask'; document: string; question: string; json: boolean; maxIterations?: number }
  | { name: 'structure'; document: string }
  | { name: 'batch'; file: string; out?: string; maxIterations?: number; evaluate: boolean };

export interface CliDeps {
  createEngine?: () => Promise<Engine>;
  output?: OutputAdapter;
  version?: string;
}

/** Flags that take a value; `--config` is consumed by the entry point */
const VALUE_FLAGS = new Set(['--max-iterations', '--out', '--config']);
const BOOLEAN_FLAGS = new Set(['--json', '--evaluate', '--help', '-h', '--version', '-v']);

const MaxIterationsSchema = z.coerce.number().int().positive();

const VERDICT_KIND: Record<CoverageVerdict, OutputKind> = {
  CONFIDENT: 'success',
  LOW_CONFIDENCE: 'text',
  NOT_FOUND: 'muted',
};

/**
 * Parse command line arguments into a command.
 *
 * @throws ValidationError on unknown flags, missing values or missing operands
 */
export function parseArgs(args: string[]): CliCommand {
  const flags = new Map<string, string>();
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new ValidationError(`${arg} needs a value`, arg);
      }
      flags.set(arg, value);
      i++;
    } else if (BOOLEAN_FLAGS.has(arg)) {
      flags.set(arg, 'true');
    } else if (arg.startsWith('--')) {
      throw new ValidationError(`Unknown option ${arg}`, arg);
    } else {
      positional.push(arg);
    }
  }

  if (flags.has('--help') || flags.has('-h')) {
    return { name: 'help' };
  }
  if (flags.has('--version') || flags.has('-v')) {
    return { name: 'version' };
  }

  const maxIterations = parseMaxIterations(flags.get('--max-iterations'));
  const [command, target, ...rest] = positional;

  switch (command) {
    case 'ask': {
      const question = rest.join(' ').trim();
      if (!target || !question) {
        throw new ValidationError('ask needs a document and a question');
      }
      return { name: 'ask', document: target, question, json: flags.has('--json'), maxIterations };
    }
    case 'structure':
      if (!target) {
        throw new ValidationError('structure needs a document');
      }
      return { name: 'structure', document: target };
    case 'batch':
      if (!target) {
        throw new ValidationError('batch needs a question file');
      }
      return { name: 'batch', file: target, out: flags.get('--out'), maxIterations, evaluate: flags.has('--evaluate') };
    case undefined:
      return { name: 'help' };
    default:
      throw new ValidationError(`Unknown command ${command}`, 'command', command);
  }
}

function parseMaxIterations(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const parsed = MaxIterationsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError('--max-iterations must be a positive integer', '--max-iterations', raw);
  }
  return parsed.data;
}

function showHelp(output: OutputAdapter, version: string): void {
  output.write(`tocnav ${version} - answer questions about long documents by navigating their structure`, 'heading');
  output.write('');
  output.write('Usage:', 'heading');
  output.write('  tocnav ask <document> <question...> [--max-iterations N] [--json]');
  output.write('  tocnav structure <document>');
  output.write('  tocnav batch <questions.json> [--out report.json] [--max-iterations N] [--evaluate]');
  output.write('');
  output.write('Options:', 'heading');
  output.write('  --config <path>         Configuration file (default: TOCNAV_CONFIG or ./tocnav.config.yaml)');
  output.write('  --max-iterations <n>    Navigation turns per question');
  output.write('  --json                  Print the answer as JSON');
  output.write('  --out <path>            Write the batch report to a file');
  output.write('  --evaluate              Grade batch answers with the judge model');
  output.write('  -h, --help              Show this help');
  output.write('  -v, --version           Show the version');
}

/**
 * Render an answer for a terminal.
 */
export function printAnswer(output: OutputAdapter, answer: Answer): void {
  const iterations = `${answer.iterationsUsed} iteration${answer.iterationsUsed === 1 ? '' : 's'}`;
  const stopped = answer.abortReason ? `, stopped: ${answer.abortReason}` : '';
  output.write(`Answer (${answer.coverageVerdict}, ${iterations}${stopped})`, VERDICT_KIND[answer.coverageVerdict]);
  output.write('');
  output.write(answer.answerText);

  if (answer.evidence.length === 0) {
    return;
  }
  output.write('');
  output.write('Evidence:', 'heading');
  for (const item of answer.evidence) {
    const [start, end] = item.lineRange;
    output.write(`  - ${item.section.title} [lines ${start}-${end}] (${item.passKind}): ${item.snippet}`);
  }
}

function printSummary(output: OutputAdapter, report: BatchReport): void {
  const { summary } = report;
  const accuracy = summary.abstention_accuracy === null ? 'n/a' : percent(summary.abstention_accuracy);
  output.write(`Answered ${summary.answered}/${summary.total} questions (${summary.errors} errors)`, 'heading');
  output.write(
    `Verdicts: CONFIDENT ${summary.verdicts.CONFIDENT}, ` +
    `LOW_CONFIDENCE ${summary.verdicts.LOW_CONFIDENCE}, NOT_FOUND ${summary.verdicts.NOT_FOUND}`
  );
  output.write(`Abstention accuracy: ${accuracy} (${summary.false_abstentions} false abstentions)`);

  const graded = summary.evaluation;
  if (graded) {
    output.write(
      `Graded ${graded.evaluated}: CORRECT ${graded.correct}, PARTIAL ${graded.partial}, INCORRECT ${graded.incorrect}; ` +
      `accuracy ${percent(graded.accuracy)} (strict ${percent(graded.strict_accuracy)})`
    );
  }
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

async function execute(command: CliCommand, deps: Required<CliDeps>, signal: AbortSignal): Promise<number> {
  const { output } = deps;

  switch (command.name) {
    case 'help':
      showHelp(output, deps.version);
      return 0;

    case 'version':
      output.write(deps.version);
      return 0;

    case 'structure': {
      const document = await loadDocument(command.document);
      const engine = await deps.createEngine();
      const forest = await engine.segmenter.segment(document);
      output.write(renderOutline(forest));
      return 0;
    }

    case 'ask': {
      const engine = await deps.createEngine();
      const result = await engine.navigator.ask(command.question, command.document, {
        maxIterations: command.maxIterations,
        signal,
      });
      if (!result.ok) {
        throw result.error;
      }
      if (command.json) {
        output.write(JSON.stringify(toWire(result.answer), null, 2), 'data');
      } else {
        printAnswer(output, result.answer);
      }
      return 0;
    }

    case 'batch': {
      const items = await loadBatchFile(command.file);
      const engine = await deps.createEngine();
      const report = await runBatch(engine.navigator, items, {
        concurrency: engine.concurrency,
        maxIterations: command.maxIterations,
        signal,
        ...(command.evaluate ? { evaluator: engine.evaluator } : {}),
        onResult: (result, done, total) => {
          const outcome = result.answer ? result.answer.coverage_verdict : `error: ${result.error ?? 'unknown'}`;
          const grade = result.evaluation ? ` (${result.evaluation.grade})` : '';
          output.write(`[${done}/${total}] ${result.id}: ${outcome}${grade}`, 'progress');
        },
      });

      const json = JSON.stringify(report, null, 2);
      if (command.out) {
        await fs.mkdir(path.dirname(command.out), { recursive: true });
        await fs.writeFile(command.out, `${json}\n`, 'utf-8');
        printSummary(output, report);
        output.write(`Report written to ${command.out}`, 'muted');
      } else {
        output.write(json, 'data');
      }
      return 0;
    }
  }
}

/**
 * Run the CLI and return the process exit code.
 */
export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const resolved: Required<CliDeps> = {
    createEngine: deps.createEngine ?? createDefaultEngine,
    output: deps.output ?? new ConsoleOutputAdapter(),
    version: deps.version ?? '0.0.0',
  };
  const { output } = resolved;

  let command: CliCommand;
  try {
    command = parseArgs(args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    output.write(`Error: ${message}`, 'error');
    output.write('');
    showHelp(output, resolved.version);
    return 1;
  }

  // Ctrl-C stops navigation at the next iteration boundary
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn('Interrupted, finishing the current step');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    return await execute(command, resolved, controller.signal);
  } catch (error) {
    const enriched = handleError(error, { command: command.name }, {
      log: true,
      customLogger: logger,
    });
    output.write(`Error: ${enriched.userMessage || enriched.message}`, 'error');
    return 1;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
