/**
 * Output adapter interface for CLI output.
 *
 * Commands write through an adapter so that answers can go to a terminal
 * (with colors), to a plain pipe, or into a buffer in tests.
 */

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
};

/**
 * What a piece of output is, for formatting decisions.
 */
export type OutputKind = 'text' | 'heading' | 'success' | 'warning' | 'error' | 'muted' | 'progress' | 'data';

/**
 * Color mapping for output kinds.
 */
function getColorForKind(kind: OutputKind): keyof typeof colors {
  switch (kind) {
    case 'heading':
      return 'bold';
    case 'success':
      return 'green';
    case 'warning':
      return 'yellow';
    case 'error':
      return 'red';
    case 'muted':
    case 'progress':
      return 'dim';
    case 'data':
    case 'text':
      return 'reset';
  }
}

/**
 * Format text with ANSI color.
 */
export function colorText(text: string, colorName: keyof typeof colors): string {
  return `${colors[colorName]}${text}${colors.reset}`;
}

/**
 * Output adapter interface.
 * Implementations define how lines are written to their destination.
 */
export interface OutputAdapter {
  /**
   * Write one line (or block) of output.
   * @param content - The content to write, without a trailing newline
   * @param kind - The kind of output; errors and diagnostics go to stderr
   */
  write(content: string, kind?: OutputKind): void;
}

export interface ConsoleOutputAdapterOptions {
  /** Colorize output (default: whether stdout is a terminal) */
  color?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

/**
 * Console output adapter - writes to stdout; errors, warnings and progress to stderr.
 *
 * Machine-readable output ('data') is never colorized.
 */
export class ConsoleOutputAdapter implements OutputAdapter {
  private readonly color: boolean;
  private readonly stdout: NodeJS.WritableStream;
  private readonly stderr: NodeJS.WritableStream;

  constructor(options: ConsoleOutputAdapterOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.color = options.color ?? process.stdout.isTTY === true;
  }

  write(content: string, kind: OutputKind = 'text'): void {
    const colorName = getColorForKind(kind);
    const formatted = this.color && kind !== 'data' && colorName !== 'reset'
      ? colorText(content, colorName)
      : content;
    const stream = kind === 'error' || kind === 'warning' || kind === 'progress' ? this.stderr : this.stdout;
    stream.write(`${formatted}\n`);
  }
}
