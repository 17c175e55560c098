/**
 * list_files: run an allow-listed file-listing command.
 *
 * Commands run through execFile, so no shell ever sees the arguments.
 * Arguments are further limited to a plain character set and may not
 * leave the working directory. Timeouts, non-zero exits and rejected
 * commands are returned as failed results, never thrown.
 */

import { execFile, type ExecFileException } from 'child_process';
import { z } from 'zod';
import { createLogger } from '../utils/logger.js';
import { ToolExecutionError } from '../utils/errors.js';
import type { ToolContext, ToolResult, ToolSpec } from './types.js';

const logger = createLogger('ListFilesTool');

const SAFE_ARGUMENT = /^[A-Za-z0-9_./=:*+@%,-]+$/;

/** Options that make an allowed command write files or run other programs */
const WRITING_OPTIONS: Readonly<Record<string, RegExp>> = {
  find: /^-(?:delete|exec|execdir|ok|okdir|fprint|fprint0|fprintf|fls)$/,
};

/** Spawn failures worth one more attempt */
const TRANSIENT_SPAWN_CODES = new Set(['EAGAIN', 'EMFILE', 'ENFILE']);

export const ListFilesArgsSchema = z.object({
  command: z.string().trim().min(1),
  args: z.string().optional(),
});

export type ListFilesArgs = z.infer<typeof ListFilesArgsSchema>;

export const LIST_FILES_SPEC: ToolSpec = {
  description: 'Run a file-listing command in the working directory. No shell; allowed commands only.',
  arguments: [
    { name: 'command', required: true, description: 'command name, e.g. ls' },
    { name: 'args', required: false, description: 'space-separated arguments' },
  ],
  example: '<list_files><command>ls</command><args>-la</args></list_files>',
};

/**
 * Split and check the argument string.
 *
 * @returns The argument list, or the reason it was rejected
 */
export function parseCommandArgs(
  raw: string | undefined,
  command?: string
): { ok: true; args: string[] } | { ok: false; reason: string } {
  const args = (raw ?? '').split(/\s+/).filter(Boolean);
  const writing = command === undefined ? undefined : WRITING_OPTIONS[command];
  for (const arg of args) {
    if (writing?.test(arg)) {
      return { ok: false, reason: `Option "${arg}" of ${command} is not allowed: list_files only reads` };
    }
    if (!SAFE_ARGUMENT.test(arg)) {
      return { ok: false, reason: `Argument "${arg}" contains characters that are not allowed` };
    }
    if (arg.startsWith('/') || arg.split('/').includes('..')) {
      return { ok: false, reason: `Argument "${arg}" points outside the working directory` };
    }
  }
  return { ok: true, args };
}

function truncate(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}\n[output truncated]` : text;
}

/**
 * @throws ToolExecutionError (recoverable) when the process could not be spawned for lack of resources
 */
export async function listFiles(args: ListFilesArgs, ctx: ToolContext): Promise<ToolResult> {
  const { allowlist, timeoutMs, maxOutputChars, cwd } = ctx.shell;

  if (!allowlist.includes(args.command)) {
    return { ok: false, content: `Command "${args.command}" is not allowed. Allowed: ${allowlist.join(', ')}` };
  }

  const parsed = parseCommandArgs(args.args, args.command);
  if (!parsed.ok) {
    return { ok: false, content: parsed.reason };
  }

  logger.debug({ command: args.command, args: parsed.args, cwd }, 'Running command');

  const outcome = await new Promise<{ error: ExecFileException | null; stdout: string; stderr: string }>(resolve => {
    execFile(
      args.command,
      parsed.args,
      { cwd, timeout: timeoutMs, shell: false, encoding: 'utf8', maxBuffer: 1024 * 1024 },
      (error, stdout, stderr) => resolve({ error, stdout, stderr })
    );
  });

  const { error, stdout, stderr } = outcome;
  if (!error) {
    return { ok: true, content: truncate(stdout.trimEnd() || '(no output)', maxOutputChars) };
  }

  if (typeof error.code === 'string' && TRANSIENT_SPAWN_CODES.has(error.code)) {
    throw new ToolExecutionError(`Could not start ${args.command}: ${error.code}`, 'list_files', true, error);
  }
  if (error.killed) {
    logger.warn({ command: args.command, timeoutMs }, 'Command timed out');
    return { ok: false, content: `Command timed out after ${timeoutMs}ms` };
  }
  if (typeof error.code === 'number') {
    const detail = stderr.trim() ? `\n${truncate(stderr.trim(), maxOutputChars)}` : '';
    return { ok: false, content: `Command exited with code ${error.code}${detail}` };
  }
  return { ok: false, content: `Command failed: ${error.message}` };
}
