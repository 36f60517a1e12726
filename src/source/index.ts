// Log source: a file, standard input, or the output of the live log command

import { readFile } from 'node:fs/promises';
import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { text } from 'node:stream/consumers';

const execFileAsync = promisify(execFile);

/** Kernel ring buffers can be large; dmesg output over this is an error. */
const MAX_COMMAND_OUTPUT = 64 * 1024 * 1024;

export const STDIN_MARKER = '-';

export class LogSourceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LogSourceError';
  }
}

export interface LogSourceOptions {
  /** File to read, or "-" for stdin. When absent, `command` is run. */
  file?: string;
  /** Live log command line, e.g. "dmesg" or "journalctl -k --no-pager". */
  command: string;
  stdin?: NodeJS.ReadableStream;
}

/**
 * Split text into lines on \n or \r\n. A single trailing newline does not
 * produce an empty last line.
 */
export function splitLines(content: string): string[] {
  if (content === '') return [];
  const trimmed = content.replace(/\r?\n$/, '');
  return trimmed.split(/\r?\n/);
}

/** Split a command line on whitespace into program and arguments. */
export function splitCommand(commandLine: string): { program: string; args: string[] } | null {
  const [program, ...args] = commandLine.trim().split(/\s+/);
  if (!program) return null;
  return { program, args };
}

function describe(err: unknown): string {
  if (err instanceof Error && 'code' in err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') return 'not found';
    if (code === 'EACCES') return 'permission denied';
  }
  return err instanceof Error ? err.message : String(err);
}

/**
 * Collect the raw log lines to classify.
 *
 * @throws LogSourceError when the file cannot be read or the command fails
 */
export async function readLogLines(options: LogSourceOptions): Promise<string[]> {
  const { file } = options;

  if (file === STDIN_MARKER) {
    try {
      return splitLines(await text(options.stdin ?? process.stdin));
    } catch (err: unknown) {
      throw new LogSourceError(`Cannot read log from stdin: ${describe(err)}`, { cause: err });
    }
  }

  if (file) {
    try {
      return splitLines(await readFile(file, 'utf-8'));
    } catch (err: unknown) {
      throw new LogSourceError(`Cannot read log file ${file}: ${describe(err)}`, { cause: err });
    }
  }

  const parsed = splitCommand(options.command);
  if (!parsed) {
    throw new LogSourceError('No log command configured');
  }

  try {
    const { stdout } = await execFileAsync(parsed.program, parsed.args, {
      encoding: 'utf-8',
      maxBuffer: MAX_COMMAND_OUTPUT,
    });
    return splitLines(stdout);
  } catch (err: unknown) {
    const stderr = typeof err === 'object' && err !== null && 'stderr' in err
      ? String(err.stderr).trim()
      : '';
    const detail = stderr || describe(err);
    throw new LogSourceError(`Log command "${options.command}" failed: ${detail}`, { cause: err });
  }
}
