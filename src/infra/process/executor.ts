/**
 * Process Executor
 *
 * Runs one external command, drains standard output and standard error on
 * two independent line readers, echoes every line to the operator as it
 * arrives, and returns standard output only. Many callers JSON-parse the
 * returned text, so standard error never reaches it.
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import type { Logger } from 'pino';
import type { CommandResult, CommandSpec, LogStream, RemoteLogLine } from '@/types';
import { CommandFailedError, LaunchFailedError, extractErrorMessage } from '@/lib/errors';

/** Receives every output line while the command runs */
export type LineSink = (line: RemoteLogLine) => void;

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => ChildProcess;

export interface ProcessExecutor {
  run: (spec: CommandSpec) => Promise<CommandResult>;
}

export interface ProcessExecutorOptions {
  logger: Logger;
  echo?: LineSink;
  spawn?: SpawnFn;
}

/** Standard error lines retained on CommandFailedError for guidance lookup */
const STDERR_TAIL_LINES = 20;

/**
 * Build an immutable command spec.
 */
export function createCommandSpec(
  args: readonly string[],
  options: Omit<CommandSpec, 'args'> = {},
): CommandSpec {
  if (args.length === 0) {
    throw new Error('A command needs at least an executable');
  }
  return Object.freeze({
    ...options,
    args: Object.freeze([...args]),
    ...(options.files ? { files: Object.freeze([...options.files]) } : {}),
    ...(options.redact ? { redact: Object.freeze([...options.redact]) } : {}),
  });
}

/**
 * Render the argument list for logs and errors, masking redacted values.
 */
export function renderCommand(spec: CommandSpec): string {
  const redacted = new Set(spec.redact ?? []);
  return spec.args.map((arg) => (redacted.has(arg) ? '***' : arg)).join(' ');
}

/**
 * Console sink: writes each line to standard error tagged by its source stream.
 */
export function createConsoleEcho(
  write: (text: string) => void = (text) => process.stderr.write(text),
): LineSink {
  return ({ source, text }) => {
    write(`${source === 'stdout' ? 'out' : 'err'} | ${text}\n`);
  };
}

/**
 * Batch files (.cmd/.bat) on Windows can only be started through a shell.
 */
function needsShell(executable: string): boolean {
  return process.platform === 'win32' && /\.(cmd|bat)$/i.test(executable);
}

function quoteForCmd(arg: string): string {
  return /[\s"&|<>^]/.test(arg) ? `"${arg.replace(/"/g, '""')}"` : arg;
}

function drainLines(
  stream: Readable | null,
  source: LogStream,
  onLine: (line: RemoteLogLine) => void,
): Promise<void> {
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise<void>((resolve, reject) => {
    const reader = createInterface({ input: stream, crlfDelay: Infinity });
    reader.on('line', (raw) => onLine({ source, text: raw.trimEnd() }));
    reader.once('close', () => resolve());
    stream.once('error', reject);
  });
}

export function createProcessExecutor(options: ProcessExecutorOptions): ProcessExecutor {
  const { logger } = options;
  const echo = options.echo ?? createConsoleEcho();
  const spawnProcess: SpawnFn =
    options.spawn ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));

  async function run(spec: CommandSpec): Promise<CommandResult> {
    const [executable, ...args] = spec.args;
    if (executable === undefined) {
      throw new Error('A command needs at least an executable');
    }
    const display = renderCommand(spec);
    logger.info({ command: display, cwd: spec.cwd }, 'Running command');

    const stdoutLines: string[] = [];
    const stderrTail: string[] = [];

    const onLine = (line: RemoteLogLine): void => {
      echo(line);
      if (line.source === 'stdout') {
        stdoutLines.push(line.text);
        return;
      }
      stderrTail.push(line.text);
      if (stderrTail.length > STDERR_TAIL_LINES) {
        stderrTail.shift();
      }
    };

    const shell = needsShell(executable);
    let child: ChildProcess;
    try {
      child = spawnProcess(executable, shell ? args.map(quoteForCmd) : args, {
        cwd: spec.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
        shell,
      });
    } catch (error) {
      throw new LaunchFailedError(display, extractErrorMessage(error));
    }

    const readers = Promise.all([
      drainLines(child.stdout, 'stdout', onLine),
      drainLines(child.stderr, 'stderr', onLine),
    ]);

    type Exit = { code: number | null; signal: NodeJS.Signals | null };
    const exit = new Promise<Exit>((resolve, reject) => {
      child.once('error', (error) => {
        if (child.pid === undefined) {
          reject(new LaunchFailedError(display, error.message));
          return;
        }
        logger.warn({ command: display, err: error }, 'Child process reported an error');
      });
      child.once('close', (code, signal) => resolve({ code, signal }));
    });

    const [{ code, signal }] = await Promise.all([exit, readers]);

    const stdout = stdoutLines.join('\n').trim();
    if (code !== 0) {
      const exitCode = code ?? -1;
      logger.debug({ command: display, exitCode, signal }, 'Command exited with failure');
      throw new CommandFailedError(exitCode, display, stdout, stderrTail);
    }

    return { stdout, exitCode: 0 };
  }

  return { run };
}
