import { spawn } from 'node:child_process';
import os from 'node:os';
import path from 'node:path';
import type { EngineName } from '@medrun/shared';
import { Broadcast } from '../lib/broadcast';
import logger from '../lib/logger';

/**
 * Result of a completed engine command
 */
export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

/**
 * Stream callback for real-time output, one call per complete line
 */
export type LineCallback = (line: string, stream: 'stdout' | 'stderr') => void;

export interface ExecuteOptions {
  /** 0 disables the timeout */
  timeoutMs?: number;
  signal?: AbortSignal;
  onLine?: LineCallback;
}

export interface CommandExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Set when the process could not be spawned */
  error?: string;
}

/**
 * A long-running child process whose merged output is buffered as lines
 */
export interface RunningCommand {
  lines(options?: { signal?: AbortSignal; from?: number }): AsyncIterable<string>;
  readonly exited: Promise<CommandExit>;
  readonly hasExited: boolean;
  /** Lines produced so far */
  readonly lineCount: number;
  kill(signal?: NodeJS.Signals): void;
}

export interface CommandRunner {
  readonly executable: string;
  execute(args: string[], options?: ExecuteOptions): Promise<CommandResult>;
  start(args: string[], options?: { maxRetainedLines?: number }): RunningCommand;
}

const DEFAULT_TIMEOUT_MS = 300000; // 5 minutes
const SPAWN_FAILURE_PREFIX = 'Failed to execute';

/**
 * Splits chunked output into lines; "\r" counts as a line break so
 * progress bars that redraw in place still produce lines
 */
export function createLineSplitter(onLine: (line: string) => void): { write(chunk: string): void; flush(): void } {
  let pending = '';
  return {
    write(chunk: string) {
      const parts = (pending + chunk).split(/\r?\n|\r/);
      pending = parts.pop() ?? '';
      for (const part of parts) {
        if (part.length > 0) onLine(part);
      }
    },
    flush() {
      if (pending.length > 0) onLine(pending);
      pending = '';
    },
  };
}

/**
 * Child-process environment with the executable's own directory first on PATH,
 * so helpers installed beside the engine (credential helpers, runc) resolve
 */
export function buildExecutableEnv(executable: string, baseEnv: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  const env = { ...baseEnv };
  if (!executable.includes(path.sep) && !executable.includes('/')) {
    return env;
  }
  const dir = path.dirname(executable);
  const current = env.PATH ?? '';
  const entries = current.split(path.delimiter).filter(Boolean);
  if (!entries.includes(dir)) {
    env.PATH = [dir, ...entries].join(path.delimiter);
  }
  return env;
}

/**
 * Explicit path, else the platform's usual install location, else the bare name on PATH
 */
export function resolveExecutable(
  engine: EngineName,
  configured?: string,
  platform: NodeJS.Platform = process.platform
): string {
  if (configured && configured.trim()) {
    return configured.trim();
  }
  // GUI-launched processes on macOS often miss /usr/local/bin on PATH
  if (engine === 'docker' && platform === 'darwin') {
    return '/usr/local/bin/docker';
  }
  return engine;
}

/**
 * Whether a failed result means the executable itself could not be started
 */
export function isSpawnFailure(result: CommandResult): boolean {
  return result.exitCode === null && result.stderr.startsWith(SPAWN_FAILURE_PREFIX);
}

/**
 * Exit code a shell would report for a process ended by a signal
 */
export function exitCodeFor(exit: CommandExit): number {
  if (exit.exitCode !== null) {
    return exit.exitCode;
  }
  const signalNumber = exit.signal ? os.constants.signals[exit.signal] : undefined;
  return signalNumber !== undefined ? 128 + signalNumber : -1;
}

/**
 * Runs an engine executable without a shell
 */
export class CliRunner implements CommandRunner {
  private readonly env: NodeJS.ProcessEnv;

  constructor(
    public readonly executable: string,
    baseEnv: NodeJS.ProcessEnv = process.env
  ) {
    this.env = buildExecutableEnv(executable, baseEnv);
  }

  /**
   * Run a command to completion. Never rejects: spawn failures, timeouts and
   * aborts all resolve with success false.
   */
  async execute(args: string[], options: ExecuteOptions = {}): Promise<CommandResult> {
    const { timeoutMs = DEFAULT_TIMEOUT_MS, signal, onLine } = options;

    return new Promise((resolve) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let aborted = false;

      logger.debug({ command: this.executable, args }, 'Executing engine command');

      const proc = spawn(this.executable, args, {
        env: this.env,
        shell: false,
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdoutLines = createLineSplitter((line) => onLine?.(line, 'stdout'));
      const stderrLines = createLineSplitter((line) => onLine?.(line, 'stderr'));

      const timeout =
        timeoutMs > 0
          ? setTimeout(() => {
              timedOut = true;
              proc.kill('SIGTERM');
            }, timeoutMs)
          : undefined;

      const onAbort = () => {
        aborted = true;
        proc.kill('SIGTERM');
      };
      if (signal?.aborted) {
        onAbort();
      } else {
        signal?.addEventListener('abort', onAbort, { once: true });
      }

      const cleanup = () => {
        clearTimeout(timeout);
        signal?.removeEventListener('abort', onAbort);
      };

      proc.stdout.on('data', (data: Buffer) => {
        const text = data.toString();
        stdout += text;
        stdoutLines.write(text);
      });

      proc.stderr.on('data', (data: Buffer) => {
        const text = data.toString();
        stderr += text;
        stderrLines.write(text);
      });

      proc.on('close', (code) => {
        cleanup();
        stdoutLines.flush();
        stderrLines.flush();

        if (timedOut || aborted) {
          resolve({
            success: false,
            stdout,
            stderr: stderr + (timedOut ? '\nCommand timed out' : '\nCommand aborted'),
            exitCode: null,
          });
        } else {
          resolve({
            success: code === 0,
            stdout,
            stderr,
            exitCode: code,
          });
        }
      });

      proc.on('error', (err) => {
        cleanup();
        resolve({
          success: false,
          stdout,
          stderr: `${SPAWN_FAILURE_PREFIX} ${this.executable}: ${err.message}`,
          exitCode: null,
        });
      });
    });
  }

  /**
   * Start a process and keep it running; stdout and stderr are merged line by line
   */
  start(args: string[], options: { maxRetainedLines?: number } = {}): RunningCommand {
    logger.debug({ command: this.executable, args }, 'Starting engine process');

    const output = new Broadcast<string>({ maxRetained: options.maxRetainedLines });
    const proc = spawn(this.executable, args, {
      env: this.env,
      shell: false,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutLines = createLineSplitter((line) => output.push(line));
    const stderrLines = createLineSplitter((line) => output.push(line));
    proc.stdout.on('data', (data: Buffer) => stdoutLines.write(data.toString()));
    proc.stderr.on('data', (data: Buffer) => stderrLines.write(data.toString()));

    let hasExited = false;
    const exited = new Promise<CommandExit>((resolve) => {
      proc.on('close', (code, signal) => {
        hasExited = true;
        stdoutLines.flush();
        stderrLines.flush();
        output.close();
        resolve({ exitCode: code, signal });
      });
      proc.on('error', (err) => {
        hasExited = true;
        output.close();
        resolve({
          exitCode: null,
          signal: null,
          error: `${SPAWN_FAILURE_PREFIX} ${this.executable}: ${err.message}`,
        });
      });
    });

    return {
      lines: (lineOptions = {}) =>
        output.subscribe({ from: lineOptions.from ?? 0, signal: lineOptions.signal }),
      exited,
      get hasExited() {
        return hasExited;
      },
      get lineCount() {
        return output.total;
      },
      kill: (signal: NodeJS.Signals = 'SIGTERM') => {
        if (!hasExited) {
          proc.kill(signal);
        }
      },
    };
  }
}
