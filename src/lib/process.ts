/**
 * Process launcher.
 *
 * Starts external programs with argv arrays (no shell), either to completion
 * with captured output or detached with a handle that can stop them later.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { ExternalProcessError, TimeoutExceededError, errorMessage } from './errors.js';

/**
 * Handle to a process this tool started or found.
 */
export interface ProcessHandle {
  readonly pid: number | null;
  readonly name: string;
  /** Stops the process; resolves once the stop request was issued */
  terminate(): Promise<void>;
}

/**
 * Result of running a command to completion.
 */
export interface RunResult {
  /** Process exit code, or null when it was killed */
  exit_code: number | null;
  stdout: string;
  stderr: string;
  duration_ms: number;
  timed_out: boolean;
}

export interface RunOptions {
  /** Kill the command after this many milliseconds (0 means no timeout) */
  timeout_ms?: number;
  /** Kill the command when aborted */
  signal?: AbortSignal;
  cwd?: string;
}

export interface ProcessLauncher {
  spawn(executable: string, args: string[], options: { detached: boolean }): Promise<ProcessHandle>;
  run(executable: string, args: string[], options?: RunOptions): Promise<RunResult>;
  findProcess(name: string): Promise<ProcessHandle | null>;
  /** Stops every process with this image name; true if any was stopped */
  killByName(name: string): Promise<boolean>;
}

function renderCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].join(' ');
}

function killChild(child: ChildProcess): void {
  child.kill('SIGTERM');
  // Give it a moment to terminate gracefully, then force kill
  setTimeout(() => {
    if (child.exitCode === null && child.signalCode === null) {
      child.kill('SIGKILL');
    }
  }, 1000).unref();
}

/**
 * Runs a command to completion, capturing stdout and stderr.
 *
 * Never rejects: spawn failures resolve with exit code 127 and the error in
 * stderr, timeouts resolve with exit code null and `timed_out: true`.
 */
export function runCommand(
  executable: string,
  args: string[],
  options: RunOptions = {}
): Promise<RunResult> {
  const startTime = Date.now();
  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];

  return new Promise<RunResult>((resolve) => {
    let timeoutId: NodeJS.Timeout | null = null;
    let timedOut = false;
    let child: ChildProcess;

    const finish = (exitCode: number | null, extraStderr = '') => {
      if (timeoutId) clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onAbort);
      resolve({
        exit_code: exitCode,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8') + extraStderr,
        duration_ms: Date.now() - startTime,
        timed_out: timedOut,
      });
    };

    const onAbort = () => {
      killChild(child);
    };

    try {
      child = spawn(executable, args, {
        shell: false,
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        windowsHide: true,
      });
    } catch (error) {
      finish(127, `[Failed to spawn process: ${errorMessage(error)}]`);
      return;
    }

    child.stdout?.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    if (options.timeout_ms && options.timeout_ms > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        killChild(child);
      }, options.timeout_ms);
    }

    if (options.signal) {
      if (options.signal.aborted) {
        killChild(child);
      } else {
        options.signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    child.on('error', (error: Error) => {
      finish(127, `[Process error: ${error.message}]`);
    });

    child.on('close', (code: number | null) => {
      finish(code);
    });
  });
}

/**
 * Runs a command and throws unless it exits with code 0.
 *
 * @returns Combined stdout and stderr of the successful run
 * @throws {TimeoutExceededError} If the command ran past `timeout_ms`
 * @throws {ExternalProcessError} On a non-zero exit or spawn failure
 */
export async function runOrThrow(
  launcher: ProcessLauncher,
  executable: string,
  args: string[],
  options: RunOptions = {}
): Promise<string> {
  const rendered = renderCommand(executable, args);
  const result = await launcher.run(executable, args, options);
  if (result.timed_out) {
    throw new TimeoutExceededError(
      `Command timed out after ${options.timeout_ms ?? 0}ms: ${rendered}`,
      options.timeout_ms ?? 0
    );
  }
  if (result.exit_code !== 0) {
    const stderr = result.stderr.trim();
    throw new ExternalProcessError(
      `Command failed (${result.exit_code ?? 'killed'}): ${rendered}${stderr ? ` (${stderr})` : ''}`,
      rendered,
      result.exit_code,
      stderr
    );
  }
  return [result.stdout.trim(), result.stderr.trim()].filter(Boolean).join('\n');
}

/**
 * Extracts process ids for an image name from `tasklist /FO CSV /NH` output.
 */
export function parseTasklistCsv(output: string, name: string): number[] {
  const pids: number[] = [];
  const wanted = name.toLowerCase();
  for (const line of output.split(/\r?\n/)) {
    const match = line.match(/^"([^"]+)","(\d+)"/);
    if (match && match[1].toLowerCase() === wanted) {
      pids.push(Number.parseInt(match[2], 10));
    }
  }
  return pids;
}

/**
 * Extracts process ids from `pgrep` output (one pid per line).
 */
export function parsePgrepOutput(output: string): number[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => /^\d+$/.test(line))
    .map((line) => Number.parseInt(line, 10));
}

const isWindows = (): boolean => process.platform === 'win32';

function pidHandle(pid: number, name: string): ProcessHandle {
  return {
    pid,
    name,
    async terminate() {
      if (isWindows()) {
        const result = await runCommand('taskkill', ['/pid', String(pid), '/t', '/f'], { timeout_ms: 10_000 });
        if (result.exit_code !== 0) {
          throw new ExternalProcessError(
            `taskkill failed for pid ${pid}: ${result.stderr.trim()}`,
            'taskkill',
            result.exit_code,
            result.stderr
          );
        }
        return;
      }
      try {
        process.kill(pid, 'SIGTERM');
      } catch (error) {
        throw new ExternalProcessError(`Failed to stop pid ${pid}: ${errorMessage(error)}`, 'kill', null);
      }
    },
  };
}

function childHandle(child: ChildProcess, name: string): ProcessHandle {
  return {
    pid: child.pid ?? null,
    name,
    async terminate() {
      if (child.exitCode !== null || child.signalCode !== null) return;
      if (isWindows() && child.pid !== undefined) {
        await pidHandle(child.pid, name).terminate();
        return;
      }
      killChild(child);
    },
  };
}

/**
 * Launcher backed by node:child_process.
 */
export const nodeProcessLauncher: ProcessLauncher = {
  spawn(executable, args, options) {
    return new Promise<ProcessHandle>((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(executable, args, {
          shell: false,
          detached: options.detached,
          stdio: 'ignore',
          windowsHide: true,
        });
      } catch (error) {
        reject(
          new ExternalProcessError(
            `Failed to start ${renderCommand(executable, args)}: ${errorMessage(error)}`,
            executable,
            null
          )
        );
        return;
      }

      child.once('error', (error: Error) => {
        reject(
          new ExternalProcessError(
            `Failed to start ${renderCommand(executable, args)}: ${error.message}`,
            executable,
            null
          )
        );
      });
      child.once('spawn', () => {
        if (options.detached) child.unref();
        resolve(childHandle(child, executable));
      });
    });
  },

  run(executable, args, options) {
    return runCommand(executable, args, options);
  },

  async findProcess(name) {
    if (isWindows()) {
      const result = await runCommand('tasklist', ['/FI', `IMAGENAME eq ${name}`, '/FO', 'CSV', '/NH'], {
        timeout_ms: 10_000,
      });
      const [pid] = parseTasklistCsv(result.stdout, name);
      return pid === undefined ? null : pidHandle(pid, name);
    }
    const result = await runCommand('pgrep', ['-x', name], { timeout_ms: 10_000 });
    const [pid] = parsePgrepOutput(result.stdout);
    return pid === undefined ? null : pidHandle(pid, name);
  },

  async killByName(name) {
    const result = isWindows()
      ? await runCommand('taskkill', ['/f', '/im', name], { timeout_ms: 10_000 })
      : await runCommand('pkill', ['-x', name], { timeout_ms: 10_000 });
    return result.exit_code === 0;
  },
};
