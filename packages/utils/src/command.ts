/**
 * Command Execution Wrapper
 *
 * Safe wrapper for executing external commands with:
 * - Hard wall-clock timeout (SIGTERM, then SIGKILL, to the whole process group)
 * - Cooperative cancellation through AbortSignal
 * - Either buffered output or line-by-line streaming
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number; // milliseconds
  /** Wait between SIGTERM and SIGKILL */
  killGraceMs?: number;
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

export interface StreamCommandOptions extends Omit<CommandOptions, 'maxOutputSize'> {
  /** Called for every stdout/stderr line, in arrival order */
  onLine: (line: string) => void;
}

export interface StreamCommandResult {
  exitCode: number;
  duration: number;
  timedOut: boolean;
  aborted: boolean;
}

const DEFAULT_KILL_GRACE_MS = 2000;

/**
 * Execute an external command and buffer its output
 *
 * @param command - The command to execute
 * @param args - Command arguments
 * @param options - Execution options
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
  } = options;

  let stdout = '';
  let stderr = '';
  let stdoutSize = 0;
  let stderrSize = 0;

  const result = await runChild(command, args, options, (child) => {
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });
  });

  return { ...result, stdout, stderr };
}

/**
 * Execute an external command and hand every output line to a callback
 * while it runs. stdout and stderr are merged, the way the download tools
 * interleave status and error output.
 */
export async function streamCommand(
  command: string,
  args: string[],
  options: StreamCommandOptions
): Promise<StreamCommandResult> {
  const { onLine, ...rest } = options;

  return runChild(command, args, rest, (child) => {
    for (const stream of [child.stdout, child.stderr]) {
      if (!stream) continue;
      const lines = createInterface({ input: stream, crlfDelay: Infinity });
      lines.on('line', (raw: string) => {
        const line = raw.trim();
        if (line) {
          onLine(line);
        }
      });
    }
  });
}

function runChild(
  command: string,
  args: string[],
  options: Omit<CommandOptions, 'maxOutputSize'>,
  attach: (child: ChildProcess) => void
): Promise<StreamCommandResult> {
  const {
    cwd = process.cwd(),
    env = process.env,
    timeout = 300000, // 5 minutes default
    killGraceMs = DEFAULT_KILL_GRACE_MS,
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;
  let aborted = false;

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      resolve({ exitCode: 130, duration: 0, timedOut: false, aborted: true });
      return;
    }

    // Own process group, so a kill reaches everything the tool started
    const child = spawn(command, args, {
      cwd,
      env,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: true,
    });

    let settled = false;
    let terminating = false;
    let exitCode: number | undefined;
    let forceKillId: NodeJS.Timeout | undefined;

    const cleanup = (): void => {
      clearTimeout(timeoutId);
      clearTimeout(forceKillId);
      signal?.removeEventListener('abort', onAbort);
    };

    const finish = (code: number): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve({
        exitCode: code,
        duration: Date.now() - startTime,
        timedOut,
        aborted,
      });
    };

    // Once killed, stop waiting on pipes a leftover descendant may hold
    const abandon = (code: number): void => {
      signalGroup(child, 'SIGKILL');
      child.stdout?.destroy();
      child.stderr?.destroy();
      finish(code);
    };

    const terminate = (): void => {
      if (terminating) return;
      terminating = true;
      if (exitCode !== undefined) {
        abandon(exitCode);
        return;
      }
      signalGroup(child, 'SIGTERM');
      forceKillId = setTimeout(() => signalGroup(child, 'SIGKILL'), killGraceMs);
    };

    // Handle timeout
    const timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeout);

    // Handle abort signal
    const onAbort = (): void => {
      aborted = true;
      terminate();
    };
    signal?.addEventListener('abort', onAbort, { once: true });

    attach(child);

    child.on('exit', (code, exitSignal) => {
      exitCode = code ?? (exitSignal ? 128 : 1);
      if (terminating) {
        abandon(exitCode);
      }
    });

    // Normal completion waits for the pipes to drain
    child.on('close', (code, exitSignal) => {
      finish(exitCode ?? code ?? (exitSignal ? 128 : 1));
    });

    // Handle spawn errors
    child.on('error', (error) => {
      if (settled) return;
      settled = true;
      cleanup();
      reject(error);
    });
  });
}

function signalGroup(child: ChildProcess, killSignal: NodeJS.Signals): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, killSignal);
  } catch {
    // No group left (ESRCH) or no group support: signal the child itself
    child.kill(killSignal);
  }
}

/**
 * Check whether a binary can be started, returning its first version line
 */
export async function probeBinaryVersion(
  binary: string,
  args: string[] = ['--version']
): Promise<string | null> {
  try {
    const result = await executeCommand(binary, args, { timeout: 15000 });
    if (result.exitCode !== 0) {
      return null;
    }
    return result.stdout.split('\n')[0]?.trim() ?? '';
  } catch {
    return null;
  }
}
