/**
 * Tool Runner
 *
 * Seam between the orchestrator and the external download tools. The
 * process-backed implementation spawns the binary; tests substitute a
 * scripted runner that replays output lines.
 */

import { executeCommand, streamCommand } from '@trackdrop/utils';

export interface ToolInvocation {
  /** Binary to execute */
  tool: string;
  args: string[];
  cwd: string;
  timeoutMs: number;
}

export interface ToolRunResult {
  exitCode: number;
  timedOut: boolean;
  aborted: boolean;
  durationMs: number;
}

export interface ToolCaptureResult extends ToolRunResult {
  stdout: string;
  stderr: string;
}

export interface ToolRunner {
  /** Run to completion, handing each output line to `onLine` as it arrives */
  run(invocation: ToolInvocation, onLine: (line: string) => void, signal?: AbortSignal): Promise<ToolRunResult>;
  /** Run to completion and return buffered output */
  capture(invocation: ToolInvocation, signal?: AbortSignal): Promise<ToolCaptureResult>;
}

export class ProcessToolRunner implements ToolRunner {
  async run(
    invocation: ToolInvocation,
    onLine: (line: string) => void,
    signal?: AbortSignal
  ): Promise<ToolRunResult> {
    const result = await streamCommand(invocation.tool, invocation.args, {
      cwd: invocation.cwd,
      timeout: invocation.timeoutMs,
      signal,
      onLine,
    });

    return {
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      aborted: result.aborted,
      durationMs: result.duration,
    };
  }

  async capture(invocation: ToolInvocation, signal?: AbortSignal): Promise<ToolCaptureResult> {
    const result = await executeCommand(invocation.tool, invocation.args, {
      cwd: invocation.cwd,
      timeout: invocation.timeoutMs,
      signal,
    });

    return {
      exitCode: result.exitCode,
      timedOut: result.timedOut,
      aborted: result.aborted,
      durationMs: result.duration,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}
