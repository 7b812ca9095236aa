import { describe, it, expect } from 'vitest';
import { executeCommand, streamCommand } from './command.js';

describe('executeCommand', () => {
  it('buffers output and reports the exit code', async () => {
    const result = await executeCommand('sh', ['-c', 'printf hello; exit 3']);

    expect(result).toMatchObject({ exitCode: 3, stdout: 'hello', timedOut: false, aborted: false });
  });
});

describe('streamCommand', () => {
  it('hands over non-empty lines in order', async () => {
    const lines: string[] = [];

    const result = await streamCommand('sh', ['-c', "printf 'one\\n\\n  two  \\n'"], {
      onLine: line => lines.push(line),
    });

    expect(lines).toEqual(['one', 'two']);
    expect(result.exitCode).toBe(0);
  });

  it('returns soon after the timeout even when a background process holds the output', async () => {
    const result = await streamCommand('sh', ['-c', 'sleep 8 & wait'], {
      timeout: 200,
      onLine: () => undefined,
    });

    expect(result.timedOut).toBe(true);
    expect(result.duration).toBeLessThan(2000);
  });

  it('kills a process that ignores the polite signal after the grace period', async () => {
    const result = await streamCommand('sh', ['-c', 'trap "" TERM; sleep 8'], {
      timeout: 100,
      killGraceMs: 100,
      onLine: () => undefined,
    });

    expect(result.timedOut).toBe(true);
    expect(result.duration).toBeLessThan(2000);
  });

  it('stops when aborted', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const result = await streamCommand('sh', ['-c', 'sleep 8'], {
      signal: controller.signal,
      onLine: () => undefined,
    });

    expect(result.aborted).toBe(true);
    expect(result.timedOut).toBe(false);
    expect(result.duration).toBeLessThan(2000);
  });

  it('does not start when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const lines: string[] = [];

    const result = await streamCommand('sh', ['-c', 'echo started'], {
      signal: controller.signal,
      onLine: line => lines.push(line),
    });

    expect(result).toEqual({ exitCode: 130, duration: 0, timedOut: false, aborted: true });
    expect(lines).toEqual([]);
  });

  it('rejects when the binary cannot be started', async () => {
    await expect(
      streamCommand('trackdrop-missing-binary', [], { onLine: () => undefined })
    ).rejects.toThrow('ENOENT');
  });
});
