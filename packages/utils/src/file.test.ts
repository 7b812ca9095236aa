import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, writeFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { listFiles, removeDir, ensureDir, getFileSizeBytes } from './file.js';

describe('file helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'trackdrop-file-'));
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('lists only regular files matching the extension filter, sorted by name', async () => {
    await writeFile(join(dir, 'b.mp3'), 'bb');
    await writeFile(join(dir, 'a.MP3'), 'a');
    await writeFile(join(dir, 'cover.jpg'), 'jpg');
    await mkdir(join(dir, 'nested.mp3'));

    const files = await listFiles(dir, ['.mp3']);

    expect(files.map(f => f.name)).toEqual(['a.MP3', 'b.mp3']);
    expect(files.map(f => f.size)).toEqual([1, 2]);
  });

  it('treats a missing directory as empty', async () => {
    expect(await listFiles(join(dir, 'missing'))).toEqual([]);
  });

  it('creates nested directories and removes them recursively', async () => {
    const nested = join(dir, 'x', 'y');
    await ensureDir(nested);
    await writeFile(join(nested, 'f.txt'), 'hello');

    expect(await getFileSizeBytes(join(nested, 'f.txt'))).toBe(5);

    await removeDir(join(dir, 'x'));
    expect(existsSync(join(dir, 'x'))).toBe(false);
  });
});
