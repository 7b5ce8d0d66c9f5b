import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { withTempFile } from '../temp-file.js';

describe('withTempFile()', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'infra-connectors-temp-test-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('provides an empty file under the given directory', async () => {
    const size = await withTempFile(async (filePath) => {
      expect(filePath.startsWith(root)).toBe(true);
      return (await stat(filePath)).size;
    }, { dir: root });

    expect(size).toBe(0);
  });

  it('returns the callback result and removes the file', async () => {
    const result = await withTempFile(async (filePath) => {
      await writeFile(filePath, 'payload');
      return readFile(filePath, 'utf8');
    }, { dir: root });

    expect(result).toBe('payload');
    expect(await readdir(root)).toEqual([]);
  });

  it('removes the file when the callback throws', async () => {
    await expect(
      withTempFile(async (filePath) => {
        await writeFile(filePath, 'partial');
        throw new Error('boom');
      }, { dir: root })
    ).rejects.toThrow('boom');

    expect(await readdir(root)).toEqual([]);
  });

  it('uses the prefix for its private directory', async () => {
    await withTempFile(async (filePath) => {
      expect(path.basename(path.dirname(filePath)).startsWith('stage-')).toBe(true);
    }, { dir: root, prefix: 'stage-' });
  });
});
