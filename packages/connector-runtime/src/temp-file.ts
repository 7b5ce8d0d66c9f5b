/**
 * @module @infra-connectors/connector-runtime/temp-file
 * Scoped staging files for transfers
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

export interface TempFileOptions {
  /** Parent directory (default: os.tmpdir()) */
  dir?: string;
  /** Prefix of the private directory holding the file */
  prefix?: string;
}

/**
 * Create an empty staging file, hand its path to `fn`, and delete it when
 * `fn` settles, whether it resolved or threw.
 *
 * The file lives in its own `mkdtemp` directory so nothing else can
 * collide with it, and removing the directory removes whatever `fn` left
 * behind under that path.
 */
export async function withTempFile<T>(
  fn: (filePath: string) => Promise<T>,
  options: TempFileOptions = {}
): Promise<T> {
  const dir = await mkdtemp(path.join(options.dir ?? tmpdir(), options.prefix ?? 'infra-connectors-'));
  const filePath = path.join(dir, 'staging');

  try {
    await writeFile(filePath, '');
    return await fn(filePath);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
