/**
 * @module @infra-connectors/connector-runtime/transfer-io
 * Local side of file transfers: sources, destinations
 */

import { readFile, realpath, stat, writeFile } from 'node:fs/promises';
import type { TransferDestination, TransferSource } from '@infra-connectors/connector-contracts';

function isMissingPath(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

/**
 * Real path of `source` when it names an existing regular file,
 * `undefined` for anything that has to be staged first.
 */
export async function resolveLocalFile(source: TransferSource): Promise<string | undefined> {
  if (typeof source !== 'string') {
    return undefined;
  }

  try {
    const stats = await stat(source);
    return stats.isFile() ? await realpath(source) : undefined;
  } catch (error) {
    if (isMissingPath(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Read the full contents of a transfer source.
 * Text chunks from streams are encoded as UTF-8.
 */
export async function readSource(source: TransferSource): Promise<Buffer> {
  if (typeof source === 'string') {
    return readFile(source);
  }

  if (source instanceof Uint8Array) {
    return Buffer.from(source);
  }

  const chunks: Buffer[] = [];
  for await (const chunk of source) {
    if (typeof chunk === 'string') {
      chunks.push(Buffer.from(chunk, 'utf8'));
    } else if (chunk instanceof Uint8Array) {
      chunks.push(Buffer.from(chunk));
    } else {
      throw new TypeError(`Unsupported stream chunk type: ${typeof chunk}`);
    }
  }
  return Buffer.concat(chunks);
}

/**
 * Write bytes to a local path, or to an open stream without ending it.
 */
export async function writeDestination(destination: TransferDestination, data: Uint8Array): Promise<void> {
  if (typeof destination === 'string') {
    await writeFile(destination, data);
    return;
  }

  await new Promise<void>((resolve, reject) => {
    destination.write(data, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
