/**
 * @fileoverview Whole-file writes that readers never observe half-done
 *
 * Content goes to a temp file in the target's directory, is fsynced, then
 * renamed over the target. Readers see either the old or the new document.
 */

import { mkdir, open, rename, unlink, readFile } from 'node:fs/promises';
import * as path from 'node:path';

export async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
}

export function isNotFoundError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await ensureParentDir(filePath);

  const tempPath = `${filePath}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(16).slice(2)}`;
  try {
    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => undefined);
    throw error;
  }
}

export async function writeJsonAtomic(filePath: string, payload: unknown): Promise<void> {
  await writeFileAtomic(filePath, `${JSON.stringify(payload, null, 2)}\n`);
}

/**
 * Read a UTF-8 file, or return `fallback` when it does not exist
 */
export async function readFileOr(filePath: string, fallback: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (error) {
    if (isNotFoundError(error)) {
      return fallback;
    }
    throw error;
  }
}
