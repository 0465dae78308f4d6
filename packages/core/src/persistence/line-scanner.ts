/**
 * @fileoverview Newline-delimited byte scanning over a file handle
 *
 * Lines are split on the 0x0A byte before any decoding, so a torn multi-byte
 * sequence only ever damages its own line. Bytes after the final newline are
 * an in-flight append and are never reported.
 */

import type { FileHandle } from 'node:fs/promises';

const NEWLINE = 0x0a;

export interface ScanStats {
  bytesRead: number;
}

/**
 * Visit complete lines from `start` to the end of the file.
 * Returns the offset just past the last newline seen.
 */
export async function scanForward(
  handle: FileHandle,
  start: number,
  blockSize: number,
  onLine: (line: Buffer) => void,
  stats?: ScanStats
): Promise<number> {
  let position = start;
  let pending: Buffer = Buffer.alloc(0);
  const block = Buffer.alloc(blockSize);

  for (;;) {
    const { bytesRead } = await handle.read(block, 0, blockSize, position);
    if (bytesRead === 0) break;
    position += bytesRead;
    if (stats) stats.bytesRead += bytesRead;

    const fresh = block.subarray(0, bytesRead);
    const chunk = pending.length > 0 ? Buffer.concat([pending, fresh]) : fresh;
    let lineStart = 0;
    for (let i = 0; i < chunk.length; i++) {
      if (chunk[i] === NEWLINE) {
        if (i > lineStart) onLine(chunk.subarray(lineStart, i));
        lineStart = i + 1;
      }
    }
    // Copy: `block` is reused on the next read
    pending = Buffer.from(chunk.subarray(lineStart));
  }

  return position - pending.length;
}

/**
 * Visit complete lines from the end of the file towards the start, newest
 * first, until `onLine` returns true or the start is reached.
 */
export async function scanBackward(
  handle: FileHandle,
  size: number,
  blockSize: number,
  onLine: (line: Buffer) => boolean,
  stats?: ScanStats
): Promise<void> {
  let position = size;
  let remainder: Buffer = Buffer.alloc(0);
  let seenNewline = false;

  while (position > 0) {
    const length = Math.min(blockSize, position);
    position -= length;
    const block = Buffer.alloc(length);
    await handle.read(block, 0, length, position);
    if (stats) stats.bytesRead += length;

    const chunk = remainder.length > 0 ? Buffer.concat([block, remainder]) : block;
    let end = chunk.length;
    for (let i = chunk.length - 1; i >= 0; i--) {
      if (chunk[i] !== NEWLINE) continue;
      const line = chunk.subarray(i + 1, end);
      end = i;
      if (!seenNewline) {
        // Trailing bytes without a newline belong to an unfinished append
        seenNewline = true;
        continue;
      }
      if (line.length > 0 && onLine(line)) return;
    }
    remainder = chunk.subarray(0, end);
  }

  if (seenNewline && remainder.length > 0) {
    onLine(remainder);
  }
}
