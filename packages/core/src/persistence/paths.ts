/**
 * @fileoverview Data directory layout
 *
 * ```
 * <dataDir>/
 *   sessions/<safe-id>.jsonl        append-only history log
 *   sessions/<safe-id>.meta.json    consolidation cursor
 *   memory/<safe-id>/summary.md     consolidation summary
 *   workspace/MEMORY.md             global memory document
 *   cron/jobs.json                  scheduled jobs
 * ```
 */

import * as path from 'node:path';

const SAFE_CHAR = /[A-Za-z0-9._@+=-]/;
const HISTORY_SUFFIX = '.jsonl';

function percentEncode(char: string): string {
  return Array.from(Buffer.from(char, 'utf8'))
    .map((byte) => `%${byte.toString(16).toUpperCase().padStart(2, '0')}`)
    .join('');
}

/**
 * Filesystem-safe form of a session id. `:` becomes `__`; other characters
 * outside `[A-Za-z0-9._@+=-]` are percent-encoded, as is a leading dot.
 */
export function safeSessionId(sessionId: string): string {
  let result = '';
  for (const char of sessionId) {
    if (char === ':') {
      result += '__';
    } else if (SAFE_CHAR.test(char)) {
      result += char;
    } else {
      result += percentEncode(char);
    }
  }
  if (result.startsWith('.')) {
    result = `%2E${result.slice(1)}`;
  }
  return result || '%00';
}

/**
 * Best-effort inverse of safeSessionId, used to list sessions
 */
export function sessionIdFromSafe(safeId: string): string {
  const withColons = safeId.replace(/__/g, ':');
  try {
    return decodeURIComponent(withColons);
  } catch {
    return withColons;
  }
}

export class DataLayout {
  readonly root: string;

  constructor(root: string) {
    this.root = root;
  }

  get sessionsDir(): string {
    return path.join(this.root, 'sessions');
  }

  historyFile(sessionId: string): string {
    return path.join(this.sessionsDir, `${safeSessionId(sessionId)}${HISTORY_SUFFIX}`);
  }

  metaFile(sessionId: string): string {
    return path.join(this.sessionsDir, `${safeSessionId(sessionId)}.meta.json`);
  }

  summaryFile(sessionId: string): string {
    return path.join(this.root, 'memory', safeSessionId(sessionId), 'summary.md');
  }

  get globalMemoryFile(): string {
    return path.join(this.root, 'workspace', 'MEMORY.md');
  }

  get jobsFile(): string {
    return path.join(this.root, 'cron', 'jobs.json');
  }

  /**
   * Session id for a file name in sessionsDir, or null for non-history files
   */
  sessionIdForFile(fileName: string): string | null {
    if (!fileName.endsWith(HISTORY_SUFFIX)) return null;
    return sessionIdFromSafe(fileName.slice(0, -HISTORY_SUFFIX.length));
  }
}
