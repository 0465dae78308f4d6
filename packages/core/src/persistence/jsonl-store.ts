/**
 * @fileoverview File-backed store for history, memory and jobs
 *
 * History logs are append-only JSONL files guarded by an advisory lock per
 * append; readers take the lock only when it is free. Whole documents
 * (global memory, summaries, cursors, jobs) are replaced by atomic rename
 * and need no lock. Safe for concurrent callers in one process and across
 * processes sharing a data directory.
 */

import { open, appendFile, readdir, stat, mkdir } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import * as path from 'node:path';
import * as lockfile from 'proper-lockfile';
import type { Message } from '../types/messages.js';
import type { ScheduledJob } from '../types/jobs.js';
import type { LoadHistoryOptions, StoragePort } from '../types/ports.js';
import { createLogger } from '../logging/logger.js';
import { isNotFoundError, readFileOr, writeFileAtomic, writeJsonAtomic } from '../utils/atomic-write.js';
import { DataLayout } from './paths.js';
import { CursorFileSchema, JobsFileSchema, decodeMessageLine, encodeMessageLine, toJobRecords } from './records.js';
import { scanBackward, scanForward, type ScanStats } from './line-scanner.js';

const logger = createLogger('persistence');

// =============================================================================
// Types
// =============================================================================

export interface JsonlStoreConfig {
  /** Root of the data directory */
  dataDir: string;
  /** Block size for history reads (default 64 KiB) */
  readBlockSize?: number;
  /** Lock wait for appends before giving up (default ~5s) */
  lockRetries?: number;
}

interface CountCacheEntry {
  /** Offset just past the last newline counted */
  offset: number;
  count: number;
}

interface MalformedTally {
  count: number;
  preview?: string;
}

const DEFAULT_READ_BLOCK_SIZE = 64 * 1024;
const PREVIEW_LENGTH = 80;
const LOCK_STALE_MS = 10_000;

// =============================================================================
// Store
// =============================================================================

export class JsonlStore implements StoragePort {
  readonly layout: DataLayout;
  private readonly blockSize: number;
  private readonly lockRetries: number;
  private readonly countCache = new Map<string, CountCacheEntry>();

  /** Cumulative bytes read from history logs (observable by tests) */
  readonly stats: ScanStats = { bytesRead: 0 };

  constructor(config: JsonlStoreConfig) {
    this.layout = new DataLayout(config.dataDir);
    this.blockSize = config.readBlockSize ?? DEFAULT_READ_BLOCK_SIZE;
    this.lockRetries = config.lockRetries ?? 50;
  }

  // ===========================================================================
  // History
  // ===========================================================================

  async appendMessage(sessionId: string, message: Message): Promise<void> {
    const filePath = this.layout.historyFile(sessionId);
    await mkdir(path.dirname(filePath), { recursive: true });

    const release = await lockfile.lock(filePath, {
      realpath: false,
      stale: LOCK_STALE_MS,
      retries: { retries: this.lockRetries, factor: 1.3, minTimeout: 5, maxTimeout: 200 },
    });
    try {
      // A crash mid-append leaves a torn tail; start a fresh line after it
      const prefix = (await this.endsWithoutNewline(filePath)) ? '\n' : '';
      await appendFile(filePath, prefix + encodeMessageLine(message), 'utf8');
    } finally {
      await release();
    }
  }

  async loadHistory(sessionId: string, options: LoadHistoryOptions = {}): Promise<Message[]> {
    const { lastN } = options;
    if (lastN !== undefined && lastN <= 0) {
      return [];
    }

    const filePath = this.layout.historyFile(sessionId);
    return this.withReadLock(filePath, async () => {
      const handle = await this.openIfExists(filePath);
      if (!handle) return [];
      try {
        const tally: MalformedTally = { count: 0 };
        const messages =
          lastN === undefined
            ? await this.readAll(handle, tally)
            : await this.readTail(handle, lastN, tally);
        this.reportMalformed(sessionId, tally);
        return messages;
      } finally {
        await handle.close();
      }
    });
  }

  async countMessages(sessionId: string): Promise<number> {
    const filePath = this.layout.historyFile(sessionId);
    const handle = await this.openIfExists(filePath);
    if (!handle) {
      this.countCache.delete(filePath);
      return 0;
    }

    try {
      const { size } = await handle.stat();
      let entry = this.countCache.get(filePath) ?? { offset: 0, count: 0 };
      if (size < entry.offset) {
        logger.warn('History log shrank, recounting', { sessionId, size, offset: entry.offset });
        entry = { offset: 0, count: 0 };
      }
      if (size === entry.offset) {
        return entry.count;
      }

      let count = entry.count;
      const offset = await scanForward(
        handle,
        entry.offset,
        this.blockSize,
        (line) => {
          if (decodeMessageLine(line).ok) count++;
        },
        this.stats
      );
      this.countCache.set(filePath, { offset, count });
      return count;
    } finally {
      await handle.close();
    }
  }

  async listSessions(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.layout.sessionsDir);
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }
    return entries
      .map((name) => this.layout.sessionIdForFile(name))
      .filter((id): id is string => id !== null)
      .sort();
  }

  // ===========================================================================
  // Documents
  // ===========================================================================

  async loadGlobalMemory(): Promise<string> {
    return readFileOr(this.layout.globalMemoryFile, '');
  }

  async saveGlobalMemory(content: string): Promise<void> {
    await writeFileAtomic(this.layout.globalMemoryFile, content);
  }

  async loadSessionSummary(sessionId: string): Promise<string> {
    return readFileOr(this.layout.summaryFile(sessionId), '');
  }

  async saveSessionSummary(sessionId: string, summary: string): Promise<void> {
    await writeFileAtomic(this.layout.summaryFile(sessionId), summary);
  }

  async loadConsolidatedCursor(sessionId: string): Promise<number> {
    const filePath = this.layout.metaFile(sessionId);
    const raw = await readFileOr(filePath, '');
    if (raw === '') return 0;

    const parsed = CursorFileSchema.safeParse(this.parseJson(raw));
    if (!parsed.success) {
      logger.warn('Invalid cursor file, treating as 0', { sessionId, filePath });
      return 0;
    }
    return parsed.data.cursor;
  }

  async saveConsolidatedCursor(sessionId: string, cursor: number): Promise<void> {
    if (!Number.isInteger(cursor) || cursor < 0) {
      throw new RangeError(`Cursor must be a non-negative integer, got ${cursor}`);
    }
    await writeJsonAtomic(this.layout.metaFile(sessionId), { cursor });
  }

  async loadJobs(): Promise<ScheduledJob[]> {
    const filePath = this.layout.jobsFile;
    const raw = await readFileOr(filePath, '');
    if (raw === '') return [];

    const parsed = JobsFileSchema.safeParse(this.parseJson(raw));
    if (!parsed.success) {
      logger.warn('Invalid jobs file, ignoring its contents', {
        filePath,
        issue: parsed.error.issues[0]?.message,
      });
      return [];
    }
    return parsed.data;
  }

  async saveJobs(jobs: ScheduledJob[]): Promise<void> {
    await writeJsonAtomic(this.layout.jobsFile, toJobRecords(jobs));
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async readAll(handle: FileHandle, tally: MalformedTally): Promise<Message[]> {
    const messages: Message[] = [];
    await scanForward(
      handle,
      0,
      this.blockSize,
      (line) => {
        const decoded = decodeMessageLine(line);
        if (decoded.ok) {
          messages.push(decoded.message);
        } else {
          this.tallyMalformed(tally, line);
        }
      },
      this.stats
    );
    return messages;
  }

  private async readTail(handle: FileHandle, lastN: number, tally: MalformedTally): Promise<Message[]> {
    const { size } = await handle.stat();
    const newestFirst: Message[] = [];
    await scanBackward(
      handle,
      size,
      this.blockSize,
      (line) => {
        const decoded = decodeMessageLine(line);
        if (decoded.ok) {
          newestFirst.push(decoded.message);
        } else {
          this.tallyMalformed(tally, line);
        }
        return newestFirst.length >= lastN;
      },
      this.stats
    );
    return newestFirst.reverse();
  }

  private tallyMalformed(tally: MalformedTally, line: Buffer): void {
    tally.count++;
    tally.preview ??= line.subarray(0, PREVIEW_LENGTH * 4).toString('utf8').slice(0, PREVIEW_LENGTH);
  }

  private reportMalformed(sessionId: string, tally: MalformedTally): void {
    if (tally.count > 0) {
      logger.warn('Skipped malformed history lines', {
        sessionId,
        skipped: tally.count,
        preview: tally.preview,
      });
    }
  }

  /**
   * Run `fn` holding the log lock if it is free right now, otherwise without it.
   */
  private async withReadLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
    let release: (() => Promise<void>) | null = null;
    try {
      release = await lockfile.lock(filePath, { realpath: false, stale: LOCK_STALE_MS, retries: 0 });
    } catch (error) {
      logger.debug('History read proceeding without lock', {
        filePath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
    try {
      return await fn();
    } finally {
      if (release) await release();
    }
  }

  private async openIfExists(filePath: string): Promise<FileHandle | null> {
    try {
      return await open(filePath, 'r');
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }
  }

  private async endsWithoutNewline(filePath: string): Promise<boolean> {
    let size: number;
    try {
      size = (await stat(filePath)).size;
    } catch (error) {
      if (isNotFoundError(error)) return false;
      throw error;
    }
    if (size === 0) return false;

    const handle = await open(filePath, 'r');
    try {
      const last = Buffer.alloc(1);
      await handle.read(last, 0, 1, size - 1);
      return last[0] !== 0x0a;
    } finally {
      await handle.close();
    }
  }

  private parseJson(raw: string): unknown {
    try {
      return JSON.parse(raw);
    } catch {
      return undefined;
    }
  }
}

export function createJsonlStore(config: JsonlStoreConfig): JsonlStore {
  return new JsonlStore(config);
}
