/**
 * @fileoverview Memory manager
 *
 * Assembles the context for each model call from the base prompt, global
 * memory, the session's consolidation summary, skills and a bounded tail
 * of history. When a session's unconsolidated history passes the
 * threshold, older messages are summarized into the running summary and
 * the cursor moves past them. All reads and writes go through StoragePort.
 */

import type { Message } from '../types/messages.js';
import type { ModelPort, SkillsPort, StoragePort } from '../types/ports.js';
import type { Session } from '../types/session.js';
import type { OwnerAlias } from '../settings/types.js';
import { assistantMessage, systemMessage, userMessage } from '../types/messages.js';
import { getSessionId } from '../types/session.js';
import { buildSkillsXml } from '../skills/xml.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../utils/errors.js';
import { ASSISTANT_SENDER, OwnerMatcher, labelMessage } from './labels.js';
import { buildTranscript, keepRecentCount, mergeSummary, requestSummary, summarySentenceBudget } from './consolidation.js';

const logger = createLogger('memory');

// =============================================================================
// Types
// =============================================================================

export interface MemoryManagerConfig {
  storage: StoragePort;
  /** Model used for summarization; consolidation is off without one */
  model?: ModelPort | null;
  skills?: SkillsPort | null;
  /** Unconsolidated message count that triggers consolidation (default 100) */
  consolidationThreshold?: number;
  /** Fraction of the threshold kept verbatim (default 0.2) */
  keepRecentRatio?: number;
  /** Word budget of the running summary (default 600) */
  summaryWordLimit?: number;
  ownerAliases?: OwnerAlias[];
}

export interface SessionSnapshot {
  memory: string;
  summary: string;
  cursor: number;
  total: number;
  window: Message[];
}

export interface ConsolidationResult {
  /** Messages to place in context */
  history: Message[];
  /** Summary to place in context (refreshed on success) */
  summary: string;
  succeeded: boolean;
}

export const MEMORY_HEADING = '## Your Memory';
export const SUMMARY_HEADING = '## Conversation Summary';
export const CONSOLIDATION_WARNING =
  '## Memory Notice\n\nThis conversation will soon be summarized and older messages will leave your context. ' +
  'Save anything critical to long-term memory now with the memory_write tool.';

/** Messages summarized per model call, in thresholds */
const CHUNK_FACTOR = 4;

// =============================================================================
// Manager
// =============================================================================

export class MemoryManager {
  private readonly storage: StoragePort;
  private readonly model: ModelPort | null;
  private readonly skills: SkillsPort | null;
  private readonly owners: OwnerMatcher;
  readonly threshold: number;
  readonly keepRecent: number;
  readonly summaryWordLimit: number;

  constructor(config: MemoryManagerConfig) {
    const threshold = config.consolidationThreshold ?? 100;
    if (!Number.isInteger(threshold) || threshold < 2) {
      throw new RangeError(`consolidationThreshold must be an integer >= 2, got ${threshold}`);
    }
    this.storage = config.storage;
    this.model = config.model ?? null;
    this.skills = config.skills ?? null;
    this.owners = new OwnerMatcher(config.ownerAliases);
    this.threshold = threshold;
    this.keepRecent = keepRecentCount(threshold, config.keepRecentRatio ?? 0.2);
    this.summaryWordLimit = config.summaryWordLimit ?? 600;
  }

  /**
   * Full message list for a model call: system, labelled history, user.
   */
  async buildContext(session: Session, systemPrompt: string, userText: string): Promise<Message[]> {
    const sessionId = getSessionId(session);
    const snapshot = await this.loadSnapshot(sessionId);
    const unconsolidated = Math.max(0, snapshot.total - snapshot.cursor);

    let history: Message[];
    let summary = snapshot.summary;
    let consolidationRan = false;

    if (unconsolidated > this.threshold && this.model) {
      const result = await this.consolidate(sessionId, snapshot);
      history = result.history;
      summary = result.summary;
      consolidationRan = true;
    } else {
      history = unconsolidated > 0 ? snapshot.window.slice(-Math.min(unconsolidated, snapshot.window.length)) : [];
    }

    const showWarning = !consolidationRan && unconsolidated >= this.threshold - 2;
    const system = await this.composeSystemPrompt(systemPrompt, snapshot.memory, summary, showWarning);

    return [
      systemMessage(system),
      ...history.map((message) => labelMessage(message, this.owners)),
      userMessage(userText),
    ];
  }

  /**
   * Summarize the range between the cursor and the kept tail, oldest first,
   * in chunks of at most CHUNK_FACTOR thresholds. Each chunk's summary is
   * saved before the cursor moves past it.
   *
   * The first failure stops the pass; chunks already summarized stay
   * consolidated. The kept tail is returned as history either way.
   */
  async consolidate(sessionId: string, snapshot: SessionSnapshot): Promise<ConsolidationResult> {
    const { total, cursor } = snapshot;
    const tail = snapshot.window.slice(-this.keepRecent);
    const unchanged: ConsolidationResult = { history: tail, summary: snapshot.summary, succeeded: false };

    const model = this.model;
    if (!model) {
      return unchanged;
    }

    const cutoff = total - this.keepRecent;
    if (cutoff <= cursor) {
      return unchanged;
    }

    const pending = await this.loadPending(sessionId, snapshot, cutoff);
    if (!pending) {
      return unchanged;
    }

    const chunkSize = this.threshold * CHUNK_FACTOR;
    let summary = snapshot.summary;
    let position = pending.start;

    for (let offset = 0; offset < pending.messages.length; offset += chunkSize) {
      const chunk = pending.messages.slice(offset, offset + chunkSize);
      const transcript = buildTranscript(chunk);
      if (!transcript) {
        // Text-free chunk: the cursor moves past it with the next summary
        continue;
      }

      const addition = await requestSummary(model, transcript, summarySentenceBudget(chunk.length));
      if (addition === null) {
        logger.warn('Consolidation stopped: no summary produced', { sessionId, cursor: position });
        return { history: tail, summary, succeeded: false };
      }
      const merged = mergeSummary(summary, addition, this.summaryWordLimit);
      try {
        await this.storage.saveSessionSummary(sessionId, merged);
      } catch (error) {
        logger.warn('Consolidation summary not saved, cursor left in place', {
          sessionId,
          cursor: position,
          error: errorMessage(error),
        });
        return { history: tail, summary, succeeded: false };
      }
      summary = merged;

      const next = pending.start + offset + chunk.length;
      try {
        await this.storage.saveConsolidatedCursor(sessionId, next);
      } catch (error) {
        // Summary is durable; this chunk is summarized again next time
        logger.warn('Consolidation cursor not saved', { sessionId, error: errorMessage(error) });
        return { history: tail, summary, succeeded: false };
      }
      position = next;
    }

    if (position === pending.start) {
      logger.debug('Nothing to consolidate', { sessionId, eligible: pending.messages.length });
      return unchanged;
    }

    logger.info('History consolidated', {
      sessionId,
      summarized: position - pending.start,
      cursor: position,
      summaryWords: summary.split(/\s+/).filter(Boolean).length,
    });
    return { history: tail, summary, succeeded: true };
  }

  /**
   * Append the user turn then the assistant turn, even when the reply is empty.
   */
  async persistExchange(session: Session, userText: string, reply: string): Promise<void> {
    const sessionId = getSessionId(session);
    await this.storage.appendMessage(
      sessionId,
      userMessage(userText, { channel: session.channel, senderId: session.senderId })
    );
    await this.storage.appendMessage(
      sessionId,
      assistantMessage(reply, { channel: session.channel, senderId: ASSISTANT_SENDER })
    );
  }

  /**
   * Messages from the cursor up to `cutoff`, reading past the context
   * window when the backlog is larger. Null when the backlog cannot be read.
   */
  private async loadPending(
    sessionId: string,
    snapshot: SessionSnapshot,
    cutoff: number
  ): Promise<{ start: number; messages: Message[] } | null> {
    const { total, cursor } = snapshot;
    let window = snapshot.window;
    if (total - window.length > cursor) {
      try {
        window = await this.storage.loadHistory(sessionId, { lastN: total - cursor });
      } catch (error) {
        logger.warn('Could not read consolidation backlog', { sessionId, error: errorMessage(error) });
        return null;
      }
    }
    const windowStart = total - window.length;
    const start = Math.max(cursor, windowStart);
    return { start, messages: window.slice(start - windowStart, cutoff - windowStart) };
  }

  private async loadSnapshot(sessionId: string): Promise<SessionSnapshot> {
    const [memory, summary, cursor, total, window] = await Promise.all([
      this.storage.loadGlobalMemory(),
      this.storage.loadSessionSummary(sessionId),
      this.storage.loadConsolidatedCursor(sessionId),
      this.storage.countMessages(sessionId),
      this.storage.loadHistory(sessionId, { lastN: this.threshold + this.keepRecent }),
    ]);
    // A cursor past the end means the log was truncated externally
    return { memory, summary, cursor: Math.min(cursor, total), total, window };
  }

  private async composeSystemPrompt(
    base: string,
    memory: string,
    summary: string,
    showWarning: boolean
  ): Promise<string> {
    const sections = [base];

    if (memory.trim()) {
      sections.push(`${MEMORY_HEADING}\n\n${memory.trim()}`);
    }
    if (summary.trim()) {
      sections.push(`${SUMMARY_HEADING}\n\n${summary.trim()}`);
    }
    if (this.skills) {
      sections.push(...(await this.skillSections(this.skills)));
    }
    if (showWarning) {
      sections.push(CONSOLIDATION_WARNING);
    }

    return sections.join('\n\n');
  }

  private async skillSections(skills: SkillsPort): Promise<string[]> {
    try {
      const list = await skills.listSkills();
      const sections: string[] = [];
      const xml = buildSkillsXml(list);
      if (xml) sections.push(xml);
      for (const skill of list) {
        if (skill.always && skill.available) {
          sections.push((await skills.loadSkillBody(skill.name)).trim());
        }
      }
      return sections;
    } catch (error) {
      logger.warn('Skills unavailable for this turn', { error: errorMessage(error) });
      return [];
    }
  }
}

export function createMemoryManager(config: MemoryManagerConfig): MemoryManager {
  return new MemoryManager(config);
}
