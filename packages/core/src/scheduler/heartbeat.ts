/**
 * @fileoverview Heartbeat
 *
 * Periodically wakes the agent with a fixed prompt so it can act on
 * standing instructions in the workspace HEARTBEAT.md. Replies consisting
 * of HEARTBEAT_OK are dropped; anything else goes to the channel that was
 * active most recently.
 */

import * as path from 'node:path';
import type { ChannelPort } from '../types/ports.js';
import type { Session } from '../types/session.js';
import type { AgentLoop } from '../agent/agent-loop.js';
import { CollectingChannel } from '../agent/collecting-channel.js';
import { HEARTBEAT_PROMPT } from '../settings/defaults.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../utils/errors.js';
import { readFileOr } from '../utils/atomic-write.js';

const logger = createLogger('heartbeat');

export const HEARTBEAT_OK_TOKEN = 'HEARTBEAT_OK';
export const HEARTBEAT_FILE = 'HEARTBEAT.md';
export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30 * 60 * 1000;

const EMPTY_CHECKBOXES = new Set(['- [ ]', '* [ ]']);
const CHECKED_PREFIXES = ['- [x]', '* [x]', '- [X]', '* [X]'];

/**
 * True when HEARTBEAT.md holds nothing to act on: only blank lines,
 * headings, single-line HTML comments, empty checkboxes and ticked items.
 */
export function isHeartbeatEmpty(content: string | null | undefined): boolean {
  if (!content) return true;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line) continue;
    if (line.startsWith('#')) continue;
    if (line.startsWith('<!--')) continue;
    if (EMPTY_CHECKBOXES.has(line)) continue;
    if (CHECKED_PREFIXES.some((prefix) => line.startsWith(prefix))) continue;
    return false;
  }
  return true;
}

/**
 * Reply text with the OK token removed; empty when the agent had nothing to say
 */
export function stripHeartbeatToken(reply: string): string {
  return reply.split(HEARTBEAT_OK_TOKEN).join('').trim();
}

// =============================================================================
// Last active channel
// =============================================================================

export interface ActiveChannel {
  session: Session;
  channel: ChannelPort;
}

/**
 * Remembers where the most recent inbound message came from
 */
export class LastChannelTracker {
  private last: ActiveChannel | null = null;

  update(session: Session, channel: ChannelPort): void {
    this.last = { session, channel };
  }

  get current(): ActiveChannel | null {
    return this.last;
  }
}

// =============================================================================
// Service
// =============================================================================

export type HeartbeatTickResult =
  | 'skipped-no-channel'
  | 'skipped-busy'
  | 'skipped-empty'
  | 'ok'
  | 'delivered'
  | 'error';

export interface HeartbeatServiceConfig {
  agent: Pick<AgentLoop, 'run'>;
  tracker: LastChannelTracker;
  /** Directory containing HEARTBEAT.md */
  workspace: string;
  intervalMs?: number;
  prompt?: string;
}

export class HeartbeatService {
  private readonly agent: Pick<AgentLoop, 'run'>;
  private readonly tracker: LastChannelTracker;
  private readonly heartbeatFile: string;
  private readonly intervalMs: number;
  private readonly prompt: string;
  private timer: NodeJS.Timeout | null = null;
  private beating = false;

  constructor(config: HeartbeatServiceConfig) {
    this.agent = config.agent;
    this.tracker = config.tracker;
    this.heartbeatFile = path.join(config.workspace, HEARTBEAT_FILE);
    this.intervalMs = config.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.prompt = config.prompt ?? HEARTBEAT_PROMPT;
  }

  async tick(): Promise<HeartbeatTickResult> {
    const target = this.tracker.current;
    if (!target) {
      logger.debug('No active channel yet, skipping heartbeat');
      return 'skipped-no-channel';
    }
    if (this.beating) {
      return 'skipped-busy';
    }

    this.beating = true;
    try {
      const content = await readFileOr(this.heartbeatFile, '');
      if (isHeartbeatEmpty(content)) {
        logger.debug('HEARTBEAT.md has nothing actionable');
        return 'skipped-empty';
      }

      const collector = new CollectingChannel();
      const outcome = await this.agent.run(target.session, this.prompt, collector);
      if (outcome.status === 'model_error' || outcome.status === 'aborted') {
        logger.warn('Heartbeat turn did not complete', { status: outcome.status });
        return 'error';
      }

      const text = stripHeartbeatToken(collector.collectedText);
      if (!text) {
        logger.debug('Heartbeat OK');
        return 'ok';
      }

      await target.channel.send({ session: target.session, text, metadata: {} });
      logger.info('Heartbeat alert delivered', { channel: target.session.channel });
      return 'delivered';
    } catch (error) {
      logger.error('Heartbeat failed', { error: errorMessage(error) });
      return 'error';
    } finally {
      this.beating = false;
    }
  }

  start(): void {
    if (this.timer) return;
    logger.info('Heartbeat started', { intervalMs: this.intervalMs });
    this.timer = setInterval(() => void this.tick(), this.intervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }
}

export function createHeartbeatService(config: HeartbeatServiceConfig): HeartbeatService {
  return new HeartbeatService(config);
}
