/**
 * @fileoverview Channel that buffers replies in memory
 *
 * Used where a turn's output is consumed by code rather than a person:
 * sub-agents and the heartbeat.
 */

import type { ChannelPort } from '../types/ports.js';
import type { InboundMessage, OutboundMessage } from '../types/session.js';

export class CollectingChannel implements ChannelPort {
  readonly streaming = false;
  private readonly parts: string[] = [];

  async send(message: OutboundMessage): Promise<void> {
    this.parts.push(message.text);
  }

  async sendTyping(): Promise<void> {
    // no indicator to show
  }

  async *receive(): AsyncGenerator<InboundMessage> {
    // never receives
  }

  get collectedText(): string {
    return this.parts.join('');
  }
}
