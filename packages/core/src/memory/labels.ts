/**
 * @fileoverview Channel/sender labels for history messages
 *
 * History from every channel is shown to the model with a
 * `[channel / who]` prefix so it can tell the owner from other senders.
 */

import type { Message } from '../types/messages.js';
import type { OwnerAlias } from '../settings/types.js';

export const ASSISTANT_SENDER = 'assistant';

export class OwnerMatcher {
  private readonly scoped = new Set<string>();
  private readonly unscoped = new Set<string>();

  constructor(aliases: readonly OwnerAlias[] = []) {
    for (const alias of aliases) {
      if (alias.channel) {
        this.scoped.add(OwnerMatcher.key(alias.channel, alias.address));
      } else {
        this.unscoped.add(alias.address);
      }
    }
  }

  private static key(channel: string, address: string): string {
    return `${channel}\u0000${address}`;
  }

  /**
   * Case-sensitive. Channel-scoped aliases match only their channel.
   */
  isOwner(senderId: string, channel: string): boolean {
    return this.scoped.has(OwnerMatcher.key(channel, senderId)) || this.unscoped.has(senderId);
  }
}

/**
 * Copy of `message` with its label prepended. Messages without a channel
 * are returned unchanged.
 */
export function labelMessage(message: Message, owners: OwnerMatcher): Message {
  if (message.channel === undefined) {
    return message;
  }

  let label: string;
  if (message.senderId === ASSISTANT_SENDER) {
    label = ASSISTANT_SENDER;
  } else if (owners.isOwner(message.senderId ?? '', message.channel)) {
    label = 'owner';
  } else {
    label = message.senderId || 'unknown';
  }

  return { ...message, content: `[${message.channel} / ${label}]\n${message.content}` };
}
