/**
 * @fileoverview Session and channel traffic types
 */

/**
 * A conversation, identified by channel and sender. Sessions are implicit:
 * they exist once anything is persisted under their id.
 */
export interface Session {
  channel: string;
  senderId: string;
}

/**
 * Canonical session id, e.g. `cli:local` or `matrix:@alice:example.org`.
 */
export function getSessionId(session: Session): string {
  return `${session.channel}:${session.senderId}`;
}

/**
 * Inverse of getSessionId. The channel never contains a colon; the sender may.
 */
export function parseSessionId(sessionId: string): Session {
  const index = sessionId.indexOf(':');
  if (index === -1) {
    return { channel: sessionId, senderId: '' };
  }
  return { channel: sessionId.slice(0, index), senderId: sessionId.slice(index + 1) };
}

export interface InboundMessage {
  session: Session;
  text: string;
  receivedAt: string;
  metadata: Record<string, unknown>;
}

export interface OutboundMessage {
  session: Session;
  text: string;
  metadata: Record<string, unknown>;
}
