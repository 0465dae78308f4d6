/**
 * @fileoverview Search history tool
 *
 * Case-insensitive substring search over user and assistant messages of
 * every session, with the neighbouring message on each side for context.
 */

import { z } from 'zod';
import type { Message } from '../types/messages.js';
import type { BurrowTool, ToolExecutionResult } from '../types/tools.js';
import type { StoragePort } from '../types/ports.js';
import { parseToolArgs, toolOk, truncateText } from './utils.js';

const DEFAULT_MAX_RESULTS = 10;
const MAX_RESULTS_CAP = 50;
const SNIPPET_CHARS = 300;
const DAY_MS = 24 * 60 * 60 * 1000;

const SearchHistoryArgs = z.object({
  query: z.string().trim().min(1, 'is required'),
  days: z.number().int().optional(),
  max_results: z.number().int().optional(),
});

const ROLE_LABELS: Partial<Record<Message['role'], string>> = {
  user: 'USER',
  assistant: 'ASSISTANT',
};

export interface SearchHistoryToolConfig {
  storage: Pick<StoragePort, 'listSessions' | 'loadHistory'>;
  /** Clock used for the `days` window */
  now?: () => Date;
}

interface SearchMatch {
  sessionId: string;
  messages: Message[];
  index: number;
}

function isSearchable(message: Message): boolean {
  return ROLE_LABELS[message.role] !== undefined && message.content.length > 0;
}

function formatTimestamp(timestamp: string): string {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? timestamp : date.toISOString().slice(0, 16).replace('T', ' ');
}

export class SearchHistoryTool implements BurrowTool {
  readonly name = 'search_history';
  readonly description =
    'Search conversation history across all sessions for a text pattern. ' +
    'Returns matching messages with surrounding context. ' +
    'Use this to recall past conversations, decisions, or facts the user mentioned.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      query: {
        type: 'string' as const,
        description: 'Text to search for (case-insensitive substring match).',
      },
      days: {
        type: 'integer' as const,
        description: 'Only search messages from the last N days. 0 or omitted means all time.',
      },
      max_results: {
        type: 'integer' as const,
        description: 'Maximum number of matches to return (default 10, max 50).',
      },
    },
    required: ['query'],
  };

  private readonly config: SearchHistoryToolConfig;

  constructor(config: SearchHistoryToolConfig) {
    this.config = config;
  }

  async execute(args: Record<string, unknown>): Promise<ToolExecutionResult> {
    const parsed = parseToolArgs(SearchHistoryArgs, args);
    if (!parsed.ok) return parsed.result;

    const { query } = parsed.args;
    const needle = query.toLowerCase();
    const days = Math.max(0, parsed.args.days ?? 0);
    const maxResults = Math.min(MAX_RESULTS_CAP, Math.max(1, parsed.args.max_results ?? DEFAULT_MAX_RESULTS));
    const now = (this.config.now ?? (() => new Date()))();
    const cutoff = days > 0 ? now.getTime() - days * DAY_MS : null;

    const matches: SearchMatch[] = [];
    for (const sessionId of await this.config.storage.listSessions()) {
      if (matches.length >= maxResults) break;

      let messages = await this.config.storage.loadHistory(sessionId);
      if (cutoff !== null) {
        messages = messages.filter((message) => Date.parse(message.timestamp) >= cutoff);
      }

      for (let index = 0; index < messages.length && matches.length < maxResults; index++) {
        const message = messages[index];
        if (message && isSearchable(message) && message.content.toLowerCase().includes(needle)) {
          matches.push({ sessionId, messages, index });
        }
      }
    }

    if (matches.length === 0) {
      return toolOk(`No matches found for '${query}'.`);
    }
    return toolOk(matches.map((match, i) => this.formatMatch(match, i + 1)).join('\n'));
  }

  private formatMatch(match: SearchMatch, ordinal: number): string {
    const hit = match.messages[match.index];
    const lines = [`## Match ${ordinal} | Session: ${match.sessionId} | ${hit ? formatTimestamp(hit.timestamp) : ''}`, ''];

    for (const offset of [-1, 0, 1]) {
      const message = match.messages[match.index + offset];
      if (!message || !isSearchable(message)) continue;
      const text = `${ROLE_LABELS[message.role] ?? message.role.toUpperCase()}: ${truncateText(message.content, SNIPPET_CHARS)}`;
      lines.push(offset === 0 ? `**${text}**` : text);
    }

    lines.push('---');
    return lines.join('\n');
  }
}
