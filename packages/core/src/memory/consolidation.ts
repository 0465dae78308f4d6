/**
 * @fileoverview History consolidation helpers
 *
 * Pure pieces of summarization: transcript building, the sentence budget,
 * the prompts, and merging a new summary into the running one under a
 * word budget.
 */

import type { Message } from '../types/messages.js';
import type { ModelPort } from '../types/ports.js';
import { systemMessage, userMessage } from '../types/messages.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../utils/errors.js';

const logger = createLogger('memory:consolidation');

export const CONSOLIDATION_SYSTEM_PROMPT =
  'You are a memory consolidation assistant. You compress conversation transcripts into ' +
  'concise summaries that preserve facts, decisions, user preferences and open tasks. ' +
  'Write plain prose with no preamble.';

/**
 * Number of verbatim messages kept after consolidation
 */
export function keepRecentCount(threshold: number, ratio: number): number {
  return Math.max(1, Math.floor(threshold * ratio));
}

/**
 * Roughly one sentence per ten summarized messages, at least five
 */
export function summarySentenceBudget(messageCount: number): number {
  return Math.max(5, Math.floor(messageCount / 10));
}

/**
 * Plain transcript of user/assistant turns. Turns without text (tool-only
 * assistant turns, tool results) contribute nothing.
 */
export function buildTranscript(messages: readonly Message[]): string {
  const lines: string[] = [];
  for (const message of messages) {
    const content = message.content.trim();
    if (!content) continue;
    if (message.role === 'user') lines.push(`USER: ${content}`);
    else if (message.role === 'assistant') lines.push(`ASSISTANT: ${content}`);
  }
  return lines.join('\n');
}

export function buildConsolidationMessages(transcript: string, sentences: number): Message[] {
  return [
    systemMessage(CONSOLIDATION_SYSTEM_PROMPT),
    userMessage(
      `Summarize the following conversation in ${sentences} sentences or fewer. ` +
        `Keep names, dates, decisions and anything the user asked to remember.\n\n${transcript}`
    ),
  ];
}

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/**
 * Append `addition` to `previous` as a new paragraph, then drop the oldest
 * paragraphs until the text fits `wordLimit`. The newest paragraph is kept
 * even when it alone exceeds the limit.
 */
export function mergeSummary(previous: string, addition: string, wordLimit: number): string {
  const paragraphs = [previous, addition]
    .flatMap((text) => text.split(/\n\s*\n/))
    .map((paragraph) => paragraph.trim())
    .filter(Boolean);

  let total = paragraphs.reduce((sum, paragraph) => sum + countWords(paragraph), 0);
  while (paragraphs.length > 1 && total > wordLimit) {
    const dropped = paragraphs.shift();
    total -= dropped ? countWords(dropped) : 0;
  }
  return paragraphs.join('\n\n');
}

/**
 * Ask the model for a summary. Returns null on failure or empty output.
 */
export async function requestSummary(
  model: ModelPort,
  transcript: string,
  sentences: number,
  signal?: AbortSignal
): Promise<string | null> {
  try {
    let text = '';
    for await (const event of model.chat(buildConsolidationMessages(transcript, sentences), [], {
      stream: false,
      signal,
    })) {
      if (event.type === 'text_delta') text += event.delta;
    }
    const summary = text.trim();
    return summary === '' ? null : summary;
  } catch (error) {
    logger.warn('Summary request failed', { error: errorMessage(error) });
    return null;
  }
}
