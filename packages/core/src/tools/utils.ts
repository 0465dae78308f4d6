/**
 * @fileoverview Shared helpers for tool implementations
 */

import type { z } from 'zod';
import type { ToolExecutionResult } from '../types/tools.js';

export type ParsedToolArgs<T> = { ok: true; args: T } | { ok: false; result: ToolExecutionResult };

/**
 * Validate model-supplied arguments. On failure, returns the error result to
 * hand back to the model, naming the first offending argument.
 */
export function parseToolArgs<S extends z.ZodTypeAny>(
  schema: S,
  args: Record<string, unknown>
): ParsedToolArgs<z.output<S>> {
  const parsed = schema.safeParse(args);
  if (parsed.success) {
    return { ok: true, args: parsed.data };
  }
  const issue = parsed.error.issues[0];
  const field = issue?.path.join('.') || 'arguments';
  const detail = issue?.code === 'invalid_type' && issue.received === 'undefined' ? 'is required' : issue?.message ?? 'are invalid';
  return { ok: false, result: toolError(`${field} ${detail}`) };
}

export function toolError(message: string): ToolExecutionResult {
  return { content: `Error: ${message}`, isError: true };
}

export function toolOk(content: string): ToolExecutionResult {
  return { content, isError: false };
}

/**
 * Cut text to `maxChars`, marking the cut with an ellipsis
 */
export function truncateText(text: string, maxChars: number): string {
  return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
}
