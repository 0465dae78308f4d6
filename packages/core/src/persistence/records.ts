/**
 * @fileoverview On-disk record schemas
 *
 * History lines and the jobs file are validated on read; anything that
 * fails is treated as malformed rather than trusted.
 */

import { z } from 'zod';
import type { Message } from '../types/messages.js';
import type { ScheduledJob } from '../types/jobs.js';

export const ToolCallRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  arguments: z.record(z.unknown()),
});

export const MessageRecordSchema = z
  .object({
    role: z.enum(['system', 'user', 'assistant', 'tool']),
    content: z.string(),
    toolCalls: z.array(ToolCallRecordSchema).optional(),
    toolCallId: z.string().optional(),
    reasoning: z.string().optional(),
    timestamp: z.string().datetime({ offset: true }),
    channel: z.string().optional(),
    senderId: z.string().optional(),
  })
  .refine((record) => record.role !== 'tool' || record.toolCallId !== undefined, {
    message: 'tool messages require toolCallId',
    path: ['toolCallId'],
  });

export const ScheduledJobRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  message: z.string(),
  schedule: z.string().min(1),
  channel: z.string().min(1),
  enabled: z.boolean().default(true),
  timezone: z.string().default('UTC'),
  lastRun: z.string().datetime({ offset: true }).optional(),
  metadata: z.record(z.unknown()).default({}),
});

export const JobsFileSchema = z.array(ScheduledJobRecordSchema);

export const CursorFileSchema = z.object({
  cursor: z.number().int().nonnegative(),
});

const utf8 = new TextDecoder('utf-8', { fatal: true });

export type DecodeResult =
  | { ok: true; message: Message }
  | { ok: false; reason: 'encoding' | 'json' | 'schema' };

/**
 * Decode one history line. Throws nothing; blank lines never reach here.
 */
export function decodeMessageLine(bytes: Uint8Array): DecodeResult {
  let text: string;
  try {
    text = utf8.decode(bytes);
  } catch {
    return { ok: false, reason: 'encoding' };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return { ok: false, reason: 'json' };
  }

  const parsed = MessageRecordSchema.safeParse(raw);
  return parsed.success ? { ok: true, message: parsed.data } : { ok: false, reason: 'schema' };
}

export function encodeMessageLine(message: Message): string {
  return `${JSON.stringify(message)}\n`;
}

export function toJobRecords(jobs: ScheduledJob[]): ScheduledJob[] {
  return jobs.map((job) => ({ ...job, metadata: { ...job.metadata } }));
}
