/**
 * @fileoverview Memory write tool
 *
 * Replaces the global memory document. The document is shown under
 * "## Your Memory" in every session's system prompt.
 */

import { z } from 'zod';
import type { BurrowTool, ToolExecutionResult } from '../types/tools.js';
import type { StoragePort } from '../types/ports.js';
import { createLogger } from '../logging/logger.js';
import { parseToolArgs, toolOk } from './utils.js';

const logger = createLogger('tool:memory-write');

const MemoryWriteArgs = z.object({
  content: z.string(),
});

export class MemoryWriteTool implements BurrowTool {
  readonly name = 'memory_write';
  readonly description =
    'Update your global long-term memory document (MEMORY.md). ' +
    "It is visible in every future session under '## Your Memory'. " +
    'Use it for user preferences, ongoing projects and key facts. ' +
    'The content REPLACES the current document, so merge with the existing content first. ' +
    'Keep it under about 300 words.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      content: {
        type: 'string' as const,
        description: 'The full new content of the memory document (Markdown).',
      },
    },
    required: ['content'],
  };

  private readonly storage: Pick<StoragePort, 'saveGlobalMemory'>;

  constructor(storage: Pick<StoragePort, 'saveGlobalMemory'>) {
    this.storage = storage;
  }

  async execute(args: Record<string, unknown>): Promise<ToolExecutionResult> {
    const parsed = parseToolArgs(MemoryWriteArgs, args);
    if (!parsed.ok) return parsed.result;

    await this.storage.saveGlobalMemory(parsed.args.content);
    logger.info('Global memory updated', { length: parsed.args.content.length });
    return toolOk('Memory updated successfully.');
  }
}
