/**
 * @fileoverview Tool registry
 *
 * Name-keyed tool handlers. The registry hands definitions to the model and
 * dispatches calls, converting unknown names and thrown errors into error
 * results so a bad call never escapes as an exception.
 */

import type { ToolResult } from '../types/messages.js';
import type { BurrowTool, ToolDefinition } from '../types/tools.js';
import { DuplicateToolError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('tools:registry');

export class ToolRegistry {
  private readonly tools = new Map<string, BurrowTool>();

  /**
   * Register a tool. Throws DuplicateToolError if the name is taken; the
   * existing registration is kept.
   */
  register(tool: BurrowTool): void {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get(name: string): BurrowTool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map(({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
  }

  async execute(name: string, callId: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      logger.warn('Model requested unknown tool', { toolName: name, callId });
      return { toolCallId: callId, content: `Error: unknown tool '${name}'`, isError: true };
    }
    return executeTool(tool, callId, args);
  }
}

/**
 * Run one tool and stamp the call id on its result
 */
export async function executeTool(
  tool: BurrowTool,
  callId: string,
  args: Record<string, unknown>
): Promise<ToolResult> {
  const startTime = Date.now();
  try {
    const result = await tool.execute(args);
    logger.debug('Tool executed', {
      toolName: tool.name,
      callId,
      isError: result.isError ?? false,
      durationMs: Date.now() - startTime,
    });
    return { toolCallId: callId, content: result.content, isError: result.isError ?? false };
  } catch (error) {
    logger.error('Tool execution threw', {
      toolName: tool.name,
      callId,
      err: error instanceof Error ? error : new Error(String(error)),
    });
    return {
      toolCallId: callId,
      content: `Error: tool '${tool.name}' failed: ${errorMessage(error)}`,
      isError: true,
    };
  }
}
