/**
 * @fileoverview Sub-agent tools
 *
 * `spawn` starts a sub-agent turn in the background and returns its job id
 * at once; `spawn_await` waits for one or more jobs and returns their text.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { BurrowTool, ToolExecutionResult } from '../types/tools.js';
import type { SubAgentRunner } from '../agent/subagent.js';
import { createLogger } from '../logging/logger.js';
import { errorMessage } from '../utils/errors.js';
import { parseToolArgs, toolError, toolOk } from './utils.js';

const logger = createLogger('tool:spawn');

/**
 * Sub-agent jobs not yet collected. Each stored promise already resolves
 * to the job's final text, failures included. A job is forgotten once
 * its result has been taken.
 */
export class SpawnJobTracker {
  private readonly jobs = new Map<string, Promise<string>>();
  private readonly runner: SubAgentRunner;

  constructor(runner: SubAgentRunner) {
    this.runner = runner;
  }

  start(task: string, context?: string): string {
    const jobId = randomUUID().replace(/-/g, '').slice(0, 8);
    const job = this.runner({ jobId, task, context })
      .then((result) => result.text)
      .catch((error: unknown) => {
        logger.error('Sub-agent job failed', { jobId, error: errorMessage(error) });
        return `Error: sub-agent failed: ${errorMessage(error)}`;
      });
    this.jobs.set(jobId, job);
    logger.info('Sub-agent job started', { jobId });
    return jobId;
  }

  has(jobId: string): boolean {
    return this.jobs.has(jobId);
  }

  /** Resolves to the job's text, or null for an unknown id */
  async result(jobId: string): Promise<string | null> {
    const job = this.jobs.get(jobId);
    return job ? job : null;
  }

  /** Like result(), then forgets the job */
  async take(jobId: string): Promise<string | null> {
    const job = this.jobs.get(jobId);
    if (!job) return null;
    const text = await job;
    this.jobs.delete(jobId);
    return text;
  }

  get size(): number {
    return this.jobs.size;
  }
}

const SpawnArgs = z.object({
  task: z.string().trim().min(1, 'is required'),
  context: z.string().optional(),
});

export class SpawnTool implements BurrowTool {
  readonly name = 'spawn';
  readonly description =
    'Start a sub-agent on a self-contained task in the background. ' +
    'Returns a job id immediately; collect the result later with spawn_await. ' +
    'The sub-agent has no access to this conversation, so pass everything it needs in context.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      task: { type: 'string' as const, description: 'What the sub-agent should do.' },
      context: { type: 'string' as const, description: 'Background information the sub-agent needs.' },
    },
    required: ['task'],
  };

  private readonly tracker: SpawnJobTracker;

  constructor(tracker: SpawnJobTracker) {
    this.tracker = tracker;
  }

  async execute(args: Record<string, unknown>): Promise<ToolExecutionResult> {
    const parsed = parseToolArgs(SpawnArgs, args);
    if (!parsed.ok) return parsed.result;
    const jobId = this.tracker.start(parsed.args.task, parsed.args.context);
    return toolOk(`OK: spawned sub-agent job id=${jobId}`);
  }
}

const SpawnAwaitArgs = z.object({
  job_ids: z.array(z.string()).min(1, 'is required'),
});

export class SpawnAwaitTool implements BurrowTool {
  readonly name = 'spawn_await';
  readonly description = 'Wait for sub-agent jobs started with spawn and return their results.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      job_ids: {
        type: 'array' as const,
        description: 'Ids returned by spawn.',
        items: { type: 'string' as const },
      },
    },
    required: ['job_ids'],
  };

  private readonly tracker: SpawnJobTracker;

  constructor(tracker: SpawnJobTracker) {
    this.tracker = tracker;
  }

  async execute(args: Record<string, unknown>): Promise<ToolExecutionResult> {
    const parsed = parseToolArgs(SpawnAwaitArgs, args);
    if (!parsed.ok) return parsed.result;
    const jobIds = parsed.args.job_ids;

    const unknown = jobIds.filter((jobId) => !this.tracker.has(jobId));
    if (unknown.length > 0) {
      return toolError(`unknown job id(s): ${unknown.join(', ')}`);
    }

    const blocks = await Promise.all(
      jobIds.map(async (jobId) => `[job ${jobId}]\n${(await this.tracker.take(jobId)) ?? ''}`)
    );
    return toolOk(blocks.join('\n\n'));
  }
}

export function buildSpawnTools(runner: SubAgentRunner): BurrowTool[] {
  const tracker = new SpawnJobTracker(runner);
  return [new SpawnTool(tracker), new SpawnAwaitTool(tracker)];
}
