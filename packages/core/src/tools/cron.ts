/**
 * @fileoverview Scheduled job tools
 *
 * cron_list, cron_add, cron_remove and cron_set_enabled. Each edit applies
 * one pure operation to the job list as a single JobList update.
 */

import { z } from 'zod';
import type { ScheduledJob } from '../types/jobs.js';
import type { BurrowTool, ToolExecutionResult } from '../types/tools.js';
import { createLogger } from '../logging/logger.js';
import { addJob, formatJobs, generateJobId, removeJob, setEnabled, validateJob } from '../scheduler/cron-ops.js';
import type { JobList } from '../scheduler/job-list.js';
import { parseToolArgs, toolError, toolOk } from './utils.js';

const logger = createLogger('tool:cron');

// =============================================================================
// cron_list
// =============================================================================

export class CronListTool implements BurrowTool {
  readonly name = 'cron_list';
  readonly description = 'List all scheduled jobs with their id, schedule, target channel and message.';
  readonly parameters = {
    type: 'object' as const,
    properties: {},
  };

  private readonly jobs: JobList;

  constructor(jobs: JobList) {
    this.jobs = jobs;
  }

  async execute(): Promise<ToolExecutionResult> {
    return toolOk(formatJobs(await this.jobs.load()));
  }
}

// =============================================================================
// cron_add
// =============================================================================

const CronAddArgs = z.object({
  name: z.string().trim().min(1, 'is required'),
  message: z.string().trim().min(1, 'is required'),
  schedule: z.string().trim().min(1, 'is required'),
  timezone: z.string().default('local'),
  channel: z.string().trim().optional(),
  enabled: z.boolean().default(true),
});

export interface CronAddToolConfig {
  jobs: JobList;
  /** Session id of the conversation the tool runs in */
  defaultChannel: string;
  /** Delivery metadata of that conversation, copied onto jobs targeting it */
  defaultMetadata?: Record<string, unknown>;
}

export class CronAddTool implements BurrowTool {
  readonly name = 'cron_add';
  readonly description =
    'Schedule a message to be sent to the agent on a recurring basis. ' +
    "Use cron syntax ('0 9 * * *' for 9am daily) or 'every N' for an interval of N seconds. " +
    'When the job fires, its message is processed like a user message and the reply goes to the target channel.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      name: { type: 'string' as const, description: 'Short human-readable job name.' },
      message: { type: 'string' as const, description: 'Prompt to run when the job fires.' },
      schedule: { type: 'string' as const, description: "Cron expression or 'every N' (seconds)." },
      timezone: {
        type: 'string' as const,
        description: "IANA timezone for cron expressions, or 'local' for the host timezone (default).",
      },
      channel: {
        type: 'string' as const,
        description: 'Target session id, e.g. "telegram:12345". Defaults to the current conversation.',
      },
      enabled: { type: 'boolean' as const, description: 'Whether the job starts enabled (default true).' },
    },
    required: ['name', 'message', 'schedule'],
  };

  private readonly jobs: JobList;
  private readonly defaultChannel: string;
  private readonly defaultMetadata: Record<string, unknown>;

  constructor(config: CronAddToolConfig) {
    this.jobs = config.jobs;
    this.defaultChannel = config.defaultChannel;
    this.defaultMetadata = config.defaultMetadata ?? {};
  }

  async execute(args: Record<string, unknown>): Promise<ToolExecutionResult> {
    const parsed = parseToolArgs(CronAddArgs, args);
    if (!parsed.ok) return parsed.result;
    const { name, message, schedule, timezone, channel, enabled } = parsed.args;

    const target = channel || this.defaultChannel;
    if (!channel && this.defaultChannel.startsWith('cli:')) {
      return toolError('channel is required when scheduling from CLI sessions');
    }

    const job: ScheduledJob = {
      id: generateJobId(),
      name,
      message,
      schedule,
      channel: target,
      enabled,
      timezone,
      metadata: target === this.defaultChannel ? { ...this.defaultMetadata } : {},
    };

    const invalid = validateJob(job);
    if (invalid !== null) {
      return toolError(invalid);
    }

    await this.jobs.update((jobs) => ({ jobs: addJob(jobs, job), result: undefined }));
    logger.info('Scheduled job created', { jobId: job.id, schedule, channel: target });
    return toolOk(`OK: created cron job id=${job.id}`);
  }
}

// =============================================================================
// cron_remove / cron_set_enabled
// =============================================================================

const CronRemoveArgs = z.object({
  job_id: z.string().trim().min(1, 'is required'),
});

export class CronRemoveTool implements BurrowTool {
  readonly name = 'cron_remove';
  readonly description = 'Delete a scheduled job by id.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      job_id: { type: 'string' as const, description: 'Id of the job, as shown by cron_list.' },
    },
    required: ['job_id'],
  };

  private readonly jobs: JobList;

  constructor(jobs: JobList) {
    this.jobs = jobs;
  }

  async execute(args: Record<string, unknown>): Promise<ToolExecutionResult> {
    const parsed = parseToolArgs(CronRemoveArgs, args);
    if (!parsed.ok) return parsed.result;
    const jobId = parsed.args.job_id;

    const removed = await this.jobs.update<boolean>((jobs) => {
      const result = removeJob(jobs, jobId);
      return result.removed ? { jobs: result.jobs, result: true } : { result: false };
    });
    if (!removed) {
      return toolError(`job '${jobId}' not found`);
    }
    logger.info('Scheduled job removed', { jobId });
    return toolOk(`OK: removed cron job id=${jobId}`);
  }
}

const CronSetEnabledArgs = z.object({
  job_id: z.string().trim().min(1, 'is required'),
  enabled: z.boolean(),
});

export class CronSetEnabledTool implements BurrowTool {
  readonly name = 'cron_set_enabled';
  readonly description = 'Enable or disable a scheduled job without deleting it.';
  readonly parameters = {
    type: 'object' as const,
    properties: {
      job_id: { type: 'string' as const, description: 'Id of the job, as shown by cron_list.' },
      enabled: { type: 'boolean' as const, description: 'true to enable, false to disable.' },
    },
    required: ['job_id', 'enabled'],
  };

  private readonly jobs: JobList;

  constructor(jobs: JobList) {
    this.jobs = jobs;
  }

  async execute(args: Record<string, unknown>): Promise<ToolExecutionResult> {
    const parsed = parseToolArgs(CronSetEnabledArgs, args);
    if (!parsed.ok) return parsed.result;
    const { job_id: jobId, enabled } = parsed.args;

    const found = await this.jobs.update<boolean>((jobs) => {
      const result = setEnabled(jobs, jobId, enabled);
      return result.found ? { jobs: result.jobs, result: true } : { result: false };
    });
    if (!found) {
      return toolError(`job '${jobId}' not found`);
    }
    return toolOk(`OK: ${enabled ? 'enabled' : 'disabled'} cron job id=${jobId}`);
  }
}

/**
 * The four job tools bound to one conversation
 */
export function buildCronTools(config: CronAddToolConfig): BurrowTool[] {
  return [
    new CronListTool(config.jobs),
    new CronAddTool(config),
    new CronRemoveTool(config.jobs),
    new CronSetEnabledTool(config.jobs),
  ];
}
