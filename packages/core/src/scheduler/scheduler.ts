/**
 * @fileoverview Job scheduler
 *
 * Polls the job list, marks due jobs with the current time and hands each
 * to a callback. `lastRun` is saved before any callback runs, so a crash
 * mid-run skips that occurrence rather than repeating it.
 */

import type { ScheduledJob } from '../types/jobs.js';
import type { JobList } from './job-list.js';
import { createLogger } from '../logging/logger.js';
import { withLoggingContext } from '../logging/log-context.js';
import { isDue } from './schedule.js';

const logger = createLogger('scheduler');

export const DEFAULT_POLL_INTERVAL_MS = 60_000;

export interface JobSchedulerConfig {
  /** Shared with the job tools so their edits are never overwritten */
  jobs: JobList;
  /** Called once per due job, sequentially */
  onDue: (job: ScheduledJob) => Promise<void>;
  pollIntervalMs?: number;
  now?: () => Date;
}

export class JobScheduler {
  private readonly jobs: JobList;
  private readonly onDue: (job: ScheduledJob) => Promise<void>;
  private readonly pollIntervalMs: number;
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;

  constructor(config: JobSchedulerConfig) {
    this.jobs = config.jobs;
    this.onDue = config.onDue;
    this.pollIntervalMs = config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = config.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.timer !== null;
  }

  /**
   * Run every job due now. Returns the number of jobs handed to the
   * callback; 0 when a previous tick is still in progress.
   */
  async tick(): Promise<number> {
    if (this.ticking) {
      logger.debug('Previous tick still running, skipping');
      return 0;
    }
    this.ticking = true;
    try {
      const now = this.now();
      const lastRun = now.toISOString();
      const due = await this.jobs.update<ScheduledJob[]>((jobs) => {
        const dueIds = new Set(jobs.filter((job) => isDue(job, now)).map((job) => job.id));
        if (dueIds.size === 0) return { result: [] };
        const updated = jobs.map((job) => (dueIds.has(job.id) ? { ...job, lastRun } : job));
        return { jobs: updated, result: updated.filter((job) => dueIds.has(job.id)) };
      });

      // Outside the update, so handlers may edit the job list themselves
      for (const job of due) {
        await withLoggingContext({ jobId: job.id }, () => this.runJob(job));
      }
      return due.length;
    } finally {
      this.ticking = false;
    }
  }

  start(): void {
    if (this.timer) return;
    logger.info('Scheduler started', { pollIntervalMs: this.pollIntervalMs });
    void this.tickSafely();
    this.timer = setInterval(() => void this.tickSafely(), this.pollIntervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    logger.info('Scheduler stopped');
  }

  private async runJob(job: ScheduledJob): Promise<void> {
    const done = logger.startTimer(`Scheduled job '${job.name}'`);
    try {
      await this.onDue(job);
      done();
    } catch (error) {
      logger.error('Scheduled job failed', error instanceof Error ? error : { error: String(error) });
    }
  }

  private async tickSafely(): Promise<void> {
    try {
      await this.tick();
    } catch (error) {
      logger.error('Scheduler tick failed', error instanceof Error ? error : { error: String(error) });
    }
  }
}

export function createJobScheduler(config: JobSchedulerConfig): JobScheduler {
  return new JobScheduler(config);
}
