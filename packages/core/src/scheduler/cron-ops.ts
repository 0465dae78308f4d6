/**
 * @fileoverview Pure scheduled-job operations
 *
 * Deterministic create/validate/mutate/format logic shared by the job
 * tools and any command-line front end. No I/O.
 */

import { randomUUID } from 'node:crypto';
import type { ScheduledJob } from '../types/jobs.js';
import { parseSchedule } from './schedule.js';

export function generateJobId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}

/**
 * Error message for an invalid job, or null if it is valid
 */
export function validateJob(job: Pick<ScheduledJob, 'schedule' | 'timezone'>): string | null {
  if (parseSchedule(job.schedule, job.timezone) === null) {
    return `Invalid schedule '${job.schedule}'. Use cron syntax or 'every N'.`;
  }
  return null;
}

/**
 * New list with `job` appended. Throws if the job is invalid.
 */
export function addJob(jobs: readonly ScheduledJob[], job: ScheduledJob): ScheduledJob[] {
  const error = validateJob(job);
  if (error !== null) {
    throw new Error(error);
  }
  return [...jobs, job];
}

export function removeJob(jobs: readonly ScheduledJob[], jobId: string): { jobs: ScheduledJob[]; removed: boolean } {
  const updated = jobs.filter((job) => job.id !== jobId);
  return { jobs: updated, removed: updated.length !== jobs.length };
}

export function setEnabled(
  jobs: readonly ScheduledJob[],
  jobId: string,
  enabled: boolean
): { jobs: ScheduledJob[]; found: boolean } {
  let found = false;
  const updated = jobs.map((job) => {
    if (job.id !== jobId) return job;
    found = true;
    return { ...job, enabled, metadata: { ...job.metadata } };
  });
  return { jobs: updated, found };
}

export function formatJobs(jobs: readonly ScheduledJob[]): string {
  if (jobs.length === 0) {
    return 'No cron jobs configured.';
  }

  const lines: string[] = [];
  for (const job of jobs) {
    lines.push(`  [${job.enabled ? 'on' : 'off'}] ${job.id}  ${job.name}`);
    lines.push(`       schedule: ${job.schedule}  timezone: ${job.timezone}  channel: ${job.channel}`);
    lines.push(`       message:  ${job.message}`);
  }
  return lines.join('\n');
}
