/**
 * @fileoverview Schedule expressions
 *
 * Two forms are accepted: standard cron expressions ("0 9 * * *"), evaluated
 * in the job's timezone with croner, and fixed intervals ("every 3600",
 * in seconds).
 */

import { Cron } from 'croner';
import type { ScheduledJob } from '../types/jobs.js';

const INTERVAL_PATTERN = /^every\s+(\d+)$/;
const MINUTE_MS = 60_000;

export type ParsedSchedule = { kind: 'interval'; seconds: number } | { kind: 'cron'; cron: Cron };

/**
 * Timezone option for croner. "local" and the empty string mean the host zone.
 */
function cronTimezone(timezone: string): string | undefined {
  return timezone === '' || timezone === 'local' ? undefined : timezone;
}

/**
 * Parse a schedule, or return null if it is neither form
 */
export function parseSchedule(schedule: string, timezone = 'UTC'): ParsedSchedule | null {
  const trimmed = schedule.trim();

  const interval = INTERVAL_PATTERN.exec(trimmed);
  if (interval) {
    const seconds = Number(interval[1]);
    return seconds > 0 ? { kind: 'interval', seconds } : null;
  }
  if (trimmed.startsWith('every')) {
    return null;
  }

  try {
    const cron = new Cron(trimmed, { timezone: cronTimezone(timezone), paused: true });
    // Resolving a run also validates the timezone
    cron.nextRun();
    return { kind: 'cron', cron };
  } catch {
    return null;
  }
}

/**
 * Next time the job should run after `now`, or null for an invalid schedule
 */
export function nextRunAt(job: Pick<ScheduledJob, 'schedule' | 'timezone' | 'lastRun'>, now: Date = new Date()): Date | null {
  const parsed = parseSchedule(job.schedule, job.timezone);
  if (!parsed) return null;

  if (parsed.kind === 'interval') {
    if (!job.lastRun) return now;
    const next = Date.parse(job.lastRun) + parsed.seconds * 1000;
    return new Date(Math.max(next, now.getTime()));
  }
  return parsed.cron.nextRun(now);
}

/**
 * Whether an enabled job should fire at `now`.
 *
 * Interval jobs fire when never run or when the interval has elapsed since
 * the last run. Cron jobs fire when their next occurrence after the last run
 * (or after one minute ago, if never run) is not in the future.
 */
export function isDue(job: Pick<ScheduledJob, 'schedule' | 'timezone' | 'lastRun' | 'enabled'>, now: Date = new Date()): boolean {
  if (!job.enabled) return false;

  const parsed = parseSchedule(job.schedule, job.timezone);
  if (!parsed) return false;

  const lastRun = job.lastRun ? Date.parse(job.lastRun) : null;

  if (parsed.kind === 'interval') {
    if (lastRun === null || Number.isNaN(lastRun)) return true;
    return now.getTime() - lastRun >= parsed.seconds * 1000;
  }

  const baseline = lastRun === null || Number.isNaN(lastRun) ? now.getTime() - MINUTE_MS : lastRun;
  const next = parsed.cron.nextRun(new Date(baseline));
  return next !== null && next.getTime() <= now.getTime();
}
