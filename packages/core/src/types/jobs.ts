/**
 * @fileoverview Scheduled job types
 */

export interface ScheduledJob {
  /** 8 hex characters */
  id: string;
  name: string;
  /** Prompt handed to the agent when the job fires */
  message: string;
  /** Cron expression ("0 9 * * *") or interval ("every 3600", seconds) */
  schedule: string;
  /** Target session id, e.g. "cli:local" */
  channel: string;
  enabled: boolean;
  /** IANA timezone for cron expressions */
  timezone: string;
  /** ISO-8601 timestamp of the last run */
  lastRun?: string;
  metadata: Record<string, unknown>;
}
