/**
 * @fileoverview Scheduler exports
 */

export { parseSchedule, nextRunAt, isDue, type ParsedSchedule } from './schedule.js';
export { generateJobId, validateJob, addJob, removeJob, setEnabled, formatJobs } from './cron-ops.js';
export { JobList, createJobList, type JobListChange, type JobStorage } from './job-list.js';
export {
  JobScheduler,
  createJobScheduler,
  DEFAULT_POLL_INTERVAL_MS,
  type JobSchedulerConfig,
} from './scheduler.js';
export {
  HeartbeatService,
  createHeartbeatService,
  LastChannelTracker,
  isHeartbeatEmpty,
  stripHeartbeatToken,
  HEARTBEAT_OK_TOKEN,
  HEARTBEAT_FILE,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  type ActiveChannel,
  type HeartbeatServiceConfig,
  type HeartbeatTickResult,
} from './heartbeat.js';
