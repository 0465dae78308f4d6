/**
 * @fileoverview Serialized access to the stored job list
 *
 * Every read-modify-write of the job list (the cron tools and the
 * scheduler's lastRun update) runs through one queue, so an edit landing
 * while a tick is between its load and its save is applied after it
 * instead of being overwritten. Share one instance per data directory
 * within a process.
 */

import type { ScheduledJob } from '../types/jobs.js';
import type { StoragePort } from '../types/ports.js';

export type JobStorage = Pick<StoragePort, 'loadJobs' | 'saveJobs'>;

export interface JobListChange<T> {
  /** New list to save; nothing is written when omitted */
  jobs?: ScheduledJob[];
  result: T;
}

export class JobList {
  private readonly storage: JobStorage;
  private tail: Promise<void> = Promise.resolve();

  constructor(storage: JobStorage) {
    this.storage = storage;
  }

  load(): Promise<ScheduledJob[]> {
    return this.enqueue(() => this.storage.loadJobs());
  }

  /**
   * Load the list, apply `change` and save what it returns, with no other
   * update in between. Resolves to the change's result.
   */
  update<T>(change: (jobs: ScheduledJob[]) => JobListChange<T>): Promise<T> {
    return this.enqueue(async () => {
      const { jobs, result } = change(await this.storage.loadJobs());
      if (jobs) {
        await this.storage.saveJobs(jobs);
      }
      return result;
    });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task, task);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export function createJobList(storage: JobStorage): JobList {
  return new JobList(storage);
}
