/**
 * @fileoverview JobScheduler tests
 */
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { JobScheduler, createJobScheduler } from '../../src/scheduler/scheduler.js';
import { JobList } from '../../src/scheduler/job-list.js';
import { CronAddTool, CronRemoveTool } from '../../src/tools/cron.js';
import type { ScheduledJob } from '../../src/types/jobs.js';
import { InMemoryStorage } from '../helpers/fakes.js';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function intervalJob(id: string, overrides: Partial<ScheduledJob> = {}): ScheduledJob {
  return {
    id,
    name: `job ${id}`,
    message: `run ${id}`,
    schedule: 'every 60',
    channel: 'cli:local',
    enabled: true,
    timezone: 'UTC',
    metadata: {},
    ...overrides,
  };
}

describe('JobScheduler', () => {
  let storage: InMemoryStorage;
  let jobs: JobList;

  beforeEach(() => {
    storage = new InMemoryStorage();
    jobs = new JobList(storage);
  });

  it('should run due jobs and record their last run', async () => {
    storage.jobs = [
      intervalJob('due'),
      intervalJob('recent', { lastRun: '2026-03-10T11:59:30.000Z' }),
      intervalJob('off', { enabled: false }),
    ];
    const ran: string[] = [];
    const scheduler = new JobScheduler({
      jobs,
      now: () => NOW,
      onDue: async (job) => {
        ran.push(job.id);
      },
    });

    expect(await scheduler.tick()).toBe(1);
    expect(ran).toEqual(['due']);
    expect(storage.jobs.map((job) => job.lastRun)).toEqual([NOW.toISOString(), '2026-03-10T11:59:30.000Z', undefined]);
  });

  it('should save the last run before running handlers', async () => {
    storage.jobs = [intervalJob('a')];
    const seen: Array<string | undefined> = [];
    const scheduler = createJobScheduler({
      jobs,
      now: () => NOW,
      onDue: async () => {
        seen.push(storage.jobs[0]?.lastRun);
      },
    });

    await scheduler.tick();

    expect(seen).toEqual([NOW.toISOString()]);
  });

  it('should hand the updated job to the handler', async () => {
    storage.jobs = [intervalJob('a', { metadata: { room: '!abc:example.org' } })];
    const received: ScheduledJob[] = [];
    const scheduler = new JobScheduler({ jobs, now: () => NOW, onDue: async (job) => void received.push(job) });

    await scheduler.tick();

    expect(received[0]).toMatchObject({ id: 'a', lastRun: NOW.toISOString(), metadata: { room: '!abc:example.org' } });
  });

  it('should keep running jobs after one fails', async () => {
    storage.jobs = [intervalJob('first'), intervalJob('second')];
    const ran: string[] = [];
    const scheduler = new JobScheduler({
      jobs,
      now: () => NOW,
      onDue: async (job) => {
        ran.push(job.id);
        if (job.id === 'first') throw new Error('channel offline');
      },
    });

    expect(await scheduler.tick()).toBe(2);
    expect(ran).toEqual(['first', 'second']);
  });

  it('should not write when nothing is due', async () => {
    storage.jobs = [intervalJob('recent', { lastRun: '2026-03-10T11:59:30.000Z' })];
    const save = vi.spyOn(storage, 'saveJobs');
    const scheduler = new JobScheduler({ jobs, now: () => NOW, onDue: async () => {} });

    expect(await scheduler.tick()).toBe(0);
    expect(save).not.toHaveBeenCalled();
  });

  it('should skip a tick while the previous one is running', async () => {
    storage.jobs = [intervalJob('slow')];
    let release: () => void = () => {};
    const blocker = new Promise<void>((resolve) => {
      release = resolve;
    });
    const scheduler = new JobScheduler({ jobs, now: () => NOW, onDue: () => blocker });

    const first = scheduler.tick();
    expect(await scheduler.tick()).toBe(0);
    release();
    expect(await first).toBe(1);
  });

  it('should keep a job added while a tick is saving', async () => {
    storage.jobs = [intervalJob('due')];
    const scheduler = new JobScheduler({ jobs, now: () => NOW, onDue: async () => {} });
    const add = new CronAddTool({ jobs, defaultChannel: 'matrix:@alice:example.org' });

    const [ran, added] = await Promise.all([
      scheduler.tick(),
      add.execute({ name: 'water', message: 'Water the plants', schedule: 'every 3600' }),
    ]);

    expect(ran).toBe(1);
    expect(added.isError).toBe(false);
    expect(storage.jobs.map((job) => [job.name, job.lastRun])).toEqual([
      ['job due', NOW.toISOString()],
      ['water', undefined],
    ]);
  });

  it('should let a running job edit the job list', async () => {
    storage.jobs = [intervalJob('once'), intervalJob('other', { lastRun: '2026-03-10T11:59:30.000Z' })];
    const remove = new CronRemoveTool(jobs);
    const scheduler = new JobScheduler({
      jobs,
      now: () => NOW,
      onDue: async (job) => {
        await remove.execute({ job_id: job.id });
      },
    });

    expect(await scheduler.tick()).toBe(1);
    expect(storage.jobs.map((job) => job.id)).toEqual(['other']);
  });

  it('should tick on start and stop cleanly', async () => {
    storage.jobs = [intervalJob('a')];
    const ran: string[] = [];
    const scheduler = new JobScheduler({
      jobs,
      now: () => NOW,
      pollIntervalMs: 60_000,
      onDue: async (job) => {
        ran.push(job.id);
      },
    });

    scheduler.start();
    expect(scheduler.running).toBe(true);
    await vi.waitFor(() => expect(ran).toEqual(['a']));
    scheduler.stop();

    expect(scheduler.running).toBe(false);
  });
});
