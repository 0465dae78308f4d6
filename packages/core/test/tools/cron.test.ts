/**
 * @fileoverview Scheduled job tool tests
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { CronAddTool, CronListTool, CronRemoveTool, CronSetEnabledTool, buildCronTools } from '../../src/tools/cron.js';
import type { ScheduledJob } from '../../src/types/jobs.js';
import { JobList } from '../../src/scheduler/job-list.js';
import { InMemoryStorage } from '../helpers/fakes.js';

const existing: ScheduledJob = {
  id: 'abcd1234',
  name: 'standup',
  message: 'Remind me about standup',
  schedule: '0 9 * * 1-5',
  channel: 'matrix:@alice:example.org',
  enabled: true,
  timezone: 'UTC',
  metadata: {},
};

describe('cron tools', () => {
  let storage: InMemoryStorage;
  let jobs: JobList;

  beforeEach(() => {
    storage = new InMemoryStorage();
    jobs = new JobList(storage);
  });

  describe('cron_list', () => {
    it('should report when there are no jobs', async () => {
      expect((await new CronListTool(jobs).execute()).content).toBe('No cron jobs configured.');
    });

    it('should list jobs', async () => {
      storage.jobs = [existing];

      expect((await new CronListTool(jobs).execute()).content).toBe(
        [
          '  [on] abcd1234  standup',
          '       schedule: 0 9 * * 1-5  timezone: UTC  channel: matrix:@alice:example.org',
          '       message:  Remind me about standup',
        ].join('\n')
      );
    });
  });

  describe('cron_add', () => {
    it('should create a job targeting the current conversation', async () => {
      const tool = new CronAddTool({
        jobs,
        defaultChannel: 'matrix:@alice:example.org',
        defaultMetadata: { room: '!abc:example.org' },
      });

      const result = await tool.execute({ name: 'water', message: 'Water the plants', schedule: 'every 3600' });

      expect(result.isError).toBe(false);
      expect(result.content).toMatch(/^OK: created cron job id=[0-9a-f]{8}$/);
      expect(storage.jobs).toHaveLength(1);
      expect(storage.jobs[0]).toMatchObject({
        name: 'water',
        message: 'Water the plants',
        schedule: 'every 3600',
        channel: 'matrix:@alice:example.org',
        enabled: true,
        timezone: 'local',
        metadata: { room: '!abc:example.org' },
      });
      expect(result.content).toBe(`OK: created cron job id=${storage.jobs[0]?.id}`);
    });

    it('should not copy metadata onto jobs for another channel', async () => {
      const tool = new CronAddTool({
        jobs,
        defaultChannel: 'matrix:@alice:example.org',
        defaultMetadata: { room: '!abc:example.org' },
      });

      await tool.execute({ name: 'n', message: 'm', schedule: '*/5 * * * *', channel: 'email:bob@example.org' });

      expect(storage.jobs[0]?.channel).toBe('email:bob@example.org');
      expect(storage.jobs[0]?.metadata).toEqual({});
    });

    it('should require an explicit channel from CLI sessions', async () => {
      const tool = new CronAddTool({ jobs, defaultChannel: 'cli:local' });

      const result = await tool.execute({ name: 'n', message: 'm', schedule: 'every 60' });

      expect(result).toEqual({ content: 'Error: channel is required when scheduling from CLI sessions', isError: true });
      expect(storage.jobs).toEqual([]);
    });

    it('should reject an invalid schedule', async () => {
      const tool = new CronAddTool({ jobs, defaultChannel: 'matrix:@alice:example.org' });

      const result = await tool.execute({ name: 'n', message: 'm', schedule: 'sometimes' });

      expect(result).toEqual({
        content: "Error: Invalid schedule 'sometimes'. Use cron syntax or 'every N'.",
        isError: true,
      });
      expect(storage.jobs).toEqual([]);
    });

    it('should reject a missing argument', async () => {
      const tool = new CronAddTool({ jobs, defaultChannel: 'matrix:@alice:example.org' });

      expect((await tool.execute({ name: 'n', schedule: 'every 60' })).content).toBe('Error: message is required');
    });

    it('should append to existing jobs', async () => {
      storage.jobs = [existing];
      const tool = new CronAddTool({ jobs, defaultChannel: 'matrix:@alice:example.org' });

      await tool.execute({ name: 'n', message: 'm', schedule: 'every 60', timezone: 'UTC', enabled: false });

      expect(storage.jobs.map((job) => job.id)[0]).toBe('abcd1234');
      expect(storage.jobs[1]).toMatchObject({ enabled: false, timezone: 'UTC' });
    });
  });

  describe('cron_remove', () => {
    it('should remove a job by id', async () => {
      storage.jobs = [existing];

      expect((await new CronRemoveTool(jobs).execute({ job_id: 'abcd1234' })).content).toBe(
        'OK: removed cron job id=abcd1234'
      );
      expect(storage.jobs).toEqual([]);
    });

    it('should report an unknown id', async () => {
      expect(await new CronRemoveTool(jobs).execute({ job_id: 'nope' })).toEqual({
        content: "Error: job 'nope' not found",
        isError: true,
      });
    });
  });

  describe('cron_set_enabled', () => {
    it('should disable and enable a job', async () => {
      storage.jobs = [existing];
      const tool = new CronSetEnabledTool(jobs);

      expect((await tool.execute({ job_id: 'abcd1234', enabled: false })).content).toBe(
        'OK: disabled cron job id=abcd1234'
      );
      expect(storage.jobs[0]?.enabled).toBe(false);

      expect((await tool.execute({ job_id: 'abcd1234', enabled: true })).content).toBe('OK: enabled cron job id=abcd1234');
      expect(storage.jobs[0]?.enabled).toBe(true);
    });

    it('should report an unknown id', async () => {
      expect((await new CronSetEnabledTool(jobs).execute({ job_id: 'nope', enabled: true })).content).toBe(
        "Error: job 'nope' not found"
      );
    });
  });

  it('should build all four tools', () => {
    const tools = buildCronTools({ jobs, defaultChannel: 'cli:local' });

    expect(tools.map((tool) => tool.name)).toEqual(['cron_list', 'cron_add', 'cron_remove', 'cron_set_enabled']);
  });
});
