import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const scheduled = vi.hoisted(() => {
  const tasks: Array<{ expression: string; start: ReturnType<typeof vi.fn>; stop: ReturnType<typeof vi.fn> }> = [];
  return { tasks };
});

vi.mock('node-cron', () => ({
  default: {
    validate: (expression: string) => expression.trim().split(/\s+/).length === 5,
    schedule: (expression: string) => {
      const task = { expression, start: vi.fn(), stop: vi.fn() };
      scheduled.tasks.push(task);
      return task;
    }
  }
}));

import { getJobDefinitions, registerJob, startScheduler, stopScheduler, triggerJob } from './scheduler';

describe('scheduler', () => {
  beforeEach(() => {
    scheduled.tasks.length = 0;
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    stopScheduler();
  });

  it('schedules enabled jobs and starts them with the scheduler', () => {
    registerJob('score-recompute', '*/30 * * * *', async () => undefined);

    expect(scheduled.tasks).toHaveLength(1);
    expect(scheduled.tasks[0]?.start).not.toHaveBeenCalled();

    startScheduler();
    expect(scheduled.tasks[0]?.start).toHaveBeenCalledTimes(1);

    stopScheduler();
    expect(scheduled.tasks[0]?.stop).toHaveBeenCalledTimes(1);
  });

  it('keeps disabled jobs available for manual runs', async () => {
    const task = vi.fn(async () => undefined);
    registerJob('score-recompute', '*/30 * * * *', task, false);

    expect(scheduled.tasks).toHaveLength(0);
    expect(getJobDefinitions()).toEqual([{ name: 'score-recompute', schedule: '*/30 * * * *', enabled: false }]);

    await triggerJob('score-recompute');
    expect(task).toHaveBeenCalledTimes(1);
  });

  it('ignores duplicate registrations', () => {
    registerJob('score-recompute', '*/30 * * * *', async () => undefined);
    registerJob('score-recompute', '0 * * * *', async () => undefined);

    expect(scheduled.tasks).toHaveLength(1);
    expect(console.warn).toHaveBeenCalledWith('⚠️  Job "score-recompute" already registered, skipping');
  });

  it('rejects invalid cron expressions', () => {
    expect(() => registerJob('score-recompute', 'hourly', async () => undefined)).toThrow(
      'Invalid cron expression for job "score-recompute": hourly'
    );
  });

  it('rethrows failures of manual runs', async () => {
    registerJob('score-recompute', '*/30 * * * *', async () => {
      throw new Error('boom');
    });

    await expect(triggerJob('score-recompute')).rejects.toThrow('boom');
    await expect(triggerJob('missing')).rejects.toThrow('Job "missing" not found');
  });
});
