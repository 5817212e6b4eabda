import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { pino } from 'pino';
import { HabitDatabase } from '../store/index.js';
import { JobQueue, type ClaimedJob } from './job-queue.js';
import { Dispatcher } from './dispatcher.js';

const logger = pino({ level: 'silent' });
const NOW = Date.parse('2025-06-02T12:00:00Z');

describe('Dispatcher', () => {
  let db: HabitDatabase;
  let queue: JobQueue;
  let dispatcher: Dispatcher;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    db = new HabitDatabase(':memory:');
    queue = new JobQueue({ db, logger });
    dispatcher = new Dispatcher({ queue, logger, interval: 1000 });
  });

  afterEach(async () => {
    await dispatcher.stop();
    db.close();
    vi.useRealTimers();
  });

  it('should run due jobs and mark them done', async () => {
    const handler = vi.fn(async (_job: ClaimedJob) => {});
    queue.registerHandler('nudge', handler);
    const id = queue.enqueue('nudge', NOW - 1, { participantId: 'p1' });

    const summary = await dispatcher.runOnce();

    expect(summary).toEqual({ claimed: 1, succeeded: 1, failed: 0 });
    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].payload).toEqual({ participantId: 'p1' });
    expect(queue.getJob(id)?.status).toBe('done');
  });

  it('should leave future jobs pending', async () => {
    const handler = vi.fn(async () => {});
    queue.registerHandler('nudge', handler);
    const id = queue.enqueue('nudge', NOW + 1000, {});

    expect(await dispatcher.runOnce()).toEqual({ claimed: 0, succeeded: 0, failed: 0 });
    expect(handler).not.toHaveBeenCalled();
    expect(queue.getJob(id)?.status).toBe('pending');
  });

  it('should mark a failing job failed without retrying it', async () => {
    const handler = vi.fn(async () => {
      throw new Error('boom');
    });
    queue.registerHandler('nudge', handler);
    const id = queue.enqueue('nudge', NOW, {});

    expect(await dispatcher.runOnce()).toEqual({ claimed: 1, succeeded: 0, failed: 1 });
    expect(await dispatcher.runOnce()).toEqual({ claimed: 0, succeeded: 0, failed: 0 });

    const job = queue.getJob(id);
    expect(job?.status).toBe('failed');
    expect(job?.lastError).toBe('boom');
    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should fail jobs of an unknown kind', async () => {
    const id = queue.enqueue('mystery', NOW, {});

    await dispatcher.runOnce();

    expect(queue.getJob(id)?.status).toBe('failed');
    expect(queue.getJob(id)?.lastError).toBe('no handler registered');
  });

  it('should run only the latest job of a superseded dedupe key', async () => {
    const handler = vi.fn(async (_job: ClaimedJob) => {});
    queue.registerHandler('timeout', handler);
    queue.enqueue('timeout', NOW - 10, { version: 1 }, 'p1:stateTimeout');
    queue.enqueue('timeout', NOW - 5, { version: 2 }, 'p1:stateTimeout');

    await dispatcher.runOnce();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].payload).toEqual({ version: 2 });
  });

  it('should requeue and run a job orphaned by a crashed process', async () => {
    const handler = vi.fn(async (_job: ClaimedJob) => {});
    queue.registerHandler('nudge', handler);
    const id = queue.enqueue('nudge', NOW - 20 * 60 * 1000, {});
    queue.claimDue(NOW - 10 * 60 * 1000);

    expect(dispatcher.recoverStaleJobs()).toEqual({ requeued: 1, cancelled: 0 });
    await dispatcher.runOnce();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0][0].attempt).toBe(2);
    expect(queue.getJob(id)?.status).toBe('done');
  });

  it('should cancel an orphaned job that a newer pending job replaced', () => {
    queue.enqueue('nudge', NOW - 20 * 60 * 1000, {}, 'p1:reminder');
    const [orphan] = queue.claimDue(NOW - 10 * 60 * 1000);
    const replacement = queue.enqueue('nudge', NOW + 1000, {}, 'p1:reminder');

    expect(dispatcher.recoverStaleJobs()).toEqual({ requeued: 0, cancelled: 1 });
    expect(queue.getJob(orphan.id)?.status).toBe('cancelled');
    expect(queue.getJob(replacement)?.status).toBe('pending');
  });

  it('should poll on its interval once started', async () => {
    const handler = vi.fn(async () => {});
    queue.registerHandler('nudge', handler);
    queue.enqueue('nudge', NOW + 1500, {});

    dispatcher.start();
    expect(dispatcher.running).toBe(true);

    await vi.advanceTimersByTimeAsync(1000);
    expect(handler).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1500);
    await dispatcher.stop();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(dispatcher.running).toBe(false);
  });

  describe('with a handler that never settles', () => {
    let stalled: Dispatcher;

    beforeEach(() => {
      stalled = new Dispatcher({ queue, logger, interval: 20, staleJobThresholdMs: 1000, drainTimeoutMs: 100 });
      queue.registerHandler('slow', () => new Promise<void>(() => {}));
    });

    afterEach(async () => {
      const stopping = stalled.stop();
      await vi.advanceTimersByTimeAsync(100);
      await stopping;
    });

    it('should keep dispatching other jobs', async () => {
      const fast = vi.fn(async () => {});
      queue.registerHandler('fast', fast);
      queue.enqueue('slow', NOW, {});
      const fastId = queue.enqueue('fast', NOW + 50, {});

      stalled.start();
      await vi.advanceTimersByTimeAsync(500);

      expect(fast).toHaveBeenCalledTimes(1);
      expect(queue.getJob(fastId)?.status).toBe('done');
      expect(stalled.activeJobs).toBe(1);
    });

    it('should not requeue its own long-running job', async () => {
      const slowId = queue.enqueue('slow', NOW, {});
      const handler = vi.fn(() => new Promise<void>(() => {}));
      queue.registerHandler('slow', handler);

      stalled.start();
      await vi.advanceTimersByTimeAsync(3000);

      expect(handler).toHaveBeenCalledTimes(1);
      expect(queue.getJob(slowId)?.status).toBe('running');
      expect(queue.getJob(slowId)?.attempt).toBe(1);
    });

    it('should stop after the drain timeout', async () => {
      queue.enqueue('slow', NOW, {});
      stalled.start();
      await vi.advanceTimersByTimeAsync(20);

      let stopped = false;
      const stopping = stalled.stop().then(() => {
        stopped = true;
      });
      await vi.advanceTimersByTimeAsync(50);
      expect(stopped).toBe(false);

      await vi.advanceTimersByTimeAsync(50);
      await stopping;
      expect(stopped).toBe(true);
      expect(stalled.running).toBe(false);
    });
  });
});
