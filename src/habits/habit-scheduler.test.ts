import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { pino } from 'pino';
import type { HabitsConfig } from '../config/index.js';
import { StaticContentGenerator } from '../content/index.js';
import { ValidationError } from '../errors/index.js';
import { Dispatcher, JobQueue } from '../jobs/index.js';
import { canonicalPhoneNumber, ResponseRouter, type MessageSender } from '../messaging/index.js';
import { StateManager, TrackedTimers } from '../state/index.js';
import { HabitDatabase } from '../store/index.js';
import { ActionRegistry, DurableTimer, TIMER_FIRE_JOB, TIMER_RECURRING_JOB } from '../timers/index.js';
import { DAILY_PROMPT_ACTION, HABIT_FLOW, HabitScheduler, habitView } from './habit-scheduler.js';

const logger = pino({ level: 'silent' });
const ADDRESS = '+15551230000';
const HOUR = 60 * 60 * 1000;

// 08:00 in Toronto (EDT, UTC-4)
const MORNING = Date.parse('2025-06-02T12:00:00Z');
const PREP_TODAY = Date.parse('2025-06-02T12:40:00Z');
const PREP_TOMORROW = Date.parse('2025-06-03T12:40:00Z');

const config: HabitsConfig = {
  defaultTimezone: 'UTC',
  defaultPrepOffsetMinutes: 10,
  reminderDelayMs: 5 * HOUR,
};

class FakeSender implements MessageSender {
  sent: Array<{ to: string; text: string }> = [];
  failing = false;

  validateRecipient(address: string): string {
    return canonicalPhoneNumber(address);
  }

  async send(to: string, text: string): Promise<void> {
    if (this.failing) throw new Error('gateway down');
    this.sent.push({ to, text });
  }

  getName(): string {
    return 'fake';
  }
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected an error');
}

describe('HabitScheduler', () => {
  let db: HabitDatabase;
  let queue: JobQueue;
  let dispatcher: Dispatcher;
  let registry: ActionRegistry;
  let timer: DurableTimer;
  let state: StateManager;
  let timers: TrackedTimers;
  let router: ResponseRouter;
  let sender: FakeSender;
  let habits: HabitScheduler;

  const pendingJobs = () => queue.listPending().map((job) => ({ kind: job.kind, runAt: job.runAt }));

  async function runAt(instant: number): Promise<void> {
    vi.setSystemTime(instant);
    await dispatcher.runOnce();
  }

  function create(targetTime = '08:50'): string {
    return habits.createSchedule('p1', targetTime, 'America/Toronto', 10, {
      address: ADDRESS,
      habitDescription: 'drink water',
    });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(MORNING);
    db = new HabitDatabase(':memory:');
    queue = new JobQueue({ db, logger });
    dispatcher = new Dispatcher({ queue, logger });
    registry = new ActionRegistry(logger);
    timer = new DurableTimer({ queue, registry, logger });
    state = new StateManager({ db, logger });
    timers = new TrackedTimers({ state, timer, logger });
    router = new ResponseRouter({ logger, canonicalize: canonicalPhoneNumber });
    sender = new FakeSender();
    habits = new HabitScheduler({
      state,
      timer,
      timers,
      registry,
      router,
      sender,
      content: new StaticContentGenerator(),
      config,
      logger,
    });
  });

  afterEach(() => {
    db.close();
    vi.useRealTimers();
  });

  describe('createSchedule', () => {
    it('should fire today and recur from tomorrow when the prep time is still ahead', () => {
      const id = create();

      expect(pendingJobs()).toEqual([
        { kind: TIMER_FIRE_JOB, runAt: PREP_TODAY },
        { kind: TIMER_RECURRING_JOB, runAt: PREP_TOMORROW },
      ]);
      expect(habits.listSchedules('p1')).toEqual([
        {
          id,
          targetTime: '08:50',
          prepTime: '08:40',
          prepOffsetMinutes: 10,
          timezone: 'America/Toronto',
          recurringHandle: `habit_schedule:p1:${id}`,
          oneOffHandle: `habit_schedule:p1:prompt:${id}`,
          habitDescription: 'drink water',
          createdAt: MORNING,
        },
      ]);
    });

    it('should prompt at 08:50 today for a 09:00 habit created at 08:30', async () => {
      vi.setSystemTime(Date.parse('2025-06-02T12:30:00Z'));

      habits.createSchedule('p1', '09:00', 'America/Toronto', 10, { address: ADDRESS });

      expect(pendingJobs()).toEqual([
        { kind: TIMER_FIRE_JOB, runAt: Date.parse('2025-06-02T12:50:00Z') },
        { kind: TIMER_RECURRING_JOB, runAt: Date.parse('2025-06-03T12:50:00Z') },
      ]);
      await runAt(Date.parse('2025-06-02T12:49:59Z'));
      expect(sender.sent).toEqual([]);
      await runAt(Date.parse('2025-06-02T12:50:00Z'));
      expect(sender.sent).toHaveLength(1);
    });

    it('should only recur from tomorrow when the prep time has passed', () => {
      vi.setSystemTime(Date.parse('2025-06-02T13:00:00Z'));

      const id = create();

      expect(pendingJobs()).toEqual([{ kind: TIMER_RECURRING_JOB, runAt: PREP_TOMORROW }]);
      expect(habits.listSchedules('p1')[0].oneOffHandle).toBeUndefined();
      expect(habits.listSchedules('p1')[0].id).toBe(id);
    });

    it('should wrap the prep time across midnight', () => {
      create('00:05');

      expect(habits.listSchedules('p1')[0].prepTime).toBe('23:55');
      // 23:55 EDT on June 2 is 03:55 UTC on June 3
      expect(pendingJobs()).toEqual([
        { kind: TIMER_FIRE_JOB, runAt: Date.parse('2025-06-03T03:55:00Z') },
        { kind: TIMER_RECURRING_JOB, runAt: Date.parse('2025-06-04T03:55:00Z') },
      ]);
    });

    it('should use the configured defaults', () => {
      habits.createSchedule('p1', '14:30', undefined, undefined, { address: ADDRESS });

      expect(habits.listSchedules('p1')[0]).toMatchObject({ timezone: 'UTC', prepTime: '14:20' });
    });

    it('should route replies from the participant address', () => {
      create();

      expect(router.getRoutes(ADDRESS)).toEqual([{ participantId: 'p1', flowType: HABIT_FLOW }]);
    });

    it('should reuse the stored address for later schedules', () => {
      create('08:50');
      habits.createSchedule('p1', '18:00', 'America/Toronto');

      expect(habits.listSchedules('p1').map((s) => s.targetTime)).toEqual(['08:50', '18:00']);
    });

    it('should reject malformed input', () => {
      expect(() => habits.createSchedule('p1', '25:00', 'UTC', 10, { address: ADDRESS })).toThrow(ValidationError);
      expect(() => habits.createSchedule('p1', '08:50', 'Mars/Olympus', 10, { address: ADDRESS })).toThrow(
        ValidationError
      );
      expect(() => habits.createSchedule('p1', '08:50', 'UTC', -5, { address: ADDRESS })).toThrow(ValidationError);
      expect(() => habits.createSchedule('p1', '08:50', 'UTC', 10)).toThrow(ValidationError);
      expect(queue.listPending()).toEqual([]);
    });

    it('should hint when a schedule id is passed as the time', () => {
      const error = catchError(() => habits.createSchedule('p1', 'sched_abc', 'UTC', 10, { address: ADDRESS }));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ hint: "'sched_abc' looks like a schedule id; pass a time such as 08:50" });
    });
  });

  describe('prompts and reminders', () => {
    it('should send the prompt at prep time and a reminder when unanswered', async () => {
      const id = create();

      await runAt(PREP_TODAY);
      expect(sender.sent).toEqual([{ to: ADDRESS, text: "Time for your habit: drink water. Reply when you're done!" }]);
      const record = state.getFlowState('p1', HABIT_FLOW);
      expect(record && habitView.get(record.stateData, 'pendingReminder')).toEqual({ sentAt: PREP_TODAY, scheduleId: id });
      expect(timers.getMarker('p1', HABIT_FLOW, `prompt:${id}`)).toBeNull();

      await runAt(PREP_TODAY + 5 * HOUR);
      expect(sender.sent.map((m) => m.text)).toEqual([
        "Time for your habit: drink water. Reply when you're done!",
        'Just a reminder: drink water. Even a minute counts.',
      ]);
    });

    it('should drop the reminder once the participant replies', async () => {
      create();
      await runAt(PREP_TODAY);

      expect(await router.route(ADDRESS, 'done')).toEqual({ handled: false });

      await runAt(PREP_TODAY + 5 * HOUR);
      expect(sender.sent).toHaveLength(1);
    });

    it('should skip a reminder for an older prompt', async () => {
      const id = create();
      await runAt(PREP_TODAY);
      state.update('p1', HABIT_FLOW, (draft) => {
        habitView.set(draft.stateData, 'pendingReminder', { sentAt: PREP_TODAY + 1, scheduleId: id });
      });

      await runAt(PREP_TODAY + 5 * HOUR);
      expect(sender.sent).toHaveLength(1);
    });

    it('should send one prompt when the same occurrence fires twice', async () => {
      const id = create();
      await runAt(PREP_TODAY);

      await registry.invoke({
        handle: `habit_schedule:p1:prompt:${id}`,
        kind: DAILY_PROMPT_ACTION,
        payload: { participantId: 'p1', scheduleId: id },
        scheduledFor: PREP_TODAY,
        firedAt: PREP_TODAY + 1000,
      });

      expect(sender.sent).toHaveLength(1);
      const record = state.getFlowState('p1', HABIT_FLOW);
      expect(record && habitView.get(record.stateData, 'lastPromptOn')).toEqual({ [id]: '2025-06-02' });
    });

    it('should allow the prompt again after a failed delivery', async () => {
      const id = create();
      sender.failing = true;
      await runAt(PREP_TODAY);
      expect(db.listJobs({ kind: TIMER_FIRE_JOB }).map((job) => job.status)).toEqual(['failed']);
      sender.failing = false;

      await registry.invoke({
        handle: `habit_schedule:p1:prompt:${id}`,
        kind: DAILY_PROMPT_ACTION,
        payload: { participantId: 'p1', scheduleId: id },
        scheduledFor: PREP_TODAY,
        firedAt: PREP_TODAY + 1000,
      });

      expect(sender.sent).toHaveLength(1);
    });

    it('should prompt again the next day from the recurring timer', async () => {
      create();
      await runAt(PREP_TODAY);
      await router.route(ADDRESS, 'done');
      await runAt(PREP_TOMORROW);

      expect(sender.sent.map((m) => m.text)).toEqual([
        "Time for your habit: drink water. Reply when you're done!",
        "Time for your habit: drink water. Reply when you're done!",
      ]);
      expect(pendingJobs()).toContainEqual({ kind: TIMER_RECURRING_JOB, runAt: Date.parse('2025-06-04T12:40:00Z') });
    });
  });

  describe('deleteSchedule', () => {
    it('should cancel every timer of the schedule', async () => {
      const id = create();

      expect(habits.deleteSchedule('p1', id)).toBe('ok');

      expect(queue.listPending()).toEqual([]);
      expect(habits.listSchedules('p1')).toEqual([]);
      await runAt(PREP_TOMORROW);
      expect(sender.sent).toEqual([]);
    });

    it('should drop a pending reminder of the deleted schedule', async () => {
      const id = create();
      await runAt(PREP_TODAY);

      habits.deleteSchedule('p1', id);

      const record = state.getFlowState('p1', HABIT_FLOW);
      expect(record && habitView.has(record.stateData, 'pendingReminder')).toBe(false);
      expect(timers.getMarker('p1', HABIT_FLOW, 'reminder')).toBeNull();
      expect(queue.listPending()).toEqual([]);
    });

    it('should report an unknown id as not found', () => {
      create();

      expect(habits.deleteSchedule('p1', 'sched_missing')).toBe('not_found');
      expect(habits.deleteSchedule('p2', 'sched_missing')).toBe('not_found');
    });

    it('should reject a time passed as the id with a hint', () => {
      create();

      const error = catchError(() => habits.deleteSchedule('p1', '08:50'));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field: 'scheduleId' });
      expect(error).toHaveProperty('hint', expect.stringContaining('sched_'));
      expect(habits.listSchedules('p1')).toHaveLength(1);
    });
  });

  describe('recovery hooks', () => {
    it('should be terminal once no schedules or timers remain', async () => {
      const id = create();
      const active = state.getFlowState('p1', HABIT_FLOW);
      expect(active && habits.isTerminal(active)).toBe(false);

      habits.deleteSchedule('p1', id);

      const emptied = state.getFlowState('p1', HABIT_FLOW);
      expect(emptied && habits.isTerminal(emptied)).toBe(true);
      expect(emptied && habits.responseAddress(emptied)).toBe(ADDRESS);
    });

    it('should re-arm a recurring timer that did not survive', async () => {
      vi.setSystemTime(Date.parse('2025-06-02T13:00:00Z'));
      const id = create();
      queue.cancelByDedupeKey(`habit_schedule:p1:${id}`);
      const record = state.getFlowState('p1', HABIT_FLOW);
      if (!record) throw new Error('record missing');

      await habits.ensureProgress(record);

      expect(timer.isArmed(`habit_schedule:p1:${id}`)).toBe(true);
      expect(pendingJobs()).toEqual([{ kind: TIMER_RECURRING_JOB, runAt: PREP_TOMORROW }]);
    });

    it('should resume the recurring timer after an outstanding one-off', async () => {
      const id = create();
      queue.cancelByDedupeKey(`habit_schedule:p1:${id}`);
      const record = state.getFlowState('p1', HABIT_FLOW);
      if (!record) throw new Error('record missing');

      await habits.ensureProgress(record);

      expect(pendingJobs()).toEqual([
        { kind: TIMER_FIRE_JOB, runAt: PREP_TODAY },
        { kind: TIMER_RECURRING_JOB, runAt: PREP_TOMORROW },
      ]);
    });

    it('should leave armed recurring timers alone', async () => {
      create();
      const before = queue.listPending().map((job) => job.id);
      const record = state.getFlowState('p1', HABIT_FLOW);
      if (!record) throw new Error('record missing');

      await habits.ensureProgress(record);

      expect(queue.listPending().map((job) => job.id)).toEqual(before);
    });
  });
});
