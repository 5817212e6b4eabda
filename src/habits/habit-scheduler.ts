/**
 * Habit schedules: daily prompts at a prep time ahead of the participant's
 * chosen habit time, plus one follow-up reminder when a prompt goes
 * unanswered.
 *
 * Descriptors live in the participant's `habit_schedule` state under
 * `scheduleRegistry`; the timers themselves live in the timer facade.
 */

import type { Logger } from 'pino';
import { nanoid } from 'nanoid';
import { z } from 'zod';
import type { HabitsConfig } from '../config/index.js';
import { TransientDependencyError, ValidationError } from '../errors/index.js';
import type {
  ContentGenerator,
  MessageSender,
  ResponseHandler,
  ResponseRouter,
} from '../messaging/index.js';
import type { FlowRecoveryHooks } from '../recovery/types.js';
import { dailyAt } from '../schedule/index.js';
import { defineStateView, readMarkers, type StateManager, type TrackedTimers } from '../state/index.js';
import type { FlowStateRecord } from '../store/index.js';
import type { ActionRegistry, Timer, TimerAction, TimerFiring } from '../timers/index.js';
import { assertTimezone, getZonedParts, zonedTimeToUtc } from '../utils/timezone.js';
import { errorMessage } from '../utils/logger.js';

export const HABIT_FLOW = 'habit_schedule';
export const DAILY_PROMPT_ACTION = 'habit.daily_prompt';
export const REMINDER_ACTION = 'habit.reminder';

const ACTIVE_STATE = 'ACTIVE';
const REMINDER_TIMER = 'reminder';

const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;

export const scheduleDescriptorSchema = z.object({
  id: z.string(),
  targetTime: z.string(),
  prepTime: z.string(),
  prepOffsetMinutes: z.number().int(),
  timezone: z.string(),
  recurringHandle: z.string(),
  oneOffHandle: z.string().optional(),
  habitDescription: z.string().optional(),
  createdAt: z.number(),
});

export type ScheduleDescriptor = z.infer<typeof scheduleDescriptorSchema>;

export const habitView = defineStateView({
  address: z.string().min(1),
  scheduleRegistry: z.array(scheduleDescriptorSchema),
  pendingReminder: z.object({ sentAt: z.number(), scheduleId: z.string() }),
  /** Local date (YYYY-MM-DD) of the last prompt sent, per schedule id */
  lastPromptOn: z.record(z.string(), z.string()),
});

const promptPayloadSchema = z.object({
  participantId: z.string().min(1),
  scheduleId: z.string().min(1),
});

const reminderPayloadSchema = z.object({
  participantId: z.string().min(1),
  expectedSentAt: z.number(),
});

export interface CreateScheduleOptions {
  habitDescription?: string;
  /** Delivery address; required unless one is already stored */
  address?: string;
}

export interface HabitSchedulerOptions {
  state: StateManager;
  timer: Timer;
  timers: TrackedTimers;
  registry: ActionRegistry;
  router: ResponseRouter;
  sender: MessageSender;
  content: ContentGenerator;
  config: HabitsConfig;
  logger: Logger;
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

function parseTime(value: string, field: string): { hour: number; minute: number } {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new ValidationError(
      `'${value}' is not a time of day`,
      field,
      value.startsWith('sched_') ? `'${value}' looks like a schedule id; pass a time such as 08:50` : undefined
    );
  }
  return { hour: parseInt(match[1], 10), minute: parseInt(match[2], 10) };
}

function localDay(instantMs: number, timezone: string): string {
  const { year, month, day } = getZonedParts(instantMs, timezone);
  return `${year}-${pad(month)}-${pad(day)}`;
}

function oneOffTimerName(scheduleId: string): string {
  return `prompt:${scheduleId}`;
}

export class HabitScheduler implements ResponseHandler, FlowRecoveryHooks {
  readonly flowType = HABIT_FLOW;
  readonly observer = true;

  private state: StateManager;
  private timer: Timer;
  private timers: TrackedTimers;
  private router: ResponseRouter;
  private sender: MessageSender;
  private content: ContentGenerator;
  private config: HabitsConfig;
  private logger: Logger;

  constructor(options: HabitSchedulerOptions) {
    this.state = options.state;
    this.timer = options.timer;
    this.timers = options.timers;
    this.router = options.router;
    this.sender = options.sender;
    this.content = options.content;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'habit-scheduler' });

    options.registry.register(DAILY_PROMPT_ACTION, (firing) => this.onDailyPrompt(firing));
    options.registry.register(REMINDER_ACTION, (firing) => this.onReminder(firing));
    this.router.registerHandler(this);
  }

  /**
   * Create a daily schedule whose prompt fires `prepOffsetMinutes` before
   * `targetTime` (HH:MM, local to `timezone`). When today's prep time is
   * still ahead, a one-off fires today and the recurring schedule starts
   * tomorrow; otherwise only the recurring schedule is armed.
   */
  createSchedule(
    participantId: string,
    targetTime: string,
    timezone: string = this.config.defaultTimezone,
    prepOffsetMinutes: number = this.config.defaultPrepOffsetMinutes,
    options: CreateScheduleOptions = {}
  ): string {
    const target = parseTime(targetTime, 'targetTime');
    assertTimezone(timezone);
    if (!Number.isInteger(prepOffsetMinutes) || prepOffsetMinutes < 0 || prepOffsetMinutes >= 24 * 60) {
      throw new ValidationError('must be a whole number of minutes below 24 hours', 'prepOffsetMinutes');
    }
    const address = this.resolveAddress(participantId, options.address);

    const prepMinutes = (target.hour * 60 + target.minute - prepOffsetMinutes + 24 * 60) % (24 * 60);
    const prepHour = Math.floor(prepMinutes / 60);
    const prepMinute = prepMinutes % 60;

    const now = Date.now();
    const today = getZonedParts(now, timezone);
    const todayPrep = zonedTimeToUtc(today, prepHour, prepMinute, timezone);

    const id = `sched_${nanoid(10)}`;
    const action: TimerAction = { kind: DAILY_PROMPT_ACTION, payload: { participantId, scheduleId: id } };

    let oneOffHandle: string | undefined;
    if (todayPrep !== null && now < todayPrep) {
      oneOffHandle = this.timers.arm(participantId, HABIT_FLOW, oneOffTimerName(id), { at: todayPrep }, action);
    }

    const recurringHandle = this.timer.recurring(dailyAt(prepHour, prepMinute, timezone), action, {
      key: `${HABIT_FLOW}:${participantId}:${id}`,
      startAfter: Math.max(now, todayPrep ?? now),
    });

    const descriptor: ScheduleDescriptor = {
      id,
      targetTime: `${pad(target.hour)}:${pad(target.minute)}`,
      prepTime: `${pad(prepHour)}:${pad(prepMinute)}`,
      prepOffsetMinutes,
      timezone,
      recurringHandle,
      oneOffHandle,
      habitDescription: options.habitDescription,
      createdAt: now,
    };

    try {
      this.state.update(
        participantId,
        HABIT_FLOW,
        (draft) => {
          draft.currentState = ACTIVE_STATE;
          habitView.set(draft.stateData, 'address', address);
          const registry = habitView.get(draft.stateData, 'scheduleRegistry') ?? [];
          habitView.set(draft.stateData, 'scheduleRegistry', [...registry, descriptor]);
        },
        ACTIVE_STATE
      );
    } catch (err) {
      // Timers are already armed; the schedule works but is not listed
      this.logger.error({ participantId, scheduleId: id, error: errorMessage(err) }, 'Failed to record schedule');
    }

    this.router.register(address, participantId, HABIT_FLOW);
    this.logger.info(
      { participantId, scheduleId: id, prepTime: descriptor.prepTime, timezone, firesToday: oneOffHandle !== undefined },
      'Habit schedule created'
    );
    return id;
  }

  listSchedules(participantId: string): ScheduleDescriptor[] {
    const record = this.state.getFlowState(participantId, HABIT_FLOW);
    return record ? habitView.get(record.stateData, 'scheduleRegistry') ?? [] : [];
  }

  /**
   * Cancel a schedule's timers and remove it. A time passed where the id
   * belongs is rejected with a hint.
   */
  deleteSchedule(participantId: string, scheduleId: string): 'ok' | 'not_found' {
    if (TIME_PATTERN.test(scheduleId.trim())) {
      throw new ValidationError(
        'expected a schedule id, got a time',
        'scheduleId',
        `'${scheduleId}' looks like a time. List the schedules and pass the id (sched_...) of the one to delete.`
      );
    }

    const descriptor = this.listSchedules(participantId).find((s) => s.id === scheduleId);
    if (!descriptor) {
      return 'not_found';
    }

    this.timer.cancel(descriptor.recurringHandle);
    this.timers.disarm(participantId, HABIT_FLOW, oneOffTimerName(scheduleId));

    try {
      let reminderDropped = false;
      this.state.update(participantId, HABIT_FLOW, (draft) => {
        const registry = habitView.get(draft.stateData, 'scheduleRegistry') ?? [];
        habitView.set(
          draft.stateData,
          'scheduleRegistry',
          registry.filter((s) => s.id !== scheduleId)
        );
        const { [scheduleId]: _dropped, ...lastPromptOn } = habitView.get(draft.stateData, 'lastPromptOn') ?? {};
        habitView.set(draft.stateData, 'lastPromptOn', lastPromptOn);
        if (habitView.get(draft.stateData, 'pendingReminder')?.scheduleId === scheduleId) {
          habitView.delete(draft.stateData, 'pendingReminder');
          reminderDropped = true;
        }
      });
      if (reminderDropped) {
        this.timers.disarm(participantId, HABIT_FLOW, REMINDER_TIMER);
      }
    } catch (err) {
      // Timers are gone; a stale descriptor only shows up in listings
      this.logger.error({ participantId, scheduleId, error: errorMessage(err) }, 'Failed to update schedule registry');
    }

    this.logger.info({ participantId, scheduleId }, 'Habit schedule deleted');
    return 'ok';
  }

  /** Any reply answers the outstanding prompt, so its reminder is dropped. */
  recordReply(participantId: string): boolean {
    const record = this.state.getFlowState(participantId, HABIT_FLOW);
    if (!record || !habitView.has(record.stateData, 'pendingReminder')) {
      return false;
    }
    this.state.update(participantId, HABIT_FLOW, (draft) => {
      habitView.delete(draft.stateData, 'pendingReminder');
    });
    this.timers.disarm(participantId, HABIT_FLOW, REMINDER_TIMER);
    this.logger.debug({ participantId }, 'Prompt answered, reminder dropped');
    return true;
  }

  /** Observes replies without consuming them. */
  async handleResponse(participantId: string, _text: string): Promise<boolean> {
    this.recordReply(participantId);
    return false;
  }

  // ============ Recovery hooks ============

  isTerminal(record: FlowStateRecord): boolean {
    const schedules = habitView.get(record.stateData, 'scheduleRegistry') ?? [];
    return schedules.length === 0 && readMarkers(record.stateData).length === 0;
  }

  responseAddress(record: FlowStateRecord): string | undefined {
    return habitView.get(record.stateData, 'address');
  }

  /**
   * Re-arm recurring schedules whose timer did not survive the restart.
   * A schedule whose one-off is still outstanding resumes after it.
   */
  async ensureProgress(record: FlowStateRecord): Promise<void> {
    const { participantId } = record;
    for (const descriptor of habitView.get(record.stateData, 'scheduleRegistry') ?? []) {
      if (this.timer.isArmed(descriptor.recurringHandle)) continue;

      const { hour, minute } = parseTime(descriptor.prepTime, 'prepTime');
      const oneOff = this.timers.getMarker(participantId, HABIT_FLOW, oneOffTimerName(descriptor.id));
      this.timer.recurring(
        dailyAt(hour, minute, descriptor.timezone),
        { kind: DAILY_PROMPT_ACTION, payload: { participantId, scheduleId: descriptor.id } },
        { key: descriptor.recurringHandle, startAfter: Math.max(Date.now(), oneOff?.dueAt ?? 0) }
      );
      this.logger.info({ participantId, scheduleId: descriptor.id }, 'Recurring schedule re-armed');
    }
  }

  // ============ Timer actions ============

  private async onDailyPrompt(firing: TimerFiring): Promise<void> {
    const parsed = promptPayloadSchema.safeParse(firing.payload);
    if (!parsed.success) {
      throw new ValidationError(`malformed prompt payload: ${parsed.error.message}`, 'payload');
    }
    const { participantId, scheduleId } = parsed.data;

    // The one-off for today has fired; its marker is no longer needed
    const oneOff = this.timers.getMarker(participantId, HABIT_FLOW, oneOffTimerName(scheduleId));
    if (oneOff && oneOff.handle === firing.handle) {
      this.timers.clear(participantId, HABIT_FLOW, oneOffTimerName(scheduleId));
    }

    const descriptor = this.listSchedules(participantId).find((s) => s.id === scheduleId);
    if (!descriptor) {
      this.logger.debug({ participantId, scheduleId }, 'Prompt for deleted schedule ignored');
      return;
    }

    // A re-armed one-off fires late; its marker keeps the original due time
    const occurredAt = oneOff && oneOff.handle === firing.handle ? oneOff.dueAt : firing.scheduledFor;
    const day = localDay(occurredAt, descriptor.timezone);

    let previous: string | undefined;
    let claimed = false;
    this.state.update(participantId, HABIT_FLOW, (draft) => {
      const sent = habitView.get(draft.stateData, 'lastPromptOn') ?? {};
      if (sent[scheduleId] === day) return;
      previous = sent[scheduleId];
      habitView.set(draft.stateData, 'lastPromptOn', { ...sent, [scheduleId]: day });
      claimed = true;
    });
    if (!claimed) {
      this.logger.info({ participantId, scheduleId, day }, 'Prompt already sent for this day');
      return;
    }

    try {
      await this.deliver(participantId, 'daily_prompt', descriptor.habitDescription);
    } catch (err) {
      this.releasePrompt(participantId, scheduleId, day, previous);
      throw err;
    }

    const sentAt = Date.now();
    this.state.update(participantId, HABIT_FLOW, (draft) => {
      habitView.set(draft.stateData, 'pendingReminder', { sentAt, scheduleId });
    });
    this.timers.arm(
      participantId,
      HABIT_FLOW,
      REMINDER_TIMER,
      { delayMs: this.config.reminderDelayMs },
      { kind: REMINDER_ACTION, payload: { participantId, expectedSentAt: sentAt } }
    );
  }

  private async onReminder(firing: TimerFiring): Promise<void> {
    const parsed = reminderPayloadSchema.safeParse(firing.payload);
    if (!parsed.success) {
      throw new ValidationError(`malformed reminder payload: ${parsed.error.message}`, 'payload');
    }
    const { participantId, expectedSentAt } = parsed.data;

    const record = this.state.getFlowState(participantId, HABIT_FLOW);
    const pending = record ? habitView.get(record.stateData, 'pendingReminder') : undefined;
    if (!pending || pending.sentAt !== expectedSentAt) {
      this.logger.debug({ participantId, expectedSentAt }, 'Reminder no longer needed');
      return;
    }

    const descriptor = this.listSchedules(participantId).find((s) => s.id === pending.scheduleId);
    this.timers.clear(participantId, HABIT_FLOW, REMINDER_TIMER);
    this.state.update(participantId, HABIT_FLOW, (draft) => {
      habitView.delete(draft.stateData, 'pendingReminder');
    });
    await this.deliver(participantId, 'daily_reminder', descriptor?.habitDescription);
  }

  // ============ Helpers ============

  /** Undo a prompt claim whose delivery failed. */
  private releasePrompt(participantId: string, scheduleId: string, day: string, previous: string | undefined): void {
    try {
      this.state.update(participantId, HABIT_FLOW, (draft) => {
        const { [scheduleId]: claimedDay, ...others } = habitView.get(draft.stateData, 'lastPromptOn') ?? {};
        if (claimedDay !== day) return;
        habitView.set(draft.stateData, 'lastPromptOn', previous === undefined ? others : { ...others, [scheduleId]: previous });
      });
    } catch (err) {
      this.logger.error({ participantId, scheduleId, error: errorMessage(err) }, 'Failed to release prompt claim');
    }
  }

  private resolveAddress(participantId: string, address: string | undefined): string {
    if (address !== undefined) {
      return this.sender.validateRecipient(address);
    }
    const record = this.state.getFlowState(participantId, HABIT_FLOW);
    const stored = record ? habitView.get(record.stateData, 'address') : undefined;
    if (!stored) {
      throw new ValidationError(`no delivery address known for '${participantId}'`, 'address');
    }
    return stored;
  }

  private async deliver(participantId: string, prompt: string, habit: string | undefined): Promise<void> {
    const record = this.state.getFlowState(participantId, HABIT_FLOW);
    const address = record ? habitView.get(record.stateData, 'address') : undefined;
    if (!address) {
      throw new ValidationError(`no delivery address known for '${participantId}'`, 'address');
    }

    const text = await this.content.generate(participantId, {
      flowType: HABIT_FLOW,
      prompt,
      variables: { habit: habit ?? 'your habit' },
    });
    try {
      await this.sender.send(address, text);
    } catch (err) {
      throw new TransientDependencyError(`message sender '${this.sender.getName()}'`, err);
    }
  }
}
