/**
 * Micro health intervention flow
 *
 * Daily cycle: commitment → feeling → random assignment → intervention →
 * follow-up questions → end of day. Every state that waits for a reply arms
 * exactly one timeout that forces the default transition. Timeout handlers
 * re-read the participant's state and no-op when it has moved on.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { InterventionConfig } from '../config/index.js';
import { TransientDependencyError, ValidationError } from '../errors/index.js';
import {
  canonicalizeReply,
  replyMatches,
  type ContentGenerator,
  type MessageSender,
  type ResponseHandler,
  type ResponseRouter,
} from '../messaging/index.js';
import type { FlowRecoveryHooks } from '../recovery/types.js';
import { defineStateView, type StateManager, type TrackedTimers } from '../state/index.js';
import type { FlowStateRecord } from '../store/index.js';
import type { ActionRegistry, TimerFiring } from '../timers/index.js';
import {
  COMMIT_NO,
  COMMIT_YES,
  CONTEXT_REPLIES,
  DONE_REPLIES,
  FEELING_REPLIES,
  INTERVENTION_FLOW,
  InterventionState,
  MOOD_REPLIES,
  NO_REPLIES,
  NOT_DONE_REPLIES,
  RESTART_REPLIES,
  STATE_PROMPTS,
  YES_REPLIES,
  isWaitingState,
  timeoutFor,
  type Assignment,
  type WaitingState,
} from './states.js';

export const INTERVENTION_TIMEOUT_ACTION = 'intervention.timeout';

/** Marker name of the single per-participant state timeout */
const TIMEOUT_TIMER = 'stateTimeout';

export const interventionView = defineStateView({
  address: z.string().min(1),
  habit: z.string(),
  flowAssignment: z.enum(['IMMEDIATE', 'REFLECTIVE']),
  feelingResponse: z.string(),
  completionResponse: z.string(),
  gotChanceResponse: z.string(),
  contextResponse: z.string(),
  moodResponse: z.string(),
  barrierResponse: z.string(),
  barrierReasonResponse: z.string(),
  cycleStartedAt: z.number(),
  /** Bumped on every state entry; a timeout only acts on the entry that armed it */
  stateEntry: z.number().int(),
});

const RESPONSE_KEYS = [
  'feelingResponse',
  'completionResponse',
  'gotChanceResponse',
  'contextResponse',
  'moodResponse',
  'barrierResponse',
  'barrierReasonResponse',
] as const;

type ResponseKey = (typeof RESPONSE_KEYS)[number];

const CYCLE_KEYS = ['flowAssignment', ...RESPONSE_KEYS] as const;

const timeoutPayloadSchema = z.object({
  participantId: z.string().min(1),
  state: z.string().min(1),
  entry: z.number().int(),
});

const COMMITMENT_BUTTONS = [
  { id: '1', title: "🚀 Let's do it!" },
  { id: '2', title: '⏳ Not yet' },
];

export interface InterventionFlowOptions {
  state: StateManager;
  timers: TrackedTimers;
  registry: ActionRegistry;
  router: ResponseRouter;
  sender: MessageSender;
  content: ContentGenerator;
  config: InterventionConfig;
  logger: Logger;
  /** Uniform [0, 1) source for the assignment draw (default: Math.random) */
  random?: () => number;
}

export class InterventionFlow implements ResponseHandler, FlowRecoveryHooks {
  readonly flowType = INTERVENTION_FLOW;

  private state: StateManager;
  private timers: TrackedTimers;
  private router: ResponseRouter;
  private sender: MessageSender;
  private content: ContentGenerator;
  private config: InterventionConfig;
  private logger: Logger;
  private random: () => number;

  constructor(options: InterventionFlowOptions) {
    this.state = options.state;
    this.timers = options.timers;
    this.router = options.router;
    this.sender = options.sender;
    this.content = options.content;
    this.config = options.config;
    this.logger = options.logger.child({ component: 'intervention-flow' });
    this.random = options.random ?? Math.random;

    options.registry.register(INTERVENTION_TIMEOUT_ACTION, (firing) => this.onTimeout(firing));
    this.router.registerHandler(this);
  }

  /**
   * Enroll a participant: store the address, route replies, send the
   * orientation and open the first day.
   */
  async enroll(participantId: string, address: string, habit = ''): Promise<void> {
    const canonical = this.sender.validateRecipient(address);
    this.state.update(
      participantId,
      INTERVENTION_FLOW,
      (draft) => {
        draft.currentState = InterventionState.ORIENTATION;
        interventionView.set(draft.stateData, 'address', canonical);
        interventionView.set(draft.stateData, 'habit', habit);
      },
      InterventionState.ORIENTATION
    );
    this.router.register(canonical, participantId, INTERVENTION_FLOW);
    this.logger.info({ participantId }, 'Participant enrolled');

    await this.sendPrompt(participantId, InterventionState.ORIENTATION);
    await this.startDay(participantId);
  }

  /**
   * Open a new daily cycle at the commitment prompt. Responses and the
   * assignment of the previous cycle are cleared.
   */
  async startDay(participantId: string): Promise<void> {
    const record = this.requireRecord(participantId);
    if (record.currentState === InterventionState.COMPLETE) {
      throw new ValidationError('participant has completed the intervention', 'participantId');
    }

    this.state.update(participantId, INTERVENTION_FLOW, (draft) => {
      for (const key of CYCLE_KEYS) {
        interventionView.delete(draft.stateData, key);
      }
      interventionView.set(draft.stateData, 'cycleStartedAt', Date.now());
    });
    await this.enterState(participantId, InterventionState.COMMITMENT_PROMPT);
  }

  /** Finish the intervention; the participant is terminal for recovery. */
  complete(participantId: string): void {
    this.timers.disarm(participantId, INTERVENTION_FLOW, TIMEOUT_TIMER);
    this.state.setCurrentState(participantId, INTERVENTION_FLOW, InterventionState.COMPLETE);
  }

  async handleResponse(participantId: string, text: string): Promise<boolean> {
    const record = this.state.getFlowState(participantId, INTERVENTION_FLOW);
    if (!record) return false;

    const reply = canonicalizeReply(text);
    switch (record.currentState) {
      case InterventionState.COMMITMENT_PROMPT:
        if (replyMatches(reply, COMMIT_YES)) {
          await this.enterState(participantId, InterventionState.FEELING_PROMPT);
          return true;
        }
        if (replyMatches(reply, COMMIT_NO)) {
          await this.enterState(participantId, InterventionState.END_OF_DAY);
          return true;
        }
        return false;

      case InterventionState.FEELING_PROMPT:
        if (!replyMatches(reply, FEELING_REPLIES)) return false;
        this.record(participantId, 'feelingResponse', reply);
        await this.assignAndDeliver(participantId);
        return true;

      case InterventionState.SEND_INTERVENTION_IMMEDIATE:
      case InterventionState.SEND_INTERVENTION_REFLECTIVE:
        if (replyMatches(reply, DONE_REPLIES)) {
          this.record(participantId, 'completionResponse', 'done');
          await this.enterState(participantId, InterventionState.REINFORCEMENT_FOLLOWUP);
          return true;
        }
        if (replyMatches(reply, NOT_DONE_REPLIES)) {
          this.record(participantId, 'completionResponse', 'no');
          await this.enterState(participantId, InterventionState.DID_YOU_GET_A_CHANCE);
          return true;
        }
        return false;

      case InterventionState.DID_YOU_GET_A_CHANCE:
        if (replyMatches(reply, YES_REPLIES)) {
          this.record(participantId, 'gotChanceResponse', 'yes');
          await this.enterState(participantId, InterventionState.CONTEXT_QUESTION);
          return true;
        }
        if (replyMatches(reply, NO_REPLIES)) {
          this.record(participantId, 'gotChanceResponse', 'no');
          await this.enterState(participantId, InterventionState.BARRIER_REASON_NO_CHANCE);
          return true;
        }
        return false;

      case InterventionState.CONTEXT_QUESTION:
        if (!replyMatches(reply, CONTEXT_REPLIES)) return false;
        this.record(participantId, 'contextResponse', reply);
        await this.enterState(participantId, InterventionState.MOOD_QUESTION);
        return true;

      case InterventionState.MOOD_QUESTION:
        if (!replyMatches(reply, MOOD_REPLIES)) return false;
        this.record(participantId, 'moodResponse', reply);
        await this.enterState(participantId, InterventionState.BARRIER_CHECK_AFTER_CONTEXT_MOOD);
        return true;

      case InterventionState.BARRIER_CHECK_AFTER_CONTEXT_MOOD:
        if (!reply) return false;
        this.record(participantId, 'barrierResponse', text.trim());
        await this.enterState(participantId, InterventionState.END_OF_DAY);
        return true;

      case InterventionState.BARRIER_REASON_NO_CHANCE:
        if (!reply) return false;
        this.record(participantId, 'barrierReasonResponse', text.trim());
        await this.enterState(participantId, InterventionState.END_OF_DAY);
        return true;

      case InterventionState.END_OF_DAY:
        if (!replyMatches(reply, RESTART_REPLIES)) return false;
        await this.startDay(participantId);
        return true;

      default:
        return false;
    }
  }

  // ============ Recovery hooks ============

  isTerminal(record: FlowStateRecord): boolean {
    return record.currentState === InterventionState.COMPLETE;
  }

  responseAddress(record: FlowStateRecord): string | undefined {
    return interventionView.get(record.stateData, 'address');
  }

  /**
   * Resume an interrupted assignment, and arm the state timeout when a
   * waiting state lost its marker.
   */
  async ensureProgress(record: FlowStateRecord, rearmed: readonly string[]): Promise<void> {
    const { participantId, currentState } = record;
    if (currentState === InterventionState.RANDOM_ASSIGNMENT) {
      this.logger.info({ participantId }, 'Resuming interrupted random assignment');
      await this.assignAndDeliver(participantId);
      return;
    }
    if (isWaitingState(currentState) && !rearmed.includes(TIMEOUT_TIMER)) {
      this.logger.info({ participantId, state: currentState }, 'Arming missing state timeout');
      this.armTimeout(participantId, currentState, interventionView.get(record.stateData, 'stateEntry') ?? 0);
    }
  }

  // ============ Transitions ============

  /**
   * Persist the new state, replace the state timeout and send the state's prompt.
   */
  private async enterState(participantId: string, next: InterventionState): Promise<void> {
    this.timers.disarm(participantId, INTERVENTION_FLOW, TIMEOUT_TIMER);
    const saved = this.state.update(participantId, INTERVENTION_FLOW, (draft) => {
      draft.currentState = next;
      const entry = interventionView.get(draft.stateData, 'stateEntry') ?? 0;
      interventionView.set(draft.stateData, 'stateEntry', entry + 1);
    });

    if (isWaitingState(next)) {
      this.armTimeout(participantId, next, interventionView.get(saved.stateData, 'stateEntry') ?? 0);
    }

    await this.sendPrompt(participantId, next);

    // Pass-through states send their message and close the day
    if (next === InterventionState.REINFORCEMENT_FOLLOWUP || next === InterventionState.IGNORED_PATH) {
      await this.enterState(participantId, InterventionState.END_OF_DAY);
    }
  }

  /**
   * Draw (or reuse) the cycle's assignment, persisting it before moving on.
   */
  private async assignAndDeliver(participantId: string): Promise<void> {
    const saved = this.state.update(participantId, INTERVENTION_FLOW, (draft) => {
      if (!interventionView.has(draft.stateData, 'flowAssignment')) {
        const drawn: Assignment = this.random() < 0.5 ? 'IMMEDIATE' : 'REFLECTIVE';
        interventionView.set(draft.stateData, 'flowAssignment', drawn);
      }
      draft.currentState = InterventionState.RANDOM_ASSIGNMENT;
    });
    const assignment = interventionView.get(saved.stateData, 'flowAssignment');
    this.timers.disarm(participantId, INTERVENTION_FLOW, TIMEOUT_TIMER);
    this.logger.info({ participantId, assignment }, 'Intervention assigned');

    await this.enterState(
      participantId,
      assignment === 'IMMEDIATE'
        ? InterventionState.SEND_INTERVENTION_IMMEDIATE
        : InterventionState.SEND_INTERVENTION_REFLECTIVE
    );
  }

  private armTimeout(participantId: string, state: WaitingState, entry: number): void {
    this.timers.arm(
      participantId,
      INTERVENTION_FLOW,
      TIMEOUT_TIMER,
      { delayMs: timeoutFor(state, this.config) },
      { kind: INTERVENTION_TIMEOUT_ACTION, payload: { participantId, state, entry } }
    );
  }

  private async onTimeout(firing: TimerFiring): Promise<void> {
    const parsed = timeoutPayloadSchema.safeParse(firing.payload);
    if (!parsed.success) {
      throw new ValidationError(`malformed timeout payload: ${parsed.error.message}`, 'payload');
    }
    const { participantId, state, entry } = parsed.data;

    const record = this.state.getFlowState(participantId, INTERVENTION_FLOW);
    const current = record?.currentState;
    const currentEntry = record ? interventionView.get(record.stateData, 'stateEntry') ?? 0 : undefined;
    if (current !== state || currentEntry !== entry) {
      this.logger.debug({ participantId, armedFor: state, entry, current, currentEntry }, 'Stale timeout ignored');
      return;
    }

    this.timers.clear(participantId, INTERVENTION_FLOW, TIMEOUT_TIMER);
    this.logger.info({ participantId, state }, 'State timed out');

    switch (state) {
      case InterventionState.FEELING_PROMPT:
        this.record(participantId, 'feelingResponse', 'timed_out');
        await this.assignAndDeliver(participantId);
        return;
      case InterventionState.SEND_INTERVENTION_IMMEDIATE:
      case InterventionState.SEND_INTERVENTION_REFLECTIVE:
        this.record(participantId, 'completionResponse', 'no_reply');
        await this.enterState(participantId, InterventionState.DID_YOU_GET_A_CHANCE);
        return;
      case InterventionState.DID_YOU_GET_A_CHANCE:
        this.record(participantId, 'gotChanceResponse', 'no_reply');
        await this.enterState(participantId, InterventionState.IGNORED_PATH);
        return;
      default:
        await this.enterState(participantId, InterventionState.END_OF_DAY);
    }
  }

  // ============ Helpers ============

  private record(participantId: string, key: ResponseKey, value: string): void {
    this.state.update(participantId, INTERVENTION_FLOW, (draft) => {
      interventionView.set(draft.stateData, key, value);
    });
  }

  private requireRecord(participantId: string): FlowStateRecord {
    const record = this.state.getFlowState(participantId, INTERVENTION_FLOW);
    if (!record) {
      throw new ValidationError(`participant '${participantId}' is not enrolled`, 'participantId');
    }
    return record;
  }

  private async sendPrompt(participantId: string, state: InterventionState): Promise<void> {
    const prompt = STATE_PROMPTS[state];
    if (!prompt) return;

    const record = this.requireRecord(participantId);
    const address = interventionView.get(record.stateData, 'address');
    if (!address) {
      throw new ValidationError(`participant '${participantId}' has no address`, 'address');
    }

    const text = await this.content.generate(participantId, {
      flowType: INTERVENTION_FLOW,
      prompt,
      variables: { habit: interventionView.get(record.stateData, 'habit') ?? '' },
    });

    try {
      if (state === InterventionState.COMMITMENT_PROMPT && this.sender.sendInteractive) {
        await this.sender.sendInteractive(address, text, { buttons: COMMITMENT_BUTTONS });
      } else {
        await this.sender.send(address, text);
      }
    } catch (err) {
      throw new TransientDependencyError(`message sender '${this.sender.getName()}'`, err);
    }
  }
}
