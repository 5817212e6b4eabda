import type { InterventionConfig } from '../config/index.js';

export const INTERVENTION_FLOW = 'micro_health_intervention';

export const InterventionState = {
  ORIENTATION: 'ORIENTATION',
  COMMITMENT_PROMPT: 'COMMITMENT_PROMPT',
  FEELING_PROMPT: 'FEELING_PROMPT',
  RANDOM_ASSIGNMENT: 'RANDOM_ASSIGNMENT',
  SEND_INTERVENTION_IMMEDIATE: 'SEND_INTERVENTION_IMMEDIATE',
  SEND_INTERVENTION_REFLECTIVE: 'SEND_INTERVENTION_REFLECTIVE',
  REINFORCEMENT_FOLLOWUP: 'REINFORCEMENT_FOLLOWUP',
  DID_YOU_GET_A_CHANCE: 'DID_YOU_GET_A_CHANCE',
  CONTEXT_QUESTION: 'CONTEXT_QUESTION',
  MOOD_QUESTION: 'MOOD_QUESTION',
  BARRIER_CHECK_AFTER_CONTEXT_MOOD: 'BARRIER_CHECK_AFTER_CONTEXT_MOOD',
  BARRIER_REASON_NO_CHANCE: 'BARRIER_REASON_NO_CHANCE',
  IGNORED_PATH: 'IGNORED_PATH',
  END_OF_DAY: 'END_OF_DAY',
  COMPLETE: 'COMPLETE',
} as const;

export type InterventionState = (typeof InterventionState)[keyof typeof InterventionState];

export type Assignment = 'IMMEDIATE' | 'REFLECTIVE';

/**
 * States that wait for a reply, each with the config entry holding its timeout.
 */
export const WAITING_STATE_TIMEOUTS = {
  COMMITMENT_PROMPT: 'commitmentTimeoutMs',
  FEELING_PROMPT: 'feelingTimeoutMs',
  SEND_INTERVENTION_IMMEDIATE: 'completionTimeoutMs',
  SEND_INTERVENTION_REFLECTIVE: 'completionTimeoutMs',
  DID_YOU_GET_A_CHANCE: 'questionTimeoutMs',
  CONTEXT_QUESTION: 'questionTimeoutMs',
  MOOD_QUESTION: 'questionTimeoutMs',
  BARRIER_CHECK_AFTER_CONTEXT_MOOD: 'questionTimeoutMs',
  BARRIER_REASON_NO_CHANCE: 'questionTimeoutMs',
} as const satisfies Partial<Record<InterventionState, keyof InterventionConfig>>;

export type WaitingState = keyof typeof WAITING_STATE_TIMEOUTS;

export function isWaitingState(state: string): state is WaitingState {
  return Object.prototype.hasOwnProperty.call(WAITING_STATE_TIMEOUTS, state);
}

export function timeoutFor(state: WaitingState, config: InterventionConfig): number {
  return config[WAITING_STATE_TIMEOUTS[state]];
}

export function isInterventionState(state: string): state is InterventionState {
  return Object.prototype.hasOwnProperty.call(InterventionState, state);
}

/** Prompt catalogue entry sent on entering each state */
export const STATE_PROMPTS: Partial<Record<InterventionState, string>> = {
  ORIENTATION: 'orientation',
  COMMITMENT_PROMPT: 'commitment_prompt',
  FEELING_PROMPT: 'feeling_prompt',
  SEND_INTERVENTION_IMMEDIATE: 'intervention_immediate',
  SEND_INTERVENTION_REFLECTIVE: 'intervention_reflective',
  REINFORCEMENT_FOLLOWUP: 'reinforcement_followup',
  DID_YOU_GET_A_CHANCE: 'did_you_get_a_chance',
  CONTEXT_QUESTION: 'context_question',
  MOOD_QUESTION: 'mood_question',
  BARRIER_CHECK_AFTER_CONTEXT_MOOD: 'barrier_check',
  BARRIER_REASON_NO_CHANCE: 'barrier_reason',
  IGNORED_PATH: 'ignored_path',
  END_OF_DAY: 'end_of_day',
};

// Reply vocabularies, compared after canonicalization
export const COMMIT_YES = ['1', "🚀 let's do it", "let's do it", 'yes'] as const;
export const COMMIT_NO = ['2', '⏳ not yet', 'not yet', 'no'] as const;
export const FEELING_REPLIES = ['1', '2', '3', '4', '5', 'ready'] as const;
export const DONE_REPLIES = ['done', 'did it', 'finished'] as const;
export const NOT_DONE_REPLIES = ['no', 'not done', "didn't"] as const;
export const YES_REPLIES = ['yes', 'y', 'yeah'] as const;
export const NO_REPLIES = ['no', 'n', 'nope'] as const;
export const CONTEXT_REPLIES = ['1', '2', '3', '4'] as const;
export const MOOD_REPLIES = ['1', '2', '3'] as const;
export const RESTART_REPLIES = ['ready', 'start'] as const;
