import type { FlowStateRecord } from '../store/index.js';

/**
 * What the recovery coordinator needs to know about one flow type.
 */
export interface FlowRecoveryHooks {
  readonly flowType: string;

  /** Terminal records have nothing to resume and are skipped. */
  isTerminal(record: FlowStateRecord): boolean;

  /** Address replies arrive from, for re-registering response routing. */
  responseAddress(record: FlowStateRecord): string | undefined;

  /**
   * Runs after markers were re-armed. Arms anything the current state
   * needs but has no marker for, so no participant is left waiting forever.
   * `rearmed` lists the marker names just re-armed.
   */
  ensureProgress?(record: FlowStateRecord, rearmed: readonly string[]): Promise<void>;
}

export interface RecoverySummary {
  recovered: number;
  skipped: number;
  errored: number;
}
