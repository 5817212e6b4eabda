/**
 * SQLite persistence for habitloop
 *
 * Tables:
 * - jobs: durable one-off work items with dedupe-keyed supersede
 * - flow_states: one row per (participant, flow type) with an opaque string map
 * - inbound_messages: transport message ids already received
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { nanoid } from 'nanoid';
import { InvariantViolation } from '../errors/index.js';

export type JobStatus = 'pending' | 'running' | 'done' | 'failed' | 'cancelled';

export interface Job {
  id: string;
  kind: string;
  /** Epoch ms (UTC) */
  runAt: number;
  /** Serialized JSON */
  payload: string;
  dedupeKey: string | null;
  status: JobStatus;
  attempt: number;
  lastError: string | null;
  lockedAt: number | null;
  createdAt: number;
  updatedAt: number;
}

export interface NewJob {
  kind: string;
  runAt: number;
  payload: string;
  dedupeKey?: string;
}

export interface EnqueueResult {
  job: Job;
  /** Ids of pending jobs cancelled because they shared the dedupe key */
  superseded: string[];
}

export interface FlowStateRecord {
  participantId: string;
  flowType: string;
  currentState: string;
  stateData: Record<string, string>;
  createdAt: number;
  updatedAt: number;
}

export interface InboundMessage {
  messageId: string;
  participantId: string | null;
  receivedAt: number;
  processedAt: number | null;
}

export interface JobFilter {
  status?: JobStatus;
  kind?: string;
  dedupeKey?: string;
}

/**
 * SQLite database manager
 */
export class HabitDatabase {
  private db: Database.Database;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;

    if (dbPath !== ':memory:') {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);

    // WAL so readers never block the dispatcher's claim transaction
    this.db.pragma('journal_mode = WAL');

    this.initializeSchema();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        run_at INTEGER NOT NULL,
        payload TEXT NOT NULL,
        dedupe_key TEXT,
        status TEXT NOT NULL DEFAULT 'pending',
        attempt INTEGER NOT NULL DEFAULT 0,
        last_error TEXT,
        locked_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_jobs_due ON jobs(status, run_at);
      CREATE INDEX IF NOT EXISTS idx_jobs_dedupe ON jobs(dedupe_key);

      -- At most one pending job per dedupe key
      CREATE UNIQUE INDEX IF NOT EXISTS idx_jobs_dedupe_pending
        ON jobs(dedupe_key) WHERE status = 'pending' AND dedupe_key IS NOT NULL;

      CREATE TABLE IF NOT EXISTS flow_states (
        participant_id TEXT NOT NULL,
        flow_type TEXT NOT NULL,
        current_state TEXT NOT NULL,
        state_data TEXT NOT NULL DEFAULT '{}',
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        PRIMARY KEY (participant_id, flow_type)
      );

      CREATE INDEX IF NOT EXISTS idx_flow_states_flow ON flow_states(flow_type);

      CREATE TABLE IF NOT EXISTS inbound_messages (
        message_id TEXT PRIMARY KEY,
        participant_id TEXT,
        received_at INTEGER NOT NULL,
        processed_at INTEGER
      );
    `);
  }

  // ============ Jobs ============

  /**
   * Insert a job. A pending job holding the same dedupe key is cancelled in
   * the same transaction, so the newest enqueue wins.
   */
  enqueueJob(input: NewJob, now: number = Date.now()): EnqueueResult {
    const findPending = this.db.prepare(`
      SELECT id FROM jobs WHERE dedupe_key = ? AND status = 'pending'
    `);
    const supersede = this.db.prepare(`
      UPDATE jobs SET status = 'cancelled', updated_at = ?
      WHERE dedupe_key = ? AND status = 'pending'
    `);
    const insert = this.db.prepare(`
      INSERT INTO jobs (id, kind, run_at, payload, dedupe_key, status, attempt, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, 'pending', 0, ?, ?)
    `);

    const enqueueTransaction = this.db.transaction((): EnqueueResult => {
      const id = `job_${nanoid()}`;
      const dedupeKey = input.dedupeKey || null;
      let superseded: string[] = [];

      if (dedupeKey) {
        const rows = findPending.all(dedupeKey) as { id: string }[];
        superseded = rows.map((row) => row.id);
        supersede.run(now, dedupeKey);
      }

      try {
        insert.run(id, input.kind, input.runAt, input.payload, dedupeKey, now, now);
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE') {
          throw new InvariantViolation(`second pending job for dedupe key '${dedupeKey}'`, { cause: error });
        }
        throw error;
      }

      return {
        job: {
          id,
          kind: input.kind,
          runAt: input.runAt,
          payload: input.payload,
          dedupeKey,
          status: 'pending',
          attempt: 0,
          lastError: null,
          lockedAt: null,
          createdAt: now,
          updatedAt: now,
        },
        superseded,
      };
    });

    return enqueueTransaction.immediate();
  }

  getJob(id: string): Job | null {
    const row = this.db.prepare('SELECT * FROM jobs WHERE id = ?').get(id) as
      | Record<string, unknown>
      | undefined;
    return row ? this.rowToJob(row) : null;
  }

  listJobs(filter: JobFilter = {}): Job[] {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (filter.status) {
      clauses.push('status = ?');
      params.push(filter.status);
    }
    if (filter.kind) {
      clauses.push('kind = ?');
      params.push(filter.kind);
    }
    if (filter.dedupeKey) {
      clauses.push('dedupe_key = ?');
      params.push(filter.dedupeKey);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = this.db
      .prepare(`SELECT * FROM jobs ${where} ORDER BY run_at ASC, created_at ASC`)
      .all(...params) as Record<string, unknown>[];
    return rows.map((row) => this.rowToJob(row));
  }

  /**
   * Atomically claim due jobs by selecting them AND marking them 'running'.
   * The IMMEDIATE transaction keeps a concurrent claimer from taking the same rows.
   */
  claimDueJobs(now: number = Date.now(), limit = 100): Job[] {
    const selectStmt = this.db.prepare(`
      SELECT * FROM jobs
      WHERE status = 'pending' AND run_at <= ?
      ORDER BY run_at ASC, created_at ASC
      LIMIT ?
    `);
    const updateStmt = this.db.prepare(`
      UPDATE jobs
      SET status = 'running', attempt = attempt + 1, locked_at = ?, updated_at = ?
      WHERE id = ? AND status = 'pending'
    `);

    const claimTransaction = this.db.transaction(() => {
      const rows = selectStmt.all(now, limit) as Record<string, unknown>[];
      const claimed: Job[] = [];

      for (const row of rows) {
        const result = updateStmt.run(now, now, row.id);
        if (result.changes > 0) {
          const job = this.rowToJob(row);
          claimed.push({ ...job, status: 'running', attempt: job.attempt + 1, lockedAt: now, updatedAt: now });
        }
      }

      return claimed;
    });

    return claimTransaction.immediate();
  }

  /** Mark a claimed job done. A job cancelled while running stays cancelled. */
  completeJob(id: string, now: number = Date.now()): boolean {
    const result = this.db
      .prepare(`UPDATE jobs SET status = 'done', updated_at = ? WHERE id = ? AND status = 'running'`)
      .run(now, id);
    return result.changes > 0;
  }

  failJob(id: string, error: string, now: number = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE jobs SET status = 'failed', last_error = ?, updated_at = ? WHERE id = ? AND status = 'running'`
      )
      .run(error, now, id);
    return result.changes > 0;
  }

  /** Cancel a pending or running job. Returns false when nothing changed. */
  cancelJob(id: string, now: number = Date.now()): boolean {
    const result = this.db
      .prepare(
        `UPDATE jobs SET status = 'cancelled', updated_at = ?
         WHERE id = ? AND status IN ('pending', 'running')`
      )
      .run(now, id);
    return result.changes > 0;
  }

  cancelJobsByDedupeKey(dedupeKey: string, now: number = Date.now()): number {
    const result = this.db
      .prepare(
        `UPDATE jobs SET status = 'cancelled', updated_at = ?
         WHERE dedupe_key = ? AND status IN ('pending', 'running')`
      )
      .run(now, dedupeKey);
    return result.changes;
  }

  /** Refresh the lock of jobs this process is still running. */
  touchJobs(ids: readonly string[], now: number = Date.now()): number {
    const touch = this.db.prepare(`UPDATE jobs SET locked_at = ? WHERE id = ? AND status = 'running'`);
    const touchTransaction = this.db.transaction(() =>
      ids.reduce((changed, id) => changed + touch.run(now, id).changes, 0)
    );
    return touchTransaction.immediate();
  }

  /**
   * Return jobs left 'running' by a crashed process to 'pending'. A stale job
   * whose dedupe key was enqueued again since, whatever became of that later
   * job, is cancelled instead.
   */
  requeueStaleJobs(lockedBefore: number, now: number = Date.now()): { requeued: number; cancelled: number } {
    const cancelShadowed = this.db.prepare(`
      UPDATE jobs SET status = 'cancelled', updated_at = ?
      WHERE status = 'running' AND locked_at < ? AND dedupe_key IS NOT NULL
        AND EXISTS (
          SELECT 1 FROM jobs AS newer
          WHERE newer.dedupe_key = jobs.dedupe_key AND newer.rowid > jobs.rowid
        )
    `);
    const requeue = this.db.prepare(`
      UPDATE jobs SET status = 'pending', locked_at = NULL, updated_at = ?
      WHERE status = 'running' AND locked_at < ?
    `);

    const requeueTransaction = this.db.transaction(() => {
      const cancelled = cancelShadowed.run(now, lockedBefore).changes;
      const requeued = requeue.run(now, lockedBefore).changes;
      return { requeued, cancelled };
    });

    return requeueTransaction.immediate();
  }

  // ============ Flow states ============

  getFlowState(participantId: string, flowType: string): FlowStateRecord | null {
    const row = this.db
      .prepare('SELECT * FROM flow_states WHERE participant_id = ? AND flow_type = ?')
      .get(participantId, flowType) as Record<string, unknown> | undefined;
    return row ? this.rowToFlowState(row) : null;
  }

  /** Insert or overwrite the full record. */
  saveFlowState(
    state: Pick<FlowStateRecord, 'participantId' | 'flowType' | 'currentState' | 'stateData'>,
    now: number = Date.now()
  ): FlowStateRecord {
    this.db
      .prepare(
        `INSERT INTO flow_states (participant_id, flow_type, current_state, state_data, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(participant_id, flow_type) DO UPDATE SET
           current_state = excluded.current_state,
           state_data = excluded.state_data,
           updated_at = excluded.updated_at`
      )
      .run(state.participantId, state.flowType, state.currentState, JSON.stringify(state.stateData), now, now);

    const saved = this.getFlowState(state.participantId, state.flowType);
    if (!saved) {
      throw new InvariantViolation(`flow state vanished after write: ${state.participantId}/${state.flowType}`);
    }
    return saved;
  }

  deleteFlowState(participantId: string, flowType?: string): number {
    const result = flowType
      ? this.db
          .prepare('DELETE FROM flow_states WHERE participant_id = ? AND flow_type = ?')
          .run(participantId, flowType)
      : this.db.prepare('DELETE FROM flow_states WHERE participant_id = ?').run(participantId);
    return result.changes;
  }

  listFlowStates(flowType?: string): FlowStateRecord[] {
    const rows = (
      flowType
        ? this.db
            .prepare('SELECT * FROM flow_states WHERE flow_type = ? ORDER BY participant_id')
            .all(flowType)
        : this.db.prepare('SELECT * FROM flow_states ORDER BY participant_id, flow_type').all()
    ) as Record<string, unknown>[];
    return rows.map((row) => this.rowToFlowState(row));
  }

  listParticipantIds(): string[] {
    const rows = this.db
      .prepare('SELECT DISTINCT participant_id FROM flow_states ORDER BY participant_id')
      .all() as { participant_id: string }[];
    return rows.map((row) => row.participant_id);
  }

  // ============ Inbound dedup ============

  /** Record an inbound message id. Returns false when it was already seen. */
  recordInbound(messageId: string, participantId: string | null, now: number = Date.now()): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO inbound_messages (message_id, participant_id, received_at) VALUES (?, ?, ?)`
      )
      .run(messageId, participantId, now);
    return result.changes > 0;
  }

  markInboundProcessed(messageId: string, now: number = Date.now()): boolean {
    const result = this.db
      .prepare('UPDATE inbound_messages SET processed_at = ? WHERE message_id = ?')
      .run(now, messageId);
    return result.changes > 0;
  }

  getInbound(messageId: string): InboundMessage | null {
    const row = this.db.prepare('SELECT * FROM inbound_messages WHERE message_id = ?').get(messageId) as
      | Record<string, unknown>
      | undefined;
    if (!row) return null;
    return {
      messageId: row.message_id as string,
      participantId: (row.participant_id as string | null) ?? null,
      receivedAt: row.received_at as number,
      processedAt: (row.processed_at as number | null) ?? null,
    };
  }

  // ============ Row mappers ============

  private rowToJob(row: Record<string, unknown>): Job {
    return {
      id: row.id as string,
      kind: row.kind as string,
      runAt: row.run_at as number,
      payload: row.payload as string,
      dedupeKey: (row.dedupe_key as string | null) ?? null,
      status: row.status as JobStatus,
      attempt: row.attempt as number,
      lastError: (row.last_error as string | null) ?? null,
      lockedAt: (row.locked_at as number | null) ?? null,
      createdAt: row.created_at as number,
      updatedAt: row.updated_at as number,
    };
  }

  private rowToFlowState(row: Record<string, unknown>): FlowStateRecord {
    return {
      participantId: row.participant_id as string,
      flowType: row.flow_type as string,
      currentState: row.current_state as string,
      stateData: parseStateData(row.state_data as string),
      createdAt: row.created_at as number,
      updatedAt: row.updated_at as number,
    };
  }

  // ============ Utility Methods ============

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    this.db.close();
  }

  getPath(): string {
    return this.dbPath;
  }
}

function parseStateData(raw: string): Record<string, string> {
  const parsed: unknown = JSON.parse(raw || '{}');
  const data: Record<string, string> = {};
  if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string') data[key] = value;
    }
  }
  return data;
}
