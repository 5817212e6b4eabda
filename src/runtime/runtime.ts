/**
 * Runtime wiring: store, job queue, timer facade, flows, recovery and the
 * dispatcher, started in the order restart safety needs.
 */

import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import { StaticContentGenerator } from '../content/index.js';
import { HabitScheduler } from '../habits/index.js';
import { InterventionFlow } from '../intervention/index.js';
import { Dispatcher, JobQueue } from '../jobs/index.js';
import {
  LoggingMessageSender,
  OutboxSender,
  ResponseRouter,
  type ContentGenerator,
  type MessageSender,
  type RouteResult,
} from '../messaging/index.js';
import { RecoveryCoordinator, type RecoverySummary } from '../recovery/index.js';
import { StateManager, TrackedTimers } from '../state/index.js';
import { HabitDatabase } from '../store/index.js';
import { ActionRegistry, DurableTimer, InMemoryTimer, type Timer } from '../timers/index.js';

export interface RuntimeOptions {
  config: Config;
  logger: Logger;
  /** Transport; defaults to a sender that only logs */
  sender?: MessageSender;
  content?: ContentGenerator;
  /** Source for the intervention's random assignment */
  random?: () => number;
}

export class Runtime {
  readonly db: HabitDatabase;
  readonly queue: JobQueue;
  readonly registry: ActionRegistry;
  readonly timer: Timer;
  readonly state: StateManager;
  readonly timers: TrackedTimers;
  readonly router: ResponseRouter;
  readonly intervention: InterventionFlow;
  readonly habits: HabitScheduler;
  readonly recovery: RecoveryCoordinator;
  readonly dispatcher: Dispatcher;

  private config: Config;
  private logger: Logger;
  private isRunning = false;
  private isClosed = false;

  constructor(options: RuntimeOptions) {
    this.config = options.config;
    this.logger = options.logger;
    const { config, logger } = options;

    const transport = options.sender ?? new LoggingMessageSender(logger);
    const content = options.content ?? new StaticContentGenerator();

    this.db = new HabitDatabase(config.storage.databasePath);
    this.queue = new JobQueue({ db: this.db, logger });
    // Only the durable backend runs a dispatcher to drain the outbox
    const sender =
      config.outbox.enabled && config.timers.backend === 'durable'
        ? new OutboxSender({
            queue: this.queue,
            transport,
            logger,
            maxAttempts: config.outbox.maxAttempts,
            retryBaseMs: config.outbox.retryBaseMs,
          })
        : transport;
    this.registry = new ActionRegistry(logger);
    this.timer =
      config.timers.backend === 'durable'
        ? new DurableTimer({ queue: this.queue, registry: this.registry, logger })
        : new InMemoryTimer({ registry: this.registry, logger });
    this.state = new StateManager({ db: this.db, logger });
    this.timers = new TrackedTimers({ state: this.state, timer: this.timer, logger });
    this.router = new ResponseRouter({ logger, canonicalize: (address) => sender.validateRecipient(address) });

    const shared = { state: this.state, timers: this.timers, registry: this.registry, router: this.router, sender, content, logger };
    this.habits = new HabitScheduler({ ...shared, timer: this.timer, config: config.habits });
    this.intervention = new InterventionFlow({ ...shared, config: config.intervention, random: options.random });

    this.recovery = new RecoveryCoordinator({
      state: this.state,
      timers: this.timers,
      router: this.router,
      flows: [this.habits, this.intervention],
      logger,
      graceMs: config.recovery.graceMs,
    });
    this.dispatcher = new Dispatcher({
      queue: this.queue,
      logger,
      interval: config.timers.pollIntervalMs,
      staleJobThresholdMs: config.timers.staleJobThresholdMs,
    });
  }

  /**
   * Requeue crashed jobs, recover participants, then start dispatching.
   */
  async start(): Promise<RecoverySummary> {
    if (this.isRunning) {
      throw new Error('Runtime already running');
    }
    if (this.isClosed) {
      throw new Error('Runtime is closed');
    }

    this.logger.info({ backend: this.config.timers.backend, database: this.db.getPath() }, 'Starting runtime');

    if (this.config.timers.backend === 'durable') {
      this.dispatcher.recoverStaleJobs();
    }
    const summary = await this.recovery.recoverActive();

    if (this.config.timers.backend === 'durable') {
      this.dispatcher.start();
    }
    this.isRunning = true;
    return summary;
  }

  /**
   * Stop dispatching and close the store. Also releases a runtime that was
   * never started.
   */
  async stop(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.logger.info('Stopping runtime...');
    await this.dispatcher.stop();
    this.timer.stop();
    this.db.close();
    this.isRunning = false;
    this.isClosed = true;
    this.logger.info('Runtime stopped');
  }

  /**
   * Inbound reply from a transport. With the transport's message id, a
   * redelivered message is dropped before it reaches any flow.
   */
  async handleInbound(from: string, text: string, messageId?: string): Promise<RouteResult> {
    if (messageId !== undefined) {
      const participantId = this.router.getRoutes(from)[0]?.participantId ?? null;
      if (!this.db.recordInbound(messageId, participantId)) {
        this.logger.info({ messageId }, 'Duplicate inbound message dropped');
        return { handled: false, duplicate: true };
      }
    }

    const result = await this.router.route(from, text);
    if (messageId !== undefined) {
      this.db.markInboundProcessed(messageId);
    }
    return result;
  }

  get running(): boolean {
    return this.isRunning;
  }
}

/**
 * Stop the runtime on SIGTERM/SIGINT.
 */
export function setupGracefulShutdown(runtime: Runtime, logger: Logger): void {
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Received shutdown signal');
    try {
      await runtime.stop();
      logger.info('Graceful shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}
