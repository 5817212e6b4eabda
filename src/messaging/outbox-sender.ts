/**
 * Outbox Sender
 *
 * Wraps a transport so every outgoing message becomes a durable job first.
 * A message accepted by send() survives a restart; delivery failures are
 * retried with exponential backoff until maxAttempts is reached.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import { TransientDependencyError, ValidationError } from '../errors/index.js';
import type { ClaimedJob, JobQueue } from '../jobs/index.js';
import type { JsonObject } from '../utils/json.js';
import { errorMessage } from '../utils/logger.js';
import type { InteractiveOptions, MessageSender } from './types.js';

export const OUTBOX_SEND_JOB = 'outbox.send';

const outboxPayloadSchema = z.object({
  to: z.string().min(1),
  text: z.string(),
  buttons: z.array(z.object({ id: z.string(), title: z.string() })).optional(),
  attempt: z.number().int().positive(),
});

function toPayload(
  to: string,
  text: string,
  buttons: InteractiveOptions['buttons'] | undefined,
  attempt: number
): JsonObject {
  const payload: JsonObject = { to, text, attempt };
  if (buttons) {
    payload.buttons = buttons.map((button) => ({ id: button.id, title: button.title }));
  }
  return payload;
}

export interface OutboxEnqueueOptions {
  buttons?: InteractiveOptions['buttons'];
  /** While a message with this key is queued or sending, enqueueing it again is a no-op */
  dedupeKey?: string;
}

export interface OutboxSenderOptions {
  queue: JobQueue;
  transport: MessageSender;
  logger: Logger;
  /** Delivery attempts before the message is marked failed (default: 5) */
  maxAttempts?: number;
  /** Delay before the first retry; doubles on each attempt (default: 10 seconds) */
  retryBaseMs?: number;
}

export class OutboxSender implements MessageSender {
  private queue: JobQueue;
  private transport: MessageSender;
  private logger: Logger;
  private maxAttempts: number;
  private retryBaseMs: number;

  constructor(options: OutboxSenderOptions) {
    this.queue = options.queue;
    this.transport = options.transport;
    this.logger = options.logger.child({ component: 'outbox' });
    this.maxAttempts = options.maxAttempts ?? 5;
    this.retryBaseMs = options.retryBaseMs ?? 10 * 1000;

    this.queue.registerHandler(OUTBOX_SEND_JOB, (job) => this.deliver(job));
  }

  validateRecipient(address: string): string {
    return this.transport.validateRecipient(address);
  }

  async send(to: string, text: string): Promise<void> {
    this.enqueue(to, text);
  }

  async sendInteractive(to: string, text: string, options: InteractiveOptions): Promise<void> {
    this.enqueue(to, text, { buttons: options.buttons });
  }

  getName(): string {
    return `outbox:${this.transport.getName()}`;
  }

  /**
   * Queue a message for delivery and return its job id. With a dedupe key
   * held by a queued or sending message, that message's id is returned.
   */
  enqueue(to: string, text: string, options: OutboxEnqueueOptions = {}): string {
    const recipient = this.validateRecipient(to);

    if (options.dedupeKey) {
      const existing = this.queue.findActive(options.dedupeKey);
      if (existing) {
        this.logger.debug({ jobId: existing.id, dedupeKey: options.dedupeKey }, 'Message already queued');
        return existing.id;
      }
    }

    const payload = toPayload(recipient, text, options.buttons, 1);
    const id = this.queue.enqueue(OUTBOX_SEND_JOB, Date.now(), payload, options.dedupeKey);
    this.logger.debug({ jobId: id }, 'Message queued');
    return id;
  }

  private async deliver(job: ClaimedJob): Promise<void> {
    const parsed = outboxPayloadSchema.safeParse(job.payload);
    if (!parsed.success) {
      throw new ValidationError(`malformed outbox payload: ${parsed.error.message}`, 'payload');
    }
    const message = parsed.data;

    try {
      if (message.buttons && this.transport.sendInteractive) {
        await this.transport.sendInteractive(message.to, message.text, { buttons: message.buttons });
      } else {
        await this.transport.send(message.to, message.text);
      }
    } catch (err) {
      if (message.attempt >= this.maxAttempts) {
        throw new TransientDependencyError(`message sender '${this.transport.getName()}'`, err);
      }
      const delayMs = this.retryBaseMs * 2 ** (message.attempt - 1);
      const retryId = this.queue.enqueue(
        OUTBOX_SEND_JOB,
        Date.now() + delayMs,
        toPayload(message.to, message.text, message.buttons, message.attempt + 1),
        job.dedupeKey ?? undefined
      );
      this.logger.warn(
        { jobId: job.id, retryId, attempt: message.attempt, delayMs, error: errorMessage(err) },
        'Delivery failed, retrying'
      );
      return;
    }

    this.logger.debug({ jobId: job.id, attempt: message.attempt }, 'Message delivered');
  }
}
