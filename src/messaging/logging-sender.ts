import type { Logger } from 'pino';
import { ValidationError } from '../errors/index.js';
import type { InteractiveOptions, MessageSender } from './types.js';

const E164 = /^\+[1-9]\d{6,14}$/;

/**
 * Canonical E.164 form of a phone-number address: separators removed and
 * a leading '+' required.
 */
export function canonicalPhoneNumber(address: string): string {
  const compact = address.trim().replace(/[\s().-]/g, '');
  const withPlus = compact.startsWith('+') ? compact : `+${compact}`;
  if (!E164.test(withPlus)) {
    throw new ValidationError(`'${address}' is not a valid phone number`, 'recipient');
  }
  return withPlus;
}

/**
 * Sender that only logs. Used when no transport is wired in.
 */
export class LoggingMessageSender implements MessageSender {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'logging-sender' });
  }

  validateRecipient(address: string): string {
    return canonicalPhoneNumber(address);
  }

  async send(to: string, text: string): Promise<void> {
    this.logger.info({ to: this.validateRecipient(to), text }, 'Outbound message');
  }

  async sendInteractive(to: string, text: string, options: InteractiveOptions): Promise<void> {
    this.logger.info(
      { to: this.validateRecipient(to), text, buttons: options.buttons.map((b) => b.title) },
      'Outbound interactive message'
    );
  }

  getName(): string {
    return 'log';
  }
}
