import type { Logger } from 'pino';
import type { ActionHandler, TimerFiring } from './types.js';

/**
 * Maps timer action kinds to handlers. Shared by both timer backings so a
 * flow registers its handlers once regardless of persistence.
 */
export class ActionRegistry {
  private handlers = new Map<string, ActionHandler>();
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'timer-actions' });
  }

  register(kind: string, handler: ActionHandler): void {
    if (this.handlers.has(kind)) {
      this.logger.warn({ kind }, 'Replacing existing timer action handler');
    }
    this.handlers.set(kind, handler);
  }

  has(kind: string): boolean {
    return this.handlers.has(kind);
  }

  kinds(): string[] {
    return [...this.handlers.keys()];
  }

  async invoke(firing: TimerFiring): Promise<void> {
    const handler = this.handlers.get(firing.kind);
    if (!handler) {
      throw new Error(`No timer action handler registered for '${firing.kind}'`);
    }
    await handler(firing);
  }
}
