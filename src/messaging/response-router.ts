/**
 * Response Router
 *
 * Maps inbound addresses to the participant and flows they belong to and
 * hands replies to the flow's ResponseHandler. Registrations live in
 * memory only; the recovery coordinator re-registers them at startup.
 */

import type { Logger } from 'pino';
import { errorMessage } from '../utils/logger.js';
import type { ResponseHandler } from './types.js';

export interface RouteRegistration {
  participantId: string;
  flowType: string;
}

export interface RouteResult {
  handled: boolean;
  /** Set when the message id was already received */
  duplicate?: boolean;
  participantId?: string;
  flowType?: string;
}

export interface ResponseRouterOptions {
  logger: Logger;
  /** Canonical address form; defaults to trimming */
  canonicalize?: (address: string) => string;
}

export class ResponseRouter {
  private logger: Logger;
  private canonicalize: (address: string) => string;
  private handlers = new Map<string, ResponseHandler>();
  // canonical address -> registrations in priority order
  private routes = new Map<string, RouteRegistration[]>();

  constructor(options: ResponseRouterOptions) {
    this.logger = options.logger.child({ component: 'response-router' });
    this.canonicalize = options.canonicalize ?? ((address) => address.trim());
  }

  registerHandler(handler: ResponseHandler): void {
    this.handlers.set(handler.flowType, handler);
  }

  /**
   * Route replies from `address` to `participantId` in `flowType`.
   * Registering the same pair again is a no-op.
   */
  register(address: string, participantId: string, flowType: string): void {
    const key = this.canonicalize(address);
    const existing = this.routes.get(key) ?? [];
    if (existing.some((r) => r.participantId === participantId && r.flowType === flowType)) {
      return;
    }
    this.routes.set(key, [...existing, { participantId, flowType }]);
    this.logger.debug({ participantId, flowType }, 'Response route registered');
  }

  /** Remove one flow's route, or every route of the address. */
  unregister(address: string, flowType?: string): void {
    const key = this.canonicalize(address);
    if (flowType === undefined) {
      this.routes.delete(key);
      return;
    }
    const remaining = (this.routes.get(key) ?? []).filter((r) => r.flowType !== flowType);
    if (remaining.length > 0) {
      this.routes.set(key, remaining);
    } else {
      this.routes.delete(key);
    }
  }

  getRoutes(address: string): RouteRegistration[] {
    return [...(this.routes.get(this.canonicalize(address)) ?? [])];
  }

  /**
   * Show the reply to every observing flow, then offer it to the remaining
   * flows in registration order until one consumes it. A failing handler is
   * logged and the next flow is tried.
   */
  async route(from: string, text: string): Promise<RouteResult> {
    const registrations = this.getRoutes(from);
    if (registrations.length === 0) {
      this.logger.debug('Reply from unregistered address');
      return { handled: false };
    }

    const observers: Array<[RouteRegistration, ResponseHandler]> = [];
    const consumers: Array<[RouteRegistration, ResponseHandler]> = [];
    for (const registration of registrations) {
      const handler = this.handlers.get(registration.flowType);
      if (!handler) {
        this.logger.warn({ flowType: registration.flowType }, 'No response handler for flow');
        continue;
      }
      (handler.observer ? observers : consumers).push([registration, handler]);
    }

    for (const [registration, handler] of observers) {
      await this.offer(registration, handler, text);
    }
    for (const [registration, handler] of consumers) {
      if (await this.offer(registration, handler, text)) {
        return { handled: true, ...registration };
      }
    }

    return { handled: false };
  }

  private async offer(registration: RouteRegistration, handler: ResponseHandler, text: string): Promise<boolean> {
    try {
      return await handler.handleResponse(registration.participantId, text);
    } catch (err) {
      this.logger.error(
        { participantId: registration.participantId, flowType: registration.flowType, error: errorMessage(err) },
        'Response handler failed'
      );
      return false;
    }
  }

  get size(): number {
    return this.routes.size;
  }
}
