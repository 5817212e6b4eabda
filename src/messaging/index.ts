export type {
  MessageSender,
  ContentGenerator,
  ContentContext,
  ResponseHandler,
  InteractiveOption,
  InteractiveOptions,
} from './types.js';
export { canonicalizeReply, replyMatches } from './canonicalize.js';
export {
  ResponseRouter,
  type ResponseRouterOptions,
  type RouteRegistration,
  type RouteResult,
} from './response-router.js';
export { LoggingMessageSender, canonicalPhoneNumber } from './logging-sender.js';
export {
  OutboxSender,
  OUTBOX_SEND_JOB,
  type OutboxSenderOptions,
  type OutboxEnqueueOptions,
} from './outbox-sender.js';
