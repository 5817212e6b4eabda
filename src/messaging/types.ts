/**
 * Messaging contracts
 *
 * Transports and content generation live outside the engine; flows only
 * see these interfaces.
 */

export interface InteractiveOption {
  id: string;
  title: string;
}

export interface InteractiveOptions {
  buttons: InteractiveOption[];
}

/**
 * Delivers text to a participant address.
 */
export interface MessageSender {
  /**
   * Canonical form of an address.
   * @throws ValidationError if the address is malformed
   */
  validateRecipient(address: string): string;

  send(to: string, text: string): Promise<void>;

  /** Optional richer delivery (reply buttons); flows fall back to send(). */
  sendInteractive?(to: string, text: string, options: InteractiveOptions): Promise<void>;

  /** Transport name for logging */
  getName(): string;
}

export interface ContentContext {
  flowType: string;
  /** Prompt identifier, e.g. 'commitment_prompt' */
  prompt: string;
  variables?: Record<string, string>;
}

/**
 * Produces the text of a message. May call out to a language model.
 */
export interface ContentGenerator {
  generate(participantId: string, context: ContentContext): Promise<string>;
}

/**
 * Flow-specific reply handling, invoked by the response router.
 */
export interface ResponseHandler {
  readonly flowType: string;
  /** Observers see every reply before any flow may consume it; their result is ignored. */
  readonly observer?: boolean;
  /** Returns true when the reply was consumed. */
  handleResponse(participantId: string, text: string): Promise<boolean>;
}
