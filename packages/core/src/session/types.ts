import type { Message } from '../conversation/types.js';
import type { ChatServiceError, FatalError } from '../router/errors.js';
import type { UnknownModelPricingError } from '../router/pricing.js';
import type { UsageSummary } from '../router/usage.js';

export type SessionState = 'awaiting-input' | 'dispatching' | 'terminated';

export type TerminationReason = 'quit' | 'end-of-input' | 'fatal';

export interface PromptInfo {
  /** Prompt plus completion tokens used so far. */
  totalTokens: number;
}

/** Supplies one user turn at a time. */
export interface TurnSource {
  /** Resolves to the entered text, or `null` once input has ended. */
  next(prompt: PromptInfo): Promise<string | null>;
}

/** Receives everything the loop wants shown to the user. */
export interface SessionOutput {
  reply(message: Message): void;
  failure(error: ChatServiceError): void;
  summary(summary: UsageSummary): void;
  summaryFailure(error: UnknownModelPricingError): void;
}

export interface SessionResult {
  reason: TerminationReason;
  /** Set when `reason` is `fatal`. */
  error?: FatalError;
  /** Absent when the model has no pricing entry. */
  summary?: UsageSummary;
}
