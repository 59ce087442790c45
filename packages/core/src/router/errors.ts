/**
 * Failure kinds for one chat completion attempt.
 *
 * These are carried as values inside an {@link Outcome}; the session loop
 * switches on `recoverable` instead of catching them.
 */

export abstract class ChatServiceError extends Error {
  abstract readonly recoverable: boolean;

  constructor(
    message: string,
    /** HTTP status, when the request reached the service. */
    public readonly status?: number,
    /** Response body as received, for kinds that surface it to the user. */
    public readonly rawBody?: string,
  ) {
    super(message);
    this.name = 'ChatServiceError';
  }
}

// ---------------------------------------------------------------------------
// Recoverable: roll back the user message and re-prompt
// ---------------------------------------------------------------------------

export class TransportError extends ChatServiceError {
  readonly recoverable = true;

  constructor(
    message: string,
    public readonly timedOut: boolean,
    options?: { cause?: unknown },
  ) {
    super(message);
    this.name = 'TransportError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export class RateLimitOrQuotaError extends ChatServiceError {
  readonly recoverable = true;

  constructor(rawBody?: string) {
    super('Rate limit or quota exceeded', 429, rawBody);
    this.name = 'RateLimitOrQuotaError';
  }
}

export class UpstreamOverloadError extends ChatServiceError {
  readonly recoverable = true;

  constructor(status: number, rawBody?: string) {
    super(`Upstream overloaded (HTTP ${status})`, status, rawBody);
    this.name = 'UpstreamOverloadError';
  }
}

// ---------------------------------------------------------------------------
// Fatal: report and end the session
// ---------------------------------------------------------------------------

export class AuthenticationError extends ChatServiceError {
  readonly recoverable = false;

  constructor(rawBody?: string) {
    super('Invalid API key', 401, rawBody);
    this.name = 'AuthenticationError';
  }
}

export interface ContextLengthDetail {
  maxTokens: number;
  sentTokens: number;
  overage: number;
}

export class ContextLengthExceededError extends ChatServiceError {
  readonly recoverable = false;

  constructor(
    public readonly detail: ContextLengthDetail | null,
    rawBody?: string,
  ) {
    super(
      detail
        ? `Maximum context length (${detail.maxTokens}) exceeded by ${detail.overage} tokens`
        : 'Maximum context length exceeded',
      400,
      rawBody,
    );
    this.name = 'ContextLengthExceededError';
  }
}

/** A 400 with a well-formed error object that is not a context-length violation. */
export class InvalidRequestError extends ChatServiceError {
  readonly recoverable = false;

  constructor(
    public readonly code: string | null,
    public readonly serviceMessage: string,
    rawBody: string,
  ) {
    super(`Invalid request: ${serviceMessage}`, 400, rawBody);
    this.name = 'InvalidRequestError';
  }
}

/** A 400 whose body carries no recognizable error object. */
export class MalformedErrorBodyError extends ChatServiceError {
  readonly recoverable = false;

  constructor(rawBody: string) {
    super('Invalid request without error details', 400, rawBody);
    this.name = 'MalformedErrorBodyError';
  }
}

/** A 200 whose body is not a chat completion. */
export class MalformedResponseError extends ChatServiceError {
  readonly recoverable = false;

  constructor(reason: string, rawBody: string) {
    super(`Malformed completion response: ${reason}`, 200, rawBody);
    this.name = 'MalformedResponseError';
  }
}

export class UnknownStatusError extends ChatServiceError {
  readonly recoverable = false;

  constructor(status: number, rawBody: string) {
    super(`Unexpected status code ${status}`, status, rawBody);
    this.name = 'UnknownStatusError';
  }
}

export type RecoverableError = TransportError | RateLimitOrQuotaError | UpstreamOverloadError;

export type FatalError =
  | AuthenticationError
  | ContextLengthExceededError
  | InvalidRequestError
  | MalformedErrorBodyError
  | MalformedResponseError
  | UnknownStatusError;
