import type { Message } from '../conversation/types.js';
import type { FatalError, RecoverableError } from './errors.js';
import type { UsageDelta } from './usage.js';

/** Classified result of one request attempt. */
export type Outcome =
  | { kind: 'success'; message: Message; usage: UsageDelta }
  | { kind: 'recoverable'; error: RecoverableError }
  | { kind: 'fatal'; error: FatalError };

export function success(message: Message, usage: UsageDelta): Outcome {
  return { kind: 'success', message, usage };
}

export function recoverable(error: RecoverableError): Outcome {
  return { kind: 'recoverable', error };
}

export function fatal(error: FatalError): Outcome {
  return { kind: 'fatal', error };
}
