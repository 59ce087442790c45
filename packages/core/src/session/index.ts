export {
  type SessionState,
  type TerminationReason,
  type PromptInfo,
  type TurnSource,
  type SessionOutput,
  type SessionResult,
} from './types.js';

export {
  type Dispatcher,
  type SessionLoopOptions,
  type TurnResult,
  DEFAULT_QUIT_TOKENS,
  SessionLoop,
} from './loop.js';
