import type { ConversationStore } from '../conversation/store.js';
import type { ChatSettings, RequestDispatcher } from '../router/dispatcher.js';
import type { Outcome } from '../router/outcome.js';
import { UnknownModelPricingError } from '../router/pricing.js';
import type { UsageSummary, UsageTracker } from '../router/usage.js';
import type {
  SessionOutput,
  SessionResult,
  SessionState,
  TerminationReason,
  TurnSource,
} from './types.js';

export const DEFAULT_QUIT_TOKENS: readonly string[] = ['/q'];

/** The part of {@link RequestDispatcher} the loop depends on. */
export type Dispatcher = Pick<RequestDispatcher, 'send'>;

export interface SessionLoopOptions {
  store: ConversationStore;
  usage: UsageTracker;
  dispatcher: Dispatcher;
  input: TurnSource;
  output: SessionOutput;
  /** Read at every turn, so changes to the configuration apply to the next request. */
  settings: () => ChatSettings;
  /** Compared case-insensitively against the trimmed input. */
  quitTokens?: readonly string[];
}

/** What a single turn decided. */
export type TurnResult =
  | { kind: 'continue' }
  | { kind: 'terminate'; reason: TerminationReason; outcome?: Outcome };

/**
 * Top-level control loop: read a turn, dispatch it, apply the outcome.
 *
 * awaiting-input -> dispatching -> awaiting-input (success, recoverable failure)
 *                               -> terminated     (fatal failure)
 * awaiting-input -> terminated (quit token, end of input)
 *
 * The user message is appended before the request goes out and removed again
 * if the request fails, so the ledger only ever holds completed exchanges.
 */
export class SessionLoop {
  private _state: SessionState = 'awaiting-input';
  private summarized = false;
  private readonly quitTokens: Set<string>;

  constructor(private readonly options: SessionLoopOptions) {
    this.quitTokens = new Set((options.quitTokens ?? DEFAULT_QUIT_TOKENS).map(t => t.toLowerCase()));
  }

  get state(): SessionState {
    return this._state;
  }

  async run(): Promise<SessionResult> {
    let result: SessionResult | undefined;
    try {
      while (this._state !== 'terminated') {
        const turn = await this.step();
        if (turn.kind === 'terminate') {
          result = {
            reason: turn.reason,
            error: turn.outcome?.kind === 'fatal' ? turn.outcome.error : undefined,
          };
        }
      }
    } finally {
      this._state = 'terminated';
      const summary = this.finish();
      if (result) result.summary = summary;
    }
    return result ?? { reason: 'end-of-input' };
  }

  /** Run one turn. Only valid while awaiting input. */
  async step(): Promise<TurnResult> {
    if (this._state !== 'awaiting-input') {
      throw new Error(`Cannot start a turn while ${this._state}`);
    }
    const { input, usage } = this.options;

    const raw = await input.next({ totalTokens: usage.totalTokens });
    if (raw === null) {
      return this.terminate('end-of-input');
    }
    const trimmed = raw.trim();
    if (!trimmed) {
      return { kind: 'continue' };
    }
    if (this.quitTokens.has(trimmed.toLowerCase())) {
      return this.terminate('quit');
    }

    return this.dispatch(raw);
  }

  private async dispatch(text: string): Promise<TurnResult> {
    const { store, dispatcher, usage, output, settings } = this.options;

    store.append({ role: 'user', content: text });
    this._state = 'dispatching';

    let outcome: Outcome;
    try {
      outcome = await dispatcher.send(store.snapshot(), settings());
    } catch (error) {
      store.rollbackLast();
      this._state = 'awaiting-input';
      throw error;
    }

    switch (outcome.kind) {
      case 'success':
        try {
          store.append(outcome.message);
        } catch (error) {
          store.rollbackLast();
          this._state = 'awaiting-input';
          throw error;
        }
        usage.record(outcome.usage);
        this._state = 'awaiting-input';
        output.reply(outcome.message);
        return { kind: 'continue' };

      case 'recoverable':
        store.rollbackLast();
        this._state = 'awaiting-input';
        output.failure(outcome.error);
        return { kind: 'continue' };

      case 'fatal':
        store.rollbackLast();
        output.failure(outcome.error);
        return this.terminate('fatal', outcome);
    }
  }

  private terminate(reason: TerminationReason, outcome?: Outcome): TurnResult {
    this._state = 'terminated';
    return { kind: 'terminate', reason, outcome };
  }

  /** Emit the usage summary. Runs once, however the loop ended. */
  private finish(): UsageSummary | undefined {
    if (this.summarized) return undefined;
    this.summarized = true;

    const { usage, output, settings } = this.options;
    const { model } = settings();
    try {
      const summary = usage.summarize(model);
      output.summary(summary);
      return summary;
    } catch (error) {
      if (error instanceof UnknownModelPricingError) {
        output.summaryFailure(error);
        return undefined;
      }
      throw error;
    }
  }
}
