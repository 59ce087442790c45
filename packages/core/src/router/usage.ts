import { calculateExpense, formatExpense, getModelPricing } from './pricing.js';

export interface UsageDelta {
  promptTokens: number;
  completionTokens: number;
}

export interface UsageSummary {
  model: string;
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
  /** Fixed 6-decimal USD amount, e.g. "0.002500". */
  cost: string;
}

function assertTokenCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Running token totals for one session.
 *
 * Cost is always priced at the rates of the model passed to {@link cost},
 * applied to the cumulative totals, even if earlier turns used another model.
 */
export class UsageTracker {
  private _prompt = 0;
  private _completion = 0;

  get promptTokens(): number {
    return this._prompt;
  }

  get completionTokens(): number {
    return this._completion;
  }

  get totalTokens(): number {
    return this._prompt + this._completion;
  }

  record(delta: UsageDelta): void {
    assertTokenCount('promptTokens', delta.promptTokens);
    assertTokenCount('completionTokens', delta.completionTokens);
    this._prompt += delta.promptTokens;
    this._completion += delta.completionTokens;
  }

  /** @throws UnknownModelPricingError when the model has no pricing entry. */
  cost(model: string): string {
    return formatExpense(calculateExpense(this._prompt, this._completion, getModelPricing(model)));
  }

  summarize(model: string): UsageSummary {
    return {
      model,
      promptTokens: this._prompt,
      completionTokens: this._completion,
      totalTokens: this.totalTokens,
      cost: this.cost(model),
    };
  }
}
