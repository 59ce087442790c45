export interface PricingEntry {
  /** USD per 1000 prompt tokens. */
  promptPer1k: number;
  /** USD per 1000 completion tokens. */
  completionPer1k: number;
}

// Chat completion pricing (USD per 1K tokens)
export const PRICING_TABLE: Readonly<Record<string, PricingEntry>> = Object.freeze({
  'gpt-3.5-turbo':          { promptPer1k: 0.0015, completionPer1k: 0.002 },
  'gpt-3.5-turbo-0613':     { promptPer1k: 0.0015, completionPer1k: 0.002 },
  'gpt-3.5-turbo-16k':      { promptPer1k: 0.003,  completionPer1k: 0.004 },
  'gpt-3.5-turbo-16k-0613': { promptPer1k: 0.003,  completionPer1k: 0.004 },
  'gpt-4':                  { promptPer1k: 0.03,   completionPer1k: 0.06 },
  'gpt-4-0613':             { promptPer1k: 0.03,   completionPer1k: 0.06 },
  'gpt-4-32k':              { promptPer1k: 0.06,   completionPer1k: 0.12 },
  'gpt-4-32k-0613':         { promptPer1k: 0.06,   completionPer1k: 0.12 },
});

export class UnknownModelPricingError extends Error {
  constructor(public readonly model: string) {
    super(`No pricing configured for model "${model}"`);
    this.name = 'UnknownModelPricingError';
  }
}

export function isPricedModel(model: string): boolean {
  return Object.prototype.hasOwnProperty.call(PRICING_TABLE, model);
}

/** There is no fallback rate: an unlisted model throws. */
export function getModelPricing(model: string): PricingEntry {
  if (!isPricedModel(model)) {
    throw new UnknownModelPricingError(model);
  }
  return PRICING_TABLE[model];
}

export function calculateExpense(promptTokens: number, completionTokens: number, pricing: PricingEntry): number {
  return (promptTokens / 1000) * pricing.promptPer1k + (completionTokens / 1000) * pricing.completionPer1k;
}

/** Round to 6 decimals and print in plain decimal notation. */
export function formatExpense(expense: number): string {
  return (Math.round(expense * 1_000_000) / 1_000_000).toFixed(6);
}
