import { describe, it, expect } from 'vitest';
import { UsageTracker } from './usage.js';
import { UnknownModelPricingError } from './pricing.js';

describe('UsageTracker', () => {
  it('starts at zero', () => {
    const usage = new UsageTracker();
    expect(usage.promptTokens).toBe(0);
    expect(usage.completionTokens).toBe(0);
    expect(usage.totalTokens).toBe(0);
    expect(usage.cost('gpt-4')).toBe('0.000000');
  });

  it('accumulates deltas', () => {
    const usage = new UsageTracker();
    usage.record({ promptTokens: 10, completionTokens: 5 });
    usage.record({ promptTokens: 20, completionTokens: 7 });
    expect(usage.promptTokens).toBe(30);
    expect(usage.completionTokens).toBe(12);
    expect(usage.totalTokens).toBe(42);
  });

  it('computes cost against the given model', () => {
    const usage = new UsageTracker();
    usage.record({ promptTokens: 1000, completionTokens: 500 });
    expect(usage.cost('gpt-3.5-turbo')).toBe('0.002500');
  });

  it('prices cumulative totals at the current model rates', () => {
    const usage = new UsageTracker();
    usage.record({ promptTokens: 1234, completionTokens: 0 });
    usage.record({ promptTokens: 0, completionTokens: 567 });
    // 1.234 * 0.03 + 0.567 * 0.06
    expect(usage.cost('gpt-4')).toBe('0.071040');
    expect(usage.cost('gpt-3.5-turbo-16k')).toBe('0.005970');
  });

  it('cost is repeatable for the same totals', () => {
    const usage = new UsageTracker();
    usage.record({ promptTokens: 333, completionTokens: 777 });
    expect(usage.cost('gpt-4-0613')).toBe(usage.cost('gpt-4-0613'));
  });

  it('throws for an unpriced model', () => {
    const usage = new UsageTracker();
    usage.record({ promptTokens: 1, completionTokens: 1 });
    expect(() => usage.cost('unknown-model')).toThrow(UnknownModelPricingError);
  });

  it('rejects negative or fractional deltas without changing totals', () => {
    const usage = new UsageTracker();
    usage.record({ promptTokens: 5, completionTokens: 5 });
    expect(() => usage.record({ promptTokens: -1, completionTokens: 0 })).toThrow(RangeError);
    expect(() => usage.record({ promptTokens: 0, completionTokens: 1.5 })).toThrow(RangeError);
    expect(usage.totalTokens).toBe(10);
  });

  it('summarize reports totals and cost', () => {
    const usage = new UsageTracker();
    usage.record({ promptTokens: 1000, completionTokens: 500 });
    expect(usage.summarize('gpt-3.5-turbo')).toEqual({
      model: 'gpt-3.5-turbo',
      promptTokens: 1000,
      completionTokens: 500,
      totalTokens: 1500,
      cost: '0.002500',
    });
  });

  it('keeps separate instances independent', () => {
    const a = new UsageTracker();
    const b = new UsageTracker();
    a.record({ promptTokens: 3, completionTokens: 4 });
    expect(b.totalTokens).toBe(0);
  });
});
