import { describe, it, expect } from 'vitest';
import type { RunRecord } from '@conclave/core';
import { formatDuration, formatModelPrice, formatTokens, modelVendor, totalUsage } from './format.js';

describe('formatTokens', () => {
  it('uses k and M suffixes', () => {
    expect(formatTokens(950)).toBe('950 tok');
    expect(formatTokens(1_240)).toBe('1.2k tok');
    expect(formatTokens(2_000_000)).toBe('2.0M tok');
  });
});

describe('formatDuration', () => {
  it('picks a unit by magnitude', () => {
    expect(formatDuration(420)).toBe('420ms');
    expect(formatDuration(12_340)).toBe('12.3s');
    expect(formatDuration(125_000)).toBe('2m 5s');
  });
});

describe('totalUsage', () => {
  it('sums usage across stages and skips calls without it', () => {
    const record: RunRecord = {
      id: 'r',
      createdAt: '2026-05-01T12:00:00.000Z',
      prompt: 'q',
      councilModels: ['a', 'b'],
      chairmanModel: 'c',
      stage1: [
        { model: 'a', response: 'x', usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 } },
        { model: 'b', response: 'y', usage: null },
      ],
      stage2: [
        { model: 'a', ranking: 'r', parsedRanking: [], usage: { promptTokens: 40, completionTokens: 10, totalTokens: 50 } },
      ],
      stage3: { model: 'c', response: 'z', available: true, usage: { promptTokens: 100, completionTokens: 20, totalTokens: 120 } },
    };
    expect(totalUsage(record)).toEqual({ promptTokens: 150, completionTokens: 35, totalTokens: 185 });
  });
});

describe('formatModelPrice', () => {
  it('shows free, sub-dollar and dollar prices per million tokens', () => {
    expect(formatModelPrice({ prompt: 0, completion: 0 })).toBe('free in / free out');
    expect(formatModelPrice({ prompt: 0.15, completion: 0.6 })).toBe('$0.150 in / $0.600 out');
    expect(formatModelPrice({ prompt: 3, completion: 15 })).toBe('$3.00 in / $15.00 out');
  });
});

describe('modelVendor', () => {
  it('takes the segment before the first slash', () => {
    expect(modelVendor('anthropic/claude-3.5-sonnet')).toBe('anthropic');
    expect(modelVendor('meta-llama/llama-3-70b:free')).toBe('meta-llama');
    expect(modelVendor('openrouter-auto')).toBe('-');
  });
});
