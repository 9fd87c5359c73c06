import { describe, it, expect } from 'vitest';
import { ConfigError, createCouncilConfig } from '@conclave/core';
import { applyRunOverrides, parseModelList } from './run-options.js';

const base = createCouncilConfig({
  apiKey: 'test-secret',
  councilModels: ['a', 'b'],
  chairmanModel: 'c',
  timeoutMs: 60_000,
});

describe('parseModelList', () => {
  it('splits, trims and drops empty entries', () => {
    expect(parseModelList(' a/one, b/two ,, ')).toEqual(['a/one', 'b/two']);
  });
});

describe('applyRunOverrides', () => {
  it('keeps the resolved config when nothing is overridden', () => {
    expect(applyRunOverrides(base, {})).toEqual(base);
  });

  it('replaces council, chairman and timeout', () => {
    expect(applyRunOverrides(base, { council: 'x,y,z', chairman: 'x', timeout: '5000' })).toEqual({
      ...base,
      councilModels: ['x', 'y', 'z'],
      chairmanModel: 'x',
      timeoutMs: 5000,
    });
  });

  it('re-validates the overridden values', () => {
    expect(() => applyRunOverrides(base, { timeout: 'soon' })).toThrow(ConfigError);
    expect(() => applyRunOverrides(base, { timeout: '3000000000' })).toThrow(ConfigError);
    expect(() => applyRunOverrides(base, { council: 'x,x' })).toThrow(ConfigError);
  });
});
