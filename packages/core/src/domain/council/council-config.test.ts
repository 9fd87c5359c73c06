import { describe, it, expect } from 'vitest';
import {
  createCouncilConfig,
  DEFAULT_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
  OPENROUTER_API_URL,
} from './council-config.js';
import { ConfigError } from '../../shared/errors.js';

describe('createCouncilConfig', () => {
  it('fills in defaults and trims model ids', () => {
    const config = createCouncilConfig({ councilModels: [' a/one ', 'b/two'], chairmanModel: ' c/chair ' });
    expect(config).toEqual({
      apiKey: '',
      apiUrl: OPENROUTER_API_URL,
      councilModels: ['a/one', 'b/two'],
      chairmanModel: 'c/chair',
      timeoutMs: DEFAULT_TIMEOUT_MS,
    });
  });

  it('returns a frozen config', () => {
    const config = createCouncilConfig({ councilModels: ['a'], chairmanModel: 'c' });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.councilModels)).toBe(true);
  });

  it('allows the chairman to sit on the council', () => {
    expect(createCouncilConfig({ councilModels: ['a', 'c'], chairmanModel: 'c' }).chairmanModel).toBe('c');
  });

  const invalid: Array<[string, Parameters<typeof createCouncilConfig>[0]]> = [
    ['an empty council', { councilModels: [], chairmanModel: 'c' }],
    ['a blank model id', { councilModels: ['a', '  '], chairmanModel: 'c' }],
    ['a duplicated model', { councilModels: ['a', 'b', 'a'], chairmanModel: 'c' }],
    ['a blank chairman', { councilModels: ['a'], chairmanModel: ' ' }],
    ['a zero timeout', { councilModels: ['a'], chairmanModel: 'c', timeoutMs: 0 }],
    ['a fractional timeout', { councilModels: ['a'], chairmanModel: 'c', timeoutMs: 1.5 }],
    ['a timeout past the timer limit', { councilModels: ['a'], chairmanModel: 'c', timeoutMs: 2 ** 31 }],
  ];

  it.each(invalid)('rejects %s', (_name, input) => {
    expect(() => createCouncilConfig(input)).toThrow(ConfigError);
  });

  it('accepts the largest timeout a timer can hold', () => {
    expect(createCouncilConfig({ councilModels: ['a'], chairmanModel: 'c', timeoutMs: MAX_TIMEOUT_MS }).timeoutMs).toBe(
      2_147_483_647,
    );
  });

  it('names the limit when the timeout is too large', () => {
    expect(() => createCouncilConfig({ councilModels: ['a'], chairmanModel: 'c', timeoutMs: 3_000_000_000 })).toThrow(
      'Timeout must be at most 2147483647ms, got 3000000000.',
    );
  });

  it('rejects a council larger than the label alphabet', () => {
    const councilModels = Array.from({ length: 27 }, (_, i) => `m${i}`);
    expect(() => createCouncilConfig({ councilModels, chairmanModel: 'c' })).toThrow(
      'Council has 27 models; at most 26 are supported.',
    );
  });
});
