import { describe, it, expect } from 'vitest';
import { resolveConfig, isReplacementAlgorithm } from '../src/system/config.js';
import { ConfigurationError, InputUnavailableError, MemSimError } from '../src/system/errors.js';

describe('resolveConfig', () => {
  it('defaults to 256 frames and FIFO', () => {
    expect(resolveConfig()).toEqual({ frames: 256, algorithm: 'FIFO' });
  });

  it('parses decimal frame strings', () => {
    expect(resolveConfig({ frames: '8', algorithm: 'OPT' })).toEqual({ frames: 8, algorithm: 'OPT' });
    expect(resolveConfig({ frames: ' 1 ', algorithm: 'LRU' })).toEqual({ frames: 1, algorithm: 'LRU' });
  });

  it('rejects frame counts outside 1..256', () => {
    for (const frames of [0, 257, -3, 2.5, '0', 'x', '4k', '']) {
      expect(() => resolveConfig({ frames })).toThrow('FRAMES must be between 1 and 256');
    }
  });

  it('rejects unknown algorithms', () => {
    expect(() => resolveConfig({ algorithm: 'CLOCK' })).toThrow('PRA must be FIFO, LRU, or OPT');
    expect(isReplacementAlgorithm('LRU')).toBe(true);
    expect(isReplacementAlgorithm('lru')).toBe(false);
  });

  it('config failures are typed errors with a code', () => {
    try {
      resolveConfig({ frames: 0 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigurationError);
      expect(e).toBeInstanceOf(MemSimError);
      if (e instanceof MemSimError) expect(e.code).toBe('Configuration');
    }
    const err = new InputUnavailableError('missing.txt');
    expect(err.code).toBe('InputUnavailable');
    expect(err.message).toBe('Cannot read reference file missing.txt');
    expect(err.name).toBe('InputUnavailableError');
  });
});
