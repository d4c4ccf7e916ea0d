import { MAX_FRAMES } from '../mem/address.js';
import { REPLACEMENT_ALGORITHMS, type ReplacementAlgorithm } from '../policy/types.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_FRAMES = MAX_FRAMES;
export const DEFAULT_ALGORITHM: ReplacementAlgorithm = 'FIFO';

export interface SimulatorConfig {
  frames: number;
  algorithm: ReplacementAlgorithm;
}

export interface RawConfig {
  frames?: number | string;
  algorithm?: string;
}

function parseFrames(val: number | string | undefined): number {
  if (val === undefined) return DEFAULT_FRAMES;
  if (typeof val === 'number') return val;
  const s = val.trim();
  if (!/^[+-]?\d+$/.test(s)) return Number.NaN;
  return Number(s);
}

export function isReplacementAlgorithm(name: string): name is ReplacementAlgorithm {
  return REPLACEMENT_ALGORITHMS.some((a) => a === name);
}

export function resolveConfig(raw: RawConfig = {}): SimulatorConfig {
  const frames = parseFrames(raw.frames);
  if (!Number.isInteger(frames) || frames < 1 || frames > MAX_FRAMES) {
    throw new ConfigurationError(`FRAMES must be between 1 and ${MAX_FRAMES}`);
  }
  const algorithm = raw.algorithm ?? DEFAULT_ALGORITHM;
  if (!isReplacementAlgorithm(algorithm)) {
    throw new ConfigurationError('PRA must be FIFO, LRU, or OPT');
  }
  return { frames, algorithm };
}
