import { FifoPolicy } from './fifo.js';
import { LruPolicy } from './lru.js';
import { OptPolicy } from './opt.js';
import type { ReplacementAlgorithm, ReplacementPolicy } from './types.js';

export function createPolicy(algorithm: ReplacementAlgorithm): ReplacementPolicy {
  switch (algorithm) {
    case 'FIFO': return new FifoPolicy();
    case 'LRU': return new LruPolicy();
    case 'OPT': return new OptPolicy();
  }
}
