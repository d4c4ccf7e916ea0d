import type { PhysicalMemory } from '../mem/physical_memory.js';

export type ReplacementAlgorithm = 'FIFO' | 'LRU' | 'OPT';

export const REPLACEMENT_ALGORITHMS: readonly ReplacementAlgorithm[] = ['FIFO', 'LRU', 'OPT'];

export interface VictimContext {
  // Full virtual-address sequence of the run and the index being translated
  sequence: readonly number[];
  index: number;
  memory: PhysicalMemory;
}

export interface ReplacementPolicy {
  readonly kind: ReplacementAlgorithm;
  onLoad(frame: number): void;
  onAccess(frame: number): void;
  selectVictim(ctx: VictimContext): number;
}
