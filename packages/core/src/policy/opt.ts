import { pageOf } from '../mem/address.js';
import type { ReplacementPolicy, VictimContext } from './types.js';

// Belady's optimal replacement. Keeps no state; each decision scans the rest
// of the sequence for every resident page.
export class OptPolicy implements ReplacementPolicy {
  readonly kind = 'OPT' as const;

  onLoad(_frame: number): void {}

  onAccess(_frame: number): void {}

  selectVictim({ sequence, index, memory }: VictimContext): number {
    let victim: number | undefined;
    let farthest = -1;
    // Ascending frame order with a strict comparison: ties go to the lowest frame
    for (const { frame, page } of memory.occupiedFrames()) {
      const nextUse = nextUseOf(page, sequence, index);
      if (nextUse > farthest) {
        farthest = nextUse;
        victim = frame;
      }
    }
    if (victim === undefined) throw new Error('OPT invariant broken: no occupied frame to evict');
    return victim;
  }
}

export function nextUseOf(page: number, sequence: readonly number[], index: number): number {
  for (let i = index + 1; i < sequence.length; i++) {
    if (pageOf(sequence[i]!) === page) return i;
  }
  return Number.POSITIVE_INFINITY;
}
