import type { ReplacementPolicy } from './types.js';

// Recency order lives in Map insertion order: the first key is the least
// recently used frame, and a touch deletes and re-inserts at the end.
export class LruPolicy implements ReplacementPolicy {
  readonly kind = 'LRU' as const;
  private readonly recency = new Map<number, true>();

  onLoad(frame: number): void {
    this.touch(frame);
  }

  onAccess(frame: number): void {
    this.touch(frame);
  }

  selectVictim(): number {
    const oldest = this.recency.keys().next();
    if (oldest.done) throw new Error('LRU invariant broken: no loaded frame to evict');
    this.recency.delete(oldest.value);
    return oldest.value;
  }

  // Least recent first
  order(): number[] {
    return [...this.recency.keys()];
  }

  private touch(frame: number): void {
    this.recency.delete(frame);
    this.recency.set(frame, true);
  }
}
