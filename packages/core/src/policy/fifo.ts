import type { ReplacementPolicy } from './types.js';

export class FifoPolicy implements ReplacementPolicy {
  readonly kind = 'FIFO' as const;
  private readonly queue: number[] = [];

  onLoad(frame: number): void {
    this.queue.push(frame);
  }

  // Hits never reorder the queue
  onAccess(_frame: number): void {}

  selectVictim(): number {
    const victim = this.queue.shift();
    if (victim === undefined) throw new Error('FIFO invariant broken: no loaded frame to evict');
    return victim;
  }

  order(): readonly number[] {
    return this.queue;
  }
}
