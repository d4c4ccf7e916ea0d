import { TLB_CAPACITY } from './address.js';

export interface TLBEntry {
  page: number;
  frame: number;
}

// Page -> frame cache. Map iteration order is insertion order, so the first key
// is always the eviction candidate. Updating an existing page deletes and
// re-inserts it, which moves it to the newest position.
export class TranslationCache {
  private readonly entriesByPage = new Map<number, number>();

  constructor(readonly capacity = TLB_CAPACITY) {}

  get size(): number {
    return this.entriesByPage.size;
  }

  lookup(page: number): number | undefined {
    return this.entriesByPage.get(page);
  }

  insert(page: number, frame: number): void {
    if (this.entriesByPage.has(page)) {
      this.entriesByPage.delete(page);
    } else if (this.entriesByPage.size >= this.capacity) {
      const oldest = this.entriesByPage.keys().next();
      if (!oldest.done) this.entriesByPage.delete(oldest.value);
    }
    this.entriesByPage.set(page, frame);
  }

  remove(page: number): void {
    this.entriesByPage.delete(page);
  }

  // Oldest first
  entries(): TLBEntry[] {
    const out: TLBEntry[] = [];
    for (const [page, frame] of this.entriesByPage) out.push({ page, frame });
    return out;
  }
}
