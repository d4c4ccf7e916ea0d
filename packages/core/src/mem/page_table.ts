import { PAGE_COUNT } from './address.js';

export interface PageTableEntry {
  present: boolean;
  frame: number | undefined;
}

export class PageTable {
  private readonly entries: PageTableEntry[];

  constructor() {
    this.entries = Array.from({ length: PAGE_COUNT }, () => ({ present: false, frame: undefined }));
  }

  lookup(page: number): Readonly<PageTableEntry> {
    return this.entry(page);
  }

  setPresent(page: number, frame: number): void {
    const e = this.entry(page);
    e.present = true;
    e.frame = frame;
  }

  // Frame number is left stale; readers must check `present`
  invalidate(page: number): void {
    this.entry(page).present = false;
  }

  residentPages(): number[] {
    const out: number[] = [];
    for (let p = 0; p < this.entries.length; p++) if (this.entries[p]!.present) out.push(p);
    return out;
  }

  private entry(page: number): PageTableEntry {
    const e = this.entries[page & 0xff];
    if (!e) throw new Error(`page ${page} outside page table`);
    return e;
  }
}
