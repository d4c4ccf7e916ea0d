import { PAGE_SIZE } from './address.js';

// Source of page contents on a fault. A read may come back shorter than a
// page (or empty); the simulator zero-fills the rest.
export interface BackingStore {
  readPage(page: number): Uint8Array;
}

export class BufferBackingStore implements BackingStore {
  constructor(private readonly data: Uint8Array) {}

  readPage(page: number): Uint8Array {
    const start = (page & 0xff) * PAGE_SIZE;
    if (start >= this.data.length) return new Uint8Array(0);
    return this.data.subarray(start, Math.min(start + PAGE_SIZE, this.data.length));
  }
}

export const emptyBackingStore: BackingStore = {
  readPage: () => new Uint8Array(0),
};

export function padPage(data: Uint8Array): Uint8Array {
  if (data.length === PAGE_SIZE) return data;
  const out = new Uint8Array(PAGE_SIZE);
  out.set(data.subarray(0, PAGE_SIZE));
  return out;
}
