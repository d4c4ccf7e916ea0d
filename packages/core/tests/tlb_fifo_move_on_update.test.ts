import { describe, it, expect } from 'vitest';
import { TranslationCache } from '../src/mem/tlb.js';

describe('TranslationCache', () => {
  it('holds 16 entries; the 17th insert evicts the first page', () => {
    const tlb = new TranslationCache();
    for (let p = 0; p < 17; p++) tlb.insert(p, p + 100);
    expect(tlb.size).toBe(16);
    expect(tlb.lookup(0)).toBeUndefined();
    for (let p = 1; p < 17; p++) expect(tlb.lookup(p)).toBe(p + 100);
  });

  it('lookup does not reorder entries', () => {
    const tlb = new TranslationCache(2);
    tlb.insert(1, 10);
    tlb.insert(2, 20);
    expect(tlb.lookup(1)).toBe(10);
    tlb.insert(3, 30);
    expect(tlb.lookup(1)).toBeUndefined();
    expect(tlb.entries()).toEqual([{ page: 2, frame: 20 }, { page: 3, frame: 30 }]);
  });

  it('re-inserting an existing page moves it to the newest slot with the new frame', () => {
    const tlb = new TranslationCache(3);
    tlb.insert(1, 10);
    tlb.insert(2, 20);
    tlb.insert(3, 30);
    tlb.insert(1, 11);
    expect(tlb.size).toBe(3);
    expect(tlb.entries().map((e) => e.page)).toEqual([2, 3, 1]);
    tlb.insert(4, 40);
    expect(tlb.lookup(2)).toBeUndefined();
    expect(tlb.lookup(1)).toBe(11);
    expect(tlb.entries().map((e) => e.page)).toEqual([3, 1, 4]);
  });

  it('remove invalidates and tolerates absent pages', () => {
    const tlb = new TranslationCache();
    tlb.insert(5, 1);
    tlb.remove(5);
    tlb.remove(99);
    expect(tlb.lookup(5)).toBeUndefined();
    expect(tlb.size).toBe(0);
  });
});
