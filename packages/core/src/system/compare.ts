import { emptyBackingStore, type BackingStore } from '../mem/backing_store.js';
import { REPLACEMENT_ALGORITHMS, type ReplacementAlgorithm } from '../policy/types.js';
import { Simulator, type Statistics } from './simulator.js';

export interface CompareOptions {
  frames: readonly number[];
  algorithms?: readonly ReplacementAlgorithm[];
  store?: BackingStore;
}

export interface CompareRow {
  algorithm: ReplacementAlgorithm;
  frames: number;
  statistics: Statistics;
}

export interface BeladyAnomaly {
  algorithm: ReplacementAlgorithm;
  fewerFrames: number;
  fewerFramesFaults: number;
  moreFrames: number;
  moreFramesFaults: number;
}

// One fresh simulator per (algorithm, frame count) over the same sequence
export function compareAlgorithms(addresses: readonly number[], opts: CompareOptions): CompareRow[] {
  const algorithms = opts.algorithms ?? REPLACEMENT_ALGORITHMS;
  const store = opts.store ?? emptyBackingStore;
  const rows: CompareRow[] = [];
  for (const algorithm of algorithms) {
    for (const frames of opts.frames) {
      const sim = new Simulator({ frames, algorithm }, { store });
      sim.run(addresses);
      rows.push({ algorithm, frames, statistics: sim.statistics() });
    }
  }
  return rows;
}

// Adjacent frame counts (per algorithm, ascending) where adding frames added faults
export function findBeladyAnomalies(rows: readonly CompareRow[]): BeladyAnomaly[] {
  const byAlgorithm = new Map<ReplacementAlgorithm, CompareRow[]>();
  for (const row of rows) {
    const arr = byAlgorithm.get(row.algorithm) ?? [];
    arr.push(row);
    byAlgorithm.set(row.algorithm, arr);
  }
  const out: BeladyAnomaly[] = [];
  for (const [algorithm, arr] of byAlgorithm) {
    const sorted = [...arr].sort((a, b) => a.frames - b.frames);
    for (let i = 1; i < sorted.length; i++) {
      const lo = sorted[i - 1]!;
      const hi = sorted[i]!;
      if (hi.frames > lo.frames && hi.statistics.pageFaults > lo.statistics.pageFaults) {
        out.push({
          algorithm,
          fewerFrames: lo.frames,
          fewerFramesFaults: lo.statistics.pageFaults,
          moreFrames: hi.frames,
          moreFramesFaults: hi.statistics.pageFaults,
        });
      }
    }
  }
  return out;
}
