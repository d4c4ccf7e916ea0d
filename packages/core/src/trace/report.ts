import type { Statistics, TranslationResult } from '../system/simulator.js';

// Two decimals, with exact ties (3.125) going to the even digit. A double
// sits exactly halfway between two-decimal values only when it is an odd
// multiple of 1/8; scaling by 8 and 4 is exact, so that test is too.
export function formatPct(x: number): string {
  if (Number.isInteger(x * 8) && !Number.isInteger(x * 4)) {
    const down = x.toFixed(3).slice(0, -1);
    if (Number(down.charAt(down.length - 1)) % 2 === 0) return down;
  }
  return x.toFixed(2);
}

export function formatAccessLine(address: number, res: TranslationResult): string {
  return `${address},${res.byteValue},${res.frame},${res.frameHexDump}`;
}

export function formatSummary(stats: Statistics): string[] {
  return [
    `Page Faults = ${stats.pageFaults}`,
    `Page Fault Rate = ${formatPct(stats.pageFaultRatePct)}%`,
    `TLB Hits = ${stats.tlbHits}`,
    `TLB Misses = ${stats.tlbMisses}`,
    `TLB Hit Rate = ${formatPct(stats.tlbHitRatePct)}%`,
  ];
}
