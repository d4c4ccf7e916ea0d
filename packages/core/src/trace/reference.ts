import { maskDecimalU16 } from '../utils/bit.js';

const DECIMAL_LINE = /^[+-]?\d+$/;

// One decimal address per line. Blank and malformed lines are skipped;
// values wrap to 16 bits rather than being rejected.
export function parseReferenceAddresses(text: string): number[] {
  const out: number[] = [];
  for (const raw of text.split(/\r?\n/)) {
    const line = raw.trim();
    if (!line || !DECIMAL_LINE.test(line)) continue;
    out.push(maskDecimalU16(line));
  }
  return out;
}
