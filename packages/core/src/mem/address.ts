import { toUint16 } from '../utils/bit.js';

export const PAGE_SIZE = 256;
export const PAGE_COUNT = 256;
export const FRAME_SIZE = PAGE_SIZE;
export const TLB_CAPACITY = 16;
export const MAX_FRAMES = 256;

export interface DecodedAddress {
  page: number;
  offset: number;
}

export function maskAddress(addr: number): number {
  return toUint16(addr);
}

export function decode(addr: number): DecodedAddress {
  const va = maskAddress(addr);
  return { page: (va >>> 8) & 0xff, offset: va & 0xff };
}

export function pageOf(addr: number): number {
  return (maskAddress(addr) >>> 8) & 0xff;
}
