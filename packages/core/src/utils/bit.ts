export function toUint16(x: number): number {
  return x & 0xffff;
}

export function signExtend8(x: number): number {
  x = x & 0xff;
  return (x & 0x80) ? (x | 0xffffff00) : x;
}

// Exact 16-bit mask of an arbitrarily large decimal integer via BigInt
export function maskDecimalU16(text: string): number {
  return Number(BigInt(text) & BigInt(0xffff));
}

export function toHex(bytes: Uint8Array): string {
  let out = '';
  for (let i = 0; i < bytes.length; i++) {
    out += bytes[i]!.toString(16).padStart(2, '0');
  }
  return out;
}
