import { FRAME_SIZE, MAX_FRAMES } from './address.js';
import { signExtend8, toHex } from '../utils/bit.js';

export interface OccupiedFrame {
  frame: number;
  page: number;
}

export class PhysicalMemory {
  private readonly frames: Uint8Array[];
  private readonly frameToPage: Array<number | undefined>;
  // Handed out lowest index first
  private readonly freeFrames: number[];

  constructor(readonly frameCount: number) {
    if (!Number.isInteger(frameCount) || frameCount < 1 || frameCount > MAX_FRAMES) {
      throw new RangeError(`frame count must be an integer in 1..${MAX_FRAMES}, got ${frameCount}`);
    }
    this.frames = Array.from({ length: frameCount }, () => new Uint8Array(FRAME_SIZE));
    this.frameToPage = new Array<number | undefined>(frameCount).fill(undefined);
    this.freeFrames = Array.from({ length: frameCount }, (_, i) => i);
  }

  get freeFrameCount(): number {
    return this.freeFrames.length;
  }

  get usedFrameCount(): number {
    return this.frameCount - this.freeFrames.length;
  }

  allocate(): number | undefined {
    return this.freeFrames.shift();
  }

  free(frame: number): void {
    this.checkFrame(frame);
    if (this.freeFrames.includes(frame)) return;
    this.frameToPage[frame] = undefined;
    this.freeFrames.push(frame);
  }

  load(frame: number, page: number, data: Uint8Array): void {
    if (data.length !== FRAME_SIZE) {
      throw new RangeError(`page data must be ${FRAME_SIZE} bytes, got ${data.length}`);
    }
    this.checkFrame(frame);
    if (this.freeFrames.includes(frame)) {
      throw new Error(`frame ${frame} is still in the free pool; allocate it before loading`);
    }
    this.bytes(frame).set(data);
    this.frameToPage[frame] = page;
  }

  pageInFrame(frame: number): number | undefined {
    this.checkFrame(frame);
    return this.frameToPage[frame];
  }

  // Ascending frame index
  occupiedFrames(): OccupiedFrame[] {
    const out: OccupiedFrame[] = [];
    for (let frame = 0; frame < this.frameCount; frame++) {
      const page = this.frameToPage[frame];
      if (page !== undefined) out.push({ frame, page });
    }
    return out;
  }

  readByte(frame: number, offset: number): number {
    return signExtend8(this.bytes(frame)[offset & 0xff]!);
  }

  dumpHex(frame: number): string {
    return toHex(this.bytes(frame));
  }

  bytes(frame: number): Uint8Array {
    this.checkFrame(frame);
    return this.frames[frame]!;
  }

  private checkFrame(frame: number): void {
    if (!Number.isInteger(frame) || frame < 0 || frame >= this.frameCount) {
      throw new RangeError(`frame ${frame} out of range 0..${this.frameCount - 1}`);
    }
  }
}
