import fs from 'node:fs';
import path from 'node:path';
import pngjs from 'pngjs';
import {
  FRAME_SIZE,
  InputUnavailableError,
  PAGE_SIZE,
  Simulator,
  compareAlgorithms,
  findBeladyAnomalies,
  formatAccessLine,
  formatSummary,
  isReplacementAlgorithm,
  parseReferenceAddresses,
  resolveConfig,
  ConfigurationError,
  type BackingStore,
  type CompareRow,
  type BeladyAnomaly,
  type PhysicalMemory,
  type ReplacementAlgorithm,
} from '@memsim/core';

export const DEFAULT_BACKING_STORE = 'BACKING_STORE.bin';

export interface ParsedArgs {
  positional: string[];
  opts: Record<string, string>;
}

// `--key value` pairs (a bare `--flag` becomes '1'); everything else is positional
export function parseArgs(args: string[]): ParsedArgs {
  const positional: string[] = [];
  const opts: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i]!;
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      const val = (next && !next.startsWith('--')) ? args[++i]! : '1';
      opts[key] = val;
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

export function parseNumList(val: string | undefined, def: number[]): number[] {
  if (val === undefined) return def;
  return val.split(',').map((s) => s.trim()).filter(Boolean).map((s) => Number(s));
}

export function resolveStorePath(opt: string | undefined): string {
  return opt ?? process.env.MEMSIM_BACKING_STORE ?? DEFAULT_BACKING_STORE;
}

export function readReferenceFile(file: string): number[] {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf8');
  } catch (e) {
    throw new InputUnavailableError(file, e);
  }
  return parseReferenceAddresses(text);
}

// Reads one page per fault straight from the file. A missing file or a read
// past its end yields a short page, which the simulator zero-fills.
export class FileBackingStore implements BackingStore {
  private warned = false;

  constructor(readonly filePath: string) {}

  readPage(page: number): Uint8Array {
    let fd: number;
    try {
      fd = fs.openSync(this.filePath, 'r');
    } catch (e) {
      this.warnUnavailable(e);
      return new Uint8Array(0);
    }
    try {
      const buf = new Uint8Array(PAGE_SIZE);
      const n = fs.readSync(fd, buf, 0, PAGE_SIZE, (page & 0xff) * PAGE_SIZE);
      return buf.subarray(0, n);
    } catch (e) {
      // EISDIR, EIO and the like: the page reads as zeros
      this.warnUnavailable(e);
      return new Uint8Array(0);
    } finally {
      fs.closeSync(fd);
    }
  }

  private warnUnavailable(e: unknown): void {
    if (this.warned) return;
    this.warned = true;
    const reason = e instanceof Error ? e.message : String(e);
    console.warn(`[memsim] backing store ${this.filePath} unavailable (${reason}); pages read as zeros`);
  }
}

export interface RunOptions {
  referencePath: string;
  frames?: number | string;
  algorithm?: string;
  store: BackingStore;
}

// Validates config and reads the whole reference file before translating anything,
// so fatal errors never leave partial output behind.
export function runSimulation(opts: RunOptions, write: (line: string) => void): Simulator {
  const config = resolveConfig({ frames: opts.frames, algorithm: opts.algorithm });
  const addresses = readReferenceFile(opts.referencePath);
  const sim = new Simulator(config, { store: opts.store });
  for (let i = 0; i < addresses.length; i++) {
    const addr = addresses[i]!;
    write(formatAccessLine(addr, sim.translate(addr, addresses, i)));
  }
  for (const line of formatSummary(sim.statistics())) write(line);
  return sim;
}

export interface CompareReport {
  command: 'compare';
  reference: string;
  rows: CompareRow[];
  beladyAnomalies: BeladyAnomaly[];
}

export function runCompare(referencePath: string, frames: number[], algorithms: string[], store: BackingStore): CompareReport {
  for (const f of frames) resolveConfig({ frames: f });
  const algos: ReplacementAlgorithm[] = [];
  for (const a of algorithms) {
    if (!isReplacementAlgorithm(a)) throw new ConfigurationError('PRA must be FIFO, LRU, or OPT');
    algos.push(a);
  }
  const addresses = readReferenceFile(referencePath);
  const rows = compareAlgorithms(addresses, { frames, algorithms: algos, store });
  return { command: 'compare', reference: referencePath, rows, beladyAnomalies: findBeladyAnomalies(rows) };
}

// One row per frame, one grayscale pixel per byte
export function memoryToRGBA(memory: PhysicalMemory): Uint8Array {
  const out = new Uint8Array(FRAME_SIZE * memory.frameCount * 4);
  for (let f = 0; f < memory.frameCount; f++) {
    const bytes = memory.bytes(f);
    for (let i = 0; i < FRAME_SIZE; i++) {
      const di = (f * FRAME_SIZE + i) * 4;
      const v = bytes[i]!;
      out[di] = v;
      out[di + 1] = v;
      out[di + 2] = v;
      out[di + 3] = 255;
    }
  }
  return out;
}

export function writeMemorySnapshot(memory: PhysicalMemory, filePath: string): void {
  const w = FRAME_SIZE, h = memory.frameCount;
  const rgba = memoryToRGBA(memory);
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  if (filePath.toLowerCase().endsWith('.png')) {
    const png = new pngjs.PNG({ width: w, height: h });
    png.data = Buffer.from(rgba);
    fs.writeFileSync(filePath, pngjs.PNG.sync.write(png));
  } else {
    // PPM (P6)
    const header = Buffer.from(`P6\n${w} ${h}\n255\n`, 'ascii');
    const data = Buffer.alloc(w * h * 3);
    for (let i = 0, di = 0; i < rgba.length; i += 4) {
      data[di++] = rgba[i]!;
      data[di++] = rgba[i + 1]!;
      data[di++] = rgba[i + 2]!;
    }
    fs.writeFileSync(filePath, Buffer.concat([header, data]));
  }
  // stderr keeps stdout to the per-address lines and summary
  console.error(`[snapshot] wrote ${filePath}`);
}
