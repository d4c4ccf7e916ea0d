import { describe, it, expect, vi, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { main } from '../src/cli.js';

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'memsim-cli-'));
}

function writeRefs(dir: string, pages: number[]): string {
  const file = path.join(dir, 'addresses.txt');
  fs.writeFileSync(file, pages.map((p) => String(p << 8)).join('\n') + '\n');
  return file;
}

function captureConsole() {
  const out: string[] = [];
  const err: string[] = [];
  vi.spyOn(console, 'log').mockImplementation((...a: unknown[]) => { out.push(a.map(String).join(' ')); });
  vi.spyOn(console, 'error').mockImplementation((...a: unknown[]) => { err.push(a.map(String).join(' ')); });
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  return { out, err };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('memsim main', () => {
  it('reports a bad FRAMES value with exit code 1 and no address lines', () => {
    const { out, err } = captureConsole();
    const refs = writeRefs(tmpDir(), [1, 2]);
    expect(main([refs, '0', 'FIFO'])).toBe(1);
    expect(err).toEqual(['Error: FRAMES must be between 1 and 256']);
    expect(out).toEqual([]);
  });

  it('reports an unknown algorithm and an unreadable reference file', () => {
    const { out, err } = captureConsole();
    const refs = writeRefs(tmpDir(), [1]);
    expect(main([refs, '4', 'CLOCK'])).toBe(1);
    const missing = path.join(tmpDir(), 'missing.txt');
    expect(main([missing, '4', 'LRU'])).toBe(1);
    expect(err).toEqual([
      'Error: PRA must be FIFO, LRU, or OPT',
      `Error: Cannot read reference file ${missing}`,
    ]);
    expect(out).toEqual([]);
  });

  it('runs a reference file and prints lines then the summary', () => {
    const { out } = captureConsole();
    const dir = tmpDir();
    const refs = writeRefs(dir, [1, 2, 1]);
    const store = path.join(dir, 'none.bin');
    expect(main([refs, '1', 'LRU', '--store', store])).toBe(0);
    expect(out).toEqual([
      `256,0,0,${'00'.repeat(256)}`,
      `512,0,0,${'00'.repeat(256)}`,
      `256,0,0,${'00'.repeat(256)}`,
      'Page Faults = 3',
      'Page Fault Rate = 100.00%',
      'TLB Hits = 0',
      'TLB Misses = 3',
      'TLB Hit Rate = 0.00%',
    ]);
  });

  it('dispatches compare and prints JSON', () => {
    const { out } = captureConsole();
    const dir = tmpDir();
    const refs = writeRefs(dir, [1, 2, 3, 4, 1, 2, 5, 1, 2, 3, 4, 5]);
    expect(main(['compare', refs, '--frames', '3,4', '--algorithms', 'FIFO', '--store', path.join(dir, 'none.bin')])).toBe(0);
    expect(out.length).toBe(1);
    const report: unknown = JSON.parse(out[0] ?? '');
    expect(report).toMatchObject({
      command: 'compare',
      rows: [
        { algorithm: 'FIFO', frames: 3, statistics: { pageFaults: 9 } },
        { algorithm: 'FIFO', frames: 4, statistics: { pageFaults: 10 } },
      ],
      beladyAnomalies: [{ algorithm: 'FIFO', fewerFrames: 3, moreFrames: 4 }],
    });
  });

  it('prints usage: exit 1 without arguments, 0 for help', () => {
    const { out, err } = captureConsole();
    expect(main([])).toBe(1);
    expect(main(['help'])).toBe(0);
    expect(out.length).toBe(2);
    expect(out[0]?.startsWith('Usage:')).toBe(true);
    expect(main(['compare'])).toBe(1);
    expect(err).toEqual(['compare requires a reference file path']);
  });
});
