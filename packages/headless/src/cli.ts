#!/usr/bin/env node
import path from 'node:path';
import { pathToFileURL } from 'node:url';
import { MemSimError } from '@memsim/core';
import {
  FileBackingStore,
  parseArgs,
  parseNumList,
  resolveStorePath,
  runCompare,
  runSimulation,
  writeMemorySnapshot,
} from './lib.js';

function printUsage() {
  console.log(`Usage:
  memsim <reference-sequence-file.txt> [FRAMES] [PRA] [--store path.bin] [--snapshot path.png|path.ppm]
  memsim compare <reference-sequence-file.txt> [--frames 3,4,8] [--algorithms FIFO,LRU,OPT] [--store path.bin]

  Defaults: FRAMES=256, PRA=FIFO, --store BACKING_STORE.bin (or $MEMSIM_BACKING_STORE)
  Set MEMSIM_DEBUG=1 to trace faults and evictions.

Examples:
  memsim addresses.txt
  memsim addresses.txt 4 LRU --snapshot tmp/frames.png
  memsim compare addresses.txt --frames 3,4
`);
}

function runMemSim(args: string[]): number {
  const { positional, opts } = parseArgs(args);
  const [referencePath, frames, algorithm] = positional;
  if (!referencePath) {
    printUsage();
    return 1;
  }
  const store = new FileBackingStore(resolveStorePath(opts['store']));
  const sim = runSimulation({ referencePath, frames, algorithm, store }, (line) => console.log(line));
  const snapshot = opts['snapshot'];
  if (snapshot) writeMemorySnapshot(sim.memory, snapshot);
  return 0;
}

function runCompareCmd(args: string[]): number {
  const { positional, opts } = parseArgs(args);
  const referencePath = positional[0];
  if (!referencePath) {
    console.error('compare requires a reference file path');
    return 1;
  }
  const frames = parseNumList(opts['frames'], [3, 4]);
  const algorithms = (opts['algorithms'] ?? 'FIFO,LRU,OPT').split(',').map((s) => s.trim()).filter(Boolean);
  const store = new FileBackingStore(resolveStorePath(opts['store']));
  console.log(JSON.stringify(runCompare(referencePath, frames, algorithms, store), null, 2));
  return 0;
}

// Returns the process exit code. Configuration and input errors are reported
// as `Error: <message>`; anything else propagates.
export function main(argv: string[]): number {
  const cmd = argv[0];
  if (!cmd) {
    printUsage();
    return 1;
  }
  if (cmd === 'help' || cmd === '-h' || cmd === '--help') {
    printUsage();
    return 0;
  }
  try {
    if (cmd === 'compare') return runCompareCmd(argv.slice(1));
    return runMemSim(argv);
  } catch (err) {
    if (err instanceof MemSimError) {
      console.error(`Error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(path.resolve(entry)).href) {
  try {
    process.exitCode = main(process.argv.slice(2));
  } catch (err) {
    console.error(err);
    process.exit(1);
  }
}
