import { decode } from '../mem/address.js';
import { emptyBackingStore, padPage, type BackingStore } from '../mem/backing_store.js';
import { PageTable } from '../mem/page_table.js';
import { PhysicalMemory } from '../mem/physical_memory.js';
import { TranslationCache } from '../mem/tlb.js';
import { createPolicy } from '../policy/index.js';
import type { ReplacementPolicy } from '../policy/types.js';
import { resolveConfig, type RawConfig, type SimulatorConfig } from './config.js';

export interface TranslationResult {
  frame: number;
  byteValue: number;
  frameHexDump: string;
}

export interface Statistics {
  totalAccesses: number;
  pageFaults: number;
  pageFaultRatePct: number;
  tlbHits: number;
  tlbMisses: number;
  tlbHitRatePct: number;
}

export type TranslationEvent =
  | { kind: 'tlb-hit'; index: number; page: number; frame: number }
  | { kind: 'page-hit'; index: number; page: number; frame: number }
  | { kind: 'fault'; index: number; page: number; frame: number; evictedPage?: number };

export interface SimulatorOptions {
  store?: BackingStore;
  onEvent?: (ev: TranslationEvent) => void;
}

function ratePct(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

export class Simulator {
  readonly config: SimulatorConfig;
  readonly tlb = new TranslationCache();
  readonly pageTable = new PageTable();
  readonly memory: PhysicalMemory;
  readonly policy: ReplacementPolicy;

  private readonly store: BackingStore;
  private readonly onEvent: ((ev: TranslationEvent) => void) | undefined;
  private readonly debug = Boolean(process.env.MEMSIM_DEBUG);

  private totalAccesses = 0;
  private pageFaults = 0;
  private tlbHits = 0;
  private tlbMisses = 0;

  constructor(config: RawConfig, opts: SimulatorOptions = {}) {
    this.config = resolveConfig(config);
    this.memory = new PhysicalMemory(this.config.frames);
    this.policy = createPolicy(this.config.algorithm);
    this.store = opts.store ?? emptyBackingStore;
    this.onEvent = opts.onEvent;
  }

  translate(address: number, sequence: readonly number[], index: number): TranslationResult {
    const { page, offset } = decode(address);
    this.totalAccesses++;

    let frame = this.tlb.lookup(page);
    if (frame !== undefined) {
      this.tlbHits++;
      this.policy.onAccess(frame);
      this.onEvent?.({ kind: 'tlb-hit', index, page, frame });
    } else {
      this.tlbMisses++;
      const entry = this.pageTable.lookup(page);
      if (entry.present && entry.frame !== undefined) {
        frame = entry.frame;
        this.policy.onAccess(frame);
        this.onEvent?.({ kind: 'page-hit', index, page, frame });
      } else {
        frame = this.handlePageFault(page, sequence, index);
      }
    }

    // Refreshes the entry on hits too, moving it to the newest TLB slot
    this.tlb.insert(page, frame);

    return {
      frame,
      byteValue: this.memory.readByte(frame, offset),
      frameHexDump: this.memory.dumpHex(frame),
    };
  }

  // Translate a whole reference sequence in order
  run(addresses: readonly number[]): TranslationResult[] {
    return addresses.map((addr, i) => this.translate(addr, addresses, i));
  }

  statistics(): Statistics {
    return {
      totalAccesses: this.totalAccesses,
      pageFaults: this.pageFaults,
      pageFaultRatePct: ratePct(this.pageFaults, this.totalAccesses),
      tlbHits: this.tlbHits,
      tlbMisses: this.tlbMisses,
      tlbHitRatePct: ratePct(this.tlbHits, this.totalAccesses),
    };
  }

  private handlePageFault(page: number, sequence: readonly number[], index: number): number {
    this.pageFaults++;
    // Missing or short store reads are zero-filled, never an error
    const data = padPage(this.store.readPage(page));

    let evictedPage: number | undefined;
    let frame = this.memory.allocate();
    if (frame === undefined) {
      frame = this.policy.selectVictim({ sequence, index, memory: this.memory });
      evictedPage = this.memory.pageInFrame(frame);
      if (evictedPage === undefined) {
        throw new Error(`${this.policy.kind} selected frame ${frame}, which holds no page`);
      }
      this.pageTable.invalidate(evictedPage);
      this.tlb.remove(evictedPage);
      if (this.debug) {
        // eslint-disable-next-line no-console
        console.log(`[evict] ${this.policy.kind} frame=${frame} page=${evictedPage} for page=${page} at #${index}`);
      }
    }

    this.memory.load(frame, page, data);
    this.pageTable.setPresent(page, frame);
    this.policy.onLoad(frame);

    if (this.debug) {
      // eslint-disable-next-line no-console
      console.log(`[fault] page=${page} -> frame=${frame} at #${index}`);
    }
    this.onEvent?.(evictedPage === undefined
      ? { kind: 'fault', index, page, frame }
      : { kind: 'fault', index, page, frame, evictedPage });
    return frame;
  }
}
