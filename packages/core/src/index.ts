export * from './utils/bit.js';
export * from './mem/address.js';
export * from './mem/tlb.js';
export * from './mem/page_table.js';
export * from './mem/physical_memory.js';
export * from './mem/backing_store.js';
export * from './policy/types.js';
export * from './policy/fifo.js';
export * from './policy/lru.js';
export * from './policy/opt.js';
export * from './policy/index.js';
export * from './system/errors.js';
export * from './system/config.js';
export * from './system/simulator.js';
export * from './system/compare.js';
export * from './trace/reference.js';
export * from './trace/report.js';
