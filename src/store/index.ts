export type { BondStore } from './bond-store';
export { MemoryBondStore } from './memory-store';
