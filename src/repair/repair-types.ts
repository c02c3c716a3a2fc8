import type { BlockChange, ChainSnapshot } from './snapshot.js';

export type RepairAction =
  | { readonly type: 'shared_keys_reset'; readonly keys: readonly string[] }
  | { readonly type: 'blocks_resealed'; readonly indices: readonly number[] };

/**
 * Audit-trail entry. Frozen when created.
 */
export interface RepairRecord {
  readonly timestamp: string;
  readonly reason: 'auto-repair';
  /** Indices reported inconsistent before any block was touched. */
  readonly affectedIndices: readonly number[];
  readonly actions: readonly RepairAction[];
}

export interface RepairResult {
  success: boolean;
  message: string;
  repairedIndices: number[];
  resetKeys: string[];
  record: RepairRecord | null;
  before: ChainSnapshot | null;
  after: ChainSnapshot | null;
  changes: BlockChange[];
}

export const NO_REPAIRS_NEEDED = 'no repairs needed';
