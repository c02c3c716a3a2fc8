import type { BlockRecord } from '../block/block-types.js';
import type { Ledger } from '../ledger/ledger.js';
import type { SharedKeys } from '../ledger/shared-keys.js';

export interface ChainSnapshot {
  takenAt: string;
  blocks: BlockRecord[];
  sharedKeys: SharedKeys;
}

export interface BlockChange {
  index: number;
  hashBefore: string;
  hashAfter: string;
  previousHashBefore: string;
  previousHashAfter: string;
  nonceBefore: number;
  nonceAfter: number;
}

/**
 * Deep copy of the chain and key state; later mutation of the ledger does
 * not reach it.
 */
export function takeSnapshot(ledger: Ledger, takenAt: string): ChainSnapshot {
  return {
    takenAt,
    blocks: structuredClone(ledger.toJSON()),
    sharedKeys: { ...ledger.sharedKeys },
  };
}

export function diffSnapshots(before: ChainSnapshot, after: ChainSnapshot): BlockChange[] {
  const changes: BlockChange[] = [];

  for (const previous of before.blocks) {
    const current = after.blocks[previous.index];
    if (!current || current.hash === previous.hash) continue;

    changes.push({
      index: previous.index,
      hashBefore: previous.hash,
      hashAfter: current.hash,
      previousHashBefore: previous.previousHash,
      previousHashAfter: current.previousHash,
      nonceBefore: previous.nonce,
      nonceAfter: current.nonce,
    });
  }

  return changes;
}
