import type { JsonObject, JsonValue } from '../types.js';
import { isJsonObject } from '../types.js';

/**
 * A producer payload waiting for (or already sealed into) a block.
 */
export type LedgerEntry = {
  entryId: string;
  enqueuedAt: string;
  payload: JsonObject;
};

export type GenesisPayload = {
  message: string;
  source: string;
};

export type BatchPayload = {
  entries: LedgerEntry[];
  merkleRoot: string;
};

export const GENESIS_PAYLOAD: Readonly<GenesisPayload> = {
  message: 'Ledger Genesis Block',
  source: 'hashchain-ledger',
};

export type BlockFault = 'hash_mismatch' | 'broken_link';

export interface ChainVerificationResult {
  valid: boolean;
  message: string;
  totalBlocks: number;
  brokenAtIndex?: number;
  fault?: BlockFault | 'shared_key';
  corruptedKey?: string;
  verificationTimestamp: string;
}

export function isLedgerEntry(value: JsonValue | undefined): value is LedgerEntry {
  return (
    isJsonObject(value) &&
    typeof value.entryId === 'string' &&
    typeof value.enqueuedAt === 'string' &&
    isJsonObject(value.payload)
  );
}

/**
 * Shape of a sealed batch before its entries are checked. Entries altered out
 * of band may no longer look like `LedgerEntry` values.
 */
export type SealedBatch = {
  entries: JsonValue[];
  merkleRoot: string;
};

export function isSealedBatch(payload: JsonObject): payload is SealedBatch {
  return Array.isArray(payload.entries) && typeof payload.merkleRoot === 'string';
}

export function isBatchPayload(payload: JsonObject): payload is BatchPayload {
  return isSealedBatch(payload) && payload.entries.every(isLedgerEntry);
}
