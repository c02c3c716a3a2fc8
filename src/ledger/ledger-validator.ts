import type { Block } from '../block/block.js';
import { findCorruptedKeys } from './shared-keys.js';
import type { SharedKeys } from './shared-keys.js';
import type { BlockFault, ChainVerificationResult } from './ledger-types.js';
import { logger } from '../observability/logger.js';
import { systemClock } from '../types.js';
import type { Clock } from '../types.js';

/**
 * Self-hash and link checks for one non-genesis block. The hash check runs
 * first, so a block failing both reports `hash_mismatch`.
 */
export function inspectBlock(chain: readonly Block[], index: number): BlockFault | null {
  const block = chain[index];

  if (!block.isHashValid()) {
    return 'hash_mismatch';
  }

  if (block.previousHash !== chain[index - 1].hash) {
    return 'broken_link';
  }

  return null;
}

function describeFault(index: number, fault: BlockFault): string {
  return fault === 'hash_mismatch'
    ? `Block ${index} hash invalid`
    : `Block ${index} not connected to previous block`;
}

/**
 * Walk blocks 1..N-1 and stop at the first inconsistency, then check the
 * shared key formats. Genesis has no predecessor and is not checked.
 */
export function verifyLedgerChain(
  chain: readonly Block[],
  sharedKeys: SharedKeys,
  keyPrefix: string,
  clock: Clock = systemClock
): ChainVerificationResult {
  for (let i = 1; i < chain.length; i++) {
    const fault = inspectBlock(chain, i);

    if (fault) {
      logger.error('ledger_chain_broken', 'Ledger chain inconsistency detected', {
        index: i,
        fault,
        storedHash: chain[i].hash,
        previousHash: chain[i].previousHash,
      });

      return {
        valid: false,
        message: describeFault(i, fault),
        totalBlocks: chain.length,
        brokenAtIndex: i,
        fault,
        verificationTimestamp: clock(),
      };
    }
  }

  const corrupted = findCorruptedKeys(sharedKeys, keyPrefix);
  if (corrupted.length > 0) {
    logger.error('shared_key_corrupted', 'Shared key failed format check', {
      keys: corrupted,
    });

    return {
      valid: false,
      message: `Shared key ${corrupted[0]} has been tampered with`,
      totalBlocks: chain.length,
      fault: 'shared_key',
      corruptedKey: corrupted[0],
      verificationTimestamp: clock(),
    };
  }

  logger.info('ledger_verification', 'Ledger chain verified successfully', {
    totalBlocks: chain.length,
    headHash: chain[chain.length - 1].hash,
  });

  return {
    valid: true,
    message: 'Ledger verification successful',
    totalBlocks: chain.length,
    verificationTimestamp: clock(),
  };
}
