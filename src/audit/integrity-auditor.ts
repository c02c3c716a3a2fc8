import { findCorruptedKeys } from '../ledger/shared-keys.js';
import { inspectBlock } from '../ledger/ledger-validator.js';
import { isSealedBatch } from '../ledger/ledger-types.js';
import type { Ledger } from '../ledger/ledger.js';
import { computeEntriesRoot } from '../merkle/merkle-builder.js';
import { logger } from '../observability/logger.js';
import type { AuditFindings, BlockFinding, IntegrityState } from './audit-types.js';

/**
 * Read-only scans of a ledger. Block consistency and key format are separate
 * axes; either one alone makes the ledger TAMPERED.
 */
export class IntegrityAuditor {
  constructor(private readonly ledger: Ledger) {}

  inspectBlocks(): BlockFinding[] {
    const chain = this.ledger.getChain();
    const findings: BlockFinding[] = [];

    for (let i = 1; i < chain.length; i++) {
      const fault = inspectBlock(chain, i);
      if (fault) findings.push({ index: i, fault });
    }

    return findings;
  }

  /**
   * Ascending indices of blocks failing the self-hash or the link check.
   * Genesis is never reported.
   */
  detect(): number[] {
    return this.inspectBlocks().map(finding => finding.index);
  }

  corruptedKeys(): string[] {
    return findCorruptedKeys(this.ledger.sharedKeys, this.ledger.keyPrefix);
  }

  keysCorrupted(): boolean {
    return this.corruptedKeys().length > 0;
  }

  getState(): IntegrityState {
    return this.detect().length === 0 && !this.keysCorrupted() ? 'CLEAN' : 'TAMPERED';
  }

  /**
   * Forward repair restores hash and link consistency but leaves the stored
   * merkle root alone, so a mismatch here marks content that changed after
   * the block was first sealed. Entries are hashed as stored, whatever shape
   * they now have.
   */
  findMerkleMismatches(): number[] {
    const mismatches: number[] = [];

    for (const block of this.ledger.getChain()) {
      if (!isSealedBatch(block.payload) || block.payload.entries.length === 0) continue;

      if (computeEntriesRoot(block.payload.entries) !== block.payload.merkleRoot) {
        mismatches.push(block.index);
      }
    }

    return mismatches;
  }

  audit(): AuditFindings {
    const blockFindings = this.inspectBlocks();
    const corruptedKeys = this.corruptedKeys();
    const tamperedIndices = blockFindings.map(finding => finding.index);
    const state: IntegrityState =
      tamperedIndices.length === 0 && corruptedKeys.length === 0 ? 'CLEAN' : 'TAMPERED';

    if (state === 'TAMPERED') {
      logger.warn('tamper_detected', 'Integrity audit found inconsistencies', {
        tamperedIndices,
        corruptedKeys,
      });
    }

    return {
      state,
      tamperedIndices,
      blockFindings,
      corruptedKeys,
      merkleMismatches: this.findMerkleMismatches(),
      auditedAt: this.ledger.clock(),
    };
  }
}
