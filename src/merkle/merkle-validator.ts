import { hashPair } from './merkle-builder.js';
import type { MerkleProofStep, MerkleVerificationResult } from './merkle-types.js';
import { logger } from '../observability/logger.js';

export function verifyMerkleProof(
  leafHash: string,
  proof: MerkleProofStep[],
  expectedRoot: string
): MerkleVerificationResult {
  let currentHash = leafHash;

  for (const step of proof) {
    currentHash = step.position === 'left'
      ? hashPair(step.hash, currentHash)
      : hashPair(currentHash, step.hash);
  }

  if (currentHash !== expectedRoot) {
    logger.warn('merkle_proof_invalid', 'Merkle proof verification failed', {
      leafHash: leafHash.substring(0, 16) + '...',
      expectedRoot: expectedRoot.substring(0, 16) + '...',
      recomputedRoot: currentHash.substring(0, 16) + '...',
    });

    return {
      valid: false,
      recomputedRoot: currentHash,
      reason: 'Recomputed root does not match expected root',
    };
  }

  return {
    valid: true,
    recomputedRoot: currentHash,
  };
}
