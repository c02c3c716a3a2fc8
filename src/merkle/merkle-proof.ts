import { hashPair, padLeafLevel } from './merkle-builder.js';
import type { MerkleProofStep } from './merkle-types.js';
import { MerkleTreeError } from './merkle-types.js';

/**
 * Sibling path from one leaf up to the root. Each step says on which side
 * the sibling sits when the pair is re-hashed.
 */
export function generateMerkleProof(
  leafHashes: string[],
  leafIndex: number
): MerkleProofStep[] {
  if (!Number.isInteger(leafIndex) || leafIndex < 0 || leafIndex >= leafHashes.length) {
    throw new MerkleTreeError(`Invalid leaf index: ${leafIndex}`);
  }

  const proof: MerkleProofStep[] = [];
  let currentLevel = padLeafLevel(leafHashes);
  let currentIndex = leafIndex;

  while (currentLevel.length > 1) {
    const nextLevel: string[] = [];

    for (let i = 0; i < currentLevel.length; i += 2) {
      const left = currentLevel[i];
      const right = i + 1 < currentLevel.length
        ? currentLevel[i + 1]
        : currentLevel[i];

      if (currentIndex === i) {
        proof.push({ position: 'right', hash: right });
      } else if (currentIndex === i + 1) {
        proof.push({ position: 'left', hash: left });
      }

      nextLevel.push(hashPair(left, right));
    }

    currentLevel = nextLevel;
    currentIndex = Math.floor(currentIndex / 2);
  }

  return proof;
}
