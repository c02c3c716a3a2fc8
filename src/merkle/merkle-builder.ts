import { hashValue, sha256Hex } from '../hashing/hasher.js';
import type { JsonValue } from '../types.js';

/**
 * Parent digest: plain concatenation of the two child hex digests.
 */
export function hashPair(left: string, right: string): string {
  return sha256Hex(left + right);
}

export function padLeafLevel(leafHashes: string[]): string[] {
  const level = [...leafHashes];
  if (level.length % 2 === 1) {
    level.push(level[level.length - 1]);
  }
  return level;
}

/**
 * Fold leaf hashes into a single root.
 *
 * 1. If the leaf count is odd, duplicate the last leaf (a single leaf is
 *    therefore hashed with itself)
 * 2. Pair adjacent digests and hash each pair to form the next level
 * 3. Whenever a level has an odd count, the last digest is paired with itself
 * 4. Repeat until one digest remains
 *
 * Precondition: at least one leaf. Callers guarantee this; an empty list is
 * not guarded here.
 */
export function getMerkleRoot(leafHashes: string[]): string {
  let currentLevel = padLeafLevel(leafHashes);

  while (currentLevel.length > 1) {
    const nextLevel: string[] = [];

    for (let i = 0; i < currentLevel.length; i += 2) {
      const left = currentLevel[i];
      const right = i + 1 < currentLevel.length
        ? currentLevel[i + 1]
        : currentLevel[i]; // Duplicate last if odd

      nextLevel.push(hashPair(left, right));
    }

    currentLevel = nextLevel;
  }

  return currentLevel[0];
}

export function computeLeafHashes(entries: readonly JsonValue[]): string[] {
  return entries.map(entry => hashValue(entry));
}

export function computeEntriesRoot(entries: readonly JsonValue[]): string {
  return getMerkleRoot(computeLeafHashes(entries));
}
