import { hashValue } from '../hashing/hasher.js';
import type { BlockHashInput } from './block-types.js';

export function computeBlockHash(input: BlockHashInput): string {
  return hashValue({
    index: input.index,
    timestamp: input.timestamp,
    payload: input.payload,
    previousHash: input.previousHash,
    nonce: input.nonce,
  });
}

export function meetsDifficulty(hash: string, difficulty: number): boolean {
  return hash.startsWith('0'.repeat(difficulty));
}
