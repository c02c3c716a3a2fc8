import { computeBlockHash, meetsDifficulty } from './block-hasher.js';
import type { BlockRecord } from './block-types.js';
import type { JsonObject } from '../types.js';

/**
 * A single unit of the chain.
 *
 * `hash` is stored, not derived: a block is only valid while
 * `hash === computeHash()`, and callers re-check that instead of trusting it.
 * Payload and link fields stay mutable so the repair path (and tamper
 * fixtures) can operate on the block in place.
 */
export class Block {
  readonly index: number;
  readonly timestamp: string;
  payload: JsonObject;
  previousHash: string;
  nonce: number;
  hash: string;

  constructor(
    index: number,
    timestamp: string,
    payload: JsonObject,
    previousHash: string,
    nonce: number = 0
  ) {
    this.index = index;
    this.timestamp = timestamp;
    this.payload = payload;
    this.previousHash = previousHash;
    this.nonce = nonce;
    this.hash = this.computeHash();
  }

  computeHash(): string {
    return computeBlockHash({
      index: this.index,
      timestamp: this.timestamp,
      payload: this.payload,
      previousHash: this.previousHash,
      nonce: this.nonce,
    });
  }

  isHashValid(): boolean {
    return this.hash === this.computeHash();
  }

  /**
   * Proof-of-work search. Expected iterations are 16^difficulty, so keep
   * difficulty small (tests stay at 4 or below).
   *
   * @returns number of nonce increments performed
   */
  seal(difficulty: number): number {
    let iterations = 0;
    while (!meetsDifficulty(this.hash, difficulty)) {
      this.nonce++;
      this.hash = this.computeHash();
      iterations++;
    }
    return iterations;
  }

  /**
   * Points the block at a new predecessor and refreshes its stored hash.
   * Does not reseal.
   */
  relink(previousHash: string): void {
    this.previousHash = previousHash;
    this.hash = this.computeHash();
  }

  toJSON(): BlockRecord {
    return {
      index: this.index,
      timestamp: this.timestamp,
      payload: this.payload,
      previousHash: this.previousHash,
      nonce: this.nonce,
      hash: this.hash,
    };
  }
}
