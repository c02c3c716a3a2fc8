import crypto from 'crypto';
import { Block } from '../block/block.js';
import { GENESIS_PREVIOUS_HASH } from '../block/block-types.js';
import type { BlockRecord } from '../block/block-types.js';
import { assertValidDifficulty, LEDGER_DEFAULTS } from '../config/ledger-config.js';
import { hashValue } from '../hashing/hasher.js';
import { computeEntriesRoot, computeLeafHashes } from '../merkle/merkle-builder.js';
import { generateMerkleProof } from '../merkle/merkle-proof.js';
import type { EntryInclusionProof } from '../merkle/merkle-types.js';
import { generateLedgerId, logger } from '../observability/logger.js';
import { systemClock } from '../types.js';
import type { Clock, IdGenerator, JsonObject } from '../types.js';
import { GENESIS_PAYLOAD, isLedgerEntry, isSealedBatch } from './ledger-types.js';
import type { BatchPayload, ChainVerificationResult, LedgerEntry } from './ledger-types.js';
import { verifyLedgerChain } from './ledger-validator.js';
import { canonicalSharedKeys, resetToCanonical } from './shared-keys.js';
import type { SharedKeys } from './shared-keys.js';

export interface LedgerOptions {
  difficulty?: number;
  /** Copied at construction; defaults to the canonical set for `keyPrefix`. */
  sharedKeys?: SharedKeys;
  keyPrefix?: string;
  clock?: Clock;
  generateId?: IdGenerator;
  ledgerId?: string;
}

export interface LocatedEntry {
  blockIndex: number;
  position: number;
  entry: LedgerEntry;
}

/**
 * Ordered chain of sealed blocks plus the buffer of entries awaiting the next
 * one.
 *
 * Not safe for interleaved use: sealing, verification and repair all
 * read-then-write `chain` and `pending`. Callers sharing a ledger between
 * producers must serialize access to it.
 *
 * Construction points the shared logger context at this ledger, so the most
 * recently created ledger labels subsequent log lines.
 */
export class Ledger {
  readonly ledgerId: string;
  readonly difficulty: number;
  readonly keyPrefix: string;
  readonly sharedKeys: SharedKeys;
  readonly clock: Clock;

  private readonly chain: Block[] = [];
  private pending: LedgerEntry[] = [];
  private readonly generateId: IdGenerator;

  constructor(options: LedgerOptions = {}) {
    const difficulty = options.difficulty ?? LEDGER_DEFAULTS.DIFFICULTY;
    assertValidDifficulty(difficulty);

    this.difficulty = difficulty;
    this.keyPrefix = options.keyPrefix ?? LEDGER_DEFAULTS.KEY_PREFIX;
    this.sharedKeys = { ...(options.sharedKeys ?? canonicalSharedKeys(this.keyPrefix)) };
    this.clock = options.clock ?? systemClock;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
    this.ledgerId = options.ledgerId ?? generateLedgerId();

    logger.setContext({ ledgerId: this.ledgerId, difficulty: this.difficulty });
    this.createGenesis();
  }

  private createGenesis(): void {
    const genesis = new Block(0, this.clock(), { ...GENESIS_PAYLOAD }, GENESIS_PREVIOUS_HASH);
    genesis.seal(this.difficulty);
    this.chain.push(genesis);

    logger.info('ledger_initialized', 'Genesis block sealed', {
      genesisHash: genesis.hash,
    });
  }

  enqueue(payload: JsonObject): string {
    const entryId = this.generateId();
    this.pending.push({
      entryId,
      enqueuedAt: this.clock(),
      payload: structuredClone(payload),
    });
    return entryId;
  }

  /**
   * Seal every pending entry into one new block.
   *
   * @returns the appended block, or null when nothing was pending
   */
  sealPending(): Block | null {
    if (this.pending.length === 0) {
      return null;
    }

    const entries = this.pending;
    const batch: BatchPayload = {
      entries,
      merkleRoot: computeEntriesRoot(entries),
    };

    const latest = this.getLatestBlock();
    const block = new Block(latest.index + 1, this.clock(), batch, latest.hash);
    const iterations = block.seal(this.difficulty);

    this.chain.push(block);
    this.pending = [];

    logger.info('block_sealed', 'Pending entries sealed into block', {
      index: block.index,
      entryCount: entries.length,
      merkleRoot: batch.merkleRoot,
      hash: block.hash,
      iterations,
    });

    return block;
  }

  verify(): ChainVerificationResult {
    return verifyLedgerChain(this.chain, this.sharedKeys, this.keyPrefix, this.clock);
  }

  resetSharedKeys(): void {
    resetToCanonical(this.sharedKeys, this.keyPrefix);
    logger.warn('shared_keys_reset', 'Shared keys restored to canonical values');
  }

  getChain(): readonly Block[] {
    return this.chain;
  }

  getBlock(index: number): Block | null {
    return this.chain[index] ?? null;
  }

  getLatestBlock(): Block {
    return this.chain[this.chain.length - 1];
  }

  getLength(): number {
    return this.chain.length;
  }

  getPending(): readonly LedgerEntry[] {
    return this.pending;
  }

  findEntry(entryId: string): LocatedEntry | null {
    for (const block of this.chain) {
      if (!isSealedBatch(block.payload)) continue;

      const entries = block.payload.entries;
      for (let position = 0; position < entries.length; position++) {
        const entry = entries[position];
        if (isLedgerEntry(entry) && entry.entryId === entryId) {
          return { blockIndex: block.index, position, entry };
        }
      }
    }
    return null;
  }

  /**
   * Inclusion proof against the block's stored merkle root. If the entry was
   * altered after sealing the proof will not verify.
   */
  proveEntry(entryId: string): EntryInclusionProof | null {
    const located = this.findEntry(entryId);
    if (!located) return null;

    const block = this.chain[located.blockIndex];
    if (!isSealedBatch(block.payload)) return null;

    const leafHashes = computeLeafHashes(block.payload.entries);
    return {
      entryId,
      blockIndex: located.blockIndex,
      leafHash: hashValue(located.entry),
      proof: generateMerkleProof(leafHashes, located.position),
      root: block.payload.merkleRoot,
    };
  }

  toJSON(): BlockRecord[] {
    return this.chain.map(block => block.toJSON());
  }
}
