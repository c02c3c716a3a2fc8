export { Block } from './block/block.js';
export { computeBlockHash, meetsDifficulty } from './block/block-hasher.js';
export { GENESIS_PREVIOUS_HASH } from './block/block-types.js';
export type { BlockHashInput, BlockRecord } from './block/block-types.js';

export { canonicalStringify, hashValue, sha256Hex } from './hashing/hasher.js';

export { computeEntriesRoot, computeLeafHashes, getMerkleRoot, hashPair } from './merkle/merkle-builder.js';
export { generateMerkleProof } from './merkle/merkle-proof.js';
export { verifyMerkleProof } from './merkle/merkle-validator.js';
export { MerkleTreeError } from './merkle/merkle-types.js';
export type { EntryInclusionProof, MerkleProofStep, MerkleVerificationResult } from './merkle/merkle-types.js';

export { Ledger } from './ledger/ledger.js';
export type { LedgerOptions, LocatedEntry } from './ledger/ledger.js';
export { GENESIS_PAYLOAD, isBatchPayload, isLedgerEntry, isSealedBatch } from './ledger/ledger-types.js';
export type {
  BatchPayload,
  BlockFault,
  ChainVerificationResult,
  GenesisPayload,
  LedgerEntry,
  SealedBatch,
} from './ledger/ledger-types.js';
export {
  SHARED_KEY_NAMES,
  canonicalSharedKeys,
  expectedKeyPrefix,
  findCorruptedKeys,
} from './ledger/shared-keys.js';
export type { SharedKeyName, SharedKeys } from './ledger/shared-keys.js';

export { SignedEnvelopeCodec } from './envelope/envelope-codec.js';
export { EnvelopeKeyError } from './envelope/envelope-types.js';
export type { SignedPayload } from './envelope/envelope-types.js';

export { IntegrityAuditor } from './audit/integrity-auditor.js';
export type { AuditFindings, BlockFinding, IntegrityState } from './audit/audit-types.js';

export { RepairEngine } from './repair/repair-engine.js';
export { NO_REPAIRS_NEEDED } from './repair/repair-types.js';
export type { RepairAction, RepairRecord, RepairResult } from './repair/repair-types.js';
export { diffSnapshots, takeSnapshot } from './repair/snapshot.js';
export type { BlockChange, ChainSnapshot } from './repair/snapshot.js';
export { getStateMetadata, canTransition } from './repair/states.js';
export { IllegalStateTransitionError } from './repair/transitions.js';
export type { StateTransition } from './repair/transitions.js';

export { RecordStore, DEFAULT_RECORD_TYPE } from './store/record-store.js';
export type { AutoRepairOutcome, RepairAttempt, StoreRecordOptions, StoredRecord } from './store/record-store.js';

export { LEDGER_DEFAULTS, LedgerConfigError, loadLedgerConfig } from './config/ledger-config.js';
export type { LedgerConfig } from './config/ledger-config.js';
export { logger, generateLedgerId } from './observability/logger.js';
export type { LogContext, LogLevel, LogThreshold } from './observability/logger.js';

export type { Clock, IdGenerator, JsonObject, JsonPrimitive, JsonValue } from './types.js';
