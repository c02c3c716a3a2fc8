import { IntegrityAuditor } from '../audit/integrity-auditor.js';
import { SignedEnvelopeCodec } from '../envelope/envelope-codec.js';
import type { SignedPayload } from '../envelope/envelope-types.js';
import { Ledger } from '../ledger/ledger.js';
import type { LedgerOptions } from '../ledger/ledger.js';
import { isLedgerEntry, isSealedBatch } from '../ledger/ledger-types.js';
import type { ChainVerificationResult } from '../ledger/ledger-types.js';
import { logger } from '../observability/logger.js';
import { RepairEngine } from '../repair/repair-engine.js';
import type { RepairRecord } from '../repair/repair-types.js';
import { isJsonObject, systemClock } from '../types.js';
import type { Clock, JsonObject, JsonPrimitive } from '../types.js';

export const DEFAULT_RECORD_TYPE = 'record';

export interface StoreRecordOptions {
  type?: string;
  metadata?: JsonObject;
}

export type StoredRecord = {
  type: string;
  content: SignedPayload;
  metadata: JsonObject;
};

export interface AutoRepairOutcome {
  success: boolean;
  message: string;
  repairedIndices: number[];
}

export interface RepairAttempt extends AutoRepairOutcome {
  timestamp: string;
  record: RepairRecord | null;
}

/**
 * Producer-facing facade: signs content, seals each record into its own
 * block, and runs verify → repair → re-verify on demand.
 */
export class RecordStore {
  readonly ledger: Ledger;
  readonly codec: SignedEnvelopeCodec;
  readonly auditor: IntegrityAuditor;
  readonly repairEngine: RepairEngine;

  private readonly repairHistory: RepairAttempt[] = [];
  private readonly clock: Clock;

  constructor(options: LedgerOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.ledger = new Ledger(options);
    this.codec = new SignedEnvelopeCodec(this.ledger.sharedKeys, this.clock);
    this.auditor = new IntegrityAuditor(this.ledger);
    this.repairEngine = new RepairEngine(this.ledger, this.auditor, this.clock);
  }

  storeRecord(content: JsonObject, options: StoreRecordOptions = {}): string {
    const record: StoredRecord = {
      type: options.type ?? DEFAULT_RECORD_TYPE,
      content: this.codec.sign(content),
      metadata: options.metadata ?? {},
    };

    const entryId = this.ledger.enqueue(record);
    this.ledger.sealPending();

    logger.info('record_stored', 'Signed record sealed into ledger', {
      entryId,
      type: record.type,
    });

    return entryId;
  }

  /**
   * @returns the verified signed content, or null when the entry is unknown
   *   or its signature no longer matches
   */
  retrieveRecord(entryId: string): SignedPayload | null {
    const located = this.ledger.findEntry(entryId);
    if (!located) return null;

    const content = located.entry.payload.content;
    return isJsonObject(content) ? this.codec.verifyAndUnwrap(content) : null;
  }

  /**
   * First record whose content has `field === value`, verified the same way
   * as retrieveRecord.
   */
  findRecord(field: string, value: JsonPrimitive): SignedPayload | null {
    for (const block of this.ledger.getChain()) {
      if (!isSealedBatch(block.payload)) continue;

      for (const entry of block.payload.entries) {
        if (!isLedgerEntry(entry)) continue;
        const content = entry.payload.content;
        if (isJsonObject(content) && content[field] === value) {
          return this.codec.verifyAndUnwrap(content);
        }
      }
    }
    return null;
  }

  verifyIntegrity(): ChainVerificationResult {
    return this.ledger.verify();
  }

  autoRepairIfNeeded(): AutoRepairOutcome {
    const initial = this.ledger.verify();
    if (initial.valid) {
      return { success: true, message: 'No repairs needed', repairedIndices: [] };
    }

    const result = this.repairEngine.repair();
    const after = this.ledger.verify();

    const outcome: AutoRepairOutcome = after.valid
      ? {
          success: true,
          message: `Chain repaired successfully: ${result.message}`,
          repairedIndices: result.repairedIndices,
        }
      : {
          success: false,
          message: `Repair attempted but issues remain: ${after.message}`,
          repairedIndices: result.repairedIndices,
        };

    this.repairHistory.push({
      ...outcome,
      timestamp: this.clock(),
      record: result.record,
    });

    if (!outcome.success) {
      logger.error('repair_failed', 'Ledger still invalid after repair', {
        reason: after.message,
      });
    }

    return outcome;
  }

  getRepairHistory(): RepairAttempt[] {
    return [...this.repairHistory];
  }
}
