import { IntegrityAuditor } from '../audit/integrity-auditor.js';
import type { Ledger } from '../ledger/ledger.js';
import { logger } from '../observability/logger.js';
import { systemClock } from '../types.js';
import type { Clock } from '../types.js';
import { NO_REPAIRS_NEEDED } from './repair-types.js';
import type { RepairAction, RepairRecord, RepairResult } from './repair-types.js';
import { diffSnapshots, takeSnapshot } from './snapshot.js';
import { getStateMetadata } from './states.js';
import { createTransition } from './transitions.js';
import type { StateTransition } from './transitions.js';

function freezeRecord(record: RepairRecord): RepairRecord {
  for (const action of record.actions) {
    Object.freeze(action.type === 'shared_keys_reset' ? action.keys : action.indices);
    Object.freeze(action);
  }
  Object.freeze(record.actions);
  Object.freeze(record.affectedIndices);
  return Object.freeze(record);
}

/**
 * Moves a TAMPERED ledger back to CLEAN.
 *
 * Repair re-derives self-consistency: it relinks and reseals every block
 * from the earliest bad index forward. It does not recover the content that
 * was there before tampering; a repaired block is internally consistent, not
 * proven unmodified.
 */
export class RepairEngine {
  private readonly auditTrail: RepairRecord[] = [];
  private readonly transitions: StateTransition[] = [];

  constructor(
    private readonly ledger: Ledger,
    private readonly auditor: IntegrityAuditor = new IntegrityAuditor(ledger),
    private readonly clock: Clock = systemClock
  ) {}

  repair(): RepairResult {
    const corruptedKeys = this.auditor.corruptedKeys();
    // Ascending, so the first index is where forward repair starts.
    const affected = this.auditor.detect();

    if (affected.length === 0 && corruptedKeys.length === 0) {
      logger.info('repair_skipped', 'Ledger is clean, no repairs needed');

      return {
        success: true,
        message: NO_REPAIRS_NEEDED,
        repairedIndices: [],
        resetKeys: [],
        record: null,
        before: null,
        after: null,
        changes: [],
      };
    }

    const before = takeSnapshot(this.ledger, this.clock());
    const actions: RepairAction[] = [];
    const messages: string[] = [];

    if (corruptedKeys.length > 0) {
      this.ledger.resetSharedKeys();
      actions.push({ type: 'shared_keys_reset', keys: corruptedKeys });
      messages.push(`Reset corrupted shared keys (${corruptedKeys.join(', ')})`);
    }

    const repairedIndices = affected.length > 0 ? this.resealFrom(affected[0]) : [];
    if (repairedIndices.length > 0) {
      actions.push({ type: 'blocks_resealed', indices: repairedIndices });
      messages.push(`Resealed ${repairedIndices.length} blocks (${repairedIndices.join(', ')})`);
    }

    const record = freezeRecord({
      timestamp: this.clock(),
      reason: 'auto-repair',
      affectedIndices: [...affected],
      actions: actions.map(action =>
        action.type === 'shared_keys_reset'
          ? { type: action.type, keys: [...action.keys] }
          : { type: action.type, indices: [...action.indices] }
      ),
    });
    this.auditTrail.push(record);

    const after = takeSnapshot(this.ledger, this.clock());
    this.recordOutcome();

    logger.info('repair_completed', 'Ledger repaired', {
      affectedIndices: affected,
      repairedIndices,
      resetKeys: corruptedKeys,
    });

    return {
      success: true,
      message: messages.join('; '),
      repairedIndices,
      resetKeys: corruptedKeys,
      record,
      before,
      after,
      changes: diffSnapshots(before, after),
    };
  }

  /**
   * Single left-to-right pass. Each block links to the hash its predecessor
   * holds now, which for every block after `start` is the freshly resealed one.
   */
  private resealFrom(start: number): number[] {
    const chain = this.ledger.getChain();
    const repaired: number[] = [];

    for (let i = Math.max(start, 1); i < chain.length; i++) {
      const block = chain[i];
      block.relink(chain[i - 1].hash);
      block.seal(this.ledger.difficulty);
      repaired.push(i);

      logger.info('block_resealed', 'Block relinked and resealed', {
        index: i,
        hash: block.hash,
      });
    }

    return repaired;
  }

  private recordOutcome(): void {
    const state = this.auditor.getState();

    if (state !== 'CLEAN') {
      logger.warn('repair_incomplete', 'Ledger still inconsistent after repair', {
        remaining: this.auditor.detect(),
        state: getStateMetadata(state).description,
      });
      return;
    }

    const transition = createTransition('TAMPERED', state, this.clock(), 'auto-repair');
    this.transitions.push(transition);

    logger.info('state_transition', `${transition.from} -> ${transition.to}`, {
      reason: transition.reason,
      description: getStateMetadata(transition.to).description,
    });
  }

  getAuditTrail(): readonly RepairRecord[] {
    return [...this.auditTrail];
  }

  getTransitionHistory(): StateTransition[] {
    return [...this.transitions];
  }
}
