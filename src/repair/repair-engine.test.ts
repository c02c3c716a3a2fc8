import { describe, it, expect, vi } from 'vitest';
import { IntegrityAuditor } from '../audit/integrity-auditor.js';
import { Ledger } from '../ledger/ledger.js';
import { canonicalSharedKeys } from '../ledger/shared-keys.js';
import { buildLedger, FIXED_TIME, fixedClock, hashesOf, sequentialIds } from '../testing/ledger-fixtures.js';
import { corruptSharedKey, tamperBlock } from '../testing/tamper.js';
import { RepairEngine } from './repair-engine.js';
import { logger } from '../observability/logger.js';
import { canTransition, getStateMetadata } from './states.js';
import { createTransition, IllegalStateTransitionError } from './transitions.js';

const FOUR_BATCHES = [[{ n: 1 }], [{ n: 2 }], [{ n: 3 }], [{ n: 4 }]];

function makeEngine(ledger: Ledger): RepairEngine {
  return new RepairEngine(ledger, new IntegrityAuditor(ledger), fixedClock);
}

describe('RepairEngine on a clean ledger', () => {
  it('reports no repairs and mutates nothing', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    const before = ledger.toJSON();
    const engine = makeEngine(ledger);

    const result = engine.repair();

    expect(result.success).toBe(true);
    expect(result.message).toBe('no repairs needed');
    expect(result.repairedIndices).toEqual([]);
    expect(result.record).toBeNull();
    expect(ledger.toJSON()).toEqual(before);
    expect(engine.getAuditTrail()).toEqual([]);
    expect(engine.getTransitionHistory()).toEqual([]);
  });
});

describe('RepairEngine block repair', () => {
  it('cascades forward from the tampered block', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    tamperBlock(ledger, 2, { n: 20 });
    const before = hashesOf(ledger);

    const result = makeEngine(ledger).repair();
    const after = hashesOf(ledger);

    expect(result.success).toBe(true);
    expect(result.repairedIndices).toEqual([2, 3, 4]);
    expect(result.message).toBe('Resealed 3 blocks (2, 3, 4)');
    expect(ledger.verify().valid).toBe(true);

    expect(after.slice(0, 2)).toEqual(before.slice(0, 2));
    for (const index of [2, 3, 4]) {
      expect(after[index]).not.toBe(before[index]);
    }
  });

  it('reseals every repaired block at the ledger difficulty', () => {
    const ledger = buildLedger(FOUR_BATCHES, { difficulty: 2 });
    tamperBlock(ledger, 1, { n: 10 });

    makeEngine(ledger).repair();

    for (const block of ledger.getChain().slice(1)) {
      expect(block.hash.startsWith('00')).toBe(true);
      expect(block.isHashValid()).toBe(true);
    }
  });

  it('keeps before and after snapshots of the chain', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    tamperBlock(ledger, 3, { n: 30 });
    const tamperedHash = ledger.getChain()[3].hash;

    const result = makeEngine(ledger).repair();

    expect(result.before?.blocks[3].hash).toBe(tamperedHash);
    expect(result.before?.blocks[3].payload).toEqual(ledger.getChain()[3].payload);
    expect(result.after?.blocks).toEqual(ledger.toJSON());
    expect(result.changes.map(change => change.index)).toEqual([3, 4]);
    expect(result.changes[0].hashBefore).toBe(tamperedHash);
    expect(result.changes[0].hashAfter).toBe(ledger.getChain()[3].hash);
  });

  it('appends a frozen record to the audit trail', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    tamperBlock(ledger, 2, { n: 20 });
    const engine = makeEngine(ledger);

    engine.repair();
    const trail = engine.getAuditTrail();

    expect(trail).toEqual([
      {
        timestamp: FIXED_TIME,
        reason: 'auto-repair',
        affectedIndices: [2],
        actions: [{ type: 'blocks_resealed', indices: [2, 3, 4] }],
      },
    ]);
    expect(Object.isFrozen(trail[0])).toBe(true);
    expect(Object.isFrozen(trail[0].affectedIndices)).toBe(true);
    expect(Object.isFrozen(trail[0].actions[0])).toBe(true);
  });

  it('records the TAMPERED to CLEAN transition', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    tamperBlock(ledger, 4, { n: 40 });
    const engine = makeEngine(ledger);

    engine.repair();

    expect(engine.getTransitionHistory()).toEqual([
      { from: 'TAMPERED', to: 'CLEAN', timestamp: FIXED_TIME, reason: 'auto-repair' },
    ]);
  });

  it('is idempotent once repaired', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    tamperBlock(ledger, 2, { n: 20 });
    const engine = makeEngine(ledger);
    engine.repair();
    const repaired = ledger.toJSON();

    expect(engine.repair().message).toBe('no repairs needed');
    expect(ledger.toJSON()).toEqual(repaired);
    expect(engine.getAuditTrail()).toHaveLength(1);
  });
});

describe('RepairEngine key repair', () => {
  it('resets corrupted keys without touching blocks', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    corruptSharedKey(ledger, 'primary');
    const before = hashesOf(ledger);
    const engine = makeEngine(ledger);

    const result = engine.repair();

    expect(result.success).toBe(true);
    expect(result.message).toBe('Reset corrupted shared keys (primary)');
    expect(result.resetKeys).toEqual(['primary']);
    expect(result.repairedIndices).toEqual([]);
    expect(hashesOf(ledger)).toEqual(before);
    expect(ledger.sharedKeys).toEqual(canonicalSharedKeys());
    expect(ledger.verify().valid).toBe(true);
    expect(engine.getAuditTrail()[0].actions).toEqual([{ type: 'shared_keys_reset', keys: ['primary'] }]);
    expect(engine.getAuditTrail()[0].affectedIndices).toEqual([]);
  });

  it('handles key and block corruption in one pass', () => {
    const ledger = buildLedger([[{ n: 1 }], [{ n: 2 }]]);
    corruptSharedKey(ledger, 'primary');
    tamperBlock(ledger, 2, { n: 20 });

    const result = makeEngine(ledger).repair();

    expect(result.message).toBe('Reset corrupted shared keys (primary); Resealed 1 blocks (2)');
    expect(result.before?.sharedKeys.primary).toBe('TAMPERED_KEY');
    expect(result.after?.sharedKeys.primary).toBe('LEDGER_KEY_PRIMARY_12345');
    expect(ledger.verify().valid).toBe(true);
  });
});

describe('slice tamper scenario', () => {
  function sliceLedger(): Ledger {
    return new Ledger({ difficulty: 2, clock: fixedClock, generateId: sequentialIds() });
  }

  it('repairs a tampered batch that is the chain head', () => {
    const ledger = sliceLedger();
    ledger.enqueue({ slice_id: 'e1', priority: 100 });
    ledger.enqueue({ slice_id: 'c1', priority: 50 });
    ledger.sealPending();

    tamperBlock(ledger, 1, { priority: 30 });
    const auditor = new IntegrityAuditor(ledger);
    expect(auditor.detect()).toEqual([1]);

    const result = new RepairEngine(ledger, auditor, fixedClock).repair();
    expect(result.repairedIndices).toEqual([1]);
    expect(ledger.verify()).toMatchObject({ valid: true, message: 'Ledger verification successful' });
  });

  it('cascades when the tampered slice block has a successor', () => {
    const ledger = sliceLedger();
    ledger.enqueue({ slice_id: 'e1', priority: 100 });
    ledger.sealPending();
    ledger.enqueue({ slice_id: 'c1', priority: 50 });
    ledger.sealPending();

    tamperBlock(ledger, 1, { priority: 30 });
    const auditor = new IntegrityAuditor(ledger);
    expect(auditor.detect()).toEqual([1]);

    const result = new RepairEngine(ledger, auditor, fixedClock).repair();
    expect(result.repairedIndices).toEqual([1, 2]);
    expect(ledger.verify()).toMatchObject({ valid: true, message: 'Ledger verification successful' });
    expect(auditor.findMerkleMismatches()).toEqual([1]);
  });
});

describe('integrity state transitions', () => {
  it('only allows TAMPERED to CLEAN', () => {
    expect(canTransition('TAMPERED', 'CLEAN')).toBe(true);
    expect(canTransition('CLEAN', 'TAMPERED')).toBe(false);
    expect(canTransition('CLEAN', 'CLEAN')).toBe(false);
  });

  it('logs the transition with the target state description', () => {
    const ledger = buildLedger(FOUR_BATCHES);
    tamperBlock(ledger, 3, { n: 30 });
    const level = logger.getLevel();
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    logger.setLevel('info');

    try {
      makeEngine(ledger).repair();
    } finally {
      logger.setLevel(level);
    }

    const lines = spy.mock.calls.map(call => JSON.parse(String(call[0])));
    spy.mockRestore();
    const transition = lines.find(line => line.phase === 'state_transition');

    expect(transition).toMatchObject({
      ledgerId: 'test-ledger',
      message: 'TAMPERED -> CLEAN',
      data: {
        reason: 'auto-repair',
        description: getStateMetadata('CLEAN').description,
      },
    });
  });

  it('describes each state and its allowed targets', () => {
    expect(getStateMetadata('TAMPERED')).toEqual({
      state: 'TAMPERED',
      canTransitionTo: ['CLEAN'],
      description: 'At least one inconsistent block or corrupted shared key',
    });
  });

  it('throws on an illegal transition', () => {
    expect(() => createTransition('CLEAN', 'TAMPERED', FIXED_TIME)).toThrow(IllegalStateTransitionError);
  });
});
