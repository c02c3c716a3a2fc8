import { describe, it, expect } from 'vitest';
import { buildLedger, FIXED_TIME } from '../testing/ledger-fixtures.js';
import { breakLink, corruptSharedKey, tamperBlock } from '../testing/tamper.js';
import { isSealedBatch } from '../ledger/ledger-types.js';
import { IntegrityAuditor } from './integrity-auditor.js';

const BATCHES = [[{ priority: 100 }], [{ priority: 50 }], [{ priority: 10 }]];

describe('IntegrityAuditor', () => {
  it('finds nothing on an untouched ledger', () => {
    const auditor = new IntegrityAuditor(buildLedger(BATCHES));

    expect(auditor.detect()).toEqual([]);
    expect(auditor.keysCorrupted()).toBe(false);
    expect(auditor.getState()).toBe('CLEAN');
  });

  it('reports exactly the block whose payload changed', () => {
    const ledger = buildLedger(BATCHES);
    tamperBlock(ledger, 2, { priority: 1 });

    expect(new IntegrityAuditor(ledger).detect()).toEqual([2]);
  });

  it('reports a block failing both checks once', () => {
    const ledger = buildLedger(BATCHES);
    ledger.getChain()[1].previousHash = 'bogus';
    const auditor = new IntegrityAuditor(ledger);

    expect(auditor.detect()).toEqual([1]);
    expect(auditor.inspectBlocks()).toEqual([{ index: 1, fault: 'hash_mismatch' }]);
  });

  it('reports the relinked block and its successor', () => {
    const ledger = buildLedger(BATCHES);
    breakLink(ledger, 1);

    expect(new IntegrityAuditor(ledger).inspectBlocks()).toEqual([
      { index: 1, fault: 'broken_link' },
      { index: 2, fault: 'broken_link' },
    ]);
  });

  it('treats key corruption as a separate axis', () => {
    const ledger = buildLedger(BATCHES);
    corruptSharedKey(ledger, 'secondary');
    const auditor = new IntegrityAuditor(ledger);

    expect(auditor.detect()).toEqual([]);
    expect(auditor.corruptedKeys()).toEqual(['secondary']);
    expect(auditor.getState()).toBe('TAMPERED');
  });

  it('flags batches whose entries no longer match the merkle root', () => {
    const ledger = buildLedger(BATCHES);
    tamperBlock(ledger, 1, { priority: 30 });

    expect(new IntegrityAuditor(ledger).findMerkleMismatches()).toEqual([1]);
  });

  it('flags a batch whose entry was replaced by a non-entry value', () => {
    const ledger = buildLedger([[{ priority: 100 }, { priority: 50 }]]);
    const payload = ledger.getChain()[1].payload;
    if (!isSealedBatch(payload)) throw new Error('expected a batch block');
    payload.entries[0] = { forged: true };
    const auditor = new IntegrityAuditor(ledger);

    expect(auditor.detect()).toEqual([1]);
    expect(auditor.findMerkleMismatches()).toEqual([1]);
  });

  it('collects every finding in one audit', () => {
    const ledger = buildLedger(BATCHES);
    tamperBlock(ledger, 3, { priority: 0 });
    corruptSharedKey(ledger, 'primary');

    const findings = new IntegrityAuditor(ledger).audit();
    expect(findings.state).toBe('TAMPERED');
    expect(findings.tamperedIndices).toEqual([3]);
    expect(findings.blockFindings).toEqual([{ index: 3, fault: 'hash_mismatch' }]);
    expect(findings.corruptedKeys).toEqual(['primary']);
    expect(findings.merkleMismatches).toEqual([3]);
    expect(findings.auditedAt).toBe(FIXED_TIME);
  });
});
