import dotenv from 'dotenv';
import { loadLedgerConfig } from './config/ledger-config.js';
import { generateLedgerId, logger } from './observability/logger.js';
import { RecordStore } from './store/record-store.js';
import { corruptSharedKey, tamperBlock } from './testing/tamper.js';

dotenv.config();

// Tamper-and-repair walkthrough: store two records, alter one in place,
// corrupt a shared key, then let the store repair itself.
function runDemo(): void {
  const config = loadLedgerConfig();
  const ledgerId = generateLedgerId();

  logger.setLevel(config.logLevel);

  const store = new RecordStore({
    difficulty: config.difficulty,
    keyPrefix: config.keyPrefix,
    ledgerId,
  });

  const emergencyId = store.storeRecord(
    { slice_id: 'emergency-1', type_name: 'emergency', priority: 100 },
    { type: 'network_slice', metadata: { category: 'network_configuration', version: '1.0' } }
  );
  store.storeRecord(
    { slice_id: 'consumer-1', type_name: 'consumer', priority: 50 },
    { type: 'network_slice', metadata: { category: 'network_configuration', version: '1.0' } }
  );

  logger.info('demo_initial_verify', store.verifyIntegrity().message);

  tamperBlock(store.ledger, 1, { content: { slice_id: 'emergency-1', priority: 30 } });
  logger.info('demo_after_tamper', store.verifyIntegrity().message, {
    tamperedIndices: store.auditor.detect(),
  });

  corruptSharedKey(store.ledger, 'primary');
  logger.info('demo_after_key_corruption', store.verifyIntegrity().message);

  const outcome = store.autoRepairIfNeeded();
  logger.info('demo_repair', outcome.message, { repairedIndices: outcome.repairedIndices });

  const final = store.verifyIntegrity();
  logger.info('demo_final_verify', final.message, {
    valid: final.valid,
    merkleMismatches: store.auditor.findMerkleMismatches(),
    emergencyRecordReadable: store.retrieveRecord(emergencyId) !== null,
    repairHistory: store.getRepairHistory().length,
  });

  logger.clearContext();
}

runDemo();
