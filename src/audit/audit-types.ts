import type { BlockFault } from '../ledger/ledger-types.js';

export type IntegrityState = 'CLEAN' | 'TAMPERED';

export interface BlockFinding {
  index: number;
  fault: BlockFault;
}

export interface AuditFindings {
  state: IntegrityState;
  tamperedIndices: number[];
  blockFindings: BlockFinding[];
  corruptedKeys: string[];
  /** Blocks whose entries no longer hash to their stored merkle root. */
  merkleMismatches: number[];
  auditedAt: string;
}
