export interface MerkleProofStep {
  position: 'left' | 'right';
  hash: string;
}

export interface EntryInclusionProof {
  entryId: string;
  blockIndex: number;
  leafHash: string;
  proof: MerkleProofStep[];
  root: string;
}

export interface MerkleVerificationResult {
  valid: boolean;
  recomputedRoot: string;
  reason?: string;
}

export class MerkleTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MerkleTreeError';
  }
}
