import type { JsonObject } from '../types.js';

export const GENESIS_PREVIOUS_HASH = '0';

export interface BlockHashInput {
  index: number;
  timestamp: string;
  payload: JsonObject;
  previousHash: string;
  nonce: number;
}

export type BlockRecord = {
  index: number;
  timestamp: string;
  payload: JsonObject;
  previousHash: string;
  nonce: number;
  hash: string;
};
