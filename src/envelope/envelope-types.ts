import type { JsonObject } from '../types.js';

/**
 * Payload carrying a keyed digest. `signedAt` is informational and is not
 * covered by the signature.
 */
export type SignedPayload = JsonObject & {
  signature: string;
};

export const ENVELOPE_FIELDS = ['signature', 'signedAt'] as const;

export const VERIFICATION_KEY_NAME = 'verification';

export class EnvelopeKeyError extends Error {
  constructor(message: string, public readonly keyName: string) {
    super(message);
    this.name = 'EnvelopeKeyError';
  }
}
