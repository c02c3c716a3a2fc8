import { canonicalStringify, sha256Hex } from '../hashing/hasher.js';
import type { SharedKeys } from '../ledger/shared-keys.js';
import { logger } from '../observability/logger.js';
import { systemClock } from '../types.js';
import type { Clock, JsonObject } from '../types.js';
import { ENVELOPE_FIELDS, EnvelopeKeyError, VERIFICATION_KEY_NAME } from './envelope-types.js';
import type { SignedPayload } from './envelope-types.js';

function stripEnvelope(candidate: JsonObject): JsonObject {
  const unsigned: JsonObject = { ...candidate };
  for (const field of ENVELOPE_FIELDS) {
    delete unsigned[field];
  }
  return unsigned;
}

/**
 * Keyed-digest envelopes over the `verification` shared key.
 *
 * The key record is read on every call, so a key reset on the owning ledger
 * takes effect immediately.
 */
export class SignedEnvelopeCodec {
  constructor(
    private readonly sharedKeys: SharedKeys,
    private readonly clock: Clock = systemClock
  ) {}

  private computeSignature(payload: JsonObject): string {
    const key = this.sharedKeys[VERIFICATION_KEY_NAME];
    if (key === undefined) {
      throw new EnvelopeKeyError(
        `Shared key "${VERIFICATION_KEY_NAME}" is not configured`,
        VERIFICATION_KEY_NAME
      );
    }
    return sha256Hex(canonicalStringify(payload) + key);
  }

  /**
   * Returns a signed copy; the input object is left untouched.
   */
  sign(payload: JsonObject): SignedPayload {
    return {
      ...payload,
      signature: this.computeSignature(payload),
      signedAt: this.clock(),
    };
  }

  /**
   * Recompute the signature with the current key.
   *
   * @returns the signed payload on a match, otherwise null. A payload that was
   *   never signed and one whose signature no longer matches look the same.
   */
  verifyAndUnwrap(candidate: JsonObject): SignedPayload | null {
    const signature = candidate.signature;
    if (typeof signature !== 'string') {
      return null;
    }

    const expected = this.computeSignature(stripEnvelope(candidate));
    if (signature !== expected) {
      logger.warn('signature_mismatch', 'Signed payload failed verification', {
        signature: signature.substring(0, 16) + '...',
        expected: expected.substring(0, 16) + '...',
      });
      return null;
    }

    return { ...candidate, signature };
  }
}
