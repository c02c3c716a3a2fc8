import { LEDGER_DEFAULTS } from '../config/ledger-config.js';

export const SHARED_KEY_NAMES = ['primary', 'secondary', 'verification'] as const;

export type SharedKeyName = (typeof SHARED_KEY_NAMES)[number];

/**
 * Key name -> key material. Owned by a Ledger and injected at construction.
 */
export type SharedKeys = Record<string, string>;

const CANONICAL_SUFFIXES: Record<SharedKeyName, string> = {
  primary: '12345',
  secondary: '67890',
  verification: 'ABCDE',
};

export function expectedKeyPrefix(name: string, prefix: string = LEDGER_DEFAULTS.KEY_PREFIX): string {
  return `${prefix}${name.toUpperCase()}_`;
}

export function canonicalSharedKeys(prefix: string = LEDGER_DEFAULTS.KEY_PREFIX): SharedKeys {
  const keys: SharedKeys = {};
  for (const name of SHARED_KEY_NAMES) {
    keys[name] = expectedKeyPrefix(name, prefix) + CANONICAL_SUFFIXES[name];
  }
  return keys;
}

/**
 * Names whose value does not carry the deterministic per-name prefix, in key
 * order, followed by required names that are missing altogether.
 */
export function findCorruptedKeys(keys: SharedKeys, prefix: string = LEDGER_DEFAULTS.KEY_PREFIX): string[] {
  const corrupted = Object.keys(keys).filter(
    name => !keys[name].startsWith(expectedKeyPrefix(name, prefix))
  );

  for (const name of SHARED_KEY_NAMES) {
    if (!(name in keys)) corrupted.push(name);
  }

  return corrupted;
}

/**
 * Restores the canonical key set in place, so holders of the same record
 * (the envelope codec) see the reset.
 */
export function resetToCanonical(keys: SharedKeys, prefix: string = LEDGER_DEFAULTS.KEY_PREFIX): void {
  for (const name of Object.keys(keys)) {
    delete keys[name];
  }
  Object.assign(keys, canonicalSharedKeys(prefix));
}
