import { describe, it, expect } from 'vitest';
import { assertValidDifficulty, LedgerConfigError, loadLedgerConfig } from './ledger-config.js';

describe('loadLedgerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadLedgerConfig({})).toEqual({ difficulty: 2, keyPrefix: 'LEDGER_KEY_', logLevel: 'info' });
  });

  it('reads values from the environment', () => {
    const config = loadLedgerConfig({ LEDGER_DIFFICULTY: '3', LEDGER_KEY_PREFIX: 'ACME_', LOG_LEVEL: 'WARN' });
    expect(config).toEqual({ difficulty: 3, keyPrefix: 'ACME_', logLevel: 'warn' });
  });

  it.each(['abc', '-1', '9', '2.5'])('ignores LEDGER_DIFFICULTY=%s', value => {
    expect(loadLedgerConfig({ LEDGER_DIFFICULTY: value }).difficulty).toBe(2);
  });

  it('ignores malformed prefixes and log levels', () => {
    const config = loadLedgerConfig({ LEDGER_KEY_PREFIX: 'acme', LOG_LEVEL: 'loud' });
    expect(config.keyPrefix).toBe('LEDGER_KEY_');
    expect(config.logLevel).toBe('info');
  });
});

describe('assertValidDifficulty', () => {
  it('names the offending setting', () => {
    try {
      assertValidDifficulty(-1);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LedgerConfigError);
      expect(error instanceof LedgerConfigError && error.setting).toBe('difficulty');
    }
  });

  it('accepts the supported range', () => {
    expect(() => assertValidDifficulty(0)).not.toThrow();
    expect(() => assertValidDifficulty(6)).not.toThrow();
  });
});
