import { isLogThreshold, logger } from '../observability/logger.js';
import type { LogThreshold } from '../observability/logger.js';

export const LEDGER_DEFAULTS = {
  DIFFICULTY: 2,
  MAX_DIFFICULTY: 6,
  KEY_PREFIX: 'LEDGER_KEY_',
  LOG_LEVEL: 'info',
} as const;

export interface LedgerConfig {
  difficulty: number;
  keyPrefix: string;
  logLevel: LogThreshold;
}

export class LedgerConfigError extends Error {
  constructor(message: string, public readonly setting: string) {
    super(message);
    this.name = 'LedgerConfigError';
  }
}

/**
 * Proof-of-work cost grows as 16^difficulty, so values are capped at
 * MAX_DIFFICULTY.
 */
export function assertValidDifficulty(difficulty: number): void {
  if (!Number.isInteger(difficulty) || difficulty < 0 || difficulty > LEDGER_DEFAULTS.MAX_DIFFICULTY) {
    throw new LedgerConfigError(
      `Difficulty must be an integer between 0 and ${LEDGER_DEFAULTS.MAX_DIFFICULTY}, got ${difficulty}`,
      'difficulty'
    );
  }
}

function parseDifficulty(value: string | undefined): number {
  if (!value) return LEDGER_DEFAULTS.DIFFICULTY;

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0 || parsed > LEDGER_DEFAULTS.MAX_DIFFICULTY) {
    logger.warn('config_invalid', 'Ignoring invalid LEDGER_DIFFICULTY', {
      value,
      fallback: LEDGER_DEFAULTS.DIFFICULTY,
    });
    return LEDGER_DEFAULTS.DIFFICULTY;
  }
  return parsed;
}

function parseKeyPrefix(value: string | undefined): string {
  if (!value) return LEDGER_DEFAULTS.KEY_PREFIX;

  if (!/^[A-Z0-9_]+_$/.test(value)) {
    logger.warn('config_invalid', 'Ignoring invalid LEDGER_KEY_PREFIX', {
      value,
      fallback: LEDGER_DEFAULTS.KEY_PREFIX,
    });
    return LEDGER_DEFAULTS.KEY_PREFIX;
  }
  return value;
}

function parseLogLevel(value: string | undefined): LogThreshold {
  if (!value) return LEDGER_DEFAULTS.LOG_LEVEL;

  const normalized = value.toLowerCase();
  if (!isLogThreshold(normalized)) {
    logger.warn('config_invalid', 'Ignoring invalid LOG_LEVEL', {
      value,
      fallback: LEDGER_DEFAULTS.LOG_LEVEL,
    });
    return LEDGER_DEFAULTS.LOG_LEVEL;
  }
  return normalized;
}

export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  return {
    difficulty: parseDifficulty(env.LEDGER_DIFFICULTY),
    keyPrefix: parseKeyPrefix(env.LEDGER_KEY_PREFIX),
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}
