import crypto from 'crypto';

export type LogLevel = 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

export interface LogContext {
  ledgerId: string;
  difficulty?: number;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  ledgerId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  difficulty?: number;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

export function isLogThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_RANK, value);
}

function thresholdFromEnv(): LogThreshold {
  const value = process.env.LOG_LEVEL?.toLowerCase();
  return value && isLogThreshold(value) ? value : 'info';
}

class Logger {
  private context: LogContext | null = null;
  private threshold: LogThreshold = thresholdFromEnv();

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  setLevel(threshold: LogThreshold): void {
    this.threshold = threshold;
  }

  getLevel(): LogThreshold {
    return this.threshold;
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      ledgerId: this.context?.ledgerId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.difficulty !== undefined) entry.difficulty = this.context.difficulty;

    console.log(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateLedgerId(): string {
  return crypto.randomBytes(8).toString('hex');
}
