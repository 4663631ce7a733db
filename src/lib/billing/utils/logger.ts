// src/lib/billing/utils/logger.ts
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  [key: string]: unknown;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const REDACTED_KEYS = new Set([
  'paymentMethodToken',
  'token',
  'apiKey',
  'cardNumber',
  'cvc',
  'password'
]);

const LEVEL_NAMES: readonly string[] = LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

export class BillingLogger {
  private level: LogLevel;

  constructor(level: LogLevel = defaultLevel(), private source?: string) {
    this.level = level;
  }

  child(source: string): BillingLogger {
    return new BillingLogger(this.level, this.source ? `${this.source}:${source}` : source);
  }

  debug(message: string, context?: LogContext): void {
    if (this.shouldLog('debug')) {
      this.log('DEBUG', message, context);
    }
  }

  info(message: string, context?: LogContext): void {
    if (this.shouldLog('info')) {
      this.log('INFO', message, context);
    }
  }

  warn(message: string, context?: LogContext): void {
    if (this.shouldLog('warn')) {
      this.log('WARN', message, context);
    }
  }

  error(message: string, context?: LogContext): void {
    if (this.shouldLog('error')) {
      this.log('ERROR', message, context);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private log(level: string, message: string, context?: LogContext): void {
    const timestamp = new Date().toISOString();
    const source = this.source ? `[${this.source}]` : '';
    const contextStr = context ? this.formatContext(context) : '';

    console.log(`[${timestamp}] ${level} ${source}: ${message}${contextStr}`);
  }

  private formatContext(context: LogContext): string {
    return ` ${JSON.stringify(sanitize(context))}`;
  }
}

// Tokens and card data never reach the log line
function sanitize(value: unknown, depth = 0): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (Array.isArray(value)) {
    return depth > 4 ? '[Array]' : value.map(item => sanitize(item, depth + 1));
  }
  if (value !== null && typeof value === 'object') {
    if (depth > 4) {
      return '[Object]';
    }
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = REDACTED_KEYS.has(key) ? '[REDACTED]' : sanitize(entry, depth + 1);
    }
    return result;
  }
  return value;
}
