// =============================================================================
// BPEL PRD Platform - Shared Utilities
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
}

/**
 * Structured logger factory. Writes one JSON line per entry.
 * The threshold comes from LOG_LEVEL unless passed explicitly.
 */
export function createLogger(serviceName: string, level?: LogLevel): Logger {
  const threshold = (): number => {
    const configured = level ?? (isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info');
    return LEVEL_ORDER[configured];
  };

  const write = (entryLevel: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] < threshold()) return;
    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level: entryLevel,
      service: serviceName,
      message,
      ...meta,
    });
    if (entryLevel === 'error') {
      console.error(line);
    } else if (entryLevel === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, error, meta) => write('error', message, {
      error: error?.message,
      stack: error?.stack,
      ...meta,
    }),
  };
}

/**
 * Truncate string to a maximum length
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Byte size of a UTF-8 string
 */
export function byteSize(str: string): number {
  return Buffer.byteLength(str, 'utf8');
}

/**
 * Remove duplicates while keeping first-seen order
 */
export function unique<T>(items: Iterable<T>): T[] {
  return Array.from(new Set(items));
}
