export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Leveled sink handed to components that log
 */
export interface Log {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export class Logger implements Log {
  private level: number;

  constructor(level: string = process.env['LOG_LEVEL'] || 'info') {
    this.level = LOG_LEVELS.info;
    this.setLevel(level);
  }

  /**
   * Change verbosity; unknown names fall back to info
   */
  setLevel(level: string): void {
    const name = level.toLowerCase();
    this.level = isLogLevel(name) ? LOG_LEVELS[name] : LOG_LEVELS.info;
  }

  getLevel(): LogLevel {
    const entry = Object.entries(LOG_LEVELS).find(([, value]) => value === this.level);
    return entry && isLogLevel(entry[0]) ? entry[0] : 'info';
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.level;
  }

  debug(...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      console.log(...args);
    }
  }

  info(...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(...args);
    }
  }

  warn(...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.warn(...args);
    }
  }

  error(...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(...args);
    }
  }
}

export const logger = new Logger();
