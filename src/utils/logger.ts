/**
 * Logger utility for the scraper pipeline
 * Provides a consistent logging interface; sources log through scoped children
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const match = LEVELS.find(level => level === value?.toLowerCase());
  return match ?? fallback;
}

export class Logger {
  private logLevel: LogLevel;
  private readonly scope: string;

  constructor(level: LogLevel = parseLogLevel(process.env.LOG_LEVEL), scope = '') {
    this.logLevel = level;
    this.scope = scope;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /** Logger that prefixes every message, e.g. `logger.child('[law_academic]')` */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope} ${scope}` : scope;
    return new ScopedLogger(this, nested);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message: this.scope ? `${this.scope} ${message}` : message,
      timestamp: new Date().toISOString(),
      data,
    };
  }

  private output(logMessage: LogMessage): void {
    const { level, message, timestamp, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;

    switch (level) {
      case 'debug':
        console.debug(prefix, message, data ?? '');
        break;
      case 'info':
        console.info(prefix, message, data ?? '');
        break;
      case 'warn':
        console.warn(prefix, message, data ?? '');
        break;
      case 'error':
        console.error(prefix, message, data ?? '', error ?? '');
        break;
    }
  }

  debug(message: string, data?: unknown): void {
    if (this.isEnabled('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.isEnabled('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown): void {
    if (this.isEnabled('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown): void {
    if (this.isEnabled('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }
}

// Children follow the parent's level, so setLevel on the root applies everywhere
class ScopedLogger extends Logger {
  private readonly parent: Logger;

  constructor(parent: Logger, scope: string) {
    super('debug', scope);
    this.parent = parent;
  }

  isEnabled(level: LogLevel): boolean {
    return this.parent.isEnabled(level);
  }
}

// Export singleton instance
export const logger = new Logger();
