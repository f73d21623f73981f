/**
 * Leveled console logger shared by the monitor, the webhook listener and the scripts.
 * Lines look like `[2026-10-18T09:30:00.000Z] [INFO] message`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMessage {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: unknown;
  error?: unknown;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  private logLevel: LogLevel;

  constructor(level?: string) {
    // Default to 'info' if LOG_LEVEL env var is not set or not recognized
    const requested = level ?? process.env.LOG_LEVEL;
    this.logLevel = isLogLevel(requested) ? requested : 'info';
  }

  get level(): LogLevel {
    return this.logLevel;
  }

  setLevel(level: LogLevel) {
    this.logLevel = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatLog(level: LogLevel, message: string, data?: unknown): LogMessage {
    return {
      level,
      message,
      timestamp: new Date().toISOString(),
      data
    };
  }

  private output(logMessage: LogMessage) {
    const { level, message, timestamp, data, error } = logMessage;
    const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
    const extras = [data, error].filter(value => value !== undefined);

    switch (level) {
      case 'debug':
        console.debug(prefix, message, ...extras);
        break;
      case 'info':
        console.info(prefix, message, ...extras);
        break;
      case 'warn':
        console.warn(prefix, message, ...extras);
        break;
      case 'error':
        console.error(prefix, message, ...extras);
        break;
    }
  }

  debug(message: string, data?: unknown) {
    if (this.shouldLog('debug')) {
      this.output(this.formatLog('debug', message, data));
    }
  }

  info(message: string, data?: unknown) {
    if (this.shouldLog('info')) {
      this.output(this.formatLog('info', message, data));
    }
  }

  warn(message: string, data?: unknown) {
    if (this.shouldLog('warn')) {
      this.output(this.formatLog('warn', message, data));
    }
  }

  error(message: string, error?: unknown, data?: unknown) {
    if (this.shouldLog('error')) {
      const logMessage = this.formatLog('error', message, data);
      logMessage.error = error;
      this.output(logMessage);
    }
  }
}

// Export singleton instance
export const logger = new Logger();
