/**
 * Logger utility for the pipeline
 * Provides a consistent leveled logging interface across stages
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

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as string[]).includes(value);
}

export class Logger {
  // null on a child: it follows its parent until setLevel is called on it
  private logLevel: LogLevel | null;
  private readonly scope: string | null;
  private readonly parent: Logger | null;

  constructor(level?: LogLevel, scope: string | null = null, parent: Logger | null = null) {
    this.parent = parent;
    this.scope = scope;
    if (level) {
      this.logLevel = level;
    } else if (parent) {
      this.logLevel = null;
    } else {
      // Default to 'info' if LOG_LEVEL env var is not set
      const fromEnv = process.env.LOG_LEVEL;
      this.logLevel = isLogLevel(fromEnv) ? fromEnv : 'info';
    }
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  get level(): LogLevel {
    return this.logLevel ?? this.parent?.level ?? 'info';
  }

  /**
   * Scoped logger that follows this logger's level, e.g. `logger.child('fetch')`
   */
  child(scope: string): Logger {
    return new Logger(undefined, this.scope ? `${this.scope}:${scope}` : scope, this);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
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
    const scope = this.scope ? ` [${this.scope}]` : '';
    const prefix = `[${timestamp}] [${level.toUpperCase()}]${scope}`;

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
