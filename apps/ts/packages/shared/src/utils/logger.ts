import { randomUUID } from 'node:crypto';
import type { ILogger, LogContext, LogLevel } from './logger-interface';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
}

const LEVEL_PRIORITIES: Record<LogLevel, number> = {
  TRACE: 0,
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  FATAL: 5,
  SILENT: 6,
};

const COLOR_MAP: Record<LogLevel, string> = {
  TRACE: '\x1b[37m',
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
  SILENT: '\x1b[0m',
};

const RESET = '\x1b[0m';

function isValidLogLevel(level: string): level is LogLevel {
  return level in LEVEL_PRIORITIES;
}

class LoggerImpl implements ILogger {
  private level: LogLevel;
  private correlationId?: string;
  private baseContext: LogContext;

  constructor(baseContext: LogContext = {}, level?: LogLevel) {
    this.baseContext = baseContext;
    this.level = level ?? this.getLogLevel();
  }

  private getLogLevel(): LogLevel {
    // Convert to uppercase to support both 'debug' and 'DEBUG' in .env
    const logLevel = process.env.LOG_LEVEL?.toUpperCase();

    if (logLevel && isValidLogLevel(logLevel)) {
      return logLevel;
    }

    switch (process.env.NODE_ENV) {
      case 'test':
        return 'SILENT';
      case 'production':
        return 'WARN';
      default:
        return 'INFO';
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_PRIORITIES[level] >= LEVEL_PRIORITIES[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const merged: LogContext = { ...this.baseContext, ...context };
    const correlationId = merged.correlationId || this.correlationId;

    if (process.env.NODE_ENV === 'production') {
      return JSON.stringify({
        timestamp: new Date().toISOString(),
        level,
        message,
        ...merged,
        correlationId,
      });
    }

    const prefix = correlationId ? `[${correlationId.slice(0, 8)}]` : '';
    const component = merged.component ? `[${merged.component}]` : '';
    const { correlationId: _id, component: _component, ...rest } = merged;
    const details = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : '';

    return `${COLOR_MAP[level]}[${level}]${RESET} ${prefix}${component} ${message}${details}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, context);

    if (level === 'ERROR' || level === 'FATAL') {
      console.error(formattedMessage);
    } else if (level === 'WARN') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setCorrelationId(id: string | undefined): void {
    this.correlationId = id;
  }

  createCorrelationId(): string {
    return randomUUID();
  }

  trace(message: string, context?: LogContext): void {
    this.log('TRACE', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('ERROR', message, context);
  }

  fatal(message: string, context?: LogContext): void {
    this.log('FATAL', message, context);
  }

  child(context: LogContext): LoggerImpl {
    const childLogger = new LoggerImpl({ ...this.baseContext, ...context }, this.level);
    childLogger.correlationId = context.correlationId || this.correlationId;
    return childLogger;
  }
}

export const logger = new LoggerImpl();
export default logger;

/**
 * Create a logger with an explicit level, independent of LOG_LEVEL/NODE_ENV
 */
export function createLogger(level: LogLevel, context: LogContext = {}): ILogger {
  return new LoggerImpl(context, level);
}
