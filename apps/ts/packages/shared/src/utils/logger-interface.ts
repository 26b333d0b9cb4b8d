/**
 * Common logger interface for type safety across components
 * Components accept an ILogger so tests and the CLI can swap implementations
 */

export type LogLevel = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL' | 'SILENT';

export interface LogContext {
  correlationId?: string;
  component?: string;
  market?: string;
  backend?: string;
  symbolId?: string;
  [key: string]: unknown;
}

/**
 * Common logger interface
 */
export interface ILogger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  fatal(message: string, context?: LogContext): void;
  child(context: LogContext): ILogger;
  createCorrelationId(): string;
}
