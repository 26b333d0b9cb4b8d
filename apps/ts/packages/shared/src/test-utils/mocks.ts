import { type Mock, vi } from 'vitest';
import type { ILogger, LogContext } from '../utils/logger-interface';

type LogMethod = Mock<(message: string, context?: LogContext) => void>;

export interface MockLogger extends ILogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
}

/**
 * Logger whose methods are spies; child() returns the same instance so
 * assertions see every message regardless of component context
 */
export function createMockLogger(): MockLogger {
  const mockLogger: MockLogger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: () => mockLogger,
    createCorrelationId: () => 'test-correlation-id',
  };
  return mockLogger;
}
