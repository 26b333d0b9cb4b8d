/**
 * BatchExecutor - bounded retry with exponential backoff and a worker pool
 * Rate limiting is handled by BaseHttpClient, not here
 */

import { toError } from '../../utils/error-helpers';

export interface BatchExecutorConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  retryDelayMs: number;
  maxRetryDelayMs: number;
  /** Errors for which this returns false fail immediately */
  isRetryable: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
}

export type SettledOperation<T> =
  | { status: 'fulfilled'; value: T; attempts: number }
  | { status: 'rejected'; error: Error; attempts: number }
  | { status: 'skipped' };

export interface ExecuteAllOptions {
  concurrency?: number;
  signal?: AbortSignal;
  onProgress?: (completed: number, total: number) => void;
}

/**
 * Thrown when an operation (or the wait before a retry) is aborted
 */
export class OperationCancelledError extends Error {
  constructor() {
    super('Operation cancelled');
    this.name = 'OperationCancelledError';
  }
}

/**
 * Final error of an operation together with the number of attempts spent on it
 */
export class RetryExhaustedError extends Error {
  constructor(
    readonly lastError: Error,
    readonly attempts: number
  ) {
    super(`Operation failed after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
  }
}

const DEFAULT_CONFIG: BatchExecutorConfig = {
  maxRetries: 3,
  retryDelayMs: 1000,
  maxRetryDelayMs: 10000,
  isRetryable: () => true,
};

export class BatchExecutor {
  private readonly config: BatchExecutorConfig;

  constructor(config?: Partial<BatchExecutorConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Execute a single operation with retry logic
   *
   * @throws RetryExhaustedError carrying the last error and the attempt count
   * @throws OperationCancelledError when the signal aborts
   */
  async execute<T>(operation: (attempt: number) => Promise<T>, signal?: AbortSignal): Promise<T> {
    let attempt = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new OperationCancelledError();
      }

      attempt++;
      try {
        return await operation(attempt);
      } catch (error) {
        const lastError = toError(error);
        if (lastError instanceof OperationCancelledError) throw lastError;

        if (attempt > this.config.maxRetries || !this.config.isRetryable(lastError)) {
          throw new RetryExhaustedError(lastError, attempt);
        }

        const delayMs = this.backoffDelay(attempt - 1);
        this.config.onRetry?.(lastError, attempt, delayMs);
        await this.wait(delayMs, signal);
      }
    }
  }

  /**
   * Execute operations through a bounded worker pool. Failures are settled per
   * operation; after an abort, operations not yet started are reported as skipped.
   */
  async executeAll<T>(
    operations: ReadonlyArray<(attempt: number) => Promise<T>>,
    options: ExecuteAllOptions = {}
  ): Promise<SettledOperation<T>[]> {
    const { signal, onProgress } = options;
    const concurrency = Math.max(1, options.concurrency ?? 1);
    const results: SettledOperation<T>[] = operations.map(() => ({ status: 'skipped' }));
    let nextIndex = 0;
    let completed = 0;

    const worker = async (): Promise<void> => {
      while (nextIndex < operations.length && !signal?.aborted) {
        const index = nextIndex++;
        const operation = operations[index];
        if (!operation) continue;

        results[index] = await this.settle(operation, signal);
        completed++;
        onProgress?.(completed, operations.length);
      }
    };

    const workerCount = Math.min(concurrency, operations.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    return results;
  }

  private async settle<T>(
    operation: (attempt: number) => Promise<T>,
    signal?: AbortSignal
  ): Promise<SettledOperation<T>> {
    let attempts = 0;
    try {
      const value = await this.execute((attempt) => {
        attempts = attempt;
        return operation(attempt);
      }, signal);
      return { status: 'fulfilled', value, attempts };
    } catch (error) {
      if (error instanceof OperationCancelledError && attempts === 0) {
        return { status: 'skipped' };
      }
      if (error instanceof RetryExhaustedError) {
        return { status: 'rejected', error: error.lastError, attempts: error.attempts };
      }
      return { status: 'rejected', error: toError(error), attempts };
    }
  }

  private backoffDelay(retryIndex: number): number {
    const baseDelay = this.config.retryDelayMs * 2 ** retryIndex;
    const cappedDelay = Math.min(baseDelay, this.config.maxRetryDelayMs);
    // Equal jitter: never less than half the capped delay
    return cappedDelay / 2 + Math.random() * (cappedDelay / 2);
  }

  private wait(delayMs: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new OperationCancelledError());
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new OperationCancelledError());
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, delayMs);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
