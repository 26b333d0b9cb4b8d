/**
 * Deadline for a single remote call
 */

import { OperationCancelledError } from '../clients/base/BatchExecutor';

export class TimeoutError extends Error {
  constructor(
    public readonly operationName: string,
    public readonly timeoutMs: number
  ) {
    super(`${operationName} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface TimeoutOptions {
  timeoutMs: number;
  /** Used in the timeout message, e.g. "repository write" */
  operationName: string;
  /** Run-wide cancellation */
  signal?: AbortSignal;
}

/**
 * Run `operation` against a deadline. The signal handed to the operation aborts
 * when the deadline passes or the run is cancelled, so the call stops instead
 * of finishing in the background.
 *
 * @throws TimeoutError when the deadline passes first
 * @throws OperationCancelledError when `options.signal` aborts first
 *
 * @example
 * ```typescript
 * const revision = await withTimeout((signal) => backend.write({ ...request, signal }), {
 *   timeoutMs: 60000,
 *   operationName: 'object-storage write',
 * });
 * ```
 */
export function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, options: TimeoutOptions): Promise<T> {
  const { timeoutMs, operationName, signal } = options;
  if (signal?.aborted) {
    return Promise.reject(new OperationCancelledError());
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (): boolean => {
      if (settled) return false;
      settled = true;
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
      return true;
    };
    const abandon = (error: Error) => {
      if (!settle()) return;
      controller.abort();
      reject(error);
    };

    const timeoutId = setTimeout(() => abandon(new TimeoutError(operationName, timeoutMs)), timeoutMs);
    const onAbort = () => abandon(new OperationCancelledError());
    signal?.addEventListener('abort', onAbort, { once: true });

    operation(controller.signal).then(
      (result) => {
        if (settle()) resolve(result);
      },
      (error: unknown) => {
        if (settle()) reject(error);
      }
    );
  });
}
