import { OperationCancelledError } from '../../clients/base/BatchExecutor';
import { SyncFailure } from '../../errors';
import { getErrorMessage, toError } from '../../utils/error-helpers';

/**
 * Label any backend error as a SyncFailure of `backend`. Unknown errors and
 * timeouts are transient; cancellation passes through.
 */
export function toSyncFailure(error: unknown, backend: string): SyncFailure | OperationCancelledError {
  if (error instanceof OperationCancelledError) return error;
  if (error instanceof SyncFailure) {
    return error.backend === backend ? error : new SyncFailure(error.kind, backend, error.message, error);
  }
  return new SyncFailure('transient', backend, getErrorMessage(error), toError(error));
}
