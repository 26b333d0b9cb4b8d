/**
 * Unified Error Hierarchy for the Stock Warehouse
 *
 * Base error classes that provide:
 * - Consistent error codes across fetch, store and replication layers
 * - A `kind` discriminator for failures that share a category
 * - Retryability classification used by the orchestrator and reconciler
 */

/**
 * Abstract base class for all warehouse errors.
 * All domain-specific errors should extend this class.
 */
export abstract class WarehouseError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: string;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export type FetchFailureKind = 'transient' | 'rate_limited' | 'not_found';

/**
 * Upstream price fetch failed for one symbol
 */
export class FetchFailure extends WarehouseError {
  readonly code = 'FETCH_FAILURE' as const;

  constructor(
    readonly kind: FetchFailureKind,
    readonly symbolId: string,
    message: string,
    cause?: Error
  ) {
    super(message, cause);
  }

  isRetryable(): boolean {
    return this.kind !== 'not_found';
  }
}

export type StoreWriteFailureKind = 'transient' | 'schema_mismatch';

/**
 * Local store rejected a write (or cannot be opened safely)
 */
export class StoreWriteFailure extends WarehouseError {
  readonly code = 'STORE_WRITE_FAILURE' as const;

  constructor(
    readonly kind: StoreWriteFailureKind,
    message: string,
    cause?: Error
  ) {
    super(message, cause);
  }
}

export type SyncFailureKind = 'conflict' | 'quota_exceeded' | 'unauthorized' | 'transient';

/**
 * Remote backend rejected an upload/commit
 */
export class SyncFailure extends WarehouseError {
  readonly code = 'SYNC_FAILURE' as const;

  constructor(
    readonly kind: SyncFailureKind,
    readonly backend: string,
    message: string,
    cause?: Error
  ) {
    super(message, cause);
  }

  /**
   * Quota and permission rejections never succeed on retry
   */
  isRetryable(): boolean {
    return this.kind === 'conflict' || this.kind === 'transient';
  }
}

/**
 * Another run holds the run lock
 */
export class RunConflictError extends WarehouseError {
  readonly code = 'RUN_CONFLICT' as const;

  constructor(
    readonly lockPath: string,
    readonly holderPid?: number
  ) {
    super(
      holderPid !== undefined
        ? `Run already in progress (pid ${holderPid}, lock ${lockPath})`
        : `Run already in progress (lock ${lockPath})`
    );
  }
}

/**
 * Upstream provider unreachable for the whole market
 */
export class UpstreamUnavailableError extends WarehouseError {
  readonly code = 'UPSTREAM_UNAVAILABLE' as const;

  constructor(
    readonly market: string,
    readonly failures: string[],
    cause?: Error
  ) {
    super(`Upstream unavailable for market ${market}: ${failures.length} request(s) failed`, cause);
  }
}

/**
 * Invalid or incomplete configuration
 */
export class ConfigError extends WarehouseError {
  readonly code = 'CONFIG_ERROR' as const;
}

/**
 * Type guard to check if an error is a WarehouseError
 */
export function isWarehouseError(error: unknown): error is WarehouseError {
  return error instanceof WarehouseError;
}
