import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  FetchFailure,
  isWarehouseError,
  RunConflictError,
  StoreWriteFailure,
  SyncFailure,
  UpstreamUnavailableError,
} from '../index';

describe('FetchFailure', () => {
  it('carries kind, symbol and code', () => {
    const err = new FetchFailure('rate_limited', '2330.TW', 'HTTP 429');
    expect(err.code).toBe('FETCH_FAILURE');
    expect(err.kind).toBe('rate_limited');
    expect(err.symbolId).toBe('2330.TW');
    expect(err.message).toBe('HTTP 429');
    expect(err.name).toBe('FetchFailure');
  });

  it('treats not_found as non-retryable', () => {
    expect(new FetchFailure('transient', 'A', 'x').isRetryable()).toBe(true);
    expect(new FetchFailure('rate_limited', 'A', 'x').isRetryable()).toBe(true);
    expect(new FetchFailure('not_found', 'A', 'x').isRetryable()).toBe(false);
  });
});

describe('SyncFailure', () => {
  it('classifies quota and authorization failures as non-retryable', () => {
    expect(new SyncFailure('quota_exceeded', 'object-storage', 'full').isRetryable()).toBe(false);
    expect(new SyncFailure('unauthorized', 'repository', 'denied').isRetryable()).toBe(false);
    expect(new SyncFailure('transient', 'repository', 'timeout').isRetryable()).toBe(true);
    expect(new SyncFailure('conflict', 'repository', 'sha mismatch').isRetryable()).toBe(true);
  });

  it('keeps the originating cause', () => {
    const cause = new Error('socket hang up');
    const err = new SyncFailure('transient', 'object-storage', 'upload failed', cause);
    expect(err.cause).toBe(cause);
    expect(err.backend).toBe('object-storage');
  });
});

describe('RunConflictError', () => {
  it('mentions the holder pid when known', () => {
    expect(new RunConflictError('/tmp/w.lock', 4242).message).toBe(
      'Run already in progress (pid 4242, lock /tmp/w.lock)'
    );
    expect(new RunConflictError('/tmp/w.lock').message).toBe('Run already in progress (lock /tmp/w.lock)');
  });
});

describe('UpstreamUnavailableError', () => {
  it('aggregates failure count into the message', () => {
    const err = new UpstreamUnavailableError('TW', ['2330.TW: timeout', '2317.TW: timeout']);
    expect(err.message).toBe('Upstream unavailable for market TW: 2 request(s) failed');
    expect(err.failures).toHaveLength(2);
  });
});

describe('isWarehouseError', () => {
  it('returns true for WarehouseError subclasses', () => {
    expect(isWarehouseError(new ConfigError('bad'))).toBe(true);
    expect(isWarehouseError(new StoreWriteFailure('schema_mismatch', 'v1 != v2'))).toBe(true);
  });

  it('returns false for regular errors and non-errors', () => {
    expect(isWarehouseError(new Error('test'))).toBe(false);
    expect(isWarehouseError('error')).toBe(false);
    expect(isWarehouseError(undefined)).toBe(false);
  });
});
