import { describe, expect, it } from 'vitest';
import {
  getErrorMessage,
  getErrorStack,
  isNetworkError,
  isRetryableHttpStatus,
  parseRetryAfter,
  toError,
} from './error-helpers';

describe('getErrorMessage', () => {
  it('reads Error messages and stringifies other values', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
  });
});

describe('getErrorStack', () => {
  it('returns undefined for non-errors', () => {
    expect(getErrorStack('x')).toBeUndefined();
    expect(getErrorStack(new Error('x'))).toContain('Error: x');
  });
});

describe('toError', () => {
  it('wraps non-error values', () => {
    const original = new Error('kept');
    expect(toError(original)).toBe(original);
    expect(toError('wrapped').message).toBe('wrapped');
  });
});

describe('isNetworkError', () => {
  it('detects undici and socket failures', () => {
    expect(isNetworkError(new Error('fetch failed'))).toBe(true);
    expect(isNetworkError(new Error('connect ECONNREFUSED 127.0.0.1:443'))).toBe(true);
    expect(isNetworkError(new Error('socket hang up'))).toBe(true);
    expect(isNetworkError(new Error('Invalid JSON'))).toBe(false);
  });
});

describe('isRetryableHttpStatus', () => {
  it('accepts throttling and gateway statuses only', () => {
    for (const status of [408, 429, 500, 502, 503, 504]) {
      expect(isRetryableHttpStatus(status)).toBe(true);
    }
    for (const status of [400, 401, 403, 404, 409, 412]) {
      expect(isRetryableHttpStatus(status)).toBe(false);
    }
  });
});

describe('parseRetryAfter', () => {
  it('parses delta seconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
  });

  it('parses HTTP dates relative to now', () => {
    const now = new Date('2025-03-03T00:00:00Z');
    expect(parseRetryAfter('Mon, 03 Mar 2025 00:00:10 GMT', now)).toBe(10000);
  });

  it('returns undefined for missing or invalid values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});
