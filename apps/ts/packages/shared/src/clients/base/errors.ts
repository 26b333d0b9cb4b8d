export interface HttpApiErrorOptions {
  message: string;
  url: string;
  status: number;
  statusText: string;
  responseBody?: unknown;
  isNetworkError?: boolean;
  isTimeoutError?: boolean;
  /** Server-requested wait from a Retry-After header */
  retryAfterMs?: number;
  cause?: Error;
}

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);

/**
 * Failed HTTP exchange. Network failures and timeouts carry status 0.
 */
export class HttpApiError extends Error {
  readonly url: string;
  readonly status: number;
  readonly statusText: string;
  readonly responseBody: unknown;
  readonly isNetworkError: boolean;
  readonly isTimeoutError: boolean;
  readonly retryAfterMs: number | undefined;

  constructor(options: HttpApiErrorOptions) {
    super(options.message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'HttpApiError';
    this.url = options.url;
    this.status = options.status;
    this.statusText = options.statusText;
    this.responseBody = options.responseBody;
    this.isNetworkError = options.isNetworkError ?? false;
    this.isTimeoutError = options.isTimeoutError ?? false;
    this.retryAfterMs = options.retryAfterMs;
  }

  static isHttpApiError(error: unknown): error is HttpApiError {
    return error instanceof HttpApiError;
  }

  isRetryable(): boolean {
    if (this.isNetworkError || this.isTimeoutError) {
      return true;
    }
    return RETRYABLE_STATUS_CODES.has(this.status);
  }
}
