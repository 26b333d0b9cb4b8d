import type { z } from 'zod';
import { getErrorMessage, parseRetryAfter } from '../../utils/error-helpers';
import { logger as defaultLogger } from '../../utils/logger';
import type { ILogger } from '../../utils/logger-interface';
import { OperationCancelledError } from './BatchExecutor';
import { HttpApiError } from './errors';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface HttpRequest {
  method?: HttpMethod;
  /** Path relative to the base URL, or an absolute URL */
  path: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  /** Serialized as JSON */
  json?: unknown;
  /** Raw body, used as-is */
  body?: RequestInit['body'];
  signal?: AbortSignal;
}

export interface BaseHttpClientOptions {
  baseURL: string;
  /** Per-request deadline */
  timeoutMs?: number;
  /** 0 disables the client's rate limit queue */
  requestsPerMinute?: number;
  logger?: ILogger;
}

/**
 * FIFO rate limit queue.
 * Serializes concurrent requests to enforce a minimum interval between calls.
 */
export class RateLimitQueue {
  private queue: Array<() => void> = [];
  private processing = false;
  private lastRequestTime = 0;

  constructor(private readonly minIntervalMs: number) {}

  /**
   * Interval for a requests-per-minute budget with a 10% safety margin
   */
  static fromRequestsPerMinute(requestsPerMinute: number): RateLimitQueue {
    return new RateLimitQueue(Math.ceil(((60 * 1000) / requestsPerMinute) * 1.1));
  }

  /**
   * Resolves when this request is allowed to proceed, in strict FIFO order
   */
  acquire(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
      void this.processQueue();
    });
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    try {
      while (this.queue.length > 0) {
        const next = this.queue.shift();
        if (!next) break;

        const elapsed = Date.now() - this.lastRequestTime;
        if (elapsed < this.minIntervalMs) {
          await new Promise<void>((r) => setTimeout(r, this.minIntervalMs - elapsed));
        }

        this.lastRequestTime = Date.now();
        next();
      }
    } finally {
      this.processing = false;
    }
  }
}

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * fetch-based client with base URL handling, a per-client rate limit queue,
 * request deadlines and HttpApiError mapping
 */
export abstract class BaseHttpClient {
  protected readonly logger: ILogger;
  private readonly rateLimiter: RateLimitQueue | null;
  private readonly timeoutMs: number;

  constructor(protected readonly clientOptions: BaseHttpClientOptions) {
    this.logger = (clientOptions.logger ?? defaultLogger).child({ component: this.constructor.name });
    this.timeoutMs = clientOptions.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const rpm = clientOptions.requestsPerMinute ?? 0;
    this.rateLimiter = rpm > 0 ? RateLimitQueue.fromRequestsPerMinute(rpm) : null;
  }

  /**
   * Headers added to every request (authentication)
   */
  protected defaultHeaders(): Record<string, string> {
    return {};
  }

  /**
   * URL as written to logs and error messages
   */
  protected redactUrl(url: string): string {
    return url;
  }

  protected buildURL(path: string, query?: QueryParams): string {
    const base = this.clientOptions.baseURL.endsWith('/')
      ? this.clientOptions.baseURL
      : `${this.clientOptions.baseURL}/`;
    const url = new URL(path.startsWith('/') ? path.slice(1) : path, base);

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  /**
   * Perform a request; non-2xx responses become HttpApiError
   */
  protected async request(req: HttpRequest): Promise<Response> {
    await this.rateLimiter?.acquire();
    if (req.signal?.aborted) {
      throw new OperationCancelledError();
    }

    const url = this.buildURL(req.path, req.query);
    const method = req.method ?? 'GET';
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();
    req.signal?.addEventListener('abort', onCallerAbort, { once: true });

    const headers: Record<string, string> = { ...this.defaultHeaders(), ...req.headers };
    let body = req.body;
    if (req.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(req.json);
    }

    this.logger.debug(`${method} ${this.redactUrl(url)}`);

    let response: Response;
    try {
      response = await fetch(url, { method, headers, body, signal: controller.signal });
    } catch (error) {
      if (req.signal?.aborted && !timedOut) {
        throw new OperationCancelledError();
      }
      throw new HttpApiError({
        message: timedOut
          ? `Request timeout after ${this.timeoutMs}ms: ${method} ${this.redactUrl(url)}`
          : `Network error: ${getErrorMessage(error)}`,
        url,
        status: 0,
        statusText: '',
        isNetworkError: !timedOut,
        isTimeoutError: timedOut,
        cause: error instanceof Error ? error : undefined,
      });
    } finally {
      clearTimeout(timeoutId);
      req.signal?.removeEventListener('abort', onCallerAbort);
    }

    if (!response.ok) {
      throw await this.toApiError(url, response);
    }
    return response;
  }

  /**
   * Perform a request and validate the JSON body
   */
  protected async requestJson<T>(req: HttpRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const response = await this.request(req);
    const url = response.url || this.buildURL(req.path, req.query);

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new HttpApiError({
        message: `Invalid JSON from ${this.redactUrl(url)}: ${getErrorMessage(error)}`,
        url,
        status: response.status,
        statusText: response.statusText,
      });
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new HttpApiError({
        message: `Unexpected response shape from ${this.redactUrl(url)}: ${issue?.path.join('.')} ${issue?.message}`,
        url,
        status: response.status,
        statusText: response.statusText,
        responseBody: payload,
      });
    }
    return parsed.data;
  }

  private async toApiError(url: string, response: Response): Promise<HttpApiError> {
    const responseBody = parseBody(await response.text().catch(() => ''));

    const status = response.statusText ? `${response.status} ${response.statusText}` : `${response.status}`;

    return new HttpApiError({
      message: `HTTP ${status}: ${extractMessage(responseBody) ?? this.redactUrl(url)}`,
      url,
      status: response.status,
      statusText: response.statusText,
      responseBody,
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  }
}

function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function extractMessage(body: unknown): string | undefined {
  if (typeof body === 'string') return body || undefined;
  if (typeof body !== 'object' || body === null) return undefined;
  if ('message' in body && typeof body.message === 'string') return body.message;
  if ('description' in body && typeof body.description === 'string') return body.description;
  if ('error' in body) {
    const { error } = body;
    if (typeof error === 'string') return error;
    if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  return undefined;
}
