/**
 * HTTP client for the geospatial query gateway
 *
 * - Per-request timeout via AbortController
 * - Exponential backoff with jitter, only for transient transport failures
 *   (timeouts, connection errors, 408/429/502/503/504)
 * - JSON request/response helpers
 *
 * Native fetch; no retries unless `maxRetries` is raised above 0.
 */

import { logger } from './utils/logger.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Retry attempts after the first request (default: 0) */
  readonly maxRetries: number;

  /** Delay before the first retry in milliseconds (default: 500) */
  readonly initialDelayMs: number;

  /** Exponential backoff multiplier (default: 2) */
  readonly backoffMultiplier: number;

  /** Maximum delay between retries in milliseconds (default: 10000) */
  readonly maxDelayMs: number;

  /** Request timeout in milliseconds (default: 60000) */
  readonly timeoutMs: number;

  readonly userAgent: string;

  /** Jitter factor (0-1, default: 0.1) */
  readonly jitterFactor: number;

  /** Extra headers sent with every request */
  readonly headers: Readonly<Record<string, string>>;
}

export interface RequestOptions {
  readonly method?: 'GET' | 'POST';
  readonly body?: unknown;
  readonly timeoutMs?: number;
  readonly retries?: number;
}

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly url: string,
    public readonly responseText?: string
  ) {
    super(message);
    this.name = 'HTTPError';
  }
}

export class HTTPTimeoutError extends Error {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
    this.name = 'HTTPTimeoutError';
  }
}

export class HTTPNetworkError extends Error {
  constructor(
    public readonly url: string,
    public readonly cause: Error
  ) {
    super(`Network error: ${cause.message}`);
    this.name = 'HTTPNetworkError';
  }
}

export class HTTPJSONParseError extends Error {
  readonly responseText: string;

  constructor(
    public readonly url: string,
    responseText: string,
    public readonly cause: Error
  ) {
    super(`Failed to parse JSON response: ${cause.message}`);
    this.name = 'HTTPJSONParseError';
    this.responseText = responseText.slice(0, 500);
  }
}

const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([408, 429, 502, 503, 504]);

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;

  constructor(config?: Partial<HTTPClientConfig>) {
    this.config = {
      maxRetries: 0,
      initialDelayMs: 500,
      backoffMultiplier: 2,
      maxDelayMs: 10000,
      timeoutMs: 60000,
      userAgent: 'farm-profiles/0.1',
      jitterFactor: 0.1,
      headers: {},
      ...config,
    };
  }

  /**
   * Send a request and parse the JSON response
   *
   * @throws {HTTPError} For non-2xx responses
   * @throws {HTTPTimeoutError} If the request exceeds its timeout
   * @throws {HTTPNetworkError} For connection failures
   * @throws {HTTPJSONParseError} If the body is not JSON
   */
  async requestJSON(url: string, options: RequestOptions = {}): Promise<unknown> {
    const maxRetries = options.retries ?? this.config.maxRetries;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.attempt(url, options);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        if (attempt > maxRetries || !this.isRetryable(failure)) {
          throw failure;
        }

        logger.warn('HTTPClient attempt failed', {
          attempt,
          maxAttempts: maxRetries + 1,
          error: failure.message,
          url,
        });
        await this.sleep(this.calculateBackoffDelay(attempt));
      }
    }
  }

  private async attempt(url: string, options: RequestOptions): Promise<unknown> {
    const timeoutMs = options.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: options.method ?? (options.body === undefined ? 'GET' : 'POST'),
        headers: {
          'User-Agent': this.config.userAgent,
          Accept: 'application/json',
          ...(options.body === undefined ? {} : { 'Content-Type': 'application/json' }),
          ...this.config.headers,
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: controller.signal,
      });
      text = await response.text();
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }
      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }

    if (!response.ok) {
      throw new HTTPError(`HTTP ${response.status}: ${response.statusText}`, response.status, url, text);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new HTTPJSONParseError(url, text, error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Calculate exponential backoff delay with jitter
   */
  private calculateBackoffDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);
    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);
    const jitterRange = cappedDelay * this.config.jitterFactor;
    const jitter = Math.random() * 2 * jitterRange - jitterRange;

    return Math.max(0, Math.floor(cappedDelay + jitter));
  }

  private isRetryable(error: Error): boolean {
    if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
      return true;
    }
    if (error instanceof HTTPError) {
      return RETRYABLE_STATUSES.has(error.statusCode);
    }
    return false;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
