/**
 * Minimal HTTP GET client over the global fetch API.
 * Retries 5xx responses and network failures with exponential backoff.
 */

import { ConnectionError, errorMessage } from './errors';
import { logger } from './logger';

const log = logger.child('http');

export interface HttpResponse {
  status: number;
  body: Buffer;
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
}

export interface HttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}

/**
 * The subset of `fetch` this client uses, so tests can pass a stub.
 */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; signal: AbortSignal }
) => Promise<{ status: number; arrayBuffer(): Promise<ArrayBuffer> }>;

export interface FetchHttpClientOptions {
  timeoutMs: number;
  maxRetries: number;
  initialRetryDelayMs: number;
  retryBackoffFactor: number;
  userAgent: string;
  fetch?: FetchLike;
}

export class FetchHttpClient implements HttpClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: FetchHttpClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * GET a URL. 4xx responses are returned as-is; 5xx responses are returned
   * only after retries are exhausted.
   * @throws ConnectionError if every attempt failed without a response
   */
  async get(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    const { maxRetries, initialRetryDelayMs, retryBackoffFactor } = this.options;
    let lastResponse: HttpResponse | null = null;
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = initialRetryDelayMs * Math.pow(retryBackoffFactor, attempt - 1);
        log.debug(`Retrying GET ${url} in ${delay}ms (attempt ${attempt + 1}/${maxRetries + 1})`);
        await sleep(delay);
      }

      try {
        const response = await this.request(url, options);
        if (response.status < 500) {
          return response;
        }
        log.warn(`GET ${url} returned ${response.status}`);
        lastResponse = response;
        lastError = null;
      } catch (error) {
        log.warn(`GET ${url} failed`, { error: errorMessage(error) });
        lastResponse = null;
        lastError = error;
      }
    }

    if (lastResponse) {
      return lastResponse;
    }

    throw new ConnectionError(`GET ${url} failed after ${maxRetries + 1} attempt(s): ${errorMessage(lastError)}`, {
      cause: lastError,
    });
  }

  private async request(url: string, options: HttpRequestOptions): Promise<HttpResponse> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { 'user-agent': this.options.userAgent, ...options.headers },
        signal: controller.signal,
      });
      const body = Buffer.from(await response.arrayBuffer());
      return { status: response.status, body };
    } finally {
      clearTimeout(timer);
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
