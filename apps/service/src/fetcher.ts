import { setTimeout as delay } from 'node:timers/promises';

import { HttpUrlSchema, TransportFailure, describeError } from '@shopscout/core';

import { silentLogger, type ServiceLogger } from './logger.js';

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'user-agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'accept-language': 'en-IN,en;q=0.9'
};

export interface FetchedPage {
  readonly url: string;
  /** URL after redirects. */
  readonly finalUrl: string;
  readonly status: number;
  readonly html: string;
}

export interface FetchPageOptions {
  readonly signal?: AbortSignal;
}

export interface PageFetcher {
  fetchPage(url: string, options?: FetchPageOptions): Promise<FetchedPage>;
}

export interface HttpPageFetcherOptions {
  readonly timeoutMs: number;
  readonly attempts: number;
  /** Delay before the second attempt; doubles after each further failure. */
  readonly backoffMs?: number;
  readonly logger?: ServiceLogger;
}

const isRetryableStatus = (status: number): boolean => status === 429 || status >= 500;

class RetryableFetchError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
  }
}

export class HttpPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly attempts: number;
  private readonly backoffMs: number;
  private readonly logger: ServiceLogger;

  constructor(options: HttpPageFetcherOptions) {
    this.timeoutMs = options.timeoutMs;
    this.attempts = Math.max(1, options.attempts);
    this.backoffMs = options.backoffMs ?? 500;
    this.logger = options.logger ?? silentLogger;
  }

  async fetchPage(url: string, options: FetchPageOptions = {}): Promise<FetchedPage> {
    const parsed = HttpUrlSchema.safeParse(url);
    if (!parsed.success) {
      throw new TransportFailure(`Cannot fetch "${url}": not an absolute http(s) URL`, { subject: url });
    }

    let lastError: unknown;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= this.attempts; attempt += 1) {
      if (options.signal?.aborted) {
        throw new TransportFailure(`Fetch of ${url} was cancelled`, { subject: url, cause: options.signal.reason });
      }

      try {
        return await this.attemptFetch(parsed.data, options.signal);
      } catch (error) {
        if (!(error instanceof RetryableFetchError)) {
          throw error;
        }
        lastError = error;
        lastStatus = error.status;
        this.logger.debug('Page fetch attempt failed', { url, attempt, reason: error.message });
      }

      if (attempt < this.attempts && this.backoffMs > 0) {
        await delay(this.backoffMs * 2 ** (attempt - 1), undefined, { signal: options.signal }).catch(
          (error: unknown) => {
            throw new TransportFailure(`Fetch of ${url} was cancelled`, { subject: url, cause: error });
          }
        );
      }
    }

    throw new TransportFailure(
      `Failed to fetch ${url} after ${this.attempts} attempt(s): ${describeError(lastError)}`,
      { subject: url, status: lastStatus, cause: lastError }
    );
  }

  private async attemptFetch(url: string, external: AbortSignal | undefined): Promise<FetchedPage> {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    const signal = external ? AbortSignal.any([external, timeout]) : timeout;

    let response: Response;
    let html: string;
    try {
      response = await fetch(url, { headers: BROWSER_HEADERS, redirect: 'follow', signal });
      if (!response.ok) {
        await response.body?.cancel();
        const message = `${response.status} ${response.statusText}`.trim();
        if (isRetryableStatus(response.status)) {
          throw new RetryableFetchError(message, response.status);
        }
        throw new TransportFailure(`Failed to fetch ${url}: ${message}`, { subject: url, status: response.status });
      }
      html = await response.text();
    } catch (error) {
      if (error instanceof RetryableFetchError || error instanceof TransportFailure) {
        throw error;
      }
      if (external?.aborted) {
        throw new TransportFailure(`Fetch of ${url} was cancelled`, { subject: url, cause: error });
      }
      if (timeout.aborted) {
        throw new RetryableFetchError(`timed out after ${this.timeoutMs}ms`);
      }
      throw new RetryableFetchError(describeError(error));
    }

    return {
      url,
      finalUrl: response.url || url,
      status: response.status,
      html
    };
  }
}
