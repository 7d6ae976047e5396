/**
 * HTTP page fetcher
 *
 * GET through an undici Agent with certificate checks disabled (several
 * department hosts serve incomplete chains). Supports timeout, size ceiling,
 * retries for transient failures and legacy Korean charsets.
 */

import * as cheerio from 'cheerio';
import pRetry from 'p-retry';
import { Agent, fetch as undiciFetch } from 'undici';
import type { Dispatcher, Response } from 'undici';
import { FetchError, toErrorMessage } from '../utils/errors';
import { logger as rootLogger, type Logger } from '../utils/logger';
import { decodeBody } from './decode';
import { DEFAULT_FETCH_HEADERS, type FetchOptions, type FetchedPage, type PageFetcher } from './types';

export interface HttpPageFetcherOptions {
  timeoutMs?: number;
  maxBytes?: number;
  /** Retries after the first attempt */
  retries?: number;
  retryDelayMs?: number;
  /** Injected in tests with an undici MockAgent */
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_BYTES = 5 * 1024 * 1024;

export class HttpPageFetcher implements PageFetcher {
  private readonly timeoutMs: number;
  private readonly maxBytes: number;
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly dispatcher: Dispatcher;
  private readonly logger: Logger;

  constructor(options: HttpPageFetcherOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    this.retries = options.retries ?? 2;
    this.retryDelayMs = options.retryDelayMs ?? 1_000;
    this.dispatcher = options.dispatcher ?? new Agent({ connect: { rejectUnauthorized: false } });
    this.logger = options.logger ?? rootLogger.child('[http]');
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    const headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) };

    return pRetry(
      async () => {
        try {
          return await this.fetchOnce(url, headers);
        } catch (error) {
          const fetchError = error instanceof FetchError ? error : this.toFetchError(url, error);
          if (!fetchError.retryable) {
            throw new pRetry.AbortError(fetchError);
          }
          throw fetchError;
        }
      },
      {
        retries: this.retries,
        minTimeout: this.retryDelayMs,
        factor: 2,
        onFailedAttempt: error => {
          this.logger.warn(`Attempt ${error.attemptNumber} failed for ${url}: ${error.message}`, {
            retriesLeft: error.retriesLeft,
          });
        },
      }
    );
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(url: string, headers: Record<string, string>): Promise<FetchedPage> {
    let response: Response;
    try {
      response = await undiciFetch(url, {
        method: 'GET',
        headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      throw this.toFetchError(url, error);
    }

    if (!response.ok) {
      await response.body?.cancel().catch(() => undefined);
      throw new FetchError(`HTTP ${response.status} fetching ${url}`, {
        url,
        reason: 'status',
        statusCode: response.status,
      });
    }

    const contentLength = response.headers.get('content-length');
    if (contentLength && parseInt(contentLength, 10) > this.maxBytes) {
      await response.body?.cancel().catch(() => undefined);
      throw new FetchError(`Response too large: ${contentLength} bytes from ${url}`, {
        url,
        reason: 'too_large',
        statusCode: response.status,
      });
    }

    let bytes: Uint8Array;
    try {
      bytes = await this.readBodyWithLimit(response, url);
    } catch (error) {
      throw error instanceof FetchError ? error : this.toFetchError(url, error);
    }

    const body = decodeBody(bytes, response.headers.get('content-type'));
    const finalUrl = response.url || url;
    return { url: finalUrl, body, $: cheerio.load(body) };
  }

  /**
   * Read response body, aborting once it passes the size ceiling.
   */
  private async readBodyWithLimit(response: Response, url: string): Promise<Uint8Array> {
    const reader = response.body?.getReader();
    if (!reader) {
      return new Uint8Array(0);
    }

    const chunks: Uint8Array[] = [];
    let totalSize = 0;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        if (!(value instanceof Uint8Array)) continue;

        totalSize += value.byteLength;
        if (totalSize > this.maxBytes) {
          await reader.cancel();
          throw new FetchError(`Response exceeded ${this.maxBytes} bytes from ${url}`, {
            url,
            reason: 'too_large',
            statusCode: response.status,
          });
        }
        chunks.push(value);
      }
    } finally {
      reader.releaseLock();
    }

    return Buffer.concat(chunks);
  }

  private toFetchError(url: string, error: unknown): FetchError {
    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new FetchError(`Request timed out after ${this.timeoutMs}ms: ${url}`, {
        url,
        reason: 'timeout',
        cause: error,
      });
    }
    const cause = error instanceof Error && error.cause !== undefined ? error.cause : error;
    return new FetchError(`Network error fetching ${url}: ${toErrorMessage(cause)}`, {
      url,
      reason: 'network',
      cause: error,
    });
  }
}
