/**
 * HTTP Fetcher
 * Single GET requests with a timeout, decoded into a FetchedPage.
 * Uses native fetch; the implementation is injectable so tests never touch the network.
 */

import { env } from '../../config/env';
import { createLogger } from '../logger';
import { HttpError, NetworkError, parseRetryAfter, TimeoutError } from './errors';
import { buildRequestHeaders, charsetFromContentType } from './headers';
import { RetryOptions, withRetry } from './retry';

const logger = createLogger('Fetcher');

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface FetchOptions {
  timeout?: number;
  headers?: Record<string, string>;
  userAgent?: string;
  fetchImpl?: FetchLike;
}

export interface FetchedPage {
  url: string;
  finalUrl: string;
  statusCode: number;
  headers: Record<string, string>;
  contentType: string;
  body: Buffer;
  text: string;
  durationMs: number;
}

/**
 * Decode a response body using the charset from Content-Type (UTF-8 when absent or unknown)
 */
export function decodeBody(body: Buffer, contentType: string | null): string {
  const charset = charsetFromContentType(contentType) ?? 'utf-8';
  try {
    return new TextDecoder(charset).decode(body);
  } catch {
    logger.warn(`Unknown charset "${charset}", decoding as UTF-8`);
    return new TextDecoder('utf-8').decode(body);
  }
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, name) => {
    record[name] = value;
  });
  return record;
}

/**
 * Issue one GET request. Resolves with the page on 2xx; rejects with
 * HttpError for any other status and NetworkError/TimeoutError when no
 * response arrives.
 */
export async function fetchPage(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
  const timeout = options.timeout ?? env.HTTP_TIMEOUT;
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);
  const startTime = Date.now();

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'GET',
      headers: buildRequestHeaders(options.headers, options.userAgent),
      redirect: 'follow',
      signal: controller.signal,
    });
  } catch (error: unknown) {
    clearTimeout(timeoutId);
    if (controller.signal.aborted) {
      throw new TimeoutError(url, timeout, error);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkError(url, `Request to ${url} failed: ${reason}`, error);
  }

  try {
    if (!response.ok) {
      // Drain the body so the connection can be reused
      await response.arrayBuffer().catch(() => undefined);
      throw new HttpError(url, response.status, response.statusText, parseRetryAfter(response.headers.get('retry-after')));
    }

    const body = Buffer.from(await response.arrayBuffer());
    const contentType = response.headers.get('content-type');
    const durationMs = Date.now() - startTime;

    logger.debug(`GET ${url} -> ${response.status} (${body.length} bytes, ${durationMs}ms)`);

    return {
      url,
      finalUrl: response.url || url,
      statusCode: response.status,
      headers: headersToRecord(response.headers),
      contentType: contentType || 'text/html',
      body,
      text: decodeBody(body, contentType),
      durationMs,
    };
  } catch (error: unknown) {
    if (error instanceof HttpError) throw error;
    if (controller.signal.aborted) {
      throw new TimeoutError(url, timeout, error);
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkError(url, `Reading response from ${url} failed: ${reason}`, error);
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface FetcherOptions extends FetchOptions {
  retry?: RetryOptions;
}

/**
 * Fetcher with shared defaults and retry of retryable failures
 */
export class Fetcher {
  private readonly options: FetcherOptions;

  constructor(options: FetcherOptions = {}) {
    this.options = options;
  }

  async fetch(url: string, overrides: FetchOptions = {}): Promise<FetchedPage> {
    const options: FetchOptions = {
      ...this.options,
      ...overrides,
      headers: { ...this.options.headers, ...overrides.headers },
    };

    return withRetry(() => fetchPage(url, options), {
      ...this.options.retry,
      onRetry: (error, attempt, delay) => {
        logger.warn(`Retrying ${url} (attempt ${attempt} failed: ${error.message}) in ${Math.round(delay)}ms`);
        this.options.retry?.onRetry?.(error, attempt, delay);
      },
    });
  }
}
