/**
 * Crawling Types
 * Type definitions for following "next" links across paginated listings
 */

import type { FetchedPage } from '../fetching/fetcher';
import type { ParsedDocument } from '../parsing/document';

export interface PageFetcher {
  fetch(url: string): Promise<FetchedPage>;
}

/**
 * robots.txt gate consulted before every request
 */
export interface UrlPolicy {
  isAllowed(url: string): Promise<boolean>;
  /** Crawl delay in seconds, or null when the site sets none */
  getCrawlDelay(url: string): Promise<number | null>;
}

export interface RequestPacer {
  wait(url: string, minDelayMs?: number): Promise<void>;
}

export interface NextLinkOptions {
  /**
   * CSS selector of the element carrying the next link.
   * When omitted, `link[rel=next]` and `a[rel=next]` are tried.
   */
  selector?: string;

  /**
   * Attribute holding the URL
   */
  attribute?: string;
}

export type PaginationErrorMode = 'stop' | 'throw';

export interface PaginationOptions extends NextLinkOptions {
  fetcher: PageFetcher;

  /**
   * Maximum pages to fetch
   */
  maxPages?: number;

  /**
   * What to do when a page fails to fetch mid-loop.
   * 'stop' ends iteration and records the error on the summary.
   */
  onError?: PaginationErrorMode;

  robots?: UrlPolicy;
  throttle?: RequestPacer;
}

export interface PageResult {
  url: string;
  pageNumber: number;
  page: FetchedPage;
  document: ParsedDocument;
}

export type StopReason = 'no-next-link' | 'max-pages' | 'cycle' | 'error' | 'robots';

export interface PaginationSummary {
  pagesVisited: number;
  visitedUrls: string[];
  stoppedBecause: StopReason | null;
  error?: Error;
}
