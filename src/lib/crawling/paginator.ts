/**
 * Paginator
 * Repeats fetch + parse, following the next link until it is absent.
 * Bounded by maxPages and guarded against cycles.
 */

import { env } from '../../config/env';
import { RobotsDisallowedError } from '../fetching/errors';
import { createLogger } from '../logger';
import { parseDocument } from '../parsing/document';
import {
  PageResult,
  PaginationErrorMode,
  PaginationOptions,
  PaginationSummary,
  StopReason,
} from './crawling.types';
import { VisitedUrls } from './visited-urls';
import { findNextLink } from './next-link';

const logger = createLogger('Paginator');

export class Paginator {
  private readonly startUrl: string;
  private readonly options: PaginationOptions;
  private readonly maxPages: number;
  private readonly onError: PaginationErrorMode;
  private readonly visited = new VisitedUrls();
  private pagesVisited = 0;
  private stoppedBecause: StopReason | null = null;
  private error?: Error;

  constructor(startUrl: string, options: PaginationOptions) {
    const maxPages = options.maxPages ?? env.MAX_PAGES;
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      throw new RangeError(`maxPages must be a positive integer, got ${maxPages}`);
    }

    this.startUrl = startUrl;
    this.options = options;
    this.maxPages = maxPages;
    this.onError = options.onError ?? 'stop';
  }

  get summary(): PaginationSummary {
    return {
      pagesVisited: this.pagesVisited,
      visitedUrls: this.visited.list(),
      stoppedBecause: this.stoppedBecause,
      error: this.error,
    };
  }

  async *pages(): AsyncGenerator<PageResult, PaginationSummary> {
    let url: string | null = this.startUrl;

    while (url !== null) {
      if (!this.visited.visit(url)) {
        logger.warn(`Next link ${url} was already visited, stopping`);
        return this.stop('cycle');
      }

      if (!(await this.checkRobots(url))) {
        return this.stop('robots');
      }

      await this.pace(url);

      let result: PageResult;
      try {
        const page = await this.options.fetcher.fetch(url);
        if (page.finalUrl !== url) {
          this.visited.visit(page.finalUrl);
        }
        this.pagesVisited++;
        result = {
          url,
          pageNumber: this.pagesVisited,
          page,
          document: parseDocument(page.text, page.finalUrl),
        };
      } catch (error: unknown) {
        if (this.onError === 'throw') throw error;
        this.error = error instanceof Error ? error : new Error(String(error));
        logger.error(`Failed to fetch ${url}: ${this.error.message}`);
        return this.stop('error');
      }

      logger.info(`Page ${result.pageNumber}: ${url}`);
      yield result;

      const next = findNextLink(result.document, this.options);
      if (next === null) {
        return this.stop('no-next-link');
      }
      if (this.pagesVisited >= this.maxPages) {
        logger.warn(`Reached maxPages (${this.maxPages}), not following ${next}`);
        return this.stop('max-pages');
      }
      url = next;
    }

    return this.summary;
  }

  private async checkRobots(url: string): Promise<boolean> {
    if (!this.options.robots) return true;
    if (await this.options.robots.isAllowed(url)) return true;

    if (this.onError === 'throw') {
      throw new RobotsDisallowedError(url);
    }
    this.error = new RobotsDisallowedError(url);
    logger.warn(this.error.message);
    return false;
  }

  private async pace(url: string): Promise<void> {
    if (!this.options.throttle) return;
    const crawlDelay = this.options.robots ? await this.options.robots.getCrawlDelay(url) : null;
    await this.options.throttle.wait(url, crawlDelay === null ? undefined : crawlDelay * 1000);
  }

  private stop(reason: StopReason): PaginationSummary {
    this.stoppedBecause = reason;
    return this.summary;
  }
}

/**
 * Iterate the pages of a paginated listing starting at `startUrl`
 */
export function paginate(startUrl: string, options: PaginationOptions): Paginator {
  return new Paginator(startUrl, options);
}
