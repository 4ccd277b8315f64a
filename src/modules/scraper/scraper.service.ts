/**
 * Scraper Service
 * Paginate -> extract -> clean -> store, one page at a time
 */

import { env } from '../../config/env';
import type { PageFetcher, RequestPacer, UrlPolicy } from '../../lib/crawling/crawling.types';
import { paginate, Paginator } from '../../lib/crawling/paginator';
import { isHttpUrl } from '../../lib/crawling/url-normalizer';
import { detectBlocking } from '../../lib/fetching/errors';
import { Fetcher } from '../../lib/fetching/fetcher';
import { createLogger } from '../../lib/logger';
import { RequestThrottle } from '../../lib/rate-limit/request-throttle';
import { RobotsPolicy } from '../../lib/robots/robots.policy';
import type { RowSink } from '../../lib/storage/storage.types';
import { extractRows } from './scraper.extractor';
import { ProgressListener, ScrapeJob, ScrapeReport, ScrapeStatus } from './scraper.types';

const logger = createLogger('Scraper');

export interface ScraperDependencies {
  fetcher?: PageFetcher;
  robots?: UrlPolicy;
  throttle?: RequestPacer;
}

export function validateJob(job: ScrapeJob): void {
  if (!isHttpUrl(job.startUrl)) {
    throw new Error(`Invalid scrape job: startUrl "${job.startUrl}" is not an http(s) URL`);
  }
  if (!job.itemSelector.trim()) {
    throw new Error('Invalid scrape job: itemSelector is empty');
  }
  if (Object.keys(job.fields).length === 0) {
    throw new Error('Invalid scrape job: no fields defined');
  }
}

export class ScraperService {
  private readonly fetcher: PageFetcher;
  private readonly robots: UrlPolicy;
  private readonly throttle: RequestPacer;

  constructor(deps: ScraperDependencies = {}) {
    this.fetcher = deps.fetcher ?? new Fetcher();
    this.robots = deps.robots ?? new RobotsPolicy();
    this.throttle = deps.throttle ?? new RequestThrottle();
  }

  /**
   * Run a job to completion, writing every page's rows to `sink`. The sink is
   * closed whether or not the run succeeds.
   */
  async run(job: ScrapeJob, sink: RowSink, onProgress?: ProgressListener): Promise<ScrapeReport> {
    const startTime = Date.now();
    const respectRobots = job.respectRobots ?? env.RESPECT_ROBOTS_TXT;

    let rows = 0;
    let paginator: Paginator;
    try {
      validateJob(job);
      paginator = paginate(job.startUrl, {
        fetcher: this.fetcher,
        selector: job.nextSelector,
        maxPages: job.maxPages,
        robots: respectRobots ? this.robots : undefined,
        throttle: this.throttle,
        onError: 'stop',
      });

      for await (const result of paginator.pages()) {
        const pageRows = extractRows(result.document, job);
        if (pageRows.length === 0) {
          const blocked = detectBlocking(result.page.text);
          logger.warn(
            blocked
              ? `No items on ${result.url}: ${blocked.message}`
              : `No items matched "${job.itemSelector}" on ${result.url}`
          );
        }

        await sink.write(pageRows);
        rows += pageRows.length;
        onProgress?.({ url: result.url, pageNumber: result.pageNumber, rows: pageRows.length });
      }
    } finally {
      await sink.close();
    }

    const summary = paginator.summary;
    let status = ScrapeStatus.COMPLETED;
    if (summary.error) {
      status = summary.pagesVisited > 0 ? ScrapeStatus.PARTIAL : ScrapeStatus.FAILED;
    }

    const report: ScrapeReport = {
      status,
      rows,
      pages: summary.pagesVisited,
      visitedUrls: summary.visitedUrls,
      stoppedBecause: summary.stoppedBecause,
      error: summary.error,
      durationMs: Date.now() - startTime,
    };

    logger.info(
      `Scrape ${status}: ${rows} rows from ${report.pages} pages in ${report.durationMs}ms (stopped: ${report.stoppedBecause})`
    );

    return report;
  }
}
