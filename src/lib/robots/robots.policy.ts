/**
 * Robots.txt Policy
 *
 * 1. Obey the rules of the group naming our agent, else `User-agent: *`
 * 2. robots.txt answering 4xx (except 429): everything allowed
 * 3. 5xx, 429 or network failure: everything disallowed (fail closed)
 * 4. Rules are cached per origin for ROBOTS_CACHE_TTL
 * 5. Crawl-delay is capped at maxCrawlDelay seconds (60 by default)
 */

import { env } from '../../config/env';
import type { PageFetcher, UrlPolicy } from '../crawling/crawling.types';
import { originOf } from '../crawling/url-normalizer';
import { Fetcher } from '../fetching/fetcher';
import { HttpError } from '../fetching/errors';
import { createLogger } from '../logger';
import { ALLOW_ALL, DISALLOW_ALL, isPathAllowed, parseRobotsTxt, RobotsRules } from './robots.parser';

const logger = createLogger('Robots');

export interface RobotsPolicyOptions {
  /** Product token matched against User-agent lines */
  userAgentName?: string;
  /** Cache TTL in ms */
  cacheTtlMs?: number;
  fetcher?: PageFetcher;
  now?: () => number;
  /** Upper bound for Crawl-delay, in seconds */
  maxCrawlDelay?: number;
}

const DEFAULT_MAX_CRAWL_DELAY = 60;

interface CachedRules {
  rules: RobotsRules;
  cachedAt: number;
}

/**
 * First product token of a User-Agent header: "scrapekit/1.0 (+url)" -> "scrapekit"
 */
export function productToken(userAgent: string): string {
  const compatible = /compatible;\s*([A-Za-z0-9_-]+)/i.exec(userAgent);
  if (compatible) return compatible[1];
  const [first] = userAgent.trim().split(/[\s/]/);
  return first || userAgent;
}

export class RobotsPolicy implements UrlPolicy {
  private readonly userAgentName: string;
  private readonly cacheTtlMs: number;
  private readonly fetcher: PageFetcher;
  private readonly now: () => number;
  private readonly maxCrawlDelay: number;
  private readonly cache = new Map<string, CachedRules>();

  constructor(options: RobotsPolicyOptions = {}) {
    this.userAgentName = options.userAgentName ?? productToken(env.USER_AGENT);
    this.cacheTtlMs = options.cacheTtlMs ?? env.ROBOTS_CACHE_TTL;
    this.fetcher = options.fetcher ?? new Fetcher({ retry: { maxRetries: 1 } });
    this.now = options.now ?? Date.now;
    this.maxCrawlDelay = options.maxCrawlDelay ?? DEFAULT_MAX_CRAWL_DELAY;
  }

  async isAllowed(url: string): Promise<boolean> {
    const urlObj = new URL(url);
    const rules = await this.getRules(urlObj.origin);
    return isPathAllowed(rules, urlObj.pathname + urlObj.search);
  }

  /**
   * Crawl-delay (seconds) declared for our agent, or null
   */
  async getCrawlDelay(url: string): Promise<number | null> {
    const { crawlDelay } = await this.getRules(originOf(url));
    if (crawlDelay !== null && crawlDelay > this.maxCrawlDelay) {
      logger.warn(`Crawl-delay ${crawlDelay}s for ${originOf(url)} capped at ${this.maxCrawlDelay}s`);
      return this.maxCrawlDelay;
    }
    return crawlDelay;
  }

  async getSitemaps(url: string): Promise<string[]> {
    const rules = await this.getRules(originOf(url));
    return rules.sitemaps;
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async getRules(origin: string): Promise<RobotsRules> {
    const cached = this.cache.get(origin);
    const now = this.now();

    if (cached && now - cached.cachedAt < this.cacheTtlMs) {
      return cached.rules;
    }

    const rules = await this.fetchRules(origin);
    this.cache.set(origin, { rules, cachedAt: now });
    return rules;
  }

  private async fetchRules(origin: string): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`;

    try {
      const page = await this.fetcher.fetch(robotsUrl);
      return parseRobotsTxt(page.text, this.userAgentName);
    } catch (error: unknown) {
      if (error instanceof HttpError && error.statusCode >= 400 && error.statusCode < 500 && error.statusCode !== 429) {
        logger.debug(`${robotsUrl} returned ${error.statusCode}, allowing all paths`);
        return ALLOW_ALL;
      }

      const reason = error instanceof Error ? error.message : String(error);
      logger.warn(`${robotsUrl} unreachable (${reason}), disallowing all paths`);
      return DISALLOW_ALL;
    }
  }
}
