/**
 * Request Throttle
 * Per-host spacing between requests: a random delay in [delayMin, delayMax],
 * raised to the site's crawl delay when it asks for more.
 */

import { env } from '../../config/env';
import type { RequestPacer } from '../crawling/crawling.types';
import { sleep as defaultSleep } from '../fetching/retry';
import { ThrottleConfig, ThrottleStats } from './rate-limit.types';

export class RequestThrottle implements RequestPacer {
  private readonly config: Required<ThrottleConfig>;
  private readonly lastRequestAt: Map<string, number> = new Map();
  private stats = {
    totalRequests: 0,
    delayedRequests: 0,
    totalDelayMs: 0,
  };

  constructor(config: Partial<ThrottleConfig> = {}) {
    const delayMin = Math.max(0, config.delayMin ?? env.REQUEST_DELAY_MIN);
    this.config = {
      delayMin,
      delayMax: Math.max(delayMin, config.delayMax ?? env.REQUEST_DELAY_MAX),
      now: config.now ?? Date.now,
      sleep: config.sleep ?? defaultSleep,
      random: config.random ?? Math.random,
    };
  }

  /**
   * Wait until the host of `url` may be requested again. The first request to a host never waits.
   */
  async wait(url: string, minDelayMs: number = 0): Promise<void> {
    const host = new URL(url).host;
    const { delayMin, delayMax, now, sleep, random } = this.config;

    this.stats.totalRequests++;

    const last = this.lastRequestAt.get(host);
    if (last !== undefined) {
      const interval = Math.max(minDelayMs, delayMin + random() * (delayMax - delayMin));
      const remaining = interval - (now() - last);
      if (remaining > 0) {
        this.stats.delayedRequests++;
        this.stats.totalDelayMs += remaining;
        await sleep(remaining);
      }
    }

    this.lastRequestAt.set(host, now());
  }

  getStats(): ThrottleStats {
    return {
      ...this.stats,
      activeHosts: this.lastRequestAt.size,
    };
  }

  reset(): void {
    this.lastRequestAt.clear();
    this.stats = {
      totalRequests: 0,
      delayedRequests: 0,
      totalDelayMs: 0,
    };
  }
}
