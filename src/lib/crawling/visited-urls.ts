import { normalizeUrl } from './url-normalizer';

/**
 * Pages a crawl has already requested, keyed by normalized URL
 */
export class VisitedUrls {
  private readonly urls = new Set<string>();

  /**
   * Record a visit. Returns false when the URL was seen before.
   */
  visit(url: string): boolean {
    const normalized = normalizeUrl(url);
    if (this.urls.has(normalized)) return false;
    this.urls.add(normalized);
    return true;
  }

  list(): string[] {
    return [...this.urls];
  }
}
