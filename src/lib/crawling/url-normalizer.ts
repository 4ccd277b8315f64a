/**
 * URL Normalization Utilities
 * Functions for normalizing, resolving and comparing URLs
 */

/**
 * Normalize a URL by removing fragments, sorting query params, etc.
 * Returns the input unchanged when it cannot be parsed.
 */
export function normalizeUrl(url: string, baseUrl?: string): string {
  try {
    const urlObj = baseUrl ? new URL(url, baseUrl) : new URL(url);

    urlObj.hash = '';

    // Sort query parameters
    const sortedParams = Array.from(urlObj.searchParams.entries()).sort(([a], [b]) => a.localeCompare(b));
    urlObj.search = '';
    sortedParams.forEach(([key, value]) => {
      urlObj.searchParams.append(key, value);
    });

    // Remove trailing slash (except for root)
    const pathname = urlObj.pathname;
    if (pathname.length > 1 && pathname.endsWith('/')) {
      urlObj.pathname = pathname.slice(0, -1);
    }

    urlObj.hostname = urlObj.hostname.toLowerCase();

    return urlObj.href;
  } catch {
    return url;
  }
}

/**
 * Resolve relative URL to absolute
 */
export function resolveUrl(url: string, baseUrl: string): string {
  try {
    return new URL(url, baseUrl).href;
  } catch {
    return url;
  }
}

/**
 * Extract domain from URL, without a leading www.
 */
export function extractDomain(url: string): string {
  try {
    let hostname = new URL(url).hostname.toLowerCase();
    if (hostname.startsWith('www.')) {
      hostname = hostname.substring(4);
    }
    return hostname;
  } catch {
    return '';
  }
}

/**
 * Check if two URLs are from the same domain
 */
export function isSameDomain(url1: string, url2: string): boolean {
  const domain1 = extractDomain(url1);
  return domain1 !== '' && domain1 === extractDomain(url2);
}

/**
 * Absolute http(s) URL check
 */
export function isHttpUrl(url: string): boolean {
  try {
    const { protocol } = new URL(url);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * scheme://host[:port] of a URL
 */
export function originOf(url: string): string {
  return new URL(url).origin;
}
