/**
 * Request Headers
 * Default headers identifying the scraper to the sites it visits
 */

import { env } from '../../config/env';

export const DEFAULT_ACCEPT = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8';
export const DEFAULT_ACCEPT_LANGUAGE = 'en-US,en;q=0.9';

/**
 * Build request headers, letting caller overrides win. Header names are
 * matched case-insensitively so `user-agent` replaces the default `User-Agent`.
 */
export function buildRequestHeaders(
  overrides: Record<string, string> = {},
  userAgent: string = env.USER_AGENT
): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': userAgent,
    'Accept': DEFAULT_ACCEPT,
    'Accept-Language': DEFAULT_ACCEPT_LANGUAGE,
  };

  for (const [name, value] of Object.entries(overrides)) {
    const existing = Object.keys(headers).find((key) => key.toLowerCase() === name.toLowerCase());
    if (existing) {
      delete headers[existing];
    }
    headers[name] = value;
  }

  return headers;
}

/**
 * Extract the charset parameter from a Content-Type header
 */
export function charsetFromContentType(contentType: string | null): string | null {
  if (!contentType) return null;
  const match = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType);
  return match ? match[1].toLowerCase() : null;
}
