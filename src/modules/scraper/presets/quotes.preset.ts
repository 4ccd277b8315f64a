/**
 * Quotes listing preset
 * Each `.quote` block carries the quote text, its author and a list of tags;
 * pages are chained by an `li.next a` link.
 */

import type { Row } from '../../../lib/storage/storage.types';
import type { ScrapeJob } from '../scraper.types';

export const QUOTES_START_URL = 'https://quotes.toscrape.com/';

export const QUOTE_COLUMNS = ['text', 'author', 'tags', 'authorUrl'];

export function quotesJob(startUrl: string = QUOTES_START_URL, maxPages?: number): ScrapeJob {
  return {
    startUrl,
    itemSelector: '.quote',
    fields: {
      text: { selector: '.text', transforms: ['stripQuotes'] },
      author: { selector: '.author' },
      tags: { selector: '.tags .tag', joinWith: ', ' },
      authorUrl: { selector: 'a[href*="/author/"]', attribute: 'href', absolute: true },
    },
    nextSelector: 'li.next a',
    maxPages,
  };
}

export function formatQuote(row: Row): string {
  const tags = row.tags ? ` [${row.tags}]` : '';
  return `“${row.text}” — ${row.author}${tags}`;
}
