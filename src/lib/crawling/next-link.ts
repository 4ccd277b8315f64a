/**
 * Next-link discovery for paginated listings
 */

import type { ParsedDocument } from '../parsing/document';
import type { PageElement } from '../parsing/element';
import type { NextLinkOptions } from './crawling.types';
import { isHttpUrl } from './url-normalizer';

const REL_NEXT_SELECTOR = 'link[rel~="next"], a[rel~="next"]';

/**
 * Absolute URL of the next page, or null when the listing has no further page
 */
export function findNextLink(doc: ParsedDocument, options: NextLinkOptions = {}): string | null {
  const attribute = options.attribute ?? 'href';

  let element: PageElement | null;
  if (options.selector) {
    element = doc.selectOne(options.selector);
  } else {
    element = doc.selectOne(REL_NEXT_SELECTOR);
  }

  if (!element) return null;

  const raw = element.attr(attribute)?.trim();
  if (!raw || raw.startsWith('#') || raw.toLowerCase().startsWith('javascript:')) {
    return null;
  }

  const url = element.absoluteUrl(attribute);
  return url && isHttpUrl(url) ? url : null;
}
