/**
 * Parsed Document
 * Converts markup into a navigable tree (cheerio) with three lookups:
 * first match, all matches, and CSS selectors.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { isTag } from 'domhandler';
import type { AnyNode } from 'domhandler';
import { resolveUrl } from '../crawling/url-normalizer';
import { ParseError } from '../fetching/errors';
import { PageElement, queryElements } from './element';
import { AttributeQuery } from './matcher';

export class ParsedDocument {
  readonly baseUrl?: string;
  private readonly $: CheerioAPI;

  constructor(markup: string | Buffer, baseUrl?: string) {
    const html = typeof markup === 'string' ? markup : markup.toString('utf-8');
    this.$ = cheerio.load(html);
    this.baseUrl = this.resolveBaseUrl(baseUrl);
  }

  get title(): string {
    return this.$('title').first().text().trim();
  }

  /**
   * First descendant with the given tag name ('*' for any) whose attributes match
   */
  find(tag: string, attrs?: AttributeQuery): PageElement | null {
    const [first] = queryElements(this.$.root(), tag, attrs, 1);
    return first ? new PageElement(this.$, first, this.baseUrl) : null;
  }

  /**
   * Every matching descendant in document order, optionally capped at `limit`
   */
  findAll(tag: string, attrs?: AttributeQuery, limit?: number): PageElement[] {
    return queryElements(this.$.root(), tag, attrs, limit).map(
      (node) => new PageElement(this.$, node, this.baseUrl)
    );
  }

  select(selector: string): PageElement[] {
    let nodes: AnyNode[];
    try {
      nodes = this.$(selector).toArray();
    } catch (error: unknown) {
      throw new ParseError(`Invalid CSS selector "${selector}"`, this.baseUrl, error);
    }
    return nodes.filter(isTag).map((node) => new PageElement(this.$, node, this.baseUrl));
  }

  selectOne(selector: string): PageElement | null {
    const [first] = this.select(selector);
    return first ?? null;
  }

  /**
   * Visible text of the body with scripts and styles excluded, whitespace collapsed
   */
  text(): string {
    const body = this.$('body').clone();
    body.find('script, style, noscript').remove();
    return body.text().replace(/\s+/g, ' ').trim();
  }

  /**
   * Absolute, de-duplicated hrefs of every anchor, in document order
   */
  links(): string[] {
    const seen = new Set<string>();
    for (const anchor of this.findAll('a', { href: true })) {
      const href = anchor.absoluteUrl('href');
      if (!href || href.startsWith('javascript:') || href.startsWith('mailto:')) continue;
      seen.add(href);
    }
    return Array.from(seen);
  }

  html(): string {
    return this.$.html();
  }

  /**
   * A <base href> in the document takes precedence over the fetch URL
   */
  private resolveBaseUrl(baseUrl?: string): string | undefined {
    const baseHref = this.$('base[href]').first().attr('href');
    if (baseHref && baseUrl) {
      return resolveUrl(baseHref, baseUrl);
    }
    if (baseHref && /^https?:\/\//i.test(baseHref)) {
      return baseHref;
    }
    return baseUrl;
  }
}

export function parseDocument(markup: string | Buffer, baseUrl?: string): ParsedDocument {
  return new ParsedDocument(markup, baseUrl);
}
