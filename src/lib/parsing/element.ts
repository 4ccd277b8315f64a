/**
 * Page Element
 * Navigable wrapper around a single cheerio-selected element
 */

import type { Cheerio, CheerioAPI } from 'cheerio';
import { isTag } from 'domhandler';
import type { AnyNode, Element } from 'domhandler';
import { resolveUrl } from '../crawling/url-normalizer';
import { ParseError } from '../fetching/errors';
import { AttributeQuery, matchesAttributes, tagSelector } from './matcher';

/**
 * Collect elements under `scope` that match tag and attributes, in document order
 */
export function queryElements<T extends AnyNode>(
  scope: Cheerio<T>,
  tag: string,
  attrs?: AttributeQuery,
  limit?: number
): Element[] {
  const matches: Element[] = [];
  const candidates = scope.find(tagSelector(tag)).toArray();

  for (const node of candidates) {
    if (!isTag(node)) continue;
    if (!matchesAttributes(node, attrs)) continue;
    matches.push(node);
    if (limit !== undefined && matches.length >= limit) break;
  }

  return matches;
}

export class PageElement {
  private readonly $: CheerioAPI;
  private readonly node: Element;
  private readonly baseUrl?: string;

  constructor($: CheerioAPI, node: Element, baseUrl?: string) {
    this.$ = $;
    this.node = node;
    this.baseUrl = baseUrl;
  }

  get tagName(): string {
    return this.node.tagName.toLowerCase();
  }

  get attrs(): Record<string, string> {
    return { ...this.node.attribs };
  }

  attr(name: string): string | null {
    return this.node.attribs[name.toLowerCase()] ?? null;
  }

  hasClass(className: string): boolean {
    return this.selection().hasClass(className);
  }

  /**
   * Text content of the element and its descendants, trimmed
   */
  text(): string {
    return this.selection().text().trim();
  }

  html(): string {
    return this.selection().html() ?? '';
  }

  outerHtml(): string {
    return this.$.html(this.node);
  }

  /**
   * Attribute value resolved against the document URL (href, src, ...)
   */
  absoluteUrl(attribute: string = 'href'): string | null {
    const value = this.attr(attribute);
    if (value === null || value.trim() === '') return null;
    return this.baseUrl ? resolveUrl(value.trim(), this.baseUrl) : value.trim();
  }

  find(tag: string, attrs?: AttributeQuery): PageElement | null {
    const [first] = queryElements(this.selection(), tag, attrs, 1);
    return first ? this.wrap(first) : null;
  }

  findAll(tag: string, attrs?: AttributeQuery, limit?: number): PageElement[] {
    return queryElements(this.selection(), tag, attrs, limit).map((node) => this.wrap(node));
  }

  select(selector: string): PageElement[] {
    let nodes: AnyNode[];
    try {
      nodes = this.selection().find(selector).toArray();
    } catch (error: unknown) {
      throw new ParseError(`Invalid CSS selector "${selector}"`, this.baseUrl, error);
    }
    return nodes.filter(isTag).map((node) => this.wrap(node));
  }

  selectOne(selector: string): PageElement | null {
    const [first] = this.select(selector);
    return first ?? null;
  }

  parent(): PageElement | null {
    const parent = this.node.parent;
    if (!parent || !isTag(parent)) return null;
    return this.wrap(parent);
  }

  private selection(): Cheerio<Element> {
    return this.$(this.node);
  }

  private wrap(node: Element): PageElement {
    return new PageElement(this.$, node, this.baseUrl);
  }
}
