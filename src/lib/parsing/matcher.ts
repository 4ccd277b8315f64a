/**
 * Tag/attribute predicates for find() and findAll()
 */

import type { Element } from 'domhandler';
import { ParseError } from '../fetching/errors';

/**
 * Attribute condition:
 * - string: exact value (for `class`, any whitespace-separated token)
 * - true / false: attribute present / absent
 * - RegExp: value matches
 */
export type AttributeCondition = string | boolean | RegExp;

export type AttributeQuery = Record<string, AttributeCondition>;

const TAG_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9-]*$/;

/**
 * Turn a tag name into a CSS type selector, rejecting anything that is not a plain name
 */
export function tagSelector(tag: string): string {
  if (tag === '*') return '*';
  if (!TAG_NAME_PATTERN.test(tag)) {
    throw new ParseError(`Invalid tag name "${tag}"`);
  }
  return tag.toLowerCase();
}

function matchesCondition(name: string, value: string | undefined, condition: AttributeCondition): boolean {
  if (condition === true) return value !== undefined;
  if (condition === false) return value === undefined;
  if (value === undefined) return false;

  if (condition instanceof RegExp) {
    if (name === 'class') {
      return value.split(/\s+/).some((token) => condition.test(token)) || condition.test(value);
    }
    return condition.test(value);
  }

  if (name === 'class') {
    const wanted = condition.trim().split(/\s+/);
    const tokens = value.split(/\s+/);
    return wanted.every((token) => tokens.includes(token));
  }

  return value === condition;
}

export function matchesAttributes(element: Element, query: AttributeQuery = {}): boolean {
  for (const [name, condition] of Object.entries(query)) {
    const value = element.attribs[name.toLowerCase()];
    if (!matchesCondition(name.toLowerCase(), value, condition)) {
      return false;
    }
  }
  return true;
}
