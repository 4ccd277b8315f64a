/**
 * Field Transforms
 * Named clean-up steps applied to extracted values before they are stored
 */

import { cleanText } from './text.processor';

export type FieldTransform = 'trim' | 'collapse' | 'lowercase' | 'uppercase' | 'number' | 'stripQuotes';

export const FIELD_TRANSFORMS: readonly FieldTransform[] = [
  'trim',
  'collapse',
  'lowercase',
  'uppercase',
  'number',
  'stripQuotes',
];

export function isFieldTransform(value: string): value is FieldTransform {
  return FIELD_TRANSFORMS.some((name) => name === value);
}

const QUOTE_CHARS = '"\'“”‘’«»';

/**
 * Remove one layer of surrounding quotes, straight or typographic
 */
export function stripQuotes(value: string): string {
  let result = value.trim();
  if (result.length > 0 && QUOTE_CHARS.includes(result[0])) {
    result = result.slice(1);
  }
  if (result.length > 0 && QUOTE_CHARS.includes(result[result.length - 1])) {
    result = result.slice(0, -1);
  }
  return result.trim();
}

/**
 * Pull a decimal number out of text such as "£51.77" or "1,299.00 USD".
 * Returns '' when there is no number.
 */
export function extractNumber(value: string): string {
  const match = /-?\d[\d,]*(?:\.\d+)?|-?\.\d+/.exec(value);
  if (!match) return '';
  return String(Number(match[0].replace(/,/g, '')));
}

const TRANSFORMS: Record<FieldTransform, (value: string) => string> = {
  trim: (value) => value.trim(),
  collapse: cleanText,
  lowercase: (value) => value.toLowerCase(),
  uppercase: (value) => value.toUpperCase(),
  number: extractNumber,
  stripQuotes,
};

export function applyTransforms(value: string, transforms: readonly FieldTransform[] = []): string {
  return transforms.reduce((current, name) => TRANSFORMS[name](current), value);
}
