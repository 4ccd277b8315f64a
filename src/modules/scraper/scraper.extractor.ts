/**
 * Row Extraction
 * Turns the repeated items of a parsed page into flat rows
 */

import type { ParsedDocument } from '../../lib/parsing/document';
import type { PageElement } from '../../lib/parsing/element';
import { applyTransforms, FieldTransform, isFieldTransform } from '../../lib/processing/field.transforms';
import { textProcessor } from '../../lib/processing/text.processor';
import type { Row } from '../../lib/storage/storage.types';
import type { FieldSpec, ScrapeJob } from './scraper.types';

/**
 * Parse the shorthand "selector", "selector@attr" or "selector@attr|transform|transform".
 * "@href" alone reads an attribute of the item itself.
 */
export function parseFieldSpec(shorthand: string): FieldSpec {
  const [target, ...transformNames] = shorthand.split('|').map((part) => part.trim());

  const transforms: FieldTransform[] = [];
  for (const name of transformNames) {
    if (!isFieldTransform(name)) {
      throw new Error(`Unknown transform "${name}" in field "${shorthand}"`);
    }
    transforms.push(name);
  }

  const atIndex = target.lastIndexOf('@');
  const spec: FieldSpec =
    atIndex === -1
      ? { selector: target }
      : { selector: target.slice(0, atIndex).trim(), attribute: target.slice(atIndex + 1).trim() };

  if (spec.attribute === 'href' || spec.attribute === 'src') {
    spec.absolute = true;
  }
  if (transforms.length > 0) {
    spec.transforms = transforms;
  }

  return spec;
}

function readValue(element: PageElement, spec: FieldSpec): string {
  if (!spec.attribute) {
    return textProcessor.process(element.text(), {
      preserveParagraphs: spec.multiline,
      maxLength: spec.maxLength,
    }).text;
  }
  if (spec.absolute) {
    return element.absoluteUrl(spec.attribute) ?? '';
  }
  return element.attr(spec.attribute) ?? '';
}

export function extractField(item: PageElement, spec: FieldSpec): string {
  let value: string;

  if (spec.selector === '') {
    value = readValue(item, spec);
  } else if (spec.joinWith !== undefined) {
    value = item
      .select(spec.selector)
      .map((element) => readValue(element, spec))
      .filter((part) => part !== '')
      .join(spec.joinWith);
  } else {
    const element = item.selectOne(spec.selector);
    value = element ? readValue(element, spec) : '';
  }

  return applyTransforms(value, spec.transforms);
}

/**
 * One row per element matching job.itemSelector; a field with no match is ''
 */
export function extractRows(doc: ParsedDocument, job: Pick<ScrapeJob, 'itemSelector' | 'fields'>): Row[] {
  return doc.select(job.itemSelector).map((item) => {
    const row: Row = {};
    for (const [name, spec] of Object.entries(job.fields)) {
      row[name] = extractField(item, spec);
    }
    return row;
  });
}
