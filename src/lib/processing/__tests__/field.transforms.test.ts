/**
 * Field Transform Tests
 */

import { applyTransforms, extractNumber, isFieldTransform, stripQuotes } from '../field.transforms';

describe('stripQuotes', () => {
  it('should remove straight and typographic quotes', () => {
    expect(stripQuotes('“Hello”')).toBe('Hello');
    expect(stripQuotes(' "Hi" ')).toBe('Hi');
    expect(stripQuotes("it's")).toBe("it's");
  });

  it('should keep apostrophes inside the outer quotes', () => {
    expect(stripQuotes("“Nobody reads the dogs'”")).toBe("Nobody reads the dogs'");
    expect(stripQuotes("“'Tis the season”")).toBe("'Tis the season");
  });
});

describe('extractNumber', () => {
  it('should pull a number out of a price', () => {
    expect(extractNumber('£1,299.50')).toBe('1299.5');
    expect(extractNumber('51.77 USD')).toBe('51.77');
    expect(extractNumber('In stock (22 available)')).toBe('22');
    expect(extractNumber('-3')).toBe('-3');
  });

  it('should return an empty string without a number', () => {
    expect(extractNumber('Free')).toBe('');
  });
});

describe('applyTransforms', () => {
  it('should apply transforms in order', () => {
    expect(applyTransforms('  “Mixed Case”  ', ['stripQuotes', 'uppercase'])).toBe('MIXED CASE');
    expect(applyTransforms('  A  b ', ['collapse', 'lowercase'])).toBe('a b');
  });

  it('should leave the value alone without transforms', () => {
    expect(applyTransforms(' x ')).toBe(' x ');
  });
});

describe('isFieldTransform', () => {
  it('should recognise known names only', () => {
    expect(isFieldTransform('number')).toBe(true);
    expect(isFieldTransform('reverse')).toBe(false);
  });
});
