/**
 * Text Processor Tests
 */

import { cleanText, collapseParagraphs, removeInvisibleCharacters, TextProcessor } from '../text.processor';

describe('TextProcessor', () => {
  const processor = new TextProcessor();

  it('should collapse text onto one line by default', () => {
    expect(processor.process('  Test \n  Text  ')).toEqual({
      text: 'Test Text',
      originalLength: 16,
      truncated: false,
    });
  });

  it('should return an empty string for blank input', () => {
    expect(processor.process('   \n ').text).toBe('');
  });

  it('should normalize unicode to NFC', () => {
    expect(processor.process('cafe\u0301').text).toBe('caf\u00e9');
  });

  it('should keep paragraphs when asked', () => {
    const text = 'Line1\r\n  Line2  \r\n\r\n\r\n\r\nLine3';
    expect(processor.process(text, { preserveParagraphs: true }).text).toBe('Line1\nLine2\n\nLine3');
  });

  it('should truncate to maxLength', () => {
    expect(processor.process('alpha beta gamma', { maxLength: 11 })).toEqual({
      text: 'alpha beta',
      originalLength: 16,
      truncated: true,
    });
  });

  it('should fall back to constructor defaults', () => {
    const multiline = new TextProcessor({ preserveParagraphs: true, maxLength: 3 });
    expect(multiline.process('ab\n\ncd').text).toBe('ab');
    expect(multiline.process('ab\n\ncd', { maxLength: 10 }).text).toBe('ab\n\ncd');
  });
});

describe('removeInvisibleCharacters', () => {
  it('should drop control and zero-width characters', () => {
    expect(removeInvisibleCharacters('Test\u0000\u0001\u200BText\t')).toBe('TestText\t');
  });
});

describe('collapseParagraphs', () => {
  it('should trim each line and drop leading blank lines', () => {
    expect(collapseParagraphs('\n\n  a   b \n c')).toBe('a b\nc');
  });
});

describe('cleanText', () => {
  it('should collapse whitespace onto one line', () => {
    expect(cleanText('\n   Widget\t\t  Pro \n')).toBe('Widget Pro');
  });

  it('should drop non-breaking and zero-width noise', () => {
    expect(cleanText('a\u00A0 b\u200B')).toBe('a b');
  });
});
