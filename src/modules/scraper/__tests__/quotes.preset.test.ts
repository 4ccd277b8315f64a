/**
 * Quotes Preset Tests
 */

import { formatQuote, QUOTES_START_URL, quotesJob } from '../presets/quotes.preset';

describe('quotesJob', () => {
  it('should default to the public quotes listing', () => {
    const job = quotesJob();
    expect(job.startUrl).toBe(QUOTES_START_URL);
    expect(job.nextSelector).toBe('li.next a');
    expect(Object.keys(job.fields)).toEqual(['text', 'author', 'tags', 'authorUrl']);
  });
});

describe('formatQuote', () => {
  it('should print a quote with its tags', () => {
    expect(formatQuote({ text: 'Hi.', author: 'A', tags: 'x, y', authorUrl: '' })).toBe('“Hi.” — A [x, y]');
  });

  it('should omit empty tags', () => {
    expect(formatQuote({ text: 'Hi.', author: 'A', tags: '', authorUrl: '' })).toBe('“Hi.” — A');
  });
});
