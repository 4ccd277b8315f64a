/**
 * Scraping Error Tests
 */

import {
  classifyError,
  detectBlocking,
  HttpError,
  NetworkError,
  parseRetryAfter,
  ScrapeError,
  ScrapingErrorType,
} from '../errors';

describe('HttpError', () => {
  it('should classify by status class', () => {
    expect(new HttpError('https://a.test/', 403).type).toBe(ScrapingErrorType.AUTH_REQUIRED);
    expect(new HttpError('https://a.test/', 410).type).toBe(ScrapingErrorType.NOT_FOUND);
    expect(new HttpError('https://a.test/', 418).type).toBe(ScrapingErrorType.CLIENT_ERROR);
    expect(new HttpError('https://a.test/', 502).type).toBe(ScrapingErrorType.SERVER_ERROR);
    expect(new HttpError('https://a.test/', 502).retryable).toBe(true);
  });

  it('should be a ScrapeError but not a NetworkError', () => {
    const error = new HttpError('https://a.test/', 500, 'Internal Server Error');
    expect(error).toBeInstanceOf(ScrapeError);
    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(NetworkError);
    expect(error.name).toBe('HttpError');
  });
});

describe('classifyError', () => {
  it('should pass through ScrapeError details', () => {
    const info = classifyError(new HttpError('https://a.test/x', 404, 'Not Found'));
    expect(info).toEqual({
      type: ScrapingErrorType.NOT_FOUND,
      message: 'HTTP 404 Not Found for https://a.test/x',
      statusCode: 404,
      retryable: false,
      retryAfter: undefined,
    });
  });

  it('should recognise connection failures', () => {
    const info = classifyError(new Error('connect ECONNREFUSED 127.0.0.1:80'));
    expect(info.type).toBe(ScrapingErrorType.NETWORK_ERROR);
    expect(info.retryable).toBe(true);
  });

  it('should recognise timeouts', () => {
    expect(classifyError(new Error('socket ETIMEDOUT')).type).toBe(ScrapingErrorType.TIMEOUT);
  });

  it('should use an explicit status code', () => {
    const info = classifyError(new Error('oops'), 500);
    expect(info.type).toBe(ScrapingErrorType.SERVER_ERROR);
    expect(info.message).toBe('oops');
    expect(info.retryable).toBe(true);
  });

  it('should treat anything else as unknown and not retryable', () => {
    expect(classifyError('weird')).toEqual({
      type: ScrapingErrorType.UNKNOWN,
      message: 'weird',
      retryable: false,
    });
  });
});

describe('parseRetryAfter', () => {
  it('should parse delta seconds', () => {
    expect(parseRetryAfter('120')).toBe(120000);
  });

  it('should parse an HTTP date relative to now', () => {
    const now = Date.parse('Wed, 21 Oct 2015 07:27:00 GMT');
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT', now)).toBe(60000);
  });

  it('should return undefined for missing or garbage values', () => {
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });
});

describe('detectBlocking', () => {
  it('should detect captcha pages', () => {
    expect(detectBlocking('<div class="g-recaptcha"></div>')?.type).toBe(ScrapingErrorType.CAPTCHA);
  });

  it('should detect access denied pages', () => {
    expect(detectBlocking('<h1>Access Denied</h1>')?.message).toBe('Access denied');
  });

  it('should return null for ordinary pages', () => {
    expect(detectBlocking('<p>Hello</p>')).toBeNull();
  });
});
