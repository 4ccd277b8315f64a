/**
 * Scraping Error Handling
 * Error classes for fetch failures plus classification and retry guidance
 */

export enum ScrapingErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  BLOCKED = 'BLOCKED',
  CAPTCHA = 'CAPTCHA',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  CLIENT_ERROR = 'CLIENT_ERROR',
  SERVER_ERROR = 'SERVER_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  ROBOTS_DISALLOWED = 'ROBOTS_DISALLOWED',
  UNKNOWN = 'UNKNOWN',
}

export interface ScrapingErrorInfo {
  type: ScrapingErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
  retryAfter?: number; // milliseconds
}

interface ScrapeErrorOptions {
  url?: string;
  statusCode?: number;
  retryable?: boolean;
  retryAfter?: number;
  cause?: unknown;
}

/**
 * Base class for every failure raised while scraping
 */
export class ScrapeError extends Error {
  readonly type: ScrapingErrorType;
  readonly url?: string;
  readonly statusCode?: number;
  readonly retryable: boolean;
  readonly retryAfter?: number;

  constructor(type: ScrapingErrorType, message: string, options: ScrapeErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ScrapeError';
    this.type = type;
    this.url = options.url;
    this.statusCode = options.statusCode;
    this.retryable = options.retryable ?? false;
    this.retryAfter = options.retryAfter;
  }

  toInfo(): ScrapingErrorInfo {
    return {
      type: this.type,
      message: this.message,
      statusCode: this.statusCode,
      retryable: this.retryable,
      retryAfter: this.retryAfter,
    };
  }
}

/**
 * The server answered, but with a non-2xx status
 */
export class HttpError extends ScrapeError {
  readonly statusCode: number;
  readonly statusText: string;

  constructor(url: string, statusCode: number, statusText: string = '', retryAfter?: number) {
    const info = classifyStatus(statusCode, retryAfter);
    super(info.type, `HTTP ${statusCode}${statusText ? ` ${statusText}` : ''} for ${url}`, {
      url,
      statusCode,
      retryable: info.retryable,
      retryAfter: info.retryAfter,
    });
    this.name = 'HttpError';
    this.statusCode = statusCode;
    this.statusText = statusText;
  }
}

/**
 * The request never produced a response (DNS, refused connection, reset)
 */
export class NetworkError extends ScrapeError {
  constructor(url: string, message: string, cause?: unknown, type: ScrapingErrorType = ScrapingErrorType.NETWORK_ERROR) {
    super(type, message, { url, retryable: true, retryAfter: 3000, cause });
    this.name = 'NetworkError';
  }
}

export class TimeoutError extends NetworkError {
  readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number, cause?: unknown) {
    super(url, `Request to ${url} timed out after ${timeoutMs}ms`, cause, ScrapingErrorType.TIMEOUT);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class ParseError extends ScrapeError {
  constructor(message: string, url?: string, cause?: unknown) {
    super(ScrapingErrorType.PARSE_ERROR, message, { url, cause });
    this.name = 'ParseError';
  }
}

export class RobotsDisallowedError extends ScrapeError {
  constructor(url: string) {
    super(ScrapingErrorType.ROBOTS_DISALLOWED, `robots.txt disallows ${url}`, { url });
    this.name = 'RobotsDisallowedError';
  }
}

/**
 * Map an HTTP status onto an error type with retry guidance
 */
function classifyStatus(code: number, retryAfter?: number): ScrapingErrorInfo {
  if (code === 429) {
    return {
      type: ScrapingErrorType.RATE_LIMITED,
      message: 'Rate limited by server',
      statusCode: code,
      retryable: true,
      retryAfter: retryAfter ?? 60000,
    };
  }

  if (code === 401 || code === 403) {
    return {
      type: ScrapingErrorType.AUTH_REQUIRED,
      message: 'Authentication required',
      statusCode: code,
      retryable: false,
    };
  }

  if (code === 404 || code === 410) {
    return {
      type: ScrapingErrorType.NOT_FOUND,
      message: 'Page not found',
      statusCode: code,
      retryable: false,
    };
  }

  if (code >= 500) {
    return {
      type: ScrapingErrorType.SERVER_ERROR,
      message: 'Server error',
      statusCode: code,
      retryable: true,
      retryAfter,
    };
  }

  return {
    type: ScrapingErrorType.CLIENT_ERROR,
    message: `Unexpected status ${code}`,
    statusCode: code,
    retryable: false,
  };
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = Number(value.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }

  const date = Date.parse(value);
  if (!isNaN(date)) {
    return Math.max(0, date - now);
  }

  return undefined;
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Classify an error and provide retry guidance
 */
export function classifyError(error: unknown, statusCode?: number): ScrapingErrorInfo {
  if (error instanceof ScrapeError) {
    return error.toInfo();
  }

  const message = messageOf(error);

  if (statusCode !== undefined) {
    return { ...classifyStatus(statusCode), message: message || `HTTP ${statusCode}` };
  }

  if (
    message.includes('timeout') ||
    message.includes('timed out') ||
    message.includes('ETIMEDOUT') ||
    message.includes('ESOCKETTIMEDOUT')
  ) {
    return {
      type: ScrapingErrorType.TIMEOUT,
      message: 'Request timed out',
      retryable: true,
      retryAfter: 5000,
    };
  }

  if (
    message.includes('ECONNREFUSED') ||
    message.includes('ECONNRESET') ||
    message.includes('ENOTFOUND') ||
    message.includes('EAI_AGAIN') ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return {
      type: ScrapingErrorType.NETWORK_ERROR,
      message: 'Network connection failed',
      retryable: true,
      retryAfter: 3000,
    };
  }

  if (message.includes('parse') || message.includes('JSON') || message.includes('syntax')) {
    return {
      type: ScrapingErrorType.PARSE_ERROR,
      message: 'Failed to parse response',
      retryable: false,
    };
  }

  return {
    type: ScrapingErrorType.UNKNOWN,
    message: message || 'Unknown error',
    retryable: false,
  };
}

/**
 * Check a page body for common blocking patterns
 */
export function detectBlocking(html: string): ScrapingErrorInfo | null {
  const lowerHtml = html.toLowerCase();

  if (lowerHtml.includes('cloudflare') && (lowerHtml.includes('challenge') || lowerHtml.includes('ray id'))) {
    return {
      type: ScrapingErrorType.BLOCKED,
      message: 'Cloudflare protection detected',
      retryable: false,
    };
  }

  if (lowerHtml.includes('recaptcha') || lowerHtml.includes('hcaptcha') || lowerHtml.includes('captcha')) {
    return {
      type: ScrapingErrorType.CAPTCHA,
      message: 'CAPTCHA required',
      retryable: false,
    };
  }

  if (lowerHtml.includes('access denied') || lowerHtml.includes('permission denied')) {
    return {
      type: ScrapingErrorType.BLOCKED,
      message: 'Access denied',
      retryable: false,
    };
  }

  if (
    lowerHtml.includes('bot detected') ||
    lowerHtml.includes('automated access') ||
    lowerHtml.includes('unusual traffic')
  ) {
    return {
      type: ScrapingErrorType.BLOCKED,
      message: 'Bot detected',
      retryable: false,
    };
  }

  return null;
}
