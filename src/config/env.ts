import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',
  LOG_LEVEL: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info'),

  // Fetching
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; scrapekit/1.0)',
  HTTP_TIMEOUT: parseInt(process.env.HTTP_TIMEOUT || '10000', 10),

  // Resilience
  MAX_RETRIES: parseInt(process.env.MAX_RETRIES || '3', 10),
  RETRY_BACKOFF_BASE: parseInt(process.env.RETRY_BACKOFF_BASE || '1000', 10),

  // Politeness
  REQUEST_DELAY_MIN: parseInt(process.env.REQUEST_DELAY_MIN || '1000', 10),
  REQUEST_DELAY_MAX: parseInt(process.env.REQUEST_DELAY_MAX || '3000', 10),
  RESPECT_ROBOTS_TXT: process.env.RESPECT_ROBOTS_TXT !== 'false', // Default true
  ROBOTS_CACHE_TTL: parseInt(process.env.ROBOTS_CACHE_TTL || '86400000', 10), // 24 hours

  // Pagination
  MAX_PAGES: parseInt(process.env.MAX_PAGES || '50', 10),

  // Storage
  OUTPUT_DIR: process.env.OUTPUT_DIR || 'output',
  DATABASE_URL: process.env.DATABASE_URL,
} as const;

export default env;
