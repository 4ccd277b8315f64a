/**
 * scrapekit
 * Fetch pages, parse them with cheerio, follow pagination and store rows.
 */

export { env } from './config/env';
export * from './lib/logger';
export * from './lib/fetching';
export * from './lib/parsing';
export * from './lib/crawling';
export * from './lib/robots';
export * from './lib/rate-limit';
export * from './lib/processing';
export * from './lib/storage';
export * from './modules/scraper';
