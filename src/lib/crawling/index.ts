/**
 * Crawling System
 * Main export file for pagination
 */

export * from './crawling.types';
export * from './url-normalizer';
export * from './visited-urls';
export * from './next-link';
export * from './paginator';
