/**
 * Fetching
 * Main export file for HTTP fetching
 */

export * from './errors';
export * from './headers';
export * from './retry';
export * from './fetcher';
