/**
 * Scraper Module
 * Main export file for listing scrapes
 */

export * from './scraper.types';
export * from './scraper.extractor';
export * from './scraper.service';
export * from './presets/quotes.preset';
