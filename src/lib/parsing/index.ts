/**
 * Parsing
 * Main export file for markup parsing
 */

export * from './matcher';
export * from './element';
export * from './document';
