/**
 * Content Processing
 * Main export file for text clean-up
 */

export * from './text.processor';
export * from './field.transforms';
