/**
 * Storage
 * Main export file for row sinks
 */

export * from './storage.types';
export * from './row.utils';
export * from './csv.sink';
export * from './sql.sink';
export * from './memory.sink';
export * from './multi.sink';
