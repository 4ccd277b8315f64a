/**
 * Rate Limit System
 * Main export file for request pacing
 */

export * from './rate-limit.types';
export * from './request-throttle';
