/**
 * Robots System
 * Main export file for robots.txt handling
 */

export * from './robots.parser';
export * from './robots.policy';
