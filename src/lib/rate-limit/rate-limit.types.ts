/**
 * Rate Limit Types
 * Type definitions for polite request pacing
 */

export interface ThrottleConfig {
  delayMin: number;                    // Minimum delay between requests to one host (ms)
  delayMax: number;                    // Upper bound of the random delay (ms)
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface ThrottleStats {
  totalRequests: number;
  delayedRequests: number;
  totalDelayMs: number;
  activeHosts: number;
}
