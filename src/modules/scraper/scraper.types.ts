/**
 * Scraper Module Types
 * Declarative description of a listing scrape and its outcome
 */

import type { StopReason } from '../../lib/crawling/crawling.types';
import type { FieldTransform } from '../../lib/processing/field.transforms';

// ============================================================================
// Enums
// ============================================================================

export enum ScrapeStatus {
  COMPLETED = 'completed',
  PARTIAL = 'partial', // stopped by an error after some pages succeeded
  FAILED = 'failed',
}

// ============================================================================
// Job description
// ============================================================================

export interface FieldSpec {
  /** CSS selector evaluated inside each item; '' means the item itself */
  selector: string;
  /** Read this attribute instead of the text content */
  attribute?: string;
  /** Resolve the attribute value against the page URL */
  absolute?: boolean;
  /** Join the text of every match with this separator instead of taking the first */
  joinWith?: string;
  /** Keep paragraph breaks in the text instead of collapsing it to one line */
  multiline?: boolean;
  /** Truncate the text to this many characters */
  maxLength?: number;
  transforms?: FieldTransform[];
}

export interface ScrapeJob {
  startUrl: string;
  /** CSS selector of one repeated item (a product card, a quote, a table row) */
  itemSelector: string;
  fields: Record<string, FieldSpec>;
  /** CSS selector of the "next page" link; rel=next is used when omitted */
  nextSelector?: string;
  maxPages?: number;
  respectRobots?: boolean;
}

// ============================================================================
// Results
// ============================================================================

export interface ScrapeReport {
  status: ScrapeStatus;
  rows: number;
  pages: number;
  visitedUrls: string[];
  stoppedBecause: StopReason | null;
  error?: Error;
  durationMs: number;
}

export interface ScrapeProgressEvent {
  url: string;
  pageNumber: number;
  rows: number;
}

export type ProgressListener = (event: ScrapeProgressEvent) => void;
