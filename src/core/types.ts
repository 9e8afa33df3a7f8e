/**
 * Shared type definitions used across the crawler
 */

// =============================================================================
// Classification
// =============================================================================

export const ENDPOINT_CATEGORIES = ['html', 'backend', 'unknown'] as const;

export type EndpointCategory = (typeof ENDPOINT_CATEGORIES)[number];

/**
 * Categories that are stored as findings
 */
export type FindingCategory = Exclude<EndpointCategory, 'unknown'>;

export type DiscoveryKind = FindingCategory | 'function';

// =============================================================================
// Crawl state
// =============================================================================

export interface FrontierEntry {
  url: string;
  depth: number;
}

/**
 * First-discovery notification. `sequence` is the global discovery order.
 */
export interface Discovery {
  kind: DiscoveryKind;
  value: string;
  sequence: number;
}

export interface ProgressSnapshot {
  crawled: number;
  queued: number;
  depth: number;
  htmlCount: number;
  backendCount: number;
  functionCount: number;
  /** Entries whose fetch failed */
  failed: number;
  /** Entries discarded at dequeue (visited or too deep) */
  skipped: number;
}

export interface FindingsSnapshot {
  htmlPages: string[];
  backendEndpoints: string[];
  functions: string[];
}

// =============================================================================
// Report
// =============================================================================

export interface CrawlReport {
  target: string;
  html_pages: string[];
  backend_endpoints: string[];
  functions: string[];
  stats: {
    total_html: number;
    total_backend: number;
    total_functions: number;
    max_depth: number;
  };
}
