/**
 * Centralized environment configuration for the crawler
 *
 * All environment variables should be accessed through this module so that
 * defaults and parsing live in one place. The CLI loads `.env` through dotenv
 * before anything here is read.
 */

type EnvSource = Record<string, string | undefined>;

// =============================================================================
// Helper Functions
// =============================================================================

function parseIntEnv(source: EnvSource, key: string, defaultValue: number): number {
  const value = source[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

function parseStringEnv(source: EnvSource, key: string, defaultValue: string): string {
  return source[key] ?? defaultValue;
}

// =============================================================================
// Crawl Configuration
// =============================================================================

export interface CrawlSettings {
  /** Maximum crawl depth, 0 = unlimited */
  maxDepth: number;
  /** Frontier entries processed at once */
  concurrency: number;
  /** Fixed pause after each processed entry */
  delayMs: number;
  pageTimeoutMs: number;
  scriptTimeoutMs: number;
  progressIntervalMs: number;
  maxPageBytes: number;
  maxScriptBytes: number;
  userAgent: string;
  /** Directory the JSON report is written to */
  reportDir: string;
}

export const CRAWL_DEFAULTS: CrawlSettings = {
  maxDepth: 3,
  concurrency: 1,
  delayMs: 500,
  pageTimeoutMs: 10_000,
  scriptTimeoutMs: 5_000,
  progressIntervalMs: 100,
  maxPageBytes: 5 * 1024 * 1024,
  maxScriptBytes: 1 * 1024 * 1024,
  userAgent: 'endpoint-mapper/1.0',
  reportDir: '.',
};

export function loadCrawlSettings(source: EnvSource = process.env): CrawlSettings {
  return {
    maxDepth: parseIntEnv(source, 'CRAWL_MAX_DEPTH', CRAWL_DEFAULTS.maxDepth),
    concurrency: Math.max(1, parseIntEnv(source, 'CRAWL_CONCURRENCY', CRAWL_DEFAULTS.concurrency)),
    delayMs: Math.max(0, parseIntEnv(source, 'CRAWL_DELAY_MS', CRAWL_DEFAULTS.delayMs)),
    pageTimeoutMs: parseIntEnv(source, 'CRAWL_PAGE_TIMEOUT_MS', CRAWL_DEFAULTS.pageTimeoutMs),
    scriptTimeoutMs: parseIntEnv(source, 'CRAWL_SCRIPT_TIMEOUT_MS', CRAWL_DEFAULTS.scriptTimeoutMs),
    progressIntervalMs: parseIntEnv(source, 'CRAWL_PROGRESS_INTERVAL_MS', CRAWL_DEFAULTS.progressIntervalMs),
    maxPageBytes: parseIntEnv(source, 'CRAWL_MAX_PAGE_BYTES', CRAWL_DEFAULTS.maxPageBytes),
    maxScriptBytes: parseIntEnv(source, 'CRAWL_MAX_SCRIPT_BYTES', CRAWL_DEFAULTS.maxScriptBytes),
    userAgent: parseStringEnv(source, 'CRAWL_USER_AGENT', CRAWL_DEFAULTS.userAgent),
    reportDir: parseStringEnv(source, 'REPORT_DIR', CRAWL_DEFAULTS.reportDir),
  };
}
