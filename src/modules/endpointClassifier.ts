/* =============================================================================
 * MODULE: endpointClassifier.ts
 * =============================================================================
 * Sorts a crawled URL into html page / backend endpoint / unknown.
 * Backend rules win over page rules. Rules run over the full URL, query
 * string included.
 * =============================================================================
 */

import type { EndpointCategory } from '../core/types.js';

const BACKEND_PATTERNS: RegExp[] = [
  /\.(json|xml|ashx|asmx|php|jsp|do|action|api|rest)\b/i,
  /\/api\//i,
  /\/ws\//i,
  /\/rest\//i,
  /\.cgi\b/i,
];

const BACKEND_QUERY_KEYS = new Set(['action', 'method', 'api_key']);

const PAGE_PATTERNS: RegExp[] = [
  /\.(html|htm|asp|aspx|cfm)\b/i,
  // extensionless last segment
  /\/[^/.]+$/,
];

function hasBackendQueryKey(url: string): boolean {
  let params: URLSearchParams;
  try {
    params = new URL(url).searchParams;
  } catch {
    return false;
  }
  for (const key of params.keys()) {
    if (BACKEND_QUERY_KEYS.has(key.toLowerCase())) return true;
  }
  return false;
}

export function classifyEndpoint(url: string): EndpointCategory {
  if (BACKEND_PATTERNS.some((rx) => rx.test(url))) return 'backend';
  if (hasBackendQueryKey(url)) return 'backend';

  if (PAGE_PATTERNS.some((rx) => rx.test(url))) return 'html';

  return 'unknown';
}
