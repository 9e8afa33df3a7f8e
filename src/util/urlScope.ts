/**
 * Scope checks and canonicalization for crawl URLs.
 *
 * The target host is compared exactly as written: no case folding and no
 * default-port removal. Link resolution keeps a link's authority as written
 * for the same reason.
 */

const CRAWLABLE_PROTOCOLS = new Set(['http:', 'https:']);

// scheme-relative "//host" or "scheme://host"; group 1 is the authority
const AUTHORITY = /^(?:[a-z][a-z0-9+.-]*:)?\/\/([^/?#\\]*)/i;

function tryParse(url: string, base?: string): URL | undefined {
  try {
    return new URL(url, base);
  } catch {
    return undefined;
  }
}

/**
 * Authority component as it appears in `url` (user-info included)
 */
export function rawAuthority(url: string): string | undefined {
  return AUTHORITY.exec(url)?.[1];
}

export function targetHost(url: string): string {
  if (!tryParse(url)) return '';
  return rawAuthority(url) ?? '';
}

/**
 * True when `url` is an http(s) URL whose authority is exactly `host`
 */
export function isInScope(url: string, host: string): boolean {
  const parsed = tryParse(url);
  if (!parsed) return false;
  if (!CRAWLABLE_PROTOCOLS.has(parsed.protocol)) return false;
  return rawAuthority(url) === host;
}

/**
 * Resolve an attribute value against its document URL. The fragment is
 * dropped since it never reaches the server.
 */
export function resolveLink(value: string, base: string): string | undefined {
  const trimmed = value.trim();
  const parsed = tryParse(trimmed, base);
  if (!parsed) return undefined;
  parsed.hash = '';
  if (!CRAWLABLE_PROTOCOLS.has(parsed.protocol)) return parsed.href;

  // the URL parser lower-cases the host and drops default ports
  const written = rawAuthority(trimmed) ?? rawAuthority(base);
  if (written === undefined || written === parsed.host) return parsed.href;
  return `${parsed.protocol}//${written}${parsed.pathname}${parsed.search}`;
}

/**
 * Canonical key of a finding: the URL without query string and fragment.
 */
export function canonicalize(url: string): string {
  return url.split('?')[0].split('#')[0];
}
