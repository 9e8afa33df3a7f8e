/**
 * Validation of CLI input before it reaches the crawl engine
 */

import { Errors, type Result } from './errors.js';

const SCHEME_PREFIX = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Normalize a target URL. Schemeless input is treated as http; the fragment
 * is dropped as it is for every discovered link.
 */
export function normalizeTargetUrl(raw: string): Result<string> {
  const trimmed = raw.trim();
  if (!trimmed) return { ok: false, failure: Errors.invalidUrl(raw) };

  const candidate = SCHEME_PREFIX.test(trimmed) ? trimmed : `http://${trimmed}`;

  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    return { ok: false, failure: Errors.invalidUrl(raw) };
  }

  if ((parsed.protocol !== 'http:' && parsed.protocol !== 'https:') || !parsed.hostname) {
    return { ok: false, failure: Errors.invalidUrl(raw) };
  }

  parsed.hash = '';
  return { ok: true, data: parsed.href };
}

/**
 * Parse a depth argument. 0 means unlimited.
 */
export function parseDepth(raw: string): Result<number> {
  if (!/^\d+$/.test(raw.trim())) return { ok: false, failure: Errors.invalidDepth(raw) };
  return { ok: true, data: parseInt(raw, 10) };
}

/**
 * Parse a bounded integer option (concurrency, delay)
 */
export function parseIntegerOption(field: string, raw: string, min: number, max: number): Result<number> {
  const expected = `Must be an integer between ${min} and ${max}`;
  if (!/^-?\d+$/.test(raw.trim())) return { ok: false, failure: Errors.invalidOption(field, expected, raw) };

  const value = parseInt(raw, 10);
  if (value < min || value > max) return { ok: false, failure: Errors.invalidOption(field, expected, raw) };
  return { ok: true, data: value };
}
