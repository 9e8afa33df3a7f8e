import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../src/core/errors.js';
import { normalizeTargetUrl, parseDepth, parseIntegerOption } from '../../src/core/validation.js';

describe('normalizeTargetUrl', () => {
  it.each([
    ['x.test', 'http://x.test/'],
    ['x.test:8080/app', 'http://x.test:8080/app'],
    ['https://x.test/path', 'https://x.test/path'],
    ['  http://X.test  ', 'http://x.test/'],
    ['http://x.test/#top', 'http://x.test/'],
    ['x.test/docs#intro', 'http://x.test/docs'],
  ])('normalizes %s', (input, expected) => {
    expect(normalizeTargetUrl(input)).toEqual({ ok: true, data: expected });
  });

  it.each(['', '   ', 'ftp://x.test', 'http://', 'http://exa mple.test'])('rejects %j', (input) => {
    const result = normalizeTargetUrl(input);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.code).toBe(ErrorCode.VALIDATION_INVALID_URL);
  });
});

describe('parseDepth', () => {
  it('accepts non-negative integers', () => {
    expect(parseDepth('0')).toEqual({ ok: true, data: 0 });
    expect(parseDepth('5')).toEqual({ ok: true, data: 5 });
  });

  it.each(['-1', 'abc', '2.5', ''])('rejects %j', (input) => {
    const result = parseDepth(input);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.code).toBe(ErrorCode.VALIDATION_INVALID_DEPTH);
  });
});

describe('parseIntegerOption', () => {
  it('accepts values within bounds', () => {
    expect(parseIntegerOption('concurrency', '4', 1, 64)).toEqual({ ok: true, data: 4 });
  });

  it('rejects values out of bounds', () => {
    const result = parseIntegerOption('concurrency', '0', 1, 64);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.error).toBe('Invalid concurrency. Must be an integer between 1 and 64');
    expect(result.failure.details).toEqual({ field: 'concurrency', value: '0' });
  });

  it('rejects non-numeric input', () => {
    expect(parseIntegerOption('delay', 'soon', 0, 60_000).ok).toBe(false);
  });
});
