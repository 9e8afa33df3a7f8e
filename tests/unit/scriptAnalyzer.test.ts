import { afterEach, describe, it, expect } from 'vitest';
import { CrawlState } from '../../src/core/crawlState.js';
import { ErrorCode } from '../../src/core/errors.js';
import { analyzeScript, scanScriptSource } from '../../src/modules/scriptAnalyzer.js';
import { mockSite, silentLogger, type MockSite } from '../helpers/mockSite.js';

const SOURCE = `
function loadData() { return fetch('/api/orders'); }
const apiBase = '/v1';
let counter = 0;
var legacy;
function* ids() {}
axios.get("/api/items");
$.ajax('/ws/poll');
window.myFetch('/rest/status');
// fetch('/api/commented')
const text = "fetch('/api/in-string')";
fetch(url);
fetch('');
`;

describe('scanScriptSource', () => {
  it('finds string targets of API calls', () => {
    const scan = scanScriptSource(SOURCE);
    expect(scan.apiTargets).toEqual(['/api/orders', '/api/items', '/ws/poll', '/rest/status']);
  });

  it('collects declared identifiers', () => {
    const scan = scanScriptSource(SOURCE);
    expect([...scan.functionNames].sort()).toEqual(['apiBase', 'counter', 'ids', 'legacy', 'loadData', 'text']);
    expect(scan.partial).toBe(false);
    expect(scan.error).toBeUndefined();
  });

  it('skips single-letter names', () => {
    const scan = scanScriptSource('var e = 1; function t() {} const ab = 2; let $ = 3; let _x;');
    expect([...scan.functionNames].sort()).toEqual(['_x', 'ab']);
  });

  it('keeps what was lexed before a tokenizer error', () => {
    const scan = scanScriptSource('const ok = 1;\nfunction good() {}\nconst broken = "unterminated');

    expect(scan.partial).toBe(true);
    expect(scan.error).toBeDefined();
    expect([...scan.functionNames].sort()).toEqual(['broken', 'good', 'ok']);
  });

  it('returns nothing for empty input', () => {
    const scan = scanScriptSource('');
    expect(scan.apiTargets).toEqual([]);
    expect(scan.functionNames.size).toBe(0);
    expect(scan.partial).toBe(false);
  });
});

describe('analyzeScript', () => {
  let site: MockSite | undefined;

  afterEach(async () => {
    await site?.agent.close();
    site = undefined;
  });

  it('records in-scope API targets and returns declared names', async () => {
    site = mockSite({
      '/static/app.js': [
        "fetch('/api/orders');",
        "fetch('http://other.test/api/x');",
        "fetch('logo.png');",
        'function init() {}',
      ].join('\n'),
    });
    const state = new CrawlState('http://x.test/');

    const analysis = await analyzeScript('http://x.test/static/app.js', {
      http: site.http,
      state,
      host: 'x.test',
      timeoutMs: 1_000,
      maxBytes: 1024 * 1024,
      log: silentLogger,
    });

    expect(analysis.ok).toBe(true);
    expect(analysis.endpointsAdded).toBe(1);
    expect([...analysis.functionNames]).toEqual(['init']);
    expect((await state.findings()).backendEndpoints).toEqual(['http://x.test/api/orders']);
  });

  it('returns an empty analysis when the script cannot be fetched', async () => {
    site = mockSite({});
    const state = new CrawlState('http://x.test/');

    const analysis = await analyzeScript('http://x.test/missing.js', {
      http: site.http,
      state,
      host: 'x.test',
      timeoutMs: 1_000,
      maxBytes: 1024 * 1024,
      log: silentLogger,
    });

    expect(analysis.ok).toBe(false);
    expect(analysis.functionNames.size).toBe(0);
    expect(analysis.endpointsAdded).toBe(0);
    expect(analysis.failure?.code).toBe(ErrorCode.NETWORK_FAILURE);
  });

  it('rejects scripts over the size cap', async () => {
    site = mockSite({ '/big.js': `var big = "${'x'.repeat(200)}";` });
    const state = new CrawlState('http://x.test/');

    const analysis = await analyzeScript('http://x.test/big.js', {
      http: site.http,
      state,
      host: 'x.test',
      timeoutMs: 1_000,
      maxBytes: 64,
      log: silentLogger,
    });

    expect(analysis.ok).toBe(false);
    expect(analysis.failure?.code).toBe(ErrorCode.CONTENT_TOO_LARGE);
  });
});
