import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { MockAgent } from 'undici';
import { ErrorCode } from '../../src/core/errors.js';
import { createHttpClient, type HttpClient } from '../../src/net/httpClient.js';

const OPTIONS = { timeoutMs: 1_000, maxBodyBytes: 1024 };

describe('createHttpClient', () => {
  let agent: MockAgent;
  let http: HttpClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    http = createHttpClient({ userAgent: 'test-agent', dispatcher: agent });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('returns status, lower-cased headers and body', async () => {
    agent.get('http://x.test')
      .intercept({ path: '/page', method: 'GET' })
      .reply(200, '<p>hello</p>', { headers: { 'Content-Type': 'text/html' } });

    const res = await http.get('http://x.test/page', OPTIONS);

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.url).toBe('http://x.test/page');
    expect(res.data.status).toBe(200);
    expect(res.data.body).toBe('<p>hello</p>');
    expect(res.data.headers['content-type']).toBe('text/html');
  });

  it('sends the configured user agent', async () => {
    agent.get('http://x.test')
      .intercept({ path: '/', method: 'GET', headers: { 'user-agent': 'test-agent' } })
      .reply(200, 'ok');

    const res = await http.get('http://x.test/', OPTIONS);
    expect(res.ok).toBe(true);
  });

  it('does not follow redirects', async () => {
    agent.get('http://x.test')
      .intercept({ path: '/old', method: 'GET' })
      .reply(301, '', { headers: { location: '/new' } });

    const res = await http.get('http://x.test/old', OPTIONS);

    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.status).toBe(301);
    expect(res.data.headers.location).toBe('/new');
  });

  it('fails bodies over the cap', async () => {
    agent.get('http://x.test')
      .intercept({ path: '/big', method: 'GET' })
      .reply(200, 'x'.repeat(2048));

    const res = await http.get('http://x.test/big', OPTIONS);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.failure.code).toBe(ErrorCode.CONTENT_TOO_LARGE);
    expect(res.failure.details).toEqual({ url: 'http://x.test/big', limit_bytes: 1024 });
  });

  it('maps connection errors to a network failure', async () => {
    agent.get('http://x.test')
      .intercept({ path: '/down', method: 'GET' })
      .replyWithError(new Error('connection refused'));

    const res = await http.get('http://x.test/down', OPTIONS);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.failure.code).toBe(ErrorCode.NETWORK_FAILURE);
    expect(res.failure.error).toBe('Request failed');
  });

  it('reports cancellation without issuing the request', async () => {
    const controller = new AbortController();
    controller.abort();

    const res = await http.get('http://x.test/never', { ...OPTIONS, signal: controller.signal });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.failure.code).toBe(ErrorCode.NETWORK_CANCELLED);
  });
});
