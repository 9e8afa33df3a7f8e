import { MockAgent } from 'undici';
import pino from 'pino';
import type { CrawlJob } from '../../src/modules/crawler.js';
import { createHttpClient, type HttpClient } from '../../src/net/httpClient.js';

export const ORIGIN = 'http://x.test';

export const silentLogger = pino({ level: 'silent' });

export interface MockSite {
  agent: MockAgent;
  http: HttpClient;
  /** Requests served per path */
  hits: Map<string, number>;
}

/**
 * In-process stand-in for the target site. Every path replies 200 with its
 * body, any number of times, after its entry in `delays` when it has one;
 * unknown paths fail like a refused connection.
 */
export function mockSite(pages: Record<string, string>, delays: Record<string, number> = {}): MockSite {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const pool = agent.get(ORIGIN);
  const hits = new Map<string, number>();

  for (const [path, body] of Object.entries(pages)) {
    const scope = pool
      .intercept({ path, method: 'GET' })
      .reply(() => {
        hits.set(path, (hits.get(path) ?? 0) + 1);
        return { statusCode: 200, data: body };
      });
    const delayMs = delays[path];
    if (delayMs !== undefined) scope.delay(delayMs);
    scope.persist();
  }

  return { agent, http: createHttpClient({ userAgent: 'test-agent', dispatcher: agent }), hits };
}

export function testJob(overrides: Partial<CrawlJob> = {}): CrawlJob {
  return {
    target: `${ORIGIN}/`,
    maxDepth: 3,
    concurrency: 1,
    delayMs: 0,
    pageTimeoutMs: 2_000,
    scriptTimeoutMs: 2_000,
    maxPageBytes: 1024 * 1024,
    maxScriptBytes: 1024 * 1024,
    progressIntervalMs: 5,
    ...overrides,
  };
}
