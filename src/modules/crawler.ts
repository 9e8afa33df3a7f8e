/* =============================================================================
 * MODULE: crawler.ts
 * =============================================================================
 * Frontier scheduler. Takes entries breadth-first from the crawl state, fetches
 * each page, records what it links to and analyzes its scripts.
 *   - entries run on a p-limit pool of `concurrency` workers; at 1 the crawl
 *     is strictly breadth-first and deterministic
 *   - a failed fetch abandons the entry, never the run
 *   - cancellation aborts in-flight fetches and cuts the delay short; the
 *     findings gathered so far still make a report
 * =============================================================================
 */

import pLimit from 'p-limit';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { CrawlState, type DiscoveryListener } from '../core/crawlState.js';
import { ErrorCode, describeFailure, errorMessage } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import type { CrawlReport, Discovery, FrontierEntry, ProgressSnapshot } from '../core/types.js';
import type { HttpClient, HttpResponse } from '../net/httpClient.js';
import { isInScope, resolveLink, targetHost } from '../util/urlScope.js';
import { classifyEndpoint } from './endpointClassifier.js';
import { extractLinks } from './linkExtractor.js';
import { ProgressReporter, type ProgressStream } from './progressReporter.js';
import { buildReport } from './reportWriter.js';
import { analyzeScript } from './scriptAnalyzer.js';

const log = createModuleLogger('crawler');

export interface CrawlJob {
  /** Normalized seed URL */
  target: string;
  /** 0 = unlimited */
  maxDepth: number;
  concurrency: number;
  delayMs: number;
  pageTimeoutMs: number;
  scriptTimeoutMs: number;
  maxPageBytes: number;
  maxScriptBytes: number;
  progressIntervalMs: number;
}

export interface CrawlDeps {
  http: HttpClient;
  signal?: AbortSignal;
  onDiscovery?: DiscoveryListener;
  /** Progress line destination; omitted = no progress line */
  progressStream?: ProgressStream;
}

export interface CrawlResult {
  runId: string;
  report: CrawlReport;
  cancelled: boolean;
  discoveries: Discovery[];
  snapshot: ProgressSnapshot;
}

interface CrawlContext {
  job: CrawlJob;
  host: string;
  state: CrawlState;
  http: HttpClient;
  log: Logger;
  signal?: AbortSignal;
}

/**
 * Pause for `ms`, resolving early when `signal` aborts
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

async function recordUrl(state: CrawlState, url: string): Promise<void> {
  const category = classifyEndpoint(url);
  if (category === 'unknown') return;
  await state.recordEndpoint(url, category);
}

// 3xx responses are not followed; their target is treated as a link instead
function redirectTarget(res: HttpResponse, host: string): string | undefined {
  if (res.status < 300 || res.status >= 400) return undefined;
  const location = res.headers.location;
  if (!location) return undefined;
  const resolved = resolveLink(location, res.url);
  return resolved && isInScope(resolved, host) ? resolved : undefined;
}

async function processEntry(entry: FrontierEntry, ctx: CrawlContext): Promise<void> {
  const { job, state, signal } = ctx;

  if (signal?.aborted) {
    await state.dropEntry();
    return;
  }
  await state.startEntry(entry);

  const res = await ctx.http.get(entry.url, {
    timeoutMs: job.pageTimeoutMs,
    maxBodyBytes: job.maxPageBytes,
    signal,
  });

  if (!res.ok) {
    if (res.failure.code === ErrorCode.NETWORK_CANCELLED) return;
    await state.recordFailure();
    ctx.log.warn({ url: entry.url, depth: entry.depth, code: res.failure.code }, describeFailure(res.failure));
    return;
  }

  await recordUrl(state, entry.url);

  const { links, scripts } = extractLinks(res.data.body, entry.url, ctx.host);
  const redirect = redirectTarget(res.data, ctx.host);
  if (redirect) links.add(redirect);

  let enqueued = 0;
  for (const link of links) {
    await recordUrl(state, link);
    if (await state.enqueue(link, entry.depth + 1)) enqueued += 1;
  }
  ctx.log.debug({ url: entry.url, depth: entry.depth, links: links.size, enqueued, scripts: scripts.size }, 'Page processed');

  for (const scriptUrl of scripts) {
    if (signal?.aborted) break;
    const analysis = await analyzeScript(scriptUrl, {
      http: ctx.http,
      state,
      host: ctx.host,
      timeoutMs: job.scriptTimeoutMs,
      maxBytes: job.maxScriptBytes,
      log: ctx.log,
      signal,
    });
    if (analysis.functionNames.size > 0) await state.recordFunctions(analysis.functionNames);
  }

  await sleep(job.delayMs, signal);
}

// Entries are dequeued as soon as they are available and wait in the p-limit
// queue for a worker. Its FIFO order keeps the crawl breadth-first.
async function schedule(ctx: CrawlContext): Promise<void> {
  const { job, state, signal } = ctx;
  const limit = pLimit(job.concurrency);
  const inFlight = new Set<Promise<void>>();

  while (!signal?.aborted) {
    const { entry, skipped } = await state.takeNext();
    for (const s of skipped) {
      ctx.log.debug({ url: s.entry.url, depth: s.entry.depth, reason: s.reason }, 'Frontier entry skipped');
    }

    if (!entry) {
      // running entries may still enqueue more work
      if (inFlight.size === 0) break;
      await Promise.race(inFlight);
      continue;
    }

    const task: Promise<void> = limit(() => processEntry(entry, ctx))
      .catch(async (err: unknown) => {
        ctx.log.error({ url: entry.url, err: errorMessage(err) }, 'Entry processing failed');
        await state.recordFailure();
      })
      .finally(() => {
        inFlight.delete(task);
      });
    inFlight.add(task);
  }

  await Promise.allSettled(inFlight);
}

/**
 * Crawl `job.target` until the frontier runs dry or `deps.signal` aborts.
 * The progress reporter, when one is requested, is stopped before this
 * resolves.
 */
export async function runCrawl(job: CrawlJob, deps: CrawlDeps): Promise<CrawlResult> {
  const runId = nanoid(10);
  const runLog = log.child({ runId });
  const state = new CrawlState(job.target, job.maxDepth);
  const ctx: CrawlContext = {
    job,
    host: targetHost(job.target),
    state,
    http: deps.http,
    log: runLog,
    signal: deps.signal,
  };

  const unsubscribe = deps.onDiscovery ? state.onDiscovery(deps.onDiscovery) : undefined;
  const reporter = deps.progressStream
    ? new ProgressReporter({
        snapshot: () => state.snapshot(),
        stream: deps.progressStream,
        intervalMs: job.progressIntervalMs,
      })
    : undefined;

  runLog.info({ target: job.target, maxDepth: job.maxDepth, concurrency: job.concurrency }, 'Crawl started');
  const startTime = Date.now();

  reporter?.start();
  try {
    await schedule(ctx);
  } finally {
    await reporter?.stop();
    unsubscribe?.();
  }

  const [findings, snapshot, discoveries] = await Promise.all([
    state.findings(),
    state.snapshot(),
    state.discoveries(),
  ]);
  const cancelled = deps.signal?.aborted ?? false;

  runLog.info({
    crawled: snapshot.crawled,
    failed: snapshot.failed,
    html: snapshot.htmlCount,
    backend: snapshot.backendCount,
    functions: snapshot.functionCount,
    cancelled,
    durationMs: Date.now() - startTime,
  }, 'Crawl finished');

  return {
    runId,
    report: buildReport(job.target, findings, job.maxDepth),
    cancelled,
    discoveries,
    snapshot,
  };
}
