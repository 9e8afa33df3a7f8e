#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { loadCrawlSettings } from './core/env.js';
import { describeFailure, errorMessage, type CrawlFailure, type Result } from './core/errors.js';
import { createModuleLogger } from './core/logger.js';
import { normalizeTargetUrl, parseDepth, parseIntegerOption } from './core/validation.js';
import { createHttpClient } from './net/httpClient.js';
import { runCrawl, type CrawlJob } from './modules/crawler.js';
import { writeReport } from './modules/reportWriter.js';
import { formatBanner, formatDiscovery, formatSummary } from './util/consoleFormat.js';

const log = createModuleLogger('cli');

type CliOptions = {
  url: string;
  depth: string;
  concurrency: string;
  delay: string;
  outputDir: string;
  progress: boolean;
};

const EXIT_INVALID_INPUT = 1;
const EXIT_INTERRUPTED = 130;

function fail(failure: CrawlFailure): never {
  console.error(`Error: ${describeFailure(failure)}`);
  if (failure.details) console.error(JSON.stringify({ code: failure.code, ...failure.details }));
  process.exit(EXIT_INVALID_INPUT);
}

function unwrap<T>(result: Result<T>): T {
  if (!result.ok) fail(result.failure);
  return result.data;
}

async function main(): Promise<void> {
  const settings = loadCrawlSettings();

  const program = new Command()
    .name('endpoint-mapper')
    .description('Crawl a single web application and map its pages, backend endpoints and script functions')
    .requiredOption('-u, --url <url>', 'Target URL (http:// is assumed when no scheme is given)')
    .option('-d, --depth <number>', 'Maximum crawl depth (0 for unlimited)', String(settings.maxDepth))
    .option('-c, --concurrency <number>', 'Pages fetched at once', String(settings.concurrency))
    .option('--delay <ms>', 'Delay after each processed page', String(settings.delayMs))
    .option('-o, --output-dir <path>', 'Directory the JSON report is written to', settings.reportDir)
    .option('--no-progress', 'Disable the progress line')
    .parse(process.argv);

  const opts = program.opts<CliOptions>();

  const target = unwrap(normalizeTargetUrl(opts.url));
  const job: CrawlJob = {
    target,
    maxDepth: unwrap(parseDepth(opts.depth)),
    concurrency: unwrap(parseIntegerOption('concurrency', opts.concurrency, 1, 64)),
    delayMs: unwrap(parseIntegerOption('delay', opts.delay, 0, 60_000)),
    pageTimeoutMs: settings.pageTimeoutMs,
    scriptTimeoutMs: settings.scriptTimeoutMs,
    maxPageBytes: settings.maxPageBytes,
    maxScriptBytes: settings.maxScriptBytes,
    progressIntervalMs: settings.progressIntervalMs,
  };
  const showProgress = opts.progress && process.stderr.isTTY === true;
  const useColor = process.stdout.isTTY === true;

  console.log(formatBanner(target, job.maxDepth));

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) process.exit(EXIT_INTERRUPTED);
    console.log('\n\nScan interrupted by user!');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const result = await runCrawl(job, {
    http: createHttpClient({ userAgent: settings.userAgent }),
    signal: controller.signal,
    onDiscovery: (discovery) => {
      // clear the progress line before printing over it
      const prefix = showProgress ? '\r\x1b[K' : '';
      console.log(`${prefix}${formatDiscovery(discovery, useColor)}`);
    },
    ...(showProgress && { progressStream: process.stderr }),
  });
  process.off('SIGINT', onSigint);

  if (!result.cancelled) console.log('\n\nScan complete! Final results:');

  const written = unwrap(await writeReport(result.report, opts.outputDir));
  console.log(formatSummary(result.report, written));
  log.debug({ runId: result.runId, failed: result.snapshot.failed, skipped: result.snapshot.skipped }, 'Run stats');
}

main().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, 'Unhandled error');
  console.error(`Fatal: ${errorMessage(err)}`);
  process.exit(1);
});
