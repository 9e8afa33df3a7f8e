/**
 * JSON report assembly and persistence
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Errors, errorMessage, type Result } from '../core/errors.js';
import { createModuleLogger } from '../core/logger.js';
import type { CrawlReport, FindingsSnapshot } from '../core/types.js';
import { targetHost } from '../util/urlScope.js';

const log = createModuleLogger('reportWriter');

export function buildReport(target: string, findings: FindingsSnapshot, maxDepth: number): CrawlReport {
  return {
    target,
    html_pages: [...findings.htmlPages],
    backend_endpoints: [...findings.backendEndpoints],
    functions: [...findings.functions],
    stats: {
      total_html: findings.htmlPages.length,
      total_backend: findings.backendEndpoints.length,
      total_functions: findings.functions.length,
      max_depth: maxDepth,
    },
  };
}

/**
 * `x.test:8080` → `x.test_8080_security_scan.json`
 */
export function reportFileName(target: string): string {
  const host = targetHost(target) || 'unknown';
  return `${host.replace(/:/g, '_')}_security_scan.json`;
}

export async function writeReport(report: CrawlReport, outputDir: string): Promise<Result<string>> {
  const path = join(outputDir, reportFileName(report.target));
  try {
    await mkdir(outputDir, { recursive: true });
    await writeFile(path, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    log.info({ path, html: report.stats.total_html, backend: report.stats.total_backend }, 'Report written');
    return { ok: true, data: path };
  } catch (err) {
    const failure = Errors.reportWriteFailed(path, errorMessage(err));
    log.error({ path, code: failure.code, err: failure.message }, 'Report write failed');
    return { ok: false, failure };
  }
}
