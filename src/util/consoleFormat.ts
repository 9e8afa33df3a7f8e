/**
 * Terminal rendering for the CLI: banner, discovery lines and summary
 */

import type { CrawlReport, Discovery, DiscoveryKind } from '../core/types.js';

const RESET = '\x1b[0m';

const KIND_COLORS: Record<DiscoveryKind, string> = {
  html: '\x1b[94m',
  backend: '\x1b[92m',
  function: '\x1b[93m',
};

const KIND_LABELS: Record<DiscoveryKind, string> = {
  html: 'Html',
  backend: 'Backend',
  function: 'Function',
};

export function formatBanner(target: string, maxDepth: number): string {
  return [
    '',
    `Starting security scan for: ${target}`,
    `Maximum crawl depth: ${maxDepth > 0 ? maxDepth : 'unlimited'}`,
    'Press Ctrl+C to stop early...',
    '',
  ].join('\n');
}

export function formatDiscovery(discovery: Discovery, color = true): string {
  const line = `• ${KIND_LABELS[discovery.kind]} found: ${discovery.value}`;
  return color ? `${KIND_COLORS[discovery.kind]}${line}${RESET}` : line;
}

export function formatSummary(report: CrawlReport, reportPath: string): string {
  return [
    '',
    'Scan Summary:',
    `- HTML Pages: ${report.stats.total_html}`,
    `- Backend Endpoints: ${report.stats.total_backend}`,
    `- JavaScript Functions: ${report.stats.total_functions}`,
    `- Report saved to: ${reportPath}`,
  ].join('\n');
}
