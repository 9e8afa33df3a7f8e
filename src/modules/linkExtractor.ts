/* =============================================================================
 * MODULE: linkExtractor.ts
 * =============================================================================
 * Pulls candidate links out of an HTML document. Pure: no fetch, no state.
 * node-html-parser is forgiving, so broken markup yields whatever elements it
 * could recover rather than an error.
 * =============================================================================
 */

import { parse as parseHTML, type HTMLElement } from 'node-html-parser';
import { isInScope, resolveLink } from '../util/urlScope.js';

const LINK_ATTRIBUTES: Record<string, string> = {
  a: 'href',
  link: 'href',
  script: 'src',
  frame: 'src',
  iframe: 'src',
  form: 'action',
};

const LINK_SELECTOR = Object.keys(LINK_ATTRIBUTES).join(', ');

const FETCHABLE_SCRIPT = /^https?:\/\//i;

export interface ExtractedLinks {
  /** Unique in-scope absolute URLs, document order */
  links: Set<string>;
  /**
   * Every resolvable http(s) script source, on any host. The analyzer
   * filters what the scripts call, not where they are served from.
   */
  scripts: Set<string>;
}

function documentBase(root: HTMLElement, pageUrl: string): string {
  const href = root.querySelector('base[href]')?.getAttribute('href');
  if (!href) return pageUrl;
  return resolveLink(href, pageUrl) ?? pageUrl;
}

export function extractLinks(html: string, pageUrl: string, host: string): ExtractedLinks {
  const root = parseHTML(html);
  const base = documentBase(root, pageUrl);
  const links = new Set<string>();
  const scripts = new Set<string>();

  for (const el of root.querySelectorAll(LINK_SELECTOR)) {
    const tag = el.rawTagName.toLowerCase();
    const attr = LINK_ATTRIBUTES[tag];
    if (!attr) continue;

    const value = el.getAttribute(attr);
    if (value === undefined) continue;

    const resolved = resolveLink(value, base);
    if (!resolved) continue;

    if (tag === 'script' && value.trim() && FETCHABLE_SCRIPT.test(resolved)) scripts.add(resolved);
    if (isInScope(resolved, host)) links.add(resolved);
  }

  return { links, scripts };
}
