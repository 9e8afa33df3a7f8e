/* =============================================================================
 * MODULE: scriptAnalyzer.ts
 * =============================================================================
 * Static heuristics over external scripts. Nothing is executed:
 *   - API-call targets: first string argument of fetch / axios / axios.<verb>
 *     / *.ajax / XMLHttpRequest calls, resolved against the script URL and
 *     recorded like any discovered link
 *   - declared identifiers: the name after function / const / let / var,
 *     two characters or longer
 * The source is lexed with acorn's tokenizer so that strings and comments do
 * not produce false hits. Best effort only: a tokenizer error keeps what was
 * read up to that point.
 * =============================================================================
 */

import { tokenizer, tokTypes, type Token } from 'acorn';
import type { Logger } from 'pino';
import type { CrawlState } from '../core/crawlState.js';
import { Errors, errorMessage, type CrawlFailure } from '../core/errors.js';
import type { HttpClient } from '../net/httpClient.js';
import { isInScope, resolveLink } from '../util/urlScope.js';
import { classifyEndpoint } from './endpointClassifier.js';

const CALLEE_SUFFIXES = ['fetch', 'axios', 'xmlhttprequest'];
const AXIOS_VERBS = new Set(['get', 'post', 'put', 'patch', 'delete', 'head', 'options', 'request']);
// single-letter names are minifier output
const MIN_NAME_LENGTH = 2;

export interface ScriptScan {
  apiTargets: string[];
  functionNames: Set<string>;
  /** Set when the tokenizer stopped before the end of the source */
  partial: boolean;
  error?: string;
}

export interface ScriptAnalysis {
  ok: boolean;
  functionNames: Set<string>;
  /** Endpoints recorded in the store for the first time */
  endpointsAdded: number;
  partial: boolean;
  failure?: CrawlFailure;
}

export interface ScriptAnalysisContext {
  http: HttpClient;
  state: CrawlState;
  host: string;
  timeoutMs: number;
  maxBytes: number;
  log: Logger;
  signal?: AbortSignal;
}

function lex(source: string): { tokens: Token[]; error?: string } {
  const tokens: Token[] = [];
  try {
    const stream = tokenizer(source, {
      ecmaVersion: 'latest',
      allowHashBang: true,
      allowReturnOutsideFunction: true,
      allowAwaitOutsideFunction: true,
      allowImportExportEverywhere: true,
    });
    for (;;) {
      const token = stream.getToken();
      if (token.type === tokTypes.eof) break;
      tokens.push(token);
    }
    return { tokens };
  } catch (err) {
    return { tokens, error: errorMessage(err) };
  }
}

// cooked value: identifier name or string literal contents
function tokenValue(token: Token): unknown {
  return 'value' in token ? token.value : undefined;
}

function isName(token: Token | undefined, value?: string): boolean {
  if (!token || token.type !== tokTypes.name) return false;
  return value === undefined || tokenValue(token) === value;
}

function nameOf(token: Token): string {
  const value = tokenValue(token);
  return typeof value === 'string' ? value : '';
}

function isApiCallee(tokens: Token[], i: number): boolean {
  const token = tokens[i];
  if (!isName(token)) return false;
  const name = nameOf(token).toLowerCase();
  const prev = tokens[i - 1];
  const afterDot = prev?.type === tokTypes.dot;

  if (CALLEE_SUFFIXES.some((suffix) => name.endsWith(suffix))) return true;
  if (afterDot && name === 'ajax') return true;
  // axios.get('/x')
  if (afterDot && AXIOS_VERBS.has(name)) {
    const owner = tokens[i - 2];
    return owner !== undefined && isName(owner) && nameOf(owner).toLowerCase() === 'axios';
  }
  return false;
}

function isBindingKeyword(token: Token): boolean {
  return token.type === tokTypes._function
    || token.type === tokTypes._const
    || token.type === tokTypes._var
    || isName(token, 'let');
}

/**
 * Run both heuristics over script text
 */
export function scanScriptSource(source: string): ScriptScan {
  const { tokens, error } = lex(source);
  const apiTargets: string[] = [];
  const functionNames = new Set<string>();

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (isApiCallee(tokens, i) && tokens[i + 1]?.type === tokTypes.parenL) {
      const arg = tokens[i + 2];
      const value = arg?.type === tokTypes.string ? tokenValue(arg) : undefined;
      if (typeof value === 'string' && value.length > 0) apiTargets.push(value);
      continue;
    }

    if (isBindingKeyword(token)) {
      let next = tokens[i + 1];
      // function* gen()
      if (token.type === tokTypes._function && next?.type === tokTypes.star) next = tokens[i + 2];
      if (next && isName(next)) {
        const name = nameOf(next);
        if (name.length >= MIN_NAME_LENGTH) functionNames.add(name);
      }
    }
  }

  return { apiTargets, functionNames, partial: error !== undefined, ...(error && { error }) };
}

/**
 * Fetch a script and apply the heuristics. API targets are recorded in the
 * crawl state as a side effect; the declared names are returned. A fetch
 * failure gives an empty analysis.
 */
export async function analyzeScript(scriptUrl: string, ctx: ScriptAnalysisContext): Promise<ScriptAnalysis> {
  const res = await ctx.http.get(scriptUrl, {
    timeoutMs: ctx.timeoutMs,
    maxBodyBytes: ctx.maxBytes,
    signal: ctx.signal,
  });

  if (!res.ok) {
    ctx.log.debug({ url: scriptUrl, code: res.failure.code }, 'Script fetch failed');
    return { ok: false, functionNames: new Set(), endpointsAdded: 0, partial: false, failure: res.failure };
  }

  const scan = scanScriptSource(res.data.body);
  const failure = scan.partial ? Errors.malformed(scriptUrl, scan.error) : undefined;
  if (failure) ctx.log.debug({ url: scriptUrl, code: failure.code, reason: scan.error }, 'Script only partially tokenized');

  let endpointsAdded = 0;
  for (const target of scan.apiTargets) {
    const resolved = resolveLink(target, scriptUrl);
    if (!resolved || !isInScope(resolved, ctx.host)) continue;

    const category = classifyEndpoint(resolved);
    if (category === 'unknown') continue;
    if (await ctx.state.recordEndpoint(resolved, category)) endpointsAdded += 1;
  }

  return {
    ok: true,
    functionNames: scan.functionNames,
    endpointsAdded,
    partial: scan.partial,
    ...(failure && { failure }),
  };
}
