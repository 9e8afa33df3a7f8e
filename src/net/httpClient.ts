/**
 * HTTP Client - undici wrapper with timeout, body cap and typed failures.
 *
 * Nothing here throws for network conditions: every call resolves to a
 * `Result` and the caller decides what a failure means.
 */

import { request, type Dispatcher } from 'undici';
import { Errors, errorMessage, type Result } from '../core/errors.js';

export interface HttpClientOptions {
  timeoutMs: number;
  maxBodyBytes: number;
  signal?: AbortSignal;
}

export interface HttpResponse {
  url: string;
  status: number;
  headers: Record<string, string>;
  body: string;
}

export interface HttpClient {
  get(url: string, options: HttpClientOptions): Promise<Result<HttpResponse>>;
}

export interface HttpClientConfig {
  userAgent: string;
  /** Defaults to undici's global dispatcher */
  dispatcher?: Dispatcher;
}

class BodyTooLargeError extends Error {
  constructor(readonly limitBytes: number) {
    super(`Body exceeds ${limitBytes} bytes`);
    this.name = 'BodyTooLargeError';
  }
}

function flattenHeaders(raw: Record<string, string | string[] | undefined>): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === undefined) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
  }
  return headers;
}

async function readCapped(body: Dispatcher.ResponseData['body'], maxBytes: number): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of body) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buf.length;
    if (total > maxBytes) {
      body.destroy();
      throw new BodyTooLargeError(maxBytes);
    }
    chunks.push(buf);
  }
  return new TextDecoder('utf-8').decode(Buffer.concat(chunks));
}

export function createHttpClient(config: HttpClientConfig): HttpClient {
  async function get(url: string, options: HttpClientOptions): Promise<Result<HttpResponse>> {
    if (options.signal?.aborted) return { ok: false, failure: Errors.cancelled(url) };

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);
    const onExternalAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onExternalAbort, { once: true });

    try {
      const res = await request(url, {
        method: 'GET',
        headers: {
          'user-agent': config.userAgent,
          accept: '*/*',
        },
        signal: controller.signal,
        ...(config.dispatcher && { dispatcher: config.dispatcher }),
      });

      const body = await readCapped(res.body, options.maxBodyBytes);
      return {
        ok: true,
        data: {
          url,
          status: res.statusCode,
          headers: flattenHeaders(res.headers),
          body,
        },
      };
    } catch (err) {
      if (err instanceof BodyTooLargeError) return { ok: false, failure: Errors.tooLarge(url, err.limitBytes) };
      if (timedOut) return { ok: false, failure: Errors.timeout(url, options.timeoutMs) };
      if (options.signal?.aborted) return { ok: false, failure: Errors.cancelled(url) };
      return { ok: false, failure: Errors.network(url, errorMessage(err)) };
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener('abort', onExternalAbort);
    }
  }

  return { get };
}
