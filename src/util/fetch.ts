import { fetch } from 'undici';
import { observeExternal } from './metrics.js';
import { createLogger } from './logging.js';

const log = createLogger({ name: 'fetch' });

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

export type FetchFailureKind = 'timeout' | 'http' | 'network';

export class ExternalFetchError extends Error {
  constructor(
    readonly kind: FetchFailureKind,
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ExternalFetchError';
  }
}

export interface FetchOptions {
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
  /** Metrics label for the upstream, e.g. "ollama" or "duckduckgo". */
  target?: string;
  signal?: AbortSignal;
}

export interface TextResponse {
  status: number;
  contentType: string;
  text: string;
}

function statusLabel(err: ExternalFetchError): string {
  if (err.kind !== 'http') return err.kind;
  return err.status !== undefined && err.status >= 500 ? '5xx' : '4xx';
}

function toFetchError(err: unknown): ExternalFetchError {
  if (err instanceof ExternalFetchError) return err;
  if (err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')) {
    return new ExternalFetchError('timeout', 'timeout');
  }
  return new ExternalFetchError('network', err instanceof Error ? err.message : 'network_error');
}

/**
 * Fetches a URL as text with an abort timeout. Non-2xx responses, timeouts and
 * transport failures all surface as ExternalFetchError.
 */
export async function fetchText(url: string, opts: FetchOptions = {}): Promise<TextResponse> {
  const timeoutMs = opts.timeoutMs ?? 10000;
  const target = opts.target ?? 'unknown';

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ExternalFetchError('network', 'invalid_url');
  }

  const start = Date.now();
  const ac = new AbortController();
  const timer = setTimeout(() => ac.abort(), timeoutMs);
  const onOuterAbort = () => ac.abort();
  opts.signal?.addEventListener('abort', onOuterAbort, { once: true });

  try {
    const res = await fetch(parsed, {
      method: opts.method ?? 'GET',
      headers: opts.headers,
      body: opts.body,
      signal: ac.signal,
    });
    if (!res.ok) {
      await res.body?.cancel();
      throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
    }
    const text = await res.text();
    observeExternal({ target, status: 'ok' }, Date.now() - start);
    return { status: res.status, contentType: res.headers.get('content-type') ?? '', text };
  } catch (err) {
    const failure = toFetchError(err);
    observeExternal({ target, status: statusLabel(failure) }, Date.now() - start);
    log.debug({ target, kind: failure.kind, status: failure.status, host: parsed.hostname }, 'external request failed');
    throw failure;
  } finally {
    clearTimeout(timer);
    opts.signal?.removeEventListener('abort', onOuterAbort);
  }
}

export async function fetchJSON(url: string, opts: FetchOptions = {}): Promise<unknown> {
  const res = await fetchText(url, {
    ...opts,
    headers: { Accept: 'application/json', ...opts.headers },
  });
  try {
    return JSON.parse(res.text);
  } catch {
    throw new ExternalFetchError('network', 'json_parse_error');
  }
}
