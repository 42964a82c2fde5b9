import type Bottleneck from 'bottleneck';
import {
  ConstantBackoff,
  TaskCancelledError,
  TimeoutStrategy,
  handleAll,
  retry,
  timeout,
  type RetryPolicy,
  type TimeoutPolicy,
} from 'cockatiel';
import { createGate, scheduleWithLimit } from '../util/limiter.js';
import { BROWSER_USER_AGENT, ExternalFetchError, fetchText } from '../util/fetch.js';
import { incFallback } from '../util/metrics.js';
import type { Logger } from '../util/logging.js';

export interface SearchResult {
  title: string;
  url: string;
  snippet: string;
}

export type SearchOut = { ok: true; results: SearchResult[] } | { ok: false; reason: string };

export type PageOut = { ok: true; url: string; html: string } | { ok: false; reason: string };

/** A web search engine. Throws on failure; the fetcher decides about retries. */
export interface SearchBackend {
  readonly name: string;
  search(query: string, maxResults: number, signal: AbortSignal): Promise<SearchResult[]>;
}

export interface PageFetcher {
  fetch(url: string, timeoutMs: number): Promise<{ contentType: string; text: string }>;
}

export const httpPageFetcher: PageFetcher = {
  async fetch(url, timeoutMs) {
    let host: string;
    try {
      host = new URL(url).hostname;
    } catch {
      throw new ExternalFetchError('network', 'invalid_url');
    }
    return scheduleWithLimit(host, () =>
      fetchText(url, {
        timeoutMs,
        target: 'page',
        headers: { 'User-Agent': BROWSER_USER_AGENT, Accept: 'text/html,application/xhtml+xml' },
      }),
    );
  },
};

export interface FetcherOptions {
  /** Minimum gap between the starts of two searches. */
  minIntervalMs: number;
  /** Total tries per search, the first one included. */
  maxAttempts: number;
  retryDelayMs: number;
  timeoutMs: number;
  maxResults: number;
}

export function describeFailure(err: unknown): string {
  if (err instanceof TaskCancelledError) return 'timeout';
  if (err instanceof ExternalFetchError) return err.status ? `${err.kind}_${err.status}` : err.kind;
  return 'network';
}

/**
 * Web search and page fetching for the whole process. Searches queue on one
 * gate so at most one runs at a time, spaced by `minIntervalMs`; retries go
 * back through the same gate.
 */
export class RateLimitedFetcher {
  private readonly gate: Bottleneck;
  private readonly policy: RetryPolicy;
  private readonly attemptTimeout: TimeoutPolicy;

  constructor(
    private readonly backend: SearchBackend,
    private readonly opts: FetcherOptions,
    private readonly log: Logger,
    private readonly pages: PageFetcher = httpPageFetcher,
  ) {
    this.gate = createGate(opts.minIntervalMs);
    this.policy = retry(handleAll, {
      maxAttempts: Math.max(0, opts.maxAttempts - 1),
      backoff: new ConstantBackoff(opts.retryDelayMs),
    });
    this.attemptTimeout = timeout(opts.timeoutMs, TimeoutStrategy.Aggressive);
  }

  get backendName(): string {
    return this.backend.name;
  }

  async search(query: string, maxResults = this.opts.maxResults): Promise<SearchOut> {
    const q = query.trim();
    if (!q) return { ok: false, reason: 'empty_query' };

    try {
      const results = await this.policy.execute(({ attempt }) => this.gate.schedule(() => this.attempt(q, maxResults, attempt)));
      this.log.debug({ backend: this.backend.name, count: results.length }, 'search complete');
      return { ok: true, results: results.slice(0, maxResults) };
    } catch (err) {
      const reason = describeFailure(err);
      incFallback('search');
      this.log.warn({ backend: this.backend.name, reason, attempts: this.opts.maxAttempts }, 'search gave up');
      return { ok: false, reason };
    }
  }

  private async attempt(query: string, maxResults: number, attempt: number): Promise<SearchResult[]> {
    this.log.debug({ backend: this.backend.name, attempt }, 'search attempt');
    return this.attemptTimeout.execute(({ signal }) => this.backend.search(query, maxResults, signal));
  }

  async fetchPage(url: string): Promise<PageOut> {
    try {
      const res = await this.pages.fetch(url, this.opts.timeoutMs);
      if (res.contentType && !/html|text\/plain/i.test(res.contentType)) {
        return { ok: false, reason: 'not_html' };
      }
      return { ok: true, url, html: res.text };
    } catch (err) {
      const reason = describeFailure(err);
      this.log.debug({ reason }, 'page fetch failed');
      return { ok: false, reason };
    }
  }
}
