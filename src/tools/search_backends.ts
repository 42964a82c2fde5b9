import * as cheerio from 'cheerio';
import { z } from 'zod';
import type { SearchConfig } from '../config/app.js';
import { BROWSER_USER_AGENT, ExternalFetchError, fetchJSON, fetchText } from '../util/fetch.js';
import type { Logger } from '../util/logging.js';
import type { SearchBackend, SearchResult } from './search.js';

/** Resolves a result link, unwrapping DuckDuckGo's `/l/?uddg=` redirects. */
export function decodeDuckDuckGoLink(href: string | undefined): string | undefined {
  if (!href) return undefined;
  let url: URL;
  try {
    url = new URL(href, 'https://duckduckgo.com');
  } catch {
    return undefined;
  }
  const target = url.searchParams.get('uddg');
  if (target) return /^https?:\/\//i.test(target) ? target : undefined;
  if (url.hostname.endsWith('duckduckgo.com')) return undefined;
  return url.protocol === 'http:' || url.protocol === 'https:' ? url.toString() : undefined;
}

export function parseDuckDuckGoHtml(html: string): SearchResult[] {
  const $ = cheerio.load(html);
  const results: SearchResult[] = [];

  $('.result').each((_, el) => {
    const node = $(el);
    if (node.hasClass('result--ad')) return;
    const link = node.find('a.result__a').first();
    const url = decodeDuckDuckGoLink(link.attr('href'));
    const title = link.text().replace(/\s+/g, ' ').trim();
    if (!url || !title) return;
    const snippet = node.find('.result__snippet').first().text().replace(/\s+/g, ' ').trim();
    results.push({ title, url, snippet });
  });

  return results;
}

/** DuckDuckGo's JavaScript-free HTML endpoint. Needs no key. */
export class DuckDuckGoBackend implements SearchBackend {
  readonly name = 'duckduckgo';

  constructor(
    private readonly timeoutMs: number,
    private readonly endpoint = 'https://html.duckduckgo.com/html/',
  ) {}

  async search(query: string, maxResults: number, signal: AbortSignal): Promise<SearchResult[]> {
    const res = await fetchText(`${this.endpoint}?q=${encodeURIComponent(query)}`, {
      headers: { 'User-Agent': BROWSER_USER_AGENT, Accept: 'text/html' },
      timeoutMs: this.timeoutMs,
      target: this.name,
      signal,
    });
    // 202 carries the bot-check page instead of results
    if (res.status === 202) throw new ExternalFetchError('http', 'HTTP_202', 202);
    return parseDuckDuckGoHtml(res.text).slice(0, maxResults);
  }
}

const BraveReply = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string(),
            url: z.string(),
            description: z.string().optional(),
          }),
        )
        .default([]),
    })
    .optional(),
});

function stripTags(text: string): string {
  return text.replace(/<[^>]+>/g, '').replace(/\s+/g, ' ').trim();
}

export class BraveBackend implements SearchBackend {
  readonly name = 'brave';

  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number,
    private readonly endpoint = 'https://api.search.brave.com/res/v1/web/search',
  ) {}

  async search(query: string, maxResults: number, signal: AbortSignal): Promise<SearchResult[]> {
    const body = await fetchJSON(`${this.endpoint}?q=${encodeURIComponent(query)}&count=${maxResults}`, {
      headers: { 'X-Subscription-Token': this.apiKey },
      timeoutMs: this.timeoutMs,
      target: this.name,
      signal,
    });
    const parsed = BraveReply.safeParse(body);
    if (!parsed.success) throw new ExternalFetchError('network', 'bad_response');
    return (parsed.data.web?.results ?? []).slice(0, maxResults).map((r) => ({
      title: stripTags(r.title),
      url: r.url,
      snippet: stripTags(r.description ?? ''),
    }));
  }
}

export function createSearchBackend(cfg: SearchConfig, log: Logger): SearchBackend {
  if (cfg.provider === 'brave') {
    if (cfg.braveApiKey) return new BraveBackend(cfg.braveApiKey, cfg.fetchTimeoutMs);
    log.warn('SEARCH_PROVIDER=brave without BRAVE_SEARCH_API_KEY; using duckduckgo');
  }
  return new DuckDuckGoBackend(cfg.fetchTimeoutMs);
}
