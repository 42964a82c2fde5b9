import type { Place } from '../schemas/place.js';
import type { PlaceLookup, SnippetLookup } from '../schemas/context.js';
import { incFallback } from '../util/metrics.js';
import type { Logger } from '../util/logging.js';
import { dedupePlaces, extractFromText, extractPlacesFromHtml } from './place_extractor.js';
import type { RateLimitedFetcher } from './search.js';
import type { CategorySource, PlaceCategory, SnippetCategory } from './category_source.js';

const PLACE_QUERIES: Record<PlaceCategory, (city: string) => string> = {
  attractions: (city) => `top attractions things to do in ${city}`,
  restaurants: (city) => `best restaurants where to eat in ${city}`,
  hotels: (city) => `best hotels where to stay in ${city}`,
};

const SNIPPET_QUERIES: Record<SnippetCategory, (city: string) => string> = {
  weather: (city) => `weather in ${city} today`,
  tips: (city) => `travel guide tips ${city}`,
};

const PER_PAGE = 5;
const PER_SNIPPET = 2;

export type ExtractionOut = { ok: true; places: Place[] } | { ok: false; reason: string };

/**
 * Search, then read the top result pages and pull place names out of them.
 * A page that cannot be read falls back to its search snippet.
 */
export class WebPlaceSearch implements CategorySource {
  readonly name = 'web';

  constructor(
    private readonly fetcher: RateLimitedFetcher,
    private readonly log: Logger,
    private readonly pagesPerSearch = 2,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async searchWithExtraction(query: string, maxResults = 3): Promise<ExtractionOut> {
    const out = await this.fetcher.search(query, maxResults);
    if (!out.ok) return out;

    const found: Place[] = [];
    for (const result of out.results.slice(0, this.pagesPerSearch)) {
      const page = await this.fetcher.fetchPage(result.url);
      const fromPage = page.ok ? extractPlacesFromHtml(page.html, result.url).slice(0, PER_PAGE) : [];
      if (fromPage.length > 0) {
        found.push(...fromPage);
        continue;
      }
      this.log.debug({ reason: page.ok ? 'no_places' : page.reason }, 'using search snippet');
      found.push(...extractFromText(result.snippet, result.url).slice(0, PER_SNIPPET));
    }
    return { ok: true, places: dedupePlaces(found) };
  }

  async places(category: PlaceCategory, city: string): Promise<PlaceLookup> {
    const query = PLACE_QUERIES[category](city);
    const base = { city, query, source: 'web' as const, timestamp: this.now().toISOString() };
    const out = await this.searchWithExtraction(query);
    if (!out.ok) {
      incFallback(`web_${category}`);
      return { ...base, status: 'failed', failure: out.reason, places: [] };
    }
    return { ...base, status: out.places.length > 0 ? 'ok' : 'empty', places: out.places };
  }

  async snippets(category: SnippetCategory, city: string): Promise<SnippetLookup> {
    const query = SNIPPET_QUERIES[category](city);
    const base = { city, query, source: 'web' as const, timestamp: this.now().toISOString() };
    const out = await this.fetcher.search(query, 2);
    if (!out.ok) {
      incFallback(`web_${category}`);
      return { ...base, status: 'failed', failure: out.reason, results: [] };
    }
    const results = out.results
      .filter((r) => r.snippet)
      .map((r) => ({ title: r.title, snippet: r.snippet, url: r.url }));
    return { ...base, status: results.length > 0 ? 'ok' : 'empty', results };
  }
}
