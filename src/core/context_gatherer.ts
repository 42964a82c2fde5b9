import type {
  CategoryResults,
  ContextBundle,
  DocumentExcerpt,
  Intent,
  PlaceLookup,
  Provenance,
  SnippetLookup,
} from '../schemas/context.js';
import type { Place } from '../schemas/place.js';
import type { CategorySource, PlaceCategory } from '../tools/category_source.js';
import type { Logger } from '../util/logging.js';
import type { DocumentMemory } from './documents.js';
import { classifyIntent } from './intent.js';

export interface GatherRequest {
  query: string;
  sessionId: string;
  /** Overrides the classified intent, e.g. for trip planning. */
  intent?: Intent;
}

export interface GatherResult {
  intent: Intent;
  bundle: ContextBundle;
}

interface Contribution {
  toolCall: string;
  sources: Provenance[];
  results?: CategoryResults;
  excerpts?: DocumentExcerpt[];
}

const PLACE_TOOLS: Record<PlaceCategory, string> = {
  attractions: 'attractions_search',
  restaurants: 'restaurants_search',
  hotels: 'hotel_search',
};

function categoryResult(category: PlaceCategory, places: readonly Place[]): CategoryResults {
  switch (category) {
    case 'attractions':
      return { attractions: places };
    case 'restaurants':
      return { restaurants: places };
    case 'hotels':
      return { hotels: places };
  }
}

/**
 * Turns a query into a ContextBundle: one lookup per requested category,
 * run concurrently. Categories other than documents need a known location.
 */
export class ContextGatherer {
  private readonly topK: number;

  constructor(
    private readonly source: CategorySource,
    private readonly documents: DocumentMemory,
    private readonly log: Logger,
    opts: { topK?: number } = {},
  ) {
    this.topK = opts.topK ?? 3;
  }

  async gather(req: GatherRequest): Promise<GatherResult> {
    const intent = req.intent ?? classifyIntent(req.query);
    const city = intent.location;
    const pending: Array<Promise<Contribution | null>> = [];

    if (intent.needsDocuments) pending.push(this.documentLookup(req.sessionId, req.query));
    if (city) {
      if (intent.needsWeather) pending.push(this.weatherLookup(city));
      if (intent.needsHotels) pending.push(this.placeLookup('hotels', city));
      if (intent.needsAttractions) pending.push(this.placeLookup('attractions', city));
      if (intent.needsRestaurants) pending.push(this.placeLookup('restaurants', city));
      if (intent.needsGeneralKnowledge) pending.push(this.tipsLookup(city));
    }

    const contributions = await Promise.all(pending);

    let documentExcerpts: DocumentExcerpt[] = [];
    const categoryResults: CategoryResults = {};
    const sourcesUsed: Provenance[] = [];
    const toolCalls: string[] = [];

    for (const c of contributions) {
      if (!c) continue;
      if (c.excerpts) documentExcerpts = c.excerpts;
      Object.assign(categoryResults, c.results);
      sourcesUsed.push(...c.sources);
      toolCalls.push(c.toolCall);
    }
    if (intent.needsGeneralKnowledge) toolCalls.push('llm_knowledge');

    this.log.debug({ toolCalls, location: city !== undefined }, 'context gathered');

    return {
      intent,
      bundle: Object.freeze({
        documentExcerpts: Object.freeze(documentExcerpts),
        categoryResults: Object.freeze(categoryResults),
        sourcesUsed: Object.freeze(sourcesUsed),
        toolCalls: Object.freeze(toolCalls),
      }),
    };
  }

  private async documentLookup(sessionId: string, query: string): Promise<Contribution | null> {
    const excerpts = await this.documents.search(sessionId, query, this.topK);
    if (excerpts.length === 0) return null;
    return {
      toolCall: 'rag_search',
      excerpts,
      sources: excerpts.map((e) => ({ type: 'document' as const, content: e.content.slice(0, 200), relevance: e.relevance })),
    };
  }

  private provenance(lookup: PlaceLookup | SnippetLookup): Provenance {
    return { type: lookup.source, query: lookup.query };
  }

  private async placeLookup(category: PlaceCategory, city: string): Promise<Contribution | null> {
    const lookup = await this.source.places(category, city);
    if (lookup.places.length === 0) return null;
    return {
      toolCall: PLACE_TOOLS[category],
      results: categoryResult(category, Object.freeze([...lookup.places])),
      sources: [this.provenance(lookup)],
    };
  }

  private async weatherLookup(city: string): Promise<Contribution | null> {
    const lookup = await this.source.snippets('weather', city);
    const summary = lookup.results.map((r) => r.snippet).join(' ').trim();
    if (!summary) return null;
    return {
      toolCall: 'weather_search',
      results: { weather: { city, summary } },
      sources: [this.provenance(lookup)],
    };
  }

  private async tipsLookup(city: string): Promise<Contribution | null> {
    const lookup = await this.source.snippets('tips', city);
    const tips = lookup.results.map((r) => r.snippet).join('\n').trim();
    if (!tips) return null;
    return {
      toolCall: 'tips_search',
      results: { tips },
      sources: [this.provenance(lookup)],
    };
  }
}
