import type { TextGenerator } from '../core/llm.js';
import { parseModelJson } from '../core/json_extract.js';
import { getPrompt, renderPrompt, type PromptName } from '../core/prompts.js';
import { ModelPlaceSchema, ModelPlacesPayloadSchema, type Place } from '../schemas/place.js';
import type { PlaceLookup, SnippetLookup } from '../schemas/context.js';
import { incFallback } from '../util/metrics.js';
import type { Logger } from '../util/logging.js';
import { dedupePlaces } from './place_extractor.js';
import type { CategorySource, PlaceCategory, SnippetCategory } from './category_source.js';

const PLACE_REQUESTS: Record<PlaceCategory, { prompt: PromptName; limit: number }> = {
  attractions: { prompt: 'knowledge_attractions', limit: 15 },
  restaurants: { prompt: 'knowledge_restaurants', limit: 15 },
  hotels: { prompt: 'knowledge_hotels', limit: 12 },
};

const SNIPPET_REQUESTS: Record<SnippetCategory, { prompt: PromptName; maxTokens: number; title: (city: string) => string }> = {
  weather: { prompt: 'knowledge_weather', maxTokens: 200, title: (city) => `Weather in ${city}` },
  tips: { prompt: 'knowledge_tips', maxTokens: 400, title: (city) => `Travel tips for ${city}` },
};

const TEMPERATURE = 0.3;
const LIST_MAX_TOKENS = 3000;

/** Keeps the entries that validate; one bad entry does not sink the list. */
export function toPlaces(entries: readonly unknown[]): Place[] {
  return entries.flatMap((entry) => {
    const parsed = ModelPlaceSchema.safeParse(entry);
    return parsed.success ? [parsed.data] : [];
  });
}

/**
 * Travel data from the model's own knowledge, requested as JSON place lists
 * or short free-text answers.
 */
export class KnowledgeRequester implements CategorySource {
  readonly name = 'knowledge';

  constructor(
    private readonly generator: TextGenerator,
    private readonly log: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async places(category: PlaceCategory, city: string): Promise<PlaceLookup> {
    const { prompt, limit } = PLACE_REQUESTS[category];
    const base = { city, query: `${category} in ${city}`, source: 'knowledge' as const, timestamp: this.now().toISOString() };

    try {
      const template = await getPrompt(prompt);
      const out = await this.generator.generate(renderPrompt(template, { city }), {
        temperature: TEMPERATURE,
        maxTokens: LIST_MAX_TOKENS,
      });
      if (!out.ok) return this.failedPlaces(base, category, out.reason);

      const parsed = parseModelJson(out.text, ModelPlacesPayloadSchema);
      if (!parsed.ok) return this.failedPlaces(base, category, parsed.reason);

      const places = dedupePlaces(toPlaces(parsed.value.places), limit);
      this.log.debug({ category, count: places.length }, 'knowledge places');
      return { ...base, status: places.length > 0 ? 'ok' : 'empty', places };
    } catch (err) {
      this.log.error({ category, err }, 'knowledge lookup crashed');
      return this.failedPlaces(base, category, 'error');
    }
  }

  async snippets(category: SnippetCategory, city: string): Promise<SnippetLookup> {
    const { prompt, maxTokens, title } = SNIPPET_REQUESTS[category];
    const now = this.now();
    const base = { city, query: `${category} in ${city}`, source: 'knowledge' as const, timestamp: now.toISOString() };

    try {
      const template = await getPrompt(prompt);
      const month = now.toLocaleString('en-US', { month: 'long', year: 'numeric', timeZone: 'UTC' });
      const out = await this.generator.generate(renderPrompt(template, { city, month }), {
        temperature: TEMPERATURE,
        maxTokens,
      });
      if (!out.ok) return this.failedSnippets(base, category, out.reason);
      return { ...base, status: 'ok', results: [{ title: title(city), snippet: out.text }] };
    } catch (err) {
      this.log.error({ category, err }, 'knowledge lookup crashed');
      return this.failedSnippets(base, category, 'error');
    }
  }

  private failedPlaces(base: Omit<PlaceLookup, 'status' | 'places'>, category: string, reason: string): PlaceLookup {
    incFallback(`knowledge_${category}`);
    this.log.warn({ category, reason }, 'knowledge lookup came back empty');
    return { ...base, status: 'failed', failure: reason, places: [] };
  }

  private failedSnippets(base: Omit<SnippetLookup, 'status' | 'results'>, category: string, reason: string): SnippetLookup {
    incFallback(`knowledge_${category}`);
    this.log.warn({ category, reason }, 'knowledge lookup came back empty');
    return { ...base, status: 'failed', failure: reason, results: [] };
  }
}
