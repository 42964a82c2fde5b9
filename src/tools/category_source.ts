import type { KnowledgeSourceKind } from '../config/app.js';
import type { PlaceLookup, SnippetLookup } from '../schemas/context.js';
import type { Logger } from '../util/logging.js';

export type PlaceCategory = 'attractions' | 'restaurants' | 'hotels';
export type SnippetCategory = 'weather' | 'tips';

/**
 * Provider of per-city travel data. Lookups never throw: failures come back
 * as an empty result with `status: 'failed'`.
 */
export interface CategorySource {
  readonly name: string;
  places(category: PlaceCategory, city: string): Promise<PlaceLookup>;
  snippets(category: SnippetCategory, city: string): Promise<SnippetLookup>;
}

/** Asks `primary` first and `secondary` only when the first comes back empty. */
export class HybridSource implements CategorySource {
  readonly name = 'hybrid';

  constructor(
    private readonly primary: CategorySource,
    private readonly secondary: CategorySource,
    private readonly log: Logger,
  ) {}

  async places(category: PlaceCategory, city: string): Promise<PlaceLookup> {
    const first = await this.primary.places(category, city);
    if (first.status === 'ok') return first;
    this.log.debug({ category, from: this.primary.name, to: this.secondary.name }, 'hybrid lookup falling through');
    const second = await this.secondary.places(category, city);
    return second.status === 'ok' ? second : first;
  }

  async snippets(category: SnippetCategory, city: string): Promise<SnippetLookup> {
    const first = await this.primary.snippets(category, city);
    if (first.status === 'ok') return first;
    this.log.debug({ category, from: this.primary.name, to: this.secondary.name }, 'hybrid lookup falling through');
    const second = await this.secondary.snippets(category, city);
    return second.status === 'ok' ? second : first;
  }
}

export function selectCategorySource(
  kind: KnowledgeSourceKind,
  sources: { knowledge: CategorySource; web: CategorySource },
  log: Logger,
): CategorySource {
  switch (kind) {
    case 'llm':
      return sources.knowledge;
    case 'web':
      return sources.web;
    case 'hybrid':
      return new HybridSource(sources.knowledge, sources.web, log);
  }
}
