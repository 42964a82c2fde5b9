import type { Place } from './place.js';

/** What a query asks for. Computed once per query and frozen. */
export interface Intent {
  readonly needsDocuments: boolean;
  readonly needsWeather: boolean;
  readonly needsHotels: boolean;
  readonly needsAttractions: boolean;
  readonly needsRestaurants: boolean;
  readonly needsGeneralKnowledge: boolean;
  readonly location?: string;
}

export type ChunkMetadata = Record<string, string | number>;

export interface DocumentChunk {
  content: string;
  metadata: ChunkMetadata;
}

export interface DocumentExcerpt {
  content: string;
  /** Share of query keywords found in the chunk, in (0, 1]. */
  relevance: number;
  metadata: ChunkMetadata;
}

export type ProvenanceType = 'document' | 'knowledge' | 'web';

export interface Provenance {
  type: ProvenanceType;
  query?: string;
  content?: string;
  relevance?: number;
  url?: string;
}

export interface WeatherSummary {
  city: string;
  summary: string;
}

export interface CategoryResults {
  weather?: WeatherSummary;
  hotels?: readonly Place[];
  attractions?: readonly Place[];
  restaurants?: readonly Place[];
  tips?: string;
}

export interface ContextBundle {
  readonly documentExcerpts: readonly DocumentExcerpt[];
  readonly categoryResults: Readonly<CategoryResults>;
  readonly sourcesUsed: readonly Provenance[];
  readonly toolCalls: readonly string[];
}

export type LookupStatus = 'ok' | 'empty' | 'failed';
export type SourceKind = 'knowledge' | 'web';

interface LookupBase {
  city: string;
  query: string;
  status: LookupStatus;
  source: SourceKind;
  timestamp: string;
  /** Why the lookup came back empty, when it failed. */
  failure?: string;
}

export interface PlaceLookup extends LookupBase {
  places: Place[];
}

export interface Snippet {
  title: string;
  snippet: string;
  url?: string;
}

export interface SnippetLookup extends LookupBase {
  results: Snippet[];
}
