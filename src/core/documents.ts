import type { SessionStore } from './session_store.js';
import type { ChunkMetadata, DocumentExcerpt } from '../schemas/context.js';
import type { SessionInfo } from '../schemas/upload.js';

export function keywords(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []);
}

/** Share of query keywords present in the content; 0 when nothing overlaps. */
export function overlapScore(queryTokens: ReadonlySet<string>, content: string): number {
  if (queryTokens.size === 0) return 0;
  const contentTokens = keywords(content);
  let hits = 0;
  for (const token of queryTokens) {
    if (contentTokens.has(token)) hits++;
  }
  return hits / queryTokens.size;
}

/**
 * Document excerpts kept per session, searched by keyword overlap.
 */
export class DocumentMemory {
  constructor(private readonly store: SessionStore) {}

  async add(sessionId: string, chunks: string[], metadata: ChunkMetadata[] = []): Promise<number> {
    return this.store.addChunks(
      sessionId,
      chunks.map((content, i) => ({ content, metadata: metadata[i] ?? { chunk_index: i } })),
    );
  }

  async search(sessionId: string, query: string, topK = 3): Promise<DocumentExcerpt[]> {
    const chunks = await this.store.getChunks(sessionId);
    if (chunks.length === 0) return [];
    const queryTokens = keywords(query);

    return chunks
      .map((chunk) => ({ content: chunk.content, metadata: chunk.metadata, relevance: overlapScore(queryTokens, chunk.content) }))
      .filter((excerpt) => excerpt.relevance > 0)
      .sort((a, b) => b.relevance - a.relevance)
      .slice(0, topK);
  }

  async info(sessionId: string): Promise<SessionInfo> {
    return this.store.info(sessionId);
  }

  async clear(sessionId: string): Promise<void> {
    await this.store.clear(sessionId);
  }
}
