import type { SessionStore, Msg } from '../session_store.js';
import type { SessionConfig } from '../../config/session.js';
import type { DocumentChunk } from '../../schemas/context.js';
import type { SessionInfo } from '../../schemas/upload.js';

interface Entry {
  msgs: Msg[];
  chunks: DocumentChunk[];
  createdAt: number;
  expiresAt: number;
}

export function createInMemoryStore(cfg: Pick<SessionConfig, 'ttlSec' | 'sweepIntervalMs'>): SessionStore {
  const store = new Map<string, Entry>();
  const ttlMs = cfg.ttlSec * 1000;

  const sweeper = setInterval(() => {
    const now = Date.now();
    for (const [id, entry] of store.entries()) {
      if (entry.expiresAt <= now) {
        store.delete(id);
      }
    }
  }, cfg.sweepIntervalMs);
  sweeper.unref();

  function live(id: string): Entry | undefined {
    const entry = store.get(id);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      store.delete(id);
      return undefined;
    }
    entry.expiresAt = Date.now() + ttlMs;
    return entry;
  }

  function getOrCreate(id: string): Entry {
    const existing = live(id);
    if (existing) return existing;
    const now = Date.now();
    const fresh: Entry = { msgs: [], chunks: [], createdAt: now, expiresAt: now + ttlMs };
    store.set(id, fresh);
    return fresh;
  }

  return {
    async getMsgs(id: string, limit?: number): Promise<Msg[]> {
      const entry = live(id);
      if (!entry) return [];
      if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0) {
        return entry.msgs.slice(-limit);
      }
      return [...entry.msgs];
    },

    async appendMsgs(id: string, msgs: Msg[], limit?: number): Promise<void> {
      const entry = getOrCreate(id);
      entry.msgs.push(...msgs);
      if (typeof limit === 'number' && Number.isFinite(limit) && limit > 0 && entry.msgs.length > limit) {
        entry.msgs.splice(0, entry.msgs.length - limit);
      }
    },

    async addChunks(id: string, chunks: DocumentChunk[]): Promise<number> {
      const entry = getOrCreate(id);
      entry.chunks.push(...chunks);
      return chunks.length;
    },

    async getChunks(id: string): Promise<DocumentChunk[]> {
      return [...(live(id)?.chunks ?? [])];
    },

    async info(id: string): Promise<SessionInfo> {
      const entry = live(id);
      if (!entry) return { exists: false, count: 0, messages: 0 };
      return {
        exists: true,
        count: entry.chunks.length,
        messages: entry.msgs.length,
        createdAt: new Date(entry.createdAt).toISOString(),
      };
    },

    async clear(id: string): Promise<void> {
      store.delete(id);
    },

    close(): void {
      clearInterval(sweeper);
      store.clear();
    },
  };
}
