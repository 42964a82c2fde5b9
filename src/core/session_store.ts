import type { SessionConfig } from '../config/session.js';
import type { DocumentChunk } from '../schemas/context.js';
import type { SessionInfo } from '../schemas/upload.js';
import { createInMemoryStore } from './stores/inmemory.js';

export type Msg = { role: 'user' | 'assistant'; content: string };

/**
 * Per-session state: the rolling conversation and any uploaded document
 * chunks. Reads never create a session; writes create it on first use.
 */
export interface SessionStore {
  getMsgs(id: string, limit?: number): Promise<Msg[]>;
  /** Appends and trims to `limit` in one step, with no await in between. */
  appendMsgs(id: string, msgs: Msg[], limit?: number): Promise<void>;
  addChunks(id: string, chunks: DocumentChunk[]): Promise<number>;
  getChunks(id: string): Promise<DocumentChunk[]>;
  info(id: string): Promise<SessionInfo>;
  clear(id: string): Promise<void>;
  /** Stops background timers. */
  close(): void;
}

export function createStore(cfg: SessionConfig): SessionStore {
  return createInMemoryStore(cfg);
}
