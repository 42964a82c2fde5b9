import { randomUUID } from 'node:crypto';
import type { SessionStore, Msg } from './session_store.js';

export function getThreadId(provided?: string): string {
  const id = (provided || '').trim();
  if (id) {
    return id.length > 64 ? id.slice(0, 64) : id;
  }
  return randomUUID();
}

/** Stores one user/assistant exchange, keeping at most `maxMessages` turns. */
export async function recordExchange(
  store: SessionStore,
  threadId: string,
  user: string,
  assistant: string,
  maxMessages: number,
): Promise<void> {
  await store.appendMsgs(
    threadId,
    [
      { role: 'user', content: user },
      { role: 'assistant', content: assistant },
    ],
    maxMessages,
  );
}

export async function getRecentTurns(store: SessionStore, threadId: string, count: number): Promise<Msg[]> {
  return store.getMsgs(threadId, count);
}
