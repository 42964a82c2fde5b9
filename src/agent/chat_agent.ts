import type { ChatInputT, ChatOutputT } from '../schemas/chat.js';
import type { ContextGatherer } from '../core/context_gatherer.js';
import { getRecentTurns, getThreadId, recordExchange } from '../core/memory.js';
import type { SessionStore } from '../core/session_store.js';
import type { AnswerSynthesizer } from '../core/synthesizer.js';
import type { Logger } from '../util/logging.js';

const HISTORY_TURNS = 6;

export interface ChatAgentDeps {
  gatherer: ContextGatherer;
  synthesizer: AnswerSynthesizer;
  store: SessionStore;
  maxMessages: number;
  log: Logger;
}

/**
 * One conversational turn: classify and gather, answer from the bundle,
 * then record the exchange in the session history.
 */
export class ChatAgent {
  constructor(private readonly deps: ChatAgentDeps) {}

  async processMessage(input: ChatInputT): Promise<ChatOutputT> {
    const { gatherer, synthesizer, store, maxMessages, log } = this.deps;
    const sessionId = getThreadId(input.session_id);
    const started = Date.now();

    const history = await getRecentTurns(store, sessionId, HISTORY_TURNS);
    const { intent, bundle } = await gatherer.gather({ query: input.message, sessionId });
    const answer = await synthesizer.answerChat({
      query: input.message,
      bundle,
      history,
      location: intent.location,
    });

    await recordExchange(store, sessionId, input.message, answer.text, maxMessages);
    log.info(
      { sessionId, toolCalls: bundle.toolCalls, degraded: answer.degraded, ms: Date.now() - started },
      'chat turn complete',
    );

    return {
      message: answer.text,
      sources: bundle.sourcesUsed.length > 0 ? [...bundle.sourcesUsed] : undefined,
      tool_calls: bundle.toolCalls.length > 0 ? [...bundle.toolCalls] : undefined,
      session_id: sessionId,
    };
  }
}
