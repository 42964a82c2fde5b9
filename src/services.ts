import type { AppConfig } from './config/app.js';
import type { SessionConfig } from './config/session.js';
import { ChatAgent } from './agent/chat_agent.js';
import { ingestDocument } from './agent/document_ingest.js';
import { TripPlanner } from './agent/planner.js';
import { ContextGatherer } from './core/context_gatherer.js';
import { DocumentMemory } from './core/documents.js';
import { createTextGenerator, type TextGenerator } from './core/llm.js';
import { createStore, type SessionStore } from './core/session_store.js';
import { AnswerSynthesizer } from './core/synthesizer.js';
import type { DocumentUploadResponse } from './schemas/upload.js';
import { selectCategorySource } from './tools/category_source.js';
import type { TextExtractors } from './tools/documents.js';
import { KnowledgeRequester } from './tools/knowledge.js';
import { RateLimitedFetcher, type PageFetcher, type SearchBackend } from './tools/search.js';
import { createSearchBackend } from './tools/search_backends.js';
import { WebPlaceSearch } from './tools/web_places.js';
import type { Logger } from './util/logging.js';

export interface ServiceOptions {
  app: AppConfig;
  session: SessionConfig;
  log: Logger;
  /** Replacements for the outbound edges; tests pass fakes here. */
  generator?: TextGenerator;
  searchBackend?: SearchBackend;
  pageFetcher?: PageFetcher;
  extractors?: TextExtractors;
}

export interface Services {
  config: AppConfig;
  generator: TextGenerator;
  store: SessionStore;
  documents: DocumentMemory;
  chat: ChatAgent;
  planner: TripPlanner;
  ingest(filename: string, bytes: Buffer, sessionId?: string): Promise<DocumentUploadResponse>;
  close(): void;
}

export function createServices(opts: ServiceOptions): Services {
  const { app, session, log } = opts;

  const generator = opts.generator ?? createTextGenerator(app.llm, log.child({ component: 'llm' }));
  const fetcher = new RateLimitedFetcher(
    opts.searchBackend ?? createSearchBackend(app.search, log),
    {
      minIntervalMs: app.search.minIntervalMs,
      maxAttempts: app.search.maxAttempts,
      retryDelayMs: app.search.retryDelayMs,
      timeoutMs: app.search.fetchTimeoutMs,
      maxResults: app.search.maxResults,
    },
    log.child({ component: 'search' }),
    opts.pageFetcher,
  );

  const source = selectCategorySource(
    app.knowledgeSource,
    {
      knowledge: new KnowledgeRequester(generator, log.child({ component: 'knowledge' })),
      web: new WebPlaceSearch(fetcher, log.child({ component: 'web' })),
    },
    log,
  );

  const store = createStore(session);
  const documents = new DocumentMemory(store);
  const gatherer = new ContextGatherer(source, documents, log.child({ component: 'gatherer' }));
  const synthesizer = new AnswerSynthesizer(generator, log.child({ component: 'synthesizer' }));

  log.info(
    { llm: generator.provider, model: generator.model, search: fetcher.backendName, knowledge: source.name },
    'services ready',
  );

  return {
    config: app,
    generator,
    store,
    documents,
    chat: new ChatAgent({ gatherer, synthesizer, store, maxMessages: session.maxMessages, log: log.child({ component: 'chat' }) }),
    planner: new TripPlanner({ gatherer, synthesizer, log: log.child({ component: 'planner' }) }),
    ingest: (filename, bytes, sessionId) =>
      ingestDocument({ documents, log: log.child({ component: 'ingest' }), extractors: opts.extractors }, filename, bytes, sessionId),
    close: () => store.close(),
  };
}
