import pino from 'pino';
import type { AppConfig } from '../../src/config/app.js';
import type { SessionConfig } from '../../src/config/session.js';
import type { GenerateOptions, GenerationOut, TextGenerator } from '../../src/core/llm.js';
import type { PageFetcher, SearchBackend, SearchResult } from '../../src/tools/search.js';
import type { Logger } from '../../src/util/logging.js';

export const silentLogger = (): Logger => pino({ level: 'silent' });

export type Reply = string | GenerationOut;

export interface RecordedCall {
  prompt: string;
  opts: GenerateOptions;
}

/**
 * Answers each prompt with the reply of the first rule whose pattern matches
 * it; unmatched prompts fail with `network`.
 */
export class FakeGenerator implements TextGenerator {
  readonly provider = 'fake';
  readonly model = 'fake-model';
  readonly calls: RecordedCall[] = [];
  healthy = true;

  constructor(private readonly rules: Array<[RegExp, Reply]> = []) {}

  on(pattern: RegExp, reply: Reply): this {
    this.rules.push([pattern, reply]);
    return this;
  }

  async generate(prompt: string, opts: GenerateOptions = {}): Promise<GenerationOut> {
    this.calls.push({ prompt, opts });
    const rule = this.rules.find(([pattern]) => pattern.test(prompt));
    if (!rule) return { ok: false, reason: 'network' };
    const reply = rule[1];
    return typeof reply === 'string' ? { ok: true, text: reply } : reply;
  }

  async health(): Promise<boolean> {
    return this.healthy;
  }

  promptsMatching(pattern: RegExp): string[] {
    return this.calls.map((c) => c.prompt).filter((p) => pattern.test(p));
  }
}

/** Prompt fragments that identify each request the services make. */
export const PROMPT = {
  weather: /typical weather in/,
  attractions: /tourist attractions in/,
  restaurants: /well-rated restaurants in/,
  hotels: /well-known hotels in/,
  tips: /practical travel tips/,
  planner: /-day itinerary for/,
  chat: /^User question:/,
};

export class FakeSearchBackend implements SearchBackend {
  readonly name = 'fake';
  readonly queries: string[] = [];
  readonly startedAt: number[] = [];
  private failuresLeft: number;

  constructor(
    private readonly results: SearchResult[] | ((query: string) => SearchResult[]) = [],
    opts: { failures?: number } = {},
  ) {
    this.failuresLeft = opts.failures ?? 0;
  }

  async search(query: string, maxResults: number): Promise<SearchResult[]> {
    this.queries.push(query);
    this.startedAt.push(Date.now());
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new Error('backend unavailable');
    }
    const all = typeof this.results === 'function' ? this.results(query) : this.results;
    return all.slice(0, maxResults);
  }
}

export class FakePageFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, { contentType?: string; text: string }> = {}) {}

  async fetch(url: string): Promise<{ contentType: string; text: string }> {
    this.requested.push(url);
    const page = this.pages[url];
    if (!page) throw new Error(`no page for ${url}`);
    return { contentType: page.contentType ?? 'text/html; charset=utf-8', text: page.text };
  }
}

export function testAppConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    llm: {
      provider: 'ollama',
      ollamaBaseUrl: 'http://localhost:11434',
      ollamaModel: 'llama3:8b',
      geminiModel: 'gemini-2.0-flash',
      openaiModel: 'gpt-4o-mini',
      timeoutMs: 1000,
    },
    search: {
      provider: 'duckduckgo',
      maxResults: 5,
      minIntervalMs: 0,
      maxAttempts: 2,
      retryDelayMs: 0,
      fetchTimeoutMs: 1000,
    },
    knowledgeSource: 'llm',
    maxUploadSizeMb: 1,
    port: 0,
    ...overrides,
  };
}

export function testSessionConfig(overrides: Partial<SessionConfig> = {}): SessionConfig {
  return { ttlSec: 3600, maxMessages: 10, sweepIntervalMs: 60000, ...overrides };
}
