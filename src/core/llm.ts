import { z } from 'zod';
import type { LlmConfig } from '../config/app.js';
import { ExternalFetchError, fetchJSON, fetchText } from '../util/fetch.js';
import { CircuitOpenError, withBreaker } from '../util/circuit.js';
import { incLlmCall } from '../util/metrics.js';
import type { Logger } from '../util/logging.js';

export interface GenerateOptions {
  system?: string;
  maxTokens?: number;
  temperature?: number;
}

export type GenerationFailure =
  | 'empty_prompt'
  | 'empty_response'
  | 'bad_response'
  | 'timeout'
  | 'http'
  | 'network'
  | 'circuit_open';

export type GenerationOut = { ok: true; text: string } | { ok: false; reason: GenerationFailure };

/**
 * A text-in, text-out model. `generate` never throws; every failure comes
 * back as `{ ok: false, reason }`.
 */
export interface TextGenerator {
  readonly provider: string;
  readonly model: string;
  generate(prompt: string, opts?: GenerateOptions): Promise<GenerationOut>;
  health(): Promise<boolean>;
}

type RequestParams = GenerateOptions & { maxTokens: number; temperature: number };

class BadResponseError extends Error {
  constructor(provider: string) {
    super(`unexpected ${provider} response shape`);
    this.name = 'BadResponseError';
  }
}

function classifyFailure(err: unknown): GenerationFailure {
  if (err instanceof CircuitOpenError) return 'circuit_open';
  if (err instanceof ExternalFetchError) return err.kind;
  if (err instanceof BadResponseError) return 'bad_response';
  return 'network';
}

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const HEALTH_TIMEOUT_MS = 5000;

abstract class HttpGenerator implements TextGenerator {
  abstract readonly provider: string;
  protected readonly host: string;

  constructor(
    readonly model: string,
    protected readonly baseUrl: string,
    protected readonly timeoutMs: number,
    protected readonly log: Logger,
  ) {
    this.host = new URL(baseUrl).host;
  }

  protected abstract request(prompt: string, params: RequestParams): Promise<string>;
  protected abstract probe(): Promise<void>;

  async generate(prompt: string, opts: GenerateOptions = {}): Promise<GenerationOut> {
    if (!prompt.trim()) return { ok: false, reason: 'empty_prompt' };
    const params: RequestParams = { ...opts, maxTokens: opts.maxTokens ?? 1000, temperature: opts.temperature ?? 0.7 };
    const start = Date.now();

    try {
      const text = (await withBreaker(this.host, () => this.request(prompt, params))).trim();
      if (!text) {
        incLlmCall(this.provider, 'empty_response');
        this.log.warn({ provider: this.provider, ms: Date.now() - start }, 'generation returned no text');
        return { ok: false, reason: 'empty_response' };
      }
      incLlmCall(this.provider, 'ok');
      this.log.debug({ provider: this.provider, model: this.model, ms: Date.now() - start, chars: text.length }, 'generation complete');
      return { ok: true, text };
    } catch (err) {
      const reason = classifyFailure(err);
      incLlmCall(this.provider, reason);
      this.log.warn({ provider: this.provider, reason, ms: Date.now() - start }, 'generation failed');
      return { ok: false, reason };
    }
  }

  async health(): Promise<boolean> {
    try {
      await this.probe();
      return true;
    } catch (err) {
      this.log.debug({ provider: this.provider, err: err instanceof Error ? err.message : String(err) }, 'health probe failed');
      return false;
    }
  }
}

const OllamaReply = z.object({ response: z.string() });

export class OllamaGenerator extends HttpGenerator {
  readonly provider = 'ollama';

  protected async request(prompt: string, params: RequestParams): Promise<string> {
    const body = await fetchJSON(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: JSON_HEADERS,
      body: JSON.stringify({
        model: this.model,
        prompt,
        system: params.system,
        stream: false,
        options: { num_predict: params.maxTokens, temperature: params.temperature },
      }),
      timeoutMs: this.timeoutMs,
      target: this.provider,
    });
    const parsed = OllamaReply.safeParse(body);
    if (!parsed.success) throw new BadResponseError(this.provider);
    return parsed.data.response;
  }

  protected async probe(): Promise<void> {
    await fetchText(`${this.baseUrl}/api/tags`, { timeoutMs: HEALTH_TIMEOUT_MS, target: this.provider });
  }
}

const GeminiReply = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({ parts: z.array(z.object({ text: z.string().optional() })).default([]) }).optional(),
      }),
    )
    .default([]),
});

export class GeminiGenerator extends HttpGenerator {
  readonly provider = 'gemini';

  constructor(model: string, private readonly apiKey: string, timeoutMs: number, log: Logger, baseUrl = 'https://generativelanguage.googleapis.com') {
    super(model, baseUrl, timeoutMs, log);
  }

  protected async request(prompt: string, params: RequestParams): Promise<string> {
    const body = await fetchJSON(`${this.baseUrl}/v1beta/models/${encodeURIComponent(this.model)}:generateContent`, {
      method: 'POST',
      headers: { ...JSON_HEADERS, 'x-goog-api-key': this.apiKey },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        ...(params.system ? { systemInstruction: { parts: [{ text: params.system }] } } : {}),
        generationConfig: { temperature: params.temperature, maxOutputTokens: params.maxTokens, candidateCount: 1 },
      }),
      timeoutMs: this.timeoutMs,
      target: this.provider,
    });
    const parsed = GeminiReply.safeParse(body);
    if (!parsed.success) throw new BadResponseError(this.provider);
    const parts = parsed.data.candidates[0]?.content?.parts ?? [];
    return parts.map((p) => p.text ?? '').join('');
  }

  protected async probe(): Promise<void> {
    await fetchText(`${this.baseUrl}/v1beta/models/${encodeURIComponent(this.model)}`, {
      headers: { 'x-goog-api-key': this.apiKey },
      timeoutMs: HEALTH_TIMEOUT_MS,
      target: this.provider,
    });
  }
}

const ChatCompletionReply = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .default([]),
});

/** Any server speaking the OpenAI chat-completions dialect. */
export class OpenAICompatibleGenerator extends HttpGenerator {
  readonly provider = 'openai';

  constructor(model: string, baseUrl: string, private readonly apiKey: string | undefined, timeoutMs: number, log: Logger) {
    super(model, baseUrl.replace(/\/+$/, ''), timeoutMs, log);
  }

  private headers(): Record<string, string> {
    return this.apiKey ? { ...JSON_HEADERS, Authorization: `Bearer ${this.apiKey}` } : JSON_HEADERS;
  }

  protected async request(prompt: string, params: RequestParams): Promise<string> {
    const messages = [
      ...(params.system ? [{ role: 'system', content: params.system }] : []),
      { role: 'user', content: prompt },
    ];
    const body = await fetchJSON(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: this.headers(),
      body: JSON.stringify({ model: this.model, messages, temperature: params.temperature, max_tokens: params.maxTokens }),
      timeoutMs: this.timeoutMs,
      target: this.provider,
    });
    const parsed = ChatCompletionReply.safeParse(body);
    if (!parsed.success) throw new BadResponseError(this.provider);
    return parsed.data.choices[0]?.message.content ?? '';
  }

  protected async probe(): Promise<void> {
    await fetchText(`${this.baseUrl}/models`, { headers: this.headers(), timeoutMs: HEALTH_TIMEOUT_MS, target: this.provider });
  }
}

export function createTextGenerator(cfg: LlmConfig, log: Logger): TextGenerator {
  switch (cfg.provider) {
    case 'gemini':
      if (!cfg.geminiApiKey) throw new Error('LLM_PROVIDER=gemini requires GEMINI_API_KEY');
      return new GeminiGenerator(cfg.geminiModel, cfg.geminiApiKey, cfg.timeoutMs, log);
    case 'openai':
      if (!cfg.openaiBaseUrl) throw new Error('LLM_PROVIDER=openai requires LLM_PROVIDER_BASEURL');
      return new OpenAICompatibleGenerator(cfg.openaiModel, cfg.openaiBaseUrl, cfg.openaiApiKey, cfg.timeoutMs, log);
    case 'ollama':
      return new OllamaGenerator(cfg.ollamaModel, cfg.ollamaBaseUrl.replace(/\/+$/, ''), cfg.timeoutMs, log);
  }
}
