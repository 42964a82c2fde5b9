import { z } from 'zod';

const AppConfigSchema = z.object({
  llm: z.object({
    provider: z.enum(['ollama', 'gemini', 'openai']),
    ollamaBaseUrl: z.string().url().default('http://localhost:11434'),
    ollamaModel: z.string().min(1).default('llama3:8b'),
    geminiApiKey: z.string().optional(),
    geminiModel: z.string().min(1).default('gemini-2.0-flash'),
    openaiBaseUrl: z.string().url().optional(),
    openaiApiKey: z.string().optional(),
    openaiModel: z.string().min(1).default('gpt-4o-mini'),
    timeoutMs: z.coerce.number().int().min(1000).default(60000),
  }),
  search: z.object({
    provider: z.enum(['duckduckgo', 'brave']).default('duckduckgo'),
    braveApiKey: z.string().optional(),
    maxResults: z.coerce.number().int().min(1).max(20).default(5),
    minIntervalMs: z.coerce.number().int().min(0).default(5000),
    maxAttempts: z.coerce.number().int().min(1).max(10).default(2),
    retryDelayMs: z.coerce.number().int().min(0).default(10000),
    fetchTimeoutMs: z.coerce.number().int().min(100).default(10000),
  }),
  knowledgeSource: z.enum(['llm', 'web', 'hybrid']).default('llm'),
  maxUploadSizeMb: z.coerce.number().positive().default(10),
  port: z.coerce.number().int().min(0).max(65535).default(3000),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LlmConfig = AppConfig['llm'];
export type SearchConfig = AppConfig['search'];
export type KnowledgeSourceKind = AppConfig['knowledgeSource'];

type Env = Record<string, string | undefined>;

/** Blank values count as unset so defaults apply. */
function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function resolveProvider(env: Env): string {
  const explicit = read(env, 'LLM_PROVIDER');
  if (explicit) return explicit.toLowerCase();
  if (read(env, 'GEMINI_API_KEY')) return 'gemini';
  if (read(env, 'LLM_PROVIDER_BASEURL') && read(env, 'LLM_API_KEY')) return 'openai';
  return 'ollama';
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  return AppConfigSchema.parse({
    llm: {
      provider: resolveProvider(env),
      ollamaBaseUrl: read(env, 'OLLAMA_BASE_URL'),
      ollamaModel: read(env, 'OLLAMA_MODEL'),
      geminiApiKey: read(env, 'GEMINI_API_KEY'),
      geminiModel: read(env, 'GEMINI_MODEL'),
      openaiBaseUrl: read(env, 'LLM_PROVIDER_BASEURL'),
      openaiApiKey: read(env, 'LLM_API_KEY'),
      openaiModel: read(env, 'LLM_MODEL'),
      timeoutMs: read(env, 'LLM_TIMEOUT_MS'),
    },
    search: {
      provider: read(env, 'SEARCH_PROVIDER')?.toLowerCase(),
      braveApiKey: read(env, 'BRAVE_SEARCH_API_KEY'),
      maxResults: read(env, 'SEARCH_MAX_RESULTS'),
      minIntervalMs: read(env, 'SEARCH_MIN_INTERVAL_MS'),
      maxAttempts: read(env, 'SEARCH_MAX_ATTEMPTS'),
      retryDelayMs: read(env, 'SEARCH_RETRY_DELAY_MS'),
      fetchTimeoutMs: read(env, 'FETCH_TIMEOUT_MS'),
    },
    knowledgeSource: read(env, 'KNOWLEDGE_SOURCE')?.toLowerCase(),
    maxUploadSizeMb: read(env, 'MAX_UPLOAD_SIZE_MB'),
    port: read(env, 'PORT'),
  });
}
