import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

const register = new Registry();

const externalRequests = new Counter({
  name: 'external_requests_total',
  help: 'Outbound requests by target and outcome',
  labelNames: ['target', 'status'] as const,
  registers: [register],
});

const externalLatency = new Histogram({
  name: 'external_request_latency_ms',
  help: 'Outbound request latency in milliseconds',
  labelNames: ['target'] as const,
  buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [register],
});

const llmCalls = new Counter({
  name: 'llm_calls_total',
  help: 'Generation calls by provider and outcome',
  labelNames: ['provider', 'status'] as const,
  registers: [register],
});

const fallbacks = new Counter({
  name: 'fallbacks_total',
  help: 'Degraded paths taken, by kind',
  labelNames: ['kind'] as const,
  registers: [register],
});

const requests = new Counter({
  name: 'requests_total',
  help: 'Chat, plan and upload requests by outcome',
  labelNames: ['route', 'outcome'] as const,
  registers: [register],
});

let defaultsEnabled = false;

/** Process metrics are opt-in; only the server turns them on. */
export function enableDefaultMetrics(): void {
  if (defaultsEnabled) return;
  collectDefaultMetrics({ register });
  defaultsEnabled = true;
}

export function observeExternal(labels: { target: string; status: string }, ms: number): void {
  externalRequests.inc(labels);
  externalLatency.observe({ target: labels.target }, ms);
}

export function incLlmCall(provider: string, status: string): void {
  llmCalls.inc({ provider, status });
}

export function incFallback(kind: string): void {
  fallbacks.inc({ kind });
}

export function observeRequest(route: 'chat' | 'plan' | 'upload', outcome: 'ok' | 'invalid' | 'error'): void {
  requests.inc({ route, outcome });
}

export async function getPrometheusText(): Promise<string> {
  return register.metrics();
}

export const metricsContentType = register.contentType;
