import Bottleneck from 'bottleneck';

const pools = new Map<string, Bottleneck>();

function getConfig(host: string) {
  const defaultMinTime = Number(process.env.EXT_RATE_MIN_TIME_MS || 200);
  const defaultMaxConcurrency = Number(process.env.EXT_RATE_MAX_CONCURRENCY || 2);

  // Per-host overrides, e.g. RATE_MIN_MS_EN_WIKIPEDIA_ORG
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  const minTime = Number(process.env[`RATE_MIN_MS_${hostKey}`] || defaultMinTime);
  const maxConcurrent = Number(process.env[`RATE_MAX_CONC_${hostKey}`] || defaultMaxConcurrency);

  return { minTime, maxConcurrent };
}

export function getLimiter(host: string): Bottleneck {
  const existing = pools.get(host);
  if (existing) return existing;
  const limiter = new Bottleneck(getConfig(host));
  pools.set(host, limiter);
  return limiter;
}

export async function scheduleWithLimit<T>(host: string, fn: () => Promise<T>): Promise<T> {
  return getLimiter(host).schedule(() => fn());
}

/**
 * A single-lane gate: one job at a time, and at least `minIntervalMs`
 * between the start of one job and the start of the next.
 */
export function createGate(minIntervalMs: number): Bottleneck {
  return new Bottleneck({ maxConcurrent: 1, minTime: minIntervalMs });
}
