import CircuitBreaker from 'opossum';

type Task = () => Promise<string>;

const breakers = new Map<string, CircuitBreaker<[Task], string>>();

export class CircuitOpenError extends Error {
  constructor(readonly host: string) {
    super(`circuit open for ${host}`);
    this.name = 'CircuitOpenError';
  }
}

function getConfig(): CircuitBreaker.Options {
  return {
    // callers carry their own abort timeouts
    timeout: false,
    resetTimeout: Number(process.env.EXT_BREAKER_RESET_MS || 15000),
    errorThresholdPercentage: Number(process.env.EXT_BREAKER_ERROR_PCT || 50),
    volumeThreshold: Number(process.env.EXT_BREAKER_VOLUME || 5),
    rollingCountTimeout: 10000,
  };
}

export function getBreaker(host: string): CircuitBreaker<[Task], string> {
  const existing = breakers.get(host);
  if (existing) return existing;

  const breaker = new CircuitBreaker(async (task: Task) => task(), getConfig());
  breakers.set(host, breaker);
  return breaker;
}

function isOpenRejection(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EOPENBREAKER';
}

export async function withBreaker(host: string, fn: Task): Promise<string> {
  try {
    return await getBreaker(host).fire(fn);
  } catch (err) {
    if (isOpenRejection(err)) throw new CircuitOpenError(host);
    throw err;
  }
}
