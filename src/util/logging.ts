import pino from 'pino';
import { scrubMessage, scrubPII } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger. Arguments are scrubbed of dates and place names
 * unless the level is debug.
 */
export function createLogger(opts: { level?: string; name?: string } = {}): Logger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';

  return pino({
    level,
    name: opts.name,
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubPII(a, redactEnabled),
        );
        method.apply(this, scrubbed as Parameters<pino.LogFn>);
      },
    },
  });
}
