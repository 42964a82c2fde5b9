import { z } from 'zod';

const SessionConfigSchema = z.object({
  ttlSec: z.coerce.number().min(60).default(3600),
  // History holds whole user/assistant exchanges and never more than 10 turns
  maxMessages: z.coerce
    .number()
    .int()
    .min(2)
    .max(10)
    .refine((n) => n % 2 === 0, { message: 'must be even' })
    .default(10),
  sweepIntervalMs: z.coerce.number().int().min(1000).default(60000),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(env: Record<string, string | undefined> = process.env): SessionConfig {
  return SessionConfigSchema.parse({
    ttlSec: env.SESSION_TTL_SEC || 3600,
    maxMessages: env.SESSION_MAX_MESSAGES || 10,
    sweepIntervalMs: env.SESSION_SWEEP_MS || 60000,
  });
}
