/**
 * Redaction for log output. Dates and place-like phrases are masked so user
 * travel plans do not end up in log storage. Disabled when LOG_LEVEL=debug.
 */

function scrubString(input: string): string {
  let out = input;
  // Date ranges first so the pieces are not masked twice
  out = out.replace(
    /\b\d{4}-\d{2}-\d{2}\s*\.\.\s*\d{4}-\d{2}-\d{2}\b/g,
    '[REDACTED_DATES]',
  );
  out = out.replace(/\b\d{4}-\d{2}-\d{2}\b/g, '[REDACTED_DATE]');
  out = out.replace(
    /\b(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)[a-z]*\.?\s+\d{1,2}(?:,\s*\d{4})?\b/g,
    '[REDACTED_DATE]',
  );
  // "in Tokyo", "to New York", "near Ubud"
  out = out.replace(/\b(in|to|near|around)\s+[A-Z][A-Za-z-]*(?:\s+[A-Z][A-Za-z-]*)*/g, '$1 [REDACTED_CITY]');
  return out;
}

function scrubDeep(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Error) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = scrubDeep(v, seen);
  }
  return out;
}

export function scrubPII(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg, new WeakSet<object>());
}

export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
