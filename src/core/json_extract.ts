import type { z } from 'zod';

export type ParseFailure = 'empty' | 'parse' | 'shape';

export type ParseOut<T> = { ok: true; value: T } | { ok: false; reason: ParseFailure; detail?: string };

/**
 * Pulls the JSON object out of a model reply: the first fenced block when
 * there is one, then everything from the first "{" to the last "}".
 */
export function extractJsonText(raw: string): string {
  let text = raw.trim();

  const fence = text.indexOf('```');
  if (fence !== -1) {
    const body = text.slice(fence + 3).replace(/^[A-Za-z]*[ \t]*\r?\n?/, '');
    const close = body.indexOf('```');
    text = (close === -1 ? body : body.slice(0, close)).trim();
  }

  if (!text.startsWith('{')) {
    const start = text.indexOf('{');
    if (start === -1) return text;
    text = text.slice(start);
  }

  const end = text.lastIndexOf('}');
  return end === -1 ? text : text.slice(0, end + 1);
}

export function parseModelJson<S extends z.ZodTypeAny>(raw: string, schema: S): ParseOut<z.output<S>> {
  const text = extractJsonText(raw);
  if (!text) return { ok: false, reason: 'empty' };

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: 'parse', detail: err instanceof Error ? err.message : String(err) };
  }

  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, reason: 'shape', detail: parsed.error.issues.map((i) => i.path.join('.') || i.message).join(', ') };
  }
  return { ok: true, value: parsed.data };
}
