import { TripPlanInput, type TripPlanRequest } from './schemas/itinerary.js';

export type CliCommand =
  | { kind: 'chat'; message: string }
  | { kind: 'plan'; request: TripPlanRequest }
  | { kind: 'upload'; path: string }
  | { kind: 'reset' }
  | { kind: 'exit' }
  | { kind: 'help' }
  | { kind: 'invalid'; message: string };

export const PLAN_USAGE = 'Usage: /plan <destination> <days> <budget> [currency]';

/**
 * `/plan Cape Town 4 1200 EUR` → destination "Cape Town". The numbers and
 * the optional currency are read from the end so destinations may contain
 * spaces.
 */
export function parsePlanArgs(args: string[], sessionId?: string): CliCommand {
  const tokens = [...args];
  let currency: string | undefined;
  const last = tokens[tokens.length - 1];
  if (last !== undefined && /^[a-z]{3}$/i.test(last)) {
    currency = last;
    tokens.pop();
  }
  const budget = Number(tokens.pop());
  const days = Number(tokens.pop());
  const destination = tokens.join(' ');

  const parsed = TripPlanInput.safeParse({
    destination,
    duration_days: days,
    budget,
    currency,
    session_id: sessionId,
  });
  if (!parsed.success) return { kind: 'invalid', message: PLAN_USAGE };
  return { kind: 'plan', request: parsed.data };
}

export function parseCommand(line: string, sessionId?: string): CliCommand {
  const text = line.trim();
  if (!text.startsWith('/')) {
    if (text.toLowerCase() === 'exit') return { kind: 'exit' };
    return { kind: 'chat', message: text };
  }

  const [name = '', ...args] = text.slice(1).split(/\s+/);
  switch (name.toLowerCase()) {
    case 'plan':
      return parsePlanArgs(args, sessionId);
    case 'upload': {
      const path = args.join(' ').trim();
      return path ? { kind: 'upload', path } : { kind: 'invalid', message: 'Usage: /upload <path>' };
    }
    case 'reset':
      return { kind: 'reset' };
    case 'exit':
    case 'quit':
      return { kind: 'exit' };
    case 'help':
      return { kind: 'help' };
    default:
      return { kind: 'invalid', message: `Unknown command /${name}. Type /help for the list.` };
  }
}
