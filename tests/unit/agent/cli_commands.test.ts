import { PLAN_USAGE, parseCommand } from '../../../src/cli_commands.js';

describe('parseCommand', () => {
  it('treats plain text as a chat message', () => {
    expect(parseCommand('  What should I pack for Oslo?  ')).toEqual({ kind: 'chat', message: 'What should I pack for Oslo?' });
    expect(parseCommand('EXIT')).toEqual({ kind: 'exit' });
  });

  it('parses /plan with a multi-word destination and currency', () => {
    expect(parseCommand('/plan Cape Town 4 1200 eur', 'cli-1')).toEqual({
      kind: 'plan',
      request: {
        destination: 'Cape Town',
        durationDays: 4,
        budget: 1200,
        currency: 'EUR',
        interests: [],
        dietaryPreferences: [],
        sessionId: 'cli-1',
      },
    });
  });

  it('defaults the plan currency to USD', () => {
    const cmd = parseCommand('/plan Bali 3 900');
    expect(cmd.kind === 'plan' && cmd.request.currency).toBe('USD');
  });

  it('rejects malformed plans with usage text', () => {
    expect(parseCommand('/plan Bali three 900')).toEqual({ kind: 'invalid', message: PLAN_USAGE });
    expect(parseCommand('/plan Bali 40 900')).toEqual({ kind: 'invalid', message: PLAN_USAGE });
    expect(parseCommand('/plan')).toEqual({ kind: 'invalid', message: PLAN_USAGE });
  });

  it('parses the remaining commands', () => {
    expect(parseCommand('/upload ~/Trips/kyoto notes.txt')).toEqual({ kind: 'upload', path: '~/Trips/kyoto notes.txt' });
    expect(parseCommand('/upload')).toEqual({ kind: 'invalid', message: 'Usage: /upload <path>' });
    expect(parseCommand('/reset')).toEqual({ kind: 'reset' });
    expect(parseCommand('/quit')).toEqual({ kind: 'exit' });
    expect(parseCommand('/HELP')).toEqual({ kind: 'help' });
    expect(parseCommand('/fly')).toEqual({ kind: 'invalid', message: 'Unknown command /fly. Type /help for the list.' });
  });
});
