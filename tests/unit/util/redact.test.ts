import { scrubMessage, scrubPII } from '../../../src/util/redact.js';

describe('redaction', () => {
  it('masks dates and place phrases in messages', () => {
    expect(scrubMessage('Flying to Tokyo on 2025-03-01', true)).toBe('Flying to [REDACTED_CITY] on [REDACTED_DATE]');
    expect(scrubMessage('Stay 2025-03-01..2025-03-05', true)).toBe('Stay [REDACTED_DATES]');
    expect(scrubMessage('Arriving Mar 3, 2025', true)).toBe('Arriving [REDACTED_DATE]');
    expect(scrubMessage('Hotels near New York', true)).toBe('Hotels near [REDACTED_CITY]');
  });

  it('walks nested objects and arrays', () => {
    const scrubbed = scrubPII({ q: 'Trip to Bali', n: 3, nested: { list: ['in Ubud'] } }, true);
    expect(scrubbed).toEqual({ q: 'Trip to [REDACTED_CITY]', n: 3, nested: { list: ['in [REDACTED_CITY]'] } });
  });

  it('leaves errors and disabled input untouched', () => {
    const err = new Error('failed in Paris');
    expect(scrubPII(err, true)).toBe(err);
    expect(scrubMessage('Flying to Tokyo', false)).toBe('Flying to Tokyo');
  });
});
