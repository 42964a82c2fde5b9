import { chunkText, documentExtension, extractText, type TextExtractors } from '../../../src/tools/documents.js';
import { DocumentExtractionError, UnsupportedDocumentError } from '../../../src/tools/errors.js';

const fakeExtractors = (overrides: Partial<TextExtractors> = {}): TextExtractors => ({
  pdf: async () => ({ text: 'pdf text', pages: 3 }),
  docx: async () => ({ text: 'docx text' }),
  ...overrides,
});

describe('chunkText', () => {
  it('splits long text into overlapping windows', () => {
    const chunks = chunkText('x'.repeat(2500));
    expect(chunks.map((c) => c.length)).toEqual([1000, 1000, 900]);
  });

  it('ends a window at a sentence break past the halfway mark', () => {
    const text = `${'a'.repeat(699)}.${'b'.repeat(600)}`;
    const chunks = chunkText(text);
    expect(chunks).toHaveLength(2);
    expect(chunks[0]).toBe(`${'a'.repeat(699)}.`);
    expect(chunks[1]).toHaveLength(800);
  });

  it('drops short fragments', () => {
    expect(chunkText('Too short.')).toEqual([]);
    expect(chunkText('')).toEqual([]);
  });
});

describe('extractText', () => {
  it('decodes plain text as UTF-8', async () => {
    const out = await extractText('notes.txt', Buffer.from('Ryokan booked in Kyoto ✓', 'utf8'));
    expect(out).toEqual({ text: 'Ryokan booked in Kyoto ✓' });
  });

  it('falls back to latin1 for bytes that are not UTF-8', async () => {
    const out = await extractText('menu.TXT', Buffer.from([0x63, 0x61, 0x66, 0xe9]));
    expect(out.text).toBe('café');
  });

  it('routes by extension to the format readers', async () => {
    const extractors = fakeExtractors();
    expect(await extractText('guide.pdf', Buffer.from('x'), extractors)).toEqual({ text: 'pdf text', pages: 3 });
    expect(await extractText('guide.docx', Buffer.from('x'), extractors)).toEqual({ text: 'docx text' });
    expect(await extractText('old.doc', Buffer.from('x'), extractors)).toEqual({ text: 'docx text' });
  });

  it('wraps reader failures', async () => {
    const extractors = fakeExtractors({
      docx: async () => {
        throw new Error('corrupt');
      },
    });
    const err = await extractText('trip.docx', Buffer.from('x'), extractors).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(DocumentExtractionError);
    expect(err).toHaveProperty('message', 'Could not read text from trip.docx: corrupt');
    expect(err).toHaveProperty('code', 'document_unreadable');
  });

  it('rejects unsupported extensions', async () => {
    await expect(extractText('budget.xlsx', Buffer.from('x'))).rejects.toBeInstanceOf(UnsupportedDocumentError);
    expect(() => documentExtension('README')).toThrow('Unsupported file type "none"');
  });
});
