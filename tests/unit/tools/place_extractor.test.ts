import {
  cleanPlaceName,
  dedupePlaces,
  extractFromText,
  extractPlacesFromHtml,
  isValidPlaceName,
} from '../../../src/tools/place_extractor.js';

const ARTICLE = `
<html><body>
  <script>var tracker = "Hidden Script Place";</script>
  <h2>1. Tanah Lot Temple</h2>
  <p>Sea temple on a rock. Entry fee: 60,000 IDR. Open 7 AM - 7 PM.</p>
  <h3>tanah lot temple</h3>
  <h3>Visit Tanah Lot Temple</h3>
  <h2>Top 10 Things To Do</h2>
  <h2>Uluwatu Temple (Clifftop)</h2>
  <p>Cliff temple with sunset dance.</p>
  <ul>
    <li>1. Ubud Monkey Forest - sacred sanctuary</li>
    <li>Read more</li>
  </ul>
  <p><strong>Jimbaran Bay Seafood</strong> grilled fish on the beach</p>
</body></html>`;

describe('extractPlacesFromHtml', () => {
  const url = 'https://example.com/bali';

  it('unions headings, list items and bold runs, deduplicated', () => {
    expect(extractPlacesFromHtml(ARTICLE, url)).toEqual([
      {
        name: 'Tanah Lot Temple',
        description: 'Sea temple on a rock. Entry fee: 60,000 IDR. Open 7 AM - 7 PM.',
        price: '60,000 IDR',
        hours: '7 AM - 7 PM',
        sourceUrl: url,
      },
      { name: 'Uluwatu Temple', description: 'Cliff temple with sunset dance.', sourceUrl: url },
      { name: 'Ubud Monkey Forest', description: '1. Ubud Monkey Forest - sacred sanctuary', sourceUrl: url },
      { name: 'Jimbaran Bay Seafood', description: '', sourceUrl: url },
    ]);
  });

  it('only returns valid names', () => {
    for (const place of extractPlacesFromHtml(ARTICLE)) {
      expect(isValidPlaceName(place.name)).toBe(true);
    }
  });

  it('returns nothing for a page without candidates', () => {
    expect(extractPlacesFromHtml('<p>just text</p>')).toEqual([]);
  });
});

describe('extractFromText', () => {
  it('finds ordinal items and proper-noun runs in a snippet', () => {
    const places = extractFromText(
      'Top picks: 1. Sacred Monkey Forest Sanctuary - a must, then Tegallalang Rice Terraces and Tirta Empul nearby.',
    );
    expect(places.map((p) => p.name)).toEqual(['Sacred Monkey Forest Sanctuary', 'Tegallalang Rice Terraces', 'Tirta Empul']);
  });
});

describe('cleanPlaceName', () => {
  it.each([
    ['3. Visit Senso-ji Temple (Asakusa)', 'Senso-ji Temple'],
    ['Dec 1, 2025 · Shibuya Crossing', 'Shibuya Crossing'],
    ['Tsukiji Market https://example.com info@example.com', 'Tsukiji Market'],
    ['  The   Meiji   Shrine ', 'Meiji Shrine'],
  ])('%s → %s', (raw, cleaned) => {
    expect(cleanPlaceName(raw)).toBe(cleaned);
  });
});

describe('isValidPlaceName', () => {
  it.each([
    ['Meiji Shrine', true],
    ['Ok', false],
    ['senso-ji', false],
    ['Click Here Now', false],
    ['MUST VISIT SIGHTS', false],
    ['1234 Main', false],
  ])('%s → %s', (name, valid) => {
    expect(isValidPlaceName(name)).toBe(valid);
  });
});

describe('dedupePlaces', () => {
  it('keeps the first of case-insensitive duplicates and caps the list', () => {
    const many = Array.from({ length: 20 }, (_, i) => ({ name: `Place Number ${i}`, description: '' }));
    const places = dedupePlaces([{ name: 'Tanah Lot Temple', description: 'first' }, { name: 'TANAH LOT TEMPLE', description: 'second' }, ...many]);
    expect(places).toHaveLength(15);
    expect(places[0]).toEqual({ name: 'Tanah Lot Temple', description: 'first' });
    expect(places[1]?.name).toBe('Place Number 0');
  });
});
