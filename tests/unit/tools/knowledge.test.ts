import { KnowledgeRequester, toPlaces } from '../../../src/tools/knowledge.js';
import { getPrometheusText } from '../../../src/util/metrics.js';
import { FakeGenerator, PROMPT, silentLogger } from '../../helpers/fakes.js';

const NOW = new Date('2026-07-15T12:00:00Z');

describe('KnowledgeRequester.places', () => {
  it('asks for a JSON place list and keeps the valid entries', async () => {
    const generator = new FakeGenerator().on(
      PROMPT.attractions,
      [
        'Here is the list:',
        '```json',
        JSON.stringify({
          places: [
            { name: 'Senso-ji Temple', description: 'Oldest temple in Tokyo', price: 'Free', hours: 24 },
            { name: '', description: 'nameless' },
            { description: 'no name at all' },
            { name: 'senso-ji temple', description: 'duplicate' },
            { name: 'Ueno Park', price_range: ['Free', 'Zoo extra'] },
          ],
        }),
        '```',
      ].join('\n'),
    );
    const knowledge = new KnowledgeRequester(generator, silentLogger(), () => NOW);

    const lookup = await knowledge.places('attractions', 'Tokyo');

    expect(generator.calls[0]?.prompt).toContain('List the 15 most visited tourist attractions in Tokyo.');
    expect(generator.calls[0]?.opts).toEqual({ temperature: 0.3, maxTokens: 3000 });
    expect(lookup.status).toBe('ok');
    expect(lookup.source).toBe('knowledge');
    expect(lookup.query).toBe('attractions in Tokyo');
    expect(lookup.timestamp).toBe('2026-07-15T12:00:00.000Z');
    expect(lookup.places).toEqual([
      { name: 'Senso-ji Temple', description: 'Oldest temple in Tokyo', price: 'Free', hours: '24' },
      { name: 'Ueno Park', description: '', price: 'Free, Zoo extra' },
    ]);
  });

  it('returns an empty failed lookup for truncated JSON', async () => {
    const generator = new FakeGenerator().on(PROMPT.hotels, '{"places": [{"name": "Park Hyatt');
    const lookup = await new KnowledgeRequester(generator, silentLogger()).places('hotels', 'Tokyo');

    expect(lookup).toMatchObject({ status: 'failed', failure: 'parse', places: [], city: 'Tokyo' });
    expect(await getPrometheusText()).toContain('fallbacks_total{kind="knowledge_hotels"} 1');
  });

  it('reports an empty list as empty', async () => {
    const generator = new FakeGenerator().on(PROMPT.restaurants, '{"places": []}');
    const lookup = await new KnowledgeRequester(generator, silentLogger()).places('restaurants', 'Tokyo');
    expect(lookup.status).toBe('empty');
  });

  it('passes on generation failures', async () => {
    const generator = new FakeGenerator().on(PROMPT.restaurants, { ok: false, reason: 'timeout' });
    const lookup = await new KnowledgeRequester(generator, silentLogger()).places('restaurants', 'Tokyo');
    expect(lookup).toMatchObject({ status: 'failed', failure: 'timeout', places: [] });
  });
});

describe('KnowledgeRequester.snippets', () => {
  it('asks about the current month for weather', async () => {
    const generator = new FakeGenerator().on(PROMPT.weather, 'Hot and humid, around 31°C.');
    const lookup = await new KnowledgeRequester(generator, silentLogger(), () => NOW).snippets('weather', 'Tokyo');

    expect(generator.calls[0]?.prompt).toContain('typical weather in Tokyo during July 2026');
    expect(generator.calls[0]?.opts.maxTokens).toBe(200);
    expect(lookup.results).toEqual([{ title: 'Weather in Tokyo', snippet: 'Hot and humid, around 31°C.' }]);
  });

  it('returns tips as a single result', async () => {
    const generator = new FakeGenerator().on(PROMPT.tips, '1. Carry cash.');
    const lookup = await new KnowledgeRequester(generator, silentLogger()).snippets('tips', 'Tokyo');
    expect(generator.calls[0]?.opts.maxTokens).toBe(400);
    expect(lookup).toMatchObject({ status: 'ok', results: [{ title: 'Travel tips for Tokyo', snippet: '1. Carry cash.' }] });
  });
});

describe('toPlaces', () => {
  it('drops entries that are not objects with a name', () => {
    expect(toPlaces(['Tokyo Tower', null, { name: 'Tokyo Tower' }])).toEqual([{ name: 'Tokyo Tower', description: '' }]);
  });
});
