import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../../src/api/app.js';
import { createServices, type Services } from '../../src/services.js';
import { FakeGenerator, FakeSearchBackend, PROMPT, silentLogger, testAppConfig, testSessionConfig } from '../helpers/fakes.js';

const NOTES =
  'Our hotel in Kyoto is the Gion Ryokan. Check-in starts at 3 PM and breakfast is included every morning.';

describe('HTTP API', () => {
  let services: Services;
  let generator: FakeGenerator;
  let app: Express;

  beforeEach(() => {
    generator = new FakeGenerator().on(PROMPT.chat, 'Check-in starts at 3 PM.');
    services = createServices({
      app: testAppConfig({ maxUploadSizeMb: 0.01 }),
      session: testSessionConfig(),
      log: silentLogger(),
      generator,
      searchBackend: new FakeSearchBackend(),
    });
    app = createApp(services, silentLogger());
  });

  afterEach(() => services.close());

  describe('POST /chat', () => {
    it('answers a message', async () => {
      const res = await request(app).post('/chat').send({ message: 'Hi!', session_id: 'api-1' });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ message: 'Check-in starts at 3 PM.', session_id: 'api-1' });
    });

    it('rejects an empty message', async () => {
      const res = await request(app).post('/chat').send({ message: '   ' });
      expect(res.status).toBe(400);
      expect(res.body.error.fieldErrors.message).toHaveLength(1);
    });

    it('rejects a body that is not JSON', async () => {
      const res = await request(app).post('/chat').set('Content-Type', 'application/json').send('{"message":');
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ error: 'invalid_json' });
    });
  });

  describe('POST /plan', () => {
    it('returns an itinerary for every requested day', async () => {
      const res = await request(app).post('/plan').send({ destination: 'Bali', duration_days: 3, budget: 900 });
      expect(res.status).toBe(200);
      expect(res.body.destination).toBe('Bali');
      expect(res.body.duration).toBe(3);
      expect(res.body.map_link).toBe('https://www.google.com/maps/search/Bali');
      expect(res.body.itinerary.days).toHaveLength(3);
      expect(res.body.itinerary.total_cost).toBe(900);
      expect(res.body.itinerary.currency).toBe('USD');
    });

    it('rejects a budget that overflows to Infinity', async () => {
      const res = await request(app)
        .post('/plan')
        .set('Content-Type', 'application/json')
        .send('{"destination":"Bali","duration_days":3,"budget":1e400}');
      expect(res.status).toBe(400);
      expect(res.body.error.fieldErrors.budget).toHaveLength(1);
    });

    it('rejects trips longer than 30 days', async () => {
      const res = await request(app).post('/plan').send({ destination: 'Bali', duration_days: 31, budget: 900 });
      expect(res.status).toBe(400);
      expect(res.body.error.fieldErrors.duration_days).toHaveLength(1);
    });
  });

  describe('POST /upload and sessions', () => {
    it('stores document chunks under the session', async () => {
      const res = await request(app)
        .post('/upload')
        .field('session_id', 'up-1')
        .attach('file', Buffer.from(NOTES), 'notes.txt');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        filename: 'notes.txt',
        pages: 1,
        chunks: 1,
        status: 'success',
        message: 'Processed notes.txt: 1 chunks ready for questions.',
        session_id: 'up-1',
      });

      const info = await request(app).get('/session/up-1');
      expect(info.body).toMatchObject({ session_id: 'up-1', exists: true, message_count: 0, document_chunks: 1 });
      expect(typeof info.body.created_at).toBe('string');
    });

    it('answers document questions from the upload', async () => {
      await request(app).post('/upload').field('session_id', 'up-2').attach('file', Buffer.from(NOTES), 'notes.txt');
      const res = await request(app).post('/chat').send({ message: 'What does my uploaded document say about check-in?', session_id: 'up-2' });

      expect(res.body.tool_calls).toEqual(['rag_search']);
      expect(res.body.sources[0].type).toBe('document');
      expect(generator.promptsMatching(PROMPT.chat)[0]).toContain('=== FROM YOUR UPLOADED DOCUMENTS ===');
    });

    it('rejects unsupported and missing files', async () => {
      const png = await request(app).post('/upload').attach('file', Buffer.from('fake image'), 'photo.png');
      expect(png.status).toBe(400);
      expect(png.body).toEqual({
        error: 'unsupported_document',
        message: 'Unsupported file type ".png". Upload a PDF, DOCX or TXT file.',
      });

      const none = await request(app).post('/upload').field('session_id', 'up-3');
      expect(none.status).toBe(400);
      expect(none.body.error).toBe('missing_file');
    });

    it('rejects files over the size limit', async () => {
      const res = await request(app).post('/upload').attach('file', Buffer.alloc(20_000, 'a'), 'big.txt');
      expect(res.status).toBe(413);
      expect(res.body.error).toBe('document_too_large');
    });

    it('clears a session', async () => {
      await request(app).post('/chat').send({ message: 'Hi!', session_id: 'gone-1' });
      const cleared = await request(app).delete('/session/gone-1');
      expect(cleared.body).toEqual({ session_id: 'gone-1', status: 'cleared' });

      const info = await request(app).get('/session/gone-1');
      expect(info.body).toEqual({ session_id: 'gone-1', exists: false, message_count: 0, document_chunks: 0 });
    });
  });

  describe('operations', () => {
    it('reports model connectivity', async () => {
      const up = await request(app).get('/healthz');
      expect(up.body).toEqual({ status: 'healthy', llm_provider: 'fake', llm_connected: true });

      generator.healthy = false;
      const down = await request(app).get('/healthz');
      expect(down.body).toEqual({ status: 'degraded', llm_provider: 'fake', llm_connected: false });
    });

    it('exposes Prometheus metrics', async () => {
      await request(app).post('/chat').send({ message: 'Hi!' });
      const res = await request(app).get('/metrics');
      expect(res.status).toBe(200);
      expect(res.headers['content-type']).toContain('text/plain');
      expect(res.text).toMatch(/requests_total\{route="chat",outcome="ok"\} \d+/);
    });
  });
});
